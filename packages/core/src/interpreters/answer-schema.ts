import { z } from 'zod';

const field = z.string().min(1).optional();

export const answerSpecSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('yes-no'),
    expected: z.boolean().optional(),
    field,
  }),
  z.object({
    kind: z.literal('label'),
    labels: z.union([z.array(z.string().min(1)).min(1), z.record(z.array(z.string().min(1)))]),
    expected: z.string().optional(),
    field,
  }),
  z.object({
    kind: z.literal('score'),
    threshold: z.number().min(0).max(1),
    max: z.number().positive().optional(),
    field,
  }),
  z.object({
    kind: z.literal('match'),
    expected: z.string().min(1),
    tolerance: z.number().min(0).max(1).optional(),
    field,
  }),
]);
