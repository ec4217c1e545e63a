import {
  answerFromExpected,
  createVisualAssert,
  FileCaptureAdapter,
  resolveConfig,
  type AnswerSpec,
} from '@sightcheck/core';
import { createEvaluationContext } from '../setup.js';
import { EXIT_FAILED, EXIT_OK, printError, toOverrides, type ModelOptions } from './shared.js';

export interface CheckCommandOptions extends ModelOptions {
  /** yes/no, or the reference text for a free-text answer. */
  expect?: string;
  tolerance?: number;
  json?: boolean;
}

/**
 * Ask one question about one image file.
 */
export async function checkCommand(
  image: string,
  prompt: string,
  options: CheckCommandOptions,
  env: Record<string, string | undefined>
): Promise<number> {
  const config = resolveConfig(toOverrides(options), env);
  const context = await createEvaluationContext(config, { mockResponse: options.mockResponse });

  try {
    const answer: AnswerSpec = options.expect
      ? answerFromExpected(options.expect, options.tolerance)
      : { kind: 'yes-no' };
    const visual = createVisualAssert({ evaluator: context.evaluator, capture: new FileCaptureAdapter() });

    try {
      const verdict = await visual.check(image, prompt, answer);
      if (options.json) {
        console.log(JSON.stringify(verdict, null, 2));
      } else {
        console.log(`${verdict.passed ? '✓' : '✗'} ${prompt} = ${JSON.stringify(verdict.value)}`);
        console.log(`  model: ${verdict.rawResponse.trim()}`);
      }
      return verdict.passed ? EXIT_OK : EXIT_FAILED;
    } catch (err) {
      printError(err);
      return EXIT_FAILED;
    }
  } finally {
    await context.close();
  }
}
