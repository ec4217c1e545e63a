/**
 * Common types used across sightcheck packages.
 */

export type RuntimeId = 'ollama' | 'mock' | (string & {});

export type Recoverability = 'recoverable' | 'non-recoverable';

export interface Viewport {
  width: number;
  height: number;
}

export type VerdictValue = boolean | string;
