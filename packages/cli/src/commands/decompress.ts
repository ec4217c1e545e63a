import { decompressModel } from '@sightcheck/core';
import { EXIT_OK } from './shared.js';

export interface DecompressCommandOptions {
  force?: boolean;
  verbose?: boolean;
}

/**
 * Gunzip a model archive ahead of time so test runs skip that cost.
 */
export async function decompressCommand(archive: string, options: DecompressCommandOptions): Promise<number> {
  const result = await decompressModel(archive, { force: options.force, verbose: options.verbose });
  if (result.reused) {
    console.log(`Already decompressed: ${result.outputPath}`);
  } else {
    console.log(`Decompressed to ${result.outputPath} (${result.sizeBytes} bytes in ${Math.round(result.durationMs)}ms)`);
  }
  return EXIT_OK;
}
