import {
  formatReport,
  loadSuite,
  resolveConfig,
  SuiteRunner,
} from '@sightcheck/core';
import {
  launchBrowser,
  PlaywrightCaptureAdapter,
  type PlaywrightCaptureTarget,
} from '@sightcheck/capture-playwright';
import { createEvaluationContext } from '../setup.js';
import { EXIT_FAILED, EXIT_OK, toOverrides, type ModelOptions } from './shared.js';

export interface RunCommandOptions extends ModelOptions {
  artifacts?: string;
  headed?: boolean;
}

/**
 * Run a suite file in Chromium and print a pass/fail line per query.
 */
export async function runCommand(
  suitePath: string,
  options: RunCommandOptions,
  env: Record<string, string | undefined>
): Promise<number> {
  const config = resolveConfig({ ...toOverrides(options), artifactsDir: options.artifacts }, env);
  const suite = await loadSuite(suitePath);
  const context = await createEvaluationContext(config, { mockResponse: options.mockResponse });

  try {
    const browser = await launchBrowser({
      headless: !options.headed,
      timeoutMs: config.captureTimeoutMs,
      retry: config.retry,
      verbose: config.verbose,
    });

    try {
      const runner = new SuiteRunner<PlaywrightCaptureTarget>({
        evaluator: context.evaluator,
        capture: new PlaywrightCaptureAdapter({ timeoutMs: config.captureTimeoutMs }),
        openTarget: (url, viewport) => browser.open(url, viewport),
        artifactsDir: config.artifactsDir,
        viewport: config.viewport,
        verbose: config.verbose,
      });

      const result = await runner.runSuite(suite);
      console.log(formatReport(result, { verbose: config.verbose }));
      if (config.verbose) {
        console.log(`Results appended to ${runner.resultsPath}`);
      }
      return result.failed + result.errored > 0 ? EXIT_FAILED : EXIT_OK;
    } finally {
      await browser.close();
    }
  } finally {
    await context.close();
  }
}
