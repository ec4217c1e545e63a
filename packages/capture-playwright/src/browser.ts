/**
 * Chromium launcher for suite runs: one browser, a fresh context per page.
 *
 * Launching and opening a page are retried under the configured retry
 * policy; a page that failed to open has its context closed before the next
 * attempt.
 */

import { chromium } from 'playwright';
import {
  errorMessage,
  isCaptureError,
  RetryController,
  type Clock,
  type OpenedTarget,
  type RetryPolicy,
  type Viewport,
} from '@sightcheck/core';
import { toCaptureError, type LoadState, type ScreenshotPage } from './playwright-capture.js';

/** The part of a Playwright `Page` the launcher uses. */
export interface BrowserPage extends ScreenshotPage {
  goto(url: string, options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
}

export interface BrowserContextHandle {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

/** The part of a Playwright `Browser` the launcher uses. */
export interface BrowserHandle {
  newContext(options?: { viewport?: Viewport }): Promise<BrowserContextHandle>;
  close(): Promise<void>;
}

export type BrowserLauncher = (options: { headless: boolean }) => Promise<BrowserHandle>;

export interface BrowserLaunchOptions {
  /** @default true */
  headless?: boolean;
  /**
   * Navigation timeout.
   * @default 30000
   */
  timeoutMs?: number;
  /** @default 'networkidle' */
  waitUntil?: LoadState;
  /** Retry policy for launching and opening pages; capture errors are retried by default. */
  retry?: Partial<RetryPolicy>;
  clock?: Clock;
  /** @default Playwright's Chromium */
  launcher?: BrowserLauncher;
  verbose?: boolean;
}

export interface PageOpener {
  open(url: string, viewport: Viewport): Promise<OpenedTarget<BrowserPage>>;
  close(): Promise<void>;
}

const DEFAULT_NAVIGATION_TIMEOUT_MS = 30_000;

const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

/**
 * Launch Chromium. Each `open` navigates a new isolated context; closing
 * the target closes its context.
 */
export async function launchBrowser(options: BrowserLaunchOptions = {}): Promise<PageOpener> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
  const waitUntil = options.waitUntil ?? 'networkidle';
  const headless = options.headless ?? true;
  const launch = options.launcher ?? launchChromium;
  const verbose = options.verbose ?? false;
  const retry = new RetryController(
    { ...options.retry, isRetryable: options.retry?.isRetryable ?? isCaptureError },
    {
      clock: options.clock,
      onRetry: ({ attempt, delayMs, error }) => {
        if (verbose) {
          console.log(`[Browser] Attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`);
        }
      },
    }
  );

  const browser = await retry.call(async () => {
    try {
      return await launch({ headless });
    } catch (err) {
      throw toCaptureError(err, 'chromium');
    }
  });

  async function openOnce(url: string, viewport: Viewport): Promise<OpenedTarget<BrowserPage>> {
    let context: BrowserContextHandle;
    try {
      context = await browser.newContext({ viewport });
    } catch (err) {
      throw toCaptureError(err, url);
    }

    try {
      const page = await context.newPage();
      if (verbose) {
        console.log(`[Browser] Opening ${url} at ${viewport.width}x${viewport.height}`);
      }
      await page.goto(url, { waitUntil, timeout: timeoutMs });
      return { target: page, close: () => context.close() };
    } catch (err) {
      await context.close();
      throw toCaptureError(err, url);
    }
  }

  return {
    open: (url, viewport) => retry.call(() => openOnce(url, viewport)),

    async close(): Promise<void> {
      await browser.close();
    },
  };
}
