/**
 * Visual Capture Adapter over Playwright pages and elements.
 *
 * Screenshots are taken with animations disabled and the caret hidden, after
 * the page reaches the configured load state, so an unchanged page yields
 * byte-identical images.
 */

import type { LocatorScreenshotOptions, PageScreenshotOptions } from 'playwright';
import {
  createCaptureRecord,
  createError,
  errorMessage,
  systemClock,
  type CaptureAdapter,
  type CaptureRecord,
  type Clock,
} from '@sightcheck/core';

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

/** The part of a Playwright `Page` the adapter uses. */
export interface ScreenshotPage {
  url(): string;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  screenshot(options?: PageScreenshotOptions): Promise<Buffer>;
}

/** The part of a Playwright `Locator` the adapter uses. */
export interface ScreenshotElement {
  page(): ScreenshotPage;
  screenshot(options?: LocatorScreenshotOptions): Promise<Buffer>;
}

export type PlaywrightCaptureTarget = ScreenshotPage | ScreenshotElement;

export interface PlaywrightCaptureOptions {
  /**
   * Bound on waiting for the load state and the screenshot itself.
   * @default 30000
   */
  timeoutMs?: number;
  /** @default 'load' */
  waitUntil?: LoadState;
  /** @default false */
  fullPage?: boolean;
  clock?: Clock;
}

const DEFAULT_CAPTURE_TIMEOUT_MS = 30_000;

function isPage(target: PlaywrightCaptureTarget): target is ScreenshotPage {
  return 'url' in target;
}

/**
 * Map a Playwright failure to a capture error.
 */
export function toCaptureError(error: unknown, source: string): Error {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return createError('ERROR_CAPTURE_TIMEOUT', `Page did not settle in time: ${source}`, {
      cause: error,
      recoverability: 'recoverable',
      details: { source },
      userAction: 'Increase the capture timeout or check that the page finishes loading',
    });
  }
  return createError('ERROR_CAPTURE_FAILED', `Capture failed for ${source}: ${errorMessage(error)}`, {
    cause: error,
    details: { source },
  });
}

export class PlaywrightCaptureAdapter implements CaptureAdapter<PlaywrightCaptureTarget> {
  private readonly timeoutMs: number;
  private readonly waitUntil: LoadState;
  private readonly fullPage: boolean;
  private readonly clock: Clock;

  constructor(options: PlaywrightCaptureOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CAPTURE_TIMEOUT_MS;
    this.waitUntil = options.waitUntil ?? 'load';
    this.fullPage = options.fullPage ?? false;
    this.clock = options.clock ?? systemClock;
  }

  async capture(target: PlaywrightCaptureTarget): Promise<CaptureRecord> {
    const page = isPage(target) ? target : target.page();
    const source = isPage(target) ? page.url() : `${page.url()} (element)`;

    let image: Buffer;
    try {
      await page.waitForLoadState(this.waitUntil, { timeout: this.timeoutMs });
      image = isPage(target)
        ? await target.screenshot({
            type: 'png',
            animations: 'disabled',
            caret: 'hide',
            fullPage: this.fullPage,
            timeout: this.timeoutMs,
          })
        : await target.screenshot({
            type: 'png',
            animations: 'disabled',
            caret: 'hide',
            timeout: this.timeoutMs,
          });
    } catch (err) {
      throw toCaptureError(err, source);
    }

    return createCaptureRecord(new Uint8Array(image), source, 'image/png', this.clock);
  }
}

export function createPlaywrightCaptureAdapter(options?: PlaywrightCaptureOptions): PlaywrightCaptureAdapter {
  return new PlaywrightCaptureAdapter(options);
}
