/**
 * Visual capture contract.
 * Browser automation lives outside the core; adapters only need to hand back
 * a content-addressed image.
 */

export type ImageMimeType = 'image/png' | 'image/jpeg';

export interface CaptureRecord {
  readonly image: Uint8Array;
  /** SHA-256 hex digest of `image`. Nothing else is hashed. */
  readonly contentHash: string;
  readonly capturedAtMs: number;
  /** Page URL, element selector or file path the image came from. */
  readonly source: string;
  readonly mimeType: ImageMimeType;
}

export interface CaptureAdapter<TTarget> {
  /**
   * Capture the current visual state of `target`.
   * Unchanged visual state must produce the same content hash.
   * Throws ERROR_CAPTURE_FAILED or ERROR_CAPTURE_TIMEOUT.
   */
  capture(target: TTarget): Promise<CaptureRecord>;
}
