/**
 * Error taxonomy for the capture pipeline
 */

export abstract class CaptureError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing, unreadable or malformed manifest. Fatal before any network activity.
 */
export class ManifestError extends CaptureError {
  readonly code = 'MANIFEST_INVALID';

  constructor(
    message: string,
    public readonly manifestPath?: string,
    options?: { cause?: unknown }
  ) {
    super(manifestPath ? `${manifestPath}: ${message}` : message, options);
  }
}

/**
 * Network or HTTP failure for a single entry
 */
export class FetchError extends CaptureError {
  readonly code = 'FETCH_FAILED';

  constructor(
    message: string,
    public readonly url: string,
    public readonly details: {
      httpStatus?: number;
      attempts: number;
      transient: boolean;
      cancelled?: boolean;
    },
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Text content that cannot be rewritten safely; the fetched bytes are kept as they are
 */
export class RewriteError extends CaptureError {
  readonly code = 'REWRITE_FAILED';

  constructor(message: string, public readonly localPath: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The local server could not bind its port
 */
export class ServerError extends CaptureError {
  readonly code = 'SERVER_FAILED';

  constructor(message: string, public readonly port: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * HAR capture that is missing or not shaped like a HAR log
 */
export class HarError extends CaptureError {
  readonly code = 'HAR_INVALID';

  constructor(message: string, public readonly harPath?: string, options?: { cause?: unknown }) {
    super(harPath ? `${harPath}: ${message}` : message, options);
  }
}
