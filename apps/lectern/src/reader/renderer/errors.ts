/**
 * Reader Errors
 *
 * Every error the render pipeline raises carries a stable `code` so that
 * worker responses can be mapped back to the same class on the main thread.
 *
 * Page-scoped errors (rasterization, text extraction, invalid requests) are
 * converted to placeholder frames by the RenderCoordinator and never escape
 * `renderFrame()`. Only OpenFailed is fatal to a session.
 */

export type LecternErrorCode =
  | 'OPEN_FAILED'
  | 'RASTERIZATION_FAILED'
  | 'INVALID_RENDER_REQUEST'
  | 'TEXT_EXTRACTION_FAILED'
  | 'CONFIG_INVALID';

export abstract class LecternError extends Error {
  abstract readonly code: LecternErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Document could not be opened (missing, unreadable or corrupt).
 */
export class OpenFailed extends LecternError {
  readonly code = 'OPEN_FAILED';

  constructor(
    public readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to open ${path}: ${reason}`, options);
  }
}

/**
 * Native rasterization failed for one page.
 */
export class RasterizationFailed extends LecternError {
  readonly code = 'RASTERIZATION_FAILED';

  constructor(
    public readonly pageIndex: number,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Rasterization failed for page ${pageIndex + 1}: ${reason}`, options);
  }
}

/**
 * Request rejected before reaching the native library.
 */
export class InvalidRenderRequest extends LecternError {
  readonly code = 'INVALID_RENDER_REQUEST';

  constructor(
    public readonly pageIndex: number,
    reason: string
  ) {
    super(`Invalid render request for page ${pageIndex + 1}: ${reason}`);
  }
}

export class TextExtractionFailed extends LecternError {
  readonly code = 'TEXT_EXTRACTION_FAILED';

  constructor(
    public readonly pageIndex: number,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Text extraction failed for page ${pageIndex + 1}: ${reason}`, options);
  }
}

/**
 * Configuration did not validate.
 */
export class ConfigError extends LecternError {
  readonly code = 'CONFIG_INVALID';

  constructor(
    message: string,
    public readonly issues: Array<{ path: (string | number)[]; message: string }>
  ) {
    super(message);
  }
}

/**
 * Page-scoped errors are shown in place of the page; anything else propagates.
 */
export function isPageScopedError(
  error: unknown
): error is RasterizationFailed | InvalidRenderRequest | TextExtractionFailed {
  return (
    error instanceof RasterizationFailed ||
    error instanceof InvalidRenderRequest ||
    error instanceof TextExtractionFailed
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
