/**
 * Page geometry, ESC/P wire constants and error types for dotgrid.
 * Wire bytes follow the Epson ESC/P command set.
 */

// =============================================================================
// Page Geometry
// =============================================================================

/**
 * Fixed character grid of one printed page in condensed mode.
 * The core never treats these as configurable.
 */
export const PAGE_WIDTH = 160;
export const PAGE_HEIGHT = 51;

/** Largest coordinate or size value; positions and sizes are unsigned 16-bit. */
export const U16_MAX = 0xffff;

// =============================================================================
// ESC/P Wire Bytes
// =============================================================================

export const ESC = 0x1b;
export const CR = 0x0d;
export const LF = 0x0a;
export const FF = 0x0c;
export const SI = 0x0f;

/** ESC @ — initialize printer. */
export const ESC_RESET: readonly number[] = Object.freeze([ESC, 0x40]);
/** SI — select condensed printing (160 columns per row). */
export const SI_CONDENSED: readonly number[] = Object.freeze([SI]);
/** ESC E / ESC F */
export const ESC_BOLD_ON: readonly number[] = Object.freeze([ESC, 0x45]);
export const ESC_BOLD_OFF: readonly number[] = Object.freeze([ESC, 0x46]);
/** ESC - 1 / ESC - 0 */
export const ESC_UNDERLINE_ON: readonly number[] = Object.freeze([ESC, 0x2d, 0x01]);
export const ESC_UNDERLINE_OFF: readonly number[] = Object.freeze([ESC, 0x2d, 0x00]);

/** Byte substituted for anything outside printable ASCII. */
export const REPLACEMENT_CHAR = 0x3f;

// =============================================================================
// DotgridError
// =============================================================================

/**
 * Codes for programmer errors. Data-dependent failures are never thrown;
 * they travel as `LayoutResult` values instead.
 */
export type DotgridErrorCode = "DOTGRID_INVALID_STATE" | "DOTGRID_INVALID_DIMENSIONS";

/**
 * Error class for misuse of the API (consumed builders, zero-size containers
 * in development mode). The `code` property identifies the violation.
 */
export class DotgridError extends Error {
  override readonly name = "DotgridError";
  readonly code: DotgridErrorCode;

  constructor(code: DotgridErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DotgridError);
    }
  }
}

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

/** Development-only assertions are compiled into every build but skipped in production. */
export const DEV_MODE = NODE_ENV !== "production";
