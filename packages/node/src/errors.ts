/**
 * packages/node/src/errors.ts — Printer driver errors.
 *
 * Why: Device I/O fails in ways the caller handles differently (retry a full
 * buffer, reconnect after a disconnect, fix permissions). Every failure that
 * leaves the driver is a PrinterError with a closed `code`; the underlying
 * Node error, when there is one, is kept as `cause`.
 */

export type PrinterErrorCode =
  | "IO"
  | "PERMISSION"
  | "DEVICE_NOT_FOUND"
  | "DISCONNECTED"
  | "TIMEOUT"
  | "BUFFER_FULL"
  | "VALIDATION";

/** Reason for a VALIDATION failure; null for every other code. */
export type PrinterValidationCode = "MICRO_FEED_ZERO" | "INVALID_PAGE_LENGTH" | "INVALID_COMMAND_ARG";

export type PrinterErrorOptions = Readonly<{
  cause?: unknown;
  validation?: PrinterValidationCode;
  path?: string;
  timeoutMs?: number;
}>;

export class PrinterError extends Error {
  override readonly name = "PrinterError";
  readonly code: PrinterErrorCode;
  readonly validation: PrinterValidationCode | null;
  readonly path: string | null;
  readonly timeoutMs: number | null;

  constructor(code: PrinterErrorCode, message: string, opts: PrinterErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.code = code;
    this.validation = opts.validation ?? null;
    this.path = opts.path ?? null;
    this.timeoutMs = opts.timeoutMs ?? null;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PrinterError);
    }
  }
}

export function isNodeErrorWithCode(error: unknown): error is Readonly<{ code: string }> {
  if (!error || typeof error !== "object") return false;
  const code = (error as { code?: unknown }).code;
  return typeof code === "string";
}

export function validationError(validation: PrinterValidationCode, message: string): PrinterError {
  return new PrinterError("VALIDATION", `Validation error: ${message}`, { validation });
}

/**
 * Map an error thrown by `node:fs` (or a transport) onto a PrinterError.
 * PrinterErrors pass through unchanged.
 */
export function toPrinterError(error: unknown, path?: string): PrinterError {
  if (error instanceof PrinterError) return error;
  const where = path ?? "printer device";
  if (isNodeErrorWithCode(error)) {
    switch (error.code) {
      case "EACCES":
      case "EPERM":
        return new PrinterError("PERMISSION", `Permission denied: ${where}`, {
          cause: error,
          ...(path === undefined ? {} : { path }),
        });
      case "ENOENT":
      case "ENODEV":
      case "ENXIO":
        return new PrinterError("DEVICE_NOT_FOUND", `Printer device not found: ${where}`, {
          cause: error,
          ...(path === undefined ? {} : { path }),
        });
      case "EPIPE":
      case "ECONNRESET":
        return new PrinterError("DISCONNECTED", "Printer disconnected", { cause: error });
      default:
        break;
    }
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new PrinterError("IO", `I/O error: ${detail}`, { cause: error });
}
