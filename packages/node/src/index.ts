/**
 * @dotgrid/node
 *
 * Node.js printer driver for dotgrid documents: device transport, retrying
 * writes, timed status reads, ESC/P command builders and the print audit log.
 */

export {
  PrinterError,
  isNodeErrorWithCode,
  toPrinterError,
  validationError,
  type PrinterErrorCode,
  type PrinterErrorOptions,
  type PrinterValidationCode,
} from "./errors.js";
export {
  DEFAULT_DEVICE_PATH,
  DEFAULT_STATUS_TIMEOUT_MS,
  envFlag,
  envPositiveInt,
  readEnv,
  resolvePrinterConfig,
  type EnvSource,
  type PrintAuditConfig,
  type PrinterConfig,
  type PrinterConfigOverrides,
} from "./config.js";
export {
  createPrintAuditLogger,
  hashFnv1a32,
  printJobFingerprint,
  toHex32,
  type PrintAuditLogger,
  type PrintJobFingerprint,
} from "./audit.js";
export { openDeviceTransport, type PrinterTransport } from "./transport.js";
export { writeAllWithRetry, type WriteAllOptions } from "./io/writeAll.js";
export { readByteWithTimeout, type ReadByteOptions } from "./io/readByte.js";
export { STATUS_QUERY, decodePrinterStatus, isPrinterReady, type PrinterStatus } from "./status.js";
export * as commands from "./commands.js";
export { Font, type Pitch } from "./commands.js";
export { createPrinter, openPrinter, type Printer, type PrinterOptions } from "./printer.js";
export {
  MockTransport,
  errnoError,
  type MockReadStep,
  type MockTransportOptions,
  type MockWriteStep,
} from "./testing/mockTransport.js";
