/**
 * Decoding of the one-byte status reply to DLE EOT 1.
 *
 *   bit 3 set: offline
 *   bit 5 set: paper out
 *   bit 6 set: error
 */

export const STATUS_QUERY: readonly number[] = Object.freeze([0x10, 0x04, 0x01]);

const OFFLINE_BIT = 0b0000_1000;
const PAPER_OUT_BIT = 0b0010_0000;
const ERROR_BIT = 0b0100_0000;

export type PrinterStatus = Readonly<{
  online: boolean;
  paperOut: boolean;
  error: boolean;
}>;

export function decodePrinterStatus(byte: number): PrinterStatus {
  return Object.freeze({
    online: (byte & OFFLINE_BIT) === 0,
    paperOut: (byte & PAPER_OUT_BIT) !== 0,
    error: (byte & ERROR_BIT) !== 0,
  });
}

export function isPrinterReady(status: PrinterStatus): boolean {
  return status.online && !status.paperOut && !status.error;
}
