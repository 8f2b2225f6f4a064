/**
 * packages/node/src/io/writeAll.ts — Write a whole buffer to a transport.
 *
 * Printer devices routinely accept only part of a write. The loop keeps
 * offering the remainder until everything is written, then flushes once.
 *
 *   - EINTR: retried at once
 *   - EAGAIN / EWOULDBLOCK: retried after `retryDelayMs`
 *   - a write that accepts 0 bytes: BUFFER_FULL
 *   - anything else: mapped by toPrinterError
 */

import { PrinterError, isNodeErrorWithCode, toPrinterError } from "../errors.js";
import type { PrinterTransport } from "../transport.js";
import { normalizePositiveInteger, sleep } from "./delay.js";

const DEFAULT_RETRY_DELAY_MS = 10;

export type WriteAllOptions = Readonly<{
  retryDelayMs?: number;
}>;

export async function writeAllWithRetry(
  transport: PrinterTransport,
  data: Uint8Array,
  opts: WriteAllOptions = {},
): Promise<void> {
  const retryDelayMs = normalizePositiveInteger(opts.retryDelayMs, DEFAULT_RETRY_DELAY_MS);
  let offset = 0;

  while (offset < data.byteLength) {
    let written: number;
    try {
      written = await transport.write(data.subarray(offset));
    } catch (error) {
      if (isNodeErrorWithCode(error)) {
        if (error.code === "EINTR") continue;
        if (error.code === "EAGAIN" || error.code === "EWOULDBLOCK") {
          await sleep(retryDelayMs);
          continue;
        }
      }
      throw toPrinterError(error);
    }

    if (written <= 0) {
      throw new PrinterError(
        "BUFFER_FULL",
        `Printer buffer full: write accepted 0 of ${data.byteLength - offset} remaining bytes`,
      );
    }
    offset += written;
  }

  try {
    await transport.flush();
  } catch (error) {
    throw toPrinterError(error);
  }
}
