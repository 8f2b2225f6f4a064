/**
 * packages/node/src/io/readByte.ts — Read one byte with a deadline.
 *
 * Printers answer status queries with a single byte, possibly late. While the
 * transport reports EAGAIN the read is polled every `pollMs` until
 * `timeoutMs` has passed. End of stream means the device went away.
 */

import { performance } from "node:perf_hooks";
import { PrinterError, isNodeErrorWithCode, toPrinterError } from "../errors.js";
import type { PrinterTransport } from "../transport.js";
import { normalizePositiveInteger, sleep } from "./delay.js";

const DEFAULT_POLL_MS = 10;
const WOULD_BLOCK = new Set(["EAGAIN", "EWOULDBLOCK", "ETIMEDOUT"]);

export type ReadByteOptions = Readonly<{
  pollMs?: number;
}>;

export async function readByteWithTimeout(
  transport: PrinterTransport,
  timeoutMs: number,
  opts: ReadByteOptions = {},
): Promise<number> {
  const pollMs = normalizePositiveInteger(opts.pollMs, DEFAULT_POLL_MS);
  const buf = new Uint8Array(1);
  const start = performance.now();

  for (;;) {
    let n: number;
    try {
      n = await transport.read(buf);
    } catch (error) {
      if (isNodeErrorWithCode(error)) {
        if (error.code === "EINTR") continue;
        if (WOULD_BLOCK.has(error.code)) {
          if (performance.now() - start >= timeoutMs) {
            throw new PrinterError(
              "TIMEOUT",
              `Timeout waiting for printer response after ${timeoutMs}ms`,
              { timeoutMs },
            );
          }
          await sleep(pollMs);
          continue;
        }
      }
      throw toPrinterError(error);
    }

    if (n <= 0) {
      throw new PrinterError("DISCONNECTED", "Printer disconnected");
    }
    return buf[0] ?? 0;
  }
}
