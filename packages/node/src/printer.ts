/**
 * packages/node/src/printer.ts — Printer session over a transport.
 *
 * Why: Ties the pieces together: every send goes through writeAllWithRetry,
 * status queries through readByteWithTimeout, and document jobs are rendered
 * by the core serializer and recorded in the print audit trail.
 *
 * A closed printer rejects every further operation with DISCONNECTED.
 */

import { performance } from "node:perf_hooks";
import { type Document, ESC } from "@dotgrid/core";
import { type PrintAuditLogger, createPrintAuditLogger, printJobFingerprint } from "./audit.js";
import { type PrinterConfigOverrides, resolvePrinterConfig } from "./config.js";
import { PrinterError } from "./errors.js";
import { readByteWithTimeout } from "./io/readByte.js";
import { writeAllWithRetry } from "./io/writeAll.js";
import { STATUS_QUERY, type PrinterStatus, decodePrinterStatus } from "./status.js";
import { type PrinterTransport, openDeviceTransport } from "./transport.js";

export type PrinterOptions = Readonly<{
  /** Default timeout for queryStatus(); falls back to DOTGRID_STATUS_TIMEOUT_MS. */
  statusTimeoutMs?: number;
  /** Poll interval while waiting for a status byte. */
  pollMs?: number;
  /** Audit sink; defaults to createPrintAuditLogger("printer"). */
  audit?: PrintAuditLogger;
}>;

export type Printer = Readonly<{
  /** Send raw bytes, retrying partial writes. */
  send: (data: Uint8Array | readonly number[]) => Promise<void>;
  /** Send ESC followed by `data`. */
  esc: (data: readonly number[]) => Promise<void>;
  /** ESC @ */
  reset: () => Promise<void>;
  queryStatus: (timeoutMs?: number) => Promise<PrinterStatus>;
  /** Render the document and send the whole job in one write sequence. */
  printDocument: (doc: Document) => Promise<void>;
  close: () => Promise<void>;
}>;

function toBytes(data: Uint8Array | readonly number[]): Uint8Array {
  return data instanceof Uint8Array ? data : Uint8Array.from(data);
}

export function createPrinter(transport: PrinterTransport, opts: PrinterOptions = {}): Printer {
  const statusTimeoutMs = opts.statusTimeoutMs ?? resolvePrinterConfig().statusTimeoutMs;
  const audit = opts.audit ?? createPrintAuditLogger("printer");
  let closed = false;
  let jobSeq = 0;

  const assertOpen = (op: string): void => {
    if (closed) {
      throw new PrinterError("DISCONNECTED", `Printer.${op}: printer is closed`);
    }
  };

  const send = async (data: Uint8Array | readonly number[]): Promise<void> => {
    assertOpen("send");
    await writeAllWithRetry(transport, toBytes(data));
  };

  const queryStatus = async (timeoutMs: number = statusTimeoutMs): Promise<PrinterStatus> => {
    assertOpen("queryStatus");
    await writeAllWithRetry(transport, Uint8Array.from(STATUS_QUERY));
    const byte = await readByteWithTimeout(
      transport,
      timeoutMs,
      opts.pollMs === undefined ? {} : { pollMs: opts.pollMs },
    );
    const status = decodePrinterStatus(byte);
    audit.emit("status", { byte, ...status });
    return status;
  };

  const printDocument = async (doc: Document): Promise<void> => {
    assertOpen("printDocument");
    const job = ++jobSeq;
    const bytes = doc.render();
    const started = performance.now();
    audit.emit("job.begin", { job, pages: doc.pageCount, ...printJobFingerprint(bytes) });
    try {
      await writeAllWithRetry(transport, bytes);
    } catch (error) {
      audit.emit("job.error", {
        job,
        code: error instanceof PrinterError ? error.code : "UNKNOWN",
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
    audit.emit("job.end", { job, durationUs: Math.round((performance.now() - started) * 1000) });
  };

  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await transport.close();
  };

  return Object.freeze({
    send,
    esc: (data: readonly number[]) => send([ESC, ...data]),
    reset: () => send([ESC, 0x40]),
    queryStatus,
    printDocument,
    close,
  });
}

/** Open the configured device and start a session on it. */
export async function openPrinter(
  overrides: PrinterConfigOverrides = {},
  opts: Omit<PrinterOptions, "statusTimeoutMs"> = {},
): Promise<Printer> {
  const config = resolvePrinterConfig(overrides);
  const transport = await openDeviceTransport(config.devicePath);
  return createPrinter(transport, {
    ...opts,
    statusTimeoutMs: config.statusTimeoutMs,
    audit: opts.audit ?? createPrintAuditLogger("printer", config.audit),
  });
}
