/**
 * packages/node/src/audit.ts — Optional NDJSON print audit trail.
 *
 * Enable with DOTGRID_PRINT_AUDIT=1 (see config.ts). Each record is one JSON
 * line:
 *
 *   { ts, tUs, pid, layer: "node", scope, stage, ...fields }
 *
 * Job payloads are summarised by printJobFingerprint() rather than dumped.
 */

import { appendFileSync } from "node:fs";
import { performance } from "node:perf_hooks";
import { FF } from "@dotgrid/core";
import { type PrintAuditConfig, resolvePrinterConfig } from "./config.js";

export type PrintJobFingerprint = Readonly<{
  byteLen: number;
  hash32: string;
  head16: string;
  tail16: string;
  formFeeds: number;
}>;

type AuditRecord = Readonly<Record<string, unknown>>;

export type PrintAuditLogger = Readonly<{
  enabled: boolean;
  emit: (stage: string, fields?: AuditRecord) => void;
}>;

export function toHex32(v: number): string {
  return `0x${(v >>> 0).toString(16).padStart(8, "0")}`;
}

export function hashFnv1a32(bytes: Uint8Array, end: number = bytes.byteLength): number {
  const n = Math.max(0, Math.min(end, bytes.byteLength));
  let h = 0x811c9dc5;
  for (let i = 0; i < n; i++) {
    h ^= bytes[i] ?? 0;
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function sliceHex(bytes: Uint8Array, start: number, end: number): string {
  const s = Math.max(0, Math.min(start, bytes.byteLength));
  const e = Math.max(s, Math.min(end, bytes.byteLength));
  let out = "";
  for (let i = s; i < e; i++) {
    out += (bytes[i] ?? 0).toString(16).padStart(2, "0");
  }
  return out;
}

function nowUs(): number {
  return Math.round(performance.now() * 1000);
}

/** `formFeeds` counts every 0x0C byte; for rendered documents that is the page count. */
export function printJobFingerprint(bytes: Uint8Array): PrintJobFingerprint {
  const byteLen = bytes.byteLength;
  let formFeeds = 0;
  for (const b of bytes) {
    if (b === FF) formFeeds++;
  }
  return Object.freeze({
    byteLen,
    hash32: toHex32(hashFnv1a32(bytes, byteLen)),
    head16: sliceHex(bytes, 0, Math.min(16, byteLen)),
    tail16: sliceHex(bytes, Math.max(0, byteLen - 16), byteLen),
    formFeeds,
  });
}

const DISABLED: PrintAuditLogger = Object.freeze({ enabled: false, emit: () => {} });

export function createPrintAuditLogger(
  scope: string,
  config: PrintAuditConfig = resolvePrinterConfig().audit,
): PrintAuditLogger {
  if (!config.enabled) return DISABLED;

  const writeLine = (line: string): void => {
    try {
      if (config.logPath !== null) {
        appendFileSync(config.logPath, `${line}\n`, "utf8");
      }
      if (config.stderrMirror) {
        process.stderr.write(`${line}\n`);
      }
    } catch {
      // Optional diagnostics must never affect runtime behavior.
    }
  };

  return Object.freeze({
    enabled: true,
    emit: (stage: string, fields: AuditRecord = Object.freeze({})) => {
      try {
        const line = JSON.stringify({
          ts: new Date().toISOString(),
          tUs: nowUs(),
          pid: process.pid,
          layer: "node",
          scope,
          stage,
          ...fields,
        });
        writeLine(line);
      } catch {
        // Optional diagnostics must never affect runtime behavior.
      }
    },
  });
}
