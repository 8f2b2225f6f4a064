/**
 * packages/node/src/config.ts — Environment-driven driver configuration.
 *
 * Variables:
 *   DOTGRID_PRINTER_DEVICE=/dev/usb/lp0
 *   DOTGRID_STATUS_TIMEOUT_MS=1000
 *   DOTGRID_PRINT_AUDIT=1
 *   DOTGRID_PRINT_AUDIT_LOG=/tmp/dotgrid-print-audit.ndjson
 *   DOTGRID_PRINT_AUDIT_STDERR_MIRROR=1
 *
 * Explicit overrides win over the environment. Invalid numbers fall back to
 * the defaults.
 */

import { tmpdir } from "node:os";
import { join } from "node:path";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export const DEFAULT_DEVICE_PATH = "/dev/usb/lp0";
export const DEFAULT_STATUS_TIMEOUT_MS = 1000;
export const DEFAULT_AUDIT_LOG_NAME = "dotgrid-print-audit.ndjson";

export type PrintAuditConfig = Readonly<{
  enabled: boolean;
  /** NDJSON file to append to; null writes nowhere unless mirrored. */
  logPath: string | null;
  stderrMirror: boolean;
}>;

export type PrinterConfig = Readonly<{
  devicePath: string;
  statusTimeoutMs: number;
  audit: PrintAuditConfig;
}>;

export type PrinterConfigOverrides = Readonly<{
  devicePath?: string;
  statusTimeoutMs?: number;
  audit?: Partial<PrintAuditConfig>;
}>;

export function readEnv(env: EnvSource, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

export function envFlag(env: EnvSource, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

export function envPositiveInt(env: EnvSource, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function positiveIntOr(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isInteger(value) || value <= 0) return fallback;
  return value;
}

export function resolvePrinterConfig(
  overrides: PrinterConfigOverrides = {},
  env: EnvSource = process.env,
): PrinterConfig {
  const auditEnabled = overrides.audit?.enabled ?? envFlag(env, "DOTGRID_PRINT_AUDIT", false);
  const auditLog =
    overrides.audit?.logPath !== undefined
      ? overrides.audit.logPath
      : (readEnv(env, "DOTGRID_PRINT_AUDIT_LOG") ??
        (auditEnabled ? join(tmpdir(), DEFAULT_AUDIT_LOG_NAME) : null));

  return Object.freeze({
    devicePath: overrides.devicePath ?? readEnv(env, "DOTGRID_PRINTER_DEVICE") ?? DEFAULT_DEVICE_PATH,
    statusTimeoutMs: positiveIntOr(
      overrides.statusTimeoutMs,
      envPositiveInt(env, "DOTGRID_STATUS_TIMEOUT_MS", DEFAULT_STATUS_TIMEOUT_MS),
    ),
    audit: Object.freeze({
      enabled: auditEnabled,
      logPath: auditLog,
      stderrMirror:
        overrides.audit?.stderrMirror ?? envFlag(env, "DOTGRID_PRINT_AUDIT_STDERR_MIRROR", false),
    }),
  });
}
