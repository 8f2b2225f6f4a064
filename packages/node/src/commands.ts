/**
 * packages/node/src/commands.ts — ESC/P command builders.
 *
 * Each builder returns the exact bytes of one command. Arguments are
 * validated before any byte is produced; invalid arguments throw a
 * PrinterError with code VALIDATION.
 *
 * Bitmap graphics commands are not provided.
 */

import {
  CR,
  ESC,
  ESC_BOLD_OFF,
  ESC_BOLD_ON,
  ESC_RESET,
  ESC_UNDERLINE_OFF,
  ESC_UNDERLINE_ON,
  FF,
  LF,
  normalizeCodePoint,
} from "@dotgrid/core";
import { validationError } from "./errors.js";

/** Typefaces selectable with ESC k n. */
export const Font = Object.freeze({
  Roman: 0,
  SansSerif: 1,
  Courier: 2,
  Script: 3,
  Prestige: 4,
} as const);

export type Font = (typeof Font)[keyof typeof Font];

/** Characters per inch selectable with ESC P / ESC M / ESC g. */
export type Pitch = 10 | 12 | 15;

const PITCH_CODES: Readonly<Record<Pitch, number>> = Object.freeze({ 10: 0x50, 12: 0x4d, 15: 0x67 });

function assertIntInRange(command: string, arg: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw validationError(
      "INVALID_COMMAND_ARG",
      `${command}: ${arg} must be an integer in [${min}, ${max}], got ${String(value)}`,
    );
  }
}

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

function lowHigh(value: number): [number, number] {
  return [value & 0xff, (value >> 8) & 0xff];
}

/* --- Printer control --- */

export function reset(): Uint8Array {
  return Uint8Array.from(ESC_RESET);
}

/* --- Text attributes --- */

export function boldOn(): Uint8Array {
  return Uint8Array.from(ESC_BOLD_ON);
}

export function boldOff(): Uint8Array {
  return Uint8Array.from(ESC_BOLD_OFF);
}

export function underlineOn(): Uint8Array {
  return Uint8Array.from(ESC_UNDERLINE_ON);
}

export function underlineOff(): Uint8Array {
  return Uint8Array.from(ESC_UNDERLINE_OFF);
}

export function doubleStrikeOn(): Uint8Array {
  return bytes(ESC, 0x47);
}

export function doubleStrikeOff(): Uint8Array {
  return bytes(ESC, 0x48);
}

export function selectPitch(pitch: Pitch): Uint8Array {
  const code = PITCH_CODES[pitch];
  if (code === undefined) {
    throw validationError("INVALID_COMMAND_ARG", `selectPitch: pitch must be 10, 12 or 15, got ${String(pitch)}`);
  }
  return bytes(ESC, code);
}

export function selectFont(font: Font): Uint8Array {
  assertIntInRange("selectFont", "font", font, 0, 4);
  return bytes(ESC, 0x6b, font);
}

/**
 * Text bytes as printed: one byte per code point, with anything outside
 * printable ASCII (line breaks included) replaced by `?`.
 */
export function text(value: string): Uint8Array {
  const out: number[] = [];
  for (const ch of value) out.push(normalizeCodePoint(ch.codePointAt(0) ?? 0));
  return Uint8Array.from(out);
}

/* --- Vertical layout --- */

/** ESC 3 n: line spacing of n/180 inch. */
export function lineSpacing(dots: number): Uint8Array {
  assertIntInRange("lineSpacing", "dots", dots, 0, 255);
  return bytes(ESC, 0x33, dots);
}

/** ESC 2: 1/6 inch line spacing. */
export function defaultLineSpacing(): Uint8Array {
  return bytes(ESC, 0x32);
}

export function pageLengthLines(lines: number): Uint8Array {
  if (lines === 0) {
    throw validationError("INVALID_PAGE_LENGTH", "Page length must be at least 1, got 0");
  }
  assertIntInRange("pageLengthLines", "lines", lines, 1, 255);
  return bytes(ESC, 0x43, lines);
}

export function pageLengthDots(dots: number): Uint8Array {
  if (dots === 0) {
    throw validationError("INVALID_PAGE_LENGTH", "Page length must be at least 1, got 0");
  }
  assertIntInRange("pageLengthDots", "dots", dots, 1, 0xffff);
  return bytes(ESC, 0x28, 0x43, 0x02, 0x00, ...lowHigh(dots));
}

export function formFeed(): Uint8Array {
  return bytes(FF);
}

export function lineFeed(): Uint8Array {
  return bytes(LF);
}

export function carriageReturn(): Uint8Array {
  return bytes(CR);
}

/** ESC J n: advance the paper n/180 inch. */
export function microFeedForward(units: number): Uint8Array {
  if (units === 0) {
    throw validationError("MICRO_FEED_ZERO", "Micro-feed value must be 1-255, got 0");
  }
  assertIntInRange("microFeedForward", "units", units, 1, 255);
  return bytes(ESC, 0x4a, units);
}

/** ESC j n: reverse the paper n/180 inch. */
export function microFeedReverse(units: number): Uint8Array {
  if (units === 0) {
    throw validationError("MICRO_FEED_ZERO", "Micro-feed value must be 1-255, got 0");
  }
  assertIntInRange("microFeedReverse", "units", units, 1, 255);
  return bytes(ESC, 0x6a, units);
}

/* --- Horizontal layout --- */

export function leftMargin(chars: number): Uint8Array {
  assertIntInRange("leftMargin", "chars", chars, 0, 255);
  return bytes(ESC, 0x6c, chars);
}

export function rightMargin(chars: number): Uint8Array {
  assertIntInRange("rightMargin", "chars", chars, 0, 255);
  return bytes(ESC, 0x51, chars);
}

/** ESC $ nL nH: absolute position in 1/60 inch from the left margin. */
export function moveAbsoluteX(position: number): Uint8Array {
  assertIntInRange("moveAbsoluteX", "position", position, 0, 0xffff);
  return bytes(ESC, 0x24, ...lowHigh(position));
}

/** ESC \ nL nH: relative move; negative offsets are sent as 16-bit two's complement. */
export function moveRelativeX(offset: number): Uint8Array {
  assertIntInRange("moveRelativeX", "offset", offset, -0x8000, 0x7fff);
  return bytes(ESC, 0x5c, ...lowHigh(offset & 0xffff));
}
