/**
 * packages/core/src/grid/cell.ts — Character cell and style flag values.
 *
 * Why: A cell is the unit the serializer walks: one printable ASCII byte plus
 * a 2-bit style set. Normalizing at construction means nothing downstream ever
 * has to handle control characters or non-ASCII input.
 */

import { REPLACEMENT_CHAR } from "../abi.js";

/** Bit set of {bold, underline}; compared by value. */
export type StyleFlags = number;

export const STYLE_NONE: StyleFlags = 0;
export const STYLE_BOLD: StyleFlags = 1 << 0;
export const STYLE_UNDERLINE: StyleFlags = 1 << 1;

const STYLE_MASK = STYLE_BOLD | STYLE_UNDERLINE;

export function isBold(style: StyleFlags): boolean {
  return (style & STYLE_BOLD) !== 0;
}

export function isUnderline(style: StyleFlags): boolean {
  return (style & STYLE_UNDERLINE) !== 0;
}

export function withBold(style: StyleFlags): StyleFlags {
  return (style | STYLE_BOLD) & STYLE_MASK;
}

export function withUnderline(style: StyleFlags): StyleFlags {
  return (style | STYLE_UNDERLINE) & STYLE_MASK;
}

export function styleFlags(attrs: Readonly<{ bold?: boolean; underline?: boolean }>): StyleFlags {
  let style = STYLE_NONE;
  if (attrs.bold === true) style |= STYLE_BOLD;
  if (attrs.underline === true) style |= STYLE_UNDERLINE;
  return style;
}

/** One character position: a byte in [32, 126] and its style. */
export type Cell = Readonly<{ character: number; style: StyleFlags }>;

export const EMPTY_CELL: Cell = Object.freeze({ character: 0x20, style: STYLE_NONE });

/** Map a Unicode code point to the byte stored in a cell. */
export function normalizeCodePoint(cp: number): number {
  return cp >= 32 && cp <= 126 ? cp : REPLACEMENT_CHAR;
}

/**
 * Create a cell from the first code point of `ch`. Control characters,
 * non-ASCII characters and the empty string all become `?`.
 */
export function createCell(ch: string, style: StyleFlags): Cell {
  const cp = ch.codePointAt(0);
  return {
    character: cp === undefined ? REPLACEMENT_CHAR : normalizeCodePoint(cp),
    style: style & STYLE_MASK,
  };
}

export function cellChar(cell: Cell): string {
  return String.fromCharCode(cell.character);
}

export function cellEquals(a: Cell, b: Cell): boolean {
  return a.character === b.character && a.style === b.style;
}
