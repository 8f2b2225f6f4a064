/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the fundamental geometric types used throughout the layout
 * system. All coordinates are in printer character cells and model unsigned
 * 16-bit integers.
 */

import { U16_MAX } from "../abi.js";

/** Cell position (column x, row y). */
export type Position = Readonly<{ x: number; y: number }>;

/** Size dimensions (width and height) in cells. */
export type Size = Readonly<{ w: number; h: number }>;

/** Axis-aligned box with position (x,y) and dimensions (w,h) in cells. */
export type Bounds = Readonly<{ x: number; y: number; w: number; h: number }>;

export const ORIGIN: Position = Object.freeze({ x: 0, y: 0 });

export function isU16(v: number): boolean {
  return Number.isInteger(v) && v >= 0 && v <= U16_MAX;
}

/** Sum of two u16 values, or null when it would not fit in 16 bits. */
export function checkedAddU16(a: number, b: number): number | null {
  const sum = a + b;
  return sum > U16_MAX ? null : sum;
}

/**
 * Strict-inequality AABB intersection. Boxes that only share an edge do not
 * overlap.
 */
export function boundsOverlap(a: Bounds, b: Bounds): boolean {
  return a.x < b.x + b.w && b.x < a.x + a.w && a.y < b.y + b.h && b.y < a.y + a.h;
}
