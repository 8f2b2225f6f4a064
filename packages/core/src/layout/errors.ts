/**
 * packages/core/src/layout/errors.ts — Structured composition and render errors.
 *
 * Why: Region algebra, widget composition and rendering all fail on
 * data-dependent conditions. These failures are returned as values carrying the
 * offending sizes, positions and bounds rather than thrown, so callers can
 * retry (e.g. a smaller column allocation) and log precise diagnostics.
 *
 * Error groups:
 *   - Region: INVALID_DIMENSIONS, REGION_OUT_OF_BOUNDS, INVALID_SPLIT
 *   - Composition: CHILD_EXCEEDS_PARENT, OVERLAPPING_CHILDREN,
 *     INSUFFICIENT_SPACE, INTEGER_OVERFLOW, INVALID_COORDINATE
 *   - Content: TEXT_EXCEEDS_WIDTH
 *   - Render: OUT_OF_BOUNDS
 */

import type { Bounds, Position } from "./types.js";

export type InvalidDimensionsError = Readonly<{
  code: "INVALID_DIMENSIONS";
  width: number;
  height: number;
  detail: string;
}>;

export type RegionOutOfBoundsError = Readonly<{
  code: "REGION_OUT_OF_BOUNDS";
  x: number;
  y: number;
  width: number;
  height: number;
  detail: string;
}>;

export type InvalidSplitError = Readonly<{
  code: "INVALID_SPLIT";
  parentSize: number;
  splitSize: number;
  detail: string;
}>;

export type ChildExceedsParentError = Readonly<{
  code: "CHILD_EXCEEDS_PARENT";
  parentWidth: number;
  parentHeight: number;
  childWidth: number;
  childHeight: number;
  position: Position;
  detail: string;
}>;

export type OverlappingChildrenError = Readonly<{
  code: "OVERLAPPING_CHILDREN";
  /** Bounding box of the child already in the container. */
  existing: Bounds;
  /** Bounding box of the rejected child. */
  incoming: Bounds;
  detail: string;
}>;

export type InsufficientSpaceError = Readonly<{
  code: "INSUFFICIENT_SPACE";
  available: number;
  required: number;
  layoutType: "Column" | "Row";
  detail: string;
}>;

export type IntegerOverflowError = Readonly<{
  code: "INTEGER_OVERFLOW";
  operation: string;
  detail: string;
}>;

export type InvalidCoordinateError = Readonly<{
  code: "INVALID_COORDINATE";
  field: string;
  value: number;
  detail: string;
}>;

export type TextExceedsWidthError = Readonly<{
  code: "TEXT_EXCEEDS_WIDTH";
  textLength: number;
  widgetWidth: number;
  multiline: boolean;
  detail: string;
}>;

export type OutOfBoundsError = Readonly<{
  code: "OUT_OF_BOUNDS";
  position: Position;
  bounds: Bounds;
  detail: string;
}>;

export type RegionError = InvalidDimensionsError | RegionOutOfBoundsError | InvalidSplitError;
export type CompositionError =
  | ChildExceedsParentError
  | OverlappingChildrenError
  | InsufficientSpaceError
  | IntegerOverflowError
  | InvalidCoordinateError;
export type ContentError = TextExceedsWidthError;
export type RenderError = OutOfBoundsError;

export type LayoutError = RegionError | CompositionError | ContentError | RenderError;
export type LayoutErrorCode = LayoutError["code"];

/**
 * Result of a fallible layout operation: success with value, or failure with
 * a structured error. Failed operations leave their receiver unchanged.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: LayoutError }>;

export const OK_VOID: LayoutResult<void> = Object.freeze({ ok: true, value: undefined });

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: LayoutError): LayoutResult<T> {
  return { ok: false, error };
}

function fmtBounds(b: Bounds): string {
  return `(x:${b.x}, y:${b.y}, w:${b.w}, h:${b.h})`;
}

/* --- Constructors (detail strings are part of the public diagnostics) --- */

export function invalidDimensions(width: number, height: number): InvalidDimensionsError {
  return {
    code: "INVALID_DIMENSIONS",
    width,
    height,
    detail: `Invalid region dimensions: ${width}×${height} (must be non-zero and within page bounds)`,
  };
}

export function regionOutOfBounds(
  x: number,
  y: number,
  width: number,
  height: number,
): RegionOutOfBoundsError {
  return {
    code: "REGION_OUT_OF_BOUNDS",
    x,
    y,
    width,
    height,
    detail: `Region out of bounds: position (${x}, ${y}), size (${width}×${height}) exceeds page dimensions (160×51)`,
  };
}

export function invalidSplit(parentSize: number, splitSize: number): InvalidSplitError {
  return {
    code: "INVALID_SPLIT",
    parentSize,
    splitSize,
    detail: `Invalid region split: split size ${splitSize} exceeds parent size ${parentSize}`,
  };
}

export function childExceedsParent(
  parentWidth: number,
  parentHeight: number,
  childWidth: number,
  childHeight: number,
  position: Position,
): ChildExceedsParentError {
  return {
    code: "CHILD_EXCEEDS_PARENT",
    parentWidth,
    parentHeight,
    childWidth,
    childHeight,
    position,
    detail: `Child widget (${childWidth}×${childHeight}) at position (${position.x}, ${position.y}) exceeds parent bounds (${parentWidth}×${parentHeight})`,
  };
}

export function overlappingChildren(existing: Bounds, incoming: Bounds): OverlappingChildrenError {
  return {
    code: "OVERLAPPING_CHILDREN",
    existing,
    incoming,
    detail: `Child widgets overlap: existing ${fmtBounds(existing)} intersects new ${fmtBounds(incoming)}`,
  };
}

export function insufficientSpace(
  available: number,
  required: number,
  layoutType: "Column" | "Row",
): InsufficientSpaceError {
  return {
    code: "INSUFFICIENT_SPACE",
    available,
    required,
    layoutType,
    detail: `${layoutType} layout requires ${required} units but only ${available} available`,
  };
}

export function integerOverflow(operation: string): IntegerOverflowError {
  return { code: "INTEGER_OVERFLOW", operation, detail: `Integer overflow in ${operation}` };
}

export function invalidCoordinate(field: string, value: number): InvalidCoordinateError {
  return {
    code: "INVALID_COORDINATE",
    field,
    value,
    detail: `${field} must be an integer in [0, 65535], got ${String(value)}`,
  };
}

export function textExceedsWidth(
  textLength: number,
  widgetWidth: number,
  multiline: boolean,
): TextExceedsWidthError {
  return {
    code: "TEXT_EXCEEDS_WIDTH",
    textLength,
    widgetWidth,
    multiline,
    detail: multiline
      ? `Text must be a single line (length ${textLength}, widget width ${widgetWidth})`
      : `Text length (${textLength}) exceeds widget width (${widgetWidth})`,
  };
}

export function outOfBounds(position: Position, bounds: Bounds): OutOfBoundsError {
  return {
    code: "OUT_OF_BOUNDS",
    position,
    bounds,
    detail: `Position (${position.x}, ${position.y}) exceeds bounds (${bounds.w}×${bounds.h} at ${bounds.x}, ${bounds.y})`,
  };
}

/** Render an error as a single log line, e.g. `[INSUFFICIENT_SPACE] Column layout requires ...`. */
export function formatLayoutError(error: LayoutError): string {
  return `[${error.code}] ${error.detail}`;
}
