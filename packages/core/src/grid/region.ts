/**
 * packages/core/src/grid/region.ts — Bounds-checked rectangles over the page.
 *
 * Why: Content widgets draw into a Region; splitting and padding are the only
 * ways to derive one from another, and every derived Region satisfies the same
 * invariant as a constructed one:
 *
 *   width > 0, height > 0, x + width <= 160, y + height <= 51
 *
 * Splits are exact (no rounding, no gaps, no overlap). Padding fails when the
 * padding on an axis meets or exceeds that axis's size.
 */

import { PAGE_HEIGHT, PAGE_WIDTH } from "../abi.js";
import {
  type LayoutResult,
  fail,
  invalidCoordinate,
  invalidDimensions,
  invalidSplit,
  ok,
  regionOutOfBounds,
} from "../layout/errors.js";
import { checkedAddU16, isU16 } from "../layout/types.js";

export type VerticalSplit = Readonly<{ top: Region; bottom: Region }>;
export type HorizontalSplit = Readonly<{ left: Region; right: Region }>;

export class Region {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;

  private constructor(x: number, y: number, width: number, height: number) {
    this.x = x;
    this.y = y;
    this.width = width;
    this.height = height;
    Object.freeze(this);
  }

  static create(x: number, y: number, width: number, height: number): LayoutResult<Region> {
    const fields: readonly (readonly [string, number])[] = [
      ["region.x", x],
      ["region.y", y],
      ["region.width", width],
      ["region.height", height],
    ];
    for (const [field, value] of fields) {
      if (!isU16(value)) return fail(invalidCoordinate(field, value));
    }

    if (width === 0 || height === 0) {
      return fail(invalidDimensions(width, height));
    }

    const endX = checkedAddU16(x, width);
    const endY = checkedAddU16(y, height);
    if (endX === null || endY === null || endX > PAGE_WIDTH || endY > PAGE_HEIGHT) {
      return fail(regionOutOfBounds(x, y, width, height));
    }

    return ok(new Region(x, y, width, height));
  }

  private static readonly FULL_PAGE = new Region(0, 0, PAGE_WIDTH, PAGE_HEIGHT);

  static fullPage(): Region {
    return Region.FULL_PAGE;
  }

  /** Split into a top region of `topHeight` rows and a bottom region of the rest. */
  splitVertical(topHeight: number): LayoutResult<VerticalSplit> {
    if (!isU16(topHeight)) return fail(invalidCoordinate("topHeight", topHeight));
    if (topHeight > this.height) {
      return fail(invalidSplit(this.height, topHeight));
    }
    const bottomHeight = this.height - topHeight;
    if (topHeight === 0 || bottomHeight === 0) {
      return fail(invalidDimensions(this.width, 0));
    }

    return ok({
      top: new Region(this.x, this.y, this.width, topHeight),
      bottom: new Region(this.x, this.y + topHeight, this.width, bottomHeight),
    });
  }

  /** Split into a left region of `leftWidth` columns and a right region of the rest. */
  splitHorizontal(leftWidth: number): LayoutResult<HorizontalSplit> {
    if (!isU16(leftWidth)) return fail(invalidCoordinate("leftWidth", leftWidth));
    if (leftWidth > this.width) {
      return fail(invalidSplit(this.width, leftWidth));
    }
    const rightWidth = this.width - leftWidth;
    if (leftWidth === 0 || rightWidth === 0) {
      return fail(invalidDimensions(0, this.height));
    }

    return ok({
      left: new Region(this.x, this.y, leftWidth, this.height),
      right: new Region(this.x + leftWidth, this.y, rightWidth, this.height),
    });
  }

  withPadding(top: number, right: number, bottom: number, left: number): LayoutResult<Region> {
    const fields: readonly (readonly [string, number])[] = [
      ["padding.top", top],
      ["padding.right", right],
      ["padding.bottom", bottom],
      ["padding.left", left],
    ];
    for (const [field, value] of fields) {
      if (!isU16(value)) return fail(invalidCoordinate(field, value));
    }

    const horizontal = left + right;
    const vertical = top + bottom;
    if (horizontal >= this.width || vertical >= this.height) {
      return fail(
        invalidDimensions(
          Math.max(0, this.width - horizontal),
          Math.max(0, this.height - vertical),
        ),
      );
    }

    return ok(
      new Region(this.x + left, this.y + top, this.width - horizontal, this.height - vertical),
    );
  }

  contains(x: number, y: number): boolean {
    return x >= this.x && x < this.x + this.width && y >= this.y && y < this.y + this.height;
  }
}
