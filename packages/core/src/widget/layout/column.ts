/**
 * packages/core/src/widget/layout/column.ts — Vertical space allocator.
 *
 * Why: Cuts a fixed-height column into consecutive full-width bands. Each
 * call to area() returns a fresh container sized for the band plus the
 * position to add it at, so the parent's overlap check always passes.
 */

import { Container } from "../container.js";
import {
  type LayoutResult,
  fail,
  insufficientSpace,
  invalidCoordinate,
  ok,
} from "../../layout/errors.js";
import { isU16 } from "../../layout/types.js";
import type { Allocation } from "./types.js";

export class Column {
  readonly width: number;
  readonly height: number;
  private cursorY = 0;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  /** Row offset of the next allocation. */
  get currentY(): number {
    return this.cursorY;
  }

  get remaining(): number {
    return this.height - this.cursorY;
  }

  /**
   * Allocate the next `h` rows. On INSUFFICIENT_SPACE the cursor does not move,
   * so a smaller request may still succeed.
   */
  area(h: number): LayoutResult<Allocation> {
    if (!isU16(h)) return fail(invalidCoordinate("column area height", h));
    if (this.cursorY + h > this.height) {
      return fail(insufficientSpace(this.remaining, h, "Column"));
    }
    const allocation: Allocation = {
      container: new Container(this.width, h),
      position: { x: 0, y: this.cursorY },
    };
    this.cursorY += h;
    return ok(allocation);
  }
}
