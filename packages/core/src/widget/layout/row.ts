/**
 * packages/core/src/widget/layout/row.ts — Horizontal space allocator.
 *
 * Why: Cuts a fixed-width row into consecutive full-height strips. Each
 * call to area() returns a fresh container sized for the strip plus the
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

export class Row {
  readonly width: number;
  readonly height: number;
  private cursorX = 0;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  /** Column offset of the next allocation. */
  get currentX(): number {
    return this.cursorX;
  }

  get remaining(): number {
    return this.width - this.cursorX;
  }

  /**
   * Allocate the next `w` columns. On INSUFFICIENT_SPACE the cursor does not move,
   * so a smaller request may still succeed.
   */
  area(w: number): LayoutResult<Allocation> {
    if (!isU16(w)) return fail(invalidCoordinate("row area width", w));
    if (this.cursorX + w > this.width) {
      return fail(insufficientSpace(this.remaining, w, "Row"));
    }
    const allocation: Allocation = {
      container: new Container(w, this.height),
      position: { x: this.cursorX, y: 0 },
    };
    this.cursorX += w;
    return ok(allocation);
  }
}
