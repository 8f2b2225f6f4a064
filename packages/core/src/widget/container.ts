/**
 * packages/core/src/widget/container.ts — Fixed-size container node.
 *
 * Why: A Container is the only node kind that holds children. It validates
 * every insertion so that, once composition succeeds, a render pass cannot
 * place anything outside its parent or on top of a sibling.
 *
 * addChild checks, in order:
 *   1. position + child size fits in 16 bits (INTEGER_OVERFLOW)
 *   2. the child's box lies inside [0,width)×[0,height) (CHILD_EXCEEDS_PARENT)
 *   3. the child's box does not intersect an existing child's box
 *      (OVERLAPPING_CHILDREN); boxes that only touch are accepted
 *
 * A failed insertion leaves the container unchanged. Insertion order is the
 * render order.
 */

import { DEV_MODE, DotgridError } from "../abi.js";
import {
  type LayoutResult,
  OK_VOID,
  childExceedsParent,
  fail,
  integerOverflow,
  invalidCoordinate,
  overlappingChildren,
} from "../layout/errors.js";
import { type Bounds, type Position, boundsOverlap, checkedAddU16, isU16 } from "../layout/types.js";
import type { RenderContext } from "./context.js";
import type { PositionedChild, Widget } from "./types.js";

function assertContainerSize(width: number, height: number): void {
  if (!isU16(width) || !isU16(height) || width === 0 || height === 0) {
    throw new DotgridError(
      "DOTGRID_INVALID_DIMENSIONS",
      `Container dimensions must be non-zero 16-bit integers, got ${String(width)}×${String(height)}`,
    );
  }
}

export class Container implements Widget {
  readonly width: number;
  readonly height: number;
  private readonly nodes: PositionedChild[] = [];

  /**
   * Sizes are construction-time constants chosen by the caller, so a zero size
   * is a programmer error: asserted in development builds only.
   */
  constructor(width: number, height: number) {
    if (DEV_MODE) assertContainerSize(width, height);
    this.width = width;
    this.height = height;
  }

  /** Frozen copy of the placed children, in insertion order. */
  get children(): readonly PositionedChild[] {
    return Object.freeze([...this.nodes]);
  }

  get childCount(): number {
    return this.nodes.length;
  }

  addChild(widget: Widget, position: Position): LayoutResult<void> {
    if (!isU16(position.x)) return fail(invalidCoordinate("child position.x", position.x));
    if (!isU16(position.y)) return fail(invalidCoordinate("child position.y", position.y));
    if (widget === this || (widget instanceof Container && widget.containsNode(this))) {
      throw new DotgridError(
        "DOTGRID_INVALID_STATE",
        "Container.addChild: a container cannot be placed inside its own subtree",
      );
    }

    const childW = widget.width;
    const childH = widget.height;

    const right = checkedAddU16(position.x, childW);
    if (right === null) {
      return fail(integerOverflow(`child position.x (${position.x}) + width (${childW})`));
    }
    const bottom = checkedAddU16(position.y, childH);
    if (bottom === null) {
      return fail(integerOverflow(`child position.y (${position.y}) + height (${childH})`));
    }

    if (right > this.width || bottom > this.height) {
      return fail(childExceedsParent(this.width, this.height, childW, childH, position));
    }

    const incoming: Bounds = { x: position.x, y: position.y, w: childW, h: childH };
    for (const existing of this.nodes) {
      const box: Bounds = {
        x: existing.position.x,
        y: existing.position.y,
        w: existing.widget.width,
        h: existing.widget.height,
      };
      if (boundsOverlap(box, incoming)) {
        return fail(overlappingChildren(box, incoming));
      }
    }

    this.nodes.push(Object.freeze({ widget, position: Object.freeze({ x: position.x, y: position.y }) }));
    return OK_VOID;
  }

  /** True when `target` is this container or appears anywhere below it. */
  containsNode(target: Widget): boolean {
    if (target === this) return true;
    for (const child of this.nodes) {
      if (child.widget === target) return true;
      if (child.widget instanceof Container && child.widget.containsNode(target)) return true;
    }
    return false;
  }

  renderTo(ctx: RenderContext, position: Position): LayoutResult<void> {
    for (const child of this.nodes) {
      const res = child.widget.renderTo(ctx, {
        x: position.x + child.position.x,
        y: position.y + child.position.y,
      });
      if (!res.ok) return res;
    }
    return OK_VOID;
  }
}
