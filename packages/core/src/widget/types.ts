/**
 * packages/core/src/widget/types.ts — Composable widget contract.
 *
 * Why: Containers hold children of different concrete types behind one list.
 * Every node exposes its fixed size and a read-only render entry point; the
 * tree is never mutated while rendering, so one tree can be rendered any
 * number of times with identical results.
 */

import type { LayoutResult } from "../layout/errors.js";
import type { Position } from "../layout/types.js";
import type { RenderContext } from "./context.js";

export interface Widget {
  /** Declared width in cells; fixed at construction. */
  readonly width: number;
  /** Declared height in cells; fixed at construction. */
  readonly height: number;
  /** Render at an absolute page position. */
  renderTo(ctx: RenderContext, position: Position): LayoutResult<void>;
}

/** A child stored in a container at a position relative to the container's origin. */
export type PositionedChild = Readonly<{ widget: Widget; position: Position }>;
