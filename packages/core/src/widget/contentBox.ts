/**
 * packages/core/src/widget/contentBox.ts — Hosts a content widget in the tree.
 *
 * Why: Tables, paragraphs and boxes draw into a Region and need no structural
 * validation of their own. ContentBox gives one of them a fixed footprint so
 * it can be placed, overlap-checked and offset like any other child. Content
 * running past the page edge is clipped like label text.
 */

import { DEV_MODE, DotgridError } from "../abi.js";
import type { ContentWidget } from "../content/types.js";
import type { LayoutResult } from "../layout/errors.js";
import { type Position, isU16 } from "../layout/types.js";
import type { RenderContext } from "./context.js";
import type { Widget } from "./types.js";

export class ContentBox implements Widget {
  readonly width: number;
  readonly height: number;
  readonly content: ContentWidget;

  constructor(width: number, height: number, content: ContentWidget) {
    if (DEV_MODE && (!isU16(width) || !isU16(height) || width === 0 || height === 0)) {
      throw new DotgridError(
        "DOTGRID_INVALID_DIMENSIONS",
        `ContentBox dimensions must be non-zero 16-bit integers, got ${String(width)}×${String(height)}`,
      );
    }
    this.width = width;
    this.height = height;
    this.content = content;
  }

  renderTo(ctx: RenderContext, position: Position): LayoutResult<void> {
    return ctx.renderContent(position, { w: this.width, h: this.height }, this.content);
  }
}
