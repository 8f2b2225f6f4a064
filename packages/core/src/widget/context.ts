/**
 * packages/core/src/widget/context.ts — Render pass state over a PageBuilder.
 *
 * Why: Widgets never touch the page directly during a render pass. The context
 * checks the start position of every write against the clip bounds and then
 * delegates to the builder.
 *
 * Two-tier overflow policy:
 *   - A start position outside the clip bounds is an OUT_OF_BOUNDS error
 *   - Characters running past the right page edge are clipped silently by the
 *     builder, since the physical page width is fixed
 */

import { PAGE_HEIGHT, PAGE_WIDTH } from "../abi.js";
import type { ContentWidget } from "../content/types.js";
import { STYLE_NONE, type StyleFlags } from "../grid/cell.js";
import type { PageBuilder } from "../grid/page.js";
import { Region } from "../grid/region.js";
import { type LayoutResult, OK_VOID, fail, outOfBounds } from "../layout/errors.js";
import type { Bounds, Position, Size } from "../layout/types.js";

const PAGE_CLIP: Bounds = Object.freeze({ x: 0, y: 0, w: PAGE_WIDTH, h: PAGE_HEIGHT });

export class RenderContext {
  private readonly page: PageBuilder;
  readonly clipBounds: Bounds = PAGE_CLIP;

  constructor(page: PageBuilder) {
    this.page = page;
  }

  private startInBounds(p: Position): boolean {
    const b = this.clipBounds;
    return (
      Number.isInteger(p.x) &&
      Number.isInteger(p.y) &&
      p.x >= b.x &&
      p.y >= b.y &&
      p.x < b.x + b.w &&
      p.y < b.y + b.h
    );
  }

  writeText(text: string, position: Position): LayoutResult<void> {
    return this.writeStyled(text, position, STYLE_NONE);
  }

  writeStyled(text: string, position: Position, style: StyleFlags): LayoutResult<void> {
    if (!this.startInBounds(position)) {
      return fail(outOfBounds(position, this.clipBounds));
    }
    this.page.writeStr(position.x, position.y, text, style);
    return OK_VOID;
  }

  /**
   * Draw a region-based content widget whose footprint starts at `position`.
   * The footprint is clipped to the clip bounds, the same way a text run is.
   */
  renderContent(position: Position, size: Size, widget: ContentWidget): LayoutResult<void> {
    if (!this.startInBounds(position)) {
      return fail(outOfBounds(position, this.clipBounds));
    }
    const b = this.clipBounds;
    const region = Region.create(
      position.x,
      position.y,
      Math.min(size.w, b.x + b.w - position.x),
      Math.min(size.h, b.y + b.h - position.y),
    );
    if (!region.ok) return region;
    this.page.renderWidget(region.value, widget);
    return OK_VOID;
  }
}
