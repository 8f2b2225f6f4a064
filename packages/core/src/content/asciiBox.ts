/**
 * packages/core/src/content/asciiBox.ts — Bordered box around another content widget.
 *
 * Layout: `+` corners, `-` top/bottom edges, `|` side edges. The title, when
 * present, is written into the top edge starting two cells in and clipped to
 * width - 4. Content renders inside a one-cell padding. Regions smaller than
 * 3×3 draw nothing.
 */

import { STYLE_NONE } from "../grid/cell.js";
import type { PageBuilder } from "../grid/page.js";
import type { Region } from "../grid/region.js";
import { type ContentWidget, clipToWidth } from "./types.js";

export type AsciiBoxOptions = Readonly<{ title?: string }>;

export class AsciiBox implements ContentWidget {
  readonly content: ContentWidget;
  readonly title: string | null;

  constructor(content: ContentWidget, opts: AsciiBoxOptions = {}) {
    this.content = content;
    this.title = opts.title ?? null;
  }

  withTitle(title: string): AsciiBox {
    return new AsciiBox(this.content, { title });
  }

  render(page: PageBuilder, region: Region): void {
    if (region.width < 3 || region.height < 3) return;

    const { x, y, width, height } = region;
    const right = x + width - 1;
    const bottom = y + height - 1;

    page.writeAt(x, y, "+", STYLE_NONE);
    page.writeAt(right, y, "+", STYLE_NONE);
    page.writeAt(x, bottom, "+", STYLE_NONE);
    page.writeAt(right, bottom, "+", STYLE_NONE);

    for (let cx = x + 1; cx < right; cx++) {
      page.writeAt(cx, y, "-", STYLE_NONE);
      page.writeAt(cx, bottom, "-", STYLE_NONE);
    }
    for (let cy = y + 1; cy < bottom; cy++) {
      page.writeAt(x, cy, "|", STYLE_NONE);
      page.writeAt(right, cy, "|", STYLE_NONE);
    }

    if (this.title !== null) {
      page.writeStr(x + 2, y, clipToWidth(this.title, width - 4), STYLE_NONE);
    }

    const inner = region.withPadding(1, 1, 1, 1);
    if (inner.ok) {
      this.content.render(page, inner.value);
    }
  }
}
