/**
 * packages/core/src/grid/page.ts — Fixed 160×51 character grid.
 *
 * Why: A page is written through an exclusively owned PageBuilder and then
 * frozen into an immutable Page that any number of readers (the serializer,
 * previews, tests) can share.
 *
 * Invariants:
 *   - Writes outside the grid are silently dropped, never an error
 *   - Text is written one cell per code point and truncated at column 160
 *   - build() consumes the builder; further use throws DOTGRID_INVALID_STATE
 *   - A Page owns its cell buffers exclusively and exposes no mutators
 */

import { DotgridError, PAGE_HEIGHT, PAGE_WIDTH } from "../abi.js";
import type { ContentWidget } from "../content/types.js";
import type { LayoutResult } from "../layout/errors.js";
import { ORIGIN } from "../layout/types.js";
import { RenderContext } from "../widget/context.js";
import type { Widget } from "../widget/types.js";
import {
  type Cell,
  EMPTY_CELL,
  STYLE_NONE,
  type StyleFlags,
  createCell,
  normalizeCodePoint,
} from "./cell.js";
import type { Region } from "./region.js";

const CELL_COUNT = PAGE_WIDTH * PAGE_HEIGHT;
const STYLE_MASK = 0x03;

function inGrid(x: number, y: number): boolean {
  return (
    Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < PAGE_WIDTH && y < PAGE_HEIGHT
  );
}

export class Page {
  private readonly chars: Uint8Array;
  private readonly styles: Uint8Array;

  /** @internal Use `Page.builder()`; the page takes ownership of both buffers. */
  constructor(chars: Uint8Array, styles: Uint8Array) {
    this.chars = chars;
    this.styles = styles;
    Object.freeze(this);
  }

  static builder(): PageBuilder {
    return new PageBuilder();
  }

  readonly width = PAGE_WIDTH;
  readonly height = PAGE_HEIGHT;

  getCell(x: number, y: number): Cell | null {
    if (!inGrid(x, y)) return null;
    const i = y * PAGE_WIDTH + x;
    return { character: this.chars[i] ?? EMPTY_CELL.character, style: this.styles[i] ?? STYLE_NONE };
  }

  /** Character byte at (x, y); callers must stay inside the grid. */
  characterAt(x: number, y: number): number {
    return this.chars[y * PAGE_WIDTH + x] ?? EMPTY_CELL.character;
  }

  /** Style flags at (x, y); callers must stay inside the grid. */
  styleAt(x: number, y: number): StyleFlags {
    return this.styles[y * PAGE_WIDTH + x] ?? STYLE_NONE;
  }

  row(y: number): readonly Cell[] {
    const out: Cell[] = [];
    if (!Number.isInteger(y) || y < 0 || y >= PAGE_HEIGHT) return out;
    for (let x = 0; x < PAGE_WIDTH; x++) {
      out.push({ character: this.characterAt(x, y), style: this.styleAt(x, y) });
    }
    return out;
  }

  *rows(): IterableIterator<readonly Cell[]> {
    for (let y = 0; y < PAGE_HEIGHT; y++) {
      yield this.row(y);
    }
  }
}

export class PageBuilder {
  private chars: Uint8Array;
  private styles: Uint8Array;
  private consumed = false;

  constructor() {
    this.chars = new Uint8Array(CELL_COUNT).fill(EMPTY_CELL.character);
    this.styles = new Uint8Array(CELL_COUNT);
  }

  private assertActive(op: string): void {
    if (this.consumed) {
      throw new DotgridError(
        "DOTGRID_INVALID_STATE",
        `PageBuilder.${op}: builder was consumed by build(); start a new page with Page.builder()`,
      );
    }
  }

  private put(x: number, y: number, character: number, style: StyleFlags): void {
    const i = y * PAGE_WIDTH + x;
    this.chars[i] = character;
    this.styles[i] = style & STYLE_MASK;
  }

  writeAt(x: number, y: number, ch: string, style: StyleFlags): this {
    this.assertActive("writeAt");
    if (inGrid(x, y)) {
      const cell = createCell(ch, style);
      this.put(x, y, cell.character, cell.style);
    }
    return this;
  }

  writeStr(x: number, y: number, text: string, style: StyleFlags): this {
    this.assertActive("writeStr");
    if (!inGrid(x, y)) return this;
    let cx = x;
    for (const ch of text) {
      if (cx >= PAGE_WIDTH) break;
      this.put(cx, y, normalizeCodePoint(ch.codePointAt(0) ?? 0), style);
      cx++;
    }
    return this;
  }

  fillRegion(region: Region, ch: string, style: StyleFlags): this {
    this.assertActive("fillRegion");
    const cell = createCell(ch, style);
    for (let y = region.y; y < region.y + region.height; y++) {
      for (let x = region.x; x < region.x + region.width; x++) {
        this.put(x, y, cell.character, cell.style);
      }
    }
    return this;
  }

  /** Draw a region-based content widget. Content widgets never fail. */
  renderWidget(region: Region, widget: ContentWidget): this {
    this.assertActive("renderWidget");
    widget.render(this, region);
    return this;
  }

  /**
   * Render a composed widget tree rooted at (0, 0). Fail-fast: the first error
   * stops the pass, leaving cells written so far in place.
   */
  render(root: Widget): LayoutResult<void> {
    this.assertActive("render");
    const ctx = new RenderContext(this);
    return root.renderTo(ctx, ORIGIN);
  }

  build(): Page {
    this.assertActive("build");
    this.consumed = true;
    const page = new Page(this.chars, this.styles);
    this.chars = new Uint8Array(0);
    this.styles = new Uint8Array(0);
    return page;
  }
}
