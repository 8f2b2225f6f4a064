/**
 * packages/core/src/content/table.ts — Fixed-width column table.
 *
 * Layout: a bold header row of column names, then one row per data row.
 * Cells are clipped to their column width and to the region's right edge;
 * columns starting past the right edge and rows past the bottom are dropped.
 * Missing cells render as empty.
 */

import { STYLE_BOLD, STYLE_NONE, type StyleFlags } from "../grid/cell.js";
import type { PageBuilder } from "../grid/page.js";
import type { Region } from "../grid/region.js";
import { type ContentWidget, clipToWidth } from "./types.js";

export type ColumnDef = Readonly<{ name: string; width: number }>;

export class Table implements ContentWidget {
  readonly columns: readonly ColumnDef[];
  readonly rows: readonly (readonly string[])[];

  constructor(columns: readonly ColumnDef[], rows: readonly (readonly string[])[]) {
    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map((r) => Object.freeze([...r])));
  }

  private renderRow(
    page: PageBuilder,
    region: Region,
    y: number,
    cellText: (col: number) => string,
    style: StyleFlags,
  ): void {
    const right = region.x + region.width;
    let colX = region.x;
    for (let c = 0; c < this.columns.length; c++) {
      if (colX >= right) break;
      const col = this.columns[c];
      if (col === undefined) break;
      const maxChars = Math.min(col.width, right - colX);
      page.writeStr(colX, y, clipToWidth(cellText(c), maxChars), style);
      colX += Math.max(0, col.width);
    }
  }

  render(page: PageBuilder, region: Region): void {
    this.renderRow(page, region, region.y, (c) => this.columns[c]?.name ?? "", STYLE_BOLD);

    const bottom = region.y + region.height;
    for (let r = 0; r < this.rows.length; r++) {
      const y = region.y + 1 + r;
      if (y >= bottom) break;
      const row = this.rows[r] ?? [];
      this.renderRow(page, region, y, (c) => row[c] ?? "", STYLE_NONE);
    }
  }
}
