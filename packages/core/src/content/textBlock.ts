import { STYLE_NONE } from "../grid/cell.js";
import type { PageBuilder } from "../grid/page.js";
import type { Region } from "../grid/region.js";
import { type ContentWidget, clipToWidth } from "./types.js";

/** Multi-line text without wrapping; lines and rows beyond the region are dropped. */
export class TextBlock implements ContentWidget {
  readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    this.lines = Object.freeze([...lines]);
  }

  /** Split on `\n` or `\r\n`; a single trailing line break does not add an empty line. */
  static fromText(text: string): TextBlock {
    const lines = text.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
    return new TextBlock(lines);
  }

  render(page: PageBuilder, region: Region): void {
    const rows = Math.min(this.lines.length, region.height);
    for (let i = 0; i < rows; i++) {
      const line = this.lines[i] ?? "";
      page.writeStr(region.x, region.y + i, clipToWidth(line, region.width), STYLE_NONE);
    }
  }
}
