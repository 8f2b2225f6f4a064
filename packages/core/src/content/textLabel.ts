import { STYLE_NONE, type StyleFlags } from "../grid/cell.js";
import type { PageBuilder } from "../grid/page.js";
import type { Region } from "../grid/region.js";
import { type ContentWidget, clipToWidth } from "./types.js";

/** Single line of text on the first row of its region, truncated to the region width. */
export class TextLabel implements ContentWidget {
  readonly text: string;
  readonly style: StyleFlags;

  constructor(text: string, style: StyleFlags = STYLE_NONE) {
    this.text = text;
    this.style = style;
  }

  withStyle(style: StyleFlags): TextLabel {
    return new TextLabel(this.text, style);
  }

  render(page: PageBuilder, region: Region): void {
    page.writeStr(region.x, region.y, clipToWidth(this.text, region.width), this.style);
  }
}
