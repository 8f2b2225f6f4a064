import { STYLE_NONE } from "../grid/cell.js";
import type { PageBuilder } from "../grid/page.js";
import type { Region } from "../grid/region.js";
import { type ContentWidget, clipToWidth } from "./types.js";

export type KeyValueEntry = readonly [key: string, value: string];
export type KeyValueListOptions = Readonly<{ separator?: string }>;

/** One `key{separator}value` line per entry, truncated to the region. */
export class KeyValueList implements ContentWidget {
  readonly entries: readonly KeyValueEntry[];
  readonly separator: string;

  constructor(entries: readonly KeyValueEntry[], opts: KeyValueListOptions = {}) {
    this.entries = Object.freeze([...entries]);
    this.separator = opts.separator ?? ": ";
  }

  withSeparator(separator: string): KeyValueList {
    return new KeyValueList(this.entries, { separator });
  }

  render(page: PageBuilder, region: Region): void {
    const rows = Math.min(this.entries.length, region.height);
    for (let i = 0; i < rows; i++) {
      const entry = this.entries[i];
      if (entry === undefined) continue;
      const line = `${entry[0]}${this.separator}${entry[1]}`;
      page.writeStr(region.x, region.y + i, clipToWidth(line, region.width), STYLE_NONE);
    }
  }
}
