/**
 * packages/core/src/content/types.ts — Region-based content widget contract.
 *
 * Why: Content widgets are plain per-cell writers. They carry no structural
 * invariants beyond staying inside the region they are given, and they never
 * fail: anything that does not fit is truncated.
 */

import type { PageBuilder } from "../grid/page.js";
import type { Region } from "../grid/region.js";

export interface ContentWidget {
  render(page: PageBuilder, region: Region): void;
}

/** First `width` code points of `text`. */
export function clipToWidth(text: string, width: number): string {
  if (width <= 0) return "";
  let out = "";
  let n = 0;
  for (const ch of text) {
    if (n >= width) break;
    out += ch;
    n++;
  }
  return out;
}
