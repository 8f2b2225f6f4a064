/**
 * packages/core/src/content/paragraph.ts — Word-wrapped text.
 *
 * Wrapping rules:
 *   - Words are separated by any run of whitespace; line breaks in the input
 *     are treated like spaces
 *   - Words are packed greedily with one space between them
 *   - A word longer than the width is split into width-sized chunks, each on
 *     its own line
 *   - Lines beyond the region height are dropped
 */

import { STYLE_NONE, type StyleFlags } from "../grid/cell.js";
import type { PageBuilder } from "../grid/page.js";
import type { Region } from "../grid/region.js";
import type { ContentWidget } from "./types.js";

function codePoints(s: string): string[] {
  return Array.from(s);
}

export function wrapText(text: string, maxWidth: number): string[] {
  if (maxWidth <= 0) return [];

  const lines: string[] = [];
  let current = "";
  let currentLen = 0;

  for (const word of text.split(/\s+/)) {
    if (word.length === 0) continue;
    const chars = codePoints(word);

    if (chars.length > maxWidth) {
      if (currentLen > 0) {
        lines.push(current);
        current = "";
        currentLen = 0;
      }
      for (let i = 0; i < chars.length; i += maxWidth) {
        lines.push(chars.slice(i, i + maxWidth).join(""));
      }
      continue;
    }

    if (currentLen > 0 && currentLen + 1 + chars.length > maxWidth) {
      lines.push(current);
      current = "";
      currentLen = 0;
    }

    if (currentLen > 0) {
      current += " ";
      currentLen += 1;
    }
    current += word;
    currentLen += chars.length;
  }

  if (currentLen > 0) lines.push(current);
  return lines;
}

export class Paragraph implements ContentWidget {
  readonly text: string;
  readonly style: StyleFlags;

  constructor(text: string, style: StyleFlags = STYLE_NONE) {
    this.text = text;
    this.style = style;
  }

  withStyle(style: StyleFlags): Paragraph {
    return new Paragraph(this.text, style);
  }

  render(page: PageBuilder, region: Region): void {
    const lines = wrapText(this.text, region.width);
    const rows = Math.min(lines.length, region.height);
    for (let i = 0; i < rows; i++) {
      page.writeStr(region.x, region.y + i, lines[i] ?? "", this.style);
    }
  }
}
