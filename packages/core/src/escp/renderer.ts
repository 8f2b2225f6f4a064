/**
 * packages/core/src/escp/renderer.ts — Document to ESC/P byte stream.
 *
 * Output layout:
 *   - ESC @, SI once at the start
 *   - per page, per row: each of the 160 cells as style transitions + one
 *     character byte, then CR LF, then any still-active style turned off
 *   - FF after every page, including the last
 *
 * The output is a pure function of the cell contents: same document, same
 * bytes. An empty document renders as the three init bytes.
 */

import { CR, ESC_RESET, FF, LF, PAGE_HEIGHT, PAGE_WIDTH, SI_CONDENSED } from "../abi.js";
import type { Page } from "../grid/page.js";
import { ByteWriter } from "./byteWriter.js";
import { EscpStyleState } from "./state.js";

/** Page bytes without any style codes: 51 × (160 + CR LF) + FF. */
const PLAIN_PAGE_BYTES = PAGE_HEIGHT * (PAGE_WIDTH + 2) + 1;

export type PageSource = Readonly<{ pages: readonly Page[] }>;

export function renderPage(page: Page, out: ByteWriter): void {
  const state = new EscpStyleState();
  for (let y = 0; y < PAGE_HEIGHT; y++) {
    for (let x = 0; x < PAGE_WIDTH; x++) {
      state.transitionTo(page.styleAt(x, y), out);
      out.push(page.characterAt(x, y));
    }
    out.push(CR);
    out.push(LF);
    state.reset(out);
  }
}

export function renderDocument(doc: PageSource): Uint8Array {
  const out = new ByteWriter(
    ESC_RESET.length + SI_CONDENSED.length + doc.pages.length * PLAIN_PAGE_BYTES,
  );
  out.pushAll(ESC_RESET);
  out.pushAll(SI_CONDENSED);

  for (const page of doc.pages) {
    renderPage(page, out);
    out.push(FF);
  }

  return out.bytes();
}
