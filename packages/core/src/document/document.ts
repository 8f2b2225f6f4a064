/**
 * packages/core/src/document/document.ts — Ordered, immutable sequence of pages.
 *
 * Why: A document is the unit the serializer consumes. Pages are appended
 * through an exclusive builder, then frozen; render() is the single output
 * entry point and is total.
 */

import { DotgridError } from "../abi.js";
import { renderDocument } from "../escp/renderer.js";
import type { Page } from "../grid/page.js";

export class Document {
  readonly pages: readonly Page[];

  /** @internal Use `Document.builder()`. */
  constructor(pages: readonly Page[]) {
    this.pages = Object.freeze([...pages]);
    Object.freeze(this);
  }

  static builder(): DocumentBuilder {
    return new DocumentBuilder();
  }

  get pageCount(): number {
    return this.pages.length;
  }

  /** Serialize to ESC/P bytes. Always starts with ESC @ SI; one FF per page. */
  render(): Uint8Array {
    return renderDocument(this);
  }
}

export class DocumentBuilder {
  private readonly pages: Page[] = [];
  private consumed = false;

  private assertActive(op: string): void {
    if (this.consumed) {
      throw new DotgridError(
        "DOTGRID_INVALID_STATE",
        `DocumentBuilder.${op}: builder was consumed by build()`,
      );
    }
  }

  get pageCount(): number {
    return this.pages.length;
  }

  addPage(page: Page): this {
    this.assertActive("addPage");
    this.pages.push(page);
    return this;
  }

  build(): Document {
    this.assertActive("build");
    this.consumed = true;
    return new Document(this.pages);
  }
}
