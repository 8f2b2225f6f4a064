import { assert, describe, test } from "@dotgrid/testkit";
import { DotgridError } from "../../abi.js";
import { STYLE_NONE } from "../../grid/cell.js";
import { Page } from "../../grid/page.js";
import { Document } from "../document.js";

describe("DocumentBuilder", () => {
  test("pages keep insertion order", () => {
    const first = Page.builder().writeAt(0, 0, "1", STYLE_NONE).build();
    const second = Page.builder().writeAt(0, 0, "2", STYLE_NONE).build();
    const builder = Document.builder().addPage(first).addPage(second);
    assert.equal(builder.pageCount, 2);
    const doc = builder.build();
    assert.equal(doc.pageCount, 2);
    assert.equal(doc.pages[0], first);
    assert.equal(doc.pages[1], second);
  });

  test("build() consumes the builder", () => {
    const builder = Document.builder();
    builder.build();
    assert.throws(
      () => builder.addPage(Page.builder().build()),
      (err: unknown) => err instanceof DotgridError && err.code === "DOTGRID_INVALID_STATE",
    );
    assert.throws(() => builder.build(), DotgridError);
  });

  test("documents are frozen", () => {
    const doc = Document.builder().addPage(Page.builder().build()).build();
    assert.equal(Object.isFrozen(doc), true);
    assert.equal(Object.isFrozen(doc.pages), true);
  });

  test("the same page may appear more than once", () => {
    const page = Page.builder().build();
    const doc = Document.builder().addPage(page).addPage(page).build();
    const bytes = doc.render();
    assert.equal(bytes.length, 3 + 2 * (51 * 162 + 1));
  });
});
