import { assert, describe, test } from "@dotgrid/testkit";
import { STYLE_BOLD, STYLE_NONE, STYLE_UNDERLINE } from "../../grid/cell.js";
import { Page } from "../../grid/page.js";
import { Region } from "../../grid/region.js";
import { pageToLines } from "../../testing/preview.js";
import { AsciiBox } from "../asciiBox.js";
import { KeyValueList } from "../keyValueList.js";
import { Paragraph, wrapText } from "../paragraph.js";
import { Table } from "../table.js";
import { TextBlock } from "../textBlock.js";
import { TextLabel } from "../textLabel.js";
import { type ContentWidget, clipToWidth } from "../types.js";

function region(x: number, y: number, w: number, h: number): Region {
  const res = Region.create(x, y, w, h);
  if (!res.ok) assert.fail(res.error.detail);
  return res.value;
}

function draw(widget: ContentWidget, r: Region): Page {
  return Page.builder().renderWidget(r, widget).build();
}

function preview(page: Page, rows: number): string[] {
  return pageToLines(page, { height: rows });
}

describe("clipToWidth", () => {
  test("keeps the first code points", () => {
    assert.equal(clipToWidth("abcdef", 3), "abc");
    assert.equal(clipToWidth("ab", 5), "ab");
    assert.equal(clipToWidth("a😀b", 2), "a😀");
    assert.equal(clipToWidth("abc", 0), "");
  });
});

describe("TextLabel", () => {
  test("writes one row truncated to the region", () => {
    const page = draw(new TextLabel("Hello, world", STYLE_BOLD), region(1, 0, 5, 2));
    assert.deepEqual(preview(page, 2), [" Hello", ""]);
    assert.equal(page.styleAt(5, 0), STYLE_BOLD);
    assert.equal(page.styleAt(6, 0), STYLE_NONE);
  });

  test("withStyle returns a restyled copy", () => {
    const label = new TextLabel("x");
    assert.equal(label.withStyle(STYLE_UNDERLINE).style, STYLE_UNDERLINE);
    assert.equal(label.style, STYLE_NONE);
  });
});

describe("TextBlock", () => {
  test("fromText splits lines and drops one trailing break", () => {
    assert.deepEqual(TextBlock.fromText("a\r\nb\n").lines, ["a", "b"]);
    assert.deepEqual(TextBlock.fromText("a\n\n").lines, ["a", ""]);
  });

  test("clips lines to width and rows to height", () => {
    const block = new TextBlock(["first line", "second", "third"]);
    assert.deepEqual(preview(draw(block, region(0, 0, 5, 2)), 3), ["first", "secon", ""]);
  });
});

describe("Paragraph", () => {
  test("wrapText packs words greedily", () => {
    assert.deepEqual(wrapText("the quick brown fox jumps", 10), ["the quick", "brown fox", "jumps"]);
  });

  test("wrapText collapses whitespace and line breaks", () => {
    assert.deepEqual(wrapText("  a\n\nb   c ", 10), ["a b c"]);
  });

  test("wrapText chunks words longer than the width", () => {
    assert.deepEqual(wrapText("ab abcdefghij c", 4), ["ab", "abcd", "efgh", "ij", "c"]);
  });

  test("wrapText with no room yields no lines", () => {
    assert.deepEqual(wrapText("abc", 0), []);
    assert.deepEqual(wrapText("", 5), []);
  });

  test("renders wrapped lines until the region is full", () => {
    const para = new Paragraph("one two three four five", STYLE_UNDERLINE);
    const page = draw(para, region(2, 1, 9, 2));
    assert.deepEqual(preview(page, 4), ["", "  one two", "  three", ""]);
    assert.equal(page.styleAt(2, 2), STYLE_UNDERLINE);
  });
});

describe("AsciiBox", () => {
  test("draws a border around its content", () => {
    const box = new AsciiBox(new TextLabel("inside"));
    assert.deepEqual(preview(draw(box, region(0, 0, 10, 3)), 3), ["+--------+", "|inside  |", "+--------+"]);
  });

  test("writes the title into the top edge", () => {
    const box = new AsciiBox(new TextBlock([]), { title: "Summary" });
    assert.deepEqual(preview(draw(box, region(0, 0, 10, 3)), 1), ["+-Summar-+"]);
    assert.equal(box.withTitle("T").title, "T");
  });

  test("regions smaller than 3×3 draw nothing", () => {
    const page = draw(new AsciiBox(new TextLabel("x")), region(0, 0, 2, 5));
    assert.deepEqual(preview(page, 5), ["", "", "", "", ""]);
  });

  test("a 3×3 box leaves a single inner cell", () => {
    const page = draw(new AsciiBox(new TextLabel("xyz")), region(0, 0, 3, 3));
    assert.deepEqual(preview(page, 3), ["+-+", "|x|", "+-+"]);
  });
});

describe("KeyValueList", () => {
  test("renders one entry per row", () => {
    const list = new KeyValueList([
      ["Name", "Ada"],
      ["Role", "Engineer"],
      ["Team", "Print"],
    ]);
    assert.deepEqual(preview(draw(list, region(0, 0, 12, 2)), 3), ["Name: Ada", "Role: Engine", ""]);
  });

  test("uses a custom separator", () => {
    const list = new KeyValueList([["k", "v"]]).withSeparator(" = ");
    assert.deepEqual(preview(draw(list, region(0, 0, 10, 1)), 1), ["k = v"]);
  });
});

describe("Table", () => {
  test("renders a bold header and clipped cells", () => {
    const table = new Table(
      [
        { name: "Item", width: 6 },
        { name: "Qty", width: 4 },
      ],
      [
        ["Widget", "12"],
        ["Gadgetron", "3"],
        ["Sprocket"],
      ],
    );
    const page = draw(table, region(0, 0, 10, 3));
    assert.deepEqual(preview(page, 4), ["Item  Qty", "Widget12", "Gadget3", ""]);
    assert.equal(page.styleAt(0, 0), STYLE_BOLD);
    assert.equal(page.styleAt(6, 0), STYLE_BOLD);
    assert.equal(page.styleAt(0, 1), STYLE_NONE);
  });

  test("columns past the region edge are dropped", () => {
    const table = new Table(
      [
        { name: "A", width: 3 },
        { name: "BBBB", width: 4 },
        { name: "C", width: 2 },
      ],
      [],
    );
    assert.deepEqual(preview(draw(table, region(0, 0, 5, 1)), 1), ["A  BB"]);
  });
});
