import { assert, describe, test } from "@dotgrid/testkit";
import type { LayoutResult } from "../../layout/errors.js";
import { Region } from "../region.js";

function must<T>(res: LayoutResult<T>): T {
  if (!res.ok) {
    assert.fail(`unexpected failure: ${res.error.code}: ${res.error.detail}`);
  }
  return res.value;
}

function errCode<T>(res: LayoutResult<T>): string {
  return res.ok ? "OK" : res.error.code;
}

describe("Region.create", () => {
  test("accepts regions inside the page", () => {
    const r = must(Region.create(10, 5, 20, 3));
    assert.deepEqual([r.x, r.y, r.width, r.height], [10, 5, 20, 3]);
    must(Region.create(0, 0, 160, 51));
    must(Region.create(159, 50, 1, 1));
  });

  test("zero width or height is INVALID_DIMENSIONS", () => {
    const res = Region.create(0, 0, 0, 5);
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.deepEqual(res.error, {
      code: "INVALID_DIMENSIONS",
      width: 0,
      height: 5,
      detail: "Invalid region dimensions: 0×5 (must be non-zero and within page bounds)",
    });
    assert.equal(errCode(Region.create(0, 0, 5, 0)), "INVALID_DIMENSIONS");
  });

  test("exceeding the page is REGION_OUT_OF_BOUNDS", () => {
    assert.equal(errCode(Region.create(150, 0, 11, 1)), "REGION_OUT_OF_BOUNDS");
    assert.equal(errCode(Region.create(0, 50, 1, 2)), "REGION_OUT_OF_BOUNDS");
    assert.equal(errCode(Region.create(160, 0, 1, 1)), "REGION_OUT_OF_BOUNDS");
  });

  test("16-bit overflow is REGION_OUT_OF_BOUNDS", () => {
    const res = Region.create(65535, 0, 1, 1);
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.error.code, "REGION_OUT_OF_BOUNDS");
    if (res.error.code !== "REGION_OUT_OF_BOUNDS") return;
    assert.equal(res.error.x, 65535);
  });

  test("negative or fractional inputs are INVALID_COORDINATE", () => {
    assert.equal(errCode(Region.create(-1, 0, 1, 1)), "INVALID_COORDINATE");
    assert.equal(errCode(Region.create(0, 0, 1.5, 1)), "INVALID_COORDINATE");
  });

  test("fullPage covers 160×51", () => {
    const r = Region.fullPage();
    assert.deepEqual([r.x, r.y, r.width, r.height], [0, 0, 160, 51]);
    assert.equal(Region.fullPage(), r);
  });

  test("regions are frozen", () => {
    assert.equal(Object.isFrozen(must(Region.create(1, 1, 1, 1))), true);
  });
});

describe("Region splits", () => {
  test("splitVertical yields exact top and bottom halves", () => {
    const parent = must(Region.create(4, 2, 30, 20));
    const { top, bottom } = must(parent.splitVertical(8));
    assert.deepEqual([top.x, top.y, top.width, top.height], [4, 2, 30, 8]);
    assert.deepEqual([bottom.x, bottom.y, bottom.width, bottom.height], [4, 10, 30, 12]);
  });

  test("splitHorizontal yields exact left and right halves", () => {
    const parent = must(Region.create(4, 2, 30, 20));
    const { left, right } = must(parent.splitHorizontal(10));
    assert.deepEqual([left.x, left.y, left.width, left.height], [4, 2, 10, 20]);
    assert.deepEqual([right.x, right.y, right.width, right.height], [14, 2, 20, 20]);
  });

  test("split larger than the parent is INVALID_SPLIT", () => {
    const parent = must(Region.create(0, 0, 10, 10));
    const res = parent.splitVertical(11);
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.deepEqual(res.error, {
      code: "INVALID_SPLIT",
      parentSize: 10,
      splitSize: 11,
      detail: "Invalid region split: split size 11 exceeds parent size 10",
    });
    assert.equal(errCode(parent.splitHorizontal(11)), "INVALID_SPLIT");
  });

  test("splits leaving an empty half are INVALID_DIMENSIONS", () => {
    const parent = must(Region.create(0, 0, 10, 10));
    assert.equal(errCode(parent.splitVertical(0)), "INVALID_DIMENSIONS");
    assert.equal(errCode(parent.splitVertical(10)), "INVALID_DIMENSIONS");
    assert.equal(errCode(parent.splitHorizontal(0)), "INVALID_DIMENSIONS");
    assert.equal(errCode(parent.splitHorizontal(10)), "INVALID_DIMENSIONS");
  });
});

describe("Region.withPadding", () => {
  test("shrinks symmetrically per axis", () => {
    const r = must(must(Region.create(10, 10, 20, 10)).withPadding(1, 2, 3, 4));
    assert.deepEqual([r.x, r.y, r.width, r.height], [14, 11, 14, 6]);
  });

  test("padding equal to the axis size fails", () => {
    const parent = must(Region.create(0, 0, 10, 4));
    const res = parent.withPadding(2, 0, 2, 0);
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.error.code, "INVALID_DIMENSIONS");
    if (res.error.code !== "INVALID_DIMENSIONS") return;
    assert.equal(res.error.width, 10);
    assert.equal(res.error.height, 0);
  });

  test("padding larger than the axis size fails", () => {
    const parent = must(Region.create(0, 0, 10, 4));
    assert.equal(errCode(parent.withPadding(0, 6, 0, 6)), "INVALID_DIMENSIONS");
  });

  test("contains uses half-open bounds", () => {
    const r = must(Region.create(2, 3, 4, 5));
    assert.equal(r.contains(2, 3), true);
    assert.equal(r.contains(5, 7), true);
    assert.equal(r.contains(6, 3), false);
    assert.equal(r.contains(2, 8), false);
  });
});
