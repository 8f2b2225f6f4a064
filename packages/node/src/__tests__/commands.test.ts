import { assert, describe, test } from "@dotgrid/testkit";
import * as commands from "../commands.js";
import { Font } from "../commands.js";
import { PrinterError } from "../errors.js";

function list(bytes: Uint8Array): number[] {
  return Array.from(bytes);
}

function validation(code: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof PrinterError && err.code === "VALIDATION" && err.validation === code;
}

describe("text attribute commands", () => {
  test("bold, underline and double strike", () => {
    assert.deepEqual(list(commands.boldOn()), [0x1b, 0x45]);
    assert.deepEqual(list(commands.boldOff()), [0x1b, 0x46]);
    assert.deepEqual(list(commands.underlineOn()), [0x1b, 0x2d, 0x01]);
    assert.deepEqual(list(commands.underlineOff()), [0x1b, 0x2d, 0x00]);
    assert.deepEqual(list(commands.doubleStrikeOn()), [0x1b, 0x47]);
    assert.deepEqual(list(commands.doubleStrikeOff()), [0x1b, 0x48]);
  });

  test("pitch selection", () => {
    assert.deepEqual(list(commands.selectPitch(10)), [0x1b, 0x50]);
    assert.deepEqual(list(commands.selectPitch(12)), [0x1b, 0x4d]);
    assert.deepEqual(list(commands.selectPitch(15)), [0x1b, 0x67]);
  });

  test("font selection", () => {
    assert.deepEqual(list(commands.selectFont(Font.Roman)), [0x1b, 0x6b, 0]);
    assert.deepEqual(list(commands.selectFont(Font.Prestige)), [0x1b, 0x6b, 4]);
  });

  test("text replaces anything outside printable ASCII", () => {
    assert.deepEqual(list(commands.text("Ä\nb")), [0x3f, 0x3f, 0x62]);
    assert.deepEqual(list(commands.text("")), []);
  });

  test("reset", () => {
    assert.deepEqual(list(commands.reset()), [0x1b, 0x40]);
  });
});

describe("layout commands", () => {
  test("line spacing", () => {
    assert.deepEqual(list(commands.lineSpacing(24)), [0x1b, 0x33, 24]);
    assert.deepEqual(list(commands.defaultLineSpacing()), [0x1b, 0x32]);
  });

  test("margins", () => {
    assert.deepEqual(list(commands.leftMargin(5)), [0x1b, 0x6c, 5]);
    assert.deepEqual(list(commands.rightMargin(80)), [0x1b, 0x51, 80]);
  });

  test("page length in lines and dots", () => {
    assert.deepEqual(list(commands.pageLengthLines(66)), [0x1b, 0x43, 66]);
    assert.deepEqual(list(commands.pageLengthDots(3960)), [0x1b, 0x28, 0x43, 0x02, 0x00, 0x78, 0x0f]);
  });

  test("feeds and returns", () => {
    assert.deepEqual(list(commands.formFeed()), [0x0c]);
    assert.deepEqual(list(commands.lineFeed()), [0x0a]);
    assert.deepEqual(list(commands.carriageReturn()), [0x0d]);
    assert.deepEqual(list(commands.microFeedForward(10)), [0x1b, 0x4a, 10]);
    assert.deepEqual(list(commands.microFeedReverse(5)), [0x1b, 0x6a, 5]);
  });

  test("horizontal positioning", () => {
    assert.deepEqual(list(commands.moveAbsoluteX(120)), [0x1b, 0x24, 120, 0]);
    assert.deepEqual(list(commands.moveAbsoluteX(300)), [0x1b, 0x24, 0x2c, 0x01]);
    assert.deepEqual(list(commands.moveRelativeX(60)), [0x1b, 0x5c, 60, 0]);
    assert.deepEqual(list(commands.moveRelativeX(-60)), [0x1b, 0x5c, 0xc4, 0xff]);
  });
});

describe("command validation", () => {
  test("zero micro feed is MICRO_FEED_ZERO", () => {
    assert.throws(() => commands.microFeedForward(0), validation("MICRO_FEED_ZERO"));
    assert.throws(() => commands.microFeedReverse(0), validation("MICRO_FEED_ZERO"));
  });

  test("zero page length is INVALID_PAGE_LENGTH", () => {
    assert.throws(() => commands.pageLengthLines(0), validation("INVALID_PAGE_LENGTH"));
    assert.throws(() => commands.pageLengthDots(0), validation("INVALID_PAGE_LENGTH"));
  });

  test("out-of-range arguments are INVALID_COMMAND_ARG", () => {
    assert.throws(() => commands.lineSpacing(256), (err: unknown) => {
      return (
        err instanceof PrinterError &&
        err.validation === "INVALID_COMMAND_ARG" &&
        err.message === "Validation error: lineSpacing: dots must be an integer in [0, 255], got 256"
      );
    });
    assert.throws(() => commands.microFeedForward(256), validation("INVALID_COMMAND_ARG"));
    assert.throws(() => commands.leftMargin(-1), validation("INVALID_COMMAND_ARG"));
    assert.throws(() => commands.moveAbsoluteX(65536), validation("INVALID_COMMAND_ARG"));
    assert.throws(() => commands.moveRelativeX(-32769), validation("INVALID_COMMAND_ARG"));
    assert.throws(() => commands.pageLengthLines(1.5), validation("INVALID_COMMAND_ARG"));
  });
});
