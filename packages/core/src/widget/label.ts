/**
 * packages/core/src/widget/label.ts — Single-line styled text leaf.
 *
 * Why: Labels are the only nodes that write cells. Text is validated once,
 * when it is attached, so rendering never has to decide what to do with text
 * that does not fit.
 *
 * Labels are immutable values: addText/bold/underline each return a new
 * label. Styling is order-independent and combinable.
 */

import { DEV_MODE, DotgridError } from "../abi.js";
import { STYLE_NONE, type StyleFlags, withBold, withUnderline } from "../grid/cell.js";
import { type LayoutResult, OK_VOID, fail, ok, textExceedsWidth } from "../layout/errors.js";
import { type Position, isU16 } from "../layout/types.js";
import type { RenderContext } from "./context.js";
import type { Widget } from "./types.js";

const utf8 = new TextEncoder();
const LINE_BREAK = /[\r\n]/;

export function utf8ByteLength(text: string): number {
  return utf8.encode(text).byteLength;
}

export class Label implements Widget {
  readonly width: number;
  readonly height = 1;
  private textValue: string | null = null;
  private styleValue: StyleFlags = STYLE_NONE;

  constructor(width: number) {
    if (DEV_MODE && (!isU16(width) || width === 0)) {
      throw new DotgridError(
        "DOTGRID_INVALID_DIMENSIONS",
        `Label width must be a non-zero 16-bit integer, got ${String(width)}`,
      );
    }
    this.width = width;
  }

  get text(): string | null {
    return this.textValue;
  }

  get style(): StyleFlags {
    return this.styleValue;
  }

  private derive(text: string | null, style: StyleFlags): Label {
    const next = new Label(this.width);
    next.textValue = text;
    next.styleValue = style;
    return next;
  }

  /**
   * Attach text. Fails with TEXT_EXCEEDS_WIDTH when the UTF-8 byte length is
   * larger than the width, or when the text contains a line break.
   */
  addText(text: string): LayoutResult<Label> {
    const len = utf8ByteLength(text);
    if (len > this.width) {
      return fail(textExceedsWidth(len, this.width, false));
    }
    if (LINE_BREAK.test(text)) {
      return fail(textExceedsWidth(len, this.width, true));
    }
    return ok(this.derive(text, this.styleValue));
  }

  bold(): Label {
    return this.derive(this.textValue, withBold(this.styleValue));
  }

  underline(): Label {
    return this.derive(this.textValue, withUnderline(this.styleValue));
  }

  renderTo(ctx: RenderContext, position: Position): LayoutResult<void> {
    if (this.textValue === null) return OK_VOID;
    return ctx.writeStyled(this.textValue, position, this.styleValue);
  }
}
