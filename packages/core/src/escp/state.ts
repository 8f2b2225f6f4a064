/**
 * packages/core/src/escp/state.ts — Style state machine for the serializer.
 *
 * Why: The printer keeps bold and underline latched until told otherwise, so
 * the serializer tracks what is currently on and emits a code only when a flag
 * actually changes. Bold is always transitioned before underline, and reset()
 * turns bold off before underline, so the byte order is fixed.
 */

import { ESC_BOLD_OFF, ESC_BOLD_ON, ESC_UNDERLINE_OFF, ESC_UNDERLINE_ON } from "../abi.js";
import { type StyleFlags, isBold, isUnderline } from "../grid/cell.js";
import type { ByteWriter } from "./byteWriter.js";

export class EscpStyleState {
  private boldOn = false;
  private underlineOn = false;

  get bold(): boolean {
    return this.boldOn;
  }

  get underline(): boolean {
    return this.underlineOn;
  }

  transitionTo(target: StyleFlags, out: ByteWriter): void {
    const bold = isBold(target);
    if (bold !== this.boldOn) {
      out.pushAll(bold ? ESC_BOLD_ON : ESC_BOLD_OFF);
      this.boldOn = bold;
    }

    const underline = isUnderline(target);
    if (underline !== this.underlineOn) {
      out.pushAll(underline ? ESC_UNDERLINE_ON : ESC_UNDERLINE_OFF);
      this.underlineOn = underline;
    }
  }

  /** Turn off every active flag. */
  reset(out: ByteWriter): void {
    if (this.boldOn) {
      out.pushAll(ESC_BOLD_OFF);
      this.boldOn = false;
    }
    if (this.underlineOn) {
      out.pushAll(ESC_UNDERLINE_OFF);
      this.underlineOn = false;
    }
  }
}
