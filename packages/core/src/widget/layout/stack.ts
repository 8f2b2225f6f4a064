/**
 * packages/core/src/widget/layout/stack.ts — Full-size layer allocator.
 *
 * Why: Stack keeps no cursor. Every area() call returns an independent
 * full-size container at (0, 0); if the caller adds two layers to the same
 * parent, the parent's usual overlap rules decide.
 */

import { Container } from "../container.js";
import type { Allocation } from "./types.js";

export class Stack {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  area(): Allocation {
    return { container: new Container(this.width, this.height), position: { x: 0, y: 0 } };
  }
}
