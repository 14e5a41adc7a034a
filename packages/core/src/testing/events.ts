/**
 * packages/core/src/testing/events.ts — Fluent builder for input batches.
 *
 * Each `frame()` call closes the current batch; the test surface hands one
 * batch out per poll.
 */

import type { InputEvent } from "../surface.js";

export class TestEventBuilder {
  private readonly batches: (readonly InputEvent[])[] = [];
  private current: InputEvent[] = [];

  key(key: string): this {
    this.current.push({ kind: "key", key });
    return this;
  }

  click(x: number, y: number, button = 0): this {
    this.current.push({ kind: "mouse", button, x, y });
    return this;
  }

  quit(): this {
    this.current.push({ kind: "quit" });
    return this;
  }

  /** Close the current batch. An empty batch is an idle tick. */
  frame(): this {
    this.batches.push(Object.freeze(this.current));
    this.current = [];
    return this;
  }

  build(): readonly (readonly InputEvent[])[] {
    const out = [...this.batches];
    if (this.current.length > 0) out.push(Object.freeze(this.current.slice()));
    return Object.freeze(out);
  }
}
