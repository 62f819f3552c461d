/**
 * Test utilities for shx-stroke-font
 */

import type { PathSink, ShxFont } from "#src/fontbox/shx/types";

export { hexToBytes } from "#src/helpers/buffer";

/**
 * Create a Uint8Array from a string (for creating test data).
 *
 * @param str - The ASCII string to convert
 * @returns Uint8Array of the string's bytes
 */
export function stringToBytes(str: string) {
  return new Uint8Array(str.split("").map(c => c.charCodeAt(0)));
}

/**
 * Build an in-memory font without going through a container.
 *
 * @param glyphs - Glyph programs by glyph number
 * @param overrides - Any other font fields
 */
export function makeFont(
  glyphs: Record<number, number[]>,
  overrides: Partial<ShxFont> = {},
): ShxFont {
  return {
    format: "AutoCAD-86",
    variant: "shapes",
    version: "1.0",
    name: "test",
    above: 10,
    below: 2,
    modes: 0,
    encoding: null,
    embeddable: null,
    firstCode: null,
    lastCode: null,
    ranges: [],
    glyphs: new Map(
      Object.entries(glyphs).map(([index, program]): [number, Uint8Array] => [
        Number(index),
        Uint8Array.from(program),
      ]),
    ),
    aliases: new Map(),
    ...overrides,
  };
}

/**
 * One call received by a RecordingSink.
 */
export type SinkCall =
  | { op: "newPath" }
  | { op: "move"; x: number; y: number }
  | { op: "line"; x0: number; y0: number; x1: number; y1: number }
  | { op: "arc"; x0: number; y0: number; cx: number; cy: number; x1: number; y1: number }
  | { op: "characterEnd" };

/**
 * PathSink that records every call in order.
 *
 * @example
 * ```ts
 * const sink = new RecordingSink();
 * renderText(font, sink, "A");
 * expect(sink.count("line")).toBe(1);
 * ```
 */
export class RecordingSink implements PathSink {
  readonly calls: SinkCall[] = [];

  newPath() {
    this.calls.push({ op: "newPath" });
  }

  move(x: number, y: number) {
    this.calls.push({ op: "move", x, y });
  }

  line(x0: number, y0: number, x1: number, y1: number) {
    this.calls.push({ op: "line", x0, y0, x1, y1 });
  }

  arc(x0: number, y0: number, cx: number, cy: number, x1: number, y1: number) {
    this.calls.push({ op: "arc", x0, y0, cx, cy, x1, y1 });
  }

  characterEnd() {
    this.calls.push({ op: "characterEnd" });
  }

  /** Number of calls of one kind */
  count(op: SinkCall["op"]) {
    return this.calls.filter(call => call.op === op).length;
  }

  /** Calls of one kind, in order */
  ofKind<K extends SinkCall["op"]>(op: K): Extract<SinkCall, { op: K }>[] {
    return this.calls.filter((call): call is Extract<SinkCall, { op: K }> => call.op === op);
  }
}
