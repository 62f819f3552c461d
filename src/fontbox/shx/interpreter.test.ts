import { describe, expect, it } from "vitest";
import { makeFont, RecordingSink } from "#src/test-utils";
import { isShxFontError, type ShxFontErrorCode } from "./errors";
import {
  beginGlyph,
  createInterpreterState,
  executeGlyph,
  GlyphInterpreter,
  type TraceEvent,
} from "./interpreter";
import type { ShxFont } from "./types";

interface RunOptions {
  font?: ShxFont;
  scale?: number;
  horizontal?: boolean;
  maxSubshapeDepth?: number;
  maxSubshapeCalls?: number;
}

function run(program: number[], options: RunOptions = {}) {
  const sink = new RecordingSink();
  const state = createInterpreterState({
    scale: options.scale ?? 1,
    horizontal: options.horizontal,
  });

  executeGlyph(options.font ?? makeFont({}), Uint8Array.from(program), state, sink, {
    maxSubshapeDepth: options.maxSubshapeDepth,
    maxSubshapeCalls: options.maxSubshapeCalls,
  });

  return { sink, state };
}

function expectFault(fn: () => unknown, code: ShxFontErrorCode): void {
  try {
    fn();
  } catch (error) {
    expect(isShxFontError(error, code)).toBe(true);
    return;
  }

  expect.fail(`expected ${code}`);
}

const dualMode = makeFont({}, { modes: 2 });

describe("GlyphInterpreter", () => {
  describe("vector moves", () => {
    it("draws length times the direction vector times scale", () => {
      const { sink, state } = run([0x14], { scale: 2 });

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 0, y1: 2 }]);
      expect(state.x).toBe(0);
      expect(state.y).toBe(2);
    });

    it("uses half steps for odd directions", () => {
      const { sink } = run([0x21]);

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 2, y1: 1 }]);
    });

    it("chains segments from the end of the previous one", () => {
      const { sink } = run([0x10, 0x14]);

      expect(sink.ofKind("line")).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 1, y1: 0 },
        { op: "line", x0: 1, y0: 0, x1: 1, y1: 1 },
      ]);
    });
  });

  describe("pen", () => {
    it("moves instead of drawing while the pen is up", () => {
      const { sink } = run([0x02, 0x10, 0x01, 0x10]);

      expect(sink.calls).toEqual([
        { op: "move", x: 1, y: 0 },
        { op: "line", x0: 1, y0: 0, x1: 2, y1: 0 },
      ]);
    });

    it("does not emit anything for pen down itself", () => {
      const { sink } = run([0x01]);

      expect(sink.calls).toEqual([]);
    });
  });

  describe("end of shape", () => {
    it("skips to the next zero byte and starts a new path", () => {
      const { sink } = run([0x10, 0x00, 0x20, 0x00, 0x10]);

      expect(sink.calls).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 1, y1: 0 },
        { op: "newPath" },
        { op: "line", x0: 1, y0: 0, x1: 2, y1: 0 },
      ]);
    });

    it("stops quietly at the end of the program", () => {
      const { sink } = run([0x10, 0x00]);

      expect(sink.count("newPath")).toBe(1);
    });
  });

  describe("scale", () => {
    it("divides and multiplies the vector scale", () => {
      const { sink } = run([0x03, 2, 0x14, 0x04, 2, 0x14], { scale: 4 });

      expect(sink.ofKind("line")).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 0, y1: 2 },
        { op: "line", x0: 0, y0: 2, x1: 0, y1: 6 },
      ]);
    });

    it("rejects a zero divisor", () => {
      expectFault(() => run([0x03, 0x00]), "DIVIDE_BY_ZERO");
    });

    it("rejects a zero multiplier", () => {
      expectFault(() => run([0x04, 0x00]), "DIVIDE_BY_ZERO");
    });
  });

  describe("position stack", () => {
    it("restores a pushed position with a move", () => {
      const { sink, state } = run([0x05, 0x10, 0x06]);

      expect(sink.calls).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 1, y1: 0 },
        { op: "move", x: 0, y: 0 },
      ]);
      expect(state.x).toBe(0);
    });

    it("continues drawing from the restored position", () => {
      const { sink } = run([0x05, 0x10, 0x06, 0x14]);

      expect(sink.ofKind("line")[1]).toEqual({ op: "line", x0: 0, y0: 0, x1: 0, y1: 1 });
    });

    it("holds three positions", () => {
      const { state } = run([0x05, 0x05, 0x05]);

      expect(state.stack).toHaveLength(3);
    });

    it("overflows on the fourth push", () => {
      expectFault(() => run([0x05, 0x05, 0x05, 0x05]), "STACK_OVERFLOW");
    });

    it("underflows on pop from an empty stack", () => {
      expectFault(() => run([0x06]), "STACK_UNDERFLOW");
    });
  });

  describe("displacements", () => {
    it("reads signed dx and dy", () => {
      const { sink } = run([0x08, 3, 0xfe]);

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 3, y1: -2 }]);
    });

    it("reads pairs until (0, 0) and resumes after the terminator", () => {
      const { sink } = run([0x09, 1, 1, 2, 0, 0, 0, 0x10]);

      expect(sink.ofKind("line")).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 1, y1: 1 },
        { op: "line", x0: 1, y0: 1, x1: 3, y1: 1 },
        { op: "line", x0: 3, y0: 1, x1: 4, y1: 1 },
      ]);
    });

    it("fails when operands run out", () => {
      expectFault(() => run([0x08, 5]), "EMPTY_STREAM");
    });
  });

  describe("octant arcs", () => {
    it("draws a full circle for a zero span", () => {
      const { sink, state } = run([0x0a, 1, 0x00]);
      const [arc] = sink.ofKind("arc");

      expect(arc.x0).toBe(0);
      expect(arc.y0).toBe(0);
      expect(arc.cx).toBeCloseTo(-2);
      expect(arc.cy).toBeCloseTo(0);
      expect(arc.x1).toBeCloseTo(0);
      expect(arc.y1).toBeCloseTo(0);
      expect(state.x).toBeCloseTo(0);
    });

    it("draws a quarter circle around a centre behind the pen", () => {
      const { sink } = run([0x0a, 10, 0x02]);
      const [arc] = sink.ofKind("arc");

      expect(arc.cx).toBeCloseTo(-2.9289, 4);
      expect(arc.cy).toBeCloseTo(7.0711, 4);
      expect(arc.x1).toBeCloseTo(-10);
      expect(arc.y1).toBeCloseTo(10);
    });

    it("negates the start octant when bit 7 is set", () => {
      const { sink } = run([0x0a, 2, 0x92]);
      const [arc] = sink.ofKind("arc");

      expect(arc.cx).toBeCloseTo(2 - Math.SQRT2);
      expect(arc.cy).toBeCloseTo(Math.SQRT2);
      expect(arc.x1).toBeCloseTo(0);
      expect(arc.y1).toBeCloseTo(2 * Math.SQRT2);
    });

    it("scales the radius", () => {
      const { sink } = run([0x0a, 5, 0x02], { scale: 2 });

      expect(sink.ofKind("arc")[0].x1).toBeCloseTo(-10);
    });

    it("moves without drawing while the pen is up", () => {
      const { sink } = run([0x02, 0x0a, 10, 0x02]);

      expect(sink.count("arc")).toBe(0);
      expect(sink.ofKind("move")[0].x).toBeCloseTo(-10);
      expect(sink.ofKind("move")[0].y).toBeCloseTo(10);
    });
  });

  describe("fractional arcs", () => {
    it("matches an octant arc when both offsets are zero", () => {
      const { sink } = run([0x0b, 0, 0, 0, 10, 0x02]);
      const [arc] = sink.ofKind("arc");

      expect(arc.x1).toBeCloseTo(-10);
      expect(arc.y1).toBeCloseTo(10);
    });

    it("starts part way into the first octant", () => {
      const { sink } = run([0x0b, 128, 0, 0, 10, 0x02]);
      const [arc] = sink.ofKind("arc");

      // start angle π/8, end angle π/2
      expect(arc.x1).toBeCloseTo(-10 * Math.cos(Math.PI / 8));
      expect(arc.y1).toBeCloseTo(10 - 10 * Math.sin(Math.PI / 8));
    });

    it("reads a 16-bit radius, high byte first", () => {
      const { sink } = run([0x0b, 0, 0, 1, 0, 0x04]);

      // radius 256, half circle: centre (-256, 0), end (-512, 0)
      expect(sink.ofKind("arc")[0].x1).toBeCloseTo(-512);
    });
  });

  describe("bulge arcs", () => {
    it("draws a semicircle to the right of travel for +127", () => {
      const { sink } = run([0x0c, 10, 0, 127]);
      const [arc] = sink.ofKind("arc");

      expect(arc.x0).toBe(0);
      expect(arc.cx).toBeCloseTo(5);
      expect(arc.cy).toBeCloseTo(-5);
      expect(arc.x1).toBe(10);
      expect(arc.y1).toBe(0);
    });

    it("bulges the other way for negative values", () => {
      const { sink } = run([0x0c, 10, 0, 0x81]);

      expect(sink.ofKind("arc")[0].cy).toBeCloseTo(5);
    });

    it("draws a line for a zero bulge", () => {
      const { sink } = run([0x0c, 10, 0, 0]);

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 10, y1: 0 }]);
    });

    it("reads triples until (0, 0) with no bulge after the terminator", () => {
      const { sink } = run([0x0d, 10, 0, 0, 0, 10, 0, 0, 0, 0x10]);

      expect(sink.ofKind("line")).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 10, y1: 0 },
        { op: "line", x0: 10, y0: 0, x1: 10, y1: 10 },
        { op: "line", x0: 10, y0: 10, x1: 11, y1: 10 },
      ]);
    });
  });

  describe("conditional mode 2", () => {
    it("skips the next instruction in horizontal text on a dual-mode font", () => {
      const { sink, state } = run([0x0e, 0x08, 5, 5, 0x10], { font: dualMode });

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 1, y1: 0 }]);
      expect(state.x).toBe(1);
    });

    it("runs the next instruction in vertical text", () => {
      const { sink } = run([0x0e, 0x08, 5, 5], { font: dualMode, horizontal: false });

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 5, y1: 5 }]);
    });

    it("runs the next instruction on a horizontal-only font", () => {
      const { sink } = run([0x0e, 0x08, 5, 5]);

      expect(sink.count("line")).toBe(1);
    });

    it("consumes operands of skipped arcs", () => {
      const { sink } = run([0x0e, 0x0b, 1, 2, 3, 4, 5, 0x10], { font: dualMode });

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 1, y1: 0 }]);
    });

    it("consumes the whole list of a skipped poly instruction", () => {
      const { sink } = run([0x0e, 0x09, 1, 1, 2, 2, 0, 0, 0x14], { font: dualMode });

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 0, y1: 1 }]);
    });

    it("drops a zero divisor without failing", () => {
      const { sink } = run([0x0e, 0x03, 0x00, 0x10], { font: dualMode, scale: 3 });

      expect(sink.calls).toEqual([{ op: "line", x0: 0, y0: 0, x1: 3, y1: 0 }]);
    });

    it("does not resolve a skipped subshape", () => {
      const { sink } = run([0x0e, 0x07, 99], { font: dualMode });

      expect(sink.calls).toEqual([]);
    });

    it("lets an unassigned command byte absorb the skip", () => {
      const { sink } = run([0x0e, 0x0f, 0x10], { font: dualMode });

      expect(sink.count("line")).toBe(1);
    });
  });

  describe("subshapes", () => {
    it("splices the callee in front of the rest of the caller", () => {
      const font = makeFont({ 65: [0x07, 66, 0x10], 66: [0x14] });
      const { sink } = run([0x07, 66, 0x10], { font });

      expect(sink.ofKind("line")).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 0, y1: 1 },
        { op: "line", x0: 0, y0: 1, x1: 1, y1: 1 },
      ]);
    });

    it("reads an extended BigFont reference and ignores its placement bytes", () => {
      const font = makeFont({ 0x1234: [0x14] }, { variant: "bigfont" });
      const { sink } = run([0x07, 0x00, 0x34, 0x12, 1, 2, 3, 4, 0x10], { font });

      expect(sink.ofKind("line")).toEqual([
        { op: "line", x0: 0, y0: 0, x1: 0, y1: 1 },
        { op: "line", x0: 0, y0: 1, x1: 1, y1: 1 },
      ]);
    });

    it("reads a one-byte BigFont reference", () => {
      const font = makeFont({ 66: [0x14] }, { variant: "bigfont" });
      const { sink } = run([0x07, 66], { font });

      expect(sink.count("line")).toBe(1);
    });

    it("reads a 16-bit Unifont reference", () => {
      const font = makeFont({ 0x0142: [0x14] }, { variant: "unifont" });
      const { sink } = run([0x07, 0x42, 0x01, 0x10], { font });

      expect(sink.count("line")).toBe(2);
    });

    it("fails on a missing subshape", () => {
      try {
        run([0x07, 99]);
        expect.fail("expected UNRESOLVED_SUBSHAPE");
      } catch (error) {
        expect(isShxFontError(error, "UNRESOLVED_SUBSHAPE")).toBe(true);
        expect(error).toHaveProperty("message", "Referenced subshape 99 does not exist");
      }
    });

    it("stops a recursive subshape at the depth limit", () => {
      const font = makeFont({ 65: [0x07, 65] });

      expectFault(() => run([0x07, 65], { font, maxSubshapeDepth: 4 }), "SUBSHAPE_DEPTH_EXCEEDED");
    });

    it("counts a call in the last instruction of a subshape as nested", () => {
      const font = makeFont({ 65: [0x10, 0x07, 66], 66: [0x07, 65] });

      expectFault(() => run([0x07, 65], { font, maxSubshapeDepth: 8 }), "SUBSHAPE_DEPTH_EXCEEDED");
    });

    it("renders a glyph that calls the same subshape many times", () => {
      const font = makeFont({ 1: [0x14] });
      const program = Array.from({ length: 300 }, () => [0x07, 1]).flat();

      const { sink, state } = run(program, { font });

      expect(sink.count("line")).toBe(300);
      expect(state.y).toBe(300);
    });

    it("limits nesting, not the number of calls", () => {
      const font = makeFont({ 1: [0x07, 2, 0x07, 2], 2: [0x10] });

      expect(run([0x07, 1], { font, maxSubshapeDepth: 2 }).sink.count("line")).toBe(2);
      expectFault(() => run([0x07, 1], { font, maxSubshapeDepth: 1 }), "SUBSHAPE_DEPTH_EXCEEDED");
    });

    it("caps the total number of calls", () => {
      const font = makeFont({ 66: [0x10] });

      expect(run([0x07, 66, 0x07, 66], { font, maxSubshapeCalls: 2 }).sink.count("line")).toBe(2);
      expectFault(
        () => run([0x07, 66, 0x07, 66, 0x07, 66], { font, maxSubshapeCalls: 2 }),
        "SUBSHAPE_CALLS_EXCEEDED",
      );
    });
  });

  describe("tracing", () => {
    it("reports every instruction with its skip flag", () => {
      const events: TraceEvent[] = [];
      const interpreter = new GlyphInterpreter(dualMode, new RecordingSink(), {
        onTrace: event => events.push(event),
      });

      interpreter.execute(Uint8Array.from([0x0e, 0x10, 0x02]), createInterpreterState({ scale: 1 }));

      expect(events).toEqual([
        { byte: 0x0e, name: "CondMode2", skipped: false },
        { byte: 0x10, name: "Vector", skipped: true },
        { byte: 0x02, name: "PenUp", skipped: false },
      ]);
    });
  });

  describe("state", () => {
    it("starts with the pen down at the given origin", () => {
      const state = createInterpreterState({ scale: 2, x: 5, y: 6 });

      expect(state).toEqual({
        x: 5,
        y: 6,
        lastX: 5,
        lastY: 6,
        pen: true,
        scale: 2,
        stack: [],
        skipNext: false,
        horizontal: true,
      });
    });

    it("resets per-glyph state but keeps the position", () => {
      const state = createInterpreterState({ scale: 1 });
      state.x = 4;
      state.pen = false;
      state.scale = 7;
      state.skipNext = true;
      state.stack.push({ x: 1, y: 1 });

      beginGlyph(state, 3);

      expect(state.x).toBe(4);
      expect(state.lastX).toBe(4);
      expect(state.pen).toBe(true);
      expect(state.scale).toBe(3);
      expect(state.skipNext).toBe(false);
      expect(state.stack).toEqual([]);
    });

    it("never modifies the program or the font", () => {
      const font = makeFont({ 66: [0x14] });
      const program = Uint8Array.from([0x07, 66, 0x10]);

      executeGlyph(font, program, createInterpreterState({ scale: 1 }), new RecordingSink());

      expect(program).toEqual(Uint8Array.from([0x07, 66, 0x10]));
      expect(font.glyphs.get(66)).toEqual(Uint8Array.from([0x14]));
    });
  });
});
