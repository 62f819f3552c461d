/**
 * SHX glyph bytecode interpreter.
 *
 * Executes one glyph program against explicit draw state and reports the
 * strokes to a PathSink. State lives in InterpreterState, never in the
 * interpreter or the font, so a font can be shared between renders.
 */

import { CodeStream } from "./code-stream";
import { ShxFontError } from "./errors";
import { DIRECTION_VECTORS, decodeInstruction, instructionName, ShxOpcode } from "./opcodes";
import { DUAL_ORIENTATION_MODE, type PathSink, type ShxFont } from "./types";

/** Positions the stack can hold; the fourth push overflows */
export const POSITION_STACK_CAPACITY = 3;

/** Subshape calls allowed to nest inside one another */
export const DEFAULT_MAX_SUBSHAPE_DEPTH = 256;

/** Subshape calls allowed in total while executing one glyph */
export const DEFAULT_MAX_SUBSHAPE_CALLS = 65_536;

const OCTANT = Math.PI / 4;

/** Bulge bytes are in 1/127ths of the half chord */
const BULGE_UNIT = 127;

export interface Point {
  x: number;
  y: number;
}

/**
 * Draw state for one render call.
 *
 * `x`/`y` carry over from glyph to glyph; everything else is reset by
 * beginGlyph().
 */
export interface InterpreterState {
  x: number;
  y: number;
  /** Start of the current segment */
  lastX: number;
  lastY: number;
  pen: boolean;
  scale: number;
  readonly stack: Point[];
  /** Suppress the effects of the next instruction */
  skipNext: boolean;
  /** Horizontal text; gates CondMode2 */
  horizontal: boolean;
}

export interface InterpreterStateInit {
  scale: number;
  horizontal?: boolean;
  x?: number;
  y?: number;
}

/**
 * Trace record for one executed instruction.
 */
export interface TraceEvent {
  /** Raw instruction byte */
  byte: number;
  /** Command or "Vector" */
  name: string;
  /** Whether the instruction ran under a pending skip */
  skipped: boolean;
}

export interface InterpreterOptions {
  /**
   * Maximum nesting of subshape calls. Subshape references may form
   * cycles; exceeding the limit raises SUBSHAPE_DEPTH_EXCEEDED.
   * @default 256
   */
  maxSubshapeDepth?: number;

  /**
   * Maximum subshape calls per glyph, nested or not. Bounds the work of
   * deep fan-outs; exceeding it raises SUBSHAPE_CALLS_EXCEEDED.
   * @default 65536
   */
  maxSubshapeCalls?: number;

  /**
   * Called for every instruction before it runs.
   */
  onTrace?: (event: TraceEvent) => void;
}

export function createInterpreterState(init: InterpreterStateInit): InterpreterState {
  const x = init.x ?? 0;
  const y = init.y ?? 0;

  return {
    x,
    y,
    lastX: x,
    lastY: y,
    pen: true,
    scale: init.scale,
    stack: [],
    skipNext: false,
    horizontal: init.horizontal ?? true,
  };
}

/**
 * Reset per-glyph state, keeping the pen position.
 */
export function beginGlyph(state: InterpreterState, scale: number): void {
  state.lastX = state.x;
  state.lastY = state.y;
  state.pen = true;
  state.scale = scale;
  state.stack.length = 0;
  state.skipNext = false;
}

/**
 * Execute a glyph program.
 *
 * @param font - Font the program belongs to; resolves subshapes and modes
 * @param program - Glyph bytecode
 * @param state - Draw state, updated in place
 * @param sink - Receiver of the strokes
 * @throws {ShxFontError} on interpreter faults
 */
export function executeGlyph(
  font: ShxFont,
  program: Uint8Array,
  state: InterpreterState,
  sink: PathSink,
  options: InterpreterOptions = {},
): void {
  new GlyphInterpreter(font, sink, options).execute(program, state);
}

export class GlyphInterpreter {
  private readonly font: ShxFont;
  private readonly sink: PathSink;
  private readonly maxSubshapeDepth: number;
  private readonly maxSubshapeCalls: number;
  private readonly onTrace: ((event: TraceEvent) => void) | null;

  constructor(font: ShxFont, sink: PathSink, options: InterpreterOptions = {}) {
    this.font = font;
    this.sink = sink;
    this.maxSubshapeDepth = options.maxSubshapeDepth ?? DEFAULT_MAX_SUBSHAPE_DEPTH;
    this.maxSubshapeCalls = options.maxSubshapeCalls ?? DEFAULT_MAX_SUBSHAPE_CALLS;
    this.onTrace = options.onTrace ?? null;
  }

  execute(program: Uint8Array, state: InterpreterState): void {
    const code = new CodeStream(program);
    let subshapeCalls = 0;

    while (!code.isEmpty) {
      const byte = code.pop();
      const instruction = decodeInstruction(byte);

      this.onTrace?.({ byte, name: instructionName(instruction), skipped: state.skipNext });

      // Every instruction takes its operands first and then drops its effects
      // if a skip was pending, so the stream stays aligned.
      const skipped = state.skipNext;
      state.skipNext = false;

      if (instruction === null) {
        continue;
      }

      if (instruction.kind === "vector") {
        if (!skipped) {
          const [dx, dy] = DIRECTION_VECTORS[instruction.direction];
          const distance = instruction.length * state.scale;
          this.displace(state, dx * distance, dy * distance);
        }
        continue;
      }

      switch (instruction.opcode) {
        case ShxOpcode.EndOfShape:
          code.skipPastZero();
          if (!skipped) {
            this.sink.newPath();
          }
          break;

        case ShxOpcode.PenDown:
          if (!skipped) {
            state.pen = true;
          }
          break;

        case ShxOpcode.PenUp:
          if (!skipped) {
            state.pen = false;
          }
          break;

        case ShxOpcode.DivideVector: {
          const factor = code.pop();
          if (!skipped) {
            state.scale /= this.requireFactor(factor, "Divide");
          }
          break;
        }

        case ShxOpcode.MultiplyVector: {
          const factor = code.pop();
          if (!skipped) {
            state.scale *= this.requireFactor(factor, "Multiply");
          }
          break;
        }

        case ShxOpcode.PushStack:
          if (!skipped) {
            this.pushPosition(state);
          }
          break;

        case ShxOpcode.PopStack:
          if (!skipped) {
            this.popPosition(state);
          }
          break;

        case ShxOpcode.DrawSubshape: {
          const key = this.readSubshapeKey(code);
          if (!skipped) {
            if (code.depth >= this.maxSubshapeDepth) {
              throw new ShxFontError(
                "SUBSHAPE_DEPTH_EXCEEDED",
                `Subshape calls nested more than ${this.maxSubshapeDepth} deep; subshape ${key} may be recursive`,
              );
            }
            if (++subshapeCalls > this.maxSubshapeCalls) {
              throw new ShxFontError(
                "SUBSHAPE_CALLS_EXCEEDED",
                `More than ${this.maxSubshapeCalls} subshape calls in one glyph`,
              );
            }
            code.splice(this.resolveSubshape(key));
          }
          break;
        }

        case ShxOpcode.XYDisplacement: {
          const dx = code.popSigned();
          const dy = code.popSigned();
          if (!skipped) {
            this.displace(state, dx * state.scale, dy * state.scale);
          }
          break;
        }

        case ShxOpcode.PolyXYDisplacement:
          for (;;) {
            const dx = code.popSigned();
            const dy = code.popSigned();
            if (dx === 0 && dy === 0) {
              break;
            }
            if (!skipped) {
              this.displace(state, dx * state.scale, dy * state.scale);
            }
          }
          break;

        case ShxOpcode.OctantArc: {
          const radius = code.pop() * state.scale;
          const sc = code.pop();
          if (!skipped) {
            this.octantArc(state, radius, sc, 0, 0);
          }
          break;
        }

        case ShxOpcode.FractionalArc: {
          const startOffset = (OCTANT * code.pop()) / 256;
          const endOffset = (OCTANT * code.pop()) / 256;
          const high = code.pop();
          const low = code.pop();
          const radius = (high * 256 + low) * state.scale;
          const sc = code.pop();
          if (!skipped) {
            this.octantArc(state, radius, sc, startOffset, endOffset);
          }
          break;
        }

        case ShxOpcode.BulgeArc: {
          const dx = code.popSigned() * state.scale;
          const dy = code.popSigned() * state.scale;
          const h = code.popSigned();
          if (!skipped) {
            this.bulgeArc(state, dx, dy, h);
          }
          break;
        }

        case ShxOpcode.PolyBulgeArc:
          for (;;) {
            const rawDx = code.popSigned();
            const rawDy = code.popSigned();
            if (rawDx === 0 && rawDy === 0) {
              break;
            }
            const h = code.popSigned();
            if (!skipped) {
              this.bulgeArc(state, rawDx * state.scale, rawDy * state.scale, h);
            }
          }
          break;

        case ShxOpcode.CondMode2:
          if (!skipped && this.font.modes === DUAL_ORIENTATION_MODE && state.horizontal) {
            state.skipNext = true;
          }
          break;
      }
    }
  }

  /**
   * Move by (dx, dy): a line with the pen down, a move with it up.
   */
  private displace(state: InterpreterState, dx: number, dy: number): void {
    state.x += dx;
    state.y += dy;

    if (state.pen) {
      this.sink.line(state.lastX, state.lastY, state.x, state.y);
    } else {
      this.sink.move(state.x, state.y);
    }

    state.lastX = state.x;
    state.lastY = state.y;
  }

  private requireFactor(factor: number, operation: string): number {
    if (factor === 0) {
      throw new ShxFontError("DIVIDE_BY_ZERO", `${operation} Vector is not permitted to be 0`);
    }

    return factor;
  }

  private pushPosition(state: InterpreterState): void {
    if (state.stack.length >= POSITION_STACK_CAPACITY) {
      throw new ShxFontError("STACK_OVERFLOW", "Position stack overflow");
    }

    state.stack.push({ x: state.x, y: state.y });
  }

  /**
   * Restore a pushed position. Always reported as a move, whatever the pen.
   */
  private popPosition(state: InterpreterState): void {
    const position = state.stack.pop();

    if (position === undefined) {
      throw new ShxFontError("STACK_UNDERFLOW", "Position stack underflow");
    }

    state.x = position.x;
    state.y = position.y;
    this.sink.move(state.x, state.y);
    state.lastX = state.x;
    state.lastY = state.y;
  }

  /**
   * Read a subshape number using the font's addressing:
   * - shapes: one byte
   * - bigfont: one byte; 0 escapes to a uint16 plus four bytes of
   *   origin/extent, which are read and ignored
   * - unifont: uint16
   */
  private readSubshapeKey(code: CodeStream): number {
    switch (this.font.variant) {
      case "shapes":
        return code.pop();

      case "bigfont": {
        const key = code.pop();
        if (key !== 0) {
          return key;
        }
        const extended = code.popUint16();
        // origin x, origin y, width, height
        for (let i = 0; i < 4; i++) {
          code.pop();
        }
        return extended;
      }

      case "unifont":
        return code.popUint16();
    }
  }

  private resolveSubshape(key: number): Uint8Array {
    const program = this.font.glyphs.get(key);

    if (program === undefined) {
      throw new ShxFontError("UNRESOLVED_SUBSHAPE", `Referenced subshape ${key} does not exist`);
    }

    return program;
  }

  /**
   * Arc of whole octants, optionally trimmed by fractional offsets.
   *
   * `sc` packs the direction (bit 7 set: the start octant is negated), the
   * start octant (bits 4-6) and the span in octants (bits 0-2, 0 = full
   * circle). The centre sits `radius` back from the current point along the
   * start angle.
   */
  private octantArc(
    state: InterpreterState,
    radius: number,
    sc: number,
    startOffset: number,
    endOffset: number,
  ): void {
    let start = (sc >> 4) & 0x7;
    let span = sc & 0x7;

    if (span === 0) {
      span = 8;
    }

    if ((sc >> 7) & 1) {
      start = -start;
    }

    const startAngle = startOffset + start * OCTANT;
    const endAngle = (span + start) * OCTANT + endOffset;
    const midAngle = (startAngle + endAngle) / 2;

    const cx = state.x - radius * Math.cos(startAngle);
    const cy = state.y - radius * Math.sin(startAngle);
    const mx = cx + radius * Math.cos(midAngle);
    const my = cy + radius * Math.sin(midAngle);

    state.x = cx + radius * Math.cos(endAngle);
    state.y = cy + radius * Math.sin(endAngle);

    if (state.pen) {
      this.sink.arc(state.lastX, state.lastY, mx, my, state.x, state.y);
    } else {
      this.sink.move(state.x, state.y);
    }

    state.lastX = state.x;
    state.lastY = state.y;
  }

  /**
   * Arc over the chord (dx, dy) whose midpoint sits `h / 127` half-chords
   * off the chord, to the right of the direction of travel for positive h.
   * A zero bulge is a straight line.
   */
  private bulgeArc(state: InterpreterState, dx: number, dy: number, h: number): void {
    const radius = Math.hypot(dx, dy) / 2;
    const bulge = h / BULGE_UNIT;
    const bx = state.x + dx / 2;
    const by = state.y + dy / 2;
    const bulgeAngle = Math.atan2(dy, dx) - Math.PI / 2;
    const mx = bx + radius * bulge * Math.cos(bulgeAngle);
    const my = by + radius * bulge * Math.sin(bulgeAngle);

    state.x += dx;
    state.y += dy;

    if (!state.pen) {
      this.sink.move(state.x, state.y);
    } else if (bulge === 0) {
      this.sink.line(state.lastX, state.lastY, state.x, state.y);
    } else {
      this.sink.arc(state.lastX, state.lastY, mx, my, state.x, state.y);
    }

    state.lastX = state.x;
    state.lastY = state.y;
  }
}
