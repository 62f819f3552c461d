/**
 * SHX glyph bytecode.
 *
 * Each instruction byte splits into a length nibble (high) and a direction
 * nibble (low). A non-zero length is a vector move; a zero length makes the
 * low nibble a command.
 */

/**
 * Commands selected by the low nibble when the length nibble is 0.
 */
export enum ShxOpcode {
  /** Skip to the next zero byte, then close the current subpath */
  EndOfShape = 0x0,
  PenDown = 0x1,
  PenUp = 0x2,
  /** Divide the vector scale by the next byte */
  DivideVector = 0x3,
  /** Multiply the vector scale by the next byte */
  MultiplyVector = 0x4,
  PushStack = 0x5,
  PopStack = 0x6,
  /** Splice another glyph's program into the stream */
  DrawSubshape = 0x7,
  /** dx, dy as signed bytes */
  XYDisplacement = 0x8,
  /** dx, dy pairs until (0, 0) */
  PolyXYDisplacement = 0x9,
  /** radius, signed start/span byte */
  OctantArc = 0xa,
  /** start offset, end offset, radius high, radius low, signed start/span byte */
  FractionalArc = 0xb,
  /** dx, dy, bulge */
  BulgeArc = 0xc,
  /** dx, dy, bulge triples until (0, 0) */
  PolyBulgeArc = 0xd,
  /** Skip the next instruction in horizontal text on a dual-mode font */
  CondMode2 = 0xe,
}

/**
 * Unit vectors for the 16 direction codes, counter-clockwise from +x in
 * 22.5° steps. Components are the legacy box-aligned values, not sin/cos.
 */
export const DIRECTION_VECTORS: readonly (readonly [number, number])[] = [
  [1, 0],
  [1, 0.5],
  [1, 1],
  [0.5, 1],
  [0, 1],
  [-0.5, 1],
  [-1, 1],
  [-1, 0.5],
  [-1, 0],
  [-1, -0.5],
  [-1, -1],
  [-0.5, -1],
  [0, -1],
  [0.5, -1],
  [1, -1],
  [1, -0.5],
];

/**
 * Decoded instruction byte.
 */
export type Instruction =
  | { kind: "vector"; length: number; direction: number }
  | { kind: "command"; opcode: ShxOpcode };

/**
 * Split an instruction byte into a vector move or a command.
 *
 * The low nibble 0xF with a zero length has no command assigned; it decodes
 * as `null`.
 */
export function decodeInstruction(byte: number): Instruction | null {
  const length = (byte & 0xf0) >> 4;
  const direction = byte & 0x0f;

  if (length !== 0) {
    return { kind: "vector", length, direction };
  }

  if (direction > ShxOpcode.CondMode2) {
    return null;
  }

  return { kind: "command", opcode: direction };
}

/**
 * Display name of a decoded instruction, for tracing.
 */
export function instructionName(instruction: Instruction | null): string {
  if (instruction === null) {
    return "Unknown";
  }

  return instruction.kind === "vector" ? "Vector" : ShxOpcode[instruction.opcode];
}

/**
 * Interpret a byte as a two's-complement signed value in [-128, 127].
 */
export function signed8(b: number): number {
  return b > 0x7f ? b - 0x100 : b;
}
