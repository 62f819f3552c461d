/**
 * Shared types for SHX stroke fonts.
 */

/**
 * Container layout named in the file header.
 *
 * The layout decides how glyph programs are stored and how subshape calls
 * address other glyphs; the glyph bytecode is the same for all three.
 */
export type ShxVariant = "shapes" | "bigfont" | "unifont";

/**
 * Modes byte of the font metadata.
 * - 0: horizontal only
 * - 2: dual orientation; opcode 0x0E is honoured
 */
export const DUAL_ORIENTATION_MODE = 2;

/**
 * A BigFont change-table entry (escape byte range).
 */
export interface CodeRange {
  start: number;
  end: number;
}

/**
 * A parsed SHX font. Immutable once returned by the parser.
 */
export interface ShxFont {
  /** Vendor tag from the header, usually "AutoCAD-86" */
  readonly format: string;
  readonly variant: ShxVariant;
  /** Version token from the header, usually "1.0" */
  readonly version: string;
  /** Font name from the metadata block (not present in BigFont files) */
  readonly name: string | null;
  /** Design-unit height above the baseline; the scale divisor */
  readonly above: number | null;
  /** Design-unit depth below the baseline */
  readonly below: number | null;
  readonly modes: number | null;
  /** Unifont encoding byte (0 unicode, 1 packed multibyte, 2 shape file) */
  readonly encoding: number | null;
  /** Unifont embedding byte (0 allowed, 1 not allowed, 2 read-only) */
  readonly embeddable: number | null;
  /** Shapes header: lowest declared glyph number */
  readonly firstCode: number | null;
  /** Shapes header: highest declared glyph number */
  readonly lastCode: number | null;
  /** BigFont escape ranges; parsed but not applied */
  readonly ranges: readonly CodeRange[];
  /** Glyph programs by glyph number */
  readonly glyphs: ReadonlyMap<number, Uint8Array>;
  /** Shapes glyph names; parsed but not used when rendering */
  readonly aliases: ReadonlyMap<string, number>;
}

/**
 * Receiver of the strokes produced by the interpreter.
 *
 * Coordinates are in output units with y growing upward.
 */
export interface PathSink {
  /** Start a disjoint subpath */
  newPath(): void;
  /** Relocate without drawing */
  move(x: number, y: number): void;
  /** Straight segment */
  line(x0: number, y0: number, x1: number, y1: number): void;
  /**
   * Circular arc from (x0, y0) through (cx, cy) to (x1, y1).
   * The control point lies on the arc; it is not a tangent handle.
   */
  arc(x0: number, y0: number, cx: number, cy: number, x1: number, y1: number): void;
  /** Called after each rendered character */
  characterEnd?(): void;
}
