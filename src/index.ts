/**
 * shx-stroke-font
 *
 * Reads AutoCAD SHX stroke fonts and renders text as line and arc strokes.
 */

export { version } from "../package.json";

// ─────────────────────────────────────────────────────────────────────────────
// High-level API
// ─────────────────────────────────────────────────────────────────────────────

export { type LoadOptions, type RenderedPath, StrokeFont } from "./api/stroke-font";

// ─────────────────────────────────────────────────────────────────────────────
// Paths
// ─────────────────────────────────────────────────────────────────────────────

export {
  type ArcSegment,
  circleThrough,
  GlyphPath,
  type LineSegment,
  type MoveSegment,
  type PathBounds,
  type PathSegment,
  type SvgPathOptions,
} from "./paths/glyph-path";

// ─────────────────────────────────────────────────────────────────────────────
// Low-level SHX API
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildShxFont,
  type GlyphDefinition,
  GlyphDefinitionSchema,
  type ShxFontDefinition,
  ShxFontDefinitionSchema,
} from "./fontbox/shx/builder";
export { isShxFontError, ShxFontError, type ShxFontErrorCode } from "./fontbox/shx/errors";
export {
  beginGlyph,
  createInterpreterState,
  DEFAULT_MAX_SUBSHAPE_CALLS,
  DEFAULT_MAX_SUBSHAPE_DEPTH,
  executeGlyph,
  GlyphInterpreter,
  type InterpreterOptions,
  type InterpreterState,
  type InterpreterStateInit,
  type Point,
  POSITION_STACK_CAPACITY,
  type TraceEvent,
} from "./fontbox/shx/interpreter";
export {
  DIRECTION_VECTORS,
  decodeInstruction,
  type Instruction,
  instructionName,
  ShxOpcode,
} from "./fontbox/shx/opcodes";
export {
  describeShxFont,
  isShx,
  parseShx,
  type ShxParseOptions,
  type WarningCallback,
} from "./fontbox/shx/parser";
export {
  applyFallbacks,
  FALLBACK_SUBSTITUTIONS,
  hasGlyph,
  type LineInfo,
  type RenderOptions,
  RenderOptionsSchema,
  type RenderResult,
  type RenderSettings,
  render,
  renderText,
  resolveRenderOptions,
  type TextAlign,
  TextAlignSchema,
} from "./fontbox/shx/renderer";
export {
  type CodeRange,
  DUAL_ORIENTATION_MODE,
  type PathSink,
  type ShxFont,
  type ShxVariant,
} from "./fontbox/shx/types";
