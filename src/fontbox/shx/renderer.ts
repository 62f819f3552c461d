/**
 * Text layout for SHX fonts.
 *
 * Runs each character's glyph program through the interpreter. There are no
 * advance widths: every glyph ends with its own trailing move, and the pen
 * position simply carries over to the next glyph.
 */

import { z } from "zod";
import { invalidOptionsError } from "./errors";
import {
  beginGlyph,
  createInterpreterState,
  GlyphInterpreter,
  type TraceEvent,
} from "./interpreter";
import type { PathSink, ShxFont } from "./types";

/**
 * Stand-ins for characters the font lacks, applied before lookup.
 */
export const FALLBACK_SUBSTITUTIONS: ReadonlyMap<string, string> = new Map([
  ["ä", "ae"],
  ["ö", "oe"],
  ["ü", "ue"],
  ["Ä", "Ae"],
  ["Ö", "Oe"],
  ["Ü", "Ue"],
  ["ß", "ss"],
]);

/**
 * Line alignment relative to the origin.
 * - start: lines begin at x = 0
 * - middle: the block is centred on x = 0 and each line within it
 * - end: lines end at x = 0
 */
export const TextAlignSchema = z.enum(["start", "middle", "end"]);
export type TextAlign = z.infer<typeof TextAlignSchema>;

export const RenderOptionsSchema = z.object({
  /** Horizontal text. Dual-mode fonts skip vertical-only instructions. */
  horizontal: z.boolean().default(true),
  /** Cap height in output units; scale is fontSize / above */
  fontSize: z.number().finite().positive().default(12),
  /** Multiplier on each glyph's own advance */
  hSpacing: z.number().finite().default(1),
  /** Line pitch as a multiple of (above + below) */
  vSpacing: z.number().finite().default(1.1),
  align: TextAlignSchema.default("start"),
  /** Nesting limit for subshape calls */
  maxSubshapeDepth: z.number().int().positive().optional(),
  /** Subshape calls allowed per glyph */
  maxSubshapeCalls: z.number().int().positive().optional(),
});

/** Render options after defaults are applied */
export type RenderSettings = z.infer<typeof RenderOptionsSchema>;

export type RenderOptions = z.input<typeof RenderOptionsSchema> & {
  /** Receives every executed instruction of every glyph */
  onTrace?: (event: TraceEvent) => void;
};

/**
 * Placement of one rendered line.
 */
export interface LineInfo {
  startX: number;
  startY: number;
  /** Furthest x reached by any glyph of the line */
  endX: number;
  width: number;
  /** (above + below) in output units */
  height: number;
}

export interface RenderResult {
  lines: LineInfo[];
}

const NULL_SINK: PathSink = {
  newPath() {},
  move() {},
  line() {},
  arc() {},
};

/**
 * Validate render options and fill in defaults.
 *
 * @throws {ShxFontError} INVALID_OPTIONS
 */
export function resolveRenderOptions(options: RenderOptions = {}): RenderSettings {
  const { onTrace: _onTrace, ...settings } = options;
  const result = RenderOptionsSchema.safeParse(settings);

  if (!result.success) {
    throw invalidOptionsError("render options", result.error);
  }

  return result.data;
}

/**
 * Replace characters the font has no glyph for with their fallback
 * spelling. Characters with neither are left for the renderer to drop.
 */
export function applyFallbacks(font: ShxFont, text: string): string {
  let result = "";

  for (const char of text) {
    const substitute = FALLBACK_SUBSTITUTIONS.get(char);

    if (substitute !== undefined && !hasGlyph(font, char)) {
      result += substitute;
    } else {
      result += char;
    }
  }

  return result;
}

/**
 * True if the font has a glyph for the character's code point.
 */
export function hasGlyph(font: ShxFont, char: string): boolean {
  const code = char.codePointAt(0);

  return code !== undefined && font.glyphs.has(code);
}

/**
 * Render text into a sink.
 *
 * Lines are separated by "\n". Characters without a glyph are skipped.
 * Interpreter faults abort the call; the font itself is never modified.
 *
 * @param font - Parsed font
 * @param sink - Receiver of the strokes
 * @param text - Text to render
 * @param options - Layout options
 * @returns Placement of each line
 * @throws {ShxFontError} INVALID_OPTIONS, or any interpreter fault
 */
export function renderText(
  font: ShxFont,
  sink: PathSink,
  text: string,
  options: RenderOptions = {},
): RenderResult {
  const settings = resolveRenderOptions(options);

  if (text === "") {
    return { lines: [] };
  }

  const lines = applyFallbacks(font, text).split("\n");
  const layout = new TextLayout(font, settings);

  if (settings.align === "start") {
    return { lines: layout.run(sink, lines, lines.map(() => 0), options.onTrace) };
  }

  // Measure first, then draw with each line shifted by its alignment offset
  const measured = layout.run(NULL_SINK, lines, lines.map(() => 0));
  const maxLength = Math.max(...measured.map(line => line.endX));
  const offsets = measured.map(line =>
    settings.align === "middle" ? -maxLength / 2 + (maxLength - line.endX) / 2 : -line.endX,
  );

  return { lines: layout.run(sink, lines, offsets, options.onTrace) };
}

/**
 * Positional form: `render(font, sink, text, horizontal, fontSize)`.
 */
export function render(
  font: ShxFont,
  sink: PathSink,
  text: string,
  horizontal = true,
  fontSize = 12,
): RenderResult {
  return renderText(font, sink, text, { horizontal, fontSize });
}

class TextLayout {
  private readonly font: ShxFont;
  private readonly settings: RenderSettings;
  private readonly above: number;
  private readonly below: number;
  private readonly scale: number;

  constructor(font: ShxFont, settings: RenderSettings) {
    this.font = font;
    this.settings = settings;
    // A missing (or zero) cap height renders at unit scale
    this.above = font.above || 1;
    this.below = font.below ?? 0;
    this.scale = settings.fontSize / this.above;
  }

  run(
    sink: PathSink,
    lines: string[],
    offsets: number[],
    onTrace?: (event: TraceEvent) => void,
  ): LineInfo[] {
    const interpreter = new GlyphInterpreter(this.font, sink, {
      maxSubshapeDepth: this.settings.maxSubshapeDepth,
      maxSubshapeCalls: this.settings.maxSubshapeCalls,
      onTrace,
    });
    const state = createInterpreterState({
      scale: this.scale,
      horizontal: this.settings.horizontal,
    });
    const lineHeight = this.above + this.below;
    const result: LineInfo[] = [];
    // Baseline of the current line in design units
    let baseline = 0;

    lines.forEach((text, i) => {
      const offset = offsets[i];

      state.x = offset;
      state.y = baseline * this.scale;

      const startY = state.y;
      let endX = offset;

      for (const char of text) {
        const code = char.codePointAt(0);
        const program = code === undefined ? undefined : this.font.glyphs.get(code);

        if (program === undefined) {
          continue;
        }

        const glyphStartX = state.x;

        beginGlyph(state, this.scale);
        interpreter.execute(program, state);

        if (this.settings.hSpacing !== 1) {
          const dx = (this.settings.hSpacing - 1) * (state.lastX - glyphStartX);
          state.x += dx;
          state.lastX += dx;
        }

        endX = Math.max(endX, state.x);
        sink.characterEnd?.();
      }

      result.push({
        startX: offset,
        startY,
        endX,
        width: endX - offset,
        height: this.scale * lineHeight,
      });

      baseline -= this.settings.vSpacing * lineHeight;
    });

    return result;
  }
}
