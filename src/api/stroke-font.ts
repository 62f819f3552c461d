/**
 * StrokeFont - high-level API for SHX fonts.
 */

import { parseShx, describeShxFont, type ShxParseOptions } from "#src/fontbox/shx/parser";
import {
  hasGlyph,
  renderText,
  type RenderOptions,
  type RenderResult,
} from "#src/fontbox/shx/renderer";
import type { PathSink, ShxFont, ShxVariant } from "#src/fontbox/shx/types";
import { GlyphPath } from "#src/paths/glyph-path";

export type LoadOptions = ShxParseOptions;

/**
 * Text rendered into a new GlyphPath.
 */
export interface RenderedPath extends RenderResult {
  path: GlyphPath;
}

/**
 * A loaded SHX font.
 *
 * @example
 * ```typescript
 * const font = StrokeFont.load(bytes);
 *
 * const { path } = font.toPath("HELLO", { fontSize: 24 });
 * const d = path.toSvgPathData();
 * ```
 */
export class StrokeFont {
  /** The parsed font data */
  readonly font: ShxFont;

  private readonly _warnings: string[];

  /** Warnings from parsing */
  get warnings(): readonly string[] {
    return [...this._warnings];
  }

  private constructor(font: ShxFont, warnings: string[]) {
    this.font = font;
    this._warnings = warnings;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Loading
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Load a font from bytes.
   *
   * Parse warnings are collected in `warnings` and also passed to
   * `options.onWarning` when given.
   *
   * @throws {ShxFontError} if the container cannot be read
   */
  static load(bytes: Uint8Array, options: LoadOptions = {}): StrokeFont {
    const warnings: string[] = [];

    const font = parseShx(bytes, {
      onWarning: (message, position) => {
        warnings.push(`${message} (at offset ${position})`);
        options.onWarning?.(message, position);
      },
    });

    return new StrokeFont(font, warnings);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Metadata
  // ─────────────────────────────────────────────────────────────────────────────

  get name(): string | null {
    return this.font.name;
  }

  get variant(): ShxVariant {
    return this.font.variant;
  }

  get glyphCount(): number {
    return this.font.glyphs.size;
  }

  /** Check whether the font can render a character without fallback */
  hasGlyph(char: string): boolean {
    return hasGlyph(this.font, char);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Rendering
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Render text into any sink.
   */
  render(sink: PathSink, text: string, options?: RenderOptions): RenderResult {
    return renderText(this.font, sink, text, options);
  }

  /**
   * Render text into a new GlyphPath.
   */
  toPath(text: string, options?: RenderOptions): RenderedPath {
    const path = new GlyphPath();
    const { lines } = renderText(this.font, path, text, options);

    return { path, lines };
  }

  toString(): string {
    return describeShxFont(this.font);
  }
}
