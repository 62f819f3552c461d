/**
 * SHX Font Builder.
 *
 * Writes a font description in the Shapes or BigFont container layout, in
 * the form parseShx() reads back. Unifont is not supported.
 */

import { z } from "zod";
import { CR, LF, SUB } from "#src/helpers/chars";
import { BinaryWriter } from "#src/io/binary-writer";
import { invalidOptionsError } from "./errors";

const DEFAULT_FORMAT = "AutoCAD-86";
const DEFAULT_VERSION = "1.0";

/** index u16, length u16, offset u32 */
const BIGFONT_ENTRY_SIZE = 8;

const utf8 = new TextEncoder();

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const ByteSchema = z.number().int().min(0).max(0xff);
const Uint16Schema = z.number().int().min(0).max(0xffff);
const TokenSchema = z.string().regex(/^\S+$/, "must be a single non-empty token");

/**
 * A glyph: its program, and for Shapes fonts an optional name.
 */
export const GlyphDefinitionSchema = z.object({
  program: z.instanceof(Uint8Array),
  /** Shapes only; A-Z, 0-9, space and & */
  name: z
    .string()
    .regex(/^[A-Z0-9 &]*$/, "may only contain A-Z, 0-9, space and &")
    .default(""),
});

export const ShxFontDefinitionSchema = z.object({
  variant: z.enum(["shapes", "bigfont"]),
  format: TokenSchema.default(DEFAULT_FORMAT),
  version: TokenSchema.default(DEFAULT_VERSION),
  /** Shapes only */
  name: z
    .string()
    .regex(/^[^\0\r\n]*$/, "must not contain NUL, CR or LF")
    .default(""),
  above: ByteSchema,
  below: ByteSchema.default(0),
  modes: ByteSchema.default(0),
  /** Shapes only; default to the lowest and highest glyph number */
  firstCode: Uint16Schema.optional(),
  lastCode: Uint16Schema.optional(),
  /** BigFont only */
  ranges: z.array(z.object({ start: Uint16Schema, end: Uint16Schema })).default([]),
  /** Glyph number 0 is reserved for the font metadata */
  glyphs: z.map(
    Uint16Schema.min(1),
    z.union([
      z.instanceof(Uint8Array).transform(program => ({ program, name: "" })),
      GlyphDefinitionSchema,
    ]),
  ),
});

export type GlyphDefinition = z.input<typeof GlyphDefinitionSchema>;
export type ShxFontDefinition = z.input<typeof ShxFontDefinitionSchema>;

type ResolvedDefinition = z.infer<typeof ShxFontDefinitionSchema>;
type ResolvedGlyph = z.infer<typeof GlyphDefinitionSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Builder
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Serialize a font definition.
 *
 * Glyphs are written in ascending glyph-number order. In a Shapes font every
 * program is stored with a terminating zero, appended when missing; the
 * parser returns it without that zero. BigFont programs round-trip as given.
 *
 * @throws {ShxFontError} INVALID_OPTIONS if the definition fails validation
 */
export function buildShxFont(definition: ShxFontDefinition): Uint8Array {
  const result = ShxFontDefinitionSchema.safeParse(definition);

  if (!result.success) {
    throw invalidOptionsError("font definition", result.error);
  }

  const font = result.data;
  const glyphs = [...font.glyphs].sort(([a], [b]) => a - b);
  const writer = new BinaryWriter();

  writeHeader(writer, font);

  if (font.variant === "shapes") {
    writeShapes(writer, font, glyphs);
  } else {
    writeBigFont(writer, font, glyphs);
  }

  return writer.toBytes();
}

/**
 * `FORMAT VARIANT VERSION` followed by CR LF and Ctrl-Z.
 */
function writeHeader(writer: BinaryWriter, font: ResolvedDefinition): void {
  writer.writeAscii(`${font.format} ${font.variant} ${font.version}`);
  writer.writeUint8(CR);
  writer.writeUint8(LF);
  writer.writeUint8(SUB);
}

function writeShapes(
  writer: BinaryWriter,
  font: ResolvedDefinition,
  glyphs: [number, ResolvedGlyph][],
): void {
  const numbers = glyphs.map(([index]) => index);
  const nameBytes = utf8.encode(font.name);

  // name NUL above below modes NUL
  const metadata = new Uint8Array(nameBytes.length + 5);
  metadata.set(nameBytes);
  metadata.set([0, font.above, font.below, font.modes, 0], nameBytes.length);

  const definitions = glyphs.map(([index, glyph]) => {
    const program =
      glyph.program.length > 0 && glyph.program[glyph.program.length - 1] === 0
        ? glyph.program
        : Uint8Array.from([...glyph.program, 0]);
    const name = utf8.encode(glyph.name);
    const bytes = new Uint8Array(name.length + 1 + program.length);

    bytes.set(name);
    bytes.set(program, name.length + 1);

    return { index, bytes };
  });

  writer.writeUint16(font.firstCode ?? (numbers.length > 0 ? Math.min(...numbers) : 0));
  writer.writeUint16(font.lastCode ?? (numbers.length > 0 ? Math.max(...numbers) : 0));
  writer.writeUint16(definitions.length + 1);

  writer.writeUint16(0);
  writer.writeUint16(metadata.length);

  for (const { index, bytes } of definitions) {
    writer.writeUint16(index);
    writer.writeUint16(bytes.length);
  }

  writer.writeBytes(metadata);

  for (const { bytes } of definitions) {
    writer.writeBytes(bytes);
  }
}

function writeBigFont(
  writer: BinaryWriter,
  font: ResolvedDefinition,
  glyphs: [number, ResolvedGlyph][],
): void {
  const count = glyphs.length + 1;
  const metadata = Uint8Array.from([font.above, font.below, font.modes, 0]);

  writer.writeUint16(count);
  writer.writeUint16(count * BIGFONT_ENTRY_SIZE);
  writer.writeUint16(font.ranges.length);

  for (const { start, end } of font.ranges) {
    writer.writeUint16(start);
    writer.writeUint16(end);
  }

  let offset = writer.position + count * BIGFONT_ENTRY_SIZE;

  writer.writeUint16(0);
  writer.writeUint16(metadata.length);
  writer.writeUint32(offset);
  offset += metadata.length;

  for (const [index, glyph] of glyphs) {
    writer.writeUint16(index);
    writer.writeUint16(glyph.program.length);
    writer.writeUint32(offset);
    offset += glyph.program.length;
  }

  writer.writeBytes(metadata);

  for (const [, glyph] of glyphs) {
    writer.writeBytes(glyph.program);
  }
}
