/**
 * SHX Font Parser.
 *
 * Reads the three AutoCAD SHX container layouts into an immutable ShxFont:
 *
 * - shapes:  u16 index table followed by sequential glyph definitions
 * - bigfont: escape ranges, then an index of absolute offsets
 * - unifont: u32 count, font info block, then inline (index, length, bytes)
 *
 * All integers are little-endian. Any read past the end of the data is
 * fatal; there is no partial recovery.
 */

import { bytesToHex } from "#src/helpers/buffer";
import { isGlyphNameByte, STRING_TERMINATORS } from "#src/helpers/chars";
import { decodeSingleByte, decodeUtf8 } from "#src/helpers/strings";
import { BinaryScanner, ShortReadError } from "#src/io/binary-scanner";
import { ShxFontError } from "./errors";
import type { CodeRange, ShxFont, ShxVariant } from "./types";

/** Bytes between the header line and the first table */
const HEADER_PADDING = 2;

/** Unifont font info is read from this absolute offset */
const UNIFONT_INFO_OFFSET = 5;

/** Longest header line isShx() will look at */
const MAX_SNIFF_LENGTH = 128;

const VARIANTS: ReadonlyMap<string, ShxVariant> = new Map<string, ShxVariant>([
  ["shapes", "shapes"],
  ["bigfont", "bigfont"],
  ["unifont", "unifont"],
]);

const VARIANT_LABELS: Record<ShxVariant, string> = {
  shapes: "Shapes",
  bigfont: "BigFont",
  unifont: "Unifont",
};

/**
 * Callback for non-fatal notices during parsing.
 */
export type WarningCallback = (message: string, position: number) => void;

export interface ShxParseOptions {
  /**
   * Receives notices about suspicious but readable data, such as a glyph
   * number defined twice. Silent when omitted.
   */
  onWarning?: WarningCallback;
}

/**
 * Parse an SHX font from bytes.
 *
 * @param data - Font file bytes
 * @param options - Parse options
 * @returns The parsed font
 * @throws {ShxFontError} INVALID_HEADER, UNKNOWN_VARIANT or TRUNCATED_FILE
 */
export function parseShx(data: Uint8Array, options: ShxParseOptions = {}): ShxFont {
  const parser = new ShxParser(data, options);

  try {
    return parser.parse();
  } catch (error) {
    if (error instanceof ShortReadError) {
      throw new ShxFontError("TRUNCATED_FILE", `Truncated SHX file: ${error.message}`, {
        cause: error,
      });
    }

    throw error;
  }
}

/**
 * Quick check if bytes start with a recognizable SHX header line.
 */
export function isShx(data: Uint8Array): boolean {
  const scanner = new BinaryScanner(data.subarray(0, MAX_SNIFF_LENGTH));
  const text = decodeUtf8(scanner.readUntil(STRING_TERMINATORS));

  if (text === null) {
    return false;
  }

  const parts = text.split(" ");

  return parts.length === 3 && VARIANTS.has(parts[1].toLowerCase());
}

/**
 * One-line summary of a font, e.g. `Shapes("txt", 1.0, glyphs: 3)`.
 */
export function describeShxFont(font: ShxFont): string {
  return `${VARIANT_LABELS[font.variant]}("${font.name ?? ""}", ${font.version}, glyphs: ${font.glyphs.size})`;
}

interface Header {
  format: string;
  variant: ShxVariant;
  version: string;
}

interface TableEntry {
  index: number;
  length: number;
}

/**
 * Mutable fields collected while reading; frozen into a ShxFont at the end.
 */
interface FontDraft {
  name: string | null;
  above: number | null;
  below: number | null;
  modes: number | null;
  encoding: number | null;
  embeddable: number | null;
  firstCode: number | null;
  lastCode: number | null;
  ranges: CodeRange[];
  glyphs: Map<number, Uint8Array>;
  aliases: Map<string, number>;
}

/**
 * Internal parser class.
 */
class ShxParser {
  private readonly scanner: BinaryScanner;
  private readonly onWarning: WarningCallback | null;
  private readonly draft: FontDraft = {
    name: null,
    above: null,
    below: null,
    modes: null,
    encoding: null,
    embeddable: null,
    firstCode: null,
    lastCode: null,
    ranges: [],
    glyphs: new Map(),
    aliases: new Map(),
  };

  constructor(data: Uint8Array, options: ShxParseOptions) {
    this.scanner = new BinaryScanner(data);
    this.onWarning = options.onWarning ?? null;
  }

  parse(): ShxFont {
    const header = this.parseHeader();

    switch (header.variant) {
      case "shapes":
        this.parseShapes();
        break;
      case "bigfont":
        this.parseBigFont();
        break;
      case "unifont":
        this.parseUnifont();
        break;
    }

    const draft = this.draft;

    return Object.freeze({
      format: header.format,
      variant: header.variant,
      version: header.version,
      name: draft.name,
      above: draft.above,
      below: draft.below,
      modes: draft.modes,
      encoding: draft.encoding,
      embeddable: draft.embeddable,
      firstCode: draft.firstCode,
      lastCode: draft.lastCode,
      ranges: Object.freeze(draft.ranges.map(range => Object.freeze({ ...range }))),
      glyphs: draft.glyphs,
      aliases: draft.aliases,
    });
  }

  private parseHeader(): Header {
    const text = decodeUtf8(this.scanner.readUntil(STRING_TERMINATORS));

    if (text === null) {
      throw new ShxFontError("INVALID_HEADER", "Header line is not valid text");
    }

    const parts = text.split(" ");

    if (parts.length !== 3) {
      throw new ShxFontError("INVALID_HEADER", `Header information invalid: ${text}`);
    }

    const [format, variantName, version] = parts;
    const variant = VARIANTS.get(variantName.toLowerCase());

    if (variant === undefined) {
      throw new ShxFontError("UNKNOWN_VARIANT", `${variantName} is not a valid shx file type`);
    }

    this.scanner.skip(HEADER_PADDING);

    return { format, variant, version };
  }

  /**
   * Shapes: start, end, count, then `count` (index, length) pairs, then the
   * definitions read back to back.
   *
   * The metadata definition (index 0) is read as name + terminator + three
   * bytes regardless of its declared length. Legacy fonts end that block
   * with an extra zero, so every following definition is read one byte
   * early; stripShapeName() drops that leading zero.
   */
  private parseShapes(): void {
    const scanner = this.scanner;
    const draft = this.draft;

    draft.firstCode = scanner.readUint16();
    draft.lastCode = scanner.readUint16();
    const count = scanner.readUint16();

    const table: TableEntry[] = [];

    for (let i = 0; i < count; i++) {
      const index = scanner.readUint16();
      const length = scanner.readUint16();
      table.push({ index, length });
    }

    let metadataSeen = false;

    for (const { index, length } of table) {
      if (index === 0) {
        if (metadataSeen) {
          throw new ShxFontError("INVALID_HEADER", "Double-initializing glyph data detected");
        }

        metadataSeen = true;
        draft.name = this.readName();
        draft.above = scanner.readUint8();
        draft.below = scanner.readUint8();
        draft.modes = scanner.readUint8();
        continue;
      }

      const position = scanner.position;
      const program = this.stripShapeName(index, scanner.readBytes(length), position);
      this.storeGlyph(index, program, position);
    }
  }

  /**
   * Remove the name prefix of a Shapes definition.
   *
   * - `00 00 ...`: no name; both zeros dropped
   * - `00 NAME 00 ...`: NAME is recorded as an alias when it is made of
   *   A-Z, 0-9, space and &, and dropped with its terminator
   * - `00 ...` otherwise: only the leading zero is dropped
   */
  private stripShapeName(index: number, data: Uint8Array, position: number): Uint8Array {
    if (data.length >= 2 && data[0] === 0 && data[1] === 0) {
      return data.subarray(2);
    }

    if (data.length === 0 || data[0] !== 0) {
      return data;
    }

    const rest = data.subarray(1);
    const end = rest.indexOf(0);

    if (end === -1) {
      return rest;
    }

    const nameBytes = rest.subarray(0, end);

    if (!nameBytes.every(isGlyphNameByte)) {
      this.warn(
        `Glyph ${index} name field is not an identifier: ${bytesToHex(nameBytes)}`,
        position,
      );

      return rest;
    }

    this.draft.aliases.set(decodeSingleByte(nameBytes), index);

    return rest.subarray(end + 1);
  }

  /**
   * BigFont: count, table length, change count, change ranges, then
   * `count` (index, length, offset) records pointing at the definitions.
   */
  private parseBigFont(): void {
    const scanner = this.scanner;
    const draft = this.draft;

    const count = scanner.readUint16();
    const _tableLength = scanner.readUint16();
    const changeCount = scanner.readUint16();

    for (let i = 0; i < changeCount; i++) {
      const start = scanner.readUint16();
      const end = scanner.readUint16();
      draft.ranges.push({ start, end });
    }

    const table: (TableEntry & { offset: number })[] = [];

    for (let i = 0; i < count; i++) {
      const index = scanner.readUint16();
      const length = scanner.readUint16();
      const offset = scanner.readUint32();
      table.push({ index, length, offset });
    }

    for (const { index, length, offset } of table) {
      scanner.moveTo(offset);

      if (index === 0) {
        draft.above = scanner.readUint8();
        draft.below = scanner.readUint8();
        draft.modes = scanner.readUint8();
        continue;
      }

      this.storeGlyph(index, scanner.readBytes(length), offset);
    }
  }

  /**
   * Unifont: glyph count, info length, the font info block read from a fixed
   * offset, then `count - 1` inline (index, length, bytes) records.
   */
  private parseUnifont(): void {
    const scanner = this.scanner;
    const draft = this.draft;

    const count = scanner.readUint32();
    const _infoLength = scanner.readUint16();

    scanner.moveTo(UNIFONT_INFO_OFFSET);
    draft.name = this.readName();
    draft.above = scanner.readUint8();
    draft.below = scanner.readUint8();
    draft.modes = scanner.readUint8();
    draft.encoding = scanner.readUint8();
    draft.embeddable = scanner.readUint8();
    scanner.skip(1);

    for (let i = 0; i < count - 1; i++) {
      const index = scanner.readUint16();
      const length = scanner.readUint16();
      const position = scanner.position;
      this.storeGlyph(index, scanner.readBytes(length), position);
    }
  }

  private readName(): string {
    const bytes = this.scanner.readUntil(STRING_TERMINATORS);
    const text = decodeUtf8(bytes);

    if (text !== null) {
      return text;
    }

    this.warn("Font name is not valid UTF-8; decoded as windows-1252", this.scanner.position);

    return decodeSingleByte(bytes);
  }

  private storeGlyph(index: number, program: Uint8Array, position: number): void {
    if (program.length === 0) {
      this.warn(`Glyph ${index} has an empty program`, position);
    }

    if (this.draft.glyphs.has(index)) {
      this.warn(`Glyph ${index} is defined more than once; keeping the last definition`, position);
    }

    // Copy so later changes to the input buffer cannot reach the font
    this.draft.glyphs.set(index, program.slice());
  }

  private warn(message: string, position: number): void {
    this.onWarning?.(message, position);
  }
}
