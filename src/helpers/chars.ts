/**
 * Byte constants for SHX headers and name fields.
 */

export const NUL = 0x00;
export const LF = 0x0a; // Line Feed
export const CR = 0x0d; // Carriage Return
export const SPACE = 0x20;
export const SUB = 0x1a; // Ctrl-Z, conventionally after the header line

export const CHAR_AMPERSAND = 0x26; // &
export const CHAR_0 = 0x30;
export const CHAR_9 = 0x39;
export const CHAR_A = 0x41;
export const CHAR_Z = 0x5a;

/**
 * Bytes that end a header line or a name field.
 */
export const STRING_TERMINATORS: ReadonlySet<number> = new Set([NUL, LF, CR]);

/**
 * True for bytes allowed in a Shapes glyph name: A-Z, 0-9, space and &.
 */
export function isGlyphNameByte(b: number): boolean {
  return (
    (b >= CHAR_A && b <= CHAR_Z) || (b >= CHAR_0 && b <= CHAR_9) || b === SPACE || b === CHAR_AMPERSAND
  );
}
