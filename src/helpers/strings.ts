/**
 * Text decoding for the string fields of font files.
 */

const utf8 = new TextDecoder("utf-8", { fatal: true });
const singleByte = new TextDecoder("windows-1252");

/**
 * Decode bytes as strict UTF-8.
 *
 * @returns The decoded text, or null if the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }

    throw error;
  }
}

/**
 * Decode bytes as windows-1252, which maps every byte to a character.
 */
export function decodeSingleByte(bytes: Uint8Array): string {
  return singleByte.decode(bytes);
}
