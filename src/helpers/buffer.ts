/**
 * Byte array utilities.
 */

/**
 * Concatenate multiple Uint8Arrays into a single Uint8Array.
 *
 * @param arrays - Arrays to concatenate
 * @returns Single Uint8Array containing all data
 */
export function concatBytes(arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;

  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Convert bytes to lowercase hex pairs separated by spaces.
 *
 * @example
 * ```ts
 * bytesToHex(new Uint8Array([0x02, 0x8a, 0x00])) // "02 8a 00"
 * ```
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes, b => b.toString(16).padStart(2, "0")).join(" ");
}

/**
 * Convert a hex string to bytes.
 *
 * Whitespace is ignored. Odd-length strings are padded with trailing 0.
 *
 * @example
 * ```ts
 * hexToBytes("02 8a 00") // Uint8Array([2, 138, 0])
 * ```
 */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/\s/g, "");

  // Pad odd-length with trailing 0
  const padded = clean.length % 2 === 1 ? `${clean}0` : clean;

  const bytes = new Uint8Array(padded.length / 2);

  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(padded.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}
