/**
 * Growable byte buffer with little-endian integer writes.
 *
 * SHX containers store every multi-byte integer little-endian, so this
 * writer is the counterpart of BinaryScanner for building font files.
 * The buffer doubles when needed and toBytes() returns a trimmed copy.
 */

const INITIAL_SIZE = 1024;

export class BinaryWriter {
  private buffer = new Uint8Array(INITIAL_SIZE);
  private offset = 0;

  /**
   * Ensure capacity for `needed` more bytes, doubling buffer if necessary.
   */
  private grow(needed: number): void {
    const requiredSize = this.offset + needed;

    if (requiredSize <= this.buffer.length) {
      return;
    }

    let newSize = this.buffer.length;
    while (newSize < requiredSize) {
      newSize *= 2;
    }

    const newBuffer = new Uint8Array(newSize);
    newBuffer.set(this.buffer.subarray(0, this.offset));
    this.buffer = newBuffer;
  }

  /** Current write position (number of bytes written) */
  get position(): number {
    return this.offset;
  }

  /** Write uint8 */
  writeUint8(value: number): void {
    this.grow(1);
    this.buffer[this.offset++] = value & 0xff;
  }

  /** Write uint16 little-endian */
  writeUint16(value: number): void {
    this.writeUint8(value);
    this.writeUint8(value >> 8);
  }

  /** Write uint32 little-endian */
  writeUint32(value: number): void {
    this.writeUint8(value);
    this.writeUint8(value >>> 8);
    this.writeUint8(value >>> 16);
    this.writeUint8(value >>> 24);
  }

  /** Write raw bytes */
  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
  }

  /**
   * Write ASCII string.
   * Characters above 0x7f are truncated to their low byte.
   */
  writeAscii(str: string): void {
    this.grow(str.length);
    for (let i = 0; i < str.length; i++) {
      this.buffer[this.offset++] = str.charCodeAt(i) & 0xff;
    }
  }

  /**
   * Get final bytes.
   * Returns a copy so the internal buffer can be garbage collected.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
