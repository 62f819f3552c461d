/**
 * Little-endian binary reader over a Uint8Array.
 *
 * Every read is bounds-checked: asking for more bytes than remain throws
 * ShortReadError instead of returning partial data.
 */

/**
 * Thrown when a read runs past the end of the data.
 */
export class ShortReadError extends Error {
  readonly position: number;
  readonly requested: number;
  readonly available: number;

  constructor(position: number, requested: number, available: number) {
    super(
      `Short read at offset ${position}: requested ${requested} byte(s), ${available} available`,
    );
    this.name = "ShortReadError";
    this.position = position;
    this.requested = requested;
    this.available = available;
  }
}

export class BinaryScanner {
  private readonly data: Uint8Array;
  private pos = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /** Current read offset */
  get position(): number {
    return this.pos;
  }

  /**
   * Seek to an absolute offset.
   * Seeking past the end is allowed; the next read fails.
   */
  moveTo(offset: number): void {
    this.pos = Math.max(0, offset);
  }

  /** Advance by n bytes without reading them */
  skip(n: number): void {
    this.require(n);
    this.pos += n;
  }

  /** Read uint8 */
  readUint8(): number {
    this.require(1);

    return this.data[this.pos++];
  }

  /** Read uint16 little-endian */
  readUint16(): number {
    this.require(2);

    const value = this.data[this.pos] | (this.data[this.pos + 1] << 8);
    this.pos += 2;

    return value;
  }

  /** Read uint32 little-endian */
  readUint32(): number {
    this.require(4);

    const value =
      (this.data[this.pos] |
        (this.data[this.pos + 1] << 8) |
        (this.data[this.pos + 2] << 16) |
        (this.data[this.pos + 3] << 24)) >>>
      0;
    this.pos += 4;

    return value;
  }

  /**
   * Read exactly n bytes.
   * Returns a view into the underlying data, not a copy.
   */
  readBytes(n: number): Uint8Array {
    this.require(n);

    const bytes = this.data.subarray(this.pos, this.pos + n);
    this.pos += n;

    return bytes;
  }

  /**
   * Read bytes up to (and consuming) the first terminator byte.
   *
   * The terminator is not part of the result. Running out of data ends the
   * run without error, the same as reading a terminator.
   */
  readUntil(terminators: ReadonlySet<number>): Uint8Array {
    const start = this.pos;

    while (this.pos < this.data.length) {
      const b = this.data[this.pos++];

      if (terminators.has(b)) {
        return this.data.subarray(start, this.pos - 1);
      }
    }

    return this.data.subarray(start, this.pos);
  }

  private require(n: number): void {
    if (n < 0 || this.pos + n > this.data.length) {
      throw new ShortReadError(this.pos, n, Math.max(0, this.data.length - this.pos));
    }
  }
}
