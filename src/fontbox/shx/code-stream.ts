/**
 * Forward-only byte tape holding the rest of a glyph program.
 *
 * Subshape calls splice the callee's bytes in front of the unread part, so
 * the caller resumes by itself once the callee is consumed. There is no
 * return instruction; the stream only remembers where each spliced program
 * ends so that callers can bound the nesting depth.
 */

import { concatBytes } from "#src/helpers/buffer";
import { ShxFontError } from "./errors";
import { signed8 } from "./opcodes";

export class CodeStream {
  private bytes: Uint8Array;
  private pos = 0;
  /** End offset of every spliced program still running, innermost last */
  private readonly frames: number[] = [];

  constructor(program: Uint8Array) {
    this.bytes = program;
  }

  get isEmpty(): boolean {
    return this.pos >= this.bytes.length;
  }

  /**
   * Number of spliced programs still running.
   *
   * A program counts until a byte past its end has been read, so a call
   * made by its last instruction nests inside it.
   */
  get depth(): number {
    this.dropFinishedFrames();

    return this.frames.length;
  }

  /**
   * Take the next byte.
   * @throws {ShxFontError} EMPTY_STREAM when no bytes are left
   */
  pop(): number {
    if (this.isEmpty) {
      throw new ShxFontError("EMPTY_STREAM", "No codes to pop: glyph program ended mid-instruction");
    }

    return this.bytes[this.pos++];
  }

  /** Take the next byte as a signed value in [-128, 127] */
  popSigned(): number {
    return signed8(this.pop());
  }

  /** Take two bytes as a little-endian uint16 */
  popUint16(): number {
    const low = this.pop();
    const high = this.pop();

    return low | (high << 8);
  }

  /**
   * Discard bytes up to and including the next zero byte.
   * Stops quietly if the stream runs out first.
   */
  skipPastZero(): void {
    while (!this.isEmpty) {
      if (this.bytes[this.pos++] === 0) {
        return;
      }
    }
  }

  /** Put a program in front of the unread bytes */
  splice(program: Uint8Array): void {
    this.dropFinishedFrames();

    const shift = program.length - this.pos;

    for (let i = 0; i < this.frames.length; i++) {
      this.frames[i] += shift;
    }

    this.bytes = concatBytes([program, this.bytes.subarray(this.pos)]);
    this.pos = 0;
    this.frames.push(program.length);
  }

  private dropFinishedFrames(): void {
    while (this.frames.length > 0 && this.frames[this.frames.length - 1] < this.pos) {
      this.frames.pop();
    }
  }
}
