/**
 * Error type for SHX font parsing and glyph interpretation.
 *
 * Container faults make the font unusable. Interpreter faults abort a
 * single render call and leave the parsed font untouched.
 */

import type { z } from "zod";

/**
 * Error codes for SHX failures.
 *
 * Container level:
 * - INVALID_HEADER: header is not three space-separated tokens, or metadata repeats
 * - UNKNOWN_VARIANT: header names a layout other than shapes/bigfont/unifont
 * - TRUNCATED_FILE: a read returned fewer bytes than the layout requires
 *
 * Interpreter level:
 * - DIVIDE_BY_ZERO: divide/multiply vector opcode with a zero factor
 * - STACK_OVERFLOW: fourth push onto the position stack
 * - STACK_UNDERFLOW: pop from an empty position stack
 * - UNRESOLVED_SUBSHAPE: subshape call names a glyph the font lacks
 * - SUBSHAPE_DEPTH_EXCEEDED: subshape calls nest too deep (cycle)
 * - SUBSHAPE_CALLS_EXCEEDED: too many subshape calls within one glyph
 * - EMPTY_STREAM: an opcode needs operand bytes the program does not have
 *
 * Renderer level:
 * - INVALID_OPTIONS: render options failed validation
 */
export type ShxFontErrorCode =
  | "INVALID_HEADER"
  | "UNKNOWN_VARIANT"
  | "TRUNCATED_FILE"
  | "DIVIDE_BY_ZERO"
  | "STACK_OVERFLOW"
  | "STACK_UNDERFLOW"
  | "UNRESOLVED_SUBSHAPE"
  | "SUBSHAPE_DEPTH_EXCEEDED"
  | "SUBSHAPE_CALLS_EXCEEDED"
  | "EMPTY_STREAM"
  | "INVALID_OPTIONS";

export class ShxFontError extends Error {
  readonly code: ShxFontErrorCode;

  constructor(code: ShxFontErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ShxFontError";
    this.code = code;
  }
}

/**
 * Narrow an unknown value to ShxFontError, optionally of a given code.
 */
export function isShxFontError(error: unknown, code?: ShxFontErrorCode): error is ShxFontError {
  if (!(error instanceof ShxFontError)) {
    return false;
  }

  return code === undefined || error.code === code;
}

/**
 * Wrap a failed zod validation as INVALID_OPTIONS, listing every issue as
 * `path: message`.
 */
export function invalidOptionsError(subject: string, error: z.ZodError): ShxFontError {
  const detail = error.issues
    .map(issue => `${issue.path.join(".") || "options"}: ${issue.message}`)
    .join("; ");

  return new ShxFontError("INVALID_OPTIONS", `Invalid ${subject}: ${detail}`, { cause: error });
}
