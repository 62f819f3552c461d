/**
 * Number formatting for path output.
 */

/**
 * Format a coordinate for SVG path data.
 *
 * - Integers are written without decimal point
 * - Reals use at most `precision` decimals, trailing zeros stripped
 * - Negative zero is written as "0"
 */
export function formatNumber(value: number, precision = 5): string {
  if (Number.isInteger(value)) {
    return Object.is(value, -0) ? "0" : value.toString();
  }

  let str = value.toFixed(precision);

  // Remove trailing zeros and unnecessary decimal point
  str = str.replace(/\.?0+$/, "");

  // Rounded to zero, e.g. "-0.000001" -> "-0" or ""
  if (str === "" || str === "-" || str === "-0") {
    return "0";
  }

  return str;
}
