/**
 * Recording PathSink.
 *
 * GlyphPath keeps every stroke the interpreter reports, in order, and can
 * measure, transform and serialize them as SVG path data.
 */

import { formatNumber } from "#src/helpers/format";
import type { PathSink } from "#src/fontbox/shx/types";

/** Below this, three arc points are treated as collinear */
const COLLINEAR_EPSILON = 1e-9;

const TAU = Math.PI * 2;

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Relocation without drawing */
export type MoveSegment = readonly [x: number, y: number];

export type LineSegment = readonly [x0: number, y0: number, x1: number, y1: number];

/** Arc from (x0, y0) through (cx, cy) to (x1, y1) */
export type ArcSegment = readonly [
  x0: number,
  y0: number,
  cx: number,
  cy: number,
  x1: number,
  y1: number,
];

/**
 * One recorded call. `null` marks a subpath break (`newPath`).
 */
export type PathSegment = MoveSegment | LineSegment | ArcSegment | null;

export interface PathBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface SvgPathOptions {
  /**
   * Negate y so that glyphs (y up) display upright in SVG (y down).
   * @default true
   */
  flipY?: boolean;
}

interface Circle {
  x: number;
  y: number;
  radius: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// GlyphPath
// ─────────────────────────────────────────────────────────────────────────────

export class GlyphPath implements PathSink {
  private readonly recorded: PathSegment[] = [];

  /** Characters rendered into this path */
  characterCount = 0;

  /** Recorded segments in call order */
  get segments(): readonly PathSegment[] {
    return this.recorded;
  }

  newPath(): void {
    this.recorded.push(null);
  }

  move(x: number, y: number): void {
    this.recorded.push([x, y]);
  }

  line(x0: number, y0: number, x1: number, y1: number): void {
    this.recorded.push([x0, y0, x1, y1]);
  }

  arc(x0: number, y0: number, cx: number, cy: number, x1: number, y1: number): void {
    this.recorded.push([x0, y0, cx, cy, x1, y1]);
  }

  characterEnd(): void {
    this.characterCount++;
  }

  /** Drop all recorded segments */
  clear(): void {
    this.recorded.length = 0;
    this.characterCount = 0;
  }

  /**
   * Smallest box containing every move target, line and arc.
   *
   * Arcs contribute their true extent, including the points where the
   * circle crosses an axis-aligned extreme.
   *
   * @returns The box, or null when nothing was recorded
   */
  bounds(): PathBounds | null {
    let minX = Number.POSITIVE_INFINITY;
    let minY = Number.POSITIVE_INFINITY;
    let maxX = Number.NEGATIVE_INFINITY;
    let maxY = Number.NEGATIVE_INFINITY;

    const include = (x: number, y: number) => {
      minX = Math.min(minX, x);
      minY = Math.min(minY, y);
      maxX = Math.max(maxX, x);
      maxY = Math.max(maxY, y);
    };

    for (const segment of this.recorded) {
      if (segment === null) {
        continue;
      }

      for (let i = 0; i < segment.length; i += 2) {
        include(segment[i], segment[i + 1]);
      }

      if (segment.length === 6) {
        for (const [x, y] of arcExtremes(segment)) {
          include(x, y);
        }
      }
    }

    if (minX > maxX) {
      return null;
    }

    return { minX, minY, maxX, maxY };
  }

  /**
   * Scale every coordinate about the origin, in place.
   */
  scale(sx: number, sy: number = sx): this {
    this.map((x, y) => [x * sx, y * sy]);

    return this;
  }

  /**
   * Offset every coordinate, in place.
   */
  translate(tx: number, ty: number): this {
    this.map((x, y) => [x + tx, y + ty]);

    return this;
  }

  /**
   * Serialize as SVG path data using `M`, `L` and `A` commands.
   *
   * A move is written only when the next stroke does not start where the
   * previous one ended. Arcs whose three points are collinear are written
   * as lines; closed arcs (start equals end) are written as two half arcs.
   */
  toSvgPathData(options: SvgPathOptions = {}): string {
    const flip = options.flipY ?? true;
    const fy = (y: number) => (flip ? -y : y);
    const commands: string[] = [];
    let current: { x: number; y: number } | null = null;

    const moveTo = (x: number, y: number) => {
      if (current === null || current.x !== x || current.y !== y) {
        commands.push(`M${formatNumber(x)} ${formatNumber(fy(y))}`);
      }
    };

    for (const segment of this.recorded) {
      if (segment === null) {
        current = null;
        continue;
      }

      if (segment.length === 2) {
        // Deferred until something is drawn from here
        const [x, y] = segment;
        if (current === null || current.x !== x || current.y !== y) {
          current = null;
        }
        continue;
      }

      if (segment.length === 4) {
        const [x0, y0, x1, y1] = segment;
        moveTo(x0, y0);
        commands.push(`L${formatNumber(x1)} ${formatNumber(fy(y1))}`);
        current = { x: x1, y: y1 };
        continue;
      }

      const [x0, y0, cx, cy, x1, y1] = segment;
      moveTo(x0, y0);
      commands.push(...arcCommands(x0, fy(y0), cx, fy(cy), x1, fy(y1)));
      current = { x: x1, y: y1 };
    }

    return commands.join(" ");
  }

  private map(transform: (x: number, y: number) => [number, number]): void {
    for (let i = 0; i < this.recorded.length; i++) {
      const segment = this.recorded[i];

      if (segment === null) {
        continue;
      }

      const out: number[] = [];

      for (let j = 0; j < segment.length; j += 2) {
        out.push(...transform(segment[j], segment[j + 1]));
      }

      this.recorded[i] = toSegment(out);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Geometry
// ─────────────────────────────────────────────────────────────────────────────

function toSegment(values: number[]): PathSegment {
  switch (values.length) {
    case 2:
      return [values[0], values[1]];
    case 4:
      return [values[0], values[1], values[2], values[3]];
    default:
      return [values[0], values[1], values[2], values[3], values[4], values[5]];
  }
}

/**
 * Circle through three points, or null if they are collinear.
 */
export function circleThrough(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
): Circle | null {
  const d = 2 * (x0 * (y1 - y2) + x1 * (y2 - y0) + x2 * (y0 - y1));

  if (Math.abs(d) < COLLINEAR_EPSILON) {
    return null;
  }

  const s0 = x0 * x0 + y0 * y0;
  const s1 = x1 * x1 + y1 * y1;
  const s2 = x2 * x2 + y2 * y2;
  const x = (s0 * (y1 - y2) + s1 * (y2 - y0) + s2 * (y0 - y1)) / d;
  const y = (s0 * (x2 - x1) + s1 * (x0 - x2) + s2 * (x1 - x0)) / d;

  return { x, y, radius: Math.hypot(x0 - x, y0 - y) };
}

/** Angle from `from` to `to` going counter-clockwise, in [0, 2π) */
function ccwSpan(from: number, to: number): number {
  const span = (to - from) % TAU;

  return span < 0 ? span + TAU : span;
}

function arcCommands(
  x0: number,
  y0: number,
  cx: number,
  cy: number,
  x1: number,
  y1: number,
): string[] {
  const end = `${formatNumber(x1)} ${formatNumber(y1)}`;

  if (Math.hypot(x1 - x0, y1 - y0) < COLLINEAR_EPSILON) {
    // Full circle: the control point is diametrically opposite the start
    const r = formatNumber(Math.hypot(cx - x0, cy - y0) / 2);
    const mid = `${formatNumber(cx)} ${formatNumber(cy)}`;

    return [`A${r} ${r} 0 0 1 ${mid}`, `A${r} ${r} 0 0 1 ${end}`];
  }

  const circle = circleThrough(x0, y0, cx, cy, x1, y1);

  if (circle === null) {
    return [`L${end}`];
  }

  // Counter-clockwise in these coordinates is SVG's positive-angle direction
  const ccw = (cx - x0) * (y1 - cy) - (cy - y0) * (x1 - cx) > 0;
  const a0 = Math.atan2(y0 - circle.y, x0 - circle.x);
  const a1 = Math.atan2(y1 - circle.y, x1 - circle.x);
  const span = ccw ? ccwSpan(a0, a1) : ccwSpan(a1, a0);
  const large = span > Math.PI ? 1 : 0;
  const sweep = ccw ? 1 : 0;
  const r = formatNumber(circle.radius);

  return [`A${r} ${r} 0 ${large} ${sweep} ${end}`];
}

/**
 * Points where an arc reaches its leftmost, rightmost, lowest or highest
 * extent, if those lie strictly inside the arc.
 */
function arcExtremes(segment: ArcSegment): [number, number][] {
  const [x0, y0, cx, cy, x1, y1] = segment;
  const closed = Math.hypot(x1 - x0, y1 - y0) < COLLINEAR_EPSILON;
  const circle = closed
    ? { x: (x0 + cx) / 2, y: (y0 + cy) / 2, radius: Math.hypot(cx - x0, cy - y0) / 2 }
    : circleThrough(x0, y0, cx, cy, x1, y1);

  if (circle === null) {
    return [];
  }

  const extremes: [number, number][] = [];
  const a0 = Math.atan2(y0 - circle.y, x0 - circle.x);
  const a1 = Math.atan2(y1 - circle.y, x1 - circle.x);
  const ccw = (cx - x0) * (y1 - cy) - (cy - y0) * (x1 - cx) > 0;
  const span = closed ? TAU : ccw ? ccwSpan(a0, a1) : ccwSpan(a1, a0);
  const from = ccw || closed ? a0 : a1;

  for (let k = 0; k < 4; k++) {
    const angle = (k * Math.PI) / 2;

    if (ccwSpan(from, angle) < span) {
      extremes.push([
        circle.x + circle.radius * Math.cos(angle),
        circle.y + circle.radius * Math.sin(angle),
      ]);
    }
  }

  return extremes;
}
