/**
 * Example: Render Text to SVG
 *
 * Builds a tiny Shapes font in memory, loads it back, and renders two lines
 * of text as single-stroke SVG paths.
 *
 * Run: npx tsx examples/01-basics/render-svg.ts
 */

import { buildShxFont, StrokeFont } from "../../src/index";
import { saveOutput } from "../utils";

// Glyph programs: "L" is a stem and a foot, "T" a bar and a stem, and " " a
// pen-up advance. Each ends with a pen-up move to the next origin.
const glyphs = new Map([
  [0x4c, Uint8Array.from([0x02, 0x84, 0x01, 0x8c, 0x60, 0x02, 0x20])],
  [0x54, Uint8Array.from([0x02, 0x84, 0x01, 0x60, 0x02, 0x38, 0x01, 0x8c, 0x02, 0x50])],
  [0x20, Uint8Array.from([0x02, 0x80])],
]);

async function main() {
  const bytes = buildShxFont({ variant: "shapes", name: "demo", above: 8, below: 2, glyphs });
  const font = StrokeFont.load(bytes);

  console.log(`Loaded ${font}`);

  const { path, lines } = font.toPath("TLT\nLT T", { fontSize: 32, align: "middle" });
  const box = path.bounds();

  if (box === null) {
    throw new Error("Nothing was drawn");
  }

  for (const [i, line] of lines.entries()) {
    console.log(`Line ${i + 1}: x ${line.startX.toFixed(1)}, width ${line.width.toFixed(1)}`);
  }

  const margin = 8;
  // SVG y grows downward, so the flipped box runs from -maxY to -minY
  const viewBox = [
    box.minX - margin,
    -box.maxY - margin,
    box.maxX - box.minX + 2 * margin,
    box.maxY - box.minY + 2 * margin,
  ].join(" ");

  const svg = [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${viewBox}">`,
    `  <path d="${path.toSvgPathData()}" fill="none" stroke="black" stroke-width="1.5"/>`,
    "</svg>",
    "",
  ].join("\n");

  const file = await saveOutput("render-svg.svg", svg);

  console.log(`Wrote ${file}`);
}

main().catch(error => {
  console.error(error);
  process.exitCode = 1;
});
