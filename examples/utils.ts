/**
 * Shared helpers for the examples.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const OUTPUT_DIR = join(dirname(fileURLToPath(import.meta.url)), "output");

/**
 * Write a file under examples/output and return its path.
 */
export async function saveOutput(filename: string, contents: string | Uint8Array) {
  const path = join(OUTPUT_DIR, filename);

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents);

  return path;
}
