import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  MAX_TILE_NUMBER_DIGITS,
  NUMBER_PREFIX_PATTERN,
  OUTPUT_EXTENSIONS,
  OUTPUT_NAME_PREFIX,
} from "../constants.js";
import type { OutputFormat } from "../constants.js";
import { toIoError } from "../errors.js";

function toTileNumber(digits: string): number | null {
  return digits.length > MAX_TILE_NUMBER_DIGITS ? null : parseInt(digits, 10);
}

/**
 * Tile number carried by a file name: the "<n> " prefix written by the
 * sequencer, else the last digit run of the stem ("tile_4.png" → 4).
 * Runs too long to hold exactly give no number.
 */
export function extractTileNumber(filename: string): number | null {
  const base = path.basename(filename);
  const prefixed = base.match(NUMBER_PREFIX_PATTERN);
  if (prefixed) return toTileNumber(prefixed[1]);

  const stem = path.basename(base, path.extname(base));
  const match = stem.match(/(\d+)(?!.*\d)/);
  return match ? toTileNumber(match[1]) : null;
}

/**
 * Collapses numbers into ranges: [1, 2, 4, 7, 8, 9] → "1-2_4_7-9".
 */
export function formatTileRanges(numbers: number[]): string {
  if (numbers.length === 0) return "";

  const sorted = [...new Set(numbers)].sort((a, b) => a - b);
  const ranges: string[] = [];
  let start = sorted[0];
  let end = sorted[0];

  const flush = () => {
    ranges.push(start === end ? String(start) : `${start}-${end}`);
  };

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i] === end + 1) {
      end = sorted[i];
    } else {
      flush();
      start = sorted[i];
      end = sorted[i];
    }
  }
  flush();

  return ranges.join("_");
}

export function collectTileNumbers(filePaths: string[]): number[] {
  const numbers: number[] = [];
  for (const filePath of filePaths) {
    const n = extractTileNumber(filePath);
    if (n !== null) numbers.push(n);
  }
  return numbers;
}

export function buildBaseName(label: string, numbers: number[]): string {
  const tokens = formatTileRanges(numbers);
  return tokens ? `${OUTPUT_NAME_PREFIX}_${label}_${tokens}` : `${OUTPUT_NAME_PREFIX}_${label}`;
}

export function gridLabel(rows: number, cols: number): string {
  return `grid_${rows}x${cols}`;
}

/**
 * First free name in `outputDir`: "<base><ext>", then "<base>_1<ext>",
 * "<base>_2<ext>", …
 */
export async function resolveOutputPath(
  outputDir: string,
  label: string,
  numbers: number[],
  format: OutputFormat
): Promise<string> {
  const ext = OUTPUT_EXTENSIONS[format];
  const base = buildBaseName(label, numbers);

  let entries: string[];
  try {
    entries = await fs.readdir(outputDir);
  } catch (error) {
    throw toIoError(error, `list ${outputDir}`);
  }
  const taken = new Set(entries);

  let candidate = `${base}${ext}`;
  let counter = 1;
  while (taken.has(candidate)) {
    candidate = `${base}_${counter}${ext}`;
    counter++;
  }

  return path.join(outputDir, candidate);
}
