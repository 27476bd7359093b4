import * as fs from "node:fs/promises";
import * as path from "node:path";
import { MARK_SUFFIX } from "../constants.js";
import { StitchError, invalidInput, toIoError } from "../errors.js";
import { renameExclusive } from "../utils.js";
import type { GapReport } from "../types.js";

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw toIoError(error, `inspect ${p}`);
  }
}

export function isMarked(filePath: string): boolean {
  const name = path.basename(filePath);
  return path.basename(name, path.extname(name)).endsWith(MARK_SUFFIX);
}

export function toggleMarkName(filename: string): string {
  const ext = path.extname(filename);
  const stem = path.basename(filename, ext);
  if (stem.endsWith(MARK_SUFFIX)) {
    return `${stem.slice(0, -MARK_SUFFIX.length)}${ext}`;
  }
  return `${stem}${MARK_SUFFIX}${ext}`;
}

export async function toggleMark(filePath: string): Promise<{ from: string; to: string; marked: boolean }> {
  const from = path.resolve(filePath);
  const name = path.basename(from);
  if (path.basename(name, path.extname(name)) === MARK_SUFFIX) {
    throw invalidInput(`Removing the mark from "${name}" would leave an empty name`);
  }
  const newName = toggleMarkName(name);
  const to = path.join(path.dirname(from), newName);

  if (!(await pathExists(from))) {
    throw invalidInput(`File not found: ${from}`);
  }

  try {
    await renameExclusive(from, to);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "EEXIST") {
      throw new StitchError(`Cannot toggle mark: "${newName}" already exists`, {
        code: "RENAME_CONFLICT",
        details: { from, to },
        cause: error,
      });
    }
    throw toIoError(error, `rename ${from}`);
  }

  return { from, to, marked: isMarked(to) };
}

/**
 * Distance from the start of the list to the first marked file, then between
 * consecutive marked files. On a strip of grid tiles where each row start is
 * marked, the gaps are the column counts.
 */
export function calculateGaps(filePaths: string[]): GapReport {
  const markedIndices: number[] = [];
  filePaths.forEach((p, i) => {
    if (isMarked(p)) markedIndices.push(i);
  });

  const gaps = markedIndices.map((index, i) => (i === 0 ? index : index - markedIndices[i - 1]));

  return {
    gaps,
    markedIndices,
    total: gaps.length,
    sum: gaps.reduce((sum, g) => sum + g, 0),
  };
}
