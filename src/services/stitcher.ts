import * as fs from "node:fs/promises";
import type { Stats } from "node:fs";
import * as path from "node:path";
import type { StitchDirection } from "../constants.js";
import { errorMessage, invalidInput, toIoError } from "../errors.js";
import { compareImagePaths, hasExtension } from "../utils.js";
import type {
  GridBatchResult,
  GridCandidate,
  GridQuery,
  ImageTile,
  Layout,
  StitchResult,
  StitcherConfig,
} from "../types.js";
import { composeLayout, loadTiles, writeOutputFile } from "./canvas-composer.js";
import {
  buildGridLayout,
  buildLinearLayout,
  enumerateGrids,
  expandWithTransposes,
} from "./grid-enumerator.js";
import { collectTileNumbers, gridLabel, resolveOutputPath } from "./output-namer.js";

/**
 * Keeps the paths with a configured extension and puts them in stitch order.
 */
export function prepareImagePaths(filePaths: string[], extensions: readonly string[]): string[] {
  if (filePaths.length === 0) {
    throw invalidInput("No images provided");
  }

  const matching = filePaths
    .filter((p) => hasExtension(p, extensions))
    .map((p) => path.resolve(p));

  if (matching.length === 0) {
    throw invalidInput(`No ${extensions.join(", ")} files provided`);
  }

  return matching.sort(compareImagePaths);
}

/**
 * Expands directory arguments into the matching files inside them, keeps
 * matching file arguments, and returns everything in stitch order.
 */
export async function collectImagePaths(paths: string[], extensions: readonly string[]): Promise<string[]> {
  const found: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(p);
    let stats: Stats;
    try {
      stats = await fs.stat(resolved);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        throw invalidInput(`Path not found: ${resolved}`);
      }
      throw toIoError(error, `inspect ${resolved}`);
    }

    if (stats.isDirectory()) {
      let entries: string[];
      try {
        entries = await fs.readdir(resolved);
      } catch (error) {
        throw toIoError(error, `list ${resolved}`);
      }
      for (const name of entries) {
        if (hasExtension(name, extensions)) found.push(path.join(resolved, name));
      }
    } else if (hasExtension(resolved, extensions)) {
      found.push(resolved);
    }
  }

  if (found.length === 0) {
    throw invalidInput(`No images found with extensions: ${extensions.join(", ")}`);
  }

  return found.sort(compareImagePaths);
}

async function stitchLayout(
  layout: Layout<ImageTile>,
  orderedPaths: string[],
  label: string,
  blanks: number,
  config: StitcherConfig
): Promise<StitchResult> {
  const { plan, data } = await composeLayout(layout, config);
  const outputPath = await resolveOutputPath(
    path.dirname(orderedPaths[0]),
    label,
    collectTileNumbers(orderedPaths),
    config.format
  );
  await writeOutputFile(outputPath, data);

  return {
    outputPath,
    label,
    width: plan.width,
    height: plan.height,
    tileCount: plan.placements.length,
    blanks,
  };
}

export async function stitchLinear(
  filePaths: string[],
  direction: StitchDirection,
  config: StitcherConfig
): Promise<StitchResult> {
  const ordered = prepareImagePaths(filePaths, config.extensions);
  const tiles = await loadTiles(ordered, config.background);
  return stitchLayout(buildLinearLayout(tiles, direction), ordered, direction, 0, config);
}

export async function stitchGrid(
  filePaths: string[],
  rows: number,
  cols: number,
  config: StitcherConfig
): Promise<StitchResult> {
  const ordered = prepareImagePaths(filePaths, config.extensions);
  const tiles = await loadTiles(ordered, config.background);
  const layout = buildGridLayout(tiles, rows, cols);
  return stitchLayout(layout, ordered, gridLabel(rows, cols), rows * cols - tiles.length, config);
}

/**
 * Stitches one output per candidate grid, decoding the inputs once. A failed
 * candidate is recorded and the batch carries on.
 */
export async function stitchAllGrids(
  filePaths: string[],
  candidates: GridCandidate[],
  config: StitcherConfig,
  onProgress?: (done: number, total: number, grid: GridCandidate) => void
): Promise<GridBatchResult> {
  const ordered = prepareImagePaths(filePaths, config.extensions);
  const tiles = await loadTiles(ordered, config.background);

  const results: StitchResult[] = [];
  const failures: GridBatchResult["failures"] = [];

  for (const [i, grid] of candidates.entries()) {
    onProgress?.(i + 1, candidates.length, grid);
    try {
      const layout = buildGridLayout(tiles, grid.rows, grid.cols);
      results.push(
        await stitchLayout(layout, ordered, gridLabel(grid.rows, grid.cols), grid.blanks, config)
      );
    } catch (error) {
      failures.push({ rows: grid.rows, cols: grid.cols, message: errorMessage(error) });
    }
  }

  return { results, failures };
}

/**
 * Grid stitch driven by hints: the best-ranked candidate, or with `all`
 * every candidate plus transposes.
 */
export async function stitchGridQuery(
  filePaths: string[],
  query: GridQuery & { all?: boolean },
  config: StitcherConfig,
  onProgress?: (done: number, total: number, grid: GridCandidate) => void
): Promise<GridBatchResult> {
  const count = prepareImagePaths(filePaths, config.extensions).length;
  const candidates = enumerateGrids(count, query);

  if (query.all) {
    return stitchAllGrids(filePaths, expandWithTransposes(candidates, count), config, onProgress);
  }

  const best = candidates[0];
  const result = await stitchGrid(filePaths, best.rows, best.cols, config);
  return { results: [result], failures: [] };
}
