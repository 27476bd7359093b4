import type { StitchDirection } from "../constants.js";
import { invalidInput } from "../errors.js";
import type { GridCandidate, GridQuery, Layout, TileSize } from "../types.js";

function assertTileCount(count: number): void {
  if (!Number.isInteger(count) || count <= 0) {
    throw invalidInput(`Tile count must be a positive integer, got ${count}`);
  }
}

function assertHint(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value <= 0)) {
    throw invalidInput(`${name} must be a positive integer, got ${value}`);
  }
}

function candidate(rows: number, cols: number, count: number): GridCandidate {
  const blanks = rows * cols - count;
  return { rows, cols, blanks, exact: blanks === 0 };
}

/**
 * A grid fits when every row and every column holds at least one tile
 * under row-major fill: rows*cols >= count and the blank cells number
 * fewer than one full row.
 */
export function isValidGrid(rows: number, cols: number, count: number): boolean {
  return rows >= 1 && cols >= 1 && rows <= count && cols <= count &&
    rows * cols >= count && rows * cols - count < cols;
}

export function exactGrids(count: number): GridCandidate[] {
  assertTileCount(count);
  const grids: GridCandidate[] = [];
  for (let rows = 1; rows <= count; rows++) {
    if (count % rows === 0) {
      grids.push(candidate(rows, count / rows, count));
    }
  }
  return grids;
}

export function partialGrids(count: number): GridCandidate[] {
  assertTileCount(count);
  const grids: GridCandidate[] = [];
  for (let rows = 1; rows <= count; rows++) {
    for (let cols = Math.ceil(count / rows); cols <= count; cols++) {
      // (rows - 1) * cols grows with cols, so the first miss ends this row count
      if ((rows - 1) * cols >= count) break;
      grids.push(candidate(rows, cols, count));
    }
  }
  return grids;
}

function compareFit(a: GridCandidate, b: GridCandidate): number {
  return (
    a.blanks - b.blanks ||
    Math.abs(a.rows - a.cols) - Math.abs(b.rows - b.cols) ||
    a.rows - b.rows
  );
}

export function rankGrids(grids: GridCandidate[], aspectRatio?: number): GridCandidate[] {
  const sorted = [...grids];
  if (aspectRatio === undefined) {
    return sorted.sort(compareFit);
  }
  const distance = (g: GridCandidate) => Math.abs(g.cols / g.rows - aspectRatio);
  return sorted.sort((a, b) => distance(a) - distance(b) || compareFit(a, b));
}

/**
 * Lists the grids that can hold `count` tiles, best fit first.
 *
 * Without hints only exact divisor grids are returned unless `partial` is set.
 * A rows or cols hint searches partial grids too and keeps the matching ones.
 */
export function enumerateGrids(count: number, query: GridQuery = {}): GridCandidate[] {
  assertTileCount(count);
  assertHint("Rows", query.rows);
  assertHint("Columns", query.cols);
  if (query.aspectRatio !== undefined && !(query.aspectRatio > 0 && Number.isFinite(query.aspectRatio))) {
    throw invalidInput(`Aspect ratio must be a positive number, got ${query.aspectRatio}`);
  }

  const { rows, cols } = query;
  const hinted = rows !== undefined || cols !== undefined;

  if (rows !== undefined && cols !== undefined) {
    if (!isValidGrid(rows, cols, count)) {
      throw invalidInput(
        `A ${rows}×${cols} grid cannot hold ${count} tiles without an empty row or column`
      );
    }
    return [candidate(rows, cols, count)];
  }

  const pool = hinted || query.partial ? partialGrids(count) : exactGrids(count);
  const matches = pool.filter(
    (g) => (rows === undefined || g.rows === rows) && (cols === undefined || g.cols === cols)
  );

  if (matches.length === 0) {
    const hint = rows !== undefined ? `${rows} rows` : `${cols} columns`;
    throw invalidInput(`No grid with ${hint} fits ${count} tiles`);
  }

  return rankGrids(matches, query.aspectRatio);
}

/**
 * Candidates for "stitch all": each grid plus its transpose when that is
 * valid too, deduplicated and ordered by rows then columns.
 */
export function expandWithTransposes(grids: GridCandidate[], count: number): GridCandidate[] {
  const seen = new Map<string, GridCandidate>();
  for (const g of grids) {
    seen.set(`${g.rows}x${g.cols}`, g);
    if (isValidGrid(g.cols, g.rows, count)) {
      seen.set(`${g.cols}x${g.rows}`, candidate(g.cols, g.rows, count));
    }
  }
  return [...seen.values()].sort((a, b) => a.rows - b.rows || a.cols - b.cols);
}

/** Fills a rows×cols grid left-to-right, top-to-bottom. */
export function buildGridLayout<T extends TileSize>(tiles: T[], rows: number, cols: number): Layout<T> {
  if (tiles.length === 0) {
    throw invalidInput("Cannot lay out an empty tile list");
  }
  if (!isValidGrid(rows, cols, tiles.length)) {
    throw invalidInput(
      `A ${rows}×${cols} grid cannot hold ${tiles.length} tiles without an empty row or column`
    );
  }

  const gridRows: T[][] = [];
  for (let r = 0; r < rows; r++) {
    gridRows.push(tiles.slice(r * cols, (r + 1) * cols));
  }
  return { kind: "grid", rows: gridRows };
}

export function buildLinearLayout<T extends TileSize>(
  tiles: T[],
  direction: StitchDirection
): Layout<T> {
  if (tiles.length === 0) {
    throw invalidInput("Cannot lay out an empty tile list");
  }
  return { kind: "linear", direction, tiles: [...tiles] };
}
