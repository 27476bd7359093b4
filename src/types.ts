import type { Alignment, OutputFormat, StitchDirection } from "./constants.js";

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface TileSize {
  width: number;
  height: number;
}

/** A decoded input image, normalized to raw 8-bit sRGB. */
export interface ImageTile extends TileSize {
  filePath: string;
  filename: string;
  channels: 3;
  data: Buffer;
}

export type Layout<T extends TileSize = ImageTile> =
  | { kind: "linear"; direction: StitchDirection; tiles: T[] }
  | { kind: "grid"; rows: T[][] };

export interface Placement<T extends TileSize = ImageTile> {
  tile: T;
  left: number;
  top: number;
}

export interface CanvasPlan<T extends TileSize = ImageTile> {
  width: number;
  height: number;
  placements: Placement<T>[];
}

export interface GridCandidate {
  rows: number;
  cols: number;
  blanks: number;
  exact: boolean;
}

export interface GridQuery {
  rows?: number;
  cols?: number;
  partial?: boolean;
  aspectRatio?: number; // target cols / rows
}

export interface StitcherConfig {
  background: RgbColor;
  extensions: string[];
  format: OutputFormat;
  align: Alignment;
}

export interface StitchResult {
  outputPath: string;
  label: string;
  width: number;
  height: number;
  tileCount: number;
  blanks: number;
}

export interface GridBatchResult {
  results: StitchResult[];
  failures: Array<{ rows: number; cols: number; message: string }>;
}

export interface RenameEntry {
  source: string;
  prefix: number | null;
  target: string;
}

export interface RenamePlan {
  directory: string;
  changes: RenameEntry[];
  unchanged: RenameEntry[];
}

export interface RenameReport {
  directory: string;
  renamed: RenameEntry[];
  unchanged: RenameEntry[];
}

export interface GapReport {
  gaps: number[];
  markedIndices: number[];
  total: number;
  sum: number;
}
