import { z } from "zod";
import {
  DEFAULT_EXTENSIONS,
  MAX_GRID_TILES,
  OUTPUT_FORMATS,
  SEQUENCE_ACTIONS,
  STITCH_DIRECTIONS,
} from "../constants.js";

const filePaths = z
  .array(z.string().min(1, "File path cannot be empty"))
  .min(1, "At least one file path is required")
  .describe("Absolute paths of the images to stitch. They are sorted by leading number, then by name.");

const gridHints = {
  rows: z
    .number()
    .int()
    .min(1, "Rows must be a positive integer")
    .optional()
    .describe("Only consider grids with this many rows"),
  cols: z
    .number()
    .int()
    .min(1, "Columns must be a positive integer")
    .optional()
    .describe("Only consider grids with this many columns"),
  aspectRatio: z
    .number()
    .positive("Aspect ratio must be positive")
    .optional()
    .describe("Rank grids by closeness of columns/rows to this ratio"),
};

// Shared output fields — used by stitch-images and stitch-grid
export const outputFields = {
  background: z
    .string()
    .min(1, "Background colour cannot be empty")
    .optional()
    .describe('Background colour for uncovered canvas area: "#rrggbb", "#rgb" or "r,g,b". Default: white'),
  format: z
    .enum(OUTPUT_FORMATS)
    .optional()
    .describe('Output format: "tiff" (LZW, default) or "png"'),
  center: z
    .boolean()
    .default(false)
    .describe("Center tiles on the cross axis instead of aligning them to the top/left"),
};

export const StitchImagesInputSchema = {
  filePaths,
  direction: z
    .enum(STITCH_DIRECTIONS)
    .describe('"horizontal" stitches left to right, "vertical" top to bottom'),
  ...outputFields,
};

export const StitchGridInputSchema = {
  filePaths,
  ...gridHints,
  partial: z
    .boolean()
    .default(false)
    .describe("Allow grids whose last row is incomplete"),
  all: z
    .boolean()
    .default(false)
    .describe("Stitch every candidate grid (and its transpose) instead of only the best one"),
  ...outputFields,
};

export const SuggestGridsInputSchema = {
  count: z
    .number()
    .int()
    .min(1, "Count must be a positive integer")
    .max(MAX_GRID_TILES, `Count must not exceed ${MAX_GRID_TILES}`)
    .describe("Number of images to arrange"),
  ...gridHints,
  partial: z
    .boolean()
    .default(true)
    .describe("Include grids whose last row is incomplete"),
};

export const SequenceFilesInputSchema = {
  paths: z
    .array(z.string().min(1, "Path cannot be empty"))
    .min(1, "At least one path is required")
    .describe("Files in one directory, or a single directory to process every matching file in it"),
  action: z
    .enum(SEQUENCE_ACTIONS)
    .describe('"number" prefixes names with "1 ", "2 ", … in name order; "unnumber" strips such prefixes'),
  extensions: z
    .array(z.string().min(1))
    .min(1)
    .optional()
    .describe(`Extensions to pick up when a directory is given. Default: ${DEFAULT_EXTENSIONS.join(", ")}`),
};
