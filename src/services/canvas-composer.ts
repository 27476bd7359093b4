import sharp from "sharp";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  LOG_PREFIX,
  PNG_COMPRESSION_LEVEL,
  TIFF_COMPRESSION,
} from "../constants.js";
import type { Alignment, OutputFormat } from "../constants.js";
import { StitchError, errorMessage, invalidInput, toIoError } from "../errors.js";
import type { CanvasPlan, ImageTile, Layout, Placement, RgbColor, TileSize } from "../types.js";

sharp.cache({ items: 10, memory: 200 });
sharp.concurrency(2);

function crossOffset(space: number, size: number, align: Alignment): number {
  return align === "center" ? Math.floor((space - size) / 2) : 0;
}

/**
 * Computes canvas size and tile offsets for a layout.
 *
 * Linear layouts advance along their direction and take the largest tile
 * across it. Grid rows are as tall as their tallest tile and as wide as the
 * sum of their tiles; the canvas is the widest row by the sum of row heights.
 */
export function computeCanvasPlan<T extends TileSize>(
  layout: Layout<T>,
  align: Alignment = "start"
): CanvasPlan<T> {
  const placements: Placement<T>[] = [];

  if (layout.kind === "linear") {
    const { tiles, direction } = layout;
    if (tiles.length === 0) {
      throw invalidInput("Cannot compose an empty layout");
    }

    if (direction === "horizontal") {
      const height = tiles.reduce((max, t) => Math.max(max, t.height), 0);
      let left = 0;
      for (const tile of tiles) {
        placements.push({ tile, left, top: crossOffset(height, tile.height, align) });
        left += tile.width;
      }
      return { width: left, height, placements };
    }

    const width = tiles.reduce((max, t) => Math.max(max, t.width), 0);
    let top = 0;
    for (const tile of tiles) {
      placements.push({ tile, left: crossOffset(width, tile.width, align), top });
      top += tile.height;
    }
    return { width, height: top, placements };
  }

  const rows = layout.rows.filter((row) => row.length > 0);
  if (rows.length === 0) {
    throw invalidInput("Cannot compose an empty layout");
  }

  let width = 0;
  let top = 0;
  for (const row of rows) {
    const rowHeight = row.reduce((max, t) => Math.max(max, t.height), 0);
    let left = 0;
    for (const tile of row) {
      placements.push({ tile, left, top: top + crossOffset(rowHeight, tile.height, align) });
      left += tile.width;
    }
    width = Math.max(width, left);
    top += rowHeight;
  }

  return { width, height: top, placements };
}

/**
 * Decodes one input into raw 8-bit sRGB, flattening any alpha onto the
 * background so every tile shares a colour mode.
 */
export async function loadTile(filePath: string, background: RgbColor): Promise<ImageTile> {
  const resolvedPath = path.resolve(filePath);

  try {
    await fs.access(resolvedPath);
  } catch {
    throw invalidInput(
      `File not found: ${resolvedPath}. Verify the file path is correct and the file exists.`
    );
  }

  try {
    const { data, info } = await sharp(resolvedPath, { limitInputPixels: false })
      .flatten({ background })
      .toColourspace("srgb")
      .removeAlpha()
      .raw({ depth: "uchar" })
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new Error(`expected 3 colour channels after conversion, got ${info.channels}`);
    }

    return {
      filePath: resolvedPath,
      filename: path.basename(resolvedPath),
      width: info.width,
      height: info.height,
      channels: 3,
      data,
    };
  } catch (error) {
    throw new StitchError(
      `Failed to load ${path.basename(resolvedPath)}: ${errorMessage(error)}`,
      { code: "UNSUPPORTED_FORMAT", details: { filePath: resolvedPath }, cause: error }
    );
  }
}

export async function loadTiles(filePaths: string[], background: RgbColor): Promise<ImageTile[]> {
  const tiles: ImageTile[] = [];
  // One at a time: large scans are decoded fully into memory
  for (const filePath of filePaths) {
    tiles.push(await loadTile(filePath, background));
  }
  return tiles;
}

/** Composes the plan onto a background canvas and encodes it in memory. */
export async function renderCanvas(
  plan: CanvasPlan<ImageTile>,
  background: RgbColor,
  format: OutputFormat
): Promise<Buffer> {
  if (plan.width <= 0 || plan.height <= 0) {
    throw invalidInput(`Canvas size ${plan.width}×${plan.height} is empty`);
  }

  const pipeline = sharp({
    create: {
      width: plan.width,
      height: plan.height,
      channels: 3,
      background,
    },
    limitInputPixels: false,
  }).composite(
    plan.placements.map(({ tile, left, top }) => ({
      input: tile.data,
      raw: { width: tile.width, height: tile.height, channels: tile.channels },
      left,
      top,
    }))
  );

  if (format === "png") {
    pipeline.png({ compressionLevel: PNG_COMPRESSION_LEVEL });
  } else {
    pipeline.tiff({ compression: TIFF_COMPRESSION });
  }

  try {
    return await pipeline.toBuffer();
  } catch (error) {
    throw toIoError(error, "encode stitched image");
  }
}

/**
 * Writes the encoded image with a single exclusive write. A failed write
 * removes whatever reached the disk.
 */
export async function writeOutputFile(outputPath: string, data: Buffer): Promise<void> {
  try {
    await fs.writeFile(outputPath, data, { flag: "wx" });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EEXIST") {
      try {
        await fs.unlink(outputPath);
      } catch (err: unknown) {
        // ENOENT = nothing was written.
        if ((err as NodeJS.ErrnoException).code !== "ENOENT") {
          console.warn(`${LOG_PREFIX} Failed to remove partial output ${outputPath}: ${errorMessage(err)}`);
        }
      }
    }
    throw toIoError(error, `write ${outputPath}`);
  }
}

export async function composeLayout(
  layout: Layout<ImageTile>,
  options: { background: RgbColor; align: Alignment; format: OutputFormat }
): Promise<{ plan: CanvasPlan<ImageTile>; data: Buffer }> {
  const plan = computeCanvasPlan(layout, options.align);
  const data = await renderCanvas(plan, options.background, options.format);
  return { plan, data };
}
