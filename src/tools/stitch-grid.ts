import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StitchGridInputSchema } from "../schemas/index.js";
import { stitchGridQuery } from "../services/stitcher.js";
import { applyOverrides } from "../config.js";
import { errorMessage } from "../errors.js";
import { formatGridBatch, formatStitchResult } from "../format.js";
import type { StitcherConfig } from "../types.js";

export function registerStitchGridTool(server: McpServer, config: StitcherConfig): void {
  server.registerTool(
    "stitch_grid",
    {
      title: "Stitch Images in a Grid",
      description: `Stitch images into a grid, filled left to right, top to bottom.

Without hints the best exact grid for the image count is used (fewest blank cells, then closest to square, then fewer rows).
Each row is as tall as its tallest image; the canvas is as wide as the widest row.
Use suggest_grids first to see the candidates.

Args:
  - filePaths (string[], required): Image paths
  - rows / cols (number, optional): Restrict to grids with this many rows / columns; both select that grid
  - aspectRatio (number, optional): Prefer grids whose cols/rows is closest to this value
  - partial (boolean, optional): Allow an incomplete last row
  - all (boolean, optional): Stitch every candidate and its transpose, one file each
  - background, format, center: As for stitch_images

Output files are named stitched_grid_<rows>x<cols>_<numbers>.<ext>.`,
      inputSchema: StitchGridInputSchema,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    async ({ filePaths, rows, cols, aspectRatio, partial, all, background, format, center }) => {
      try {
        const effective = applyOverrides(config, {
          background,
          format,
          align: center ? "center" : undefined,
        });
        const batch = await stitchGridQuery(
          filePaths,
          { rows, cols, aspectRatio, partial, all },
          effective
        );

        const summary = all
          ? formatGridBatch(batch)
          : batch.results.map(formatStitchResult).join("\n");

        return {
          isError: batch.failures.length > 0,
          content: [
            { type: "text" as const, text: summary },
            { type: "text" as const, text: JSON.stringify(batch, null, 2) },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `Error stitching grid: ${errorMessage(error)}`,
            },
          ],
        };
      }
    }
  );
}
