import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StitchImagesInputSchema } from "../schemas/index.js";
import { stitchLinear } from "../services/stitcher.js";
import { applyOverrides } from "../config.js";
import { errorMessage } from "../errors.js";
import { formatStitchResult } from "../format.js";
import type { StitcherConfig } from "../types.js";

export function registerStitchImagesTool(server: McpServer, config: StitcherConfig): void {
  server.registerTool(
    "stitch_images",
    {
      title: "Stitch Images in a Row or Column",
      description: `Stitch images into one image, left to right or top to bottom.

Inputs are filtered to ${config.extensions.join(", ")} and ordered by leading number ("1 scan.png"), then by name.
The canvas is as long as all images together and as wide as the largest one; uncovered area is filled with the background colour.
The result is written next to the first input as stitched_<direction>_<numbers>.<ext>, e.g. stitched_horizontal_1-2_4.tif.

Args:
  - filePaths (string[], required): Image paths
  - direction ("horizontal" | "vertical", required)
  - background (string, optional): "#rrggbb", "#rgb" or "r,g,b"
  - format ("tiff" | "png", optional): Output format (default: ${config.format})
  - center (boolean, optional): Center images on the cross axis`,
      inputSchema: StitchImagesInputSchema,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    async ({ filePaths, direction, background, format, center }) => {
      try {
        const effective = applyOverrides(config, {
          background,
          format,
          align: center ? "center" : undefined,
        });
        const result = await stitchLinear(filePaths, direction, effective);

        return {
          content: [
            { type: "text" as const, text: formatStitchResult(result) },
            { type: "text" as const, text: JSON.stringify(result, null, 2) },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `Error stitching images: ${errorMessage(error)}`,
            },
          ],
        };
      }
    }
  );
}
