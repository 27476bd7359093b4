import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SuggestGridsInputSchema } from "../schemas/index.js";
import { enumerateGrids } from "../services/grid-enumerator.js";
import { errorMessage } from "../errors.js";
import { formatGridCandidates } from "../format.js";

export function registerSuggestGridsTool(server: McpServer): void {
  server.registerTool(
    "suggest_grids",
    {
      title: "Suggest Grid Layouts",
      description: `List the rows × columns grids that fit a number of images, best fit first.

Exact grids (rows × cols == count) are marked PERFECT. Partial grids leave blank cells in the last row only, never a whole empty row or column.

Args:
  - count (number, required): Number of images
  - rows / cols (number, optional): Restrict to grids with this many rows / columns
  - aspectRatio (number, optional): Rank by closeness of cols/rows to this value
  - partial (boolean, optional): Include partial grids (default: true)

Returns a text list and JSON candidates { rows, cols, blanks, exact }.`,
      inputSchema: SuggestGridsInputSchema,
      annotations: {
        readOnlyHint: true,
        destructiveHint: false,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    async ({ count, rows, cols, aspectRatio, partial }) => {
      try {
        const grids = enumerateGrids(count, { rows, cols, aspectRatio, partial });
        return {
          content: [
            { type: "text" as const, text: formatGridCandidates(count, grids) },
            { type: "text" as const, text: JSON.stringify(grids, null, 2) },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `Error suggesting grids: ${errorMessage(error)}`,
            },
          ],
        };
      }
    }
  );
}
