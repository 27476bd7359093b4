import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SequenceFilesInputSchema } from "../schemas/index.js";
import { sequenceFiles } from "../services/filename-sequencer.js";
import { errorMessage } from "../errors.js";
import { formatRenameReport } from "../format.js";
import { normalizeExtension } from "../utils.js";
import type { StitcherConfig } from "../types.js";

export function registerSequenceFilesTool(server: McpServer, config: StitcherConfig): void {
  server.registerTool(
    "sequence_files",
    {
      title: "Number or Unnumber File Names",
      description: `Add or remove sequential number prefixes on file names in one directory.

"number" sorts the names (byte order, case-sensitive) and renames them to "1 <name>", "2 <name>", …, replacing any existing prefix.
"unnumber" strips a leading "<digits><space>" prefix.

The whole batch is checked first: if two files would get the same name, or a target name already exists, nothing is renamed.
If a rename fails midway, renames already done are kept and the result lists which files changed and which did not.

Args:
  - paths (string[], required): Files in one directory, or a single directory
  - action ("number" | "unnumber", required)
  - extensions (string[], optional): Extensions to pick up from a directory (default: ${config.extensions.join(", ")})`,
      inputSchema: SequenceFilesInputSchema,
      annotations: {
        readOnlyHint: false,
        destructiveHint: false,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    async ({ paths, action, extensions }) => {
      try {
        const report = await sequenceFiles(
          paths,
          action,
          extensions ? extensions.map(normalizeExtension) : config.extensions
        );
        return {
          content: [
            { type: "text" as const, text: formatRenameReport(report) },
            { type: "text" as const, text: JSON.stringify(report, null, 2) },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: `Error renaming files: ${errorMessage(error)}`,
            },
          ],
        };
      }
    }
  );
}
