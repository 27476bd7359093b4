import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerStitchImagesTool } from "./tools/stitch-images.js";
import { registerStitchGridTool } from "./tools/stitch-grid.js";
import { registerSuggestGridsTool } from "./tools/suggest-grids.js";
import { registerSequenceFilesTool } from "./tools/sequence-files.js";
import type { StitcherConfig } from "./types.js";

export function createServer(version: string, config: StitcherConfig): McpServer {
  const server = new McpServer({
    name: "image-stitcher",
    version,
  });

  registerStitchImagesTool(server, config);
  registerStitchGridTool(server, config);
  registerSuggestGridsTool(server);
  registerSequenceFilesTool(server, config);

  return server;
}
