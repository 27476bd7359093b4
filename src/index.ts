#!/usr/bin/env node

import { createRequire } from "node:module";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { runCli } from "./cli.js";
import { loadConfig } from "./config.js";
import { LOG_PREFIX } from "./constants.js";
import { errorMessage, exitCodeFor } from "./errors.js";
import { createServer } from "./server.js";

const require = createRequire(import.meta.url);
const { version } = require("../package.json") as { version: string };

const args = process.argv.slice(2);

async function runStdio(): Promise<void> {
  const server = createServer(version, loadConfig(process.env));
  const transport = new StdioServerTransport();

  function shutdown(): void {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`${LOG_PREFIX} Failed to close server: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await server.connect(transport);
  console.error(`${LOG_PREFIX} MCP server running on stdio`);
}

if (args[0] === "serve") {
  runStdio().catch((error: unknown) => {
    console.error(`${LOG_PREFIX} Server error: ${errorMessage(error)}`);
    process.exit(exitCodeFor(error));
  });
} else {
  runCli(args, { version }).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(`${LOG_PREFIX} Unexpected error: ${errorMessage(error)}`);
      process.exit(1);
    }
  );
}
