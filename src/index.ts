#!/usr/bin/env node
// ============================================================================
// Workbench MCP Server - Entry Point
//
//   File analysis, an append-only work log and a task list, served to a local
//   agent over the Model Context Protocol on stdio.
// ============================================================================

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import { log } from "./logger.js";
import { createMcpServer } from "./server.js";
import { createDefaultRegistry } from "./tools/index.js";
import { createWorkbench } from "./workbench.js";

const USAGE = `${SERVER_NAME} v${SERVER_VERSION}

Usage: workbench-mcp [options]

Options:
  --project-root <path>   Root that analyze-file paths resolve against
  --data-dir <path>       Directory for work_log.txt and tasks.db (default: <root>/.workbench)
  --list                  Print the operation catalog and exit
  -v, --version           Print the version and exit
  -h, --help              Show this help

Environment:
  WORKBENCH_PROJECT_ROOT, WORKBENCH_DATA_DIR, WORKBENCH_WORK_LOG,
  WORKBENCH_TASK_DB, WORKBENCH_LOG_LEVEL (debug | info | warn | error)
`;

function printCatalog(): void {
  for (const op of createDefaultRegistry().list()) {
    const params = Object.entries(op.params)
      .map(([name, spec]) => (spec.required ? name : `${name}?`))
      .join(", ");
    console.log(`${op.name}(${params}): ${op.description.split("\n")[0]}`);
  }
}

// ─── Initialize ───────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return;
  }
  if (args.includes("--version") || args.includes("-v")) {
    console.log(SERVER_VERSION);
    return;
  }
  if (args.includes("--list")) {
    printCatalog();
    return;
  }

  const config = loadConfig(args);
  log.setLevel(config.logLevel);
  log.info(`Project root: ${config.projectRoot}`);

  const workbench = createWorkbench(config);
  log.info(`Task store at ${config.taskDbPath}, work log at ${config.workLogPath}`);

  const server = createMcpServer(workbench.registry, workbench.dispatcher);
  log.info(`${SERVER_NAME} v${SERVER_VERSION} - ${workbench.registry.size} operations registered`);

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down.`);
    workbench.close();
    process.exit(0);
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  // ─── Connect Transport ───────────────────────────────────────────

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info("Running on stdio transport. Ready.");
}

// ─── Run ──────────────────────────────────────────────────────────────

main().catch((error: unknown) => {
  log.error("Fatal error", { message: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
