// ============================================================================
// Workbench MCP Server - Composition Root
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import type { WorkbenchConfig } from "./config.js";
import { openDatabase } from "./database.js";
import { Dispatcher } from "./dispatcher.js";
import type { ToolRegistry } from "./registry.js";
import { createRepositories, type Repositories } from "./repositories/index.js";
import { FileAnalysisService, TaskService, WorkLogService } from "./services/index.js";
import { createDefaultRegistry, createHandlers, type Services } from "./tools/index.js";

export interface Workbench {
  config: WorkbenchConfig;
  db: DatabaseType;
  repos: Repositories;
  services: Services;
  registry: ToolRegistry;
  dispatcher: Dispatcher;
  close(): void;
}

export interface WorkbenchOptions {
  /** Time source for log and task timestamps. */
  clock?: () => Date;
}

/**
 * Wire config → database → repositories → services → registry → dispatcher.
 *
 * @throws DuplicateOperationError if the catalog registers a name twice
 */
export function createWorkbench(config: WorkbenchConfig, options: WorkbenchOptions = {}): Workbench {
  const clock = options.clock ?? (() => new Date());
  const db = openDatabase(config.taskDbPath);
  const repos = createRepositories(db);

  const services: Services = {
    files: new FileAnalysisService(config.projectRoot),
    workLog: new WorkLogService(config.workLogPath, clock),
    tasks: new TaskService(repos.tasks, clock),
  };

  const registry = createDefaultRegistry();
  const dispatcher = new Dispatcher(registry, createHandlers(services));

  return {
    config,
    db,
    repos,
    services,
    registry,
    dispatcher,
    close: () => { if (db.open) db.close(); },
  };
}
