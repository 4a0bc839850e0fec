// ============================================================================
// Workbench MCP Server - Constants
// ============================================================================

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import path from "path";

const _pkgPath = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../package.json");
const _pkg: unknown = JSON.parse(readFileSync(_pkgPath, "utf-8"));

function readVersion(pkg: unknown): string {
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const SERVER_NAME = "workbench-mcp-server";
export const SERVER_VERSION: string = readVersion(_pkg);

// Storage
export const DATA_DIR_NAME = ".workbench";
export const WORK_LOG_FILE_NAME = "work_log.txt";
export const TASK_DB_FILE_NAME = "tasks.db";
export const DB_VERSION = 1;

// Operations, in registration order
export const OPERATION_NAMES = [
  "analyze-file",
  "log-work",
  "get-work-log",
  "task-add",
  "task-list",
  "task-complete",
] as const;

// Analysis
export const ANALYSIS_OPTIONS = ["lineCount", "hasTodos"] as const;
export const TODO_MARKER = "TODO";

// Tasks
export const TASK_STATUSES = ["complete", "not complete"] as const;
export const DEFAULT_TASK_STATUS = "not complete";

// Project root markers, checked while walking up from cwd
export const PROJECT_MARKERS = [
  ".git",
  DATA_DIR_NAME,
] as const;

// Environment variables
export const ENV_PROJECT_ROOT = "WORKBENCH_PROJECT_ROOT";
export const ENV_DATA_DIR = "WORKBENCH_DATA_DIR";
export const ENV_WORK_LOG = "WORKBENCH_WORK_LOG";
export const ENV_TASK_DB = "WORKBENCH_TASK_DB";
export const ENV_LOG_LEVEL = "WORKBENCH_LOG_LEVEL";
