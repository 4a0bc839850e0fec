// ============================================================================
// Workbench MCP Server - Configuration
// ============================================================================
//
// Built once at startup and passed down explicitly. Nothing below reads
// process.env or process.argv after loadConfig() returns.

import * as path from "path";
import { z } from "zod";
import {
  DATA_DIR_NAME,
  ENV_DATA_DIR,
  ENV_LOG_LEVEL,
  ENV_PROJECT_ROOT,
  ENV_TASK_DB,
  ENV_WORK_LOG,
  TASK_DB_FILE_NAME,
  WORK_LOG_FILE_NAME,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import { findProjectRoot } from "./utils.js";

export interface WorkbenchConfig {
  /** Root that analyze-file paths resolve against and may not escape. */
  projectRoot: string;
  dataDir: string;
  workLogPath: string;
  /** SQLite file for the task store; ":memory:" is accepted. */
  taskDbPath: string;
  logLevel: LogLevel;
}

const configSchema = z.object({
  projectRoot: z.string().min(1),
  dataDir: z.string().min(1),
  workLogPath: z.string().min(1),
  taskDbPath: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
});

/**
 * Read `--name=value` or `--name value` from argv.
 */
export function readFlag(argv: readonly string[], name: string): string | undefined {
  const flag = `--${name}`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(`${flag}=`)) {
      const value = arg.slice(flag.length + 1).trim();
      if (value) return value;
    }
    if (arg === flag) {
      const next = argv[i + 1];
      if (next && !next.startsWith("-")) return next;
    }
  }
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Resolve the server configuration.
 *
 * Priority: CLI flags, then WORKBENCH_* environment variables, then project
 * root detection from `cwd`. Relative paths resolve against `cwd` for the
 * root and against the data directory for the two store files.
 *
 * @throws ConfigError when a resolved value is invalid
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): WorkbenchConfig {
  const rootArg = readFlag(argv, "project-root") ?? nonEmpty(env[ENV_PROJECT_ROOT]);
  const projectRoot = rootArg ? path.resolve(cwd, rootArg) : findProjectRoot(cwd);

  const dataDirArg = readFlag(argv, "data-dir") ?? nonEmpty(env[ENV_DATA_DIR]);
  const dataDir = dataDirArg ? path.resolve(cwd, dataDirArg) : path.join(projectRoot, DATA_DIR_NAME);

  const workLog = nonEmpty(env[ENV_WORK_LOG]);
  const taskDb = nonEmpty(env[ENV_TASK_DB]);

  const parsed = configSchema.safeParse({
    projectRoot,
    dataDir,
    workLogPath: workLog ? path.resolve(dataDir, workLog) : path.join(dataDir, WORK_LOG_FILE_NAME),
    taskDbPath: taskDb === ":memory:" ? taskDb : path.resolve(dataDir, taskDb ?? TASK_DB_FILE_NAME),
    logLevel: nonEmpty(env[ENV_LOG_LEVEL]) ?? "info",
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") ?? "config";
    throw new ConfigError(`Invalid configuration for ${field}: ${issue?.message ?? "invalid value"}`, { field });
  }

  return parsed.data;
}
