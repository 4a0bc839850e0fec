// ============================================================================
// Workbench MCP Server - Repository Barrel Export
// ============================================================================

export { TasksRepo } from "./tasks.repo.js";

import type { Database as DatabaseType } from "better-sqlite3";
import { TasksRepo } from "./tasks.repo.js";

export interface Repositories {
    tasks: TasksRepo;
}

/**
 * Create all repository instances from a single database connection.
 */
export function createRepositories(db: DatabaseType): Repositories {
    return {
        tasks: new TasksRepo(db),
    };
}
