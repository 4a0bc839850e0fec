// ============================================================================
// Workbench MCP Server - Tasks Repository
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { DEFAULT_TASK_STATUS } from "../constants.js";
import type { TaskRow, TaskStatus } from "../types.js";

export class TasksRepo {
    constructor(private db: DatabaseType) { }

    create(timestamp: string, data: { name: string; description?: string | null; status?: TaskStatus }): number {
        const result = this.db.prepare(
            "INSERT INTO tasks (name, description, status, created_at, updated_at) VALUES (?, ?, ?, ?, ?)"
        ).run(
            data.name,
            data.description ?? null,
            data.status ?? DEFAULT_TASK_STATUS,
            timestamp, timestamp,
        );
        return Number(result.lastInsertRowid);
    }

    updateStatus(name: string, status: TaskStatus, timestamp: string): number {
        return this.db.prepare(
            "UPDATE tasks SET status = ?, updated_at = ? WHERE name = ?"
        ).run(status, timestamp, name).changes;
    }

    getById(id: number): TaskRow | null {
        return (this.db.prepare("SELECT * FROM tasks WHERE id = ?").get(id) as TaskRow | undefined) ?? null;
    }

    getByName(name: string): TaskRow | null {
        return (this.db.prepare("SELECT * FROM tasks WHERE name = ?").get(name) as TaskRow | undefined) ?? null;
    }

    /** Newest first; ties on created_at fall back to insertion order. */
    getAll(status?: TaskStatus): TaskRow[] {
        if (status) {
            return this.db.prepare(
                "SELECT * FROM tasks WHERE status = ? ORDER BY created_at DESC, id DESC"
            ).all(status) as TaskRow[];
        }
        return this.db.prepare(
            "SELECT * FROM tasks ORDER BY created_at DESC, id DESC"
        ).all() as TaskRow[];
    }

    countAll(): number {
        return (this.db.prepare("SELECT COUNT(*) as c FROM tasks").get() as { c: number }).c;
    }
}
