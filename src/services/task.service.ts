// ============================================================================
// Workbench MCP Server - Task Service
// ============================================================================

import { DuplicateTaskError, TaskNotFoundError } from "../errors.js";
import type { TasksRepo } from "../repositories/index.js";
import type { TaskList, TaskRow, TaskStatus, TaskStatusChange } from "../types.js";

export class TaskService {
    constructor(
        private tasks: TasksRepo,
        private clock: () => Date = () => new Date(),
    ) { }

    /**
     * Insert a task as "not complete". An existing task with the same name is
     * left untouched.
     */
    add(name: string, description: string): TaskRow {
        if (this.tasks.getByName(name)) throw new DuplicateTaskError(name);

        const id = this.tasks.create(this.clock().toISOString(), { name, description });
        const task = this.tasks.getById(id);
        if (!task) throw new TaskNotFoundError(name);
        return task;
    }

    list(status?: TaskStatus): TaskList {
        const tasks = this.tasks.getAll(status);
        return { total: tasks.length, tasks };
    }

    /**
     * Set a task's status. Asking for the status it already has is a no-op
     * that still succeeds, with `changed: false`.
     */
    setStatus(name: string, status: TaskStatus): TaskStatusChange {
        const existing = this.tasks.getByName(name);
        if (!existing) throw new TaskNotFoundError(name);

        if (existing.status === status) {
            return { task: existing, previous_status: existing.status, changed: false };
        }

        this.tasks.updateStatus(name, status, this.clock().toISOString());
        const updated = this.tasks.getByName(name);
        if (!updated) throw new TaskNotFoundError(name);
        return { task: updated, previous_status: existing.status, changed: true };
    }
}
