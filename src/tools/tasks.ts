// ============================================================================
// Workbench MCP Server - Task Management Tools
// ============================================================================

import { TASK_STATUSES } from "../constants.js";
import { defineOperation } from "../schema.js";

export const addTaskOperation = defineOperation({
  name: "task-add",
  title: "Add Task",
  description: `Create a task with status "not complete". Task names are unique.

Args:
  - taskName (string): Unique task name
  - description (string): What the task is about

Returns:
  The created task.`,
  params: {
    taskName: {
      type: "string",
      required: true,
      minLength: 1,
      description: "Name of the task",
    },
    description: {
      type: "string",
      required: true,
      minLength: 1,
      description: "Description of the task",
    },
  },
});

export const listTasksOperation = defineOperation({
  name: "task-list",
  title: "List Tasks",
  description: `List tasks, newest first.

Args:
  - status (optional): "complete" | "not complete" - only tasks with this status

Returns:
  { total, tasks }`,
  params: {
    status: {
      type: "string",
      required: false,
      enum: TASK_STATUSES,
      description: "Only return tasks with this status",
    },
  },
});

export const completeTaskOperation = defineOperation({
  name: "task-complete",
  title: "Set Task Status",
  description: `Mark a task as complete or not complete. Setting the status it already has succeeds without changing anything.

Args:
  - taskName (string): Name of an existing task
  - completionStatus: "complete" | "not complete"

Returns:
  { task, previous_status, changed }`,
  params: {
    taskName: {
      type: "string",
      required: true,
      minLength: 1,
      description: "Name of the task",
    },
    completionStatus: {
      type: "string",
      required: true,
      enum: TASK_STATUSES,
      description: "Completion status",
    },
  },
});
