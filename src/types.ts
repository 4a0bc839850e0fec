// ============================================================================
// Workbench MCP Server - Type Definitions
// ============================================================================

import type { ANALYSIS_OPTIONS, OPERATION_NAMES, TASK_STATUSES } from "./constants.js";

export type OperationName = typeof OPERATION_NAMES[number];

// ─── Database Row Types ─────────────────────────────────────────────────────

export interface TaskRow {
  id: number;
  name: string;
  description: string | null;
  status: TaskStatus;
  created_at: string;
  updated_at: string;
}

export type TaskStatus = typeof TASK_STATUSES[number];

// ─── Work Log ───────────────────────────────────────────────────────────────

export interface WorkLogEntry {
  /** `YYYY-MM-DD HH:MM:SS`, or null for a line not written in the log format. */
  timestamp: string | null;
  description: string;
  line: string;
}

export interface WorkLogContents {
  total: number;
  entries: WorkLogEntry[];
}

// ─── File Analysis ──────────────────────────────────────────────────────────

export type AnalysisOption = typeof ANALYSIS_OPTIONS[number];

export type FileAnalysis =
  | { file: string; option: "lineCount"; value: number }
  | { file: string; option: "hasTodos"; value: boolean };

// ─── Task Operations ────────────────────────────────────────────────────────

export interface TaskList {
  total: number;
  tasks: TaskRow[];
}

export interface TaskStatusChange {
  task: TaskRow;
  previous_status: TaskStatus;
  changed: boolean;
}
