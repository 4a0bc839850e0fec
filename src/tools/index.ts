// ============================================================================
// Workbench MCP Server - Operation Catalog
// ============================================================================

import type { OperationHandlers } from "../dispatcher.js";
import { ToolRegistry } from "../registry.js";
import type { OperationDescriptor } from "../schema.js";
import type { FileAnalysisService, TaskService, WorkLogService } from "../services/index.js";
import { analyzeFileOperation } from "./analyze-file.js";
import { getWorkLogOperation, logWorkOperation } from "./work-log.js";
import { addTaskOperation, completeTaskOperation, listTasksOperation } from "./tasks.js";

export { analyzeFileOperation } from "./analyze-file.js";
export { getWorkLogOperation, logWorkOperation } from "./work-log.js";
export { addTaskOperation, completeTaskOperation, listTasksOperation } from "./tasks.js";

/** Every operation the server exposes, in advertised order. */
export const OPERATIONS: readonly OperationDescriptor[] = [
  analyzeFileOperation,
  logWorkOperation,
  getWorkLogOperation,
  addTaskOperation,
  listTasksOperation,
  completeTaskOperation,
];

export function createDefaultRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  for (const operation of OPERATIONS) registry.register(operation);
  return registry;
}

export interface Services {
  files: FileAnalysisService;
  workLog: WorkLogService;
  tasks: TaskService;
}

export function createHandlers(services: Services): OperationHandlers {
  return {
    analyzeFile: (file, option) => services.files.analyze(file, option),
    logWork: (description) => services.workLog.append(description),
    getWorkLog: () => services.workLog.read(),
    addTask: (taskName, description) => services.tasks.add(taskName, description),
    listTasks: (status) => services.tasks.list(status),
    completeTask: (taskName, status) => services.tasks.setStatus(taskName, status),
  };
}
