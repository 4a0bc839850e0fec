// ============================================================================
// Workbench MCP Server - Services Barrel Export
// ============================================================================

export { FileAnalysisService } from "./file-analysis.service.js";
export { WorkLogService, parseEntry } from "./work-log.service.js";
export { TaskService } from "./task.service.js";
