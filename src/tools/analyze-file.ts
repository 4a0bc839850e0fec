// ============================================================================
// Workbench MCP Server - analyze-file
// ============================================================================

import { ANALYSIS_OPTIONS } from "../constants.js";
import { defineOperation } from "../schema.js";

export const analyzeFileOperation = defineOperation({
  name: "analyze-file",
  title: "Analyze File",
  description: `Analyze a file under the project root.

Args:
  - path (string): File path, relative to the project root or absolute inside it
  - option: "lineCount" | "hasTodos"

Returns:
  { file, option, value } - value is the line count for lineCount, or whether the
  file contains the exact, case-sensitive text "TODO" for hasTodos.`,
  params: {
    path: {
      type: "string",
      required: true,
      minLength: 1,
      description: "Path to the file to analyze",
    },
    option: {
      type: "string",
      required: true,
      enum: ANALYSIS_OPTIONS,
      description: "Analysis option",
    },
  },
});
