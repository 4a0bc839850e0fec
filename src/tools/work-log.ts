// ============================================================================
// Workbench MCP Server - Work Log Tools (log-work, get-work-log)
// ============================================================================

import { defineOperation } from "../schema.js";

export const logWorkOperation = defineOperation({
  name: "log-work",
  title: "Log Work",
  description: `Append an entry to the append-only work log, stamped with the current time.
Line breaks inside the description are written as single spaces.

Args:
  - description (string): Description of work performed

Returns:
  The entry written: { timestamp, description, line }.`,
  params: {
    description: {
      type: "string",
      required: true,
      minLength: 1,
      nonBlank: true,
      description: "Description of work performed",
    },
  },
});

export const getWorkLogOperation = defineOperation({
  name: "get-work-log",
  title: "Get Work Log",
  description: `Return every work log entry, oldest first. An empty or missing log returns no entries.

Returns:
  { total, entries: [{ timestamp, description, line }] }`,
  params: {},
});
