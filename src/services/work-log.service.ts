// ============================================================================
// Workbench MCP Server - Work Log Service
// ============================================================================
//
// Append-only text log, one entry per line:
//   [YYYY-MM-DD HH:MM:SS] description

import * as fs from "fs";
import * as path from "path";
import { IoError, errnoCode, errorMessage } from "../errors.js";
import type { WorkLogContents, WorkLogEntry } from "../types.js";
import { formatTimestamp } from "../utils.js";

const ENTRY_PATTERN = /^\[(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})\] ?(.*)$/;

export function parseEntry(line: string): WorkLogEntry {
    const match = ENTRY_PATTERN.exec(line);
    if (!match) return { timestamp: null, description: line, line };
    return { timestamp: match[1], description: match[2], line };
}

export class WorkLogService {
    constructor(
        private logPath: string,
        private clock: () => Date = () => new Date(),
    ) { }

    /**
     * Append one entry stamped with the current local time. Each line break in
     * the description becomes one space so an entry never spans lines; the
     * text is otherwise written as given.
     */
    append(description: string): WorkLogEntry {
        const text = description.replace(/\r\n|\r|\n/g, " ");

        const timestamp = formatTimestamp(this.clock());
        const line = `[${timestamp}] ${text}`;

        try {
            fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
            fs.appendFileSync(this.logPath, `${line}\n`, "utf-8");
        } catch (err: unknown) {
            throw new IoError(`Error logging work: ${errorMessage(err)}`, { path: this.logPath, code: errnoCode(err) });
        }

        return { timestamp, description: text, line };
    }

    /**
     * All entries in file order. A log that was never written reads as empty.
     */
    read(): WorkLogContents {
        let raw: string;
        try {
            raw = fs.readFileSync(this.logPath, "utf-8");
        } catch (err: unknown) {
            if (errnoCode(err) === "ENOENT") return { total: 0, entries: [] };
            throw new IoError(`Error reading work log: ${errorMessage(err)}`, { path: this.logPath, code: errnoCode(err) });
        }

        const entries = raw
            .split(/\r?\n/)
            .filter(line => line.trim() !== "")
            .map(parseEntry);
        return { total: entries.length, entries };
    }
}
