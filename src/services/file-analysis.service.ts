// ============================================================================
// Workbench MCP Server - File Analysis Service
// ============================================================================

import * as fs from "fs";
import { TODO_MARKER } from "../constants.js";
import { FileNotFoundError, IoError, errnoCode, errorMessage } from "../errors.js";
import type { AnalysisOption, FileAnalysis } from "../types.js";
import { assertNever, countLines, normalizePath, resolveWithinRoot } from "../utils.js";

/**
 * Read-only analysis of files under the project root.
 */
export class FileAnalysisService {
    constructor(private projectRoot: string) { }

    analyze(file: string, option: AnalysisOption): FileAnalysis {
        const resolved = resolveWithinRoot(file, this.projectRoot);
        const content = this.read(file, resolved);
        const relative = normalizePath(resolved, this.projectRoot);

        switch (option) {
            case "lineCount":
                return { file: relative, option, value: countLines(content) };
            case "hasTodos":
                return { file: relative, option, value: content.includes(TODO_MARKER) };
            default:
                return assertNever(option, "Unknown analysis option");
        }
    }

    private read(file: string, resolved: string): string {
        try {
            return fs.readFileSync(resolved, "utf-8");
        } catch (err: unknown) {
            const code = errnoCode(err);
            if (code === "ENOENT") throw new FileNotFoundError(file);
            if (code === "EISDIR") throw new IoError(`'${file}' is a directory.`, { file, code });
            throw new IoError(`Error reading file: ${errorMessage(err)}`, { file, code });
        }
    }
}
