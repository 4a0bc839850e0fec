// ============================================================================
// Workbench MCP Server - Utilities
// ============================================================================

import { execSync } from "child_process";
import * as fs from "fs";
import * as path from "path";
import { PROJECT_MARKERS } from "./constants.js";
import { PathOutsideRootError } from "./errors.js";
import { log } from "./logger.js";

export function assertNever(value: never, message: string = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/**
 * Normalize a file path for display and storage.
 * 1. Replace backslashes with forward slashes
 * 2. If absolute and projectRoot provided, convert to relative
 * 3. Strip leading ./
 * 4. Collapse consecutive /
 * 5. Strip trailing /
 */
export function normalizePath(filePath: string, projectRoot?: string): string {
  let p = filePath.replace(/\\/g, "/");

  if (projectRoot && path.isAbsolute(p)) {
    p = path.relative(projectRoot, p).replace(/\\/g, "/");
  }

  p = p.replace(/^\.\//, "");
  p = p.replace(/\/+/g, "/");
  p = p.replace(/\/$/, "");

  return p;
}

function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Resolve a caller-supplied path against the project root. Relative paths are
 * joined to the root; absolute paths must already lie inside it. When the
 * target exists, its real path (symlinks followed) is checked as well.
 *
 * @throws PathOutsideRootError
 */
export function resolveWithinRoot(filePath: string, projectRoot: string): string {
  const root = path.resolve(projectRoot);
  const resolved = path.resolve(root, filePath);
  if (!isInside(root, resolved)) throw new PathOutsideRootError(filePath, root);

  if (fs.existsSync(resolved)) {
    const realRoot = fs.realpathSync(root);
    const realTarget = fs.realpathSync(resolved);
    if (!isInside(realRoot, realTarget)) throw new PathOutsideRootError(filePath, root);
  }

  return resolved;
}

/**
 * Count lines the way a line-by-line reader does: every `\n`, `\r\n` or `\r`
 * ends a line, and trailing text without a terminator is one more line.
 */
export function countLines(content: string): number {
  if (content.length === 0) return 0;
  const segments = content.split(/\r\n|\r|\n/);
  return segments[segments.length - 1] === "" ? segments.length - 1 : segments.length;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

// ============================================================================
// Project root detection
//
// Priority chain (first hit wins), used only when neither --project-root nor
// WORKBENCH_PROJECT_ROOT is set:
//   1. git rev-parse --show-toplevel
//   2. Walk up from startDir looking for .git or .workbench
//   3. startDir itself
// ============================================================================

function detectGitRoot(startDir: string): string | null {
  try {
    const result = execSync("git rev-parse --show-toplevel", {
      cwd: startDir,
      encoding: "utf-8",
      timeout: 3000,
      stdio: ["pipe", "pipe", "pipe"],
    }).trim();
    return result || null;
  } catch {
    return null;
  }
}

export function findProjectRoot(startDir: string = process.cwd()): string {
  const gitRoot = detectGitRoot(startDir);
  if (gitRoot) {
    log.debug(`Project root ← git: ${gitRoot}`);
    return path.resolve(gitRoot);
  }

  let dir = path.resolve(startDir);
  while (dir !== path.dirname(dir)) {
    for (const marker of PROJECT_MARKERS) {
      if (fs.existsSync(path.join(dir, marker))) {
        log.debug(`Project root ← marker (${marker}): ${dir}`);
        return dir;
      }
    }
    dir = path.dirname(dir);
  }

  log.warn(`No project root marker found - using ${path.resolve(startDir)}. Pass --project-root=<path> to override.`);
  return path.resolve(startDir);
}
