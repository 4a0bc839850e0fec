// ============================================================================
// Workbench MCP Server - Error Types
// ============================================================================

/**
 * Base error class for all Workbench errors.
 * Includes an error code and optional context for structured error handling.
 */
export class WorkbenchError extends Error {
    readonly code: string;
    readonly context?: Record<string, unknown>;

    constructor(message: string, code: string = "WORKBENCH_ERROR", context?: Record<string, unknown>) {
        super(message);
        this.name = "WorkbenchError";
        this.code = code;
        this.context = context;
    }
}

// ─── Registry / Dispatch ─────────────────────────────────────────────

/**
 * Thrown at startup when two operations share a name.
 */
export class DuplicateOperationError extends WorkbenchError {
    constructor(name: string) {
        super(`Operation "${name}" is already registered.`, "DUPLICATE_OPERATION", { name });
        this.name = "DuplicateOperationError";
    }
}

export class UnknownOperationError extends WorkbenchError {
    constructor(name: string) {
        super(`Unknown operation: ${name}`, "UNKNOWN_OPERATION", { name });
        this.name = "UnknownOperationError";
    }
}

export class MissingParameterError extends WorkbenchError {
    readonly param: string;

    constructor(param: string) {
        super(`Missing required parameter: ${param}`, "MISSING_PARAMETER", { param });
        this.name = "MissingParameterError";
        this.param = param;
    }
}

/**
 * Thrown when an argument has the wrong type, falls outside its enumerated
 * set, or was never declared. `param` is empty for undeclared arguments.
 */
export class InvalidParameterError extends WorkbenchError {
    readonly param: string;

    constructor(param: string, message: string) {
        super(message, "INVALID_PARAMETER", { param });
        this.name = "InvalidParameterError";
        this.param = param;
    }
}

// ─── Domain ──────────────────────────────────────────────────────────

/**
 * Thrown when a requested entity is not found.
 */
export class NotFoundError extends WorkbenchError {
    constructor(entity: string, id: string | number, code: string = "NOT_FOUND") {
        super(`${entity} '${id}' not found.`, code, { entity, id });
        this.name = "NotFoundError";
    }
}

export class TaskNotFoundError extends NotFoundError {
    constructor(taskName: string) {
        super("Task", taskName, "TASK_NOT_FOUND");
        this.name = "TaskNotFoundError";
    }
}

export class FileNotFoundError extends NotFoundError {
    constructor(file: string) {
        super("File", file, "FILE_NOT_FOUND");
        this.name = "FileNotFoundError";
    }
}

export class DuplicateTaskError extends WorkbenchError {
    constructor(taskName: string) {
        super(`Task '${taskName}' already exists.`, "DUPLICATE_TASK", { taskName });
        this.name = "DuplicateTaskError";
    }
}

export class PathOutsideRootError extends WorkbenchError {
    constructor(file: string, projectRoot: string) {
        super(`Path '${file}' resolves outside the project root.`, "PATH_OUTSIDE_ROOT", { file, projectRoot });
        this.name = "PathOutsideRootError";
    }
}

/**
 * Wraps a failed filesystem call that is not a plain "not found".
 */
export class IoError extends WorkbenchError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "IO_ERROR", context);
        this.name = "IoError";
    }
}

export class ConfigError extends WorkbenchError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "CONFIG_ERROR", context);
        this.name = "ConfigError";
    }
}

/**
 * Read the errno code (ENOENT, EACCES, ...) off a Node system error.
 */
export function errnoCode(err: unknown): string {
    if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
    return "";
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
