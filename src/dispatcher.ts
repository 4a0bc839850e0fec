// ============================================================================
// Workbench MCP Server - Dispatcher
// ============================================================================
//
// invoke(name, args): registry lookup → schema validation → handler → one
// InvocationResult. Nothing thrown below this point reaches the transport.

import { ANALYSIS_OPTIONS, TASK_STATUSES } from "./constants.js";
import {
    InvalidParameterError,
    MissingParameterError,
    UnknownOperationError,
    WorkbenchError,
    errorMessage,
} from "./errors.js";
import { log } from "./logger.js";
import type { ToolRegistry } from "./registry.js";
import { validateArguments, type OperationArgs } from "./schema.js";
import type {
    AnalysisOption,
    FileAnalysis,
    OperationName,
    TaskList,
    TaskRow,
    TaskStatus,
    TaskStatusChange,
    WorkLogContents,
    WorkLogEntry,
} from "./types.js";
import { assertNever } from "./utils.js";

export type FailureKind = "UnknownOperation" | "MissingParameter" | "InvalidParameter" | "HandlerError";

export interface InvocationSuccess {
    ok: true;
    payload: unknown;
}

export interface InvocationFailure {
    ok: false;
    kind: FailureKind;
    message: string;
    /** Offending parameter, for MissingParameter / InvalidParameter. */
    param?: string;
    /** Domain error code (TASK_NOT_FOUND, FILE_NOT_FOUND, ...). */
    code?: string;
}

export type InvocationResult = InvocationSuccess | InvocationFailure;

type MaybePromise<T> = T | Promise<T>;

/**
 * One method per operation. The dispatcher calls exactly one of these per
 * successful validation and treats them all alike.
 */
export interface OperationHandlers {
    analyzeFile(file: string, option: AnalysisOption): MaybePromise<FileAnalysis>;
    logWork(description: string): MaybePromise<WorkLogEntry>;
    getWorkLog(): MaybePromise<WorkLogContents>;
    addTask(taskName: string, description: string): MaybePromise<TaskRow>;
    listTasks(status?: TaskStatus): MaybePromise<TaskList>;
    completeTask(taskName: string, status: TaskStatus): MaybePromise<TaskStatusChange>;
}

export class Dispatcher {
    constructor(
        private readonly registry: ToolRegistry,
        private readonly handlers: OperationHandlers,
    ) { }

    async invoke(name: string, args: Readonly<Record<string, unknown>> = {}): Promise<InvocationResult> {
        log.debug(`invoke ${name}`, { params: Object.keys(args) });
        try {
            const descriptor = this.registry.get(name);
            const validated = validateArguments(descriptor.params, args);
            const payload = await this.execute(descriptor.name, validated);
            return { ok: true, payload };
        } catch (err: unknown) {
            const failure = toFailure(err);
            if (failure.code === "UNEXPECTED_ERROR") {
                log.error(`${name} failed unexpectedly: ${failure.message}`, { stack: err instanceof Error ? err.stack : undefined });
            } else {
                log.warn(`${name} failed: ${failure.message}`, { kind: failure.kind, code: failure.code });
            }
            return failure;
        }
    }

    private execute(name: OperationName, args: OperationArgs): MaybePromise<unknown> {
        const h = this.handlers;
        switch (name) {
            case "analyze-file":
                return h.analyzeFile(args.string("path"), args.oneOf("option", ANALYSIS_OPTIONS));
            case "log-work":
                return h.logWork(args.string("description"));
            case "get-work-log":
                return h.getWorkLog();
            case "task-add":
                return h.addTask(args.string("taskName"), args.string("description"));
            case "task-list":
                return h.listTasks(args.optionalOneOf("status", TASK_STATUSES));
            case "task-complete":
                return h.completeTask(args.string("taskName"), args.oneOf("completionStatus", TASK_STATUSES));
            default:
                return assertNever(name, "Unhandled operation");
        }
    }
}

export function toFailure(err: unknown): InvocationFailure {
    if (err instanceof UnknownOperationError) {
        return { ok: false, kind: "UnknownOperation", message: err.message, code: err.code };
    }
    if (err instanceof MissingParameterError) {
        return { ok: false, kind: "MissingParameter", message: err.message, param: err.param, code: err.code };
    }
    if (err instanceof InvalidParameterError) {
        return {
            ok: false,
            kind: "InvalidParameter",
            message: err.message,
            ...(err.param ? { param: err.param } : {}),
            code: err.code,
        };
    }
    if (err instanceof WorkbenchError) {
        return { ok: false, kind: "HandlerError", message: err.message, code: err.code };
    }
    return { ok: false, kind: "HandlerError", message: errorMessage(err), code: "UNEXPECTED_ERROR" };
}
