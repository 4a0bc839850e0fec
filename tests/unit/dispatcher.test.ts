// ============================================================================
// Unit Tests - Dispatcher
//
// Handlers are vi.fn stubs so each test can assert exactly which handler ran
// (or that none did).
// ============================================================================

import { describe, it, expect, vi } from "vitest";
import { Dispatcher, toFailure, type OperationHandlers } from "../../src/dispatcher.js";
import { createDefaultRegistry } from "../../src/tools/index.js";
import { DuplicateTaskError, TaskNotFoundError } from "../../src/errors.js";
import type { AnalysisOption, TaskRow, TaskStatus } from "../../src/types.js";

function taskRow(name: string, status: TaskStatus = "not complete"): TaskRow {
    return {
        id: 1,
        name,
        description: "stub",
        status,
        created_at: "2026-01-01T00:00:00.000Z",
        updated_at: "2026-01-01T00:00:00.000Z",
    };
}

function stubHandlers() {
    return {
        analyzeFile: vi.fn((file: string, option: AnalysisOption) =>
            option === "lineCount"
                ? { file, option, value: 3 }
                : { file, option, value: true }),
        logWork: vi.fn((description: string) => ({
            timestamp: "2026-01-01 00:00:00",
            description,
            line: `[2026-01-01 00:00:00] ${description}`,
        })),
        getWorkLog: vi.fn(() => ({ total: 0, entries: [] })),
        addTask: vi.fn((taskName: string, _description: string) => taskRow(taskName)),
        listTasks: vi.fn((_status?: TaskStatus) => ({ total: 0, tasks: [] })),
        completeTask: vi.fn((taskName: string, status: TaskStatus) => ({
            task: taskRow(taskName, status),
            previous_status: "not complete" as const,
            changed: true,
        })),
    } satisfies OperationHandlers;
}

function setup() {
    const handlers = stubHandlers();
    const dispatcher = new Dispatcher(createDefaultRegistry(), handlers);
    const calls = () => Object.values(handlers).reduce((n, fn) => n + fn.mock.calls.length, 0);
    return { handlers, dispatcher, calls };
}

describe("Dispatcher - unknown operations", () => {
    it("should return UnknownOperation and run no handler", async () => {
        const { dispatcher, calls } = setup();
        const result = await dispatcher.invoke("delete-everything", { path: "x" });
        expect(result).toEqual({
            ok: false,
            kind: "UnknownOperation",
            message: "Unknown operation: delete-everything",
            code: "UNKNOWN_OPERATION",
        });
        expect(calls()).toBe(0);
    });

    it("should treat names as case-sensitive", async () => {
        const { dispatcher } = setup();
        const result = await dispatcher.invoke("Task-List");
        expect(result).toMatchObject({ ok: false, kind: "UnknownOperation" });
    });
});

describe("Dispatcher - validation", () => {
    it.each([
        ["analyze-file", { option: "lineCount" }, "path"],
        ["analyze-file", { path: "a.txt" }, "option"],
        ["log-work", {}, "description"],
        ["task-add", { taskName: "t" }, "description"],
        ["task-complete", { completionStatus: "complete" }, "taskName"],
        ["task-complete", { taskName: "t" }, "completionStatus"],
    ])("%s without a required parameter returns MissingParameter", async (name, args, param) => {
        const { dispatcher, calls } = setup();
        const result = await dispatcher.invoke(name, args);
        expect(result).toEqual({
            ok: false,
            kind: "MissingParameter",
            message: `Missing required parameter: ${param}`,
            param,
            code: "MISSING_PARAMETER",
        });
        expect(calls()).toBe(0);
    });

    it("should return InvalidParameter for a value outside the enumerated set", async () => {
        const { dispatcher, calls } = setup();
        const result = await dispatcher.invoke("task-complete", { taskName: "t", completionStatus: "done" });
        expect(result).toEqual({
            ok: false,
            kind: "InvalidParameter",
            message: "Invalid parameter 'completionStatus': must be one of: complete, not complete",
            param: "completionStatus",
            code: "INVALID_PARAMETER",
        });
        expect(calls()).toBe(0);
    });

    it("should return InvalidParameter for a wrong type", async () => {
        const { dispatcher, calls } = setup();
        const result = await dispatcher.invoke("log-work", { description: 7 });
        expect(result).toMatchObject({ ok: false, kind: "InvalidParameter", param: "description" });
        expect(calls()).toBe(0);
    });

    it("should return InvalidParameter without a param for undeclared arguments", async () => {
        const { dispatcher, calls } = setup();
        const result = await dispatcher.invoke("get-work-log", { verbose: true });
        expect(result).toEqual({
            ok: false,
            kind: "InvalidParameter",
            message: "Unexpected parameter(s): verbose",
            code: "INVALID_PARAMETER",
        });
        expect(calls()).toBe(0);
    });
});

describe("Dispatcher - execution", () => {
    it("should route analyze-file to its handler with validated arguments", async () => {
        const { dispatcher, handlers } = setup();
        const result = await dispatcher.invoke("analyze-file", { path: "a.txt", option: "lineCount" });
        expect(result).toEqual({ ok: true, payload: { file: "a.txt", option: "lineCount", value: 3 } });
        expect(handlers.analyzeFile).toHaveBeenCalledWith("a.txt", "lineCount");
        expect(handlers.analyzeFile).toHaveBeenCalledTimes(1);
    });

    it("should run get-work-log with no arguments at all", async () => {
        const { dispatcher, handlers } = setup();
        const result = await dispatcher.invoke("get-work-log");
        expect(result).toEqual({ ok: true, payload: { total: 0, entries: [] } });
        expect(handlers.getWorkLog).toHaveBeenCalledTimes(1);
    });

    it("should pass an absent optional filter as undefined", async () => {
        const { dispatcher, handlers } = setup();
        await dispatcher.invoke("task-list", {});
        await dispatcher.invoke("task-list", { status: "complete" });
        expect(handlers.listTasks).toHaveBeenNthCalledWith(1, undefined);
        expect(handlers.listTasks).toHaveBeenNthCalledWith(2, "complete");
    });

    it("should route each task operation to its own handler", async () => {
        const { dispatcher, handlers } = setup();
        await dispatcher.invoke("task-add", { taskName: "ship", description: "release 1.0" });
        await dispatcher.invoke("task-complete", { taskName: "ship", completionStatus: "complete" });
        await dispatcher.invoke("log-work", { description: "shipped" });
        expect(handlers.addTask).toHaveBeenCalledWith("ship", "release 1.0");
        expect(handlers.completeTask).toHaveBeenCalledWith("ship", "complete");
        expect(handlers.logWork).toHaveBeenCalledWith("shipped");
        expect(handlers.analyzeFile).not.toHaveBeenCalled();
    });
});

describe("Dispatcher - handler failures", () => {
    it("should wrap a domain error as HandlerError with its code", async () => {
        const { dispatcher, handlers } = setup();
        handlers.completeTask.mockImplementationOnce(() => { throw new TaskNotFoundError("ghost"); });
        const result = await dispatcher.invoke("task-complete", { taskName: "ghost", completionStatus: "complete" });
        expect(result).toEqual({
            ok: false,
            kind: "HandlerError",
            message: "Task 'ghost' not found.",
            code: "TASK_NOT_FOUND",
        });
    });

    it("should wrap an unexpected Error as HandlerError", async () => {
        const { dispatcher, handlers } = setup();
        handlers.getWorkLog.mockImplementationOnce(() => { throw new Error("disk on fire"); });
        const result = await dispatcher.invoke("get-work-log");
        expect(result).toEqual({ ok: false, kind: "HandlerError", message: "disk on fire", code: "UNEXPECTED_ERROR" });
    });

    it("should never return both a payload and a failure kind", async () => {
        const { dispatcher, handlers } = setup();
        handlers.addTask.mockImplementationOnce(() => { throw new DuplicateTaskError("ship"); });
        const failed = await dispatcher.invoke("task-add", { taskName: "ship", description: "d" });
        const passed = await dispatcher.invoke("task-add", { taskName: "ship", description: "d" });
        expect(failed.ok).toBe(false);
        expect("payload" in failed).toBe(false);
        expect(passed.ok).toBe(true);
        expect("kind" in passed).toBe(false);
    });
});

describe("toFailure", () => {
    it("should stringify values that are not errors", () => {
        expect(toFailure("bad thing")).toEqual({
            ok: false,
            kind: "HandlerError",
            message: "bad thing",
            code: "UNEXPECTED_ERROR",
        });
    });

    it("should wrap a rejected async handler", async () => {
        const handlers = stubHandlers();
        const dispatcher = new Dispatcher(createDefaultRegistry(), {
            ...handlers,
            getWorkLog: async () => { throw new Error("late failure"); },
        });
        const result = await dispatcher.invoke("get-work-log");
        expect(result).toMatchObject({ ok: false, kind: "HandlerError", message: "late failure" });
    });
});
