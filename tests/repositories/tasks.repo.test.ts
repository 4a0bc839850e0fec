import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import type { Database as DatabaseType } from "better-sqlite3";
import { createTestDb } from "../helpers/test-db.js";
import { createTmpProject } from "../helpers/tmp-project.js";
import { openDatabase } from "../../src/database.js";
import { getCurrentSchemaVersion, runMigrations } from "../../src/migrations.js";
import { DB_VERSION } from "../../src/constants.js";
import type { Repositories } from "../../src/repositories/index.js";

let db: DatabaseType;
let repos: Repositories;
let cleanup: () => void;

beforeEach(() => {
    ({ db, repos, cleanup } = createTestDb());
});

afterEach(() => {
    cleanup();
});

describe("Migrations", () => {
    it("should bring a fresh database to the current schema version", () => {
        expect(getCurrentSchemaVersion(db)).toBe(DB_VERSION);
    });

    it("should be a no-op when run again", () => {
        runMigrations(db);
        expect(getCurrentSchemaVersion(db)).toBe(DB_VERSION);
        const tables = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'tasks'").all();
        expect(tables).toHaveLength(1);
    });

    it("should persist tasks across reopening a file database", () => {
        const project = createTmpProject();
        try {
            const dbPath = path.join(project.root, "nested", "tasks.db");
            const first = openDatabase(dbPath);
            first.prepare(
                "INSERT INTO tasks (name, description, status, created_at, updated_at) VALUES ('keep', 'd', 'not complete', 't', 't')"
            ).run();
            first.close();

            const second = openDatabase(dbPath);
            const row = second.prepare("SELECT name FROM tasks").get();
            second.close();
            expect(row).toEqual({ name: "keep" });
        } finally {
            project.cleanup();
        }
    });
});

describe("openDatabase recovery", () => {
    it("should move a corrupt file aside and start a fresh store", () => {
        const project = createTmpProject();
        try {
            const garbage = "this is not a sqlite database\n".repeat(200);
            const dbPath = project.write("data/tasks.db", garbage);

            const fresh = openDatabase(dbPath);
            try {
                expect(getCurrentSchemaVersion(fresh)).toBe(DB_VERSION);
                expect(fresh.prepare("SELECT COUNT(*) as c FROM tasks").get()).toEqual({ c: 0 });
            } finally {
                fresh.close();
            }

            const backups = fs.readdirSync(path.dirname(dbPath)).filter(f => /^tasks\.db\.corrupt\..+\.bak$/.test(f));
            expect(backups).toHaveLength(1);
            expect(fs.readFileSync(path.join(path.dirname(dbPath), backups[0]), "utf-8")).toBe(garbage);
        } finally {
            project.cleanup();
        }
    });
});

describe("TasksRepo", () => {
    const ts = "2026-01-01T00:00:00.000Z";

    it("should create a task defaulting to not complete", () => {
        const id = repos.tasks.create(ts, { name: "a", description: "first" });
        expect(repos.tasks.getById(id)).toEqual({
            id,
            name: "a",
            description: "first",
            status: "not complete",
            created_at: ts,
            updated_at: ts,
        });
    });

    it("should store a missing description as null", () => {
        const id = repos.tasks.create(ts, { name: "bare" });
        expect(repos.tasks.getById(id)?.description).toBeNull();
    });

    it("should return null for unknown ids and names", () => {
        expect(repos.tasks.getById(999)).toBeNull();
        expect(repos.tasks.getByName("nope")).toBeNull();
    });

    it("should enforce unique names", () => {
        repos.tasks.create(ts, { name: "dup" });
        expect(() => repos.tasks.create(ts, { name: "dup" })).toThrow(/UNIQUE constraint failed/);
    });

    it("should reject a status outside the allowed set", () => {
        expect(() =>
            db.prepare(
                "INSERT INTO tasks (name, status, created_at, updated_at) VALUES ('x', 'done', ?, ?)"
            ).run(ts, ts)
        ).toThrow(/CHECK constraint failed/);
    });

    it("should update status by name and report rows changed", () => {
        repos.tasks.create(ts, { name: "t" });
        expect(repos.tasks.updateStatus("t", "complete", "2026-01-02T00:00:00.000Z")).toBe(1);
        expect(repos.tasks.getByName("t")).toMatchObject({
            status: "complete",
            created_at: ts,
            updated_at: "2026-01-02T00:00:00.000Z",
        });
        expect(repos.tasks.updateStatus("missing", "complete", ts)).toBe(0);
    });

    it("should list newest first and break ties by insertion order", () => {
        repos.tasks.create("2026-01-01T00:00:00.000Z", { name: "old" });
        repos.tasks.create("2026-01-03T00:00:00.000Z", { name: "new" });
        repos.tasks.create("2026-01-01T00:00:00.000Z", { name: "old-later" });
        expect(repos.tasks.getAll().map(t => t.name)).toEqual(["new", "old-later", "old"]);
    });

    it("should filter by status and count all rows", () => {
        repos.tasks.create(ts, { name: "a" });
        repos.tasks.create(ts, { name: "b", status: "complete" });
        expect(repos.tasks.getAll("complete").map(t => t.name)).toEqual(["b"]);
        expect(repos.tasks.getAll("not complete").map(t => t.name)).toEqual(["a"]);
        expect(repos.tasks.countAll()).toBe(2);
    });
});
