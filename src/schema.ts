// ============================================================================
// Workbench MCP Server - Operation Parameter Schemas
// ============================================================================
//
// Every operation declares its parameters as data. One validator walks that
// declaration for every call, and the same declaration is rendered as the
// JSON Schema advertised over tools/list.

import { z, type ZodTypeAny } from "zod";
import { InvalidParameterError, MissingParameterError } from "./errors.js";
import type { OperationName } from "./types.js";
import { assertNever } from "./utils.js";

export const PARAM_TYPES = ["string", "integer", "number", "boolean"] as const;

export type ParamType = typeof PARAM_TYPES[number];

export interface ParamSpec {
    readonly type: ParamType;
    readonly required: boolean;
    readonly description: string;
    /** Allowed values; only meaningful for string parameters. */
    readonly enum?: readonly string[];
    readonly minLength?: number;
    /** Reject strings made only of whitespace. */
    readonly nonBlank?: boolean;
}

/** Ordered: declaration order is validation order and advertised order. */
export type ParamSchema = Readonly<Record<string, ParamSpec>>;

export interface OperationDescriptor {
    readonly name: OperationName;
    readonly title: string;
    readonly description: string;
    readonly params: ParamSchema;
}

/**
 * Freeze a descriptor (and its parameter specs) so it cannot change after
 * registration.
 */
export function defineOperation(descriptor: OperationDescriptor): OperationDescriptor {
    const params: Record<string, ParamSpec> = {};
    for (const [name, spec] of Object.entries(descriptor.params)) {
        params[name] = Object.freeze({
            ...spec,
            ...(spec.enum ? { enum: Object.freeze([...spec.enum]) } : {}),
        });
    }
    return Object.freeze({ ...descriptor, params: Object.freeze(params) });
}

// ─── Validation ──────────────────────────────────────────────────────

function baseValidator(name: string, spec: ParamSpec): ZodTypeAny {
    switch (spec.type) {
        case "string": {
            const str = spec.minLength !== undefined
                ? z.string().min(spec.minLength, `must be at least ${spec.minLength} character(s)`)
                : z.string();
            return spec.nonBlank
                ? str.refine(value => value.trim() !== "", { message: "must contain non-whitespace text" })
                : str;
        }
        case "integer":
            return z.number().int();
        case "number":
            return z.number().finite();
        case "boolean":
            return z.boolean();
        default:
            return assertNever(spec.type, `Unsupported type for parameter '${name}'`);
    }
}

function paramValidator(name: string, spec: ParamSpec): ZodTypeAny {
    const base = baseValidator(name, spec);
    const allowed = spec.enum;
    if (!allowed) return base;
    return base.refine(
        (value: unknown) => allowed.some(a => a === value),
        { message: `must be one of: ${allowed.join(", ")}` },
    );
}

function isAbsent(value: unknown): boolean {
    return value === undefined || value === null;
}

/**
 * Validated argument bag handed to a handler. Accessors re-check the runtime
 * type so handlers get narrowed values without casts.
 */
export class OperationArgs {
    constructor(private readonly values: Readonly<Record<string, unknown>>) { }

    string(name: string): string {
        const value = this.values[name];
        if (typeof value !== "string") throw new InvalidParameterError(name, `Parameter '${name}' must be a string.`);
        return value;
    }

    optionalString(name: string): string | undefined {
        return this.values[name] === undefined ? undefined : this.string(name);
    }

    oneOf<T extends string>(name: string, allowed: readonly T[]): T {
        const value = this.values[name];
        const match = allowed.find(a => a === value);
        if (match === undefined) {
            throw new InvalidParameterError(name, `Parameter '${name}' must be one of: ${allowed.join(", ")}`);
        }
        return match;
    }

    optionalOneOf<T extends string>(name: string, allowed: readonly T[]): T | undefined {
        return this.values[name] === undefined ? undefined : this.oneOf(name, allowed);
    }

    toJSON(): Record<string, unknown> {
        return { ...this.values };
    }
}

/**
 * Check an argument bag against a parameter schema.
 *
 * Missing required parameters are reported first, in declaration order, then
 * the first invalid declared parameter, then any undeclared argument. `null`
 * counts as absent.
 *
 * @throws MissingParameterError | InvalidParameterError
 */
export function validateArguments(params: ParamSchema, args: Readonly<Record<string, unknown>>): OperationArgs {
    const declared = Object.entries(params);

    for (const [name, spec] of declared) {
        if (spec.required && isAbsent(args[name])) throw new MissingParameterError(name);
    }

    const values: Record<string, unknown> = {};
    for (const [name, spec] of declared) {
        const value = args[name];
        if (isAbsent(value)) continue;
        const result = paramValidator(name, spec).safeParse(value);
        if (!result.success) {
            const issue = result.error.issues[0]?.message ?? "invalid value";
            throw new InvalidParameterError(name, `Invalid parameter '${name}': ${issue}`);
        }
        values[name] = result.data;
    }

    const unexpected = Object.keys(args).filter(key => !Object.hasOwn(params, key) && !isAbsent(args[key]));
    if (unexpected.length > 0) {
        throw new InvalidParameterError("", `Unexpected parameter(s): ${unexpected.join(", ")}`);
    }

    return new OperationArgs(values);
}

// ─── JSON Schema ─────────────────────────────────────────────────────

export interface JsonSchemaProperty {
    type: ParamType;
    description: string;
    enum?: string[];
    minLength?: number;
    pattern?: string;
}

export interface ToolInputSchema {
    [key: string]: unknown;
    type: "object";
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
    additionalProperties: false;
}

export function toJsonSchema(params: ParamSchema): ToolInputSchema {
    const properties: Record<string, JsonSchemaProperty> = {};
    const required: string[] = [];
    for (const [name, spec] of Object.entries(params)) {
        const property: JsonSchemaProperty = { type: spec.type, description: spec.description };
        if (spec.enum) property.enum = [...spec.enum];
        if (spec.minLength !== undefined) property.minLength = spec.minLength;
        if (spec.nonBlank) property.pattern = "\\S";
        properties[name] = property;
        if (spec.required) required.push(name);
    }
    return { type: "object", properties, required, additionalProperties: false };
}
