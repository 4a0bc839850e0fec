// ============================================================================
// Workbench MCP Server - Tool Registry
// ============================================================================

import { DuplicateOperationError, UnknownOperationError } from "./errors.js";
import type { OperationDescriptor } from "./schema.js";

/**
 * The fixed set of operations this server advertises. Filled once during
 * startup composition; read-only afterwards.
 */
export class ToolRegistry {
    private readonly descriptors = new Map<string, OperationDescriptor>();

    /** @throws DuplicateOperationError */
    register(descriptor: OperationDescriptor): void {
        if (this.descriptors.has(descriptor.name)) throw new DuplicateOperationError(descriptor.name);
        this.descriptors.set(descriptor.name, descriptor);
    }

    /** Registration order. */
    list(): OperationDescriptor[] {
        return Array.from(this.descriptors.values());
    }

    /** @throws UnknownOperationError */
    get(name: string): OperationDescriptor {
        const descriptor = this.descriptors.get(name);
        if (!descriptor) throw new UnknownOperationError(name);
        return descriptor;
    }

    has(name: string): boolean {
        return this.descriptors.has(name);
    }

    get size(): number {
        return this.descriptors.size;
    }
}
