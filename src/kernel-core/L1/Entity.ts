import type { EntityName, Method, MethodName, MethodTable } from '../L0/Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- 1. Entity (Runtime) ---
// The host side of the kernel: what a class declaration would create.
export interface EntityRecord {
    name: EntityName;
    parents: EntityName[]; // Declared order matters for lookup
    methods: MethodTable;
}

export interface EntityDefinition {
    parents?: EntityName[];
    methods?: Record<MethodName, Method>;
}

export class EntityRegistry {
    private entities: Map<EntityName, EntityRecord> = new Map();

    /**
     * Declare (or re-open) an entity. Given parents replace the old list,
     * given methods are written over existing ones.
     */
    public define(name: EntityName, def: EntityDefinition = {}): EntityRecord {
        assertName(name, 'entity');
        const record = this.ensure(name);

        if (def.parents) {
            this.setParents(name, def.parents);
        }
        if (def.methods) {
            for (const [method, impl] of Object.entries(def.methods)) {
                this.defineMethod(name, method, impl);
            }
        }
        return record;
    }

    /**
     * Returns the entity, creating an empty one if it was never declared.
     */
    public ensure(name: EntityName): EntityRecord {
        let record = this.entities.get(name);
        if (!record) {
            record = { name, parents: [], methods: new Map() };
            this.entities.set(name, record);
        }
        return record;
    }

    public get(name: EntityName): EntityRecord | undefined {
        return this.entities.get(name);
    }

    public has(name: EntityName): boolean {
        return this.entities.has(name);
    }

    public list(): EntityName[] {
        return Array.from(this.entities.keys());
    }

    // Cycles are allowed here: the walker reports them when a query meets one.
    public setParents(name: EntityName, parents: EntityName[]) {
        for (const p of parents) assertName(p, 'parent');
        this.ensure(name).parents = [...parents];
    }

    public parentsOf(name: EntityName): readonly EntityName[] {
        return this.entities.get(name)?.parents ?? [];
    }

    public defineMethod(entity: EntityName, method: MethodName, impl: Method) {
        assertName(method, 'method');
        if (typeof impl !== 'function') {
            throw new KernelError(ErrorCode.INVALID_DECLARATION, `Method ${entity}.${method} is not a function`, { entity, method });
        }
        this.ensure(entity).methods.set(method, impl);
    }

    public ownMethod(entity: EntityName, method: MethodName): Method | undefined {
        return this.entities.get(entity)?.methods.get(method);
    }

    public hasOwnMethod(entity: EntityName, method: MethodName): boolean {
        return this.entities.get(entity)?.methods.has(method) ?? false;
    }

    /**
     * Conditional insert: only writes when the entity has no method of that name.
     * Returns whether it wrote.
     */
    public installMethod(entity: EntityName, method: MethodName, impl: Method): boolean {
        const record = this.ensure(entity);
        if (record.methods.has(method)) return false;
        record.methods.set(method, impl);
        return true;
    }
}

export function assertName(value: unknown, what: string): asserts value is string {
    if (typeof value !== 'string' || value.length === 0) {
        throw new KernelError(ErrorCode.INVALID_DECLARATION, `Invalid ${what} name: ${String(value)}`, { what });
    }
}
