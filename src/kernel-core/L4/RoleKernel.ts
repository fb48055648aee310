import type {
    Declaration, EntityName, Invocant, Method, MethodBinding, MethodName, RoleName
} from '../L0/Ontology.js';
import { DECLARATION_LABELS, entityOf } from '../L0/Ontology.js';
import { resolveConfig } from '../L0/Config.js';
import type { RoleKernelConfig, RoleKernelOptions } from '../L0/Config.js';
import type { ILogger } from '../L0/Ports.js';
import { EntityRegistry, assertName } from '../L1/Entity.js';
import type { EntityDefinition } from '../L1/Entity.js';
import { RoleRegistry } from '../L2/RoleRegistry.js';
import type { RoleDeclaration } from '../L2/RoleRegistry.js';
import { DoesTable } from '../L2/DoesTable.js';
import { InheritanceWalker } from '../L3/InheritanceWalker.js';
import { EntityHandle, Instance } from './Handles.js';
import type { QueryTarget } from './Handles.js';
import { ErrorCode, KernelError } from '../Errors.js';

export interface PerformanceReport {
    role: RoleName;
    installed: MethodName[]; // Copied into the performer
    skipped: MethodName[]; // Performer already had them
    recorded: boolean; // false when the relation already existed
}

export interface UseReport {
    bindings: MethodBinding[];
    performed: PerformanceReport[];
}

export interface RegistrySnapshot {
    roles: ReadonlyMap<RoleName, readonly MethodBinding[]>;
    does: ReadonlyMap<EntityName, ReadonlySet<RoleName>>;
}

/**
 * Role Kernel
 * Declaration entry points (role, multi, performs, use) and the Query
 * Facade (does), over one set of registries.
 */
export class RoleKernel implements QueryTarget {
    public readonly config: RoleKernelConfig;
    public readonly entities: EntityRegistry = new EntityRegistry();

    private roles: RoleRegistry;
    private doesTable: DoesTable = new DoesTable();
    private walker: InheritanceWalker;
    private logger: ILogger;

    public constructor(options: RoleKernelOptions = {}) {
        this.config = resolveConfig(options);
        this.logger = this.config.logger;
        this.roles = new RoleRegistry(this.entities, {
            strictDeclarations: this.config.strictDeclarations,
            logger: this.logger
        });
        this.walker = new InheritanceWalker(this.entities, this.config.maxDepth);
    }

    // --- Host ---

    public define(name: EntityName, def?: EntityDefinition): EntityHandle {
        this.entities.define(name, def);
        return this.entity(name);
    }

    public entity(name: EntityName): EntityHandle {
        return new EntityHandle(name, this);
    }

    public instantiate(name: EntityName, fields: Record<string, unknown> = {}): Instance {
        assertName(name, 'entity');
        this.entities.ensure(name);
        return new Instance(name, { ...fields }, this);
    }

    // --- Declaration ---

    /**
     * Declare a role named after `entity`, made of its own methods.
     */
    public role(entity: EntityName, methods: MethodName | MethodName[]): MethodBinding[] {
        return this.roles.declare(entity, [roleEntry(entity, methods)]);
    }

    /**
     * Declare independently named roles from one entity.
     */
    public multi(entity: EntityName, roles: Record<RoleName, MethodName | MethodName[]>): MethodBinding[] {
        return this.roles.declare(entity, multiEntries(roles));
    }

    /**
     * Declare that `entity` performs each role, in order. Methods the entity
     * already has are kept; only bindings registered so far are installed.
     */
    public performs(entity: EntityName, roles: RoleName | RoleName[]): PerformanceReport[] {
        assertName(entity, 'entity');
        const list = nameList(roles, 'role');
        this.entities.ensure(entity);
        return list.map(role => this.perform(entity, role));
    }

    /**
     * Apply a declaration the way a class would at load time: `role` and
     * `multi` first (atomically), then `does`.
     */
    public use(entity: EntityName, declaration: Declaration): UseReport {
        assertName(entity, 'entity');
        if (typeof declaration !== 'object' || declaration === null || Array.isArray(declaration)) {
            throw new KernelError(ErrorCode.INVALID_DECLARATION, `Declaration for ${entity} must be an object`, { entity });
        }

        for (const label of Object.keys(declaration)) {
            if (!DECLARATION_LABELS.some(known => known === label)) {
                this.logger.warn(`Ignoring unknown declaration label '${label}' on ${entity}`);
            }
        }

        const batch: RoleDeclaration[] = [];
        if (declaration.role !== undefined) batch.push(roleEntry(entity, declaration.role));
        if (declaration.multi !== undefined) batch.push(...multiEntries(declaration.multi));
        const performs = declaration.does !== undefined ? nameList(declaration.does, 'role') : [];

        const bindings = batch.length > 0 ? this.roles.declare(entity, batch) : [];
        const performed = performs.length > 0 ? this.performs(entity, performs) : [];
        return { bindings, performed };
    }

    private perform(entity: EntityName, role: RoleName): PerformanceReport {
        const bindings = this.roles.bindings(role);
        const installed: MethodName[] = [];
        const skipped: MethodName[] = [];

        for (const binding of bindings) {
            if (this.entities.installMethod(entity, binding.name, binding.impl)) {
                installed.push(binding.name);
            } else {
                skipped.push(binding.name);
            }
        }

        if (bindings.length === 0) {
            this.logger.debug(`${entity} performs '${role}', which has no methods yet`);
        } else if (skipped.length > 0) {
            this.logger.debug(`${entity} keeps its own [${skipped.join(', ')}] over '${role}'`);
        }

        const recorded = this.doesTable.record(entity, role);
        return { role, installed, skipped, recorded };
    }

    // --- Query ---

    /**
     * True when the invocant is the role, declared it, or has an ancestor
     * that does. Pure read.
     */
    public does(invocant: Invocant, role: RoleName): boolean {
        return this.walker.some(entityOf(invocant), name => name === role || this.doesTable.has(name, role));
    }

    public can(invocant: Invocant, method: MethodName): Method | undefined {
        return this.walker.find(entityOf(invocant), name => this.entities.ownMethod(name, method));
    }

    public invoke(invocant: Invocant, method: MethodName, ...args: unknown[]): unknown {
        const impl = this.can(invocant, method);
        if (!impl) {
            const entity = entityOf(invocant);
            throw new KernelError(ErrorCode.UNKNOWN_METHOD, `Can't locate method '${method}' via ${entity}`, { entity, method });
        }
        return impl(invocant, ...args);
    }

    // --- Introspection ---

    public ancestors(entity: EntityName): EntityName[] {
        return this.walker.lineage(entity).slice(1);
    }

    public rolesOf(entity: EntityName): RoleName[] {
        return this.doesTable.rolesOf(entity);
    }

    public bindingsOf(role: RoleName): readonly MethodBinding[] {
        return this.roles.bindings(role);
    }

    public hasRole(role: RoleName): boolean {
        return this.roles.has(role);
    }

    public snapshot(): RegistrySnapshot {
        return { roles: this.roles.snapshot(), does: this.doesTable.snapshot() };
    }
}

function nameList(value: unknown, what: string): string[] {
    const list = Array.isArray(value) ? value : [value];
    const names: string[] = [];
    for (const item of list) {
        assertName(item, what);
        names.push(item);
    }
    return names;
}

function roleEntry(entity: EntityName, methods: unknown): RoleDeclaration {
    return { role: entity, methods: nameList(methods, 'method'), open: true };
}

function multiEntries(roles: unknown): RoleDeclaration[] {
    if (typeof roles !== 'object' || roles === null || Array.isArray(roles)) {
        throw new KernelError(ErrorCode.INVALID_DECLARATION, 'multi expects a map of role label to methods');
    }
    return Object.entries(roles).map(([role, methods]) => ({ role, methods: nameList(methods, 'method') }));
}
