import { enableMapSet, produce } from 'immer';
import type { EntityName, Method, MethodBinding, MethodName, RoleName } from '../L0/Ontology.js';
import type { ILogger } from '../L0/Ports.js';
import { EntityRegistry, assertName } from '../L1/Entity.js';
import { ErrorCode, KernelError } from '../Errors.js';

enableMapSet();

export interface RoleDeclaration {
    role: RoleName;
    methods: MethodName[];
    open?: boolean; // Create the role key even with no methods
}

export interface RoleRegistryOptions {
    strictDeclarations: boolean;
    logger: ILogger;
}

/**
 * Role Registry
 * Role name -> ordered method bindings. Only ever grows; a failed
 * declaration leaves it untouched.
 */
export class RoleRegistry {
    private roles: ReadonlyMap<RoleName, readonly MethodBinding[]> = new Map();

    constructor(
        private entities: EntityRegistry,
        private options: RoleRegistryOptions
    ) { }

    /**
     * Capture the declaring entity's methods and append them to each role.
     * All methods are captured before anything is written, so one unresolved
     * method rejects the whole batch.
     */
    public declare(source: EntityName, batch: RoleDeclaration[]): MethodBinding[] {
        assertName(source, 'entity');

        const captured = batch.map(entry => {
            assertName(entry.role, 'role');
            return { ...entry, bindings: entry.methods.map(m => this.capture(source, m)) };
        });

        this.roles = produce(this.roles, draft => {
            for (const { role, bindings, open } of captured) {
                if (bindings.length === 0 && !open) continue;
                const list = draft.get(role) ?? [];
                list.push(...bindings);
                draft.set(role, list);
            }
        });

        for (const { role, methods } of captured) {
            this.options.logger.debug(`Role '${role}' += [${methods.join(', ')}] from ${source}`);
        }
        return captured.flatMap(c => c.bindings);
    }

    public bindings(role: RoleName): readonly MethodBinding[] {
        return this.roles.get(role) ?? [];
    }

    public has(role: RoleName): boolean {
        return this.roles.has(role);
    }

    public list(): RoleName[] {
        return Array.from(this.roles.keys());
    }

    public snapshot(): ReadonlyMap<RoleName, readonly MethodBinding[]> {
        return this.roles;
    }

    private capture(source: EntityName, method: MethodName): MethodBinding {
        assertName(method, 'method');

        const impl = this.entities.ownMethod(source, method);
        if (impl) {
            return { name: method, impl, source, resolved: true };
        }

        if (this.options.strictDeclarations) {
            throw new KernelError(
                ErrorCode.UNRESOLVED_METHOD,
                `No such method '${method}' on declaring entity ${source}`,
                { entity: source, method }
            );
        }

        this.options.logger.warn(`Deferred binding ${source}.${method}: not defined yet`);
        return { name: method, impl: this.deferred(source, method), source, resolved: false };
    }

    // Resolves by name on every call; fails at the call site while still missing.
    private deferred(source: EntityName, method: MethodName): Method {
        return (invocant, ...args) => {
            const impl = this.entities.ownMethod(source, method);
            if (!impl) {
                throw new KernelError(
                    ErrorCode.UNRESOLVED_METHOD,
                    `Undefined method ${source}.${method} called through a role binding`,
                    { entity: source, method }
                );
            }
            return impl(invocant, ...args);
        };
    }
}
