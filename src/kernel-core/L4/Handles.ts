import type { EntityName, InstanceLike, Invocant, Method, MethodName, RoleName } from '../L0/Ontology.js';

/**
 * What a handle needs from its kernel.
 */
export interface QueryTarget {
    does(invocant: Invocant, role: RoleName): boolean;
    can(invocant: Invocant, method: MethodName): Method | undefined;
    invoke(invocant: Invocant, method: MethodName, ...args: unknown[]): unknown;
}

/**
 * A class-level view of an entity: `Dog.does('Animal')`.
 */
export class EntityHandle implements InstanceLike {
    constructor(
        public readonly name: EntityName,
        private readonly kernel: QueryTarget
    ) { }

    public get entity(): EntityName {
        return this.name;
    }

    public does(role: RoleName): boolean {
        return this.kernel.does(this.name, role);
    }

    public can(method: MethodName): Method | undefined {
        return this.kernel.can(this.name, method);
    }

    public call(method: MethodName, ...args: unknown[]): unknown {
        return this.kernel.invoke(this.name, method, ...args);
    }
}

/**
 * An object of some entity. Methods are called with the instance as invocant.
 */
export class Instance implements InstanceLike {
    constructor(
        public readonly entity: EntityName,
        public readonly fields: Record<string, unknown>,
        private readonly kernel: QueryTarget
    ) { }

    public does(role: RoleName): boolean {
        return this.kernel.does(this, role);
    }

    public can(method: MethodName): Method | undefined {
        return this.kernel.can(this, method);
    }

    public call(method: MethodName, ...args: unknown[]): unknown {
        return this.kernel.invoke(this, method, ...args);
    }
}
