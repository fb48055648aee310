import type { Declaration, EntityName, Invocant, MethodBinding, MethodName, RoleName } from './L0/Ontology.js';
import type { EntityDefinition } from './L1/Entity.js';
import { RoleKernel } from './L4/RoleKernel.js';
import type { PerformanceReport, UseReport } from './L4/RoleKernel.js';
import type { EntityHandle } from './L4/Handles.js';

/**
 * The process-wide kernel. Created once at load, never reset; every free
 * function below goes through it. Construct a RoleKernel directly for an
 * isolated set of registries.
 */
export const defaultKernel = new RoleKernel();

export function define(name: EntityName, def?: EntityDefinition): EntityHandle {
    return defaultKernel.define(name, def);
}

export function role(entity: EntityName, methods: MethodName | MethodName[]): MethodBinding[] {
    return defaultKernel.role(entity, methods);
}

export function multi(entity: EntityName, roles: Record<RoleName, MethodName | MethodName[]>): MethodBinding[] {
    return defaultKernel.multi(entity, roles);
}

export function performs(entity: EntityName, roles: RoleName | RoleName[]): PerformanceReport[] {
    return defaultKernel.performs(entity, roles);
}

export function use(entity: EntityName, declaration: Declaration): UseReport {
    return defaultKernel.use(entity, declaration);
}

export function does(invocant: Invocant, role: RoleName): boolean {
    return defaultKernel.does(invocant, role);
}
