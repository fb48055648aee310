/**
 * ALLOMORPH ONTOLOGY
 * The primitives every layer of the role kernel speaks in.
 */

// --- 1. Entity ---
// A class, identified by its name. Entities are never destroyed.
export type EntityName = string;

// --- 2. Role ---
// A role's name is the name of the entity that declared it, or a `multi` label.
export type RoleName = string;

export type MethodName = string;

// --- 3. Invocant ---
// Anything a method can be called on or a query asked about.
export interface InstanceLike {
    readonly entity: EntityName;
}

export type Invocant = EntityName | InstanceLike;

// --- 4. Method ---
// Implementations receive the invocant first, the way a method receives `this`.
export type Method = (invocant: Invocant, ...args: unknown[]) => unknown;

export type MethodTable = Map<MethodName, Method>;

// --- 5. Method Binding ---
export interface MethodBinding {
    readonly name: MethodName;
    readonly impl: Method;
    readonly source: EntityName; // Declaring entity
    readonly resolved: boolean; // false for lazy bindings captured in lax mode
}

// --- 6. Declarations ---
export type MethodList = MethodName | MethodName[];

export interface Declaration {
    role?: MethodList;
    multi?: Record<RoleName, MethodList>;
    does?: RoleName | RoleName[];
}

export const DECLARATION_LABELS = ['role', 'multi', 'does'] as const;
export type DeclarationLabel = typeof DECLARATION_LABELS[number];

export function entityOf(invocant: Invocant): EntityName {
    return typeof invocant === 'string' ? invocant : invocant.entity;
}
