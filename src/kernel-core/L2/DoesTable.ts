import { enableMapSet, produce } from 'immer';
import type { EntityName, RoleName } from '../L0/Ontology.js';

enableMapSet();

/**
 * Does Table
 * Entity -> roles it explicitly declared to perform. Grows only.
 */
export class DoesTable {
    private relations: ReadonlyMap<EntityName, ReadonlySet<RoleName>> = new Map();

    /**
     * Returns false when the relation was already recorded.
     */
    public record(entity: EntityName, role: RoleName): boolean {
        if (this.has(entity, role)) return false;

        this.relations = produce(this.relations, draft => {
            const roles = draft.get(entity) ?? new Set<RoleName>();
            roles.add(role);
            draft.set(entity, roles);
        });
        return true;
    }

    public has(entity: EntityName, role: RoleName): boolean {
        return this.relations.get(entity)?.has(role) ?? false;
    }

    public rolesOf(entity: EntityName): RoleName[] {
        return Array.from(this.relations.get(entity) ?? []);
    }

    public snapshot(): ReadonlyMap<EntityName, ReadonlySet<RoleName>> {
        return this.relations;
    }
}
