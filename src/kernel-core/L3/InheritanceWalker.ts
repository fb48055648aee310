import type { EntityName } from '../L0/Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

export interface ParentSource {
    parentsOf(name: EntityName): readonly EntityName[];
}

interface Frame {
    name: EntityName;
    parents: readonly EntityName[];
    next: number;
}

/**
 * Inheritance Graph Walker
 * Depth-first, in declared parent order, starting with the entity itself.
 * Iterative, so deep chains cannot exhaust the call stack.
 */
export class InheritanceWalker {
    constructor(
        private graph: ParentSource,
        private maxDepth: number
    ) { }

    /**
     * Visit `start` and then its ancestors until `visit` returns a value.
     * An ancestor reached again by a second path is skipped (diamond);
     * one reached again on the current path is a cycle.
     */
    public find<T>(start: EntityName, visit: (name: EntityName) => T | undefined): T | undefined {
        const hit = visit(start);
        if (hit !== undefined) return hit;

        const stack: Frame[] = [{ name: start, parents: this.graph.parentsOf(start), next: 0 }];
        const onPath = new Set<EntityName>([start]);
        const explored = new Set<EntityName>();

        let top = stack[0];
        while (top) {
            const parent = top.parents[top.next++];
            if (parent === undefined) {
                stack.pop();
                onPath.delete(top.name);
                explored.add(top.name);
                top = stack[stack.length - 1];
                continue;
            }

            if (onPath.has(parent)) {
                const path = [...stack.map(f => f.name), parent];
                throw new KernelError(
                    ErrorCode.CYCLIC_INHERITANCE,
                    `Cyclic inheritance: ${path.join(' -> ')}`,
                    { path }
                );
            }
            if (explored.has(parent)) continue;

            // The parent sits stack.length generations above start.
            if (stack.length > this.maxDepth) {
                throw new KernelError(
                    ErrorCode.DEPTH_EXCEEDED,
                    `Ancestry of ${start} is deeper than ${this.maxDepth}`,
                    { entity: start, maxDepth: this.maxDepth }
                );
            }

            const found = visit(parent);
            if (found !== undefined) return found;

            top = { name: parent, parents: this.graph.parentsOf(parent), next: 0 };
            stack.push(top);
            onPath.add(parent);
        }

        return undefined;
    }

    public some(start: EntityName, predicate: (name: EntityName) => boolean): boolean {
        return this.find(start, name => (predicate(name) ? true : undefined)) === true;
    }

    /**
     * Every entity reachable from `start`, in visiting order.
     */
    public lineage(start: EntityName): EntityName[] {
        const seen: EntityName[] = [];
        this.find(start, name => {
            seen.push(name);
            return undefined;
        });
        return seen;
    }
}
