import { describe, test, expect, beforeEach } from '@jest/globals';
import { EntityRegistry } from '../Entity.js';
import { ErrorCode, isKernelError } from '../../Errors.js';

describe('Entity Registry (host model)', () => {
    let entities: EntityRegistry;
    const bark = () => 'woof';
    const growl = () => 'grr';

    beforeEach(() => {
        entities = new EntityRegistry();
    });

    test('define records parents in declared order and own methods', () => {
        entities.define('Dog', { parents: ['Mammal', 'Pet'], methods: { bark } });

        expect(entities.parentsOf('Dog')).toEqual(['Mammal', 'Pet']);
        expect(entities.ownMethod('Dog', 'bark')).toBe(bark);
        expect(entities.hasOwnMethod('Dog', 'sleep')).toBe(false);
    });

    test('re-opening an entity overwrites methods and keeps parents unless given', () => {
        entities.define('Dog', { parents: ['Mammal'], methods: { bark } });
        entities.define('Dog', { methods: { bark: growl } });

        expect(entities.ownMethod('Dog', 'bark')).toBe(growl);
        expect(entities.parentsOf('Dog')).toEqual(['Mammal']);
    });

    test('unknown entities have no parents and no methods', () => {
        expect(entities.parentsOf('Ghost')).toEqual([]);
        expect(entities.ownMethod('Ghost', 'bark')).toBeUndefined();
        expect(entities.has('Ghost')).toBe(false);
    });

    test('installMethod only inserts when the name is free', () => {
        entities.define('Dog', { methods: { bark } });

        expect(entities.installMethod('Dog', 'bark', growl)).toBe(false);
        expect(entities.installMethod('Dog', 'growl', growl)).toBe(true);
        expect(entities.ownMethod('Dog', 'bark')).toBe(bark);
        expect(entities.ownMethod('Dog', 'growl')).toBe(growl);
    });

    test('setParents accepts a cycle; detection is left to traversal', () => {
        entities.setParents('A', ['B']);
        entities.setParents('B', ['A']);

        expect(entities.parentsOf('B')).toEqual(['A']);
    });

    test('parent lists are copied, not aliased', () => {
        const parents = ['Mammal'];
        entities.define('Dog', { parents });
        parents.push('Pet');

        expect(entities.parentsOf('Dog')).toEqual(['Mammal']);
    });

    test('empty names are rejected', () => {
        expect(() => entities.define('')).toThrow(/Invalid entity name/);
        try {
            entities.defineMethod('Dog', '', bark);
        } catch (e) {
            expect(isKernelError(e, ErrorCode.INVALID_DECLARATION)).toBe(true);
        }
        expect.assertions(2);
    });
});
