import { describe, test, expect, beforeEach } from '@jest/globals';
import { EntityRegistry } from '../../L1/Entity.js';
import { RoleRegistry } from '../RoleRegistry.js';
import { DoesTable } from '../DoesTable.js';
import { SilentLogger } from '../../L0/Ports.js';
import { ErrorCode, KernelError } from '../../Errors.js';

describe('Role Registry', () => {
    let entities: EntityRegistry;
    const eat = () => 'chomp chomp';
    const sleep = () => 'snore snore';

    const registry = (strictDeclarations = true) =>
        new RoleRegistry(entities, { strictDeclarations, logger: new SilentLogger() });

    beforeEach(() => {
        entities = new EntityRegistry();
        entities.define('Animal', { methods: { eat, sleep } });
    });

    test('captures bindings in insertion order under the role name', () => {
        const roles = registry();
        roles.declare('Animal', [{ role: 'Animal', methods: ['eat', 'sleep'] }]);

        const bindings = roles.bindings('Animal');
        expect(bindings.map(b => b.name)).toEqual(['eat', 'sleep']);
        expect(bindings[0]?.impl).toBe(eat);
        expect(bindings[1]?.source).toBe('Animal');
        expect(bindings.every(b => b.resolved)).toBe(true);
    });

    test('repeated declarations append; the role only grows', () => {
        const roles = registry();
        roles.declare('Animal', [{ role: 'Animal', methods: ['eat'] }]);
        roles.declare('Animal', [{ role: 'Animal', methods: ['sleep'] }]);

        expect(roles.bindings('Animal').map(b => b.name)).toEqual(['eat', 'sleep']);
    });

    test('bindings are snapshots of the implementation at declaration time', () => {
        const roles = registry();
        roles.declare('Animal', [{ role: 'Animal', methods: ['eat'] }]);
        entities.defineMethod('Animal', 'eat', () => 'nibble');

        expect(roles.bindings('Animal')[0]?.impl).toBe(eat);
    });

    test('strict mode rejects a missing method and writes nothing', () => {
        const roles = registry();

        expect(() => roles.declare('Animal', [
            { role: 'feeder', methods: ['eat'] },
            { role: 'Animal', methods: ['eat', 'fly'] }
        ])).toThrow(KernelError);

        expect(roles.has('feeder')).toBe(false);
        expect(roles.has('Animal')).toBe(false);
        expect(roles.list()).toEqual([]);
    });

    test('strict mode error names the entity and method', () => {
        const roles = registry();
        try {
            roles.declare('Animal', [{ role: 'Animal', methods: ['fly'] }]);
        } catch (e) {
            expect(e).toBeInstanceOf(KernelError);
            if (e instanceof KernelError) {
                expect(e.code).toBe(ErrorCode.UNRESOLVED_METHOD);
                expect(e.metadata).toEqual({ entity: 'Animal', method: 'fly' });
                expect(e.message).toBe("[Allomorph:UNRESOLVED_METHOD] No such method 'fly' on declaring entity Animal");
            }
        }
        expect.assertions(4);
    });

    test('lax mode defers resolution to the call', () => {
        const roles = registry(false);
        roles.declare('Animal', [{ role: 'Animal', methods: ['fly'] }]);

        const binding = roles.bindings('Animal')[0];
        expect(binding?.resolved).toBe(false);
        expect(() => binding?.impl('Animal')).toThrow(/Undefined method Animal\.fly/);

        entities.defineMethod('Animal', 'fly', (_self, height) => `up to ${String(height)}`);
        expect(binding?.impl('Animal', 10)).toBe('up to 10');
    });

    test('an open declaration creates the role even with no methods', () => {
        const roles = registry();
        roles.declare('Animal', [{ role: 'Marker', methods: [], open: true }]);
        roles.declare('Animal', [{ role: 'Nothing', methods: [] }]);

        expect(roles.has('Marker')).toBe(true);
        expect(roles.has('Nothing')).toBe(false);
        expect(roles.bindings('Nothing')).toEqual([]);
    });

    test('snapshots are unaffected by later declarations', () => {
        const roles = registry();
        roles.declare('Animal', [{ role: 'Animal', methods: ['eat'] }]);
        const before = roles.snapshot();
        roles.declare('Animal', [{ role: 'Animal', methods: ['sleep'] }]);

        expect(before.get('Animal')?.length).toBe(1);
        expect(roles.snapshot().get('Animal')?.length).toBe(2);
    });
});

describe('Does Table', () => {
    test('records explicit relations once, in declaration order', () => {
        const table = new DoesTable();

        expect(table.record('Dog', 'Animal')).toBe(true);
        expect(table.record('Dog', 'Lifeguard')).toBe(true);
        expect(table.record('Dog', 'Animal')).toBe(false);

        expect(table.rolesOf('Dog')).toEqual(['Animal', 'Lifeguard']);
        expect(table.has('Dog', 'Animal')).toBe(true);
        expect(table.has('Cat', 'Animal')).toBe(false);
        expect(table.rolesOf('Cat')).toEqual([]);
    });

    test('an idempotent record keeps the same snapshot', () => {
        const table = new DoesTable();
        table.record('Dog', 'Animal');
        const before = table.snapshot();
        table.record('Dog', 'Animal');

        expect(table.snapshot()).toBe(before);
    });
});
