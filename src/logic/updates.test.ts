import { describe, test, expect } from 'vitest';
import { applyUpdate, applyUpdates, isUpdateRelevant, type GameStateUpdate } from './updates';
import { Dungeon } from '../world/dungeon';
import { Entity } from '../world/entity';
import { GameState } from '../world/game-state';
import { World } from '../world/world';
import { StatModifier, ThornsModifier } from '../modifiers/modifiers';
import { CombatFlag } from '../modifiers/types';
import { ReplayMismatchError } from '../shared/errors';

const ROOM = ['#####', '#...#', '#...#', '#####'];

function player(id: number, depth: number, x: number, y: number): Entity {
    return new Entity({ id, depth, x, y, health: 10, baseMaxHealth: 10, baseDamage: 2, baseArmor: 1 });
}

/** Depth-0 view holding player 1 only; player 2 is elsewhere. */
function depthZeroView(): GameState {
    return new GameState({
        authoritative: false,
        tick: 0,
        player1Id: 1,
        player2Id: 2,
        world: new World([[0, Dungeon.fromRows(ROOM)]]),
        entities: [player(1, 0, 1, 1)]
    });
}

describe('isUpdateRelevant', () => {
    test('same-depth moves are relevant only at that depth', () => {
        const move: GameStateUpdate = {
            kind: 'entity-position', order: 0, entityId: 1, depth: 2, x: 1, y: 1, fromDepth: 2, depthChanged: false, entity: null
        };
        expect(isUpdateRelevant(move, 2)).toBe(true);
        expect(isUpdateRelevant(move, 1)).toBe(false);
    });

    test('depth changes are relevant at both ends', () => {
        const descent: GameStateUpdate = {
            kind: 'entity-position', order: 0, entityId: 1, depth: 3, x: 1, y: 1, fromDepth: 2, depthChanged: true, entity: null
        };
        expect(isUpdateRelevant(descent, 2)).toBe(true);
        expect(isUpdateRelevant(descent, 3)).toBe(true);
        expect(isUpdateRelevant(descent, 4)).toBe(false);
    });

    test('spawns follow the spawned entity, tick ends go everywhere', () => {
        const spawn: GameStateUpdate = { kind: 'entity-spawn', order: 0, entity: player(5, 1, 1, 1) };
        expect(isUpdateRelevant(spawn, 1)).toBe(true);
        expect(isUpdateRelevant(spawn, 0)).toBe(false);
        expect(isUpdateRelevant({ kind: 'tick-end', order: 1, tick: 3 }, 9)).toBe(true);
    });

    test('does not touch anything', () => {
        const death: GameStateUpdate = { kind: 'entity-death', order: 0, entityId: 7, depth: 0 };
        const frozen = Object.freeze({ ...death });
        expect(isUpdateRelevant(frozen, 0)).toBe(true);
    });
});

describe('applyUpdate', () => {
    test('an entity arriving at the viewed depth is added from its snapshot', () => {
        const view = depthZeroView();
        applyUpdate(view, {
            kind: 'entity-position',
            order: 4,
            entityId: 2,
            depth: 0,
            x: 3,
            y: 2,
            fromDepth: 1,
            depthChanged: true,
            entity: player(2, 0, 3, 2)
        });
        expect(view.entityAt(0, 3, 2)?.id).toBe(2);
        view.checkIndices();
    });

    test('an entity leaving the viewed depth is removed', () => {
        const view = depthZeroView();
        applyUpdate(view, {
            kind: 'entity-position',
            order: 4,
            entityId: 1,
            depth: 1,
            x: 2,
            y: 2,
            fromDepth: 0,
            depthChanged: true,
            entity: player(1, 1, 2, 2)
        });
        expect(view.getEntity(1)).toBeUndefined();
        view.checkIndices();
    });

    test('records about unknown entities are replay mismatches', () => {
        const view = depthZeroView();
        expect(() => applyUpdate(view, { kind: 'entity-death', order: 7, entityId: 9, depth: 0 })).toThrow(ReplayMismatchError);
        expect(() =>
            applyUpdate(view, { kind: 'entity-health', order: 8, entityId: 9, depth: 0, sourceId: null, amount: 1 })
        ).toThrow(ReplayMismatchError);
    });

    test('records that land on an occupied cell are replay mismatches', () => {
        const view = depthZeroView();
        expect(() => applyUpdate(view, { kind: 'entity-spawn', order: 2, entity: player(6, 0, 1, 1) })).toThrow(ReplayMismatchError);
        expect(() =>
            applyUpdate(view, {
                kind: 'entity-position',
                order: 3,
                entityId: 2,
                depth: 0,
                x: 1,
                y: 1,
                fromDepth: 1,
                depthChanged: true,
                entity: player(2, 0, 1, 1)
            })
        ).toThrow(ReplayMismatchError);
        expect(view.entities.map(entity => entity.id)).toEqual([1]);
        view.checkIndices();
    });

    test('modifier records keep derived stats current', () => {
        const view = depthZeroView();
        applyUpdate(view, { kind: 'modifier-added', order: 0, entityId: 1, depth: 0, modifier: new StatModifier({ damage: 3 }) });
        expect(view.requireEntity(1).damage).toBe(5);

        expect(() => applyUpdate(view, { kind: 'modifier-removed', order: 1, entityId: 1, depth: 0, index: 1 })).toThrow(
            ReplayMismatchError
        );
        applyUpdate(view, { kind: 'modifier-removed', order: 2, entityId: 1, depth: 0, index: 0 });
        expect(view.requireEntity(1).damage).toBe(2);
    });

    test('combat replays the modifier pipeline from the shipped prevals', () => {
        const view = depthZeroView();
        view.addEntity(new Entity({
            id: 3, depth: 0, x: 2, y: 1, health: 5, baseMaxHealth: 5, baseDamage: 1, baseArmor: 0,
            modifiers: [new ThornsModifier(1)]
        }));
        applyUpdate(view, {
            kind: 'entity-combat',
            order: 0,
            attackerId: 1,
            defenderId: 3,
            depth: 0,
            damage: 2,
            flags: [CombatFlag.Block],
            attackPrevals: [],
            defendPrevals: [null]
        });
        expect(view.requireEntity(3).health).toBe(3);
        expect(view.requireEntity(1).health).toBe(9);

        expect(() => applyUpdate(view, {
            kind: 'entity-combat',
            order: 1,
            attackerId: 1,
            defenderId: 3,
            depth: 0,
            damage: 2,
            flags: [CombatFlag.Block],
            attackPrevals: [],
            defendPrevals: []
        })).toThrow(ReplayMismatchError);
    });

    test('dungeon and tick records', () => {
        const view = depthZeroView();
        const dungeon = Dungeon.fromRows(['###', '#.#', '###']);
        applyUpdate(view, { kind: 'dungeon-created', order: 0, depth: 1, dungeon });
        expect(view.world.get(1)).toBe(dungeon);
        applyUpdate(view, { kind: 'dungeon-removed', order: 1, depth: 1 });
        expect(view.world.has(1)).toBe(false);
        applyUpdate(view, { kind: 'tick-end', order: 2, tick: 6 });
        expect(view.tick).toBe(6);
    });

    test('applyUpdates enforces ascending order', () => {
        const view = depthZeroView();
        const updates: GameStateUpdate[] = [
            { kind: 'entity-health', order: 2, entityId: 1, depth: 0, sourceId: null, amount: -3 },
            { kind: 'entity-health', order: 2, entityId: 1, depth: 0, sourceId: null, amount: -3 }
        ];
        expect(() => applyUpdates(view, updates)).toThrow(ReplayMismatchError);
        // the first record was applied before the duplicate was seen
        expect(view.requireEntity(1).health).toBe(7);
    });
});
