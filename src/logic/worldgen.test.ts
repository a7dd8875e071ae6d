import { describe, test, expect } from 'vitest';
import { EmptyDungeonGenerator, createInitialState, createNpcPopulator, findFreeGround, wanderingNpcs } from './worldgen';
import { Move, isMove } from './moves';
import { Dungeon, Tile } from '../world/dungeon';
import { Random } from '../math/random';
import { ThornsModifier } from '../modifiers/modifiers';

describe('EmptyDungeonGenerator', () => {
    test('walls the border and puts one staircase inside', () => {
        const dungeon = new EmptyDungeonGenerator(7, 5, new Random(3)).spawnDungeon(0);
        expect([dungeon.width, dungeon.height]).toEqual([7, 5]);
        for (let x = 0; x < 7; x++) {
            expect(dungeon.tileAt(x, 0)).toBe(Tile.Wall);
            expect(dungeon.tileAt(x, 4)).toBe(Tile.Wall);
        }
        const stairs = dungeon.staircase();
        expect(stairs).not.toBeNull();
        expect(dungeon.groundCount()).toBe(5 * 3 - 1);
    });

    test('rejects rooms without an interior', () => {
        expect(() => new EmptyDungeonGenerator(2, 5, new Random(1))).toThrow(RangeError);
    });
});

describe('createInitialState', () => {
    test('places both players and the NPCs on distinct ground tiles', () => {
        const random = new Random(8);
        const state = createInitialState({
            dungeonGenerator: new EmptyDungeonGenerator(5, 5, random),
            random,
            npcPopulator: createNpcPopulator(3),
            playerModifiers: [new ThornsModifier(1)]
        });

        expect(state.authoritative).toBe(true);
        expect(state.tick).toBe(0);
        expect(state.entities.map(e => e.id)).toEqual([1, 2, 3, 4, 5]);
        const dungeon = state.world.require(0);
        for (const entity of state.entities) {
            expect(entity.depth).toBe(0);
            expect(dungeon.tileAt(entity.x, entity.y)).toBe(Tile.Ground);
        }
        expect([state.player1.health, state.player1.damage, state.player1.armor]).toEqual([10, 2, 1]);
        expect(state.player1.modifiers[0]).not.toBe(state.player2.modifiers[0]);
        expect(state.npcs().map(npc => npc.health)).toEqual([3, 3, 3]);
        state.checkIndices();
    });
});

describe('findFreeGround', () => {
    test('fails when every ground tile is taken', () => {
        const random = new Random(2);
        const state = createInitialState({
            dungeonGenerator: { spawnDungeon: () => Dungeon.fromRows(['####', '#..#', '####']) },
            random
        });
        expect(() => findFreeGround(state, 0, state.world.require(0), random)).toThrow(RangeError);
    });
});

describe('wanderingNpcs', () => {
    test('only picks valid moves', () => {
        const pick = wanderingNpcs(new Random(5));
        const random = new Random(5);
        const state = createInitialState({
            dungeonGenerator: new EmptyDungeonGenerator(4, 4, random),
            random,
            npcPopulator: createNpcPopulator(1)
        });
        const npc = state.npcs()[0];
        const seen = new Set<Move>();
        for (let i = 0; i < 100; i++) {
            const move = pick(state, npc);
            expect(isMove(move)).toBe(true);
            seen.add(move);
        }
        expect(seen.size).toBe(5);
    });
});
