/**
 * World Generation
 *
 * Dungeon generators, NPC population and the start generator that builds
 * the first authoritative state. Generated levels are a walled room with
 * one staircase.
 */

import { Dungeon, Tile } from '../world/dungeon';
import { Entity } from '../world/entity';
import { GameState, PLAYER1_ID, PLAYER2_ID } from '../world/game-state';
import { World } from '../world/world';
import type { Random } from '../math/random';
import type { Modifier } from '../modifiers/types';
import { Move } from './moves';

// ============================================
// Dungeons
// ============================================

export interface DungeonGenerator {
    spawnDungeon(depth: number): Dungeon;
}

/**
 * Empty room surrounded by walls with the staircase at a random interior cell.
 */
export class EmptyDungeonGenerator implements DungeonGenerator {
    constructor(
        readonly width: number,
        readonly height: number,
        private readonly random: Random
    ) {
        if (width < 3 || height < 3) {
            throw new RangeError(`Dungeons need at least 3x3 tiles, got ${width}x${height}`);
        }
    }

    spawnDungeon(_depth: number): Dungeon {
        const { width, height } = this;
        const tiles = new Uint8Array(width * height).fill(Tile.Ground);
        for (let x = 0; x < width; x++) {
            tiles[x * height] = Tile.Wall;
            tiles[x * height + height - 1] = Tile.Wall;
        }
        for (let y = 0; y < height; y++) {
            tiles[y] = Tile.Wall;
            tiles[(width - 1) * height + y] = Tile.Wall;
        }
        const sx = this.random.nextInt(1, width - 1);
        const sy = this.random.nextInt(1, height - 1);
        tiles[sx * height + sy] = Tile.StaircaseDown;
        return new Dungeon(width, height, tiles);
    }
}

/**
 * Random free Ground tile at a depth, retrying until unoccupied.
 */
export function findFreeGround(state: GameState, depth: number, dungeon: Dungeon, random: Random): { x: number; y: number } {
    const occupied = state.entitiesAtDepth(depth).filter(e => dungeon.tileAt(e.x, e.y) === Tile.Ground).length;
    if (occupied >= dungeon.groundCount()) {
        throw new RangeError(`No free ground left at depth ${depth}`);
    }
    for (;;) {
        const spot = dungeon.randomGround(random);
        if (!state.entityAt(depth, spot.x, spot.y)) {
            return spot;
        }
    }
}

// ============================================
// NPCs
// ============================================

export interface NpcTemplate {
    health: number;
    baseMaxHealth: number;
    baseDamage: number;
    baseArmor: number;
    modifiers?: Modifier[];
}

export interface NpcPopulator {
    populate(depth: number, dungeon: Dungeon): NpcTemplate[];
}

/**
 * `count` NPCs per level, a little tougher on every level down.
 */
export function createNpcPopulator(count: number): NpcPopulator {
    return {
        populate(depth: number): NpcTemplate[] {
            const templates: NpcTemplate[] = [];
            for (let i = 0; i < count; i++) {
                const health = 3 + depth;
                templates.push({
                    health,
                    baseMaxHealth: health,
                    baseDamage: 1 + Math.floor(depth / 2),
                    baseArmor: 0
                });
            }
            return templates;
        }
    };
}

/** Decides an NPC's move for the tick. Out-of-core; the default stays put. */
export type NpcMoveSelector = (state: GameState, npc: Entity) => Move;

export const stayInPlace: NpcMoveSelector = () => Move.Stay;

/** NPCs pick a uniformly random move every tick. */
export function wanderingNpcs(random: Random): NpcMoveSelector {
    const moves = [Move.Up, Move.Right, Move.Down, Move.Left, Move.Stay];
    return () => moves[random.nextInt(0, moves.length)];
}

// ============================================
// Start State
// ============================================

export interface StartOptions {
    dungeonGenerator: DungeonGenerator;
    random: Random;
    npcPopulator?: NpcPopulator;
    /** Modifiers each player starts with; cloned per player */
    playerModifiers?: Modifier[];
}

const PLAYER_HEALTH = 10;
const PLAYER_DAMAGE = 2;
const PLAYER_ARMOR = 1;

/**
 * First authoritative state: depth 0 generated, both players placed on
 * distinct ground tiles with ids 1 and 2, NPCs populated after them.
 */
export function createInitialState(options: StartOptions): GameState {
    const { dungeonGenerator, random } = options;
    const dungeon = dungeonGenerator.spawnDungeon(0);
    const state = new GameState({
        authoritative: true,
        tick: 0,
        player1Id: PLAYER1_ID,
        player2Id: PLAYER2_ID,
        world: new World([[0, dungeon]]),
        entities: []
    });

    for (const id of [PLAYER1_ID, PLAYER2_ID]) {
        const spot = findFreeGround(state, 0, dungeon, random);
        state.addEntity(new Entity({
            id,
            depth: 0,
            x: spot.x,
            y: spot.y,
            health: PLAYER_HEALTH,
            baseMaxHealth: PLAYER_HEALTH,
            baseDamage: PLAYER_DAMAGE,
            baseArmor: PLAYER_ARMOR,
            modifiers: (options.playerModifiers ?? []).map(mod => mod.clone())
        }));
    }

    if (options.npcPopulator) {
        for (const template of options.npcPopulator.populate(0, dungeon)) {
            spawnNpc(state, 0, dungeon, template, random);
        }
    }
    return state;
}

/** Place one NPC from a template on a free ground tile; returns the entity. */
export function spawnNpc(state: GameState, depth: number, dungeon: Dungeon, template: NpcTemplate, random: Random): Entity {
    const spot = findFreeGround(state, depth, dungeon, random);
    const entity = new Entity({
        id: state.nextEntityId(),
        depth,
        x: spot.x,
        y: spot.y,
        health: template.health,
        baseMaxHealth: template.baseMaxHealth,
        baseDamage: template.baseDamage,
        baseArmor: template.baseArmor,
        modifiers: (template.modifiers ?? []).map(mod => mod.clone())
    });
    state.addEntity(entity);
    return entity;
}
