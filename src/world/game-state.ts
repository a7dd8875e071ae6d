/**
 * Game State
 *
 * The full snapshot at a tick: world, entities and the two lookup indices.
 * Authoritative on the server; a view (one depth, or everything for
 * spectators) on clients.
 *
 * INVARIANT: every entity in the list is in both indices, and the indices
 * hold nothing else. All mutation goes through add/remove/moveEntity.
 */

import { Entity } from './entity';
import { World } from './world';
import { StateCorruptionError, assertState } from '../shared/errors';

/** Ids reserved for the two players by the start generator */
export const PLAYER1_ID = 1;
export const PLAYER2_ID = 2;

export interface GameStateInit {
    authoritative: boolean;
    tick: number;
    player1Id: number;
    player2Id: number;
    world: World;
    entities: Iterable<Entity>;
}

function positionKey(depth: number, x: number, y: number): string {
    return `${depth}:${x}:${y}`;
}

export class GameState {
    readonly authoritative: boolean;
    tick: number;
    readonly player1Id: number;
    readonly player2Id: number;
    readonly world: World;

    private readonly entityList: Entity[] = [];
    private readonly positionIndex: Map<string, Entity> = new Map();
    private readonly identityIndex: Map<number, Entity> = new Map();

    constructor(init: GameStateInit) {
        this.authoritative = init.authoritative;
        this.tick = init.tick;
        this.player1Id = init.player1Id;
        this.player2Id = init.player2Id;
        this.world = init.world;
        for (const entity of init.entities) {
            this.addEntity(entity);
        }
    }

    get entities(): readonly Entity[] {
        return this.entityList;
    }

    // ==========================================
    // Lookup
    // ==========================================

    getEntity(id: number): Entity | undefined {
        return this.identityIndex.get(id);
    }

    requireEntity(id: number): Entity {
        const entity = this.identityIndex.get(id);
        if (!entity) {
            throw new StateCorruptionError(`No entity with id ${id}`);
        }
        return entity;
    }

    entityAt(depth: number, x: number, y: number): Entity | undefined {
        return this.positionIndex.get(positionKey(depth, x, y));
    }

    get player1(): Entity {
        return this.requireEntity(this.player1Id);
    }

    get player2(): Entity {
        return this.requireEntity(this.player2Id);
    }

    isPlayer(entityOrId: Entity | number): boolean {
        const id = typeof entityOrId === 'number' ? entityOrId : entityOrId.id;
        return id === this.player1Id || id === this.player2Id;
    }

    /** Non-player entities in list order. */
    npcs(): Entity[] {
        return this.entityList.filter(entity => !this.isPlayer(entity));
    }

    entitiesAtDepth(depth: number): Entity[] {
        return this.entityList.filter(entity => entity.depth === depth);
    }

    /** Smallest id above every id in use (and above the reserved player ids). */
    nextEntityId(): number {
        let max = Math.max(this.player1Id, this.player2Id);
        for (const id of this.identityIndex.keys()) {
            if (id > max) max = id;
        }
        return max + 1;
    }

    // ==========================================
    // Mutation
    // ==========================================

    addEntity(entity: Entity): void {
        if (this.identityIndex.has(entity.id)) {
            throw new StateCorruptionError(`Entity id ${entity.id} already present`);
        }
        const key = positionKey(entity.depth, entity.x, entity.y);
        const occupant = this.positionIndex.get(key);
        if (occupant) {
            throw new StateCorruptionError(`Cell ${key} already occupied by entity ${occupant.id}`);
        }
        this.entityList.push(entity);
        this.positionIndex.set(key, entity);
        this.identityIndex.set(entity.id, entity);
        entity.refreshDerived();
    }

    removeEntity(entity: Entity): void {
        const key = positionKey(entity.depth, entity.x, entity.y);
        assertState(this.identityIndex.get(entity.id) === entity, `Entity ${entity.id} not in identity index`);
        assertState(this.positionIndex.get(key) === entity, `Entity ${entity.id} not indexed at ${key}`);
        const listIndex = this.entityList.indexOf(entity);
        assertState(listIndex !== -1, `Entity ${entity.id} missing from entity list`);

        this.entityList.splice(listIndex, 1);
        this.positionIndex.delete(key);
        this.identityIndex.delete(entity.id);
    }

    moveEntity(entity: Entity, depth: number, x: number, y: number): void {
        const from = positionKey(entity.depth, entity.x, entity.y);
        const to = positionKey(depth, x, y);
        assertState(this.positionIndex.get(from) === entity, `Entity ${entity.id} not indexed at ${from}`);
        if (from === to) return;

        const occupant = this.positionIndex.get(to);
        if (occupant) {
            throw new StateCorruptionError(`Cannot move entity ${entity.id} onto ${to}: occupied by ${occupant.id}`);
        }
        this.positionIndex.delete(from);
        entity._setPosition(depth, x, y);
        this.positionIndex.set(to, entity);
    }

    /** Per-tick recompute of every entity's derived stats. */
    refreshDerived(): void {
        for (const entity of this.entityList) {
            entity.refreshDerived();
        }
    }

    /**
     * Verify both indices against the entity list.
     * Throws StateCorruptionError on the first mismatch.
     */
    checkIndices(): void {
        assertState(
            this.identityIndex.size === this.entityList.length,
            `Identity index has ${this.identityIndex.size} entries for ${this.entityList.length} entities`
        );
        assertState(
            this.positionIndex.size === this.entityList.length,
            `Position index has ${this.positionIndex.size} entries for ${this.entityList.length} entities`
        );
        for (const entity of this.entityList) {
            const key = positionKey(entity.depth, entity.x, entity.y);
            assertState(this.identityIndex.get(entity.id) === entity, `Identity index stale for entity ${entity.id}`);
            assertState(this.positionIndex.get(key) === entity, `Position index stale for entity ${entity.id} at ${key}`);
        }
    }

    // ==========================================
    // Views / Copies
    // ==========================================

    /** Non-authoritative view of the depth the given entity stands on. */
    viewFor(entity: Entity): GameState {
        return new GameState({
            authoritative: false,
            tick: this.tick,
            player1Id: this.player1Id,
            player2Id: this.player2Id,
            world: this.world.copyWithDepths([entity.depth]),
            entities: this.entitiesAtDepth(entity.depth).map(e => e.clone())
        });
    }

    /** Non-authoritative view of everything, for spectators. */
    viewSpectator(): GameState {
        return this.copy(false);
    }

    clone(): GameState {
        return this.copy(this.authoritative);
    }

    private copy(authoritative: boolean): GameState {
        return new GameState({
            authoritative,
            tick: this.tick,
            player1Id: this.player1Id,
            player2Id: this.player2Id,
            world: this.world.copy(),
            entities: this.entityList.map(e => e.clone())
        });
    }

    /** Value equality; entity order is irrelevant. */
    equals(other: GameState): boolean {
        if (this.authoritative !== other.authoritative) return false;
        if (this.tick !== other.tick) return false;
        if (this.player1Id !== other.player1Id || this.player2Id !== other.player2Id) return false;
        if (!this.world.equals(other.world)) return false;
        if (this.entityList.length !== other.entityList.length) return false;
        for (const entity of this.entityList) {
            const theirs = other.identityIndex.get(entity.id);
            if (!theirs || !entity.equals(theirs)) return false;
        }
        return true;
    }
}
