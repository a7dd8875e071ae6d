/**
 * Updater - Tick Resolution
 *
 * Moves an authoritative GameState forward one tick from two player moves,
 * mutating it in place and returning the ordered update log that lets every
 * client replay the same tick without any randomness.
 *
 * Per tick:
 * 1. Recompute derived stats, coerce blocked moves to Stay
 * 2. Initiative: shuffled players first, then shuffled NPCs
 * 3. Resolve each entity in initiative order (move / descend / attack)
 * 4. Death sweep over NPCs
 * 5. Tick events, modifier expiry, health clamp
 * 6. Advance the tick and decide the outcome
 *
 * Synchronous and not re-entrant; the caller serializes ticks.
 */

import type { Random } from '../math/random';
import { Tile, type Dungeon } from '../world/dungeon';
import type { Entity } from '../world/entity';
import type { GameState } from '../world/game-state';
import { CombatFlag, createAttackResult, type EventArgs, type Modifier } from '../modifiers/types';
import { combatPreEvents, preEventAll, resolveCombatEvents, runEntityEvent } from '../modifiers/pipeline';
import { ConfigError, StateCorruptionError } from '../shared/errors';
import { Move, moveDelta } from './moves';
import type { GameStateUpdate, ModifierAddedUpdate, ModifierRemovedUpdate } from './updates';
import {
    findFreeGround,
    spawnNpc,
    stayInPlace,
    type DungeonGenerator,
    type NpcMoveSelector,
    type NpcPopulator
} from './worldgen';

// Debug flag - set to true to trace move resolution
const DEBUG_UPDATER = false;

// ============================================
// Types
// ============================================

export const DESPAWN_STRATEGIES = ['unreachable', 'unused'] as const;

/**
 * When a level a player just left may be discarded:
 * - unreachable: both players are strictly deeper (it can never be revisited)
 * - unused: no player is on it
 * Either way a level that still holds an entity is kept.
 */
export type DespawnStrategy = typeof DESPAWN_STRATEGIES[number];

export function parseDespawnStrategy(value: string): DespawnStrategy {
    const normalized = value.trim().toLowerCase();
    for (const strategy of DESPAWN_STRATEGIES) {
        if (strategy === normalized) return strategy;
    }
    throw new ConfigError(`Unknown despawn strategy '${value}' (expected ${DESPAWN_STRATEGIES.join(' or ')})`);
}

export type TickOutcome = 'in-progress' | 'player1-win' | 'player2-win' | 'tie';

/** What happened to each entity during move resolution. */
export enum MoveOutcome {
    Rest = 'rest',
    Move = 'move',
    Block = 'block',
    AttackBlocked = 'attack-blocked',
    AttackParry = 'attack-parry',
    AttackAmbush = 'attack-ambush',
    Descend = 'descend',
    Died = 'died'
}

export interface TickResult {
    outcome: TickOutcome;
    updates: GameStateUpdate[];
    /** Entity ids in initiative order */
    initiative: number[];
    moveOutcomes: ReadonlyMap<number, MoveOutcome>;
}

export interface UpdaterOptions {
    dungeonGenerator: DungeonGenerator;
    despawnStrategy: DespawnStrategy;
    random: Random;
    npcMoves?: NpcMoveSelector;
    npcPopulator?: NpcPopulator;
    /** Tick at which an undecided match ends in a tie */
    maxTicks?: number;
    /** First update order to hand out (default 0) */
    initialOrder?: number;
}

/** Scratch data for one resolveTick call. */
interface TickScratch {
    state: GameState;
    updates: GameStateUpdate[];
    moves: Map<number, Move>;
    /** Destination of each validated move, from the entity's start-of-tick cell */
    destinations: Map<number, { x: number; y: number }>;
    initiative: Map<number, number>;
    outcomes: Map<number, MoveOutcome>;
    /** Entities already pulled into a fight before their own turn */
    engaged: Set<number>;
}

// ============================================
// Updater
// ============================================

export class Updater {
    readonly despawnStrategy: DespawnStrategy;
    readonly maxTicks: number | undefined;

    private readonly dungeonGenerator: DungeonGenerator;
    private readonly random: Random;
    private readonly npcMoves: NpcMoveSelector;
    private readonly npcPopulator: NpcPopulator | null;
    private order: number;
    private resolving: boolean = false;

    constructor(options: UpdaterOptions) {
        this.dungeonGenerator = options.dungeonGenerator;
        this.despawnStrategy = parseDespawnStrategy(options.despawnStrategy);
        this.random = options.random;
        this.npcMoves = options.npcMoves ?? stayInPlace;
        this.npcPopulator = options.npcPopulator ?? null;
        this.maxTicks = options.maxTicks;
        this.order = options.initialOrder ?? 0;
    }

    /** True while a tick is being resolved. */
    get isSimulating(): boolean {
        return this.resolving;
    }

    /** Get the next update order and advance the counter. */
    nextOrder(): number {
        return this.order++;
    }

    /** Order the next record will get. */
    peekOrder(): number {
        return this.order;
    }

    // ==========================================
    // Between-tick mutations
    // ==========================================

    grantModifier(state: GameState, entityId: number, modifier: Modifier): ModifierAddedUpdate {
        const entity = state.requireEntity(entityId);
        entity.addModifier(modifier);
        return { kind: 'modifier-added', order: this.nextOrder(), entityId, depth: entity.depth, modifier: modifier.clone() };
    }

    revokeModifier(state: GameState, entityId: number, index: number): ModifierRemovedUpdate {
        const entity = state.requireEntity(entityId);
        entity.removeModifierAt(index);
        return { kind: 'modifier-removed', order: this.nextOrder(), entityId, depth: entity.depth, index };
    }

    // ==========================================
    // Tick
    // ==========================================

    resolveTick(state: GameState, player1Move: Move, player2Move: Move): TickResult {
        if (!state.authoritative) {
            throw new StateCorruptionError('resolveTick requires an authoritative state');
        }
        if (this.resolving) {
            throw new StateCorruptionError('resolveTick re-entered while a tick is resolving');
        }
        this.resolving = true;
        try {
            return this.resolve(state, player1Move, player2Move);
        } finally {
            this.resolving = false;
        }
    }

    private resolve(state: GameState, player1Move: Move, player2Move: Move): TickResult {
        state.refreshDerived();

        const tick: TickScratch = {
            state,
            updates: [],
            moves: new Map(),
            destinations: new Map(),
            initiative: new Map(),
            outcomes: new Map(),
            engaged: new Set()
        };

        const player1 = state.player1;
        const player2 = state.player2;
        const npcs = state.npcs();

        tick.moves.set(player1.id, this.validateMove(state, player1, player1Move));
        tick.moves.set(player2.id, this.validateMove(state, player2, player2Move));
        for (const npc of npcs) {
            tick.moves.set(npc.id, this.validateMove(state, npc, this.npcMoves(state, npc)));
        }

        for (const entity of state.entities) {
            tick.destinations.set(entity.id, destinationOf(entity, tick.moves.get(entity.id) ?? Move.Stay));
        }

        const order = [...this.random.shuffle([player1, player2]), ...this.random.shuffle([...npcs])];
        order.forEach((entity, index) => tick.initiative.set(entity.id, index));

        for (const entity of order) {
            this.resolveEntity(tick, entity);
        }

        this.sweepDead(tick);
        this.runTickEvents(tick);
        this.expireModifiers(tick);
        this.clampHealth(tick);

        state.tick += 1;
        tick.updates.push({ kind: 'tick-end', order: this.nextOrder(), tick: state.tick });

        if (DEBUG_UPDATER) {
            console.log(`[updater] tick ${state.tick}: ${tick.updates.length} updates`);
        }

        return {
            outcome: this.outcomeFor(state),
            updates: tick.updates,
            initiative: order.map(entity => entity.id),
            moveOutcomes: tick.outcomes
        };
    }

    private validateMove(state: GameState, entity: Entity, move: Move): Move {
        if (move === Move.Stay) return move;
        const dungeon = state.world.get(entity.depth);
        const { x, y } = destinationOf(entity, move);
        if (!dungeon || dungeon.isBlocked(x, y)) {
            return Move.Stay;
        }
        return move;
    }

    private resolveEntity(tick: TickScratch, entity: Entity): void {
        const state = tick.state;
        // Pulled into a fight as the defender before its own turn: stays put
        if (tick.engaged.has(entity.id)) return;
        if (state.getEntity(entity.id) !== entity || entity.health <= 0) return;

        const move = tick.moves.get(entity.id) ?? Move.Stay;
        if (move === Move.Stay) {
            if (!tick.outcomes.has(entity.id)) {
                tick.outcomes.set(entity.id, MoveOutcome.Rest);
            }
            return;
        }

        const dest = destinationOf(entity, move);
        const occupant = state.entityAt(entity.depth, dest.x, dest.y);

        if (!occupant) {
            const dungeon = state.world.require(entity.depth);
            if (dungeon.tileAt(dest.x, dest.y) === Tile.StaircaseDown) {
                this.descend(tick, entity);
                return;
            }
            state.moveEntity(entity, entity.depth, dest.x, dest.y);
            tick.outcomes.set(entity.id, MoveOutcome.Move);
            tick.updates.push({
                kind: 'entity-position',
                order: this.nextOrder(),
                entityId: entity.id,
                depth: entity.depth,
                x: dest.x,
                y: dest.y,
                fromDepth: entity.depth,
                depthChanged: false,
                entity: null
            });
            return;
        }

        const occupantMove = tick.moves.get(occupant.id) ?? Move.Stay;
        if (occupantMove === Move.Stay) {
            tick.outcomes.set(entity.id, MoveOutcome.AttackBlocked);
            tick.outcomes.set(occupant.id, MoveOutcome.Block);
            this.handleCombat(tick, entity, occupant, CombatFlag.Block);
            return;
        }

        const occupantDest = tick.destinations.get(occupant.id);
        if (occupantDest && occupantDest.x === entity.x && occupantDest.y === entity.y) {
            // Mutual swap: one fight, the occupant does not process it again
            tick.outcomes.set(entity.id, MoveOutcome.AttackParry);
            tick.outcomes.set(occupant.id, MoveOutcome.Block);
            tick.engaged.add(occupant.id);
            this.handleCombat(tick, entity, occupant, CombatFlag.Parry);
            return;
        }

        if (this.initiativeOf(tick, occupant) < this.initiativeOf(tick, entity)) {
            // Occupant already resolved and is standing here
            tick.outcomes.set(entity.id, MoveOutcome.AttackAmbush);
            this.handleCombat(tick, entity, occupant, CombatFlag.Ambush);
            return;
        }

        // Occupant has not moved yet and was about to leave
        tick.outcomes.set(entity.id, MoveOutcome.AttackBlocked);
        tick.outcomes.set(occupant.id, MoveOutcome.Block);
        tick.engaged.add(occupant.id);
        this.handleCombat(tick, entity, occupant, CombatFlag.Flee);
    }

    private initiativeOf(tick: TickScratch, entity: Entity): number {
        const initiative = tick.initiative.get(entity.id);
        if (initiative === undefined) {
            throw new StateCorruptionError(`Entity ${entity.id} has no initiative this tick`);
        }
        return initiative;
    }

    // ==========================================
    // Combat
    // ==========================================

    private handleCombat(tick: TickScratch, attacker: Entity, defender: Entity, flag: CombatFlag): void {
        const state = tick.state;
        const base = createAttackResult(attacker.damage - defender.armor, [flag]);
        const prevals = combatPreEvents(state, attacker, defender, base, this.random);
        const result = resolveCombatEvents(state, attacker, defender, base, prevals);
        if (result.damage > 0) {
            defender.health -= result.damage;
        }

        if (DEBUG_UPDATER) {
            console.log(`[updater] ${attacker.id} hits ${defender.id} (${flag}) for ${result.damage} (base ${base.damage})`);
        }

        tick.updates.push({
            kind: 'entity-combat',
            order: this.nextOrder(),
            attackerId: attacker.id,
            defenderId: defender.id,
            depth: attacker.depth,
            damage: base.damage,
            flags: base.flags,
            attackPrevals: prevals.attack,
            defendPrevals: prevals.defend
        });
    }

    // ==========================================
    // Descent
    // ==========================================

    private descend(tick: TickScratch, entity: Entity): void {
        const state = tick.state;
        const fromDepth = entity.depth;

        if (!state.isPlayer(entity)) {
            // Stairs are lethal to NPCs
            state.removeEntity(entity);
            tick.outcomes.set(entity.id, MoveOutcome.Died);
            tick.updates.push({ kind: 'entity-death', order: this.nextOrder(), entityId: entity.id, depth: fromDepth });
            return;
        }

        const depth = fromDepth + 1;
        let dungeon = state.world.get(depth);
        if (!dungeon) {
            dungeon = this.createDepth(tick, depth);
        }

        const spot = findFreeGround(state, depth, dungeon, this.random);
        state.moveEntity(entity, depth, spot.x, spot.y);
        tick.outcomes.set(entity.id, MoveOutcome.Descend);
        tick.updates.push({
            kind: 'entity-position',
            order: this.nextOrder(),
            entityId: entity.id,
            depth,
            x: spot.x,
            y: spot.y,
            fromDepth,
            depthChanged: true,
            entity: entity.clone()
        });

        this.maybeDespawn(tick, fromDepth);
    }

    private createDepth(tick: TickScratch, depth: number): Dungeon {
        const state = tick.state;
        const dungeon = this.dungeonGenerator.spawnDungeon(depth);
        state.world.set(depth, dungeon);
        tick.updates.push({ kind: 'dungeon-created', order: this.nextOrder(), depth, dungeon });

        if (DEBUG_UPDATER) {
            console.log(`[updater] generated depth ${depth} (${dungeon.width}x${dungeon.height})`);
        }

        if (this.npcPopulator) {
            for (const template of this.npcPopulator.populate(depth, dungeon)) {
                const npc = spawnNpc(state, depth, dungeon, template, this.random);
                tick.updates.push({ kind: 'entity-spawn', order: this.nextOrder(), entity: npc.clone() });
            }
        }
        return dungeon;
    }

    private maybeDespawn(tick: TickScratch, depth: number): void {
        const state = tick.state;
        if (!state.world.has(depth)) return;
        // Never discard a level that still holds anything
        if (state.entitiesAtDepth(depth).length > 0) return;

        const p1 = state.player1.depth;
        const p2 = state.player2.depth;
        const despawn = this.despawnStrategy === 'unreachable'
            ? p1 > depth && p2 > depth
            : p1 !== depth && p2 !== depth;
        if (!despawn) return;

        state.world.delete(depth);
        tick.updates.push({ kind: 'dungeon-removed', order: this.nextOrder(), depth });

        if (DEBUG_UPDATER) {
            console.log(`[updater] despawned depth ${depth} (${this.despawnStrategy})`);
        }
    }

    // ==========================================
    // End of tick
    // ==========================================

    private sweepDead(tick: TickScratch): void {
        const state = tick.state;
        const entities = state.entities;
        for (let i = entities.length - 1; i >= 0; i--) {
            const entity = entities[i];
            if (state.isPlayer(entity) || entity.health > 0) continue;
            state.removeEntity(entity);
            tick.outcomes.set(entity.id, MoveOutcome.Died);
            tick.updates.push({ kind: 'entity-death', order: this.nextOrder(), entityId: entity.id, depth: entity.depth });
        }
    }

    private runTickEvents(tick: TickScratch): void {
        const state = tick.state;
        for (const entity of [...state.entities]) {
            if (entity.health <= 0) continue;
            if (!entity.modifiers.some(mod => mod.handles('tick'))) continue;

            const args: EventArgs = { event: 'tick' };
            const prevals = preEventAll(state, entity, args, this.random);
            runEntityEvent(state, entity, args, prevals);
            tick.updates.push({
                kind: 'entity-event',
                order: this.nextOrder(),
                entityId: entity.id,
                depth: entity.depth,
                args,
                prevals
            });
        }
    }

    private expireModifiers(tick: TickScratch): void {
        for (const entity of tick.state.entities) {
            for (let i = entity.modifiers.length - 1; i >= 0; i--) {
                if (!entity.modifiers[i].isExpired()) continue;
                entity.removeModifierAt(i);
                tick.updates.push({
                    kind: 'modifier-removed',
                    order: this.nextOrder(),
                    entityId: entity.id,
                    depth: entity.depth,
                    index: i
                });
            }
        }
    }

    private clampHealth(tick: TickScratch): void {
        for (const entity of tick.state.entities) {
            if (entity.health <= entity.maxHealth) continue;
            const amount = entity.maxHealth - entity.health;
            entity.health += amount;
            tick.updates.push({
                kind: 'entity-health',
                order: this.nextOrder(),
                entityId: entity.id,
                depth: entity.depth,
                sourceId: null,
                amount
            });
        }
    }

    private outcomeFor(state: GameState): TickOutcome {
        const p1Dead = state.player1.health <= 0;
        const p2Dead = state.player2.health <= 0;
        if (p1Dead && p2Dead) return 'tie';
        if (p1Dead) return 'player2-win';
        if (p2Dead) return 'player1-win';
        if (this.maxTicks !== undefined && state.tick >= this.maxTicks) return 'tie';
        return 'in-progress';
    }
}

function destinationOf(entity: Entity, move: Move): { x: number; y: number } {
    const { dx, dy } = moveDelta(move);
    return { x: entity.x + dx, y: entity.y + dy };
}
