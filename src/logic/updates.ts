/**
 * Game State Updates
 *
 * The update log is the wire contract between the server and every client.
 * Each record describes one atomic mutation, carries a strictly increasing
 * `order`, and can be replayed with applyUpdate() without any randomness:
 * records that involve modifiers carry the server's prevals.
 *
 * Records also carry the depth they concern so feeds can be filtered per
 * viewer without looking anything up (the entity may already be gone).
 */

import type { Dungeon } from '../world/dungeon';
import type { Entity } from '../world/entity';
import type { GameState } from '../world/game-state';
import { createAttackResult, type CombatFlag, type EventArgs, type Modifier, type PreVal } from '../modifiers/types';
import { resolveCombatEvents, runEntityEvent } from '../modifiers/pipeline';
import { ReplayMismatchError, StateCorruptionError } from '../shared/errors';

// ============================================
// Record Types
// ============================================

interface UpdateBase {
    readonly order: number;
}

export interface EntitySpawnUpdate extends UpdateBase {
    readonly kind: 'entity-spawn';
    /** Snapshot at spawn time; cloned again on apply */
    readonly entity: Entity;
}

export interface EntityDeathUpdate extends UpdateBase {
    readonly kind: 'entity-death';
    readonly entityId: number;
    readonly depth: number;
}

export interface EntityPositionUpdate extends UpdateBase {
    readonly kind: 'entity-position';
    readonly entityId: number;
    readonly depth: number;
    readonly x: number;
    readonly y: number;
    readonly fromDepth: number;
    readonly depthChanged: boolean;
    /** Snapshot after arrival, for viewers that did not see the entity before (depth changes only) */
    readonly entity: Entity | null;
}

export interface EntityHealthUpdate extends UpdateBase {
    readonly kind: 'entity-health';
    readonly entityId: number;
    readonly depth: number;
    /** Entity that caused the change, if any */
    readonly sourceId: number | null;
    readonly amount: number;
}

export interface ModifierAddedUpdate extends UpdateBase {
    readonly kind: 'modifier-added';
    readonly entityId: number;
    readonly depth: number;
    readonly modifier: Modifier;
}

export interface ModifierRemovedUpdate extends UpdateBase {
    readonly kind: 'modifier-removed';
    readonly entityId: number;
    readonly depth: number;
    /** Index in the entity's modifier list at the time of removal */
    readonly index: number;
}

export interface DungeonCreatedUpdate extends UpdateBase {
    readonly kind: 'dungeon-created';
    readonly depth: number;
    readonly dungeon: Dungeon;
}

export interface DungeonRemovedUpdate extends UpdateBase {
    readonly kind: 'dungeon-removed';
    readonly depth: number;
}

export interface EntityEventUpdate extends UpdateBase {
    readonly kind: 'entity-event';
    readonly entityId: number;
    readonly depth: number;
    readonly args: EventArgs;
    /** One per modifier on the entity, in attachment order */
    readonly prevals: readonly PreVal[];
}

export interface EntityCombatUpdate extends UpdateBase {
    readonly kind: 'entity-combat';
    readonly attackerId: number;
    readonly defenderId: number;
    readonly depth: number;
    /** Base damage before modifiers; replay recomputes the final value */
    readonly damage: number;
    readonly flags: readonly CombatFlag[];
    readonly attackPrevals: readonly PreVal[];
    readonly defendPrevals: readonly PreVal[];
}

export interface TickEndUpdate extends UpdateBase {
    readonly kind: 'tick-end';
    readonly tick: number;
}

export type GameStateUpdate =
    | EntitySpawnUpdate
    | EntityDeathUpdate
    | EntityPositionUpdate
    | EntityHealthUpdate
    | ModifierAddedUpdate
    | ModifierRemovedUpdate
    | DungeonCreatedUpdate
    | DungeonRemovedUpdate
    | EntityEventUpdate
    | EntityCombatUpdate
    | TickEndUpdate;

export type UpdateKind = GameStateUpdate['kind'];

// ============================================
// Relevance
// ============================================

/**
 * Whether a viewer looking at `depth` needs this record. Read-only.
 */
export function isUpdateRelevant(update: GameStateUpdate, depth: number): boolean {
    switch (update.kind) {
        case 'entity-spawn':
            return update.entity.depth === depth;
        case 'entity-position':
            return update.depth === depth || (update.depthChanged && update.fromDepth === depth);
        case 'entity-death':
        case 'entity-health':
        case 'modifier-added':
        case 'modifier-removed':
        case 'dungeon-created':
        case 'dungeon-removed':
        case 'entity-event':
        case 'entity-combat':
            return update.depth === depth;
        case 'tick-end':
            return true;
    }
}

// ============================================
// Apply
// ============================================

function entityFor(state: GameState, update: GameStateUpdate, id: number): Entity {
    const entity = state.getEntity(id);
    if (!entity) {
        throw new ReplayMismatchError(`Update ${update.order} (${update.kind}) references unknown entity ${id}`, update.order);
    }
    return entity;
}

function checkPrevals(update: GameStateUpdate, entity: Entity, prevals: readonly PreVal[]): void {
    if (prevals.length !== entity.modifiers.length) {
        throw new ReplayMismatchError(
            `Update ${update.order} carries ${prevals.length} prevals for ${entity.modifiers.length} modifiers on entity ${entity.id}`,
            update.order
        );
    }
}

function checkCellFree(state: GameState, update: GameStateUpdate, depth: number, x: number, y: number, moverId: number): void {
    const occupant = state.entityAt(depth, x, y);
    if (occupant && occupant.id !== moverId) {
        throw new ReplayMismatchError(
            `Update ${update.order} puts entity ${moverId} on ${depth}:${x}:${y}, held by entity ${occupant.id}`,
            update.order
        );
    }
}

/**
 * Replay one record onto a state. Throws ReplayMismatchError when the state
 * lacks something the record references.
 */
export function applyUpdate(state: GameState, update: GameStateUpdate): void {
    switch (update.kind) {
        case 'entity-spawn': {
            if (state.getEntity(update.entity.id)) {
                throw new ReplayMismatchError(`Update ${update.order} spawns existing entity ${update.entity.id}`, update.order);
            }
            checkCellFree(state, update, update.entity.depth, update.entity.x, update.entity.y, update.entity.id);
            state.addEntity(update.entity.clone());
            return;
        }
        case 'entity-death': {
            state.removeEntity(entityFor(state, update, update.entityId));
            return;
        }
        case 'entity-position': {
            applyPosition(state, update);
            return;
        }
        case 'entity-health': {
            entityFor(state, update, update.entityId).health += update.amount;
            return;
        }
        case 'modifier-added': {
            entityFor(state, update, update.entityId).addModifier(update.modifier.clone());
            return;
        }
        case 'modifier-removed': {
            const entity = entityFor(state, update, update.entityId);
            if (update.index < 0 || update.index >= entity.modifiers.length) {
                throw new ReplayMismatchError(
                    `Update ${update.order} removes modifier ${update.index} of entity ${entity.id} which has ${entity.modifiers.length}`,
                    update.order
                );
            }
            entity.removeModifierAt(update.index);
            return;
        }
        case 'dungeon-created': {
            state.world.set(update.depth, update.dungeon);
            return;
        }
        case 'dungeon-removed': {
            state.world.delete(update.depth);
            return;
        }
        case 'entity-event': {
            const entity = entityFor(state, update, update.entityId);
            checkPrevals(update, entity, update.prevals);
            runEntityEvent(state, entity, update.args, update.prevals);
            return;
        }
        case 'entity-combat': {
            const attacker = entityFor(state, update, update.attackerId);
            const defender = entityFor(state, update, update.defenderId);
            checkPrevals(update, attacker, update.attackPrevals);
            checkPrevals(update, defender, update.defendPrevals);
            const result = resolveCombatEvents(state, attacker, defender, createAttackResult(update.damage, update.flags), {
                attack: [...update.attackPrevals],
                defend: [...update.defendPrevals]
            });
            if (result.damage > 0) {
                defender.health -= result.damage;
            }
            return;
        }
        case 'tick-end': {
            state.tick = update.tick;
            return;
        }
    }
}

function applyPosition(state: GameState, update: EntityPositionUpdate): void {
    const entity = state.getEntity(update.entityId);
    const destinationVisible = state.world.has(update.depth);
    if (destinationVisible) {
        checkCellFree(state, update, update.depth, update.x, update.y, update.entityId);
    }

    if (!update.depthChanged) {
        if (!entity) {
            throw new ReplayMismatchError(`Update ${update.order} moves unknown entity ${update.entityId}`, update.order);
        }
        state.moveEntity(entity, update.depth, update.x, update.y);
        return;
    }

    if (entity) {
        if (destinationVisible) {
            state.moveEntity(entity, update.depth, update.x, update.y);
        } else {
            // Left this view
            state.removeEntity(entity);
        }
        return;
    }

    if (!destinationVisible) {
        throw new ReplayMismatchError(`Update ${update.order} moves unknown entity ${update.entityId} to an unseen depth`, update.order);
    }
    if (!update.entity) {
        throw new StateCorruptionError(`Depth-changing update ${update.order} carries no entity snapshot`);
    }
    // Arrived in this view
    state.addEntity(update.entity.clone());
}

/**
 * Apply a sequence of records, enforcing strictly ascending order.
 */
export function applyUpdates(state: GameState, updates: Iterable<GameStateUpdate>): void {
    let last = -Infinity;
    for (const update of updates) {
        if (update.order <= last) {
            throw new ReplayMismatchError(`Update ${update.order} applied after ${last}`, update.order);
        }
        applyUpdate(state, update);
        last = update.order;
    }
}
