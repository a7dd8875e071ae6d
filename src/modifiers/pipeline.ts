/**
 * Modifier Pipeline
 *
 * Runs the pre/on/post phases over an entity's modifiers in attachment order.
 * The server runs all three; replicas only run on/post, fed with the prevals
 * the server shipped.
 *
 * Modifiers that do not handle an event are skipped and get a null preval at
 * their index, so preval lists always line up with the modifier list.
 */

import type { Random } from '../math/random';
import type { Entity } from '../world/entity';
import type { GameState } from '../world/game-state';
import { assertState } from '../shared/errors';
import type {
    AttackEventArgs,
    AttackResult,
    DefendEventArgs,
    EventArgs,
    PreVal
} from './types';

// ============================================
// Single-entity phases
// ============================================

export function preEventAll(state: GameState, parent: Entity, args: EventArgs, random: Random): PreVal[] {
    const ctx = { state, parent, random };
    return parent.modifiers.map(mod => (mod.handles(args.event) ? mod.preEvent(ctx, args) : null));
}

export function onEventAll(state: GameState, parent: Entity, args: EventArgs, prevals: readonly PreVal[]): EventArgs {
    checkPrevals(parent, prevals);
    const ctx = { state, parent };
    let current = args;
    for (let i = 0; i < parent.modifiers.length; i++) {
        const mod = parent.modifiers[i];
        if (!mod.handles(current.event)) continue;
        const next = mod.onEvent(ctx, current, prevals[i]);
        assertState(next.event === current.event, `Modifier ${mod.kind} changed event ${current.event} to ${next.event}`);
        current = next;
    }
    return current;
}

export function postEventAll(state: GameState, parent: Entity, args: EventArgs, prevals: readonly PreVal[]): void {
    checkPrevals(parent, prevals);
    const ctx = { state, parent };
    for (let i = 0; i < parent.modifiers.length; i++) {
        const mod = parent.modifiers[i];
        if (mod.handles(args.event)) {
            mod.postEvent(ctx, args, prevals[i]);
        }
    }
}

/** on + post for one entity's event; used by generic entity events. */
export function runEntityEvent(state: GameState, parent: Entity, args: EventArgs, prevals: readonly PreVal[]): EventArgs {
    const result = onEventAll(state, parent, args, prevals);
    postEventAll(state, parent, result, prevals);
    return result;
}

function checkPrevals(parent: Entity, prevals: readonly PreVal[]): void {
    assertState(
        prevals.length === parent.modifiers.length,
        `Entity ${parent.id} has ${parent.modifiers.length} modifiers but ${prevals.length} prevals`
    );
}

// ============================================
// Combat
// ============================================

export interface CombatPrevals {
    attack: PreVal[];
    defend: PreVal[];
}

function attackArgs(defender: Entity, result: AttackResult): AttackEventArgs {
    return { event: 'parent_attack', defenderId: defender.id, result };
}

function defendArgs(attacker: Entity, result: AttackResult): DefendEventArgs {
    return { event: 'parent_defend', attackerId: attacker.id, result };
}

/**
 * Server-only: every attacker pre, then every defender pre.
 */
export function combatPreEvents(
    state: GameState,
    attacker: Entity,
    defender: Entity,
    base: AttackResult,
    random: Random
): CombatPrevals {
    return {
        attack: preEventAll(state, attacker, attackArgs(defender, base), random),
        defend: preEventAll(state, defender, defendArgs(attacker, base), random)
    };
}

/**
 * Deterministic part of combat, identical on server and replicas:
 * attacker on, defender on (seeing the attacker's result), attacker post,
 * defender post. Returns the final result; health is not touched here.
 */
export function resolveCombatEvents(
    state: GameState,
    attacker: Entity,
    defender: Entity,
    base: AttackResult,
    prevals: CombatPrevals
): AttackResult {
    const afterAttack = onEventAll(state, attacker, attackArgs(defender, base), prevals.attack);
    const attackResult = afterAttack.event === 'parent_attack' ? afterAttack.result : base;

    const afterDefend = onEventAll(state, defender, defendArgs(attacker, attackResult), prevals.defend);
    const finalResult = afterDefend.event === 'parent_defend' ? afterDefend.result : attackResult;

    postEventAll(state, attacker, attackArgs(defender, finalResult), prevals.attack);
    postEventAll(state, defender, defendArgs(attacker, finalResult), prevals.defend);
    return finalResult;
}
