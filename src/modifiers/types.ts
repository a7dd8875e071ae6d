/**
 * Modifier Event Protocol - Types
 *
 * Every modifier reacts to events in three phases:
 * - pre:  authoritative side only, may draw randomness; its result (the
 *         "preval") is shipped to every client with the update record
 * - on:   deterministic given args + preval; the only phase that may change
 *         the outcome, by returning updated args
 * - post: deterministic; sees the fixed outcome, may only cause side effects
 */

import type { Random } from '../math/random';
import type { Entity } from '../world/entity';
import type { GameState } from '../world/game-state';

// ============================================
// Events
// ============================================

export const MODIFIER_EVENTS = ['parent_attack', 'parent_defend', 'tick'] as const;

export type ModifierEvent = typeof MODIFIER_EVENTS[number];

// ============================================
// Attack Results
// ============================================

/** How an engagement came about. */
export enum CombatFlag {
    Block = 'block',
    Ambush = 'ambush',
    Flee = 'flee',
    Parry = 'parry'
}

const FLAG_ORDER: readonly CombatFlag[] = [CombatFlag.Block, CombatFlag.Ambush, CombatFlag.Flee, CombatFlag.Parry];

/**
 * Accumulator threaded through the on-phase. Never mutated in place:
 * a modifier that changes the outcome returns a new one.
 */
export interface AttackResult {
    readonly damage: number;
    readonly flags: readonly CombatFlag[];
}

/** Builds a result with de-duplicated flags in canonical order. */
export function createAttackResult(damage: number, flags: Iterable<CombatFlag>): AttackResult {
    if (!Number.isInteger(damage)) {
        throw new RangeError(`Attack damage must be an integer, got ${damage}`);
    }
    const set = new Set(flags);
    return { damage, flags: FLAG_ORDER.filter(flag => set.has(flag)) };
}

export function withDamage(result: AttackResult, damage: number): AttackResult {
    return createAttackResult(damage, result.flags);
}

export function withFlag(result: AttackResult, flag: CombatFlag): AttackResult {
    return createAttackResult(result.damage, [...result.flags, flag]);
}

export function hasFlag(result: AttackResult, flag: CombatFlag): boolean {
    return result.flags.includes(flag);
}

// ============================================
// Event Arguments
// ============================================

export interface AttackEventArgs {
    readonly event: 'parent_attack';
    readonly defenderId: number;
    readonly result: AttackResult;
}

export interface DefendEventArgs {
    readonly event: 'parent_defend';
    readonly attackerId: number;
    readonly result: AttackResult;
}

/** Fired once per tick for every living entity, after moves are resolved. */
export interface TickEventArgs {
    readonly event: 'tick';
}

export type EventArgs = AttackEventArgs | DefendEventArgs | TickEventArgs;

// ============================================
// Modifiers
// ============================================

/** JSON-safe value produced by the pre-phase. */
export type PreVal = null | boolean | number | string | PreVal[] | { [key: string]: PreVal };

export interface ModifierContext {
    readonly state: GameState;
    /** Entity the modifier is attached to */
    readonly parent: Entity;
}

export interface PreEventContext extends ModifierContext {
    readonly random: Random;
}

export type ModifierKind = 'stat' | 'critical' | 'evasion' | 'guard' | 'thorns' | 'regeneration';

/** Primitive payload of a modifier, as shipped on the wire. */
export type ModifierPrims = Record<string, number>;

export interface Modifier {
    readonly kind: ModifierKind;
    readonly flatMaxHealth: number;
    readonly flatDamage: number;
    readonly flatArmor: number;

    /**
     * Optimization hint only: returning false lets the pipeline skip this
     * modifier, which must be indistinguishable from running no-op phases.
     */
    handles(event: ModifierEvent): boolean;

    preEvent(ctx: PreEventContext, args: EventArgs): PreVal;

    onEvent(ctx: ModifierContext, args: EventArgs, preVal: PreVal): EventArgs;

    postEvent(ctx: ModifierContext, args: EventArgs, preVal: PreVal): void;

    /** Expired modifiers are removed by the updater with an explicit record. */
    isExpired(): boolean;

    clone(): Modifier;

    toPrims(): ModifierPrims;
}
