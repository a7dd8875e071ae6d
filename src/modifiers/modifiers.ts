/**
 * Built-in Modifiers
 *
 * Closed set of modifier kinds. Each one is a plain value object: all of its
 * state is in toPrims(), so the codec can rebuild it on any client.
 */

import {
    CombatFlag,
    hasFlag,
    withDamage,
    type EventArgs,
    type Modifier,
    type ModifierContext,
    type ModifierEvent,
    type ModifierKind,
    type ModifierPrims,
    type PreEventContext,
    type PreVal
} from './types';

export interface FlatStats {
    maxHealth?: number;
    damage?: number;
    armor?: number;
}

/**
 * No-op defaults for every phase. Subclasses override what they react to.
 */
export abstract class BaseModifier implements Modifier {
    abstract readonly kind: ModifierKind;
    readonly flatMaxHealth: number;
    readonly flatDamage: number;
    readonly flatArmor: number;

    protected constructor(flat: FlatStats = {}) {
        this.flatMaxHealth = flat.maxHealth ?? 0;
        this.flatDamage = flat.damage ?? 0;
        this.flatArmor = flat.armor ?? 0;
    }

    handles(_event: ModifierEvent): boolean {
        return false;
    }

    preEvent(_ctx: PreEventContext, _args: EventArgs): PreVal {
        return null;
    }

    onEvent(_ctx: ModifierContext, args: EventArgs, _preVal: PreVal): EventArgs {
        return args;
    }

    postEvent(_ctx: ModifierContext, _args: EventArgs, _preVal: PreVal): void {}

    isExpired(): boolean {
        return false;
    }

    abstract clone(): Modifier;

    abstract toPrims(): ModifierPrims;
}

/** Rolls a d100 in the pre-phase; the roll is the preval. */
function rollPercent(ctx: PreEventContext): number {
    return ctx.random.nextInt(0, 100);
}

function asRoll(preVal: PreVal): number {
    // A missing roll never triggers the effect
    return typeof preVal === 'number' ? preVal : 100;
}

// ============================================
// stat
// ============================================

/** Flat stat deltas, no event reactions. */
export class StatModifier extends BaseModifier {
    readonly kind = 'stat';

    constructor(stats: FlatStats) {
        super(stats);
    }

    clone(): StatModifier {
        return new StatModifier({ maxHealth: this.flatMaxHealth, damage: this.flatDamage, armor: this.flatArmor });
    }

    toPrims(): ModifierPrims {
        return { maxHealth: this.flatMaxHealth, damage: this.flatDamage, armor: this.flatArmor };
    }
}

// ============================================
// critical
// ============================================

/** Attacker: `chance`% of attacks deal `bonus` extra damage. */
export class CriticalStrikeModifier extends BaseModifier {
    readonly kind = 'critical';

    constructor(
        readonly chance: number,
        readonly bonus: number
    ) {
        super();
    }

    handles(event: ModifierEvent): boolean {
        return event === 'parent_attack';
    }

    preEvent(ctx: PreEventContext, args: EventArgs): PreVal {
        return args.event === 'parent_attack' ? rollPercent(ctx) : null;
    }

    onEvent(_ctx: ModifierContext, args: EventArgs, preVal: PreVal): EventArgs {
        if (args.event !== 'parent_attack') return args;
        if (asRoll(preVal) >= this.chance) return args;
        return { ...args, result: withDamage(args.result, args.result.damage + this.bonus) };
    }

    clone(): CriticalStrikeModifier {
        return new CriticalStrikeModifier(this.chance, this.bonus);
    }

    toPrims(): ModifierPrims {
        return { chance: this.chance, bonus: this.bonus };
    }
}

// ============================================
// evasion
// ============================================

/** Defender: `chance`% of hits are dodged entirely, unless ambushed. */
export class EvasionModifier extends BaseModifier {
    readonly kind = 'evasion';

    constructor(readonly chance: number) {
        super();
    }

    handles(event: ModifierEvent): boolean {
        return event === 'parent_defend';
    }

    preEvent(ctx: PreEventContext, args: EventArgs): PreVal {
        return args.event === 'parent_defend' ? rollPercent(ctx) : null;
    }

    onEvent(_ctx: ModifierContext, args: EventArgs, preVal: PreVal): EventArgs {
        if (args.event !== 'parent_defend') return args;
        if (hasFlag(args.result, CombatFlag.Ambush)) return args;
        if (asRoll(preVal) >= this.chance) return args;
        return { ...args, result: withDamage(args.result, 0) };
    }

    clone(): EvasionModifier {
        return new EvasionModifier(this.chance);
    }

    toPrims(): ModifierPrims {
        return { chance: this.chance };
    }
}

// ============================================
// guard
// ============================================

/** Defender: extra armor, and `reduction` less damage when hit while holding still. */
export class GuardModifier extends BaseModifier {
    readonly kind = 'guard';

    constructor(
        armor: number,
        readonly reduction: number
    ) {
        super({ armor });
    }

    handles(event: ModifierEvent): boolean {
        return event === 'parent_defend';
    }

    onEvent(_ctx: ModifierContext, args: EventArgs, _preVal: PreVal): EventArgs {
        if (args.event !== 'parent_defend') return args;
        if (!hasFlag(args.result, CombatFlag.Block)) return args;
        const reduced = Math.max(0, args.result.damage - this.reduction);
        return { ...args, result: withDamage(args.result, Math.min(args.result.damage, reduced)) };
    }

    clone(): GuardModifier {
        return new GuardModifier(this.flatArmor, this.reduction);
    }

    toPrims(): ModifierPrims {
        return { armor: this.flatArmor, reduction: this.reduction };
    }
}

// ============================================
// thorns
// ============================================

/** Defender: whenever a hit lands, the attacker takes `damage`. */
export class ThornsModifier extends BaseModifier {
    readonly kind = 'thorns';

    constructor(readonly damage: number) {
        super();
    }

    handles(event: ModifierEvent): boolean {
        return event === 'parent_defend';
    }

    postEvent(ctx: ModifierContext, args: EventArgs, _preVal: PreVal): void {
        if (args.event !== 'parent_defend' || args.result.damage <= 0) return;
        const attacker = ctx.state.getEntity(args.attackerId);
        if (attacker) {
            attacker.health -= this.damage;
        }
    }

    clone(): ThornsModifier {
        return new ThornsModifier(this.damage);
    }

    toPrims(): ModifierPrims {
        return { damage: this.damage };
    }
}

// ============================================
// regeneration
// ============================================

/**
 * Heals `amount` per tick up to max health for `remaining` ticks.
 * A negative `remaining` never expires.
 */
export class RegenerationModifier extends BaseModifier {
    readonly kind = 'regeneration';
    private _remaining: number;

    constructor(
        readonly amount: number,
        remaining: number
    ) {
        super();
        this._remaining = remaining;
    }

    get remaining(): number {
        return this._remaining;
    }

    handles(event: ModifierEvent): boolean {
        return event === 'tick';
    }

    onEvent(ctx: ModifierContext, args: EventArgs, _preVal: PreVal): EventArgs {
        if (args.event !== 'tick') return args;
        const parent = ctx.parent;
        if (parent.health < parent.maxHealth) {
            parent.health = Math.min(parent.maxHealth, parent.health + this.amount);
        }
        return args;
    }

    postEvent(_ctx: ModifierContext, args: EventArgs, _preVal: PreVal): void {
        if (args.event === 'tick' && this._remaining > 0) {
            this._remaining--;
        }
    }

    isExpired(): boolean {
        return this._remaining === 0;
    }

    clone(): RegenerationModifier {
        return new RegenerationModifier(this.amount, this._remaining);
    }

    toPrims(): ModifierPrims {
        return { amount: this.amount, remaining: this._remaining };
    }
}
