/**
 * Entity
 *
 * Anything occupying a cell: the two players and NPCs. Position is owned by
 * the GameState indices and only changes through GameState.moveEntity.
 */

import type { Modifier } from '../modifiers/types';
import { StateCorruptionError } from '../shared/errors';

export interface Item {
    name: string;
    count: number;
    stackSize: number;
}

/** Combat stats after applying every modifier's flat deltas. */
export interface DerivedStats {
    maxHealth: number;
    damage: number;
    armor: number;
}

export interface EntityInit {
    id: number;
    depth: number;
    x: number;
    y: number;
    health: number;
    baseMaxHealth: number;
    baseDamage: number;
    baseArmor: number;
    modifiers?: Modifier[];
    items?: Iterable<[number, Item]>;
}

export class Entity {
    readonly id: number;
    health: number;
    readonly baseMaxHealth: number;
    readonly baseDamage: number;
    readonly baseArmor: number;

    /** Exclusively owned; cloned (never shared) when the entity is cloned */
    readonly modifiers: Modifier[];

    /** Inventory slot -> item */
    readonly items: Map<number, Item>;

    private _depth: number;
    private _x: number;
    private _y: number;
    private derived: DerivedStats | null = null;

    constructor(init: EntityInit) {
        this.id = init.id;
        this._depth = init.depth;
        this._x = init.x;
        this._y = init.y;
        this.health = init.health;
        this.baseMaxHealth = init.baseMaxHealth;
        this.baseDamage = init.baseDamage;
        this.baseArmor = init.baseArmor;
        this.modifiers = init.modifiers ? [...init.modifiers] : [];
        this.items = new Map(init.items ?? []);
    }

    get depth(): number {
        return this._depth;
    }

    get x(): number {
        return this._x;
    }

    get y(): number {
        return this._y;
    }

    /**
     * Set position (internal - use GameState.moveEntity()).
     */
    _setPosition(depth: number, x: number, y: number): void {
        this._depth = depth;
        this._x = x;
        this._y = y;
    }

    // ==========================================
    // Derived Stats
    // ==========================================

    /**
     * Recompute derived stats from base stats and modifiers.
     * Runs at the start of every tick and whenever the modifier list changes.
     */
    refreshDerived(): DerivedStats {
        let maxHealth = this.baseMaxHealth;
        let damage = this.baseDamage;
        let armor = this.baseArmor;
        for (const mod of this.modifiers) {
            maxHealth += mod.flatMaxHealth;
            damage += mod.flatDamage;
            armor += mod.flatArmor;
        }
        this.derived = { maxHealth, damage, armor };
        return this.derived;
    }

    get stats(): DerivedStats {
        if (!this.derived) {
            throw new StateCorruptionError(`Derived stats of entity ${this.id} read before recompute`);
        }
        return this.derived;
    }

    get maxHealth(): number {
        return this.stats.maxHealth;
    }

    get damage(): number {
        return this.stats.damage;
    }

    get armor(): number {
        return this.stats.armor;
    }

    // ==========================================
    // Modifiers
    // ==========================================

    addModifier(modifier: Modifier): void {
        this.modifiers.push(modifier);
        this.refreshDerived();
    }

    removeModifierAt(index: number): Modifier {
        if (index < 0 || index >= this.modifiers.length) {
            throw new RangeError(`Entity ${this.id} has no modifier at index ${index}`);
        }
        const [removed] = this.modifiers.splice(index, 1);
        this.refreshDerived();
        return removed;
    }

    // ==========================================
    // Copy / Compare
    // ==========================================

    clone(): Entity {
        const copy = new Entity({
            id: this.id,
            depth: this._depth,
            x: this._x,
            y: this._y,
            health: this.health,
            baseMaxHealth: this.baseMaxHealth,
            baseDamage: this.baseDamage,
            baseArmor: this.baseArmor,
            modifiers: this.modifiers.map(mod => mod.clone()),
            items: Array.from(this.items, ([slot, item]): [number, Item] => [slot, { ...item }])
        });
        if (this.derived) {
            copy.derived = { ...this.derived };
        }
        return copy;
    }

    /** Value equality over stored fields; derived stats are not compared. */
    equals(other: Entity): boolean {
        if (this.id !== other.id) return false;
        if (this._depth !== other._depth || this._x !== other._x || this._y !== other._y) return false;
        if (this.health !== other.health) return false;
        if (this.baseMaxHealth !== other.baseMaxHealth) return false;
        if (this.baseDamage !== other.baseDamage || this.baseArmor !== other.baseArmor) return false;

        if (this.modifiers.length !== other.modifiers.length) return false;
        for (let i = 0; i < this.modifiers.length; i++) {
            const a = this.modifiers[i];
            const b = other.modifiers[i];
            if (a.kind !== b.kind) return false;
            if (!primsEqual(a.toPrims(), b.toPrims())) return false;
        }

        if (this.items.size !== other.items.size) return false;
        for (const [slot, item] of this.items) {
            const theirs = other.items.get(slot);
            if (!theirs) return false;
            if (item.name !== theirs.name || item.count !== theirs.count || item.stackSize !== theirs.stackSize) {
                return false;
            }
        }
        return true;
    }
}

function primsEqual(a: Record<string, number>, b: Record<string, number>): boolean {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every(key => a[key] === b[key]);
}
