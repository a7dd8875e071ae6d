/**
 * World
 *
 * Depth -> Dungeon mapping. May be partially loaded: a missing depth is
 * either not generated yet or despawned.
 */

import { Dungeon } from './dungeon';
import { StateCorruptionError } from '../shared/errors';

export class World {
    private readonly dungeons: Map<number, Dungeon>;

    constructor(dungeons: Iterable<[number, Dungeon]> = []) {
        this.dungeons = new Map(dungeons);
    }

    has(depth: number): boolean {
        return this.dungeons.has(depth);
    }

    get(depth: number): Dungeon | undefined {
        return this.dungeons.get(depth);
    }

    require(depth: number): Dungeon {
        const dungeon = this.dungeons.get(depth);
        if (!dungeon) {
            throw new StateCorruptionError(`No dungeon loaded at depth ${depth}`);
        }
        return dungeon;
    }

    set(depth: number, dungeon: Dungeon): void {
        this.dungeons.set(depth, dungeon);
    }

    delete(depth: number): boolean {
        return this.dungeons.delete(depth);
    }

    /** Loaded depths, ascending. */
    depths(): number[] {
        return Array.from(this.dungeons.keys()).sort((a, b) => a - b);
    }

    /** Shallow copy restricted to the given depths (dungeons are immutable). */
    copyWithDepths(depths: Iterable<number>): World {
        const copy = new World();
        for (const depth of depths) {
            const dungeon = this.dungeons.get(depth);
            if (dungeon) copy.set(depth, dungeon);
        }
        return copy;
    }

    copy(): World {
        return new World(this.dungeons);
    }

    equals(other: World): boolean {
        const depths = this.depths();
        const otherDepths = other.depths();
        if (depths.length !== otherDepths.length) return false;
        for (let i = 0; i < depths.length; i++) {
            if (depths[i] !== otherDepths[i]) return false;
            const a = this.require(depths[i]);
            const b = other.require(otherDepths[i]);
            if (!a.equals(b)) return false;
        }
        return true;
    }
}
