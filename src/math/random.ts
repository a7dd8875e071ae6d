/**
 * Deterministic Random
 *
 * Seeded xorshift generator with a two-word state. Same seed = same sequence.
 * Only the authoritative side ever owns one; replicas never draw.
 */

export interface RandomState {
    s0: number;
    s1: number;
}

/** splitmix32 step, used to spread a user seed over both state words */
function splitmix32(seed: number): number {
    let z = (seed + 0x9e3779b9) | 0;
    z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
    z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
    return (z ^ (z >>> 16)) >>> 0;
}

export class Random {
    private s0: number;
    private s1: number;

    constructor(seed: number = Date.now()) {
        this.s0 = splitmix32(seed);
        this.s1 = splitmix32(this.s0);
        // All-zero state would lock the generator at 0
        if (this.s0 === 0 && this.s1 === 0) {
            this.s1 = 0x6d2b79f5;
        }
    }

    /** Next unsigned 32-bit integer. */
    nextUint32(): number {
        let s1 = this.s0;
        const s0 = this.s1;
        this.s0 = s0;
        s1 ^= s1 << 13;
        s1 ^= s1 >>> 17;
        s1 ^= s0 ^ (s0 >>> 26);
        this.s1 = s1 >>> 0;
        return (this.s1 + s0) >>> 0;
    }

    /** Float in [0, 1). */
    next(): number {
        return this.nextUint32() / 0x100000000;
    }

    /** Integer in [min, max). */
    nextInt(min: number, max: number): number {
        if (max <= min) {
            throw new RangeError(`nextInt: empty range [${min}, ${max})`);
        }
        return min + Math.floor(this.next() * (max - min));
    }

    /** In-place Fisher-Yates shuffle; returns the same array. */
    shuffle<T>(items: T[]): T[] {
        for (let i = items.length - 1; i > 0; i--) {
            const j = this.nextInt(0, i + 1);
            const tmp = items[i];
            items[i] = items[j];
            items[j] = tmp;
        }
        return items;
    }

    getState(): RandomState {
        return { s0: this.s0, s1: this.s1 };
    }

    setState(state: RandomState): void {
        this.s0 = state.s0 >>> 0;
        this.s1 = state.s1 >>> 0;
    }
}
