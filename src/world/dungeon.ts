/**
 * Dungeon
 *
 * One level of the world: an immutable width x height tile grid, stored
 * column-major (index = x * height + y).
 */

import type { Random } from '../math/random';

export enum Tile {
    Ground = 1,
    Wall = 2,
    StaircaseDown = 3
}

export function isTile(value: number): value is Tile {
    return value === Tile.Ground || value === Tile.Wall || value === Tile.StaircaseDown;
}

export class Dungeon {
    readonly width: number;
    readonly height: number;
    private readonly tiles: Uint8Array;

    constructor(width: number, height: number, tiles: Uint8Array) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new RangeError(`Invalid dungeon size ${width}x${height}`);
        }
        if (tiles.length !== width * height) {
            throw new RangeError(`Expected ${width * height} tiles, got ${tiles.length}`);
        }
        for (const tile of tiles) {
            if (!isTile(tile)) {
                throw new RangeError(`Unknown tile value ${tile}`);
            }
        }
        this.width = width;
        this.height = height;
        this.tiles = Uint8Array.from(tiles);
    }

    /**
     * Build a dungeon from rows of characters: '#' wall, '.' ground, '>' stairs.
     * Rows are indexed by y, characters by x.
     */
    static fromRows(rows: string[]): Dungeon {
        const height = rows.length;
        const width = height > 0 ? rows[0].length : 0;
        const tiles = new Uint8Array(width * height);
        for (let y = 0; y < height; y++) {
            const row = rows[y];
            if (row.length !== width) {
                throw new RangeError(`Row ${y} has length ${row.length}, expected ${width}`);
            }
            for (let x = 0; x < width; x++) {
                const ch = row[x];
                tiles[x * height + y] = ch === '#' ? Tile.Wall : ch === '>' ? Tile.StaircaseDown : Tile.Ground;
            }
        }
        return new Dungeon(width, height, tiles);
    }

    inBounds(x: number, y: number): boolean {
        return x >= 0 && x < this.width && y >= 0 && y < this.height;
    }

    /** Tile at (x, y), or Wall outside the grid. */
    tileAt(x: number, y: number): Tile {
        if (!this.inBounds(x, y)) return Tile.Wall;
        const value = this.tiles[x * this.height + y];
        return isTile(value) ? value : Tile.Wall;
    }

    /** True when the cell is outside the map or a wall. */
    isBlocked(x: number, y: number): boolean {
        return this.tileAt(x, y) === Tile.Wall;
    }

    /** First staircase found scanning columns, or null. */
    staircase(): { x: number; y: number } | null {
        for (let x = 0; x < this.width; x++) {
            for (let y = 0; y < this.height; y++) {
                if (this.tiles[x * this.height + y] === Tile.StaircaseDown) {
                    return { x, y };
                }
            }
        }
        return null;
    }

    /** Count of Ground tiles. */
    groundCount(): number {
        let count = 0;
        for (const tile of this.tiles) {
            if (tile === Tile.Ground) count++;
        }
        return count;
    }

    /** Uniformly random Ground tile. */
    randomGround(random: Random): { x: number; y: number } {
        const count = this.groundCount();
        if (count === 0) {
            throw new RangeError('Dungeon has no ground tiles');
        }
        let pick = random.nextInt(0, count);
        for (let i = 0; i < this.tiles.length; i++) {
            if (this.tiles[i] !== Tile.Ground) continue;
            if (pick === 0) {
                return { x: Math.floor(i / this.height), y: i % this.height };
            }
            pick--;
        }
        throw new RangeError('randomGround: ground count changed during scan');
    }

    /** Copy of the raw tile bytes (column-major). */
    toBytes(): Uint8Array {
        return Uint8Array.from(this.tiles);
    }

    equals(other: Dungeon): boolean {
        if (this.width !== other.width || this.height !== other.height) return false;
        for (let i = 0; i < this.tiles.length; i++) {
            if (this.tiles[i] !== other.tiles[i]) return false;
        }
        return true;
    }
}
