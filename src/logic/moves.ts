/**
 * Moves an entity can choose each tick.
 */

export enum Move {
    Up = 1,
    Right = 2,
    Down = 3,
    Left = 4,
    Stay = 5
}

export function isMove(value: number): value is Move {
    return Number.isInteger(value) && value >= Move.Up && value <= Move.Stay;
}

/** Cell offset of a move; y grows downwards. */
export function moveDelta(move: Move): { dx: number; dy: number } {
    switch (move) {
        case Move.Up:
            return { dx: 0, dy: -1 };
        case Move.Right:
            return { dx: 1, dy: 0 };
        case Move.Down:
            return { dx: 0, dy: 1 };
        case Move.Left:
            return { dx: -1, dy: 0 };
        case Move.Stay:
            return { dx: 0, dy: 0 };
    }
}
