/**
 * Determinism Guard
 *
 * Warns when wall-clock or unseeded randomness is read while a tick is being
 * resolved or replayed. Modifier phases must draw randomness from the
 * seeded Random in their pre-phase context, and replay must draw none.
 */

/** Anything that can tell whether it is inside a tick: Updater, Replica. */
export interface SimulationTarget {
    readonly isSimulating: boolean;
}

interface Originals {
    mathRandom: typeof Math.random;
    dateNow: typeof Date.now;
    performanceNow: (() => number) | null;
}

let installed: { target: SimulationTarget; originals: Originals } | null = null;
const warned: Set<string> = new Set();

function warnOnce(key: string, message: string): void {
    if (!warned.has(key)) {
        warned.add(key);
        console.warn(message);
    }
}

/**
 * Enable the guard for one target. A second call while installed warns and
 * does nothing.
 *
 * @example
 * const updater = new Updater(options);
 * enableDeterminismGuard(updater);
 */
export function enableDeterminismGuard(target: SimulationTarget): void {
    if (installed) {
        console.warn('[guard] determinism guard already installed');
        return;
    }

    const originals: Originals = {
        mathRandom: Math.random,
        dateNow: Date.now,
        performanceNow: typeof performance !== 'undefined' ? performance.now.bind(performance) : null
    };
    installed = { target, originals };
    warned.clear();

    Math.random = function (): number {
        if (target.isSimulating) {
            warnOnce('Math.random',
                '[guard] Math.random() called during tick resolution.\n' +
                '   Draw from the Random passed to preEvent instead.'
            );
        }
        return originals.mathRandom();
    };

    Date.now = function (): number {
        if (target.isSimulating) {
            warnOnce('Date.now',
                '[guard] Date.now() called during tick resolution.\n' +
                '   Use state.tick for anything time-dependent.'
            );
        }
        return originals.dateNow();
    };

    const performanceNow = originals.performanceNow;
    if (performanceNow) {
        performance.now = function (): number {
            if (target.isSimulating) {
                warnOnce('performance.now', '[guard] performance.now() called during tick resolution.');
            }
            return performanceNow();
        };
    }
}

/** Restore the original functions. */
export function disableDeterminismGuard(): void {
    if (!installed) return;
    const { originals } = installed;
    Math.random = originals.mathRandom;
    Date.now = originals.dateNow;
    if (originals.performanceNow) {
        performance.now = originals.performanceNow;
    }
    installed = null;
    warned.clear();
}

export function isDeterminismGuardEnabled(): boolean {
    return installed !== null;
}
