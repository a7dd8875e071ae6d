/**
 * Modifier Registry
 *
 * Explicit table from modifier kind to decoder. Built once at startup and
 * handed to the codec; there is no process-wide registration.
 */

import { z } from 'zod';
import { ProtocolError } from '../shared/errors';
import {
    CriticalStrikeModifier,
    EvasionModifier,
    GuardModifier,
    RegenerationModifier,
    StatModifier,
    ThornsModifier
} from './modifiers';
import type { Modifier, ModifierKind } from './types';

export type ModifierDecoder = (prims: unknown) => Modifier;

const int = z.number().int();
const percent = int.min(0).max(100);

export class ModifierRegistry {
    private decoders: Map<string, ModifierDecoder> = new Map();

    register(kind: ModifierKind, decoder: ModifierDecoder): this {
        if (this.decoders.has(kind)) {
            throw new Error(`Modifier kind '${kind}' registered twice`);
        }
        this.decoders.set(kind, decoder);
        return this;
    }

    has(kind: string): boolean {
        return this.decoders.has(kind);
    }

    kinds(): string[] {
        return Array.from(this.decoders.keys());
    }

    decode(kind: string, prims: unknown): Modifier {
        const decoder = this.decoders.get(kind);
        if (!decoder) {
            throw new ProtocolError(`Unknown modifier kind '${kind}'`);
        }
        try {
            return decoder(prims);
        } catch (error) {
            if (error instanceof z.ZodError) {
                throw new ProtocolError(`Malformed '${kind}' modifier: ${error.issues[0]?.message ?? 'invalid'}`, { cause: error });
            }
            throw error;
        }
    }
}

/**
 * Registry with every built-in modifier kind.
 */
export function createModifierRegistry(): ModifierRegistry {
    return new ModifierRegistry()
        .register('stat', prims => {
            const p = z.object({ maxHealth: int, damage: int, armor: int }).parse(prims);
            return new StatModifier(p);
        })
        .register('critical', prims => {
            const p = z.object({ chance: percent, bonus: int }).parse(prims);
            return new CriticalStrikeModifier(p.chance, p.bonus);
        })
        .register('evasion', prims => {
            const p = z.object({ chance: percent }).parse(prims);
            return new EvasionModifier(p.chance);
        })
        .register('guard', prims => {
            const p = z.object({ armor: int, reduction: int.min(0) }).parse(prims);
            return new GuardModifier(p.armor, p.reduction);
        })
        .register('thorns', prims => {
            const p = z.object({ damage: int }).parse(prims);
            return new ThornsModifier(p.damage);
        })
        .register('regeneration', prims => {
            const p = z.object({ amount: int.min(0), remaining: int }).parse(prims);
            return new RegenerationModifier(p.amount, p.remaining);
        });
}
