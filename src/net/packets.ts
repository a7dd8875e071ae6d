/**
 * Packets
 *
 * Everything exchanged between server and clients, as tagged envelopes
 * `{ type, data }` serialized to JSON text. Engine payloads go through the
 * Codec; envelopes are validated with zod on the way in.
 */

import { z } from 'zod';
import type { Codec } from '../codec/codec';
import type { GameState } from '../world/game-state';
import type { GameStateUpdate } from '../logic/updates';
import type { TickOutcome } from '../logic/updater';
import { isMove, type Move } from '../logic/moves';
import { ProtocolError, getErrorMessage } from '../shared/errors';

// ============================================
// Packet Types
// ============================================

/** Why the lobby closed. */
export type LobbyChange = 'setup-failed' | 'ready';

export type MatchEndReason = 'decided' | 'disconnect';

export interface SyncPacket {
    type: 'sync';
    data: {
        state: GameState;
        /** Player the recipient controls; null for spectators */
        playerId: number | null;
        /** Order of the first update the recipient will receive after this */
        nextOrder: number;
    };
}

export interface UpdatePacket {
    type: 'update';
    data: GameStateUpdate;
}

export interface TickStartPacket {
    type: 'tick-start';
    data: { tick: number };
}

export interface TickEndPacket {
    type: 'tick-end';
    data: { tick: number; outcome: TickOutcome };
}

export interface IdentifyResultPacket {
    type: 'identify-result';
    data: { playerId: number | null };
}

export interface LobbyChangePacket {
    type: 'lobby-change';
    data: { change: LobbyChange };
}

export interface MatchEndPacket {
    type: 'match-end';
    data: { outcome: TickOutcome; reason: MatchEndReason };
}

export interface MovePacket {
    type: 'move';
    data: { entityId: number; move: Move };
}

export interface IdentifyPacket {
    type: 'identify';
    data: { secret: string };
}

export interface ResyncRequestPacket {
    type: 'resync-request';
    data: { reason: string };
}

export type ServerPacket =
    | SyncPacket
    | UpdatePacket
    | TickStartPacket
    | TickEndPacket
    | IdentifyResultPacket
    | LobbyChangePacket
    | MatchEndPacket;

export type ClientPacket = MovePacket | IdentifyPacket | ResyncRequestPacket;

export type Packet = ServerPacket | ClientPacket;

// ============================================
// Envelope Schemas
// ============================================

const int = z.number().int();
const outcome = z.enum(['in-progress', 'player1-win', 'player2-win', 'tie']);

const serverEnvelope = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('sync'),
        data: z.object({ state: z.unknown(), playerId: int.nullable(), nextOrder: int.min(0) })
    }),
    z.object({ type: z.literal('update'), data: z.unknown() }),
    z.object({ type: z.literal('tick-start'), data: z.object({ tick: int.min(0) }) }),
    z.object({ type: z.literal('tick-end'), data: z.object({ tick: int.min(0), outcome }) }),
    z.object({ type: z.literal('identify-result'), data: z.object({ playerId: int.nullable() }) }),
    z.object({ type: z.literal('lobby-change'), data: z.object({ change: z.enum(['setup-failed', 'ready']) }) }),
    z.object({
        type: z.literal('match-end'),
        data: z.object({ outcome, reason: z.enum(['decided', 'disconnect']) })
    })
]);

const clientEnvelope = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('move'),
        data: z.object({
            entityId: int,
            move: int.refine(isMove, { message: 'unknown move' })
        })
    }),
    z.object({ type: z.literal('identify'), data: z.object({ secret: z.string() }) }),
    z.object({ type: z.literal('resync-request'), data: z.object({ reason: z.string() }) })
]);

// ============================================
// Packet Codec
// ============================================

export class PacketCodec {
    constructor(readonly codec: Codec) {}

    encode(packet: Packet): string {
        switch (packet.type) {
            case 'sync':
                return JSON.stringify({
                    type: packet.type,
                    data: { ...packet.data, state: this.codec.encodeState(packet.data.state) }
                });
            case 'update':
                return JSON.stringify({ type: packet.type, data: this.codec.encodeUpdate(packet.data) });
            default:
                return JSON.stringify(packet);
        }
    }

    decodeServerPacket(text: string): ServerPacket {
        const envelope = parseEnvelope(serverEnvelope, text);
        switch (envelope.type) {
            case 'sync':
                return {
                    type: 'sync',
                    data: { ...envelope.data, state: this.codec.decodeState(envelope.data.state) }
                };
            case 'update':
                return { type: 'update', data: this.codec.decodeUpdate(envelope.data) };
            default:
                return envelope;
        }
    }

    decodeClientPacket(text: string): ClientPacket {
        return parseEnvelope(clientEnvelope, text);
    }
}

function parseEnvelope<S extends z.ZodTypeAny>(schema: S, text: string): z.output<S> {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ProtocolError(`Packet is not JSON: ${getErrorMessage(error)}`, { cause: error });
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ProtocolError(`Malformed packet: ${issue?.message ?? 'invalid'}`, { cause: result.error });
    }
    return result.data;
}
