/**
 * Replica
 *
 * Client-side mirror of the match. Applies syncs and replays updates in
 * order without ever drawing randomness. A gap in ordering or a record the
 * local state cannot take marks the replica desynchronized: it asks the
 * server for a resync and ignores updates until the next sync arrives.
 */

import type { GameState } from '../world/game-state';
import type { Move } from '../logic/moves';
import { applyUpdate, type GameStateUpdate } from '../logic/updates';
import type { TickOutcome } from '../logic/updater';
import type { ClientPacket, LobbyChange, PacketCodec, ServerPacket } from './packets';
import { ReplayMismatchError, getErrorMessage } from '../shared/errors';

export interface ReplicaOptions {
    packets: PacketCodec;
    /** Outgoing transport */
    send: (text: string) => void;
}

export class Replica {
    private readonly packets: PacketCodec;
    private readonly sendText: (text: string) => void;

    private _state: GameState | null = null;
    private _playerId: number | null = null;
    private _desynced: boolean = false;
    private _inTick: boolean = false;

    /** Smallest order the next update may carry */
    private nextOrder: number = 0;

    identifyResult: number | null | undefined = undefined;
    lobbyChange: LobbyChange | null = null;
    lastOutcome: TickOutcome = 'in-progress';
    matchEnded: boolean = false;

    constructor(options: ReplicaOptions) {
        this.packets = options.packets;
        this.sendText = options.send;
    }

    get state(): GameState | null {
        return this._state;
    }

    get playerId(): number | null {
        return this._playerId;
    }

    get desynced(): boolean {
        return this._desynced;
    }

    /** True between tick-start and tick-end; updates only replay there. */
    get isSimulating(): boolean {
        return this._inTick;
    }

    // ==========================================
    // Outgoing
    // ==========================================

    identify(secret: string): void {
        this.send({ type: 'identify', data: { secret } });
    }

    sendMove(move: Move): void {
        if (this._playerId === null) {
            throw new Error('Spectators cannot send moves');
        }
        this.send({ type: 'move', data: { entityId: this._playerId, move } });
    }

    // ==========================================
    // Incoming
    // ==========================================

    /** Handle one packet of text; malformed packets throw ProtocolError. */
    handleMessage(text: string): void {
        this.handlePacket(this.packets.decodeServerPacket(text));
    }

    handlePacket(packet: ServerPacket): void {
        switch (packet.type) {
            case 'sync':
                this._state = packet.data.state;
                this._playerId = packet.data.playerId;
                this.nextOrder = packet.data.nextOrder;
                this._desynced = false;
                return;
            case 'update':
                this.applyRecord(packet.data);
                return;
            case 'tick-start':
                this._inTick = true;
                return;
            case 'tick-end':
                this._inTick = false;
                this.lastOutcome = packet.data.outcome;
                if (this._state && !this._desynced && this._state.tick !== packet.data.tick) {
                    this.requestResync(`tick ${this._state.tick} after tick-end ${packet.data.tick}`);
                }
                return;
            case 'identify-result':
                this.identifyResult = packet.data.playerId;
                if (packet.data.playerId !== null) {
                    this._playerId = packet.data.playerId;
                }
                return;
            case 'lobby-change':
                this.lobbyChange = packet.data.change;
                return;
            case 'match-end':
                this.matchEnded = true;
                this.lastOutcome = packet.data.outcome;
                return;
        }
    }

    private applyRecord(update: GameStateUpdate): void {
        if (this._desynced) return;
        if (!this._state) {
            this.requestResync(`update ${update.order} before any sync`);
            return;
        }
        if (update.order < this.nextOrder) {
            this.requestResync(`update ${update.order} out of order (expected >= ${this.nextOrder})`);
            return;
        }
        try {
            applyUpdate(this._state, update);
        } catch (error) {
            if (!(error instanceof ReplayMismatchError)) throw error;
            this.requestResync(getErrorMessage(error));
            return;
        }
        this.nextOrder = update.order + 1;
    }

    private requestResync(reason: string): void {
        console.warn(`[replica] desynchronized: ${reason}`);
        this._desynced = true;
        this.send({ type: 'resync-request', data: { reason } });
    }

    private send(packet: ClientPacket): void {
        this.sendText(this.packets.encode(packet));
    }
}
