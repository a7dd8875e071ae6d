/**
 * Lobby
 *
 * Everyone connects as a spectator. Sending `identify` with a player's
 * secret promotes the connection to that player; once both players are in
 * the lobby is ready and hands its roster over to the match server.
 *
 * Anything other than `identify` before the match starts, or a malformed
 * packet, disconnects the sender. A player leaving fails the setup.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { Connection } from './connection';
import type { PacketCodec, ServerPacket } from './packets';
import { PLAYER1_ID, PLAYER2_ID } from '../world/game-state';
import { ProtocolError, getErrorMessage } from '../shared/errors';

const DEBUG_LOBBY = false;

export type LobbyStatus = 'waiting' | 'ready' | 'setup-failed';

export interface LobbyRoster {
    player1: Connection;
    player2: Connection;
    spectators: Connection[];
}

export interface LobbyOptions {
    packets: PacketCodec;
    player1Secret: string;
    player2Secret: string;
    /** Called once when both players have identified */
    onReady?: (roster: LobbyRoster) => void;
    /** Called once when a player disconnects before the match starts */
    onSetupFailed?: () => void;
}

/** Constant-time comparison; hashing first equalizes the lengths. */
export function secretsMatch(expected: string, given: string): boolean {
    const a = createHash('sha256').update(expected).digest();
    const b = createHash('sha256').update(given).digest();
    return timingSafeEqual(a, b);
}

export class Lobby {
    private _status: LobbyStatus = 'waiting';
    private player1: Connection | null = null;
    private player2: Connection | null = null;
    private spectators: Connection[] = [];

    constructor(private readonly options: LobbyOptions) {}

    get status(): LobbyStatus {
        return this._status;
    }

    get spectatorCount(): number {
        return this.spectators.length;
    }

    connect(conn: Connection): void {
        if (this._status !== 'waiting') {
            throw new ProtocolError(`Lobby is ${this._status}; cannot accept ${conn.id}`);
        }
        this.spectators.push(conn);
        if (DEBUG_LOBBY) {
            console.log(`[lobby] ${conn.id} connected (${this.spectators.length} waiting)`);
        }
    }

    handleMessage(conn: Connection, text: string): void {
        if (this._status !== 'waiting') return;

        let secret: string;
        try {
            const packet = this.options.packets.decodeClientPacket(text);
            if (packet.type !== 'identify') {
                throw new ProtocolError(`Unexpected '${packet.type}' packet in the lobby`);
            }
            secret = packet.data.secret;
        } catch (error) {
            if (!(error instanceof ProtocolError)) throw error;
            console.warn(`[lobby] dropping ${conn.id}: ${getErrorMessage(error)}`);
            conn.close(error.message);
            this.disconnect(conn);
            return;
        }

        if (!this.spectators.includes(conn)) {
            // Already a player: identifying twice is out of protocol
            console.warn(`[lobby] dropping ${conn.id}: identified twice`);
            conn.close('identified twice');
            this.disconnect(conn);
            return;
        }

        this.identify(conn, secret);
    }

    disconnect(conn: Connection): void {
        if (this._status !== 'waiting') return;

        if (conn === this.player1 || conn === this.player2) {
            console.log(`[lobby] player ${conn.id} left; setup failed`);
            this._status = 'setup-failed';
            this.broadcast({ type: 'lobby-change', data: { change: 'setup-failed' } }, conn);
            for (const other of this.everyone()) {
                if (other !== conn) other.close();
            }
            this.options.onSetupFailed?.();
            return;
        }

        const index = this.spectators.indexOf(conn);
        if (index !== -1) {
            this.spectators.splice(index, 1);
        }
    }

    private identify(conn: Connection, secret: string): void {
        let playerId: number | null = null;
        if (!this.player1 && secretsMatch(this.options.player1Secret, secret)) {
            this.player1 = conn;
            playerId = PLAYER1_ID;
        } else if (!this.player2 && secretsMatch(this.options.player2Secret, secret)) {
            this.player2 = conn;
            playerId = PLAYER2_ID;
        }

        conn.send(this.options.packets.encode({ type: 'identify-result', data: { playerId } }));
        if (playerId === null) {
            if (DEBUG_LOBBY) {
                console.log(`[lobby] ${conn.id} failed to identify`);
            }
            return;
        }

        this.spectators.splice(this.spectators.indexOf(conn), 1);
        console.log(`[lobby] ${conn.id} identified as player ${playerId}`);

        if (this.player1 && this.player2) {
            this._status = 'ready';
            this.broadcast({ type: 'lobby-change', data: { change: 'ready' } });
            this.options.onReady?.({
                player1: this.player1,
                player2: this.player2,
                spectators: [...this.spectators]
            });
        }
    }

    private everyone(): Connection[] {
        const all = [...this.spectators];
        if (this.player1) all.push(this.player1);
        if (this.player2) all.push(this.player2);
        return all;
    }

    private broadcast(packet: ServerPacket, except?: Connection): void {
        const text = this.options.packets.encode(packet);
        for (const conn of this.everyone()) {
            if (conn !== except) conn.send(text);
        }
    }
}
