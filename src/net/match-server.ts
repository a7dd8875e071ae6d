/**
 * Match Server
 *
 * Runs a match once the lobby is ready: collects one move per player,
 * resolves a tick when both are in and the tick interval has elapsed, and
 * fans the update log out.
 *
 * Feeds:
 * - spectators get every record
 * - a player gets the records relevant to the depth it stands on; when the
 *   player itself changes depth, the rest of its feed is replaced by a
 *   fresh sync of the new depth at the end of the tick
 */

import type { Connection } from './connection';
import type { PacketCodec, ServerPacket, MatchEndReason } from './packets';
import type { GameState } from '../world/game-state';
import type { Move } from '../logic/moves';
import { isUpdateRelevant, type GameStateUpdate } from '../logic/updates';
import type { TickOutcome, TickResult, Updater } from '../logic/updater';
import { ProtocolError, getErrorMessage } from '../shared/errors';

const DEBUG_SERVER = false;

export type MatchStatus = 'pending' | 'running' | 'ended';

export interface MatchServerOptions {
    packets: PacketCodec;
    updater: Updater;
    state: GameState;
    player1: Connection;
    player2: Connection;
    spectators?: Connection[];
    tickIntervalMs: number;
    /** Clock in milliseconds (default Date.now) */
    now?: () => number;
    /** Called once with the final outcome */
    onEnd?: (outcome: TickOutcome, reason: MatchEndReason) => void;
}

interface PlayerSlot {
    readonly id: number;
    readonly conn: Connection;
    move: Move | null;
    connected: boolean;
}

export class MatchServer {
    readonly state: GameState;
    private readonly packets: PacketCodec;
    private readonly updater: Updater;
    private readonly players: [PlayerSlot, PlayerSlot];
    private readonly spectators: Connection[];
    private readonly tickIntervalMs: number;
    private readonly now: () => number;
    private readonly onEnd?: (outcome: TickOutcome, reason: MatchEndReason) => void;

    private _status: MatchStatus = 'pending';
    private _outcome: TickOutcome = 'in-progress';
    private lastTickAt: number = -Infinity;

    constructor(options: MatchServerOptions) {
        this.state = options.state;
        this.packets = options.packets;
        this.updater = options.updater;
        this.players = [
            { id: options.state.player1Id, conn: options.player1, move: null, connected: true },
            { id: options.state.player2Id, conn: options.player2, move: null, connected: true }
        ];
        this.spectators = [...(options.spectators ?? [])];
        this.tickIntervalMs = options.tickIntervalMs;
        this.now = options.now ?? Date.now;
        this.onEnd = options.onEnd;
    }

    get status(): MatchStatus {
        return this._status;
    }

    get outcome(): TickOutcome {
        return this._outcome;
    }

    /** Send the initial syncs. */
    start(): void {
        if (this._status !== 'pending') {
            throw new ProtocolError(`Match already ${this._status}`);
        }
        this._status = 'running';
        for (const player of this.players) {
            this.syncPlayer(player);
        }
        for (const spectator of this.spectators) {
            this.syncSpectator(spectator);
        }
        console.log(`[server] match started with ${this.spectators.length} spectators`);
    }

    /** Late spectators get a full spectator sync. */
    addSpectator(conn: Connection): void {
        if (this._status === 'ended') {
            conn.close('match over');
            return;
        }
        this.spectators.push(conn);
        if (this._status === 'running') {
            this.syncSpectator(conn);
        }
    }

    // ==========================================
    // Incoming
    // ==========================================

    handleMessage(conn: Connection, text: string): void {
        if (this._status !== 'running') return;
        const player = this.slotFor(conn);
        try {
            const packet = this.packets.decodeClientPacket(text);
            switch (packet.type) {
                case 'resync-request':
                    console.warn(`[server] ${conn.id} requested a resync: ${packet.data.reason}`);
                    if (player) {
                        this.syncPlayer(player);
                    } else {
                        this.syncSpectator(conn);
                    }
                    return;
                case 'move':
                    if (!player) {
                        throw new ProtocolError('Spectators cannot move');
                    }
                    if (packet.data.entityId !== player.id) {
                        throw new ProtocolError(`Player ${player.id} sent a move for entity ${packet.data.entityId}`);
                    }
                    player.move = packet.data.move;
                    return;
                case 'identify':
                    throw new ProtocolError('Identify after the match started');
            }
        } catch (error) {
            if (!(error instanceof ProtocolError)) throw error;
            console.warn(`[server] dropping ${conn.id}: ${getErrorMessage(error)}`);
            conn.close(error.message);
            this.disconnect(conn);
        }
    }

    disconnect(conn: Connection): void {
        const player = this.slotFor(conn);
        if (player) {
            if (player.connected) {
                console.log(`[server] player ${player.id} disconnected`);
            }
            player.connected = false;
            return;
        }
        const index = this.spectators.indexOf(conn);
        if (index !== -1) {
            this.spectators.splice(index, 1);
        }
    }

    // ==========================================
    // Loop
    // ==========================================

    /**
     * Advance the match if possible. Ends it when a player is gone or the
     * tick decided it. Returns the outcome of the tick it ran, if any.
     */
    update(): TickResult | null {
        if (this._status !== 'running') return null;

        const [p1, p2] = this.players;
        if (!p1.connected || !p2.connected) {
            const outcome: TickOutcome = !p1.connected && !p2.connected
                ? 'tie'
                : p1.connected ? 'player1-win' : 'player2-win';
            this.end(outcome, 'disconnect');
            return null;
        }

        if (p1.move === null || p2.move === null) return null;
        const now = this.now();
        if (now - this.lastTickAt < this.tickIntervalMs) return null;

        this.lastTickAt = now;
        const result = this.runTick(p1.move, p2.move);
        p1.move = null;
        p2.move = null;

        if (result.outcome !== 'in-progress') {
            this.end(result.outcome, 'decided');
        }
        return result;
    }

    private runTick(player1Move: Move, player2Move: Move): TickResult {
        const state = this.state;
        const tick = state.tick;
        const depths = new Map(this.players.map((player): [number, number] => [player.id, state.requireEntity(player.id).depth]));

        this.broadcast({ type: 'tick-start', data: { tick } });
        const result = this.updater.resolveTick(state, player1Move, player2Move);

        for (const spectator of this.spectators) {
            for (const update of result.updates) {
                this.send(spectator, { type: 'update', data: update });
            }
        }

        for (const player of this.players) {
            const { feed, resync } = playerFeed(result.updates, player.id, depths.get(player.id) ?? 0);
            for (const update of feed) {
                this.send(player.conn, { type: 'update', data: update });
            }
            if (resync) {
                this.syncPlayer(player);
            }
        }

        this.broadcast({ type: 'tick-end', data: { tick: state.tick, outcome: result.outcome } });

        if (DEBUG_SERVER) {
            console.log(`[server] tick ${tick} -> ${state.tick}: ${result.updates.length} updates, ${result.outcome}`);
        }
        return result;
    }

    private end(outcome: TickOutcome, reason: MatchEndReason): void {
        this._status = 'ended';
        this._outcome = outcome;
        console.log(`[server] match ended: ${outcome} (${reason})`);
        this.broadcast({ type: 'match-end', data: { outcome, reason } });
        for (const conn of this.everyone()) {
            conn.close();
        }
        this.onEnd?.(outcome, reason);
    }

    // ==========================================
    // Outgoing
    // ==========================================

    private syncPlayer(player: PlayerSlot): void {
        const entity = this.state.requireEntity(player.id);
        this.send(player.conn, {
            type: 'sync',
            data: { state: this.state.viewFor(entity), playerId: player.id, nextOrder: this.updater.peekOrder() }
        });
    }

    private syncSpectator(conn: Connection): void {
        this.send(conn, {
            type: 'sync',
            data: { state: this.state.viewSpectator(), playerId: null, nextOrder: this.updater.peekOrder() }
        });
    }

    private slotFor(conn: Connection): PlayerSlot | undefined {
        return this.players.find(player => player.conn === conn);
    }

    private everyone(): Connection[] {
        return [...this.players.filter(player => player.connected).map(player => player.conn), ...this.spectators];
    }

    private send(conn: Connection, packet: ServerPacket): void {
        conn.send(this.packets.encode(packet));
    }

    private broadcast(packet: ServerPacket): void {
        const text = this.packets.encode(packet);
        for (const conn of this.everyone()) {
            conn.send(text);
        }
    }
}

/**
 * Records a player at `depth` needs from one tick's log. Stops at the
 * player's own depth change; the caller follows up with a sync.
 */
export function playerFeed(
    updates: readonly GameStateUpdate[],
    playerId: number,
    depth: number
): { feed: GameStateUpdate[]; resync: boolean } {
    const feed: GameStateUpdate[] = [];
    for (const update of updates) {
        if (update.kind === 'entity-position' && update.entityId === playerId && update.depthChanged) {
            return { feed, resync: true };
        }
        if (isUpdateRelevant(update, depth)) {
            feed.push(update);
        }
    }
    return { feed, resync: false };
}
