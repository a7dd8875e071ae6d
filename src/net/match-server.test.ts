import { describe, test, expect, vi } from 'vitest';
import { MatchServer, playerFeed } from './match-server';
import { Replica } from './replica';
import { PacketCodec, type ClientPacket, type MatchEndReason } from './packets';
import type { Connection } from './connection';
import { Codec } from '../codec/codec';
import { createModifierRegistry } from '../modifiers/registry';
import { Dungeon } from '../world/dungeon';
import { Entity, type EntityInit } from '../world/entity';
import { GameState } from '../world/game-state';
import { World } from '../world/world';
import { Random } from '../math/random';
import { Move } from '../logic/moves';
import { Updater, type TickOutcome } from '../logic/updater';
import type { GameStateUpdate } from '../logic/updates';

const packets = new PacketCodec(new Codec(createModifierRegistry()));

const STAIRS = ['#####', '#.>.#', '#...#', '#####'];

function mob(id: number, x: number, y: number, init: Partial<EntityInit> = {}): Entity {
    return new Entity({ id, depth: 0, x, y, health: 10, baseMaxHealth: 10, baseDamage: 2, baseArmor: 1, ...init });
}

/** A mock connection whose outgoing packets feed a client replica. */
function createClient(id: string, route: (conn: Connection, text: string) => void) {
    const conn = {
        id,
        send: vi.fn((text: string) => replica.handleMessage(text)),
        close: vi.fn()
    };
    const replica: Replica = new Replica({ packets, send: text => route(conn, text) });
    return { conn, replica };
}

type Client = ReturnType<typeof createClient>;

function packetTypes(client: Client): string[] {
    return client.conn.send.mock.calls.map(call => packets.decodeServerPacket(String(call[0])).type);
}

function createMatch(rows: string[], entities: Entity[], tickIntervalMs: number = 0) {
    const state = new GameState({
        authoritative: true,
        tick: 0,
        player1Id: 1,
        player2Id: 2,
        world: new World([[0, Dungeon.fromRows(rows)]]),
        entities
    });
    const updater = new Updater({
        dungeonGenerator: { spawnDungeon: () => Dungeon.fromRows(['###', '#.#', '###']) },
        despawnStrategy: 'unreachable',
        random: new Random(9)
    });
    let now = 0;
    const onEnd = vi.fn<(outcome: TickOutcome, reason: MatchEndReason) => void>();
    const route = (conn: Connection, text: string): void => server.handleMessage(conn, text);
    const p1 = createClient('p1', route);
    const p2 = createClient('p2', route);
    const watcher = createClient('watcher', route);
    const server = new MatchServer({
        packets,
        updater,
        state,
        player1: p1.conn,
        player2: p2.conn,
        spectators: [watcher.conn],
        tickIntervalMs,
        now: () => now,
        onEnd
    });
    return {
        server,
        state,
        p1,
        p2,
        watcher,
        onEnd,
        advance(ms: number): void {
            now += ms;
        }
    };
}

function say(packet: ClientPacket): string {
    return packets.encode(packet);
}

describe('MatchServer', () => {
    test('start syncs every client with its own view', () => {
        const { server, state, p1, p2, watcher } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();

        expect(p1.replica.playerId).toBe(1);
        expect(p2.replica.playerId).toBe(2);
        expect(watcher.replica.playerId).toBeNull();
        expect(p1.replica.state?.equals(state.viewFor(state.player1))).toBe(true);
        expect(watcher.replica.state?.equals(state.viewSpectator())).toBe(true);
        expect(() => server.start()).toThrow();
    });

    test('a tick runs once both moves are in', () => {
        const { server, p1, p2 } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();

        p1.replica.sendMove(Move.Stay);
        expect(server.update()).toBeNull();

        p2.replica.sendMove(Move.Stay);
        const result = server.update();
        expect(result?.outcome).toBe('in-progress');
        expect(packetTypes(p1)).toEqual(['sync', 'tick-start', 'update', 'tick-end']);
        expect(p1.replica.lastOutcome).toBe('in-progress');
        expect(server.update()).toBeNull();
    });

    test('ticks wait for the tick interval', () => {
        const { server, state, p1, p2, advance } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)], 100);
        server.start();
        advance(1000);

        p1.replica.sendMove(Move.Stay);
        p2.replica.sendMove(Move.Stay);
        expect(server.update()).not.toBeNull();

        p1.replica.sendMove(Move.Stay);
        p2.replica.sendMove(Move.Stay);
        advance(50);
        expect(server.update()).toBeNull();
        advance(50);
        expect(server.update()).not.toBeNull();
        expect(state.tick).toBe(2);
    });

    test('feeds follow each viewer and a descent is answered with a sync', () => {
        const { server, state, p1, p2, watcher } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();

        p1.replica.sendMove(Move.Right);
        p2.replica.sendMove(Move.Stay);
        server.update();

        expect(state.player1.depth).toBe(1);
        expect(packetTypes(p1)).toEqual(['sync', 'tick-start', 'sync', 'tick-end']);
        expect(packetTypes(p2)).toEqual(['sync', 'tick-start', 'update', 'update', 'tick-end']);
        expect(packetTypes(watcher)).toEqual(['sync', 'tick-start', 'update', 'update', 'update', 'tick-end']);

        expect(p1.replica.state?.equals(state.viewFor(state.player1))).toBe(true);
        expect(p2.replica.state?.equals(state.viewFor(state.player2))).toBe(true);
        expect(p2.replica.state?.getEntity(1)).toBeUndefined();
        expect(watcher.replica.state?.equals(state.viewSpectator())).toBe(true);
        for (const client of [p1, p2, watcher]) {
            expect(client.replica.desynced).toBe(false);
        }
    });

    test('a decided tick ends the match', () => {
        const { server, p1, p2, watcher, onEnd } = createMatch(['####', '#..#', '####'], [mob(1, 1, 1), mob(2, 2, 1, { health: 1 })]);
        server.start();

        p1.replica.sendMove(Move.Right);
        p2.replica.sendMove(Move.Stay);
        expect(server.update()?.outcome).toBe('player1-win');

        expect(server.status).toBe('ended');
        expect(onEnd).toHaveBeenCalledWith('player1-win', 'decided');
        expect(packetTypes(p2)).toEqual(['sync', 'tick-start', 'update', 'update', 'tick-end', 'match-end']);
        expect(watcher.replica.matchEnded).toBe(true);
        expect(p1.conn.close).toHaveBeenCalledTimes(1);
        expect(watcher.conn.close).toHaveBeenCalledTimes(1);
    });

    test('moving for someone else disconnects the sender and forfeits', () => {
        const { server, p1, p2, onEnd } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();

        server.handleMessage(p2.conn, say({ type: 'move', data: { entityId: 1, move: Move.Stay } }));
        expect(p2.conn.close).toHaveBeenCalledTimes(1);

        expect(server.update()).toBeNull();
        expect(server.outcome).toBe('player1-win');
        expect(onEnd).toHaveBeenCalledWith('player1-win', 'disconnect');
        expect(p1.replica.matchEnded).toBe(true);
        expect(p1.replica.lastOutcome).toBe('player1-win');
        expect(packetTypes(p2)).toEqual(['sync']);
    });

    test('both players leaving is a tie', () => {
        const { server, p1, p2 } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();
        server.disconnect(p1.conn);
        server.disconnect(p2.conn);
        server.update();
        expect(server.outcome).toBe('tie');
    });

    test('spectators cannot move', () => {
        const { server, watcher } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();
        server.handleMessage(watcher.conn, say({ type: 'move', data: { entityId: 1, move: Move.Up } }));
        expect(watcher.conn.close).toHaveBeenCalledTimes(1);
        expect(server.status).toBe('running');
    });

    test('resync requests are answered with a fresh sync', () => {
        const { server, p2 } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();
        server.handleMessage(p2.conn, say({ type: 'resync-request', data: { reason: 'test' } }));
        expect(packetTypes(p2)).toEqual(['sync', 'sync']);
    });

    test('late spectators get a spectator sync', () => {
        const { server, state } = createMatch(STAIRS, [mob(1, 1, 1), mob(2, 3, 2)]);
        server.start();
        const late = createClient('late', (conn, text) => server.handleMessage(conn, text));
        server.addSpectator(late.conn);
        expect(late.replica.state?.equals(state.viewSpectator())).toBe(true);
    });
});

describe('playerFeed', () => {
    test('stops at the viewer changing depth', () => {
        const updates: GameStateUpdate[] = [
            { kind: 'entity-health', order: 0, entityId: 5, depth: 0, sourceId: null, amount: -1 },
            { kind: 'entity-position', order: 1, entityId: 1, depth: 1, x: 1, y: 1, fromDepth: 0, depthChanged: true, entity: null },
            { kind: 'entity-health', order: 2, entityId: 5, depth: 0, sourceId: null, amount: -1 },
            { kind: 'tick-end', order: 3, tick: 1 }
        ];
        const mine = playerFeed(updates, 1, 0);
        expect(mine.resync).toBe(true);
        expect(mine.feed.map(update => update.order)).toEqual([0]);

        const theirs = playerFeed(updates, 2, 0);
        expect(theirs.resync).toBe(false);
        expect(theirs.feed.map(update => update.order)).toEqual([0, 1, 2, 3]);
    });
});
