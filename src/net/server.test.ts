import { describe, test, expect, vi, afterEach } from 'vitest';
import WebSocket from 'ws';
import { startServer, type RunningServer } from './server';
import { Replica } from './replica';
import { PacketCodec, type ServerPacket } from './packets';
import { Codec } from '../codec/codec';
import { createModifierRegistry } from '../modifiers/registry';
import { parseServerConfig } from '../config';
import { Move } from '../logic/moves';

const packets = new PacketCodec(new Codec(createModifierRegistry()));

interface TestClient {
    ws: WebSocket;
    replica: Replica;
    received: ServerPacket[];
    closed: Promise<void>;
}

async function connectClient(port: number): Promise<TestClient> {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    const replica = new Replica({ packets, send: text => ws.send(text) });
    const received: ServerPacket[] = [];
    ws.on('message', data => {
        const text = data.toString();
        received.push(packets.decodeServerPacket(text));
        replica.handleMessage(text);
    });
    const closed = new Promise<void>(resolve => ws.once('close', () => resolve()));
    await new Promise<void>((resolve, reject) => {
        ws.once('open', () => resolve());
        ws.once('error', reject);
    });
    return { ws, replica, received, closed };
}

function types(client: TestClient): string[] {
    return client.received.map(packet => packet.type);
}

function boot(): Promise<RunningServer> {
    return startServer(parseServerConfig({
        host: '127.0.0.1',
        port: 0,
        tickIntervalMs: 0,
        dungeonWidth: 5,
        dungeonHeight: 5,
        maxTicks: 1,
        seed: 7,
        player1Secret: 'test-secret-1',
        player2Secret: 'test-secret-2'
    }));
}

describe('startServer', () => {
    let server: RunningServer | null = null;

    afterEach(async () => {
        vi.restoreAllMocks();
        await server?.close();
        server = null;
    });

    test('hands the lobby over to a match and plays it to the end', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        server = await boot();
        expect(server.port).toBeGreaterThan(0);

        const p1 = await connectClient(server.port);
        const p2 = await connectClient(server.port);
        p1.replica.identify('test-secret-1');
        await vi.waitFor(() => expect(p1.replica.identifyResult).toBe(1));
        p2.replica.identify('test-secret-2');
        await vi.waitFor(() => {
            expect(p1.replica.state).not.toBeNull();
            expect(p2.replica.state).not.toBeNull();
        });
        expect(p2.replica.playerId).toBe(2);
        expect(p1.replica.lobbyChange).toBe('ready');

        const late = await connectClient(server.port);
        await vi.waitFor(() => expect(types(late)).toEqual(['sync']));
        expect(late.replica.playerId).toBeNull();
        expect(late.replica.state?.entities.map(entity => entity.id).sort()).toEqual([1, 2]);

        p1.replica.sendMove(Move.Stay);
        p2.replica.sendMove(Move.Stay);

        expect(await server.finished).toBe('tie');
        await Promise.all([p1.closed, p2.closed, late.closed]);
        for (const client of [p1, p2, late]) {
            expect(client.replica.matchEnded).toBe(true);
            expect(client.replica.lastOutcome).toBe('tie');
            expect(client.replica.state?.tick).toBe(1);
            expect(client.replica.desynced).toBe(false);
        }
        expect(types(late)).toEqual(['sync', 'tick-start', 'update', 'tick-end', 'match-end']);
    });

    test('a player leaving the lobby fails the setup', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        server = await boot();

        const p1 = await connectClient(server.port);
        const watcher = await connectClient(server.port);
        p1.replica.identify('test-secret-1');
        await vi.waitFor(() => expect(p1.replica.identifyResult).toBe(1));

        p1.ws.close();
        expect(await server.finished).toBeNull();
        await watcher.closed;
        expect(watcher.replica.lobbyChange).toBe('setup-failed');
    });

    test('a wrong secret is answered with no player', async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        server = await boot();

        const stranger = await connectClient(server.port);
        stranger.replica.identify('not-a-secret');
        await vi.waitFor(() => expect(stranger.replica.identifyResult).toBeNull());
        expect(stranger.replica.playerId).toBeNull();
    });
});
