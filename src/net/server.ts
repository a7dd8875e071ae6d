/**
 * Server Entry
 *
 * Binds a ws WebSocketServer and drives one match: connections go to the
 * lobby until both players have identified, then to the match server.
 * Connections arriving after that join as spectators.
 */

import { WebSocketServer } from 'ws';
import type { ServerConfig } from '../config';
import { Codec } from '../codec/codec';
import { createModifierRegistry } from '../modifiers/registry';
import { Random } from '../math/random';
import { Updater, type TickOutcome } from '../logic/updater';
import { EmptyDungeonGenerator, createInitialState, createNpcPopulator } from '../logic/worldgen';
import { wrapSocket, type Connection } from './connection';
import { Lobby, type LobbyRoster } from './lobby';
import { MatchServer } from './match-server';
import { PacketCodec } from './packets';
import { getErrorMessage } from '../shared/errors';

/** How often the loop checks whether a tick can run */
const POLL_INTERVAL_MS = 10;

export interface RunningServer {
    readonly host: string;
    readonly port: number;
    /** Resolves with the outcome once the match ends (or setup fails) */
    readonly finished: Promise<TickOutcome | null>;
    close(): Promise<void>;
}

export async function startServer(config: ServerConfig): Promise<RunningServer> {
    const random = new Random(config.seed);
    const packets = new PacketCodec(new Codec(createModifierRegistry()));
    const dungeonGenerator = new EmptyDungeonGenerator(config.dungeonWidth, config.dungeonHeight, random);
    const npcPopulator = config.npcsPerDungeon > 0 ? createNpcPopulator(config.npcsPerDungeon) : undefined;

    const wss = new WebSocketServer({ host: config.host, port: config.port });
    await new Promise<void>((resolve, reject) => {
        wss.once('listening', () => resolve());
        wss.once('error', reject);
    });

    let match: MatchServer | null = null;
    let loop: NodeJS.Timeout | null = null;
    let settle: (outcome: TickOutcome | null) => void = () => {};
    const finished = new Promise<TickOutcome | null>(resolve => {
        settle = resolve;
    });

    const stopLoop = (): void => {
        if (loop) {
            clearInterval(loop);
            loop = null;
        }
    };

    const startMatch = (roster: LobbyRoster): void => {
        const state = createInitialState({ dungeonGenerator, random, npcPopulator });
        const updater = new Updater({
            dungeonGenerator,
            despawnStrategy: config.despawnStrategy,
            random,
            npcPopulator,
            maxTicks: config.maxTicks
        });
        match = new MatchServer({
            packets,
            updater,
            state,
            player1: roster.player1,
            player2: roster.player2,
            spectators: roster.spectators,
            tickIntervalMs: config.tickIntervalMs,
            onEnd: outcome => {
                stopLoop();
                settle(outcome);
            }
        });
        match.start();
        const running = match;
        loop = setInterval(() => {
            running.update();
        }, POLL_INTERVAL_MS);
    };

    const lobby = new Lobby({
        packets,
        player1Secret: config.player1Secret,
        player2Secret: config.player2Secret,
        onReady: startMatch,
        onSetupFailed: () => settle(null)
    });

    let nextConnectionId = 1;
    wss.on('connection', socket => {
        const conn: Connection = wrapSocket(socket, `conn-${nextConnectionId++}`);

        if (match) {
            match.addSpectator(conn);
        } else if (lobby.status === 'waiting') {
            lobby.connect(conn);
        } else {
            conn.close('lobby closed');
            return;
        }

        socket.on('message', data => {
            const text = data.toString();
            if (match) {
                match.handleMessage(conn, text);
            } else {
                lobby.handleMessage(conn, text);
            }
        });
        socket.on('close', () => {
            if (match) {
                match.disconnect(conn);
            } else {
                lobby.disconnect(conn);
            }
        });
        socket.on('error', error => {
            console.warn(`[server] socket ${conn.id} error: ${getErrorMessage(error)}`);
        });
    });

    const address = wss.address();
    const port = address && typeof address === 'object' ? address.port : config.port;
    console.log(`[server] listening on ${config.host}:${port}`);

    return {
        host: config.host,
        port,
        finished,
        close: () => new Promise<void>((resolve, reject) => {
            stopLoop();
            for (const client of wss.clients) {
                client.terminate();
            }
            wss.close(error => (error ? reject(error) : resolve()));
        })
    };
}
