/**
 * Server Configuration
 *
 * Validated with zod. Environment variables use the DELVE_ prefix:
 * DELVE_HOST, DELVE_PORT, DELVE_TICK_INTERVAL_MS, DELVE_DUNGEON_WIDTH,
 * DELVE_DUNGEON_HEIGHT, DELVE_DESPAWN_STRATEGY, DELVE_MAX_TICKS, DELVE_SEED,
 * DELVE_PLAYER1_SECRET, DELVE_PLAYER2_SECRET, DELVE_NPCS_PER_DUNGEON.
 */

import { z } from 'zod';
import { DESPAWN_STRATEGIES } from './logic/updater';
import { ConfigError } from './shared/errors';

const DEFAULT_HOST = '127.0.0.1';
const DEFAULT_PORT = 8090;
const DEFAULT_TICK_INTERVAL_MS = 250;
const DEFAULT_DUNGEON_SIZE = 16;

const serverConfigSchema = z
    .object({
        host: z.string().trim().min(1).default(DEFAULT_HOST),
        port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
        tickIntervalMs: z.coerce.number().int().min(0).default(DEFAULT_TICK_INTERVAL_MS),
        dungeonWidth: z.coerce.number().int().min(3).default(DEFAULT_DUNGEON_SIZE),
        dungeonHeight: z.coerce.number().int().min(3).default(DEFAULT_DUNGEON_SIZE),
        despawnStrategy: z.enum(DESPAWN_STRATEGIES).default('unreachable'),
        maxTicks: z.coerce.number().int().positive().optional(),
        seed: z.coerce.number().int().optional(),
        player1Secret: z.string().min(1),
        player2Secret: z.string().min(1),
        npcsPerDungeon: z.coerce.number().int().min(0).default(0)
    })
    .refine(config => config.player1Secret !== config.player2Secret, {
        message: 'player secrets must differ',
        path: ['player2Secret']
    });

export type ServerConfig = z.output<typeof serverConfigSchema>;
export type ServerConfigInput = z.input<typeof serverConfigSchema>;

export function parseServerConfig(input: unknown): ServerConfig {
    const result = serverConfigSchema.safeParse(input);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid server configuration: ${details}`, { cause: result.error });
    }
    return result.data;
}

const ENV_KEYS = {
    host: 'DELVE_HOST',
    port: 'DELVE_PORT',
    tickIntervalMs: 'DELVE_TICK_INTERVAL_MS',
    dungeonWidth: 'DELVE_DUNGEON_WIDTH',
    dungeonHeight: 'DELVE_DUNGEON_HEIGHT',
    despawnStrategy: 'DELVE_DESPAWN_STRATEGY',
    maxTicks: 'DELVE_MAX_TICKS',
    seed: 'DELVE_SEED',
    player1Secret: 'DELVE_PLAYER1_SECRET',
    player2Secret: 'DELVE_PLAYER2_SECRET',
    npcsPerDungeon: 'DELVE_NPCS_PER_DUNGEON'
} as const;

/**
 * Read the configuration from environment variables, with explicit
 * overrides taking precedence. Blank variables count as unset.
 */
export function loadServerConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<ServerConfigInput> = {}
): ServerConfig {
    const fromEnv: Record<string, string> = {};
    for (const [key, name] of Object.entries(ENV_KEYS)) {
        const value = env[name]?.trim();
        if (value) {
            fromEnv[key] = key === 'despawnStrategy' ? value.toLowerCase() : value;
        }
    }
    return parseServerConfig({ ...fromEnv, ...overrides });
}
