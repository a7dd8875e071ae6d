/**
 * delve-engine - Server-authoritative two-player dungeon match engine
 *
 * Features:
 * - Simultaneous-move tick resolution with seeded initiative
 * - Three-phase modifier protocol (pre / on / post) with replayable prevals
 * - Ordered update log with per-depth relevance filtering
 * - WebSocket lobby, match server and client replica
 */

// ============================================
// Shared
// ============================================
export {
    EngineError,
    StateCorruptionError,
    ConfigError,
    ReplayMismatchError,
    ProtocolError,
    assertState,
    getErrorMessage
} from './shared/errors';
export type { EngineErrorOptions } from './shared/errors';

export { Random } from './math/random';
export type { RandomState } from './math/random';

// ============================================
// World Model
// ============================================
export { Dungeon, Tile, isTile } from './world/dungeon';
export { World } from './world/world';
export { Entity } from './world/entity';
export type { Item, DerivedStats, EntityInit } from './world/entity';
export { GameState, PLAYER1_ID, PLAYER2_ID } from './world/game-state';
export type { GameStateInit } from './world/game-state';

// ============================================
// Modifiers
// ============================================
export {
    MODIFIER_EVENTS,
    CombatFlag,
    createAttackResult,
    withDamage,
    withFlag,
    hasFlag
} from './modifiers/types';
export type {
    ModifierEvent,
    AttackResult,
    AttackEventArgs,
    DefendEventArgs,
    TickEventArgs,
    EventArgs,
    PreVal,
    ModifierContext,
    PreEventContext,
    ModifierKind,
    ModifierPrims,
    Modifier
} from './modifiers/types';
export {
    BaseModifier,
    StatModifier,
    CriticalStrikeModifier,
    EvasionModifier,
    GuardModifier,
    ThornsModifier,
    RegenerationModifier
} from './modifiers/modifiers';
export type { FlatStats } from './modifiers/modifiers';
export {
    preEventAll,
    onEventAll,
    postEventAll,
    runEntityEvent,
    combatPreEvents,
    resolveCombatEvents
} from './modifiers/pipeline';
export type { CombatPrevals } from './modifiers/pipeline';
export { ModifierRegistry, createModifierRegistry } from './modifiers/registry';
export type { ModifierDecoder } from './modifiers/registry';

// ============================================
// Logic
// ============================================
export { Move, isMove, moveDelta } from './logic/moves';
export { applyUpdate, applyUpdates, isUpdateRelevant } from './logic/updates';
export type {
    GameStateUpdate,
    UpdateKind,
    EntitySpawnUpdate,
    EntityDeathUpdate,
    EntityPositionUpdate,
    EntityHealthUpdate,
    ModifierAddedUpdate,
    ModifierRemovedUpdate,
    DungeonCreatedUpdate,
    DungeonRemovedUpdate,
    EntityEventUpdate,
    EntityCombatUpdate,
    TickEndUpdate
} from './logic/updates';
export { Updater, MoveOutcome, DESPAWN_STRATEGIES, parseDespawnStrategy } from './logic/updater';
export type { DespawnStrategy, TickOutcome, TickResult, UpdaterOptions } from './logic/updater';
export {
    EmptyDungeonGenerator,
    createInitialState,
    createNpcPopulator,
    findFreeGround,
    spawnNpc,
    stayInPlace,
    wanderingNpcs
} from './logic/worldgen';
export type { DungeonGenerator, NpcMoveSelector, NpcPopulator, NpcTemplate, StartOptions } from './logic/worldgen';

// ============================================
// Serialization / Networking
// ============================================
export { Codec } from './codec/codec';
export type { EncodedDungeon, EncodedEntity, EncodedModifier, EncodedState, EncodedUpdate } from './codec/codec';
export { PacketCodec } from './net/packets';
export type { Packet, ServerPacket, ClientPacket, LobbyChange, MatchEndReason } from './net/packets';
export { wrapSocket } from './net/connection';
export type { Connection, SocketConnection } from './net/connection';
export { Lobby, secretsMatch } from './net/lobby';
export type { LobbyOptions, LobbyRoster, LobbyStatus } from './net/lobby';
export { MatchServer, playerFeed } from './net/match-server';
export type { MatchServerOptions, MatchStatus } from './net/match-server';
export { Replica } from './net/replica';
export type { ReplicaOptions } from './net/replica';
export { startServer } from './net/server';
export type { RunningServer } from './net/server';

// ============================================
// Configuration / Plugins
// ============================================
export { parseServerConfig, loadServerConfig } from './config';
export type { ServerConfig, ServerConfigInput } from './config';
export { enableDeterminismGuard, disableDeterminismGuard, isDeterminismGuardEnabled } from './plugins/determinism-guard';
export type { SimulationTarget } from './plugins/determinism-guard';
