/**
 * Codec
 *
 * JSON-safe encoding of every engine type that crosses the wire. Encoders
 * produce plain objects; decoders validate with zod and rebuild the engine
 * classes. Anything malformed surfaces as a ProtocolError.
 *
 * Modifiers travel as { kind, prims } and are rebuilt through the registry
 * the codec was built with.
 */

import { z } from 'zod';
import { Dungeon } from '../world/dungeon';
import { Entity, type Item } from '../world/entity';
import { GameState } from '../world/game-state';
import { World } from '../world/world';
import { CombatFlag, createAttackResult, type EventArgs, type Modifier, type PreVal } from '../modifiers/types';
import type { ModifierRegistry } from '../modifiers/registry';
import type { GameStateUpdate } from '../logic/updates';
import { EngineError, ProtocolError } from '../shared/errors';

// ============================================
// Wire Schemas
// ============================================

const int = z.number().int();

const preValSchema: z.ZodType<PreVal> = z.lazy(() =>
    z.union([z.null(), z.boolean(), z.number(), z.string(), z.array(preValSchema), z.record(preValSchema)])
);

const modifierSchema = z.object({
    kind: z.string(),
    prims: z.record(z.number())
});

const itemSchema = z.object({
    name: z.string(),
    count: int.min(0),
    stackSize: int.min(1)
});

const entitySchema = z.object({
    id: int,
    depth: int,
    x: int,
    y: int,
    health: int,
    baseMaxHealth: int,
    baseDamage: int,
    baseArmor: int,
    modifiers: z.array(modifierSchema),
    items: z.array(z.tuple([int, itemSchema]))
});

const dungeonSchema = z.object({
    width: int.positive(),
    height: int.positive(),
    /** base64 of the column-major tile bytes */
    tiles: z.string()
});

const stateSchema = z.object({
    authoritative: z.boolean(),
    tick: int.min(0),
    player1Id: int,
    player2Id: int,
    dungeons: z.array(z.tuple([int, dungeonSchema])),
    entities: z.array(entitySchema)
});

const attackResultSchema = z.object({
    damage: int,
    flags: z.array(z.nativeEnum(CombatFlag))
});

const eventArgsSchema = z.discriminatedUnion('event', [
    z.object({ event: z.literal('parent_attack'), defenderId: int, result: attackResultSchema }),
    z.object({ event: z.literal('parent_defend'), attackerId: int, result: attackResultSchema }),
    z.object({ event: z.literal('tick') })
]);

const order = int.min(0);

const updateSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('entity-spawn'), order, entity: entitySchema }),
    z.object({ kind: z.literal('entity-death'), order, entityId: int, depth: int }),
    z.object({
        kind: z.literal('entity-position'),
        order,
        entityId: int,
        depth: int,
        x: int,
        y: int,
        fromDepth: int,
        depthChanged: z.boolean(),
        entity: entitySchema.nullable()
    }),
    z.object({ kind: z.literal('entity-health'), order, entityId: int, depth: int, sourceId: int.nullable(), amount: int }),
    z.object({ kind: z.literal('modifier-added'), order, entityId: int, depth: int, modifier: modifierSchema }),
    z.object({ kind: z.literal('modifier-removed'), order, entityId: int, depth: int, index: int.min(0) }),
    z.object({ kind: z.literal('dungeon-created'), order, depth: int, dungeon: dungeonSchema }),
    z.object({ kind: z.literal('dungeon-removed'), order, depth: int }),
    z.object({
        kind: z.literal('entity-event'),
        order,
        entityId: int,
        depth: int,
        args: eventArgsSchema,
        prevals: z.array(preValSchema)
    }),
    z.object({
        kind: z.literal('entity-combat'),
        order,
        attackerId: int,
        defenderId: int,
        depth: int,
        damage: int,
        flags: z.array(z.nativeEnum(CombatFlag)),
        attackPrevals: z.array(preValSchema),
        defendPrevals: z.array(preValSchema)
    }),
    z.object({ kind: z.literal('tick-end'), order, tick: int.min(0) })
]);

export type EncodedModifier = z.infer<typeof modifierSchema>;
export type EncodedEntity = z.infer<typeof entitySchema>;
export type EncodedDungeon = z.infer<typeof dungeonSchema>;
export type EncodedState = z.infer<typeof stateSchema>;
export type EncodedEventArgs = z.infer<typeof eventArgsSchema>;
export type EncodedUpdate = z.infer<typeof updateSchema>;

// ============================================
// Codec
// ============================================

export class Codec {
    constructor(private readonly registry: ModifierRegistry) {}

    // ==========================================
    // Encode
    // ==========================================

    encodeModifier(modifier: Modifier): EncodedModifier {
        return { kind: modifier.kind, prims: modifier.toPrims() };
    }

    encodeEntity(entity: Entity): EncodedEntity {
        return {
            id: entity.id,
            depth: entity.depth,
            x: entity.x,
            y: entity.y,
            health: entity.health,
            baseMaxHealth: entity.baseMaxHealth,
            baseDamage: entity.baseDamage,
            baseArmor: entity.baseArmor,
            modifiers: entity.modifiers.map(mod => this.encodeModifier(mod)),
            items: Array.from(entity.items, ([slot, item]): [number, Item] => [slot, { ...item }])
        };
    }

    encodeDungeon(dungeon: Dungeon): EncodedDungeon {
        return {
            width: dungeon.width,
            height: dungeon.height,
            tiles: Buffer.from(dungeon.toBytes()).toString('base64')
        };
    }

    encodeState(state: GameState): EncodedState {
        return {
            authoritative: state.authoritative,
            tick: state.tick,
            player1Id: state.player1Id,
            player2Id: state.player2Id,
            dungeons: state.world.depths().map((depth): [number, EncodedDungeon] => [
                depth,
                this.encodeDungeon(state.world.require(depth))
            ]),
            entities: state.entities.map(entity => this.encodeEntity(entity))
        };
    }

    encodeUpdate(update: GameStateUpdate): EncodedUpdate {
        switch (update.kind) {
            case 'entity-spawn':
                return { kind: update.kind, order: update.order, entity: this.encodeEntity(update.entity) };
            case 'entity-position':
                return {
                    ...update,
                    entity: update.entity ? this.encodeEntity(update.entity) : null
                };
            case 'modifier-added':
                return { ...update, modifier: this.encodeModifier(update.modifier) };
            case 'dungeon-created':
                return { kind: update.kind, order: update.order, depth: update.depth, dungeon: this.encodeDungeon(update.dungeon) };
            case 'entity-event':
                return { ...update, args: encodeEventArgs(update.args), prevals: [...update.prevals] };
            case 'entity-combat':
                return {
                    ...update,
                    flags: [...update.flags],
                    attackPrevals: [...update.attackPrevals],
                    defendPrevals: [...update.defendPrevals]
                };
            case 'entity-death':
            case 'entity-health':
            case 'modifier-removed':
            case 'dungeon-removed':
            case 'tick-end':
                return { ...update };
        }
    }

    // ==========================================
    // Decode
    // ==========================================

    decodeModifier(input: unknown): Modifier {
        const encoded = parse(modifierSchema, input, 'modifier');
        return this.registry.decode(encoded.kind, encoded.prims);
    }

    decodeEntity(input: unknown): Entity {
        return this.buildEntity(parse(entitySchema, input, 'entity'));
    }

    decodeDungeon(input: unknown): Dungeon {
        return buildDungeon(parse(dungeonSchema, input, 'dungeon'));
    }

    decodeState(input: unknown): GameState {
        const encoded = parse(stateSchema, input, 'state');
        return rebuild('state', () => new GameState({
            authoritative: encoded.authoritative,
            tick: encoded.tick,
            player1Id: encoded.player1Id,
            player2Id: encoded.player2Id,
            world: new World(encoded.dungeons.map(([depth, dungeon]): [number, Dungeon] => [depth, buildDungeon(dungeon)])),
            entities: encoded.entities.map(entity => this.buildEntity(entity))
        }));
    }

    decodeUpdate(input: unknown): GameStateUpdate {
        const encoded = parse(updateSchema, input, 'update');
        switch (encoded.kind) {
            case 'entity-spawn':
                return { ...encoded, entity: this.buildEntity(encoded.entity) };
            case 'entity-position':
                return { ...encoded, entity: encoded.entity ? this.buildEntity(encoded.entity) : null };
            case 'modifier-added':
                return { ...encoded, modifier: this.registry.decode(encoded.modifier.kind, encoded.modifier.prims) };
            case 'dungeon-created':
                return { ...encoded, dungeon: buildDungeon(encoded.dungeon) };
            case 'entity-event':
                return { ...encoded, args: buildEventArgs(encoded.args) };
            case 'entity-combat':
                return { ...encoded, flags: createAttackResult(encoded.damage, encoded.flags).flags };
            case 'entity-death':
            case 'entity-health':
            case 'modifier-removed':
            case 'dungeon-removed':
            case 'tick-end':
                return encoded;
        }
    }

    private buildEntity(encoded: EncodedEntity): Entity {
        const modifiers = encoded.modifiers.map(mod => this.registry.decode(mod.kind, mod.prims));
        return new Entity({ ...encoded, modifiers });
    }
}

// ============================================
// Helpers
// ============================================

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        const path = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new ProtocolError(`Malformed ${what}${path}: ${issue?.message ?? 'invalid'}`, { cause: result.error });
    }
    return result.data;
}

/** Turn a semantic failure while rebuilding into a ProtocolError. */
function rebuild<T>(what: string, build: () => T): T {
    try {
        return build();
    } catch (error) {
        if (error instanceof ProtocolError) throw error;
        if (error instanceof EngineError || error instanceof RangeError) {
            throw new ProtocolError(`Inconsistent ${what}: ${error.message}`, { cause: error });
        }
        throw error;
    }
}

function buildDungeon(encoded: EncodedDungeon): Dungeon {
    const tiles = new Uint8Array(Buffer.from(encoded.tiles, 'base64'));
    return rebuild('dungeon', () => new Dungeon(encoded.width, encoded.height, tiles));
}

function encodeEventArgs(args: EventArgs): EncodedEventArgs {
    switch (args.event) {
        case 'parent_attack':
        case 'parent_defend':
            return { ...args, result: { damage: args.result.damage, flags: [...args.result.flags] } };
        case 'tick':
            return { event: 'tick' };
    }
}

function buildEventArgs(encoded: EncodedEventArgs): EventArgs {
    switch (encoded.event) {
        case 'parent_attack':
            return { ...encoded, result: createAttackResult(encoded.result.damage, encoded.result.flags) };
        case 'parent_defend':
            return { ...encoded, result: createAttackResult(encoded.result.damage, encoded.result.flags) };
        case 'tick':
            return encoded;
    }
}
