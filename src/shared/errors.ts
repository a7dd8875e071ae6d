/**
 * Engine Errors
 *
 * Every failure the engine surfaces carries a stable `code` so the transport
 * layer can decide between disconnecting, resyncing or aborting.
 */

export interface EngineErrorOptions {
    code?: string;
    cause?: unknown;
}

export class EngineError extends Error {
    readonly code: string;
    declare readonly cause?: unknown;

    constructor(message: string, options: EngineErrorOptions = {}) {
        super(message);
        this.name = 'EngineError';
        this.code = options.code ?? 'engine_error';
        this.cause = options.cause;
    }
}

/**
 * The position/identity indices disagree with the entity list, or the
 * updater was re-entered. Always an engine bug; never recoverable.
 */
export class StateCorruptionError extends EngineError {
    constructor(message: string, options: EngineErrorOptions = {}) {
        super(message, { code: 'state_corruption', ...options });
        this.name = 'StateCorruptionError';
    }
}

/** Invalid startup configuration (unknown despawn strategy, equal secrets...). */
export class ConfigError extends EngineError {
    constructor(message: string, options: EngineErrorOptions = {}) {
        super(message, { code: 'invalid_config', ...options });
        this.name = 'ConfigError';
    }
}

/**
 * A replayed update references state the recipient does not have.
 * The recipient is desynchronized and needs a full sync.
 */
export class ReplayMismatchError extends EngineError {
    readonly order: number;

    constructor(message: string, order: number, options: EngineErrorOptions = {}) {
        super(message, { code: 'replay_mismatch', ...options });
        this.name = 'ReplayMismatchError';
        this.order = order;
    }
}

/** A peer sent something malformed or out of protocol. */
export class ProtocolError extends EngineError {
    constructor(message: string, options: EngineErrorOptions = {}) {
        super(message, { code: 'protocol_error', ...options });
        this.name = 'ProtocolError';
    }
}

export function assertState(condition: boolean, message: string): asserts condition {
    if (!condition) {
        throw new StateCorruptionError(message);
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
