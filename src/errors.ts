import { EntityKind } from "./config";

/**
 * Base of every error this package raises. `code` is a stable, machine
 * readable category; the message is for people.
 */
export class ScrobblerError extends Error {
    code: string;

    constructor(message: string, code: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class ConfigError extends ScrobblerError {
    constructor(message: string) {
        super(message, "config_error");
    }
}

/**
 * An entity was built from a field mapping that carries no identity.
 */
export class ConstructionError extends ScrobblerError {
    constructor(public readonly kind: EntityKind, message: string) {
        super(message, "construction_error");
    }
}

/**
 * The transport failed: bad status, connection failure or an empty body.
 */
export class FetchError extends ScrobblerError {
    constructor(
        public readonly url: string,
        message: string,
        public readonly status?: number,
        public readonly reason?: unknown
    ) {
        super(`${message} (fetching ${url})`, "fetch_error");
    }
}

export class DecodeError extends ScrobblerError {
    constructor(
        public readonly detail: string,
        public readonly url?: string,
        public readonly reason?: unknown
    ) {
        super(
            url === undefined ? detail : `${detail} (decoding ${url})`,
            "decode_error"
        );
    }

    static from(error: unknown, url: string): DecodeError {
        if (error instanceof DecodeError) {
            return new DecodeError(error.detail, url, error.reason);
        }
        return new DecodeError(
            error instanceof Error ? error.message : String(error),
            url,
            error
        );
    }
}

/**
 * A feed record could not be turned into an entity. Aborts the whole fetch.
 */
export class MappingError extends ScrobblerError {
    constructor(
        message: string,
        public readonly recordKey: string,
        public readonly url?: string,
        public readonly reason?: unknown
    ) {
        super(message, "mapping_error");
    }
}

export class UnsupportedRelationshipError extends ScrobblerError {
    constructor(
        public readonly kind: EntityKind,
        public readonly relationship: string
    ) {
        super(
            `The service doesn't provide ${relationship} related to a ${kind}`,
            "unsupported_relationship"
        );
    }
}
