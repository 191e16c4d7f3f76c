/**
 * @file Archive Errors
 *
 * Error taxonomy shared by the store, the engine and the handler.
 *
 * @module
 */

/** Base class for every error raised by the archive layer. */
export class ArchiveError extends Error {
    constructor(message: string = '') {
        super(message);
        this.name = new.target.name;
    }
}

/** A named node required by an operation does not exist. */
export class NodeNotFound extends ArchiveError {}

/** Input that cannot be turned into a well-formed tree or container. */
export class InvalidData extends ArchiveError {}

/** Unsupported game version string. */
export class InvalidGameVersion extends ArchiveError {}

/** A path segment would exist as both a file and a directory. */
export class NameCollision extends ArchiveError {}

/** An operation needs a mounted archive and none is loaded. */
export class ArchiveNotLoaded extends ArchiveError {}

/**
 * Convert unknown thrown values into display-safe messages.
 */
export function errorMessage_get(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
