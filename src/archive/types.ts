/**
 * @file Archive Type Definitions
 *
 * Core interfaces for the archive tree: nodes, the node store collaborator,
 * the container codec, and the host-side structural description used during
 * insertion.
 *
 * @module
 */

/** Supported archive format generations. */
export enum GameVersion {
    GOTHIC1 = 'g1',
    GOTHIC2 = 'g2'
}

/**
 * Policy applied to every node name the engine creates.
 * `archive` upper-cases files inserted one at a time and keeps directory
 * names and files merged from a host directory as given; `upper` upper-cases
 * every name; `preserve` keeps every name as given.
 */
export type NameCasing = 'archive' | 'upper' | 'preserve';

/**
 * How a node being created entered the tree: a directory, a file inserted
 * on its own (content or a single host file), or a file merged from a host
 * directory.
 */
export type NameOrigin = 'directory' | 'file' | 'merged';

/**
 * Where directory lookups happen while resolving an internal path.
 * `path` searches only the current directory's children; `tree` searches the
 * whole archive like the collaborator's global lookup.
 */
export type LookupScope = 'path' | 'tree';

/**
 * A directory or file entry inside the archive tree.
 * Directories carry `data === null`; files carry an immutable payload.
 */
export interface ArchiveNode {
    readonly name: string;
    readonly data: Uint8Array | null;

    /** True when this node is a directory. */
    directory_check(): boolean;

    /** Snapshot of the children in creation order. Empty for files. */
    children_list(): ArchiveNode[];

    /** First child whose name matches case-insensitively, or null. */
    child_get(name: string): ArchiveNode | null;

    /**
     * Creates a child node. Omitting `data` creates a directory.
     *
     * @param name - Stored name (kept as given).
     * @param data - File payload.
     * @returns The new node.
     */
    child_create(name: string, data?: Uint8Array): ArchiveNode;

    /** Removes the first child whose name matches case-insensitively. */
    child_remove(name: string): void;
}

/**
 * Node storage collaborator. Owns the root and answers global,
 * non-path-scoped lookups.
 */
export interface NodeStore {
    root_get(): ArchiveNode;

    /** Pre-order, case-insensitive search of the whole tree. Root is never returned. */
    node_find(name: string): ArchiveNode | null;
}

/**
 * Serializes a tree into an on-disk container and back.
 */
export interface ArchiveCodec {
    archive_encode(root: ArchiveNode, version: GameVersion): Uint8Array;

    /**
     * Merges the container's entries into `root`.
     *
     * @returns The version recorded in the container, or null when absent.
     */
    archive_decode(bytes: Uint8Array, root: ArchiveNode): GameVersion | null;
}

/** A file reference inside a host tree description. */
export interface HostFileEntry {
    kind: 'file';
    name: string;
    path: string;
}

/**
 * Structural mirror of a host directory, keyed by the directory's own name.
 */
export interface HostTreeDescription {
    kind: 'directory';
    name: string;
    path: string;
    entries: HostTreeEntry[];
}

export type HostTreeEntry = HostTreeDescription | HostFileEntry;

/**
 * Result of a public operation whose failures are reported rather than thrown.
 */
export type OperationOutcome =
    | { ok: true; count: number }
    | { ok: false; error: string };
