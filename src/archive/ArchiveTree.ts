/**
 * @file ArchiveTree — Mounted Archive
 *
 * Binds a node store to a container codec, and tracks the declared format
 * version and the cached file count.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import type { ArchiveCodec, ArchiveNode, NodeStore } from './types.js';
import { GameVersion } from './types.js';
import { MemoryNodeStore } from './MemoryNodeStore.js';
import { ZipCodec } from './ZipCodec.js';
import { files_count } from '../engine/walk.js';

export interface ArchiveTreeOptions {
    store?: NodeStore;
    codec?: ArchiveCodec;
    version?: GameVersion;
}

/**
 * The whole archive: root, version and cached file count.
 *
 * The file count is computed at construction and after every mount; later
 * mutations do not update it.
 */
export class ArchiveTree {
    private readonly store: NodeStore;
    private readonly codec: ArchiveCodec;
    private version: GameVersion;
    private fileCount: number;

    constructor(options: ArchiveTreeOptions = {}) {
        this.store = options.store ?? new MemoryNodeStore();
        this.codec = options.codec ?? new ZipCodec();
        this.version = options.version ?? GameVersion.GOTHIC2;
        this.fileCount = files_count(this.store.root_get());
    }

    public root_get(): ArchiveNode {
        return this.store.root_get();
    }

    public node_find(name: string): ArchiveNode | null {
        return this.store.node_find(name);
    }

    public version_get(): GameVersion {
        return this.version;
    }

    public version_set(version: GameVersion): void {
        this.version = version;
    }

    /** Cached count of file nodes as of construction or the last mount. */
    public fileCount_get(): number {
        return this.fileCount;
    }

    /**
     * Loads an on-disk archive into the tree. Entries merge into whatever the
     * tree already holds. The declared version is left unchanged.
     *
     * @param hostArchivePath - Path to the container file.
     * @returns The version recorded in the container, or null.
     */
    public archive_mount(hostArchivePath: string): GameVersion | null {
        const bytes: Uint8Array = fs.readFileSync(hostArchivePath);
        const recorded: GameVersion | null = this.codec.archive_decode(bytes, this.store.root_get());
        this.fileCount = files_count(this.store.root_get());
        return recorded;
    }

    /**
     * Serializes the tree to `destinationPath` in the given (or declared) version.
     * Parent directories are created.
     */
    public archive_save(destinationPath: string, version: GameVersion = this.version): void {
        const bytes: Uint8Array = this.codec.archive_encode(this.store.root_get(), version);
        fs.mkdirSync(path.dirname(destinationPath), { recursive: true });
        fs.writeFileSync(destinationPath, bytes);
    }
}
