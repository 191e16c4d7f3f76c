/**
 * @file ArchiveHandler
 *
 * Front door for one archive: mounts it, runs one operation at a time
 * against the engine, applies the error policy (resolution errors propagate,
 * export/remove/save failures are logged and reported), and saves.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import type { ArchiveNode, OperationOutcome } from '../archive/types.js';
import { GameVersion } from '../archive/types.js';
import { ArchiveTree } from '../archive/ArchiveTree.js';
import { MemoryNodeStore } from '../archive/MemoryNodeStore.js';
import { ZipCodec } from '../archive/ZipCodec.js';
import { ArchiveNotLoaded, InvalidData, NodeNotFound, errorMessage_get } from '../archive/errors.js';
import { PathResolver } from '../engine/PathResolver.js';
import { TreeMerger, type InsertRequest } from '../engine/TreeMerger.js';
import { TreeExporter } from '../engine/TreeExporter.js';
import { Remover } from '../engine/Remover.js';
import { tree_render } from '../engine/TreePrinter.js';
import { SettingsSchema, gameVersion_parse, type ResolvedSettings } from '../config/settings.js';
import { logger_null, type Logger } from '../logging/Logger.js';

const COMPONENT: string = 'handler';

export interface ArchiveHandlerOptions {
    /** Archive on disk; mounted when it exists, otherwise the default save target. */
    archivePath?: string;
    settings?: ResolvedSettings;
    /** Also handed to the store and codec, which log at `trace` level. */
    logger?: Logger;
    /** Base for relative defaults (export destination, save location). */
    cwd?: string;
    clock?: () => Date;
}

export interface RemoveRequest {
    start?: ArchiveNode;
    matchAll?: boolean;
}

/**
 * Operates on one mounted (or new, empty) archive.
 *
 * @example
 * ```typescript
 * const handler = new ArchiveHandler({ archivePath: 'Mod.vdf' });
 * handler.file_insert({ internalPath: '_work/data/scripts', sourcePath: './scripts' });
 * handler.archive_save('build/');
 * ```
 */
export class ArchiveHandler {
    private readonly archivePath: string | null;
    private readonly targetPath: string | null;
    private readonly archiveName: string;
    private readonly tree: ArchiveTree;
    private readonly resolver: PathResolver;
    private readonly merger: TreeMerger;
    private readonly exporter: TreeExporter;
    private readonly remover: Remover;
    private readonly logger: Logger;
    private readonly cwd: string;

    constructor(options: ArchiveHandlerOptions = {}) {
        const settings: ResolvedSettings = options.settings ?? SettingsSchema.parse({});
        this.logger = options.logger ?? logger_null();
        this.cwd = options.cwd ?? process.cwd();

        this.targetPath = options.archivePath ? path.resolve(this.cwd, options.archivePath) : null;
        this.archivePath = this.targetPath && fs.existsSync(this.targetPath) ? this.targetPath : null;
        this.archiveName = archiveName_derive(this.targetPath, options.clock ?? ((): Date => new Date()));

        const store: MemoryNodeStore = new MemoryNodeStore(this.logger);
        this.tree = new ArchiveTree({ store, codec: new ZipCodec(this.logger), version: settings.gameVersion });

        if (this.archivePath) {
            if (!fs.statSync(this.archivePath).isFile()) {
                throw new InvalidData(`${path.basename(this.archivePath)} is not an archive file`);
            }
            this.tree.archive_mount(this.archivePath);
            this.logger.debug(COMPONENT, `Mounted ${this.archivePath} (${this.tree.fileCount_get()} files)`);
        }

        this.resolver = new PathResolver(store, { scope: settings.lookupScope, casing: settings.nameCasing });
        this.merger = new TreeMerger(store, this.resolver, {
            scope: settings.lookupScope,
            casing: settings.nameCasing,
            logger: this.logger
        });
        this.exporter = new TreeExporter(store);
        this.remover = new Remover(store);
    }

    // ─── Properties ─────────────────────────────────────────────

    public archiveName_get(): string {
        return this.archiveName;
    }

    /** True when an existing archive was mounted. */
    public archiveExists_check(): boolean {
        return this.archivePath !== null;
    }

    /** File count cached at mount time. */
    public fileCount_get(): number {
        return this.tree.fileCount_get();
    }

    public gameVersion_get(): GameVersion {
        return this.tree.version_get();
    }

    /**
     * @param version - `g1` or `g2` (any case).
     * @throws InvalidGameVersion for anything else.
     */
    public gameVersion_set(version: string): void {
        this.tree.version_set(gameVersion_parse(version));
    }

    public root_get(): ArchiveNode {
        return this.tree.root_get();
    }

    // ─── Operations ─────────────────────────────────────────────

    /**
     * Global lookup by name.
     */
    public node_get(name: string): ArchiveNode | null {
        this.logger.info(COMPONENT, `Loading ${name}...`);
        const node: ArchiveNode | null = this.tree.node_find(name);
        if (!node) {
            this.logger.info(COMPONENT, `Failed to load ${name}!`);
        }
        return node;
    }

    /**
     * Inserts content, a host file or a host directory. Errors propagate.
     */
    public file_insert(request: InsertRequest): ArchiveNode {
        const origin: string = request.sourcePath ?? request.internalPath ?? '';
        this.logger.info(COMPONENT, `Inserting ${request.sourcePath ? 'from' : 'to'} ${origin}...`);
        return this.merger.file_insert(request);
    }

    /**
     * Exports a node by name, or every file containing `name` when `matchAll`.
     *
     * @throws NodeNotFound in exact mode when nothing has that name.
     */
    public node_export(name: string, destination?: string, matchAll: boolean = false): OperationOutcome {
        const target: string = this.destination_resolve(destination);
        if (!matchAll && !this.tree.node_find(name)) {
            throw new NodeNotFound(`${name} not found`);
        }
        this.logger.info(COMPONENT, `Exporting ${name} to ${target}...`);
        return this.outcome_capture(`export ${name}`, (): number => this.exporter.node_export(name, target, matchAll));
    }

    /**
     * Exports the whole tree. Files written before a failure stay on disk.
     */
    public tree_exportAll(destination?: string): OperationOutcome {
        const target: string = this.destination_resolve(destination);
        this.logger.info(COMPONENT, `Exporting all files from ${this.archiveName}...`);
        const outcome: OperationOutcome = this.outcome_capture(
            'export all files',
            (): number => this.exporter.subtree_export(this.tree.root_get(), target)
        );
        if (outcome.ok) {
            this.logger.info(COMPONENT, `Extracted ${this.tree.fileCount_get()} files to ${target}`);
        }
        return outcome;
    }

    /**
     * Removes by exact name or wildcard filter. The tree may be left
     * partially modified when a removal fails midway.
     *
     * @throws NodeNotFound in exact mode when nothing has that name.
     */
    public node_remove(name: string, request: RemoveRequest = {}): OperationOutcome {
        if (!request.matchAll && !this.tree.node_find(name)) {
            throw new NodeNotFound(`${name} not found`);
        }
        this.logger.info(COMPONENT, `Removing ${name}...`);
        const outcome: OperationOutcome = this.outcome_capture(
            `remove ${name}`,
            (): number => this.remover.node_remove(name, request)
        );
        if (outcome.ok) {
            this.logger.info(COMPONENT, `Successfully removed ${name}`);
        }
        return outcome;
    }

    /**
     * Resolves where the archive is saved: the explicit destination (a
     * destination without `.` in its last segment is a directory), else the
     * archive path the handler was opened with, else `<cwd>/<archive name>`.
     */
    public savePath_resolve(destination?: string): string {
        let target: string = destination
            ? path.resolve(this.cwd, destination)
            : this.targetPath ?? path.join(this.cwd, this.archiveName);
        if (!path.basename(target).includes('.')) {
            target = path.join(target, this.archiveName);
        }
        return target;
    }

    /**
     * Serializes the archive in the current game version.
     *
     * @returns count 1 on success.
     */
    public archive_save(destination?: string): OperationOutcome {
        const target: string = this.savePath_resolve(destination);
        this.logger.info(COMPONENT, `Saving archive as ${target}...`);
        const outcome: OperationOutcome = this.outcome_capture('save archive', (): number => {
            this.tree.archive_save(target);
            return 1;
        });
        if (outcome.ok) {
            this.logger.info(COMPONENT, `Successfully saved ${target}`);
        }
        return outcome;
    }

    /**
     * Renders the tree. Requires a mounted archive.
     *
     * @throws ArchiveNotLoaded when no archive was mounted.
     */
    public tree_print(colorize: boolean = false): string {
        if (!this.archivePath) {
            throw new ArchiveNotLoaded(`${this.archiveName} is empty.`);
        }
        this.logger.info(COMPONENT, `Printing tree of ${this.archiveName}`);
        return tree_render(this.tree.root_get(), { colorize });
    }

    // ─── Internal Helpers ───────────────────────────────────────

    private destination_resolve(destination?: string): string {
        return destination ? path.resolve(this.cwd, destination) : this.cwd;
    }

    /**
     * Runs `work`, converting a thrown error into a logged failure outcome.
     */
    private outcome_capture(label: string, work: () => number): OperationOutcome {
        try {
            return { ok: true, count: work() };
        } catch (error: unknown) {
            const message: string = errorMessage_get(error);
            this.logger.error(COMPONENT, `Failed to ${label} due to an unhandled exception: ${message}`, error);
            return { ok: false, error: message };
        }
    }
}

/**
 * Name of the archive: the basename of its path, else a timestamped placeholder.
 */
export function archiveName_derive(archivePath: string | null, clock: () => Date): string {
    if (archivePath) return path.basename(archivePath);
    return `Unnamed_${timestamp_format(clock())}.vdf`;
}

function timestamp_format(date: Date): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
        + `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}
