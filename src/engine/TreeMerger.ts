/**
 * @file TreeMerger
 *
 * Inserts host files, host directory trees and raw byte content into the
 * archive tree. Missing directories are delegated to the PathResolver.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import type { ArchiveNode, HostTreeDescription, LookupScope, NameCasing, NameOrigin, NodeStore } from '../archive/types.js';
import { InvalidData, NameCollision } from '../archive/errors.js';
import { name_apply, pathRoot_check, pathSegments_split } from '../archive/names.js';
import type { PathResolver } from './PathResolver.js';
import { hostTree_read, hostTreeFiles_count } from './HostTreeReader.js';
import { logger_null, type Logger } from '../logging/Logger.js';

const COMPONENT: string = 'merger';

export interface TreeMergerOptions {
    scope: LookupScope;
    casing: NameCasing;
    logger?: Logger;
}

/**
 * What to insert. At least one of `internalPath` and `sourcePath` is required.
 *
 * @property internalPath - Destination inside the archive. Without a source
 *   it names the file to create (or a directory when the last segment has no `.`).
 * @property sourcePath - Host file or directory to copy in.
 * @property content - Payload for a file created from `internalPath` alone.
 */
export interface InsertRequest {
    internalPath?: string;
    sourcePath?: string;
    content?: Uint8Array;
}

interface MergeFrame {
    description: HostTreeDescription;
    node: ArchiveNode;
}

export class TreeMerger {
    private readonly logger: Logger;

    constructor(
        private readonly store: NodeStore,
        private readonly resolver: PathResolver,
        private readonly options: TreeMergerOptions
    ) {
        this.logger = options.logger ?? logger_null();
    }

    /**
     * Inserts a file, a directory tree, or a bare directory path.
     *
     * @returns The created file, the merged top directory, or the resolved directory.
     */
    public file_insert(request: InsertRequest): ArchiveNode {
        const { internalPath, sourcePath, content } = request;

        if (!sourcePath) {
            if (!internalPath) {
                throw new InvalidData('Neither a source path nor an internal path was provided');
            }
            const segments: string[] = pathSegments_split(internalPath);
            const finalSegment: string = segments[segments.length - 1] ?? '';
            if (!finalSegment.includes('.')) {
                return this.resolver.directory_ensure(segments);
            }
            if (!content) {
                throw new InvalidData(`Neither a source path nor content was provided for ${internalPath}`);
            }
            const parent: ArchiveNode = segments.length > 1
                ? this.resolver.directory_ensure(segments.slice(0, -1))
                : this.store.root_get();
            return this.file_create(parent, finalSegment, content, 'file');
        }

        const target: ArchiveNode = pathRoot_check(internalPath)
            ? this.store.root_get()
            : this.resolver.directory_ensure(internalPath ?? '');

        if (fs.statSync(sourcePath).isDirectory()) {
            return this.hostPath_merge(sourcePath, target);
        }
        return this.file_create(target, path.basename(sourcePath), fs.readFileSync(sourcePath), 'file');
    }

    /**
     * Reads a host directory and merges it below `target`.
     *
     * @returns The tree directory matching the host directory itself.
     */
    public hostPath_merge(hostDirectory: string, target?: ArchiveNode): ArchiveNode {
        const description: HostTreeDescription = hostTree_read(hostDirectory);
        this.logger.debug(COMPONENT, `Merging ${hostTreeFiles_count(description)} files from ${description.path}`);
        return this.description_merge(description, target);
    }

    /**
     * Recreates `description` below `target` (root by default). Existing
     * directories are reused; files are always created.
     *
     * @returns The tree directory matching the description's top directory.
     */
    public description_merge(description: HostTreeDescription, target?: ArchiveNode): ArchiveNode {
        const top: ArchiveNode = this.directory_obtain(target ?? this.store.root_get(), description.name);
        const stack: MergeFrame[] = [{ description, node: top }];

        while (stack.length > 0) {
            const frame: MergeFrame | undefined = stack.pop();
            if (!frame) break;

            const nested: MergeFrame[] = [];
            for (const entry of frame.description.entries) {
                if (entry.kind === 'directory') {
                    nested.push({ description: entry, node: this.directory_obtain(frame.node, entry.name) });
                } else {
                    this.file_create(frame.node, entry.name, fs.readFileSync(entry.path), 'merged');
                }
            }
            stack.push(...nested.reverse());
        }

        return top;
    }

    /**
     * Finds or creates the directory for a merged host directory.
     * Under the `tree` scope any same-named directory in the archive is reused.
     */
    private directory_obtain(parent: ArchiveNode, name: string): ArchiveNode {
        if (this.options.scope === 'tree') {
            const found: ArchiveNode | null = this.store.node_find(name);
            if (found && found.directory_check()) return found;
        }
        return this.resolver.directory_obtain(parent, name);
    }

    private file_create(parent: ArchiveNode, name: string, content: Uint8Array, origin: NameOrigin): ArchiveNode {
        const sibling: ArchiveNode | null = parent.child_get(name);
        if (sibling && sibling.directory_check()) {
            throw new NameCollision(`${name} is a directory, expected a file`);
        }
        const node: ArchiveNode = parent.child_create(name_apply(name, this.options.casing, origin), content);
        this.logger.debug(COMPONENT, `Inserted ${node.name} (${content.length} bytes)`);
        return node;
    }
}
