/**
 * @file TreeExporter
 *
 * Writes archive nodes back to the host filesystem: a whole subtree with its
 * directory structure, a single named node, or every file matching a
 * wildcard filter.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import type { ArchiveNode, NodeStore } from '../archive/types.js';
import { InvalidData, NodeNotFound } from '../archive/errors.js';
import { name_contains, nameUnsafe_check } from '../archive/names.js';
import { tree_walk, type WalkEntry } from './walk.js';

export class TreeExporter {
    constructor(private readonly store: NodeStore) {}

    /**
     * Exports a node found by name, or every file whose name contains `name`.
     *
     * @param name - Exact node name, or the filter when `matchAll` is set.
     * @param destination - Host directory; created when missing.
     * @param matchAll - Wildcard mode: flat export of matching files.
     * @returns Number of files written.
     */
    public node_export(name: string, destination: string, matchAll: boolean = false): number {
        fs.mkdirSync(destination, { recursive: true });

        if (matchAll) {
            return this.matches_export(name, destination);
        }

        const node: ArchiveNode | null = this.store.node_find(name);
        if (!node) {
            throw new NodeNotFound(`${name} not found`);
        }
        if (node.directory_check()) {
            return this.subtree_export(node, destination);
        }
        file_write(destination, [node.name], node);
        return 1;
    }

    /**
     * Writes every descendant of `node` below `destination`, recreating the
     * relative directory structure.
     *
     * @returns Number of files written.
     */
    public subtree_export(node: ArchiveNode, destination: string): number {
        fs.mkdirSync(destination, { recursive: true });
        let written: number = 0;
        tree_walk(node, (entry: WalkEntry): void => {
            if (entry.node.directory_check()) {
                fs.mkdirSync(hostPath_join(destination, entry.segments), { recursive: true });
            } else {
                file_write(destination, entry.segments, entry.node);
                written += 1;
            }
        });
        return written;
    }

    /**
     * Writes every file anywhere in the tree whose name contains `filter`
     * (case-insensitive) directly into `destination`.
     */
    private matches_export(filter: string, destination: string): number {
        let written: number = 0;
        tree_walk(this.store.root_get(), (entry: WalkEntry): void => {
            if (!entry.node.directory_check() && name_contains(entry.node.name, filter)) {
                file_write(destination, [entry.node.name], entry.node);
                written += 1;
            }
        });
        return written;
    }
}

function file_write(destination: string, segments: string[], node: ArchiveNode): void {
    fs.writeFileSync(hostPath_join(destination, segments), node.data ?? new Uint8Array(0));
}

/**
 * Join node names onto a host directory, refusing names that would leave it.
 */
function hostPath_join(destination: string, segments: string[]): string {
    for (const seg of segments) {
        if (nameUnsafe_check(seg)) {
            throw new InvalidData(`Refusing to export node named '${seg}'`);
        }
    }
    return path.join(destination, ...segments);
}
