/**
 * @file Remover
 *
 * Removes nodes by exact name or by wildcard filter.
 *
 * @module
 */

import type { ArchiveNode, NodeStore } from '../archive/types.js';
import { NodeNotFound } from '../archive/errors.js';
import { name_contains, name_equals } from '../archive/names.js';
import { tree_walk, type WalkAction, type WalkEntry } from './walk.js';

export interface RemoveOptions {
    /** Directory whose subtree is searched. Defaults to root. */
    start?: ArchiveNode;
    /** Remove every file whose name contains the filter. */
    matchAll?: boolean;
}

export class Remover {
    constructor(private readonly store: NodeStore) {}

    /**
     * Removes matching nodes below `options.start`.
     *
     * Exact mode removes every directory and file named `name`
     * (case-insensitive) anywhere in the subtree, not just the first; a
     * removed directory is not searched further. It throws NodeNotFound when
     * no node of that name exists in the archive at all.
     *
     * Wildcard mode removes files whose name contains `name`; directories are
     * always searched and never removed.
     *
     * @returns Number of nodes removed.
     */
    public node_remove(name: string, options: RemoveOptions = {}): number {
        const start: ArchiveNode = options.start ?? this.store.root_get();
        const matchAll: boolean = options.matchAll ?? false;

        if (!matchAll && !this.store.node_find(name)) {
            throw new NodeNotFound(`${name} not found`);
        }

        let removed: number = 0;
        tree_walk(start, (entry: WalkEntry): WalkAction => {
            const isDirectory: boolean = entry.node.directory_check();
            const matches: boolean = matchAll
                ? !isDirectory && name_contains(entry.node.name, name)
                : name_equals(entry.node.name, name);

            if (!matches) return 'descend';
            entry.parent.child_remove(entry.node.name);
            removed += 1;
            return 'prune';
        });
        return removed;
    }
}
