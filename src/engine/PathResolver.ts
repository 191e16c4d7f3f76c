/**
 * @file PathResolver
 *
 * Resolves an internal directory path inside the archive tree, creating
 * every missing segment (like `mkdir -p`).
 *
 * @module
 */

import type { ArchiveNode, LookupScope, NameCasing, NodeStore } from '../archive/types.js';
import { NameCollision } from '../archive/errors.js';
import { name_apply, pathSegments_split } from '../archive/names.js';

export interface PathResolverOptions {
    scope: LookupScope;
    casing: NameCasing;
}

/**
 * Ensures directory paths exist in the tree.
 *
 * With `scope: 'path'` each segment is looked up among the current
 * directory's children. With `scope: 'tree'` each segment is looked up
 * anywhere in the archive, so same-named directories in different places
 * collide; a single-segment path only ever matches a direct child of the
 * starting directory.
 *
 * @example
 * ```typescript
 * const resolver = new PathResolver(store, { scope: 'path', casing: 'upper' });
 * const scripts = resolver.directory_ensure('_work/data/scripts');
 * resolver.directory_ensure('_WORK/DATA/SCRIPTS') === scripts; // true
 * ```
 */
export class PathResolver {
    constructor(
        private readonly store: NodeStore,
        private readonly options: PathResolverOptions
    ) {}

    /**
     * Returns the directory at `path` below `start`, creating missing segments.
     *
     * @param path - Slash-delimited internal path or its segments.
     * @param start - Directory to resolve from (defaults to root).
     * @returns The final directory node; `start` itself for an empty path.
     */
    public directory_ensure(path: string | readonly string[], start?: ArchiveNode): ArchiveNode {
        const segments: string[] = pathSegments_split(path);
        let current: ArchiveNode = start ?? this.store.root_get();

        if (this.options.scope === 'tree' && segments.length === 1) {
            return this.directory_child(current, segments[0]);
        }

        for (let i: number = 0; i < segments.length; i++) {
            current = this.directory_obtain(current, segments[i], i === segments.length - 1);
        }
        return current;
    }

    /**
     * Resolves one segment below `current` according to the lookup scope.
     *
     * @param current - Directory the segment is created in when missing.
     * @param segment - Segment name.
     * @param isFinal - Whether this is the path's last segment.
     */
    public directory_obtain(current: ArchiveNode, segment: string, isFinal: boolean = true): ArchiveNode {
        if (this.options.scope === 'path') {
            return this.directory_child(current, segment);
        }

        const found: ArchiveNode | null = this.store.node_find(segment);
        if (found && found.directory_check()) {
            return found;
        }
        if (found && !isFinal) {
            throw new NameCollision(`${segment} is a file, expected a directory`);
        }
        return this.directory_child(current, segment);
    }

    /**
     * Returns the child directory `segment` of `parent`, creating it if absent.
     * Throws NameCollision when a file of that name already sits there.
     */
    private directory_child(parent: ArchiveNode, segment: string): ArchiveNode {
        const sibling: ArchiveNode | null = parent.child_get(segment);
        if (sibling) {
            if (!sibling.directory_check()) {
                throw new NameCollision(`${segment} is a file, expected a directory`);
            }
            return sibling;
        }
        return parent.child_create(name_apply(segment, this.options.casing, 'directory'));
    }
}
