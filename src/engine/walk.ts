/**
 * @file Tree Walker
 *
 * Pre-order traversal over an archive subtree driven by an explicit
 * work-list, so depth never grows the call stack. Every recursive tree
 * algorithm in the engine is built on `tree_walk`.
 *
 * @module
 */

import type { ArchiveNode } from '../archive/types.js';

/**
 * One visited node.
 *
 * @property node - The visited node.
 * @property parent - Directory holding `node`.
 * @property segments - Names from the walk's start (exclusive) down to `node`.
 * @property depth - 0 for direct children of the start node.
 * @property last - Whether `node` is the last of its siblings in walk order.
 */
export interface WalkEntry {
    node: ArchiveNode;
    parent: ArchiveNode;
    segments: string[];
    depth: number;
    last: boolean;
}

/**
 * `descend` expands a directory's children; `prune` skips them.
 * Ignored for files.
 */
export type WalkAction = 'descend' | 'prune';

export type WalkVisitor = (entry: WalkEntry) => WalkAction | void;

/**
 * Visit every descendant of `start` in pre-order (children in creation order).
 *
 * Children are snapshotted when their directory is expanded, after the
 * visitor returns, so a visitor may remove the node it was handed (and
 * return `prune`) or remove siblings without disturbing the walk.
 *
 * @param start - Directory whose descendants are visited; not visited itself.
 * @param visitor - Called once per node.
 * @param order - Optional comparator applied to each directory's children.
 */
export function tree_walk(
    start: ArchiveNode,
    visitor: WalkVisitor,
    order?: (a: ArchiveNode, b: ArchiveNode) => number
): void {
    const stack: WalkEntry[] = children_entries(start, [], 0, order).reverse();

    while (stack.length > 0) {
        const entry: WalkEntry | undefined = stack.pop();
        if (!entry) break;

        const action: WalkAction | void = visitor(entry);
        if (entry.node.directory_check() && action !== 'prune') {
            stack.push(...children_entries(entry.node, entry.segments, entry.depth + 1, order).reverse());
        }
    }
}

/**
 * Count file (non-directory) nodes below `start`.
 */
export function files_count(start: ArchiveNode): number {
    let count: number = 0;
    tree_walk(start, (entry: WalkEntry): void => {
        if (!entry.node.directory_check()) count += 1;
    });
    return count;
}

function children_entries(
    parent: ArchiveNode,
    segments: string[],
    depth: number,
    order?: (a: ArchiveNode, b: ArchiveNode) => number
): WalkEntry[] {
    const children: ArchiveNode[] = parent.children_list();
    if (order) children.sort(order);
    return children.map((node: ArchiveNode, index: number): WalkEntry => ({
        node,
        parent,
        segments: [...segments, node.name],
        depth,
        last: index === children.length - 1
    }));
}
