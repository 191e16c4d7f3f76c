/**
 * @file TreePrinter
 *
 * Renders an archive subtree as an indented box-drawing listing.
 * Directories sort before files, then by name; names are title-cased
 * for display only.
 *
 * @module
 */

import chalk from 'chalk';
import type { ArchiveNode } from '../archive/types.js';
import { name_titleCase } from '../archive/names.js';
import { tree_walk, type WalkEntry } from './walk.js';

export interface TreeRenderOptions {
    /** Directories yellow, files green. */
    colorize?: boolean;
}

/**
 * Directories first, then codepoint order of the stored name.
 */
export function node_compare(a: ArchiveNode, b: ArchiveNode): number {
    const aDir: boolean = a.directory_check();
    const bDir: boolean = b.directory_check();
    if (aDir !== bDir) return aDir ? -1 : 1;
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
}

/**
 * Render the descendants of `node`, one line per node.
 *
 * @example
 * ```
 * ├── [Scripts]
 * │   └── Startup.D
 * └── Readme.Txt
 * ```
 */
export function tree_render(node: ArchiveNode, options: TreeRenderOptions = {}): string {
    const lines: string[] = [];
    // Prefix owed to each depth: '│   ' while the ancestor at that depth has later siblings.
    const guides: string[] = [];

    tree_walk(node, (entry: WalkEntry): void => {
        const connector: string = entry.last ? '└── ' : '├── ';
        const prefix: string = guides.slice(0, entry.depth).join('');
        const isDirectory: boolean = entry.node.directory_check();

        const title: string = name_titleCase(entry.node.name);
        const display: string = isDirectory ? `[${title}]` : title;
        const painted: string = options.colorize
            ? (isDirectory ? chalk.yellow(display) : chalk.green(display))
            : display;

        lines.push(`${prefix}${connector}${painted}`);
        guides[entry.depth] = entry.last ? '    ' : '│   ';
    }, node_compare);

    return lines.join('\n');
}
