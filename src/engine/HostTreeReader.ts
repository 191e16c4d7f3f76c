/**
 * @file HostTreeReader
 *
 * Describes the structure of a host directory as nested entries, ready to be
 * merged into the archive tree. Reads only.
 *
 * @module
 */

import fs, { type Stats } from 'fs';
import path from 'path';
import type { HostTreeDescription, HostTreeEntry } from '../archive/types.js';
import { InvalidData } from '../archive/errors.js';

/**
 * Build the description of `hostDirectory`, keyed by its own name.
 * Entries of every directory are sorted by name (codepoint order).
 * Symbolic links to files are read as files; links to directories and
 * dangling links are skipped, so a link cycle cannot be followed.
 *
 * @param hostDirectory - Directory on the host filesystem.
 * @returns Nested structure of directories and file references.
 */
export function hostTree_read(hostDirectory: string): HostTreeDescription {
    const rootPath: string = path.resolve(hostDirectory);
    if (!fs.statSync(rootPath).isDirectory()) {
        throw new InvalidData(`${hostDirectory} is not a directory`);
    }

    const top: HostTreeDescription = { kind: 'directory', name: path.basename(rootPath), path: rootPath, entries: [] };
    const pending: HostTreeDescription[] = [top];

    while (pending.length > 0) {
        const current: HostTreeDescription | undefined = pending.pop();
        if (!current) break;

        const names: string[] = fs.readdirSync(current.path).sort(name_compare);
        for (const name of names) {
            const entryPath: string = path.join(current.path, name);
            const stats: Stats | undefined = entry_stat(entryPath);
            if (!stats) continue;
            let entry: HostTreeEntry;
            if (stats.isDirectory()) {
                const nested: HostTreeDescription = { kind: 'directory', name, path: entryPath, entries: [] };
                pending.push(nested);
                entry = nested;
            } else {
                entry = { kind: 'file', name, path: entryPath };
            }
            current.entries.push(entry);
        }
    }

    return top;
}

/**
 * Count file references in a description.
 */
export function hostTreeFiles_count(description: HostTreeDescription): number {
    let count: number = 0;
    const pending: HostTreeDescription[] = [description];
    while (pending.length > 0) {
        const current: HostTreeDescription | undefined = pending.pop();
        if (!current) break;
        for (const entry of current.entries) {
            if (entry.kind === 'file') count += 1;
            else pending.push(entry);
        }
    }
    return count;
}

/**
 * Stats of a host entry, or undefined for a link to a directory or nowhere.
 */
function entry_stat(entryPath: string): Stats | undefined {
    const stats: Stats = fs.lstatSync(entryPath);
    if (!stats.isSymbolicLink()) return stats;
    const target: Stats | undefined = fs.statSync(entryPath, { throwIfNoEntry: false });
    return target && !target.isDirectory() ? target : undefined;
}

function name_compare(a: string, b: string): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
}
