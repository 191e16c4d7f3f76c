/**
 * @file ZipCodec — Archive Container Codec
 *
 * Stores an archive tree as an uncompressed ZIP container through fflate.
 * The first entry carries the game version signature, the way the native
 * format opens with its header; it never appears in the mounted tree.
 *
 * @module
 */

import { strFromU8, strToU8, unzipSync, zipSync, type Unzipped, type Zippable } from 'fflate';
import type { ArchiveCodec, ArchiveNode } from './types.js';
import { GameVersion } from './types.js';
import { InvalidData, errorMessage_get } from './errors.js';
import { SIGNATURE_NAME } from './names.js';
import { tree_walk, type WalkEntry } from '../engine/walk.js';
import { logger_null, type Logger } from '../logging/Logger.js';

/** Reserved entry holding the version signature; no node may take its name. */
export const SIGNATURE_ENTRY: string = SIGNATURE_NAME;

/** Header signatures per format generation. */
export const SIGNATURES: Record<GameVersion, string> = {
    [GameVersion.GOTHIC1]: 'PSVDSC_V2.00\r\n\r\n',
    [GameVersion.GOTHIC2]: 'PSVDSC_V2.00\n\r\n\r'
};

const COMPONENT: string = 'codec';

export class ZipCodec implements ArchiveCodec {
    constructor(private readonly logger: Logger = logger_null()) {}

    public archive_encode(root: ArchiveNode, version: GameVersion): Uint8Array {
        const top: Zippable = { [SIGNATURE_ENTRY]: strToU8(SIGNATURES[version]) };
        const containers: Map<ArchiveNode, Zippable> = new Map([[root, top]]);

        tree_walk(root, (entry: WalkEntry): void => {
            const container: Zippable | undefined = containers.get(entry.parent);
            if (!container) {
                throw new InvalidData(`Unreachable parent for ${entry.segments.join('/')}`);
            }
            if (entry.node.directory_check()) {
                const dir: Zippable = {};
                container[entry.node.name] = dir;
                containers.set(entry.node, dir);
            } else {
                container[entry.node.name] = entry.node.data ?? new Uint8Array(0);
            }
        });

        this.logger.trace(COMPONENT, `Encoding ${containers.size - 1} directories as ${version}`);
        return zipSync(top, { level: 0 });
    }

    public archive_decode(bytes: Uint8Array, root: ArchiveNode): GameVersion | null {
        let entries: Unzipped;
        try {
            entries = unzipSync(bytes);
        } catch (error: unknown) {
            throw new InvalidData(`Not a readable archive container: ${errorMessage_get(error)}`);
        }

        let version: GameVersion | null = null;
        for (const [entryPath, data] of Object.entries(entries)) {
            if (entryPath === SIGNATURE_ENTRY) {
                version = signature_match(strFromU8(data));
                continue;
            }
            entry_mount(root, entryPath, data);
            this.logger.trace(COMPONENT, `Mounted entry ${entryPath}`);
        }
        return version;
    }
}

/**
 * Map a signature string back to its version, or null if unknown.
 */
export function signature_match(signature: string): GameVersion | null {
    for (const version of Object.values(GameVersion)) {
        if (SIGNATURES[version] === signature) return version;
    }
    return null;
}

/**
 * Place one container entry in the tree. Entries ending in `/` are
 * directories; intermediate directories are reused or created.
 */
function entry_mount(root: ArchiveNode, entryPath: string, data: Uint8Array): void {
    const isDirectory: boolean = entryPath.endsWith('/');
    const segments: string[] = entryPath.split('/').filter(Boolean);
    if (segments.length === 0) return;

    const dirSegments: string[] = isDirectory ? segments : segments.slice(0, -1);
    let current: ArchiveNode = root;
    for (const seg of dirSegments) {
        const existing: ArchiveNode | null = current.child_get(seg);
        if (existing && !existing.directory_check()) {
            throw new InvalidData(`Entry ${entryPath} nests inside file ${seg}`);
        }
        current = existing ?? current.child_create(seg);
    }

    if (!isDirectory) {
        const name: string = segments[segments.length - 1];
        if (current.child_get(name)?.directory_check()) {
            throw new InvalidData(`Entry ${entryPath} collides with a directory`);
        }
        current.child_create(name, data);
    }
}
