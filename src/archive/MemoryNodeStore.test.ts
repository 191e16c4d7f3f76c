/**
 * @file MemoryNodeStore Unit Tests
 *
 * Covers child CRUD, global lookup order and trace logging.
 *
 * @module
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryNodeStore } from './MemoryNodeStore.js';
import { InvalidData, NodeNotFound } from './errors.js';
import type { ArchiveNode } from './types.js';
import { logger_create } from '../logging/Logger.js';

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

describe('MemoryNodeStore', () => {
    let store: MemoryNodeStore;
    let root: ArchiveNode;

    beforeEach(() => {
        store = new MemoryNodeStore();
        root = store.root_get();
    });

    it('starts with an empty, unnamed root directory', () => {
        expect(root.name).toBe('');
        expect(root.directory_check()).toBe(true);
        expect(root.children_list()).toEqual([]);
    });

    it('creates directories without data and files with data', () => {
        const dir: ArchiveNode = root.child_create('SCRIPTS');
        const file: ArchiveNode = dir.child_create('STARTUP.D', bytes('boot'));

        expect(dir.directory_check()).toBe(true);
        expect(dir.data).toBeNull();
        expect(file.directory_check()).toBe(false);
        expect(new TextDecoder().decode(file.data ?? new Uint8Array(0))).toBe('boot');
    });

    it('keeps children in creation order and returns a snapshot', () => {
        root.child_create('B');
        root.child_create('A');
        const listed: ArchiveNode[] = root.children_list();
        listed.pop();

        expect(root.children_list().map((n) => n.name)).toEqual(['B', 'A']);
    });

    it('looks children up case-insensitively', () => {
        const dir: ArchiveNode = root.child_create('SCRIPTS');
        expect(root.child_get('scripts')).toBe(dir);
        expect(root.child_get('missing')).toBeNull();
    });

    it('refuses to create under a file or with unsafe names', () => {
        const file: ArchiveNode = root.child_create('A.TXT', bytes('x'));
        expect(() => file.child_create('B')).toThrow(InvalidData);
        expect(() => root.child_create('a/b')).toThrow(InvalidData);
        expect(() => root.child_create('..')).toThrow(InvalidData);
        expect(() => root.child_create('')).toThrow(InvalidData);
    });

    it('removes the first case-insensitive match', () => {
        root.child_create('A.TXT', bytes('1'));
        root.child_create('A.TXT', bytes('2'));

        root.child_remove('a.txt');

        const rest: ArchiveNode[] = root.children_list();
        expect(rest).toHaveLength(1);
        expect(new TextDecoder().decode(rest[0].data ?? new Uint8Array(0))).toBe('2');
    });

    it('throws NodeNotFound when removing a missing child', () => {
        expect(() => root.child_remove('nothing')).toThrow(NodeNotFound);
    });

    it('finds nodes globally in pre-order, excluding the root', () => {
        const a: ArchiveNode = root.child_create('A');
        const nested: ArchiveNode = a.child_create('X');
        root.child_create('B').child_create('X');

        expect(store.node_find('x')).toBe(nested);
        expect(store.node_find('')).toBeNull();
        expect(store.node_find('missing')).toBeNull();
    });

    it('traces node creation and removal', () => {
        const lines: string[] = [];
        const traced: MemoryNodeStore = new MemoryNodeStore(
            logger_create({ level: 'trace', sink: (line: string): void => { lines.push(line); }, clock: () => new Date(0) })
        );

        traced.root_get().child_create('DATA').child_create('A.TXT', bytes(''));
        traced.root_get().child_remove('data');

        expect(lines).toEqual([
            '[1970-01-01T00:00:00.000Z - TRACE] [store] - Created directory DATA in <root>',
            '[1970-01-01T00:00:00.000Z - TRACE] [store] - Created file A.TXT in DATA',
            '[1970-01-01T00:00:00.000Z - TRACE] [store] - Removed data from <root>'
        ]);
    });
});
