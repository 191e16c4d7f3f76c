import { describe, it, expect, beforeEach } from 'vitest';
import { Remover } from './Remover.js';
import { MemoryNodeStore } from '../archive/MemoryNodeStore.js';
import { NodeNotFound } from '../archive/errors.js';
import type { ArchiveNode } from '../archive/types.js';

const data: Uint8Array = new Uint8Array([7]);
const names = (node: ArchiveNode | null | undefined): string[] =>
    (node?.children_list() ?? []).map((n) => n.name);

describe('Remover', () => {
    let store: MemoryNodeStore;
    let root: ArchiveNode;
    let remover: Remover;

    beforeEach(() => {
        store = new MemoryNodeStore();
        root = store.root_get();
        remover = new Remover(store);
    });

    it('removes files containing the wildcard filter', () => {
        root.child_create('a1.txt', data);
        root.child_create('a2.txt', data);
        root.child_create('b.txt', data);

        expect(remover.node_remove('a', { matchAll: true })).toBe(2);
        expect(names(root)).toEqual(['b.txt']);
    });

    it('never removes directories by substring', () => {
        const dir: ArchiveNode = root.child_create('ALPHA');
        dir.child_create('ALPHA.D', data);
        dir.child_create('BETA.D', data);

        expect(remover.node_remove('alpha', { matchAll: true })).toBe(1);
        expect(names(root)).toEqual(['ALPHA']);
        expect(names(dir)).toEqual(['BETA.D']);
    });

    it('removes every disjoint exact match in one call', () => {
        root.child_create('ONE').child_create('DUP.D', data);
        const two: ArchiveNode = root.child_create('TWO');
        two.child_create('DUP.D', data);
        two.child_create('KEEP.D', data);

        expect(remover.node_remove('dup.d')).toBe(2);
        expect(names(root.child_get('ONE'))).toEqual([]);
        expect(names(two)).toEqual(['KEEP.D']);
    });

    it('removes a matching directory without searching inside it', () => {
        const scripts: ArchiveNode = root.child_create('SCRIPTS');
        scripts.child_create('SCRIPTS').child_create('A.D', data);
        root.child_create('OTHER').child_create('SCRIPTS');

        expect(remover.node_remove('scripts')).toBe(2);
        expect(names(root)).toEqual(['OTHER']);
        expect(names(root.child_get('OTHER'))).toEqual([]);
    });

    it('throws NodeNotFound in exact mode when nothing has the name', () => {
        root.child_create('A.D', data);
        expect(() => remover.node_remove('b.d')).toThrow(NodeNotFound);
        expect(names(root)).toEqual(['A.D']);
    });

    it('removes nothing and does not throw for an unmatched wildcard', () => {
        root.child_create('A.D', data);
        expect(remover.node_remove('zzz', { matchAll: true })).toBe(0);
    });

    it('only searches below the start directory', () => {
        root.child_create('X.D', data);
        const sub: ArchiveNode = root.child_create('SUB');
        sub.child_create('X.D', data);

        expect(remover.node_remove('x.d', { start: sub })).toBe(1);
        expect(names(root)).toEqual(['X.D', 'SUB']);
        expect(names(sub)).toEqual([]);
    });
});
