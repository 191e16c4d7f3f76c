/**
 * @file CLI Runner Tests
 *
 * Runs whole invocations against archives in a temporary directory with
 * captured output streams.
 *
 * @module
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { cli_run, type CliIo } from './run.js';
import { USAGE } from './args.js';
import { ArchiveHandler } from '../handler/ArchiveHandler.js';
import { ArchiveTree } from '../archive/ArchiveTree.js';
import { GameVersion } from '../archive/types.js';

describe('cli_run', () => {
    let tempDir: string;
    let out: string[];
    let err: string[];
    let io: CliIo;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vdf-tree-'));
        out = [];
        err = [];
        io = {
            stdout: (text: string): void => { out.push(text); },
            stderr: (text: string): void => { err.push(text); },
            cwd: tempDir,
            env: {},
            color: false
        };

        const src: string = path.join(tempDir, 'src');
        fs.mkdirSync(path.join(src, 'sub'), { recursive: true });
        fs.writeFileSync(path.join(src, 'x.txt'), 'ex');
        fs.writeFileSync(path.join(src, 'sub', 'y.txt'), 'why');
        const builder: ArchiveHandler = new ArchiveHandler({ cwd: tempDir });
        builder.file_insert({ sourcePath: src });
        builder.archive_save(path.join(tempDir, 'Mod.vdf'));
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    const reopen = (name: string): ArchiveHandler => new ArchiveHandler({ archivePath: name, cwd: tempDir });

    describe('usage', () => {
        it('prints help to stdout', () => {
            expect(cli_run(['--help'], io)).toBe(0);
            expect(out).toEqual([USAGE]);
        });

        it('prints usage when no action is given', () => {
            expect(cli_run(['Mod.vdf'], io)).toBe(0);
            expect(out).toEqual([USAGE]);
        });

        it('exits 1 on a usage error', () => {
            expect(cli_run(['Mod.vdf', '-u', '-v'], io)).toBe(1);
            expect(err[0].split('\n')[0]).toBe('vdf-tree: only one of -u, -e, -a, -r, -v may be given');
        });

        it('aborts on anything but an existing .vdf archive', () => {
            expect(cli_run(['Mod.zip', '-v'], io)).toBe(0);
            expect(cli_run(['Missing.vdf', '-v'], io)).toBe(0);
            expect(out).toEqual([
                'Aborting: Mod.zip is not a valid VDF archive.',
                'Aborting: Missing.vdf is not a valid VDF archive.'
            ]);
        });

        it('exits 1 on invalid settings', () => {
            io.env = { VDFTREE_GAME_VERSION: 'g9' };
            expect(cli_run(['Mod.vdf', '-v'], io)).toBe(1);
            expect(err).toEqual(['vdf-tree: Invalid game version: g9']);
        });
    });

    describe('read actions', () => {
        it('views the tree', () => {
            expect(cli_run(['Mod.vdf', '-v'], io)).toBe(0);
            expect(out).toEqual([['└── [Src]', '    ├── [Sub]', '    │   └── Y.Txt', '    └── X.Txt'].join('\n')]);
            expect(err).toEqual([]);
        });

        it('unpacks everything into the output path', () => {
            expect(cli_run(['Mod.vdf', '-u', '-o', 'out'], io)).toBe(0);
            expect(fs.readFileSync(path.join(tempDir, 'out', 'src', 'sub', 'y.txt'), 'utf-8')).toBe('why');
        });

        it('extracts by wildcard into a flat directory', () => {
            expect(cli_run(['Mod.vdf', '-e', '*.txt', '-o', 'flat'], io)).toBe(0);
            expect(fs.readdirSync(path.join(tempDir, 'flat')).sort()).toEqual(['x.txt', 'y.txt']);
        });

        it('exits 1 when an exact name is missing', () => {
            expect(cli_run(['Mod.vdf', '-e', 'missing.d'], io)).toBe(1);
            expect(err).toEqual(['vdf-tree: missing.d not found']);
        });
    });

    describe('mutating actions', () => {
        it('adds a host file and saves in place', () => {
            fs.writeFileSync(path.join(tempDir, 'extra.txt'), 'more');

            expect(cli_run(['Mod.vdf', '-a', 'extra.txt', 'data'], io)).toBe(0);

            const extra = reopen('Mod.vdf').root_get().child_get('DATA')?.child_get('EXTRA.TXT');
            expect(Buffer.from(extra?.data ?? new Uint8Array(0)).toString()).toBe('more');
        });

        it('adds matching host entries to another archive', () => {
            const more: string = path.join(tempDir, 'more');
            fs.mkdirSync(more);
            for (const name of ['a1.txt', 'a2.txt', 'b.txt']) {
                fs.writeFileSync(path.join(more, name), name);
            }

            expect(cli_run(['Mod.vdf', '-a', 'more/*a', '.', '-o', 'New.vdf'], io)).toBe(0);

            expect(reopen('New.vdf').root_get().children_list().map((n) => n.name)).toEqual(['src', 'A1.TXT', 'A2.TXT']);
            expect(reopen('Mod.vdf').fileCount_get()).toBe(2);
        });

        it('aborts when the wildcard directory is missing', () => {
            expect(cli_run(['Mod.vdf', '-a', 'nope/*.txt', '.'], io)).toBe(0);
            expect(out).toEqual(['Aborting: nope/ was not found.']);
        });

        it('removes by wildcard and saves', () => {
            expect(cli_run(['Mod.vdf', '-r', '*x*'], io)).toBe(0);

            const handler: ArchiveHandler = reopen('Mod.vdf');
            expect(handler.fileCount_get()).toBe(1);
            expect(handler.node_get('x.txt')).toBeNull();
        });

        it('removes by name and saves in the Gothic 1 format', () => {
            expect(cli_run(['Mod.vdf', '-r', 'sub', '-g1'], io)).toBe(0);

            expect(reopen('Mod.vdf').fileCount_get()).toBe(1);
            expect(new ArchiveTree().archive_mount(path.join(tempDir, 'Mod.vdf'))).toBe(GameVersion.GOTHIC1);
        });
    });

    describe('logging', () => {
        it('writes debug lines with -d', () => {
            cli_run(['Mod.vdf', '-v', '-d'], io);

            expect(err.some((line) => line.includes('- DEBUG] [handler] - Mounted '))).toBe(true);
            expect(err.some((line) => line.endsWith('- INFO] [handler] - Printing tree of Mod.vdf'))).toBe(true);
            expect(err.some((line) => line.includes('[store]'))).toBe(false);
        });

        it('writes store internals with -f', () => {
            cli_run(['Mod.vdf', '-v', '-f'], io);
            expect(err.some((line) => line.endsWith('- TRACE] [store] - Created directory src in <root>'))).toBe(true);
        });
    });
});
