/**
 * @file CLI Runner
 *
 * Validates the archive operand, resolves settings and logging, and runs
 * exactly one action against an `ArchiveHandler`.
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { ArchiveHandler } from '../handler/ArchiveHandler.js';
import { ArchiveNotLoaded, errorMessage_get } from '../archive/errors.js';
import { name_contains } from '../archive/names.js';
import { SettingsService, type ResolvedSettings, type SettingsInput } from '../config/settings.js';
import { logger_create, type Logger } from '../logging/Logger.js';
import { cliArgs_parse, USAGE, type CliAction, type CliOptions, type CliParseResult } from './args.js';

export interface CliIo {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
    cwd: string;
    env: Record<string, string | undefined>;
    /** Paint tree output, log lines and notices. */
    color: boolean;
}

/**
 * Streams and environment of the running process.
 */
export function cliIo_default(): CliIo {
    return {
        stdout: (text: string): void => {
            process.stdout.write(text + '\n');
        },
        stderr: (text: string): void => {
            process.stderr.write(text + '\n');
        },
        cwd: process.cwd(),
        env: process.env,
        color: chalk.level > 0
    };
}

/**
 * Run one `vdf-tree` invocation.
 *
 * @returns Exit code: 0 for completed runs (handled failures and aborts
 *   included), 1 for usage errors and uncaught errors.
 */
export function cli_run(args: string[], io: CliIo = cliIo_default()): number {
    const parsed: CliParseResult = cliArgs_parse(args);
    if (!parsed.ok) {
        if (parsed.exitCode === 0) {
            io.stdout(parsed.stderr);
        } else {
            io.stderr(parsed.stderr);
        }
        return parsed.exitCode;
    }
    const options: CliOptions = parsed.options;

    const archiveHostPath: string = path.resolve(io.cwd, options.archivePath);
    if (!options.archivePath.toLowerCase().endsWith('.vdf') || !fs.existsSync(archiveHostPath)) {
        io.stdout(notice_paint(io, `Aborting: ${options.archivePath} is not a valid VDF archive.`));
        return 0;
    }

    try {
        const settings: ResolvedSettings = new SettingsService({
            overrides: settingsOverrides_build(options),
            env: io.env,
            cwd: io.cwd
        }).snapshot();
        const logger: Logger = logger_create({ level: settings.logLevel, sink: io.stderr, color: io.color });
        const handler: ArchiveHandler = new ArchiveHandler({
            archivePath: options.archivePath,
            settings,
            logger,
            cwd: io.cwd
        });
        return action_run(handler, options, io);
    } catch (error: unknown) {
        if (error instanceof ArchiveNotLoaded) {
            io.stdout(notice_paint(io, `Aborting: ${error.message}`));
            return 0;
        }
        io.stderr(notice_paint(io, `vdf-tree: ${errorMessage_get(error)}`));
        return 1;
    }
}

// ─── Actions ────────────────────────────────────────────────────

function action_run(handler: ArchiveHandler, options: CliOptions, io: CliIo): number {
    const action: CliAction = options.action;
    switch (action.kind) {
        case 'none':
            io.stdout(USAGE);
            return 0;
        case 'view':
            io.stdout(handler.tree_print(io.color));
            return 0;
        case 'unpack':
            handler.tree_exportAll(options.outputPath);
            return 0;
        case 'extract':
            if (action.name.includes('*')) {
                handler.node_export(wildcard_strip(action.name), options.outputPath, true);
            } else {
                handler.node_export(action.name, options.outputPath);
            }
            return 0;
        case 'add':
            if (action.source.includes('*')) {
                const added: number | null = hostMatches_insert(handler, action.source, action.destination, io.cwd);
                if (added === null) {
                    const parent: string = action.source.slice(0, action.source.indexOf('*'));
                    io.stdout(notice_paint(io, `Aborting: ${parent} was not found.`));
                    return 0;
                }
            } else {
                handler.file_insert({
                    internalPath: action.destination,
                    sourcePath: path.resolve(io.cwd, action.source)
                });
            }
            handler.archive_save(options.outputPath);
            return 0;
        case 'remove':
            if (action.name.includes('*')) {
                handler.node_remove(wildcard_strip(action.name), { matchAll: true });
            } else {
                handler.node_remove(action.name);
            }
            handler.archive_save(options.outputPath);
            return 0;
    }
}

/**
 * Insert every entry of the host directory before the first `*` whose name
 * contains the rest of `source` (asterisks removed).
 *
 * @returns Number of entries inserted, or null when the directory is missing.
 */
function hostMatches_insert(
    handler: ArchiveHandler,
    source: string,
    destination: string,
    cwd: string
): number | null {
    const star: number = source.indexOf('*');
    const parent: string = source.slice(0, star);
    const filter: string = wildcard_strip(source.slice(star + 1));
    const directory: string = parent ? path.resolve(cwd, parent) : cwd;

    if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
        return null;
    }

    const names: string[] = fs.readdirSync(directory)
        .filter((name: string): boolean => name_contains(name, filter))
        .sort();
    for (const name of names) {
        handler.file_insert({ internalPath: destination, sourcePath: path.join(directory, name) });
    }
    return names.length;
}

// ─── Internal Helpers ───────────────────────────────────────────

function settingsOverrides_build(options: CliOptions): SettingsInput {
    const overrides: SettingsInput = {};
    if (options.gothic1) overrides.gameVersion = 'g1';
    if (options.fullDebug) {
        overrides.logLevel = 'trace';
    } else if (options.debug) {
        overrides.logLevel = 'debug';
    }
    return overrides;
}

function wildcard_strip(name: string): string {
    return name.split('*').join('');
}

function notice_paint(io: CliIo, text: string): string {
    return io.color ? chalk.red(text) : text;
}
