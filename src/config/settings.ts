/**
 * @file Runtime Settings
 *
 * Resolves tool settings with central validation and deterministic
 * precedence (CLI override > env > config file > defaults).
 *
 * @module
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { GameVersion } from '../archive/types.js';
import { InvalidData, InvalidGameVersion } from '../archive/errors.js';

// ─── Schema ─────────────────────────────────────────────────────

const GameVersionSchema = z.preprocess(
    (raw: unknown): unknown => (typeof raw === 'string' ? raw.trim().toLowerCase() : raw),
    z.nativeEnum(GameVersion)
);

export const SettingsSchema = z.object({
    gameVersion: GameVersionSchema.default(GameVersion.GOTHIC2),
    nameCasing: z.enum(['archive', 'upper', 'preserve']).default('archive'),
    lookupScope: z.enum(['tree', 'path']).default('tree'),
    logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('error')
});

export type ResolvedSettings = z.infer<typeof SettingsSchema>;

export type SettingsKey = keyof ResolvedSettings;

/** Raw, unvalidated values from any one source. */
export type SettingsInput = Partial<Record<SettingsKey, unknown>>;

export type SettingSource = 'cli' | 'env' | 'file' | 'default';

/** Environment variable per setting. */
export const SETTINGS_ENV: Record<SettingsKey, string> = {
    gameVersion: 'VDFTREE_GAME_VERSION',
    nameCasing: 'VDFTREE_NAME_CASING',
    lookupScope: 'VDFTREE_LOOKUP_SCOPE',
    logLevel: 'VDFTREE_LOG_LEVEL'
};

/** Config file looked up in the working directory unless VDFTREE_CONFIG names one. */
export const CONFIG_FILENAME: string = '.vdftree.yml';

const SETTINGS_KEYS: readonly SettingsKey[] = ['gameVersion', 'nameCasing', 'lookupScope', 'logLevel'];

// ─── Parsing ────────────────────────────────────────────────────

/**
 * Parse a game version string (`g1`/`g2`, any case).
 *
 * @throws InvalidGameVersion for anything else.
 */
export function gameVersion_parse(raw: string): GameVersion {
    const parsed = GameVersionSchema.safeParse(raw);
    if (!parsed.success) {
        throw new InvalidGameVersion(`Invalid game version: ${raw}`);
    }
    return parsed.data;
}

// ─── Service ────────────────────────────────────────────────────

export interface SettingsContext {
    overrides?: SettingsInput;
    env?: Record<string, string | undefined>;
    cwd?: string;
}

/**
 * Holds the layered sources and answers both the effective settings and
 * where each value came from.
 */
export class SettingsService {
    private readonly layers: Record<Exclude<SettingSource, 'default'>, SettingsInput>;
    private readonly resolved: ResolvedSettings;

    constructor(context: SettingsContext = {}) {
        const env: Record<string, string | undefined> = context.env ?? process.env;
        const cwd: string = context.cwd ?? process.cwd();

        this.layers = {
            file: configFile_load(env.VDFTREE_CONFIG ?? path.join(cwd, CONFIG_FILENAME), env.VDFTREE_CONFIG !== undefined),
            env: envSettings_read(env),
            cli: definedEntries_pick(context.overrides ?? {})
        };
        this.resolved = settings_validate({ ...this.layers.file, ...this.layers.env, ...this.layers.cli });
    }

    /** Effective settings. */
    public snapshot(): ResolvedSettings {
        return { ...this.resolved };
    }

    /** Which layer supplied the effective value of `key`. */
    public source_get(key: SettingsKey): SettingSource {
        if (key in this.layers.cli) return 'cli';
        if (key in this.layers.env) return 'env';
        if (key in this.layers.file) return 'file';
        return 'default';
    }
}

/**
 * Resolve settings in one call.
 */
export function settings_resolve(context: SettingsContext = {}): ResolvedSettings {
    return new SettingsService(context).snapshot();
}

// ─── Internal Helpers ───────────────────────────────────────────

function settings_validate(input: SettingsInput): ResolvedSettings {
    const parsed = SettingsSchema.safeParse(input);
    if (parsed.success) return parsed.data;

    const issues: string[] = parsed.error.issues.map(
        (issue: z.ZodIssue): string => `${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
    if (parsed.error.issues.some((issue: z.ZodIssue): boolean => issue.path[0] === 'gameVersion')) {
        throw new InvalidGameVersion(`Invalid game version: ${String(input.gameVersion)}`);
    }
    throw new InvalidData(`Invalid settings: ${issues.join('; ')}`);
}

function envSettings_read(env: Record<string, string | undefined>): SettingsInput {
    const input: SettingsInput = {};
    for (const key of SETTINGS_KEYS) {
        const raw: string | undefined = env[SETTINGS_ENV[key]];
        if (raw !== undefined && raw !== '') {
            input[key] = raw;
        }
    }
    return input;
}

/**
 * Load the YAML config file. A missing default file yields no settings; a
 * missing explicitly named file is an error.
 */
function configFile_load(filePath: string, required: boolean): SettingsInput {
    if (!fs.existsSync(filePath)) {
        if (required) {
            throw new InvalidData(`Config file not found: ${filePath}`);
        }
        return {};
    }

    const document: unknown = yaml.load(fs.readFileSync(filePath, 'utf-8'));
    if (document === null || document === undefined) return {};
    if (typeof document !== 'object' || Array.isArray(document)) {
        throw new InvalidData(`Config file ${filePath} must hold a mapping`);
    }

    const input: SettingsInput = {};
    for (const [key, value] of Object.entries(document)) {
        if (!settingsKey_check(key)) {
            throw new InvalidData(`Unknown setting '${key}' in ${filePath}`);
        }
        input[key] = value;
    }
    return input;
}

function definedEntries_pick(input: SettingsInput): SettingsInput {
    const picked: SettingsInput = {};
    for (const key of SETTINGS_KEYS) {
        if (input[key] !== undefined) picked[key] = input[key];
    }
    return picked;
}

function settingsKey_check(key: string): key is SettingsKey {
    return SETTINGS_KEYS.some((candidate: SettingsKey): boolean => candidate === key);
}
