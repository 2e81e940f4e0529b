/**
 * Config File Support
 *
 * A JSON file (passed with --config-path) holding defaults for any CLI option:
 * - Selection (only, gitignore, include, exclude, extensions, excludeDirs)
 * - Rendering (maxLines, compact, contents)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';

export interface CliConfig {
    // Selection
    only?: string[];
    gitignore?: boolean;
    include?: string;
    exclude?: string;
    extensions?: string[];
    excludeDirs?: string[];

    // Rendering
    maxLines?: number;
    compact?: boolean;
    contents?: boolean;

    // Misc
    verbose?: boolean;
}

export type ConfigWarnFn = (message: string) => void;

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    // Selection
    'only', 'gitignore', 'include', 'exclude', 'extensions', 'excludeDirs',
    // Rendering
    'maxLines', 'compact', 'contents',
    // Misc
    'verbose',
]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new Error(`Config "${key}" must be a string`);
    return val;
}

function assertNumber(obj: Record<string, unknown>, key: string): number {
    const val = obj[key];
    if (typeof val !== 'number') throw new Error(`Config "${key}" must be a number`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) {
        throw new Error(`Config "${key}" must be an array of strings`);
    }
    const strings: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new Error(`Config "${key}" must be an array of strings`);
        strings.push(item);
    }
    return strings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a config file.
 *
 * - Resolves configPath relative to CWD
 * - `only` entries stay relative to the walked root, not to the config file
 * - Throws on missing file, invalid JSON or wrongly typed values
 */
export function loadConfig(
    configPath: string,
    warn: ConfigWarnFn = (message) => console.warn(message)
): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};

    // Selection
    if (obj.only !== undefined) config.only = assertStringArray(obj, 'only');
    if (obj.gitignore !== undefined) config.gitignore = assertBoolean(obj, 'gitignore');
    if (obj.include !== undefined) config.include = assertString(obj, 'include');
    if (obj.exclude !== undefined) config.exclude = assertString(obj, 'exclude');
    if (obj.extensions !== undefined) config.extensions = assertStringArray(obj, 'extensions');
    if (obj.excludeDirs !== undefined) config.excludeDirs = assertStringArray(obj, 'excludeDirs');

    // Rendering
    if (obj.maxLines !== undefined) config.maxLines = assertNumber(obj, 'maxLines');
    if (obj.compact !== undefined) config.compact = assertBoolean(obj, 'compact');
    if (obj.contents !== undefined) config.contents = assertBoolean(obj, 'contents');

    // Misc
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}
