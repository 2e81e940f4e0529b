/**
 * Path Matcher - Decides, for one entry, whether the walker keeps it.
 *
 * Layers, highest precedence first:
 * 1. Hidden entries and noise directories (node_modules, __pycache__, ...) never appear
 * 2. --only targets restrict everything else while keeping their ancestor chain
 * 3. .gitignore rules (explicit --only targets and their ancestors are exempt)
 * 4. --exclude regex (files and dirs)
 * 5. --include regex (files only)
 * 6. Extension allowlist (only when neither --only nor --include is given)
 *
 * Binary sniffing needs I/O and lives in the walker.
 */

import { posix, relative, resolve, isAbsolute, sep } from 'path';
import { isIgnored, type IgnoreRule } from './ignore.js';

/** Extensions shown when no --only / --include overrides the allowlist */
export const DEFAULT_EXTENSIONS: ReadonlySet<string> = new Set([
    'py', 'md', 'txt', 'yml', 'yaml', 'json', 'toml', 'cpp', 'h', 'c',
]);

/** Dependency caches, bytecode caches and VCS metadata - never worth walking */
export const NOISE_DIRS: ReadonlySet<string> = new Set([
    'node_modules',
    '.git',
    '.svn',
    '.hg',
    '__pycache__',
    '.pytest_cache',
    '.mypy_cache',
    '.ruff_cache',
    '.tox',
    '.venv',
    'venv',
    '.npm',
    '.yarn',
    '.pnpm-store',
    '.cache',
    '.parcel-cache',
    '.turbo',
    'bower_components',
    'Pods',
    '.gradle',
    '.terraform',
]);

export type EntryKind = 'file' | 'dir';

export type SkipReason =
    | 'hidden'
    | 'noise'
    | 'only'
    | 'gitignore'
    | 'include'
    | 'exclude'
    | 'extension'
    | 'binary'
    | 'unreadable'
    | 'broken-symlink'
    | 'symlink-cycle';

export type MatchDecision = { include: true } | { include: false; reason: SkipReason };

export interface FilterRuleSet {
    readonly extensions: ReadonlySet<string>;
    /** Normalized POSIX paths relative to the root. Empty = no restriction. */
    readonly only: readonly string[];
    readonly include?: RegExp;
    readonly exclude?: RegExp;
    readonly gitignore: boolean;
    readonly noiseDirs: ReadonlySet<string>;
}

export interface FilterRuleSetInput {
    /** Replaces the default allowlist. Leading dots are optional ("py" or ".py"). */
    extensions?: Iterable<string>;
    /** Already normalized, see normalizeOnlyTargets */
    only?: readonly string[];
    include?: string;
    exclude?: string;
    gitignore?: boolean;
    /** Extra directory names to always skip */
    extraExcludeDirs?: readonly string[];
}

/**
 * Where an entry sits relative to the --only targets.
 * - unrestricted: no targets given
 * - listed: the path itself is a target
 * - ancestor: a directory on the way to a target
 * - inside: below a target directory
 * - outside: none of the above
 */
export type OnlyScope = 'unrestricted' | 'listed' | 'ancestor' | 'inside' | 'outside';

const INCLUDED: MatchDecision = { include: true };

function skip(reason: SkipReason): MatchDecision {
    return { include: false, reason };
}

function compileRegex(flag: string, source: string | undefined): RegExp | undefined {
    if (source === undefined || source === '') return undefined;
    try {
        return new RegExp(source);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid ${flag} pattern "${source}": ${reason}`);
    }
}

function normalizeExtension(ext: string): string {
    return ext.trim().replace(/^\.+/, '').toLowerCase();
}

/**
 * Build the immutable rule set once. Throws on invalid regex syntax.
 */
export function createFilterRuleSet(input: FilterRuleSetInput = {}): FilterRuleSet {
    const extensions = input.extensions
        ? new Set(Array.from(input.extensions, normalizeExtension).filter(e => e.length > 0))
        : DEFAULT_EXTENSIONS;

    const noiseDirs = input.extraExcludeDirs && input.extraExcludeDirs.length > 0
        ? new Set([...NOISE_DIRS, ...input.extraExcludeDirs])
        : NOISE_DIRS;

    return {
        extensions,
        only: [...(input.only ?? [])],
        include: compileRegex('--include', input.include),
        exclude: compileRegex('--exclude', input.exclude),
        gitignore: input.gitignore ?? false,
        noiseDirs,
    };
}

/** Convert an OS-specific relative path to the POSIX form the matcher works with */
export function toPosix(relPath: string): string {
    return sep === '/' ? relPath : relPath.split(sep).join('/');
}

/**
 * Resolve --only targets against the root and normalize them to POSIX relative paths.
 * A target that is the root itself lifts the restriction entirely.
 */
export function normalizeOnlyTargets(rootPath: string, targets: readonly string[]): string[] {
    const normalized: string[] = [];

    for (const target of targets) {
        const rel = toPosix(relative(rootPath, resolve(rootPath, target)));
        if (rel === '..' || rel.startsWith('../') || isAbsolute(rel)) {
            throw new Error(`--only path is outside the root directory: ${target}`);
        }
        if (rel === '') return [];
        if (!normalized.includes(rel)) normalized.push(rel);
    }

    return normalized;
}

export function classifyOnly(relPath: string, kind: EntryKind, only: readonly string[]): OnlyScope {
    if (only.length === 0) return 'unrestricted';
    if (only.includes(relPath)) return 'listed';
    if (kind === 'dir' && only.some(t => t.startsWith(`${relPath}/`))) return 'ancestor';
    if (only.some(t => relPath.startsWith(`${t}/`))) return 'inside';
    return 'outside';
}

function extensionOf(name: string): string {
    const dotIdx = name.lastIndexOf('.');
    return dotIdx <= 0 ? '' : name.slice(dotIdx + 1).toLowerCase();
}

/**
 * Decide whether to descend into a directory or include a file.
 * Pure: depends only on the arguments.
 */
export function matchEntry(
    relPath: string,
    kind: EntryKind,
    rules: FilterRuleSet,
    ignoreRules: readonly IgnoreRule[] = []
): MatchDecision {
    const name = posix.basename(relPath);

    if (name.startsWith('.')) return skip('hidden');
    if (kind === 'dir' && rules.noiseDirs.has(name)) return skip('noise');

    const scope = classifyOnly(relPath, kind, rules.only);
    if (scope === 'outside') return skip('only');

    const explicitlyTargeted = scope === 'listed' || scope === 'ancestor';
    if (rules.gitignore && !explicitlyTargeted && isIgnored(relPath, kind === 'dir', ignoreRules)) {
        return skip('gitignore');
    }

    if (rules.exclude && rules.exclude.test(relPath)) return skip('exclude');

    if (kind === 'dir') return INCLUDED;

    if (rules.include) {
        return rules.include.test(relPath) ? INCLUDED : skip('include');
    }

    if (scope === 'unrestricted' && !rules.extensions.has(extensionOf(name))) {
        return skip('extension');
    }

    return INCLUDED;
}
