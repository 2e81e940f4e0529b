/**
 * Ignore-File Parser - .gitignore patterns compiled to minimatch globs.
 *
 * Supported syntax: comments, blank lines, `!` negation, `\#` / `\!` escapes,
 * trailing `/` (directories only), leading or inner `/` (anchored to the file's directory),
 * and the `*`, `?`, `**` wildcards. Later rules override earlier ones.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { minimatch } from 'minimatch';

export const IGNORE_FILE_NAME = '.gitignore';

export interface IgnoreRule {
    /** Source line as written in the ignore file */
    pattern: string;
    /** Glob evaluated against the path relative to `base` */
    glob: string;
    negated: boolean;
    directoryOnly: boolean;
    /** Directory of the declaring ignore file, relative to the root ('' = root) */
    base: string;
}

export type WarnFn = (message: string) => void;

const MATCH_OPTIONS = { dot: true, nocomment: true, nonegate: true } as const;

/**
 * Parse the text of one ignore file. Rules come back in file order.
 */
export function parseIgnorePatterns(content: string, base: string = ''): IgnoreRule[] {
    const rules: IgnoreRule[] = [];

    for (const raw of content.split(/\r?\n/)) {
        let line = raw.trimEnd();
        if (!line || line.startsWith('#')) continue;

        const source = line;
        let negated = false;
        if (line.startsWith('!')) {
            negated = true;
            line = line.slice(1);
        } else if (line.startsWith('\\#') || line.startsWith('\\!')) {
            line = line.slice(1);
        }

        let directoryOnly = false;
        if (line.endsWith('/')) {
            directoryOnly = true;
            line = line.replace(/\/+$/, '');
        }

        const anchored = line.includes('/');
        line = line.replace(/^\/+/, '');
        if (!line) continue;

        rules.push({
            pattern: source,
            glob: anchored ? line : `**/${line}`,
            negated,
            directoryOnly,
            base,
        });
    }

    return rules;
}

/**
 * Read the ignore file of one directory. Missing file = no rules; unreadable file warns.
 */
export function loadIgnoreRules(absDir: string, relDir: string, warn: WarnFn): IgnoreRule[] {
    const filePath = join(absDir, IGNORE_FILE_NAME);
    if (!existsSync(filePath)) return [];

    try {
        return parseIgnorePatterns(readFileSync(filePath, 'utf-8'), relDir);
    } catch (error) {
        const label = relDir ? `${relDir}/${IGNORE_FILE_NAME}` : IGNORE_FILE_NAME;
        warn(`Cannot read ${label}: ${error instanceof Error ? error.message : String(error)}`);
        return [];
    }
}

function relativeToBase(relPath: string, base: string): string | undefined {
    if (base === '') return relPath;
    if (relPath.startsWith(`${base}/`)) return relPath.slice(base.length + 1);
    return undefined;
}

/**
 * Evaluate rules in order; the last matching rule decides.
 */
export function isIgnored(relPath: string, isDirectory: boolean, rules: readonly IgnoreRule[]): boolean {
    let ignored = false;

    for (const rule of rules) {
        if (rule.directoryOnly && !isDirectory) continue;
        const local = relativeToBase(relPath, rule.base);
        if (local === undefined) continue;
        if (minimatch(local, rule.glob, MATCH_OPTIONS)) ignored = !rule.negated;
    }

    return ignored;
}
