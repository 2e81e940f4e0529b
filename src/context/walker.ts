/**
 * Tree Walker - Iterative depth-first walk that builds the surviving hierarchy.
 *
 * Order inside a directory: directories first, then files; each group by lower-cased
 * name, ties broken by the exact name. Excluded directories are pruned (never read).
 * Directories left without surviving descendants are dropped afterwards unless they are
 * an exact --only target.
 */

import { closeSync, openSync, readSync, readdirSync, realpathSync, statSync } from 'fs';
import { join, basename } from 'path';
import { matchEntry, type FilterRuleSet, type SkipReason } from './filter.js';
import { loadIgnoreRules, type IgnoreRule, type WarnFn } from './ignore.js';

export interface FileEntry {
    readonly absolutePath: string;
    /** POSIX path relative to the root; '' for the root itself */
    readonly relativePath: string;
    readonly name: string;
    readonly isDirectory: boolean;
    /** Root = 0 */
    readonly depth: number;
}

export interface TreeNode {
    readonly entry: FileEntry;
    readonly children: TreeNode[];
}

export interface SkippedEntry {
    path: string;
    reason: SkipReason;
}

export interface WalkOptions {
    /** Receives non-fatal problems (unreadable entries, broken links, cycles) */
    warn?: WarnFn;
}

export interface WalkResult {
    root: TreeNode;
    /** Surviving files in tree (pre-)order */
    files: FileEntry[];
    skipped: SkippedEntry[];
    directoriesVisited: number;
}

interface PendingDir {
    node: TreeNode;
    /** Real paths of this directory and all its ancestors */
    ancestry: ReadonlySet<string>;
    ignoreRules: readonly IgnoreRule[];
}

interface Candidate {
    name: string;
    absolutePath: string;
    relativePath: string;
    isDirectory: boolean;
}

const BINARY_SNIFF_BYTES = 8000;

const defaultWarn: WarnFn = (message) => console.warn(`Warning: ${message}`);

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function compareEntries(
    a: { name: string; isDirectory: boolean },
    b: { name: string; isDirectory: boolean }
): number {
    if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
    const la = a.name.toLowerCase();
    const lb = b.name.toLowerCase();
    if (la !== lb) return la < lb ? -1 : 1;
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
}

/**
 * Null byte in the first few KB = binary. The descriptor is closed on every path.
 */
export function isBinaryFile(absolutePath: string): boolean {
    const fd = openSync(absolutePath, 'r');
    try {
        const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
        const bytesRead = readSync(fd, buffer, 0, BINARY_SNIFF_BYTES, 0);
        return buffer.subarray(0, bytesRead).includes(0);
    } finally {
        closeSync(fd);
    }
}

function createNode(candidate: Candidate, depth: number): TreeNode {
    return {
        entry: {
            absolutePath: candidate.absolutePath,
            relativePath: candidate.relativePath,
            name: candidate.name,
            isDirectory: candidate.isDirectory,
            depth,
        },
        children: [],
    };
}

/**
 * Walk `rootPath` (an existing directory) and return the pruned hierarchy.
 */
export function walkTree(rootPath: string, rules: FilterRuleSet, options: WalkOptions = {}): WalkResult {
    const warn = options.warn ?? defaultWarn;
    const skipped: SkippedEntry[] = [];
    const visitOrder: TreeNode[] = [];

    const root: TreeNode = {
        entry: {
            absolutePath: rootPath,
            relativePath: '',
            name: basename(rootPath),
            isDirectory: true,
            depth: 0,
        },
        children: [],
    };

    const stack: PendingDir[] = [
        { node: root, ancestry: new Set([realpathSync(rootPath)]), ignoreRules: [] },
    ];

    for (let current = stack.pop(); current; current = stack.pop()) {
        const { node, ancestry } = current;
        const dir = node.entry;
        visitOrder.push(node);

        const ignoreRules = rules.gitignore
            ? [...current.ignoreRules, ...loadIgnoreRules(dir.absolutePath, dir.relativePath, warn)]
            : current.ignoreRules;

        let dirents;
        try {
            dirents = readdirSync(dir.absolutePath, { withFileTypes: true });
        } catch (error) {
            warn(`Cannot read directory ${dir.relativePath || '.'}: ${errorMessage(error)}`);
            skipped.push({ path: dir.relativePath, reason: 'unreadable' });
            continue;
        }

        const candidates: Candidate[] = [];
        for (const dirent of dirents) {
            const absolutePath = join(dir.absolutePath, dirent.name);
            const relativePath = dir.relativePath ? `${dir.relativePath}/${dirent.name}` : dirent.name;

            let isDirectory = dirent.isDirectory();
            if (dirent.isSymbolicLink()) {
                try {
                    isDirectory = statSync(absolutePath).isDirectory();
                } catch (error) {
                    warn(`Skipping broken symlink ${relativePath}: ${errorMessage(error)}`);
                    skipped.push({ path: relativePath, reason: 'broken-symlink' });
                    continue;
                }
            } else if (!isDirectory && !dirent.isFile()) {
                // sockets, FIFOs, devices
                continue;
            }

            candidates.push({ name: dirent.name, absolutePath, relativePath, isDirectory });
        }

        candidates.sort(compareEntries);

        const subdirs: PendingDir[] = [];
        for (const candidate of candidates) {
            const decision = matchEntry(
                candidate.relativePath,
                candidate.isDirectory ? 'dir' : 'file',
                rules,
                ignoreRules
            );
            if (!decision.include) {
                skipped.push({ path: candidate.relativePath, reason: decision.reason });
                continue;
            }

            if (candidate.isDirectory) {
                let realPath: string;
                try {
                    realPath = realpathSync(candidate.absolutePath);
                } catch (error) {
                    warn(`Cannot resolve directory ${candidate.relativePath}: ${errorMessage(error)}`);
                    skipped.push({ path: candidate.relativePath, reason: 'unreadable' });
                    continue;
                }
                if (ancestry.has(realPath)) {
                    warn(`Skipping symlink cycle at ${candidate.relativePath} -> ${realPath}`);
                    skipped.push({ path: candidate.relativePath, reason: 'symlink-cycle' });
                    continue;
                }

                const child = createNode(candidate, dir.depth + 1);
                node.children.push(child);
                subdirs.push({
                    node: child,
                    ancestry: new Set(ancestry).add(realPath),
                    ignoreRules,
                });
                continue;
            }

            let binary: boolean;
            try {
                binary = isBinaryFile(candidate.absolutePath);
            } catch (error) {
                warn(`Cannot read file ${candidate.relativePath}: ${errorMessage(error)}`);
                skipped.push({ path: candidate.relativePath, reason: 'unreadable' });
                continue;
            }
            if (binary) {
                skipped.push({ path: candidate.relativePath, reason: 'binary' });
                continue;
            }

            node.children.push(createNode(candidate, dir.depth + 1));
        }

        // Reverse so the first subdirectory is popped first (pre-order)
        for (let i = subdirs.length - 1; i >= 0; i--) {
            stack.push(subdirs[i]);
        }
    }

    pruneEmptyDirectories(visitOrder, rules.only);

    return {
        root,
        files: collectFiles(root),
        skipped,
        directoriesVisited: visitOrder.length,
    };
}

/**
 * Children are always visited after their parent, so walking the visit order backwards
 * settles every subdirectory before the directory that holds it.
 */
function pruneEmptyDirectories(visitOrder: readonly TreeNode[], only: readonly string[]): void {
    for (let i = visitOrder.length - 1; i >= 0; i--) {
        const node = visitOrder[i];
        const kept = node.children.filter(child =>
            !child.entry.isDirectory ||
            child.children.length > 0 ||
            only.includes(child.entry.relativePath)
        );
        node.children.splice(0, node.children.length, ...kept);
    }
}

/** Files of the tree in the order the tree printer shows them */
export function collectFiles(root: TreeNode): FileEntry[] {
    const files: FileEntry[] = [];
    const stack: TreeNode[] = [root];

    for (let node = stack.pop(); node; node = stack.pop()) {
        if (!node.entry.isDirectory) {
            files.push(node.entry);
            continue;
        }
        for (let i = node.children.length - 1; i >= 0; i--) {
            stack.push(node.children[i]);
        }
    }

    return files;
}
