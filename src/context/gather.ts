/**
 * cattree pipeline:
 *
 * 1. Validate the root, --only targets, regexes and --max-lines (nothing written yet)
 * 2. Walk the tree, pruning with the path matcher (and .gitignore rules if enabled)
 * 3. Write the tree
 * 4. Render and write each surviving file, one at a time
 *
 * Output goes through a write callback so the CLI can stream it; generateCattree
 * collects it into a string instead.
 */

import { existsSync, statSync } from 'fs';
import { basename, join, resolve } from 'path';
import { createFilterRuleSet, normalizeOnlyTargets, type FilterRuleSet } from './filter.js';
import type { WarnFn } from './ignore.js';
import { walkTree, type SkippedEntry } from './walker.js';
import { renderTree } from './tree.js';
import { renderFile, unreadableFile, formatRenderedFile, type RenderedFile } from './reader.js';

export type WriteFn = (chunk: string) => void;
export type LogFn = (message: string) => void;

export interface CattreeOptions {
  /** Restrict output to these paths (relative to the root), keeping their ancestors */
  only?: string[];
  /** Honor .gitignore files found under the root */
  gitignore?: boolean;
  /** Regex a file path must match */
  include?: string;
  /** Regex that removes matching files and directories */
  exclude?: string;
  /** Truncate each file body to this many lines */
  maxLines?: number;
  /** Trim trailing whitespace and collapse blank-line runs */
  compact?: boolean;
  /** Print file bodies after the tree (default: true) */
  contents?: boolean;
  /** Replaces the default extension allowlist */
  extensions?: string[];
  /** Extra directory names to always skip */
  extraExcludeDirs?: string[];
  /** Timing and skip statistics through `log` */
  verbose?: boolean;
  /** Non-fatal problems; defaults to console.warn */
  warn?: WarnFn;
  /** Verbose diagnostics; defaults to console.error so stdout stays clean */
  log?: LogFn;
}

export interface CattreeSummary {
  /** The rendered tree, without trailing newline */
  tree: string;
  /** Files shown, in output order */
  files: string[];
  skipped: SkippedEntry[];
  truncatedFiles: number;
  timing: {
    walkMs: number;
    renderMs: number;
    totalMs: number;
  };
}

export interface CattreeResult extends CattreeSummary {
  output: string;
}

interface PreparedRun {
  root: string;
  rules: FilterRuleSet;
}

const defaultWarn: WarnFn = (message) => console.warn(`Warning: ${message}`);
const defaultLog: LogFn = (message) => console.error(message);

/**
 * Validate that the root exists and is a directory. Returns the absolute path.
 */
export function validateRoot(path: string): string {
  const abs = resolve(path);

  if (!existsSync(abs)) {
    throw new Error(`Path does not exist: ${path}\nResolved to: ${abs}`);
  }

  const stats = statSync(abs);
  if (!stats.isDirectory()) {
    throw new Error(`Path is not a directory: ${path}\nResolved to: ${abs}`);
  }

  return abs;
}

export function validateMaxLines(maxLines: number | undefined): void {
  if (maxLines === undefined) return;
  if (!Number.isInteger(maxLines) || maxLines < 0) {
    throw new Error(`--max-lines must be a non-negative integer, got: ${maxLines}`);
  }
}

function prepareRun(rootPath: string, options: CattreeOptions, warn: WarnFn): PreparedRun {
  const root = validateRoot(rootPath);
  validateMaxLines(options.maxLines);

  const only = normalizeOnlyTargets(root, options.only ?? []);
  for (const target of only) {
    if (!existsSync(join(root, target))) {
      warn(`--only target not found: ${target}`);
    }
  }

  const rules = createFilterRuleSet({
    only,
    include: options.include,
    exclude: options.exclude,
    gitignore: options.gitignore,
    extensions: options.extensions,
    extraExcludeDirs: options.extraExcludeDirs,
  });

  return { root, rules };
}

function rootLabelOf(root: string): string {
  return basename(root) || root;
}

function summarizeSkips(skipped: SkippedEntry[]): string {
  const counts = new Map<string, number>();
  for (const { reason } of skipped) {
    counts.set(reason, (counts.get(reason) ?? 0) + 1);
  }
  return Array.from(counts, ([reason, count]) => `${reason}: ${count}`).join(', ');
}

/**
 * Run the full pipeline, writing the tree and then each file block through `write`.
 * Throws (before writing anything) on invalid arguments.
 */
export function streamCattree(rootPath: string, options: CattreeOptions, write: WriteFn): CattreeSummary {
  const totalStart = Date.now();
  const { verbose = false, contents = true } = options;
  const warn = options.warn ?? defaultWarn;
  const log = options.log ?? defaultLog;

  const { root, rules } = prepareRun(rootPath, options, warn);

  // ── Walk ────────────────────────────────────────────────────────────────
  const walkStart = Date.now();
  const walk = walkTree(root, rules, { warn });
  const walkMs = Date.now() - walkStart;

  if (verbose) {
    log(`  Walked ${walk.directoriesVisited} directories in ${walkMs}ms`);
    if (walk.skipped.length > 0) {
      log(`  Skipped ${walk.skipped.length} entries (${summarizeSkips(walk.skipped)})`);
    }
  }

  // ── Tree ────────────────────────────────────────────────────────────────
  const tree = renderTree(walk.root, rootLabelOf(root));
  write(`${tree}\n`);

  // ── File bodies ─────────────────────────────────────────────────────────
  const renderStart = Date.now();
  let truncatedFiles = 0;

  if (contents) {
    for (const entry of walk.files) {
      let rendered: RenderedFile;
      try {
        rendered = renderFile(entry, { maxLines: options.maxLines, compact: options.compact });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        warn(`Cannot read file ${entry.relativePath}: ${reason}`);
        rendered = unreadableFile(entry, reason);
      }
      if (rendered.omittedLineCount > 0) truncatedFiles++;
      write(`\n${formatRenderedFile(rendered)}`);
    }
  }

  const renderMs = Date.now() - renderStart;
  const totalMs = Date.now() - totalStart;

  if (verbose) {
    log(`  Included ${walk.files.length} files${contents ? ` (${truncatedFiles} truncated)` : ''}`);
    log(`  Total time: ${totalMs}ms`);
  }

  return {
    tree,
    files: walk.files.map(f => f.relativePath),
    skipped: walk.skipped,
    truncatedFiles,
    timing: { walkMs, renderMs, totalMs },
  };
}

/**
 * Same as streamCattree, collecting the output into one string.
 */
export function generateCattree(rootPath: string, options: CattreeOptions = {}): CattreeResult {
  const chunks: string[] = [];
  const summary = streamCattree(rootPath, options, chunk => chunks.push(chunk));
  return { ...summary, output: chunks.join('') };
}
