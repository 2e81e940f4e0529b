/**
 * cattree CLI
 *
 * Print a directory tree followed by the contents of the selected files.
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { streamCattree, type CattreeOptions } from './context/index.js';
import { loadConfig } from './config/config.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

/** Raw option values as commander hands them over */
export interface CliOptions {
    only: string[];
    gitignore?: boolean;
    include?: string;
    exclude?: string;
    maxLines?: string;
    compact?: boolean;
    extensions?: string;
    excludeDir: string[];
    contents: boolean;
    configPath?: string;
    verbose?: boolean;
}

export interface CliIO {
    /** Tree and file contents */
    stdout: (chunk: string) => void;
    /** One diagnostic line (warnings, errors, verbose output) */
    stderr: (line: string) => void;
    exit: (code: number) => void;
}

const defaultIO: CliIO = {
    stdout: (chunk) => {
        process.stdout.write(chunk);
    },
    stderr: (line) => console.error(line),
    exit: (code) => {
        process.exitCode = code;
    },
};

function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

export function parseMaxLines(value: string): number {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        throw new Error(`--max-lines must be a non-negative integer, got: ${value}`);
    }
    return parseInt(trimmed, 10);
}

export function parseList(value: string): string[] {
    return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

/**
 * Turn commander options (plus the optional config file) into pipeline options.
 * Priority: CLI flags > config file > hardcoded defaults.
 */
export function resolveCattreeOptions(options: CliOptions, command: Command, io: CliIO): CattreeOptions {
    const resolved: CattreeOptions = {
        only: options.only,
        gitignore: options.gitignore ?? false,
        include: options.include,
        exclude: options.exclude,
        maxLines: options.maxLines === undefined ? undefined : parseMaxLines(options.maxLines),
        compact: options.compact ?? false,
        contents: options.contents,
        extensions: options.extensions === undefined ? undefined : parseList(options.extensions),
        extraExcludeDirs: options.excludeDir,
        verbose: options.verbose ?? false,
    };

    if (!options.configPath) return resolved;

    const config = loadConfig(options.configPath, io.stderr);

    // Use CLI value if explicitly set, otherwise config value
    const src = (name: string) => command.getOptionValueSource(name);

    // Selection
    if (config.only !== undefined && src('only') !== 'cli') resolved.only = config.only;
    if (config.gitignore !== undefined && src('gitignore') !== 'cli') resolved.gitignore = config.gitignore;
    if (config.include !== undefined && src('include') !== 'cli') resolved.include = config.include;
    if (config.exclude !== undefined && src('exclude') !== 'cli') resolved.exclude = config.exclude;
    if (config.extensions !== undefined && src('extensions') !== 'cli') resolved.extensions = config.extensions;
    if (config.excludeDirs !== undefined && src('excludeDir') !== 'cli') resolved.extraExcludeDirs = config.excludeDirs;

    // Rendering
    if (config.maxLines !== undefined && src('maxLines') !== 'cli') resolved.maxLines = config.maxLines;
    if (config.compact !== undefined && src('compact') !== 'cli') resolved.compact = config.compact;
    if (config.contents !== undefined && src('contents') !== 'cli') resolved.contents = config.contents;

    // Misc
    if (config.verbose !== undefined && src('verbose') !== 'cli') resolved.verbose = config.verbose;

    if (resolved.verbose) {
        io.stderr(`Config loaded from: ${options.configPath}`);
    }

    return resolved;
}

export function createProgram(io: CliIO = defaultIO): Command {
    const program = new Command();

    program
        .name('cattree')
        .description('Print a directory tree and the contents of its files, filtered for sharing as context')
        .version(pkg.version)
        .argument('<path>', 'Root directory to walk')
        .option('-o, --only <path>', 'Restrict to this file or directory, keeping its ancestors (can be used multiple times)', collect, [] as string[])
        .option('-g, --gitignore', 'Honor .gitignore files found under the root')
        .option('-i, --include <regex>', 'Only include files whose path matches')
        .option('-e, --exclude <regex>', 'Exclude files and directories whose path matches')
        .option('-m, --max-lines <n>', 'Truncate each shown file to n lines')
        .option('-c, --compact', 'Strip trailing whitespace and extra blank lines')
        .option('-x, --extensions <list>', 'Comma-separated extension allowlist (default: py,md,txt,yml,yaml,json,toml,cpp,h,c)')
        .option('--exclude-dir <name>', 'Directory name to always skip (can be used multiple times)', collect, [] as string[])
        .option('--no-contents', 'Print the tree only')
        .option('--config-path <path>', 'Path to config JSON file')
        .option('--verbose', 'Timing and skip statistics on stderr')
        .action((path: string, options: CliOptions, command: Command) => {
            try {
                const cattreeOptions = resolveCattreeOptions(options, command, io);
                streamCattree(
                    path,
                    {
                        ...cattreeOptions,
                        warn: (message) => io.stderr(`Warning: ${message}`),
                        log: io.stderr,
                    },
                    io.stdout
                );
            } catch (error) {
                io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
                io.exit(1);
            }
        });

    return program;
}
