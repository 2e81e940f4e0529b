/**
 * Content Renderer - Reads one surviving file and formats its block.
 */

import { readFileSync } from 'fs';
import { TextDecoder } from 'util';
import { compressLines, splitLines, type CompressOptions } from './compress.js';
import type { FileEntry } from './walker.js';

export type RenderOptions = CompressOptions;

export interface RenderedFile {
    relativePath: string;
    /** Lines to print, truncation marker included */
    lines: string[];
    originalLineCount: number;
    shownLineCount: number;
    omittedLineCount: number;
    /** Content was not valid UTF-8 and is replaced by a notice */
    binary: boolean;
}

export const BINARY_NOTICE = '[binary file: content not shown]';
export const SEPARATOR = '-'.repeat(40);

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read and transform one file. Read errors propagate; undecodable bytes do not.
 */
export function renderFile(entry: FileEntry, options: RenderOptions = {}): RenderedFile {
    const bytes = readFileSync(entry.absolutePath);

    let content: string;
    try {
        content = utf8.decode(bytes);
    } catch {
        return {
            relativePath: entry.relativePath,
            lines: [BINARY_NOTICE],
            originalLineCount: 0,
            shownLineCount: 0,
            omittedLineCount: 0,
            binary: true,
        };
    }

    const result = compressLines(splitLines(content), options);
    return {
        relativePath: entry.relativePath,
        lines: result.lines,
        originalLineCount: result.originalLineCount,
        shownLineCount: result.shownLineCount,
        omittedLineCount: result.omittedLineCount,
        binary: false,
    };
}

/** Placeholder block for a file that vanished or became unreadable after the walk */
export function unreadableFile(entry: FileEntry, reason: string): RenderedFile {
    return {
        relativePath: entry.relativePath,
        lines: [`[unreadable file: ${reason}]`],
        originalLineCount: 0,
        shownLineCount: 0,
        omittedLineCount: 0,
        binary: false,
    };
}

/**
 * Header, body, separator. Always ends with a newline.
 */
export function formatRenderedFile(file: RenderedFile): string {
    const sections = [`[Content of ${file.relativePath}]`, ...file.lines, SEPARATOR];
    return sections.join('\n') + '\n';
}
