/**
 * Line-level transforms for rendered file bodies: compaction and truncation.
 * Both work on already-split lines so they compose without re-parsing.
 */

export interface CompressOptions {
  /** Trim trailing whitespace and collapse runs of blank lines */
  compact?: boolean;
  /** Keep at most this many lines, followed by a truncation marker */
  maxLines?: number;
}

export interface CompressResult {
  lines: string[];
  /** Lines before any transform */
  originalLineCount: number;
  /** Content lines shown, excluding the truncation marker */
  shownLineCount: number;
  omittedLineCount: number;
}

/**
 * Split text into lines. A single trailing newline does not start an extra line,
 * and an empty text has no lines.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const body = content.endsWith('\r\n')
    ? content.slice(0, -2)
    : content.endsWith('\n') ? content.slice(0, -1) : content;
  return body.split(/\r?\n/);
}

export function compactLines(lines: readonly string[]): string[] {
  return lines
    .map(l => l.trimEnd())
    .filter((line, i, arr) => {
      if (line.length > 0) return true;
      // Keep only the first blank line of a run
      return i === 0 || arr[i - 1].length > 0;
    });
}

export function truncationMarker(omitted: number): string {
  return `... (${omitted} more lines)`;
}

/**
 * Compact first, then truncate, so --max-lines counts the lines actually shown.
 */
export function compressLines(lines: readonly string[], options: CompressOptions = {}): CompressResult {
  const originalLineCount = lines.length;
  const compacted = options.compact ? compactLines(lines) : [...lines];
  const max = options.maxLines;

  if (max === undefined || compacted.length <= max) {
    return {
      lines: compacted,
      originalLineCount,
      shownLineCount: compacted.length,
      omittedLineCount: 0,
    };
  }

  const omitted = compacted.length - max;
  return {
    lines: [...compacted.slice(0, max), truncationMarker(omitted)],
    originalLineCount,
    shownLineCount: max,
    omittedLineCount: omitted,
  };
}
