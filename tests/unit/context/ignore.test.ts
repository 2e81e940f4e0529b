import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { parseIgnorePatterns, loadIgnoreRules, isIgnored } from '../../../src/context/index.js';

describe('parseIgnorePatterns', () => {
  it('compiles each rule in file order', () => {
    const rules = parseIgnorePatterns([
      '# build output',
      '',
      '*.log',
      '!keep.log',
      '/secret.txt',
      'build/',
      'docs/*.md',
      '\\#notes',
    ].join('\n'));

    expect(rules).toEqual([
      { pattern: '*.log', glob: '**/*.log', negated: false, directoryOnly: false, base: '' },
      { pattern: '!keep.log', glob: '**/keep.log', negated: true, directoryOnly: false, base: '' },
      { pattern: '/secret.txt', glob: 'secret.txt', negated: false, directoryOnly: false, base: '' },
      { pattern: 'build/', glob: '**/build', negated: false, directoryOnly: true, base: '' },
      { pattern: 'docs/*.md', glob: 'docs/*.md', negated: false, directoryOnly: false, base: '' },
      { pattern: '\\#notes', glob: '**/#notes', negated: false, directoryOnly: false, base: '' },
    ]);
  });

  it('strips trailing whitespace and CRLF endings', () => {
    const rules = parseIgnorePatterns('dist/  \r\ncoverage\r\n');
    expect(rules.map(r => r.glob)).toEqual(['**/dist', '**/coverage']);
  });

  it('records the declaring directory as base', () => {
    const rules = parseIgnorePatterns('*.tmp', 'pkg');
    expect(rules[0].base).toBe('pkg');
  });

  it('returns nothing for an empty file', () => {
    expect(parseIgnorePatterns('')).toEqual([]);
  });
});

describe('isIgnored', () => {
  const rules = parseIgnorePatterns('*.log\n!keep.log\n/secret.txt\nbuild/\ndocs/*.md\n');

  it('matches unanchored patterns at any depth', () => {
    expect(isIgnored('debug.log', false, rules)).toBe(true);
    expect(isIgnored('logs/app.log', false, rules)).toBe(true);
  });

  it('lets a later negation un-ignore', () => {
    expect(isIgnored('keep.log', false, rules)).toBe(false);
  });

  it('anchors patterns with a leading slash to the ignore file directory', () => {
    expect(isIgnored('secret.txt', false, rules)).toBe(true);
    expect(isIgnored('sub/secret.txt', false, rules)).toBe(false);
  });

  it('applies directory-only patterns to directories only', () => {
    expect(isIgnored('build', true, rules)).toBe(true);
    expect(isIgnored('src/build', true, rules)).toBe(true);
    expect(isIgnored('build', false, rules)).toBe(false);
  });

  it('keeps single-star patterns within one directory level', () => {
    expect(isIgnored('docs/a.md', false, rules)).toBe(true);
    expect(isIgnored('docs/sub/a.md', false, rules)).toBe(false);
  });

  it('supports globstar patterns', () => {
    const deep = parseIgnorePatterns('docs/**/*.md');
    expect(isIgnored('docs/a.md', false, deep)).toBe(true);
    expect(isIgnored('docs/x/y/a.md', false, deep)).toBe(true);
    expect(isIgnored('src/a.md', false, deep)).toBe(false);
  });

  it('scopes nested rules to their directory', () => {
    const nested = parseIgnorePatterns('*.tmp', 'pkg');
    expect(isIgnored('pkg/x.tmp', false, nested)).toBe(true);
    expect(isIgnored('pkg/deep/y.tmp', false, nested)).toBe(true);
    expect(isIgnored('x.tmp', false, nested)).toBe(false);
    expect(isIgnored('pkgs/x.tmp', false, nested)).toBe(false);
  });

  it('gives nested rules precedence over inherited ones', () => {
    const combined = [...parseIgnorePatterns('*.txt'), ...parseIgnorePatterns('!notes.txt', 'docs')];
    expect(isIgnored('docs/notes.txt', false, combined)).toBe(false);
    expect(isIgnored('notes.txt', false, combined)).toBe(true);
  });

  it('ignores nothing without rules', () => {
    expect(isIgnored('anything.py', false, [])).toBe(false);
  });
});

describe('loadIgnoreRules', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = mkdtempSync(join(tmpdir(), 'cattree-ignore-'));
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
  });

  it('reads the ignore file of a directory', () => {
    writeFileSync(join(fixture, '.gitignore'), 'dist/\n');
    const warn = vi.fn();
    const rules = loadIgnoreRules(fixture, 'sub', warn);

    expect(rules).toEqual([
      { pattern: 'dist/', glob: '**/dist', negated: false, directoryOnly: true, base: 'sub' },
    ]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('returns no rules when the file is missing', () => {
    const warn = vi.fn();
    expect(loadIgnoreRules(fixture, '', warn)).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns and continues when the file cannot be read', () => {
    mkdirSync(join(fixture, '.gitignore'));
    const warn = vi.fn();

    expect(loadIgnoreRules(fixture, '', warn)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^Cannot read \.gitignore: /);
  });
});
