import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_EXTENSIONS,
  createFilterRuleSet,
  normalizeOnlyTargets,
  classifyOnly,
  matchEntry,
  parseIgnorePatterns,
} from '../../../src/context/index.js';

// ─── createFilterRuleSet ────────────────────────────────────────────────────

describe('createFilterRuleSet', () => {
  it('uses the default allowlist when no extensions are given', () => {
    const rules = createFilterRuleSet();
    expect(rules.extensions).toBe(DEFAULT_EXTENSIONS);
    expect([...rules.extensions].sort()).toEqual(['c', 'cpp', 'h', 'json', 'md', 'py', 'toml', 'txt', 'yaml', 'yml']);
  });

  it('normalizes custom extensions', () => {
    const rules = createFilterRuleSet({ extensions: ['.TS', 'js', ' '] });
    expect([...rules.extensions]).toEqual(['ts', 'js']);
  });

  it('compiles include and exclude once', () => {
    const rules = createFilterRuleSet({ include: '\\.py$', exclude: 'test' });
    expect(rules.include).toBeInstanceOf(RegExp);
    expect(rules.exclude?.source).toBe('test');
  });

  it('treats empty patterns as unset', () => {
    const rules = createFilterRuleSet({ include: '', exclude: '' });
    expect(rules.include).toBeUndefined();
    expect(rules.exclude).toBeUndefined();
  });

  it('fails fast on invalid include syntax', () => {
    expect(() => createFilterRuleSet({ include: '(' })).toThrow('Invalid --include pattern "("');
  });

  it('fails fast on invalid exclude syntax', () => {
    expect(() => createFilterRuleSet({ exclude: '[a-' })).toThrow('Invalid --exclude pattern "[a-"');
  });

  it('adds extra noise directories', () => {
    const rules = createFilterRuleSet({ extraExcludeDirs: ['build'] });
    expect(rules.noiseDirs.has('build')).toBe(true);
    expect(rules.noiseDirs.has('node_modules')).toBe(true);
  });
});

// ─── normalizeOnlyTargets ───────────────────────────────────────────────────

describe('normalizeOnlyTargets', () => {
  const root = join(tmpdir(), 'cattree-only-root');

  it('normalizes and de-duplicates relative targets', () => {
    expect(normalizeOnlyTargets(root, ['./src/', 'src', 'a/b.py'])).toEqual(['src', 'a/b.py']);
  });

  it('accepts absolute paths inside the root', () => {
    expect(normalizeOnlyTargets(root, [join(root, 'lib', 'x.c')])).toEqual(['lib/x.c']);
  });

  it('rejects targets outside the root', () => {
    expect(() => normalizeOnlyTargets(root, ['../elsewhere'])).toThrow('--only path is outside the root directory: ../elsewhere');
  });

  it('lifts the restriction when the root itself is targeted', () => {
    expect(normalizeOnlyTargets(root, ['src', '.'])).toEqual([]);
  });
});

// ─── classifyOnly ───────────────────────────────────────────────────────────

describe('classifyOnly', () => {
  const only = ['a/b/c.py', 'lib'];

  it('is unrestricted without targets', () => {
    expect(classifyOnly('x.py', 'file', [])).toBe('unrestricted');
  });

  it('recognizes listed paths, ancestors and descendants', () => {
    expect(classifyOnly('a/b/c.py', 'file', only)).toBe('listed');
    expect(classifyOnly('a', 'dir', only)).toBe('ancestor');
    expect(classifyOnly('a/b', 'dir', only)).toBe('ancestor');
    expect(classifyOnly('lib/util/x.c', 'file', only)).toBe('inside');
    expect(classifyOnly('lib/util', 'dir', only)).toBe('inside');
  });

  it('does not confuse name prefixes with ancestry', () => {
    expect(classifyOnly('library', 'dir', only)).toBe('outside');
    expect(classifyOnly('a/bb', 'dir', only)).toBe('outside');
  });
});

// ─── matchEntry ─────────────────────────────────────────────────────────────

describe('matchEntry', () => {
  describe('defaults', () => {
    const rules = createFilterRuleSet();

    it('includes allowlisted extensions', () => {
      expect(matchEntry('notes.md', 'file', rules)).toEqual({ include: true });
      expect(matchEntry('src/main.py', 'file', rules)).toEqual({ include: true });
      expect(matchEntry('README.MD', 'file', rules)).toEqual({ include: true });
    });

    it('never includes image.png', () => {
      expect(matchEntry('image.png', 'file', rules)).toEqual({ include: false, reason: 'extension' });
    });

    it('skips files without an extension', () => {
      expect(matchEntry('Makefile', 'file', rules)).toEqual({ include: false, reason: 'extension' });
    });

    it('skips hidden entries', () => {
      expect(matchEntry('.env', 'file', rules)).toEqual({ include: false, reason: 'hidden' });
      expect(matchEntry('src/.cache.json', 'file', rules)).toEqual({ include: false, reason: 'hidden' });
      expect(matchEntry('.github', 'dir', rules)).toEqual({ include: false, reason: 'hidden' });
    });

    it('skips noise directories at any depth', () => {
      expect(matchEntry('node_modules', 'dir', rules)).toEqual({ include: false, reason: 'noise' });
      expect(matchEntry('src/__pycache__', 'dir', rules)).toEqual({ include: false, reason: 'noise' });
    });

    it('descends into ordinary directories', () => {
      expect(matchEntry('src', 'dir', rules)).toEqual({ include: true });
    });
  });

  describe('--only', () => {
    const rules = createFilterRuleSet({ only: ['a/b/c.py'] });

    it('keeps the ancestor chain and the target', () => {
      expect(matchEntry('a', 'dir', rules)).toEqual({ include: true });
      expect(matchEntry('a/b', 'dir', rules)).toEqual({ include: true });
      expect(matchEntry('a/b/c.py', 'file', rules)).toEqual({ include: true });
    });

    it('drops siblings along the chain', () => {
      expect(matchEntry('z', 'dir', rules)).toEqual({ include: false, reason: 'only' });
      expect(matchEntry('a/x.py', 'file', rules)).toEqual({ include: false, reason: 'only' });
      expect(matchEntry('a/d', 'dir', rules)).toEqual({ include: false, reason: 'only' });
      expect(matchEntry('a/b/d.py', 'file', rules)).toEqual({ include: false, reason: 'only' });
    });

    it('ignores the extension allowlist under a listed directory', () => {
      const dirRules = createFilterRuleSet({ only: ['src'] });
      expect(matchEntry('src/app.js', 'file', dirRules)).toEqual({ include: true });
      expect(matchEntry('src/deep', 'dir', dirRules)).toEqual({ include: true });
    });

    it('still never includes hidden entries', () => {
      const hiddenRules = createFilterRuleSet({ only: ['.github'] });
      expect(matchEntry('.github', 'dir', hiddenRules)).toEqual({ include: false, reason: 'hidden' });
    });
  });

  describe('--include / --exclude', () => {
    it('requires files to match include, replacing the allowlist', () => {
      const rules = createFilterRuleSet({ include: '\\.js$' });
      expect(matchEntry('src/app.js', 'file', rules)).toEqual({ include: true });
      expect(matchEntry('src/app.py', 'file', rules)).toEqual({ include: false, reason: 'include' });
    });

    it('does not test directories against include', () => {
      const rules = createFilterRuleSet({ include: '\\.js$' });
      expect(matchEntry('src', 'dir', rules)).toEqual({ include: true });
    });

    it('excludes matching files and directories', () => {
      const rules = createFilterRuleSet({ exclude: 'test' });
      expect(matchEntry('tests', 'dir', rules)).toEqual({ include: false, reason: 'exclude' });
      expect(matchEntry('src/test_util.py', 'file', rules)).toEqual({ include: false, reason: 'exclude' });
      expect(matchEntry('src/main.py', 'file', rules)).toEqual({ include: true });
    });

    it('matches against the whole relative path', () => {
      const rules = createFilterRuleSet({ exclude: '^src/legacy/' });
      expect(matchEntry('src/legacy/old.py', 'file', rules)).toEqual({ include: false, reason: 'exclude' });
      expect(matchEntry('legacy/old.py', 'file', rules)).toEqual({ include: true });
    });
  });

  describe('--gitignore', () => {
    const ignoreRules = parseIgnorePatterns('build/\n*.log\n');

    it('excludes ignored paths when enabled', () => {
      const rules = createFilterRuleSet({ gitignore: true, extensions: ['log', 'txt'] });
      expect(matchEntry('build', 'dir', rules, ignoreRules)).toEqual({ include: false, reason: 'gitignore' });
      expect(matchEntry('debug.log', 'file', rules, ignoreRules)).toEqual({ include: false, reason: 'gitignore' });
      expect(matchEntry('notes.txt', 'file', rules, ignoreRules)).toEqual({ include: true });
    });

    it('has no effect when disabled', () => {
      const rules = createFilterRuleSet({ extensions: ['log'] });
      expect(matchEntry('debug.log', 'file', rules, ignoreRules)).toEqual({ include: true });
    });

    it('lets an explicit --only target and its ancestors win over ignore rules', () => {
      const rules = createFilterRuleSet({ gitignore: true, only: ['build/out.txt'] });
      expect(matchEntry('build', 'dir', rules, ignoreRules)).toEqual({ include: true });
      expect(matchEntry('build/out.txt', 'file', rules, ignoreRules)).toEqual({ include: true });
    });

    it('still honors ignore rules inside a listed directory', () => {
      const rules = createFilterRuleSet({ gitignore: true, only: ['build'] });
      expect(matchEntry('build', 'dir', rules, ignoreRules)).toEqual({ include: true });
      expect(matchEntry('build/out.txt', 'file', rules, ignoreRules)).toEqual({ include: true });
      expect(matchEntry('build/trace.log', 'file', rules, ignoreRules)).toEqual({ include: false, reason: 'gitignore' });
    });
  });
});
