export { validateRoot, validateMaxLines, streamCattree, generateCattree } from './gather.js';
export type { CattreeOptions, CattreeSummary, CattreeResult, WriteFn, LogFn } from './gather.js';

// Path matching
export {
  DEFAULT_EXTENSIONS,
  NOISE_DIRS,
  createFilterRuleSet,
  normalizeOnlyTargets,
  classifyOnly,
  matchEntry,
} from './filter.js';
export type { FilterRuleSet, FilterRuleSetInput, MatchDecision, SkipReason, EntryKind, OnlyScope } from './filter.js';

// Ignore files
export { parseIgnorePatterns, loadIgnoreRules, isIgnored, IGNORE_FILE_NAME } from './ignore.js';
export type { IgnoreRule, WarnFn } from './ignore.js';

// Walking
export { walkTree, collectFiles, compareEntries, isBinaryFile } from './walker.js';
export type { FileEntry, TreeNode, SkippedEntry, WalkOptions, WalkResult } from './walker.js';

// Tree printing
export { renderTree } from './tree.js';

// Content rendering
export { renderFile, unreadableFile, formatRenderedFile, BINARY_NOTICE, SEPARATOR } from './reader.js';
export type { RenderedFile, RenderOptions } from './reader.js';
export { splitLines, compactLines, compressLines, truncationMarker } from './compress.js';
export type { CompressOptions, CompressResult } from './compress.js';
