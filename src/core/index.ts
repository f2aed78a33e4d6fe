export { tokenize } from './tokenize';
export { classify, DEFAULT_INCLUDE_FLAGS } from './classify';
export type { IncludeFlagSpec } from './classify';
export { applyOperation, applyOperations } from './mutate';
export type { MutateOptions } from './mutate';
export { escapeForShellSingleQuote, quoteToken, serialize } from './serialize';
export { editEntries, editEntry, toCompilationEntry } from './pipeline';
export type { EditEntriesOptions, EntryEditOutcome } from './pipeline';
export { addArgument, addInclude, removeArgument, removeInclude } from './operations';
export { createPathMatcher, hasGlobSyntax, normalizeIncludePath } from './globs';
export { formatDatabase, loadDatabase, parseDatabase, writeDatabaseAtomic } from './database';
export { runEdit } from './editEngine';
export type { RunEditOptions } from './editEngine';
export { loadConfig, DEFAULTS } from './config';
export type { CompdbEditConfig } from './config';
export * from './errors';
export * from './model';
export type { Logger } from './logger';
export { NullLogger } from './logger';
