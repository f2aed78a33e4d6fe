import type { Logger } from './logger';
import { NullLogger } from './logger';
import { InvalidEntryError } from './errors';
import type { CompilationEntry, EditOperation, EditResult, EntryFailure, Token } from './model';
import { token, tokenValues } from './model';
import { applyOperations } from './mutate';
import type { MutateOptions } from './mutate';
import { serialize } from './serialize';
import { tokenize } from './tokenize';

export interface EditEntriesOptions extends MutateOptions {
    /** Stop at the first failing entry instead of collecting failures. */
    failFast?: boolean;
    logger?: Logger;
}

export interface EntryEditOutcome {
    /** What to write back: the original value when nothing changed. */
    entry: unknown;
    file: string;
    changed: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

function sameValues(a: readonly Token[], b: readonly Token[]): boolean {
    return a.length === b.length && a.every((t, i) => t.value === b[i].value);
}

function fileOf(raw: unknown): string | undefined {
    return isPlainObject(raw) && typeof raw.file === 'string' ? raw.file : undefined;
}

export function toCompilationEntry(raw: unknown): CompilationEntry {
    if (!isPlainObject(raw)) {
        throw new InvalidEntryError('Entry is not a JSON object');
    }
    const { directory, file, command } = raw;
    const args = raw.arguments;
    if (typeof file !== 'string') {
        throw new InvalidEntryError('Entry has no string "file" field');
    }
    if (args !== undefined && !isStringArray(args)) {
        throw new InvalidEntryError('Entry "arguments" is not an array of strings');
    }
    if (command !== undefined && typeof command !== 'string') {
        throw new InvalidEntryError('Entry "command" is not a string');
    }
    if (args === undefined && command === undefined) {
        throw new InvalidEntryError('Entry has neither "command" nor "arguments"');
    }
    return {
        directory: typeof directory === 'string' ? directory : undefined,
        file,
        command,
        arguments: args
    };
}

/**
 * Edit one entry. `arguments` wins over `command` when both exist; the entry is
 * written back in the shape it was read in, with every other field left as it was.
 */
export function editEntry(raw: unknown, ops: readonly EditOperation[], options: MutateOptions = {}): EntryEditOutcome {
    const entry = toCompilationEntry(raw);

    const before: Token[] = entry.arguments !== undefined
        ? entry.arguments.map(v => token(v))
        : tokenize(entry.command ?? '');
    const after = applyOperations(before, ops, options);

    if (!isPlainObject(raw) || sameValues(before, after)) {
        return { entry: raw, file: entry.file, changed: false };
    }

    const next: Record<string, unknown> = { ...raw };
    if (entry.arguments !== undefined) {
        next.arguments = tokenValues(after);
        if (entry.command !== undefined) next.command = serialize(after);
    } else {
        next.command = serialize(after);
    }
    return { entry: next, file: entry.file, changed: true };
}

export function editEntries(entries: readonly unknown[], ops: readonly EditOperation[], options: EditEntriesOptions = {}): EditResult {
    const logger = options.logger || new NullLogger();
    const out: unknown[] = [];
    const failures: EntryFailure[] = [];
    const changedFiles: string[] = [];

    for (let i = 0; i < entries.length; i++) {
        const raw = entries[i];
        try {
            const { entry, file, changed } = editEntry(raw, ops, options);
            out.push(entry);
            if (changed) {
                changedFiles.push(file);
                logger.debug('Edited entry', { index: i, file });
            }
        } catch (error) {
            if (!(error instanceof Error)) throw error;
            const failure: EntryFailure = { index: i, file: fileOf(raw), error };
            failures.push(failure);
            logger.warn(`Skipping entry ${i}: ${error.message}`, { file: failure.file });
            // The entry keeps its original content.
            out.push(raw);
            if (options.failFast) {
                out.push(...entries.slice(i + 1));
                break;
            }
        }
    }

    return { entries: out, failures, changedEntries: changedFiles.length, changedFiles, totalEntries: entries.length };
}
