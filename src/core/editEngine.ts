import * as path from 'path';

import type { CompdbEditConfig } from './config';
import { loadDatabase, writeDatabaseAtomic } from './database';
import type { Logger } from './logger';
import { NullLogger } from './logger';
import type { EditOperation, EntryFailure, RunResult } from './model';
import { editEntries } from './pipeline';

export interface RunEditOptions {
    input: string;
    output?: string;
    operations: EditOperation[];
    config: CompdbEditConfig;
    configFile?: string;
    dryRun?: boolean;
    tool: { name: string; version: string };
    logger?: Logger;
}

function buildSummary(r: { totalEntries: number; changedEntries: number; failures: EntryFailure[]; written: boolean; dryRun: boolean; output: string }): string {
    const head = `Processed ${r.totalEntries} entr${r.totalEntries === 1 ? 'y' : 'ies'}: ${r.changedEntries} changed, ${r.failures.length} failed.`;
    if (r.dryRun) return `${head} Dry run, nothing written.`;
    if (r.written) return `${head} Wrote ${r.output}.`;
    return `${head} Database left unchanged (use --best-effort to write the entries that succeeded).`;
}

/**
 * Load, edit and write back one compilation database.
 *
 * When any entry fails the database is only written under `config.bestEffort`;
 * failed entries are then kept exactly as they were read.
 */
export function runEdit(opts: RunEditOptions): RunResult {
    const logger = opts.logger || new NullLogger();
    const started = Date.now();
    const input = path.resolve(opts.input);
    const output = path.resolve(opts.output ?? opts.input);
    const dryRun = Boolean(opts.dryRun);

    const finish = (partial: Omit<RunResult, 'meta'>): RunResult => {
        const ended = Date.now();
        return {
            ...partial,
            meta: {
                input,
                output,
                startedAt: new Date(started).toISOString(),
                endedAt: new Date(ended).toISOString(),
                durationMs: ended - started,
                tool: opts.tool,
                configFile: opts.configFile,
                dryRun,
                bestEffort: opts.config.bestEffort
            }
        };
    };

    if (opts.operations.length === 0) {
        return finish({
            summary: 'No modifications requested.',
            operations: [],
            totalEntries: 0,
            changedEntries: 0,
            changedFiles: [],
            failures: [],
            written: false
        });
    }

    logger.info('Loading compilation database', { input });
    const entries = loadDatabase(input);

    const result = editEntries(entries, opts.operations, {
        includeFlags: opts.config.includeFlags,
        addFlag: opts.config.addFlag,
        addStyle: opts.config.addStyle,
        failFast: opts.config.failFast,
        logger
    });

    const hasFailures = result.failures.length > 0;
    const shouldWrite = !dryRun && (!hasFailures || opts.config.bestEffort);

    if (shouldWrite) {
        writeDatabaseAtomic(output, result.entries);
        logger.info('Wrote compilation database', { output, changed: result.changedEntries });
    } else if (hasFailures && !dryRun) {
        logger.warn('Not writing database because some entries failed', { failures: result.failures.length });
    }

    return finish({
        summary: buildSummary({ ...result, written: shouldWrite, dryRun, output }),
        operations: opts.operations,
        totalEntries: result.totalEntries,
        changedEntries: result.changedEntries,
        changedFiles: result.changedFiles,
        failures: result.failures,
        written: shouldWrite
    });
}
