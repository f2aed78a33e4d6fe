import type { EntryFailure, RunResult } from '../model';
import { describeOperation } from '../model';

export function formatFailure(f: EntryFailure): string {
    return `✖ ${f.file ?? `entry #${f.index}`}: ${f.error.message}`;
}

export function formatPretty(result: RunResult): string {
    const lines: string[] = [];
    lines.push(result.summary);

    if (result.meta.dryRun && result.operations.length > 0) {
        lines.push(`Operations: ${result.operations.map(describeOperation).join(', ')}`);
        for (const file of result.changedFiles) {
            lines.push(`  would edit ${file}`);
        }
    }

    for (const f of result.failures) {
        lines.push(formatFailure(f));
    }

    lines.push('');
    return lines.join('\n');
}
