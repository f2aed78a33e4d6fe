import type { RunResult } from '../model';

export function formatJson(result: RunResult): string {
    const failures = result.failures.map(f => ({
        index: f.index,
        file: f.file,
        kind: f.error.name,
        message: f.error.message
    }));
    return JSON.stringify({ ...result, failures }, null, 2) + '\n';
}
