/** The fields of a database entry that editing reads; any others are carried through untouched. */
export interface CompilationEntry {
    directory?: string;
    file: string;
    command?: string;
    arguments?: string[];
}

export interface Token {
    value: string;
    // Serialization hint only; two tokens with the same value are the same argument.
    quoted: boolean;
}

export type FlagForm = 'joined' | 'separate';

export interface IncludeFlag {
    spelling: string;
    form: FlagForm;
    path: string;
    start: number;
    end: number; // exclusive
}

export type EditOperation =
    | { kind: 'addInclude'; path: string }
    | { kind: 'removeInclude'; pattern: string }
    | { kind: 'addArgument'; tokens: string[] }
    | { kind: 'removeArgument'; tokens: string[] };

export interface EntryFailure {
    index: number;
    file?: string;
    error: Error;
}

export interface EditResult {
    entries: unknown[];
    failures: EntryFailure[];
    changedEntries: number;
    changedFiles: string[];
    totalEntries: number;
}

export interface RunMeta {
    input: string;
    output: string;
    startedAt: string; // ISO
    endedAt: string; // ISO
    durationMs: number;
    tool: { name: string; version: string };
    configFile?: string;
    dryRun: boolean;
    bestEffort: boolean;
}

export interface RunResult {
    summary: string;
    operations: EditOperation[];
    totalEntries: number;
    changedEntries: number;
    changedFiles: string[];
    failures: EntryFailure[];
    written: boolean;
    meta: RunMeta;
}

export function token(value: string, quoted = false): Token {
    return { value, quoted };
}

export function tokenValues(tokens: readonly Token[]): string[] {
    return tokens.map(t => t.value);
}

export function describeOperation(op: EditOperation): string {
    switch (op.kind) {
        case 'addInclude': return `add include ${op.path}`;
        case 'removeInclude': return `remove include ${op.pattern}`;
        case 'addArgument': return `add argument ${op.tokens.join(' ')}`;
        case 'removeArgument': return `remove argument ${op.tokens.join(' ')}`;
    }
}
