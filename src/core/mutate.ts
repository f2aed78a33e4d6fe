import { classify, DEFAULT_INCLUDE_FLAGS } from './classify';
import type { IncludeFlagSpec } from './classify';
import { createPathMatcher, normalizeIncludePath } from './globs';
import type { EditOperation, FlagForm, Token } from './model';
import { token } from './model';

export interface MutateOptions {
    includeFlags?: readonly IncludeFlagSpec[];
    /** Flag spelling used for added directories. */
    addFlag?: string;
    addStyle?: FlagForm;
}

function indexOfRun(tokens: readonly Token[], run: readonly string[], from = 0): number {
    if (run.length === 0) return -1;
    for (let i = from; i + run.length <= tokens.length; i++) {
        if (run.every((v, j) => tokens[i + j].value === v)) return i;
    }
    return -1;
}

function addInclude(tokens: Token[], dir: string, options: MutateOptions): Token[] {
    const wanted = normalizeIncludePath(dir);
    const present = classify(tokens, options.includeFlags ?? DEFAULT_INCLUDE_FLAGS)
        .some(f => normalizeIncludePath(f.path) === wanted);
    if (present) return tokens;

    const flag = options.addFlag ?? '-I';
    // Appended, never inserted, so existing search order is untouched.
    const added = options.addStyle === 'joined' ? [token(flag + dir)] : [token(flag), token(dir)];
    return [...tokens, ...added];
}

function removeInclude(tokens: Token[], pattern: string, options: MutateOptions): Token[] {
    const matches = createPathMatcher(pattern);
    const doomed = classify(tokens, options.includeFlags ?? DEFAULT_INCLUDE_FLAGS).filter(f => matches(f.path));
    if (doomed.length === 0) return tokens;

    const drop = new Set<number>();
    for (const f of doomed) {
        for (let i = f.start; i < f.end; i++) drop.add(i);
    }
    return tokens.filter((_, i) => !drop.has(i));
}

function addArgument(tokens: Token[], run: string[]): Token[] {
    if (run.length === 0 || indexOfRun(tokens, run) !== -1) return tokens;
    return [...tokens, ...run.map(v => token(v))];
}

function removeArgument(tokens: Token[], run: string[]): Token[] {
    let at = indexOfRun(tokens, run);
    if (at === -1) return tokens;

    const out: Token[] = [];
    let i = 0;
    while (at !== -1) {
        out.push(...tokens.slice(i, at));
        i = at + run.length;
        at = indexOfRun(tokens, run, i);
    }
    out.push(...tokens.slice(i));
    return out;
}

/**
 * Apply one edit. The input array is never modified; when the edit is a no-op the
 * same array is returned.
 */
export function applyOperation(tokens: Token[], op: EditOperation, options: MutateOptions = {}): Token[] {
    switch (op.kind) {
        case 'addInclude': return addInclude(tokens, op.path, options);
        case 'removeInclude': return removeInclude(tokens, op.pattern, options);
        case 'addArgument': return addArgument(tokens, op.tokens);
        case 'removeArgument': return removeArgument(tokens, op.tokens);
    }
}

export function applyOperations(tokens: Token[], ops: readonly EditOperation[], options: MutateOptions = {}): Token[] {
    return ops.reduce((acc, op) => applyOperation(acc, op, options), tokens);
}
