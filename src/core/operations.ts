import { CompdbEditError } from './errors';
import type { EditOperation } from './model';
import { tokenValues } from './model';
import { tokenize } from './tokenize';

export function addInclude(dir: string): EditOperation {
    if (dir.length === 0) {
        throw new CompdbEditError('Include directory must not be empty', 'CONFIG');
    }
    // `-I -x` reads as an ambiguous flag on the next run; spell such paths `./-x`.
    if (dir.startsWith('-')) {
        throw new CompdbEditError(`Include directory must not start with "-": ${dir}`, 'CONFIG');
    }
    return { kind: 'addInclude', path: dir };
}

export function removeInclude(pattern: string): EditOperation {
    if (pattern.length === 0) {
        throw new CompdbEditError('Include directory to remove must not be empty', 'CONFIG');
    }
    return { kind: 'removeInclude', pattern };
}

/** `text` is shell-split, so `"-D NAME=1"` adds two words. */
function argumentWords(text: string): string[] {
    const words = tokenValues(tokenize(text));
    if (words.length === 0) {
        throw new CompdbEditError('Argument must not be empty', 'CONFIG');
    }
    return words;
}

export function addArgument(text: string): EditOperation {
    return { kind: 'addArgument', tokens: argumentWords(text) };
}

export function removeArgument(text: string): EditOperation {
    return { kind: 'removeArgument', tokens: argumentWords(text) };
}
