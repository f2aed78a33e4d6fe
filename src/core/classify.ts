import { AmbiguousFlagError } from './errors';
import type { IncludeFlag, Token } from './model';

/**
 * One spelling of an include-directory option.
 *
 * Arity 1 is the joined form where the directory follows the prefix inside the same
 * word (`-I/usr/include`); arity 2 is the separate form where the directory is the
 * next word (`-I /usr/include`).
 */
export interface IncludeFlagSpec {
    prefix: string;
    arity: 1 | 2;
}

export const DEFAULT_INCLUDE_FLAGS: readonly IncludeFlagSpec[] = [
    { prefix: '-I', arity: 1 },
    { prefix: '-I', arity: 2 },
    { prefix: '-isystem', arity: 1 },
    { prefix: '-isystem', arity: 2 },
    { prefix: '-iquote', arity: 1 },
    { prefix: '-iquote', arity: 2 },
    { prefix: '-idirafter', arity: 1 },
    { prefix: '-idirafter', arity: 2 },
    { prefix: '--include-directory=', arity: 1 },
    { prefix: '--include-directory', arity: 2 }
];

export function classify(tokens: readonly Token[], specs: readonly IncludeFlagSpec[] = DEFAULT_INCLUDE_FLAGS): IncludeFlag[] {
    const separate = new Set(specs.filter(s => s.arity === 2).map(s => s.prefix));
    // Longest first so `-isystem/x` is never read as a shorter prefix.
    const joined = specs
        .filter(s => s.arity === 1)
        .map(s => s.prefix)
        .sort((a, b) => b.length - a.length);

    const flags: IncludeFlag[] = [];

    for (let i = 0; i < tokens.length; i++) {
        const value = tokens[i].value;

        if (separate.has(value)) {
            const next = tokens[i + 1];
            if (!next) {
                throw new AmbiguousFlagError(`${value} is missing its directory`, i);
            }
            if (next.value === '' || next.value.startsWith('-')) {
                throw new AmbiguousFlagError(`${value} is followed by ${next.value === '' ? 'an empty word' : `option ${next.value}`}`, i);
            }
            flags.push({ spelling: value, form: 'separate', path: next.value, start: i, end: i + 2 });
            i++; // the directory word belongs to this flag
            continue;
        }

        const prefix = joined.find(p => value.length > p.length && value.startsWith(p));
        if (prefix === undefined) continue;

        const dir = value.slice(prefix.length);
        if (dir === '-') {
            // gcc's obsolete `-I-` splits the search path; it is not a directory.
            throw new AmbiguousFlagError(`${value} does not name a directory`, i);
        }
        flags.push({ spelling: prefix, form: 'joined', path: dir, start: i, end: i + 1 });
    }

    return flags;
}
