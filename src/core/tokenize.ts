import { MalformedCommandError } from './errors';
import type { Token } from './model';

type QuoteState = 'none' | 'single' | 'double';

// Inside double quotes a backslash only escapes these; anything else keeps the backslash.
const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', '\\', '$', '`', '\n']);

function isSeparator(ch: string): boolean {
    return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

/**
 * Split a compile command into argument words using POSIX shell quoting rules.
 *
 * Only word splitting and quote removal are performed. Variables, globs, pipes and
 * redirections are kept as literal text.
 *
 * @throws MalformedCommandError on an unterminated quote or a trailing backslash.
 */
export function tokenize(input: string): Token[] {
    const tokens: Token[] = [];
    let current = '';
    let inWord = false;
    let quoted = false;
    let quote: QuoteState = 'none';
    let escape = false;
    let openedAt = 0;

    const push = () => {
        if (inWord) {
            tokens.push({ value: current, quoted });
            current = '';
            inWord = false;
            quoted = false;
        }
    };

    for (let i = 0; i < input.length; i++) {
        const ch = input[i];

        if (escape) {
            escape = false;
            // Backslash-newline is a line continuation in both contexts.
            if (ch === '\n') continue;
            if (quote === 'double' && !DOUBLE_QUOTE_ESCAPABLE.has(ch)) {
                current += '\\';
            }
            current += ch;
            inWord = true;
            quoted = true;
            continue;
        }

        if (quote === 'single') {
            if (ch === "'") {
                quote = 'none';
            } else {
                current += ch;
            }
            continue;
        }

        if (quote === 'double') {
            if (ch === '\\') {
                escape = true;
            } else if (ch === '"') {
                quote = 'none';
            } else {
                current += ch;
            }
            continue;
        }

        if (ch === '\\') {
            escape = true;
            openedAt = i;
            continue;
        }

        if (ch === "'" || ch === '"') {
            quote = ch === "'" ? 'single' : 'double';
            openedAt = i;
            inWord = true;
            quoted = true;
            continue;
        }

        if (isSeparator(ch)) {
            push();
            continue;
        }

        current += ch;
        inWord = true;
    }

    // Reported positions are UTF-8 byte offsets into the command.
    const byteOffset = (at: number) => Buffer.byteLength(input.slice(0, at), 'utf8');
    if (quote !== 'none') {
        throw new MalformedCommandError(`Unterminated ${quote} quote`, byteOffset(openedAt));
    }
    if (escape) {
        throw new MalformedCommandError('Dangling backslash', byteOffset(openedAt));
    }

    push();
    return tokens;
}
