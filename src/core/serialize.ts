import type { Token } from './model';

const SAFE_UNQUOTED = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Close the single-quoted string, emit an escaped quote, reopen:
 *   it's  ->  it'\''s
 */
export function escapeForShellSingleQuote(value: string): string {
    return value.replace(/'/g, "'\\''");
}

export function quoteToken(t: Token): string {
    if (!t.quoted && SAFE_UNQUOTED.test(t.value)) return t.value;
    return `'${escapeForShellSingleQuote(t.value)}'`;
}

export function serialize(tokens: readonly Token[]): string {
    return tokens.map(quoteToken).join(' ');
}
