import { describe, expect, it } from 'vitest';

import { token, tokenValues } from '../../src/core/model';
import type { Token } from '../../src/core/model';
import { escapeForShellSingleQuote, quoteToken, serialize } from '../../src/core/serialize';
import { tokenize } from '../../src/core/tokenize';

describe('serialize', () => {
  it('leaves plain compiler words unquoted', () => {
    expect(serialize([token('gcc'), token('-DVERSION=1.2'), token('-I/usr/include'), token('foo.c')]))
      .toBe('gcc -DVERSION=1.2 -I/usr/include foo.c');
  });

  it('single-quotes words with whitespace or shell characters', () => {
    expect(quoteToken(token('/opt/bad path'))).toBe("'/opt/bad path'");
    expect(quoteToken(token('$HOME'))).toBe("'$HOME'");
    expect(quoteToken(token(''))).toBe("''");
  });

  it('escapes embedded single quotes', () => {
    expect(escapeForShellSingleQuote("it's")).toBe("it'\\''s");
    expect(quoteToken(token("-DNAME='x'"))).toBe("'-DNAME='\\''x'\\'''");
  });

  it('keeps quotes the source already had', () => {
    expect(quoteToken(token('foo.c', true))).toBe("'foo.c'");
  });

  it('round-trips through the tokenizer', () => {
    const samples: Token[][] = [
      [token('gcc'), token('-I'), token('/opt/bad path'), token('-c'), token('foo.c')],
      [token("it's"), token(''), token('a"b'), token('back\\slash'), token('tab\there')],
      [token('-DMSG="hello world"'), token('$(pwd)'), token('*.c'), token('new\nline')],
    ];
    for (const tokens of samples) {
      expect(tokenValues(tokenize(serialize(tokens)))).toEqual(tokenValues(tokens));
    }
  });
});
