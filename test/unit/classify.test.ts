import { describe, expect, it } from 'vitest';

import { classify } from '../../src/core/classify';
import { AmbiguousFlagError } from '../../src/core/errors';
import { tokenize } from '../../src/core/tokenize';

describe('classify', () => {
  it('finds joined and separate include flags with their spans', () => {
    const flags = classify(tokenize('gcc -I/usr/include -isystem /opt/sys -c foo.c -iquote"q dir"'));
    expect(flags).toEqual([
      { spelling: '-I', form: 'joined', path: '/usr/include', start: 1, end: 2 },
      { spelling: '-isystem', form: 'separate', path: '/opt/sys', start: 2, end: 4 },
      { spelling: '-iquote', form: 'joined', path: 'q dir', start: 6, end: 7 },
    ]);
  });

  it('recognizes the long clang spelling', () => {
    const flags = classify(tokenize('clang --include-directory=/a --include-directory /b'));
    expect(flags.map(f => [f.spelling, f.path])).toEqual([
      ['--include-directory=', '/a'],
      ['--include-directory', '/b'],
    ]);
  });

  it('does not match the prefix inside other words', () => {
    const flags = classify(tokenize('gcc -c src/-Ifoo.c -o out/-I.o -DX=-I/y -Wl,-I/z'));
    expect(flags).toEqual([]);
  });

  it('uses a custom flag table', () => {
    const flags = classify(tokenize('cl /Iinc /I other a.c -Inot'), [
      { prefix: '/I', arity: 1 },
      { prefix: '/I', arity: 2 },
    ]);
    expect(flags.map(f => f.path)).toEqual(['inc', 'other']);
  });

  it('reports a separate flag without a directory', () => {
    expect(() => classify(tokenize('gcc -c a.c -I'))).toThrow(AmbiguousFlagError);
    expect(() => classify(tokenize('gcc -c a.c -I'))).toThrow('-I is missing its directory at token 3');
  });

  it('reports a separate flag followed by another option', () => {
    expect(() => classify(tokenize('gcc -I -DX a.c'))).toThrow('-I is followed by option -DX at token 1');
  });

  it('reports the obsolete -I- form', () => {
    expect(() => classify(tokenize('gcc -I- a.c'))).toThrow('-I- does not name a directory at token 1');
  });
});
