import { describe, expect, it } from 'vitest';

import { normalizeIncludePath } from '../../src/core/globs';
import { tokenValues } from '../../src/core/model';
import { applyOperation, applyOperations } from '../../src/core/mutate';
import { addArgument, addInclude, removeArgument, removeInclude } from '../../src/core/operations';
import { serialize } from '../../src/core/serialize';
import { tokenize } from '../../src/core/tokenize';

const edit = (command: string, ...ops: Parameters<typeof applyOperations>[1]) =>
  serialize(applyOperations(tokenize(command), ops));

describe('include path normalization', () => {
  it('drops trailing separators but keeps the root', () => {
    expect(normalizeIncludePath('/usr/include/')).toBe('/usr/include');
    expect(normalizeIncludePath('inc\\\\')).toBe('inc');
    expect(normalizeIncludePath('/')).toBe('/');
    expect(normalizeIncludePath('Inc')).toBe('Inc');
  });
});

describe('addInclude', () => {
  it('appends a separate flag at the end', () => {
    expect(edit('gcc -c foo.c -Wall', addInclude('/usr/include'))).toBe('gcc -c foo.c -Wall -I /usr/include');
  });

  it('leaves tokens unchanged when the directory is already present', () => {
    const tokens = tokenize('gcc -I/usr/include -c foo.c');
    expect(applyOperation(tokens, addInclude('/usr/include'))).toBe(tokens);
    expect(applyOperation(tokens, addInclude('/usr/include/'))).toBe(tokens);
  });

  it('counts system include variants as present', () => {
    const tokens = tokenize('gcc -isystem /opt/sdk -c foo.c');
    expect(applyOperation(tokens, addInclude('/opt/sdk'))).toBe(tokens);
  });

  it('is idempotent', () => {
    const once = applyOperation(tokenize('gcc -c a.c'), addInclude('/opt/x'));
    const twice = applyOperation(once, addInclude('/opt/x'));
    expect(tokenValues(twice)).toEqual(tokenValues(once));
  });

  it('quotes added directories that need it', () => {
    expect(edit('gcc -c a.c', addInclude('/opt/my headers'))).toBe("gcc -c a.c -I '/opt/my headers'");
  });

  it('refuses directories that would read back as an option', () => {
    expect(() => addInclude('-weird')).toThrow('Include directory must not start with "-": -weird');
    expect(edit('cc a.c', addInclude('./-weird'), addInclude('/x'))).toBe('cc a.c -I ./-weird -I /x');
  });

  it('follows the configured flag spelling and style', () => {
    const out = applyOperation(tokenize('cc a.c'), addInclude('inc'), { addFlag: '-isystem', addStyle: 'joined' });
    expect(tokenValues(out)).toEqual(['cc', 'a.c', '-isysteminc']);
  });
});

describe('removeInclude', () => {
  it('removes a quoted separate flag as one unit', () => {
    expect(edit('gcc -I "/opt/bad path" -c foo.c', removeInclude('/opt/bad path'))).toBe('gcc -c foo.c');
  });

  it('removes every matching span in either form', () => {
    expect(edit('gcc -I/opt/x -c -I /opt/x/ a.c -iquote/opt/x -I/keep', removeInclude('/opt/x')))
      .toBe('gcc -c a.c -I/keep');
  });

  it('is a no-op when the directory is absent', () => {
    const tokens = tokenize('gcc -I/usr/include -c foo.c');
    expect(applyOperation(tokens, removeInclude('/opt/missing'))).toBe(tokens);
  });

  it('accepts glob patterns', () => {
    expect(edit('gcc -I/opt/a -I/opt/b/c -I/usr/include a.c', removeInclude('/opt/*'))).toBe('gcc -I/opt/b/c -I/usr/include a.c');
    expect(edit('gcc -I/opt/a -I/opt/b/c -I/usr/include a.c', removeInclude('/opt/**'))).toBe('gcc -I/usr/include a.c');
  });

  it('keeps the order of the remaining tokens', () => {
    const before = tokenize('cc -DA -I/x -DB -I /y -DC a.c');
    const after = applyOperation(before, removeInclude('/x'));
    expect(tokenValues(after)).toEqual(['cc', '-DA', '-DB', '-I', '/y', '-DC', 'a.c']);
  });
});

describe('argument edits', () => {
  it('appends an argument once', () => {
    expect(edit('gcc -c a.c', addArgument('-Wall'), addArgument('-Wall'))).toBe('gcc -c a.c -Wall');
  });

  it('removes every occurrence of a multi-word argument', () => {
    expect(edit('gcc -x c -c a.c -x c', removeArgument('-x c'))).toBe('gcc -c a.c');
  });
});

describe('applyOperations', () => {
  it('applies operations in the order given', () => {
    expect(edit('gcc -I/old a.c', removeInclude('/old'), addInclude('/new'), addInclude('/old')))
      .toBe('gcc a.c -I /new -I /old');
  });

  it('does not modify its input', () => {
    const tokens = tokenize('gcc -I/old a.c');
    applyOperations(tokens, [removeInclude('/old'), addInclude('/new')]);
    expect(tokenValues(tokens)).toEqual(['gcc', '-I/old', 'a.c']);
  });
});
