/**
 * CLI Tests: read-print loop
 */

import { Readable, Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { runRepl } from '../../src/cli-repl.js';

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: unknown, _encoding, callback): void {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('runRepl', () => {
  it('prints the tokens of each line and prompts again', async () => {
    const output = collector();
    const errors = collector();

    const count = await runRepl({
      input: Readable.from(['let x = 5;\n', '@\n']),
      output: output.stream,
      errorOutput: errors.stream,
      prompt: '>> ',
      spans: false,
      format: 'human',
    });

    expect(count).toBe(2);
    expect(output.text()).toBe(
      '>> LET\nIDENT("x")\nASSIGN\nINT(5)\nSEMICOLON\nEOF\n' +
        '>> ILLEGAL("@")\nEOF\n' +
        '>> '
    );
    expect(errors.text()).toBe(
      'error[KITE-L002]: Illegal character "@"\n' +
        '  --> 1:1\n' +
        '   |\n' +
        ' 1 | @\n' +
        '   | ^\n' +
        '   |\n'
    );
  });

  it('starts each line at line 1 and honours spans', async () => {
    const output = collector();

    await runRepl({
      input: Readable.from(['a\n', '  b\n']),
      output: output.stream,
      prompt: '$ ',
      spans: true,
      format: 'compact',
    });

    expect(output.text()).toBe(
      '$ IDENT("a") @1:1\nEOF @1:2\n$ IDENT("b") @1:3\nEOF @1:4\n$ '
    );
  });

  it('writes diagnostics to output when no error stream is given', async () => {
    const output = collector();

    await runRepl({
      input: Readable.from(['#\n']),
      output: output.stream,
      prompt: '> ',
      spans: false,
      format: 'compact',
    });

    expect(output.text()).toBe(
      '> ILLEGAL("#")\nEOF\n[KITE-L002] Illegal character "#" at 1:1\n> '
    );
  });

  it('returns 0 on empty input', async () => {
    const output = collector();
    const count = await runRepl({
      input: Readable.from([]),
      output: output.stream,
      prompt: '> ',
      spans: false,
      format: 'human',
    });
    expect(count).toBe(0);
    expect(output.text()).toBe('> ');
  });
});
