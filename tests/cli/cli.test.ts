/**
 * CLI Tests: kite-lex command
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
  type MockInstance,
} from 'vitest';
import { main, parseArgs } from '../../src/cli.js';

describe('kite-lex', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kite-cli-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function makeDir(name: string, config?: string): Promise<string> {
    const dir = path.join(tempDir, name);
    await fs.mkdir(dir);
    if (config !== undefined) {
      await fs.writeFile(path.join(dir, '.kite-lex.yaml'), config);
    }
    return dir;
  }

  describe('parseArgs', () => {
    it('starts the loop without arguments', () => {
      expect(parseArgs([])).toEqual({
        mode: 'repl',
        flags: { spans: undefined, format: undefined },
      });
    });

    it('parses a file with flags', () => {
      expect(parseArgs(['--spans', 'input.kite'])).toEqual({
        mode: 'scan',
        file: 'input.kite',
        flags: { spans: true, format: undefined },
      });
    });

    it('parses stdin mode', () => {
      expect(parseArgs(['-'])).toEqual({
        mode: 'scan',
        file: '-',
        flags: { spans: undefined, format: undefined },
      });
    });

    it('parses an inline expression', () => {
      expect(parseArgs(['-e', 'let x = 1;', '--format', 'compact'])).toEqual({
        mode: 'eval',
        source: 'let x = 1;',
        flags: { spans: undefined, format: 'compact' },
      });
    });

    it('parses --explain', () => {
      expect(parseArgs(['--explain', 'KITE-L001'])).toEqual({
        mode: 'explain',
        errorId: 'KITE-L001',
      });
    });

    it('parses help and version flags in any position', () => {
      expect(parseArgs(['input.kite', '--help']).mode).toBe('help');
      expect(parseArgs(['-h']).mode).toBe('help');
      expect(parseArgs(['--version']).mode).toBe('version');
      expect(parseArgs(['--spans', '-v']).mode).toBe('version');
    });

    it('throws on unknown flags', () => {
      expect(() => parseArgs(['--unknown'])).toThrow(
        'Unknown option: --unknown'
      );
      expect(() => parseArgs(['-x'])).toThrow('Unknown option: -x');
    });

    it('throws on extra arguments', () => {
      expect(() => parseArgs(['a.kite', 'b.kite'])).toThrow(
        'Unexpected argument: b.kite'
      );
      expect(() => parseArgs(['-e', 'x', 'a.kite'])).toThrow(
        'Unexpected argument: a.kite'
      );
    });

    it('throws on missing or invalid option values', () => {
      expect(() => parseArgs(['-e'])).toThrow('Missing expression after -e');
      expect(() => parseArgs(['--explain'])).toThrow(
        'Missing error ID after --explain'
      );
      expect(() => parseArgs(['--format', 'xml'])).toThrow(
        'Invalid format: xml (expected human or compact)'
      );
    });
  });

  describe('main', () => {
    let logSpy: MockInstance<typeof console.log>;
    let errorSpy: MockInstance<typeof console.error>;

    beforeEach(() => {
      logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    function logged(spy: MockInstance<typeof console.log>): unknown[] {
      return spy.mock.calls.map((call) => call[0]);
    }

    it('prints the version', async () => {
      expect(await main(['--version'], tempDir)).toBe(0);
      expect(logged(logSpy)).toEqual(['kite-lex 0.1.0']);
    });

    it('prints the tokens of an expression', async () => {
      expect(await main(['-e', 'x + 1'], tempDir)).toBe(0);
      expect(logged(logSpy)).toEqual(['IDENT("x")', 'PLUS', 'INT(1)', 'EOF']);
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it('exits 1 and reports illegal characters', async () => {
      expect(await main(['-e', 'a @', '--format', 'compact'], tempDir)).toBe(1);
      expect(logged(logSpy)).toEqual(['IDENT("a")', 'ILLEGAL("@")', 'EOF']);
      expect(logged(errorSpy)).toEqual([
        '[KITE-L002] Illegal character "@" at 1:3',
      ]);
    });

    it('scans a file with spans', async () => {
      const dir = await makeDir('file-scan');
      const file = path.join(dir, 'input.kite');
      await fs.writeFile(file, 'let a = 1;\nreturn a;');

      expect(await main(['--spans', file], dir)).toBe(0);
      expect(logged(logSpy)).toEqual([
        'LET @1:1',
        'IDENT("a") @1:5',
        'ASSIGN @1:7',
        'INT(1) @1:9',
        'SEMICOLON @1:10',
        'RETURN @2:1',
        'IDENT("a") @2:8',
        'SEMICOLON @2:9',
        'EOF @2:10',
      ]);
    });

    it('reports a missing file', async () => {
      const file = path.join(tempDir, 'missing.kite');
      expect(await main([file], tempDir)).toBe(1);
      expect(logged(errorSpy)).toEqual([`File not found: ${file}`]);
    });

    it('reads defaults from the config file', async () => {
      const dir = await makeDir('with-config', 'spans: true\nformat: compact\n');
      expect(await main(['-e', 'x #'], dir)).toBe(1);
      expect(logged(logSpy)).toEqual([
        'IDENT("x") @1:1',
        'ILLEGAL("#") @1:3',
        'EOF @1:4',
      ]);
      expect(logged(errorSpy)).toEqual([
        '[KITE-L002] Illegal character "#" at 1:3',
      ]);
    });

    it('lets flags override the config file', async () => {
      const dir = await makeDir('override', 'format: compact\n');
      expect(await main(['-e', '#', '--format', 'human'], dir)).toBe(1);
      expect(logged(errorSpy)).toEqual([
        [
          'error[KITE-L002]: Illegal character "#"',
          '  --> 1:1',
          '   |',
          ' 1 | #',
          '   | ^',
          '   |',
        ].join('\n'),
      ]);
    });

    it('reports an invalid config file', async () => {
      const dir = await makeDir('bad-config', 'spans: 3\n');
      expect(await main(['-e', 'x'], dir)).toBe(1);
      expect(logSpy).not.toHaveBeenCalled();
      expect(logged(errorSpy)).toEqual([
        'error[KITE-C001]: Invalid configuration: spans must be a boolean',
      ]);
    });

    it('explains an error ID', async () => {
      expect(await main(['--explain', 'kite-l002'], tempDir)).toBe(0);
      const [doc] = logged(logSpy);
      expect(typeof doc === 'string' && doc.split('\n')[0]).toBe(
        'KITE-L002: Illegal character'
      );
    });

    it('rejects an unknown error ID', async () => {
      expect(await main(['--explain', 'KITE-X001'], tempDir)).toBe(1);
      expect(logged(errorSpy)).toEqual(['Unknown error ID: KITE-X001']);
    });

    it('reports argument errors', async () => {
      expect(await main(['--nope'], tempDir)).toBe(1);
      expect(logged(errorSpy)).toEqual(['Unknown option: --nope']);
    });
  });
});
