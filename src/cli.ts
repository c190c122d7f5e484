#!/usr/bin/env node
/**
 * Kite CLI - Print the tokens of Kite source
 *
 * Usage:
 *   kite-lex                     Start the read-print loop
 *   kite-lex script.kite         Scan a file
 *   kite-lex -e 'let x = 5;'     Scan an expression
 *   echo 'x + 1' | kite-lex -    Scan stdin
 */

import * as fs from 'fs';
import * as fsp from 'fs/promises';
import { loadConfig } from './cli-config.js';
import {
  isDiagnosticFormat,
  type DiagnosticFormat,
} from './cli-error-formatter.js';
import { explainError } from './cli-explain.js';
import { runRepl } from './cli-repl.js';
import { formatError, readVersion, scanSource } from './cli-shared.js';

/** Options given on the command line; unset ones fall back to the config file */
export interface CliFlags {
  readonly spans?: boolean | undefined;
  readonly format?: DiagnosticFormat | undefined;
}

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string }
  | { mode: 'eval'; source: string; flags: CliFlags }
  | { mode: 'scan'; file: string; flags: CliFlags }
  | { mode: 'repl'; flags: CliFlags };

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws Error on unknown options, missing option values, or extra arguments
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let spans: boolean | undefined;
  let format: DiagnosticFormat | undefined;
  let expression: string | undefined;
  const positional: string[] = [];

  const args = [...argv];
  for (let arg = args.shift(); arg !== undefined; arg = args.shift()) {
    switch (arg) {
      case '--spans':
        spans = true;
        break;
      case '--format': {
        const value = args.shift();
        if (!isDiagnosticFormat(value)) {
          throw new Error(
            `Invalid format: ${value ?? ''} (expected human or compact)`
          );
        }
        format = value;
        break;
      }
      case '--explain': {
        const errorId = args.shift();
        if (errorId === undefined) {
          throw new Error('Missing error ID after --explain');
        }
        return { mode: 'explain', errorId };
      }
      case '-e': {
        const value = args.shift();
        if (value === undefined) {
          throw new Error('Missing expression after -e');
        }
        expression = value;
        break;
      }
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const flags: CliFlags = { spans, format };
  const [file, extra] =
    expression === undefined ? positional : [undefined, ...positional];

  if (extra !== undefined) {
    throw new Error(`Unexpected argument: ${extra}`);
  }
  if (expression !== undefined) {
    return { mode: 'eval', source: expression, flags };
  }
  if (file === undefined) {
    return { mode: 'repl', flags };
  }
  return { mode: 'scan', file, flags };
}

/**
 * Read source from a file, or from stdin when file is '-'
 *
 * @throws ENOENT error if the file does not exist
 */
export async function readSource(file: string): Promise<string> {
  if (file === '-') {
    // Read from stdin (must use sync API for stdin)
    return fs.readFileSync(0, 'utf-8');
  }
  return fsp.readFile(file, 'utf-8');
}

function showHelp(): void {
  console.log(`Kite Lexer

Usage:
  kite-lex [options]               Start the read-print loop
  kite-lex [options] <file>        Print the tokens of a file
  kite-lex [options] -             Print the tokens of stdin
  kite-lex [options] -e <code>     Print the tokens of <code>
  kite-lex --explain <error-id>    Describe an error (e.g. KITE-L001)
  kite-lex --help                  Show this help message
  kite-lex --version               Show version information

Options:
  --spans                 Append @line:column to every token
  --format <human|compact>
                          Layout of error messages (default: human)

Settings are read from .kite-lex.yaml in the working directory
(prompt, spans, format); options given here take precedence.

Exit status is 1 when the source holds an illegal character or an
out-of-range integer.`);
}

/**
 * Entry point for the kite-lex binary
 *
 * Writes tokens to stdout and diagnostics to stderr.
 *
 * @param argv - Command-line arguments without the node and script paths
 * @param cwd - Directory holding .kite-lex.yaml
 * @returns Process exit code
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        showHelp();
        return 0;

      case 'version':
        console.log(`kite-lex ${readVersion()}`);
        return 0;

      case 'explain': {
        const doc = explainError(parsed.errorId);
        if (doc === null) {
          console.error(`Unknown error ID: ${parsed.errorId}`);
          return 1;
        }
        console.log(doc);
        return 0;
      }

      case 'eval':
      case 'scan': {
        const config = loadConfig(cwd);
        const source =
          parsed.mode === 'eval' ? parsed.source : await readSource(parsed.file);
        const result = scanSource(source, {
          spans: parsed.flags.spans ?? config.spans,
          format: parsed.flags.format ?? config.format,
        });

        for (const line of result.lines) {
          console.log(line);
        }
        for (const diagnostic of result.diagnostics) {
          console.error(diagnostic);
        }
        return result.exitCode;
      }

      case 'repl': {
        const config = loadConfig(cwd);
        await runRepl({
          input: process.stdin,
          output: process.stdout,
          errorOutput: process.stderr,
          prompt: config.prompt,
          spans: parsed.flags.spans ?? config.spans,
          format: parsed.flags.format ?? config.format,
        });
        return 0;
      }
    }
  } catch (err) {
    console.error(
      formatError(err instanceof Error ? err : new Error(String(err)))
    );
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
