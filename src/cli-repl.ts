/**
 * CLI Read-Print Loop
 * Echoes the tokens of each line read from input
 */

import * as readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { DiagnosticFormat } from './cli-error-formatter.js';
import { scanSource } from './cli-shared.js';

export interface ReplOptions {
  readonly input: Readable;
  /** Receives the prompt and the token lines */
  readonly output: Writable;
  /** Receives diagnostics; defaults to output */
  readonly errorOutput?: Writable | undefined;
  readonly prompt: string;
  readonly spans: boolean;
  readonly format: DiagnosticFormat;
}

/**
 * Run the loop until input closes.
 *
 * Every line gets a fresh scanner; its tokens are written one per line
 * up to and including EOF, then the prompt is shown again.
 *
 * @returns Number of lines scanned
 */
export async function runRepl(options: ReplOptions): Promise<number> {
  const { input, output, prompt } = options;
  const errorOutput = options.errorOutput ?? output;
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  let count = 0;
  output.write(prompt);
  for await (const line of rl) {
    const result = scanSource(line, {
      spans: options.spans,
      format: options.format,
    });

    for (const tokenLine of result.lines) {
      output.write(`${tokenLine}\n`);
    }
    for (const diagnostic of result.diagnostics) {
      errorOutput.write(`${diagnostic}\n`);
    }

    count++;
    output.write(prompt);
  }

  return count;
}
