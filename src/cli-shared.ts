/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import * as fs from 'fs';
import {
  formatDiagnostic,
  toDiagnostic,
  type DiagnosticFormat,
} from './cli-error-formatter.js';
import { KiteError } from './error-classes.js';
import { createLexerError, LexerError, Scanner } from './lexer/index.js';
import { lexeme, TOKEN_TYPES, type Token } from './token-types.js';

export interface TokenFormatOptions {
  /** Append the token's start as ` @line:column` */
  readonly spans?: boolean | undefined;
}

/**
 * Convert a token to its one-line display form.
 *
 * @example
 * formatToken(identToken)            // IDENT("five")
 * formatToken(intToken)              // INT(5)
 * formatToken(letToken, { spans: true }) // LET @1:1
 */
export function formatToken(
  token: Token,
  options: TokenFormatOptions = {}
): string {
  let text: string;
  switch (token.type) {
    case TOKEN_TYPES.IDENT:
    case TOKEN_TYPES.ILLEGAL:
      text = `${token.type}(${JSON.stringify(lexeme(token))})`;
      break;
    case TOKEN_TYPES.INT:
      text = `${token.type}(${token.value})`;
      break;
    default:
      text = token.type;
  }

  if (options.spans) {
    const { line, column } = token.span.start;
    text += ` @${line}:${column}`;
  }
  return text;
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @param source - Source being scanned, for a snippet under the message
 * @param format - Diagnostic layout for Kite errors
 * @returns Formatted error message
 */
export function formatError(
  err: Error,
  source?: string,
  format: DiagnosticFormat = 'human'
): string {
  if (err instanceof KiteError) {
    return formatDiagnostic(toDiagnostic(err, source), format);
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/** Package version, read from package.json beside src/ or dist/ */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

// ============================================================
// SOURCE SCANNING
// ============================================================

export interface ScanOptions extends TokenFormatOptions {
  readonly format?: DiagnosticFormat | undefined;
}

export interface ScanResult {
  /** One formatted token per line, ending with EOF */
  readonly lines: string[];
  /** Formatted illegal-character and lexer-error diagnostics */
  readonly diagnostics: string[];
  /** 1 when any diagnostic was produced, else 0 */
  readonly exitCode: 0 | 1;
}

/**
 * Scan a whole source and format its tokens and diagnostics.
 *
 * A LexerError (integer overflow) becomes a diagnostic and scanning
 * resumes after the offending literal.
 */
export function scanSource(
  source: string,
  options: ScanOptions = {}
): ScanResult {
  const format = options.format ?? 'human';
  const diagnostics: string[] = [];
  const scanner = new Scanner(source, {
    observability: {
      onIllegal: (event) => {
        const error = createLexerError(
          'KITE-L002',
          { char: JSON.stringify(event.char) },
          event.location
        );
        diagnostics.push(formatError(error, source, format));
      },
    },
  });

  const lines: string[] = [];
  for (;;) {
    let token: Token;
    try {
      token = scanner.nextToken();
    } catch (err) {
      if (err instanceof LexerError) {
        diagnostics.push(formatError(err, source, format));
        continue;
      }
      throw err;
    }

    lines.push(formatToken(token, options));
    if (token.type === TOKEN_TYPES.EOF) break;
  }

  return { lines, diagnostics, exitCode: diagnostics.length > 0 ? 1 : 0 };
}
