/**
 * CLI Error Formatter
 * Format diagnostics for human-readable or compact output
 */

import type { KiteError } from './error-classes.js';
import type { SourceSpan } from './source-location.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type DiagnosticFormat = 'human' | 'compact';

export function isDiagnosticFormat(value: unknown): value is DiagnosticFormat {
  return value === 'human' || value === 'compact';
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

/** An error, or an illegal character, ready for display */
export interface Diagnostic {
  readonly errorId: string;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly snippet?: readonly SnippetLine[] | undefined;
}

// ============================================================
// DIAGNOSTIC CONSTRUCTION
// ============================================================

/**
 * Extract source lines around a span.
 *
 * Lines are 1-based. Returns an empty list for empty source or a span
 * outside the source.
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines = 1
): SnippetLine[] {
  if (source === '') {
    return [];
  }

  const lines = source.split('\n');
  const errorStartLine = span.start.line;
  const errorEndLine = span.end.line;
  if (errorStartLine < 1 || errorEndLine > lines.length) {
    return [];
  }

  const firstLine = Math.max(1, errorStartLine - contextLines);
  const lastLine = Math.min(lines.length, errorEndLine + contextLines);

  const snippet: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippet.push({
      lineNumber: lineNum,
      content: (lines[lineNum - 1] ?? '').replace(/\r$/, ''),
      isErrorLine: lineNum >= errorStartLine && lineNum <= errorEndLine,
    });
  }
  return snippet;
}

/** Build a diagnostic from a KiteError, with a snippet when source is known */
export function toDiagnostic(error: KiteError, source?: string): Diagnostic {
  const data = error.toData();
  const span = data.location
    ? { start: data.location, end: data.location }
    : undefined;

  return {
    errorId: data.errorId,
    message: data.message,
    span,
    snippet:
      span && source !== undefined ? extractSnippet(source, span) : undefined,
  };
}

// ============================================================
// DIAGNOSTIC FORMATTING
// ============================================================

/**
 * Format a diagnostic for output.
 *
 * Human format:
 * ```
 * error[KITE-L002]: Illegal character "@"
 *   --> 1:9
 *    |
 *  1 | let x = @;
 *    |         ^
 *    |
 * ```
 *
 * Compact format: `[KITE-L002] Illegal character "@" at 1:9`
 */
export function formatDiagnostic(
  diagnostic: Diagnostic,
  format: DiagnosticFormat = 'human'
): string {
  if (format === 'compact') {
    const parts = [`[${diagnostic.errorId}]`, diagnostic.message];
    if (diagnostic.span) {
      parts.push(
        `at ${diagnostic.span.start.line}:${diagnostic.span.start.column}`
      );
    }
    return parts.join(' ');
  }

  const lines: string[] = [];
  lines.push(`error[${diagnostic.errorId}]: ${diagnostic.message}`);

  if (diagnostic.span) {
    const { line, column } = diagnostic.span.start;
    lines.push(`  --> ${line}:${column}`);
  }

  if (diagnostic.snippet && diagnostic.snippet.length > 0) {
    const lineNumberWidth = Math.max(
      ...diagnostic.snippet.map((l) => String(l.lineNumber).length)
    );
    const gutter = ' '.repeat(lineNumberWidth);

    lines.push(` ${gutter} |`);
    for (const line of diagnostic.snippet) {
      const lineNumStr = String(line.lineNumber).padStart(lineNumberWidth, ' ');
      lines.push(` ${lineNumStr} | ${line.content}`);

      if (line.isErrorLine && diagnostic.span) {
        lines.push(
          ` ${gutter} | ${renderCaretUnderline(diagnostic.span, line.content)}`
        );
      }
    }
    lines.push(` ${gutter} |`);
  }

  return lines.join('\n');
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render caret underline for a span on its first line.
 *
 * Columns are 1-based. An empty span still gets one caret; a span that
 * continues onto later lines is underlined to the end of the first.
 *
 * @throws {RangeError} Invalid span (start after end)
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const startColumn = span.start.column;
  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : [...lineContent].length + 1;

  const padding = ' '.repeat(startColumn - 1);
  const carets = '^'.repeat(Math.max(1, endColumn - startColumn));

  return padding + carets;
}
