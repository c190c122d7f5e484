/**
 * CLI Tests: --explain documentation
 */

import { describe, expect, it } from 'vitest';
import { explainError } from '../../src/cli-explain.js';

describe('explainError', () => {
  it('renders cause, resolution and examples', () => {
    expect(explainError('KITE-L001')).toBe(
      [
        'KITE-L001: Integer literal out of range',
        '',
        'Cause:',
        '  Integer literals are 64-bit signed values; the digits spell a larger number.',
        '',
        'Resolution:',
        '  Use a value no larger than 9223372036854775807.',
        '',
        'Examples:',
        '  One past the largest 64-bit integer',
        '',
        '    let big = 9223372036854775808;',
      ].join('\n')
    );
  });

  it('ignores case in the error ID', () => {
    expect(explainError('kite-l002')?.split('\n')[0]).toBe(
      'KITE-L002: Illegal character'
    );
  });

  it('returns null for unknown IDs', () => {
    expect(explainError('KITE-Z999')).toBeNull();
  });
});
