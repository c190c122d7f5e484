/**
 * CLI Error Explanation
 * Function for rendering full error documentation
 */

import { ERROR_REGISTRY } from './error-registry.js';

/**
 * Render full error documentation for --explain command.
 *
 * @param errorId - Error identifier, case-insensitive (e.g. KITE-L001 or kite-l001)
 * @returns Formatted documentation string, or null if errorId is unknown
 *
 * @example
 * explainError("KITE-L002")
 * // Returns: formatted documentation with cause, resolution, examples
 */
export function explainError(errorId: string): string | null {
  const definition = ERROR_REGISTRY.get(errorId.toUpperCase());
  if (!definition) {
    return null;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    '',
  ];

  if (definition.cause) {
    sections.push('Cause:', `  ${definition.cause}`, '');
  }
  if (definition.resolution) {
    sections.push('Resolution:', `  ${definition.resolution}`, '');
  }

  const examples = definition.examples ?? [];
  if (examples.length > 0) {
    sections.push('Examples:');
    for (const example of examples) {
      sections.push(`  ${example.description}`, '');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
