/**
 * CLI Error Explanation
 * Documentation for `sprig --explain <id>`
 */

import { parse } from './index.js';
import type { ErrorDefinition, ParseError } from './types.js';
import { ERROR_REGISTRY } from './types.js';

/** Placeholder names of a message template, in order of first use */
export function templatePlaceholders(template: string): string[] {
  const names = [...template.matchAll(/\{(\w+)\}/g)].map((m) => m[1] ?? '');
  return [...new Set(names)];
}

function describeError(error: ParseError): string {
  return error.format(({ errorId, message, location }) =>
    location
      ? `${location.line}:${location.column} ${errorId} ${message}`
      : `${errorId} ${message}`
  );
}

/**
 * Header, template and guidance, then each example followed by the
 * diagnostics the parser reports for it.
 */
function renderDefinition(definition: ErrorDefinition): string[] {
  const lines = [
    `${definition.errorId} (${definition.category}): ${definition.description}`,
    `Message: ${definition.messageTemplate}`,
  ];

  const placeholders = templatePlaceholders(definition.messageTemplate);
  if (placeholders.length > 0) {
    lines.push(`Placeholders: ${placeholders.join(', ')}`);
  }

  if (definition.cause || definition.resolution) {
    lines.push('');
    if (definition.cause) lines.push(`Cause: ${definition.cause}`);
    if (definition.resolution) lines.push(`Resolution: ${definition.resolution}`);
  }

  for (const example of definition.examples ?? []) {
    lines.push('', `Example: ${example.description}`);
    lines.push(...example.code.split('\n').map((line) => `  ${line}`));
    lines.push(...parse(example.code).errors.map((e) => `  => ${describeError(e)}`));
  }

  return lines;
}

/**
 * Render documentation for an error ID.
 *
 * @returns Formatted documentation, or null if errorId is not registered
 */
export function explainError(errorId: string): string | null {
  const definition = ERROR_REGISTRY.get(errorId);
  return definition ? renderDefinition(definition).join('\n') : null;
}
