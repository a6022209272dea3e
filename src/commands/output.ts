import type { ValidationIssue } from '../domain/entities/validation.entity.js';
import { DeckhandError, ParseError, ValidationError, errorMessage } from '../domain/errors.js';

export function formatIssue(issue: ValidationIssue): string {
  return `  ${issue.severity === 'error' ? 'error' : 'warn '} ${issue.path}: ${issue.message} [${issue.rule}]`;
}

/**
 * Print a failed command's error to stderr, one line per issue where the
 * error carries them.
 */
export function reportError(error: unknown): void {
  if (error instanceof ParseError) {
    console.error(`Manifest could not be parsed (${error.issues.length} problem(s)):`);
    for (const issue of error.issues) {
      console.error(`  ${issue.path || '<root>'}: ${issue.message}`);
    }
    return;
  }
  if (error instanceof ValidationError) {
    console.error('Manifest is invalid:');
    for (const issue of error.issues) {
      console.error(formatIssue(issue));
    }
    return;
  }
  if (error instanceof DeckhandError) {
    console.error(`${error.code}: ${error.message}`);
    return;
  }
  console.error(`Error: ${errorMessage(error)}`);
}
