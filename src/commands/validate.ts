import type { DeckhandConfig } from '../config.js';
import type { ValidationIssue } from '../domain/entities/validation.entity.js';
import { loadManifestFile } from '../domain/services/manifest.parser.js';
import { hasErrors, validateConfig } from '../domain/services/manifest.validator.js';
import { formatIssue, reportError } from './output.js';

export interface ValidateOptions {
  strict?: boolean;
  json?: boolean;
}

/**
 * Returns the process exit code: 0 when the manifest has no errors.
 */
export function validateCommand(file: string, options: ValidateOptions, config: DeckhandConfig): number {
  let issues: ValidationIssue[];
  let service: string;
  try {
    const parsed = loadManifestFile(file, { strict: options.strict ?? false });
    service = parsed.name;
    issues = validateConfig(parsed, config.limits);
  } catch (error) {
    reportError(error);
    return 1;
  }

  const valid = !hasErrors(issues);
  if (options.json) {
    console.log(JSON.stringify({ valid, service, issues }, null, 2));
    return valid ? 0 : 1;
  }

  for (const issue of issues) {
    console.log(formatIssue(issue));
  }
  const errors = issues.filter((i) => i.severity === 'error').length;
  const warnings = issues.length - errors;
  console.log(
    valid
      ? `${file}: ${service} is valid (${warnings} warning(s))`
      : `${file}: ${errors} error(s), ${warnings} warning(s)`
  );
  return valid ? 0 : 1;
}
