import type { ValidationIssue } from './entities/validation.entity.js';
import type { ActionId } from './entities/plan.entity.js';

export type DeckhandErrorCode = 'PARSE_ERROR' | 'VALIDATION_ERROR' | 'PLANNING_ERROR' | 'APPLY_ERROR';

export abstract class DeckhandError extends Error {
  abstract readonly code: DeckhandErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ParseIssue {
  path: string;
  message: string;
}

/**
 * A manifest field is missing, mistyped or (in strict mode) unknown.
 * `path` and the message name the first problem; `issues` holds all of them.
 */
export class ParseError extends DeckhandError {
  readonly code = 'PARSE_ERROR';
  readonly issues: ParseIssue[];

  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown; issues?: ParseIssue[] }
  ) {
    super(path ? `${path}: ${message}` : message, { cause: options?.cause });
    this.issues = options?.issues ?? [{ path, message }];
  }

  static fromIssues(issues: ParseIssue[]): ParseError {
    const [first] = issues;
    if (!first) {
      return new ParseError('', 'Invalid manifest');
    }
    return new ParseError(first.path, first.message, { issues });
  }
}

export class ValidationError extends DeckhandError {
  readonly code = 'VALIDATION_ERROR';

  constructor(readonly issues: ValidationIssue[]) {
    const errors = issues.filter((i) => i.severity === 'error');
    super(
      `Manifest has ${errors.length} validation error(s): ` +
        errors.map((i) => `${i.path}: ${i.message}`).join('; ')
    );
  }
}

/**
 * Desired and observed state differ in a way no action can reconcile.
 */
export class PlanningError extends DeckhandError {
  readonly code = 'PLANNING_ERROR';

  constructor(
    readonly path: string,
    message: string
  ) {
    super(`${path}: ${message}`);
  }
}

export class ApplyError extends DeckhandError {
  readonly code = 'APPLY_ERROR';
  readonly envVar?: string;
  readonly timedOut: boolean;

  constructor(
    readonly actionId: ActionId,
    message: string,
    options?: { cause?: unknown; envVar?: string; timedOut?: boolean }
  ) {
    super(`${actionId}: ${message}`, { cause: options?.cause });
    this.envVar = options?.envVar;
    this.timedOut = options?.timedOut ?? false;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
