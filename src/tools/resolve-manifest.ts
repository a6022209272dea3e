import type { ServiceConfig } from '../domain/entities/service-config.entity.js';
import { DeckhandError, ParseError, ValidationError, errorMessage } from '../domain/errors.js';
import { loadManifestFile, parseManifest } from '../domain/services/manifest.parser.js';

type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

export function jsonResponse(payload: Record<string, unknown>): ToolResponse {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload) }],
  };
}

/**
 * Error body shared by the manifest tools. Domain errors carry their code
 * and, where they have them, the individual issues.
 */
export function errorResponse(error: unknown): ToolResponse {
  if (error instanceof ParseError || error instanceof ValidationError) {
    return jsonResponse({ success: false, code: error.code, error: error.message, issues: error.issues });
  }
  if (error instanceof DeckhandError) {
    return jsonResponse({ success: false, code: error.code, error: error.message });
  }
  return jsonResponse({ success: false, error: errorMessage(error) });
}

/**
 * Load a manifest from a file path or inline content, returning an error
 * response object when neither is given or parsing fails.
 */
export function resolveManifestOrError(opts: {
  path?: string;
  content?: string;
  strict?: boolean;
}): { config: ServiceConfig } | { error: ToolResponse } {
  const parseOptions = { strict: opts.strict ?? false };
  try {
    if (opts.content !== undefined) {
      return { config: parseManifest(opts.content, parseOptions) };
    }
    if (opts.path !== undefined) {
      return { config: loadManifestFile(opts.path, parseOptions) };
    }
  } catch (error) {
    return { error: errorResponse(error) };
  }
  return { error: jsonResponse({ success: false, error: 'Provide either path or content.' }) };
}
