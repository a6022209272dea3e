import fs from 'fs';

/**
 * Parse a dotenv file into name/value pairs.
 * Handles:
 * - NAME=value and `export NAME=value`
 * - NAME="quoted value" (with \n, \t, \\ escapes)
 * - NAME='single quoted value' (taken literally)
 * - Comments (lines starting with #) and empty lines
 */
export function parseEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  return parseEnvContent(fs.readFileSync(filePath, 'utf-8'));
}

export function parseEnvContent(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim().replace(/^export\s+/, '');

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) {
      continue;
    }

    const key = trimmed.substring(0, eqIndex).trim();
    const rawValue = trimmed.substring(eqIndex + 1).trim();
    let value = rawValue;

    if (rawValue.length >= 2 && rawValue.startsWith('"') && rawValue.endsWith('"')) {
      value = rawValue
        .slice(1, -1)
        .replace(/\\n/g, '\n')
        .replace(/\\t/g, '\t')
        .replace(/\\\\/g, '\\');
    } else if (rawValue.length >= 2 && rawValue.startsWith("'") && rawValue.endsWith("'")) {
      value = rawValue.slice(1, -1);
    }

    if (key) {
      result[key] = value;
    }
  }

  return result;
}
