/**
 * JSON Artifact Parser
 *
 * Parses JSON artifacts (documents and diff reports) into plain values.
 */

import { ParseError } from '../core/errors';

/**
 * Remove a leading BOM and surrounding whitespace.
 */
export function stripBom(input: string): string {
  const cleaned = input.trim();
  return cleaned.charCodeAt(0) === 0xfeff ? cleaned.substring(1).trim() : cleaned;
}

/**
 * Parse a JSON string into a JavaScript value.
 * Handles BOM markers and trailing commas (lenient mode).
 *
 * @param artifact - Name used in error messages
 */
export function parseJson(input: string, artifact: string = 'JSON input'): unknown {
  const cleaned = stripBom(input);

  try {
    return JSON.parse(cleaned);
  } catch (error) {
    // Try lenient parsing: strip trailing commas
    try {
      return JSON.parse(stripTrailingCommas(cleaned));
    } catch {
      throw new ParseError(artifact, error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Remove commas that directly precede a closing `]` or `}`. Text inside
 * string literals is left alone.
 */
export function stripTrailingCommas(input: string): string {
  let out = '';
  let inString = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      out += ch;
      if (ch === '\\') {
        out += input[i + 1] ?? '';
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === ',') {
      let next = i + 1;
      while (next < input.length && /\s/.test(input[next])) next++;
      if (input[next] === '}' || input[next] === ']') continue;
    }
    out += ch;
  }

  return out;
}

/**
 * Check if a string looks like JSON.
 */
export function isJson(input: string): boolean {
  const trimmed = stripBom(input);
  return (
    (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
    (trimmed.startsWith('[') && trimmed.endsWith(']'))
  );
}

/**
 * Drop anything a tool printed before the JSON body (log lines, banners).
 * The body is the first line opening an object, or an array of objects;
 * failing that, the text from the first `{`. Text without either is
 * returned unchanged.
 */
export function stripLeadingNoise(input: string): string {
  const cleaned = stripBom(input);

  const body = /^[ \t]*(?:\{|\[\s*[{\]])/m.exec(cleaned);
  if (body) return cleaned.substring(body.index).trim();

  const start = cleaned.indexOf('{');
  return start > 0 ? cleaned.substring(start) : cleaned;
}
