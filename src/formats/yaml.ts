/**
 * YAML Artifact Parser
 *
 * Parses YAML documents with the `yaml` library. Mappings come back as
 * `Map`s so key order survives exactly as written.
 */

import { isScalar, parseDocument, visit } from 'yaml';
import { ParseError } from '../core/errors';

/**
 * Parse a YAML string into nested `Map`s, arrays and scalars.
 * Mapping keys that resolve to anything but a string are kept as their
 * source text (`1.0:` stays `"1.0"`). Duplicate keys and syntax errors
 * raise a ParseError.
 *
 * @param artifact - Name used in error messages
 */
export function parseYaml(input: string, artifact: string = 'YAML input'): unknown {
  const doc = parseDocument(input, { uniqueKeys: true });

  if (doc.errors.length > 0) {
    throw new ParseError(artifact, doc.errors.map((e) => e.message).join('; '));
  }

  visit(doc, {
    Pair(_, pair) {
      const key = pair.key;
      if (isScalar(key) && typeof key.value !== 'string' && typeof key.source === 'string') {
        key.value = key.source;
      }
    },
  });

  try {
    return doc.toJS({ mapAsMap: true });
  } catch (error) {
    throw new ParseError(artifact, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Check if a file name has a YAML extension.
 */
export function isYamlFile(name: string): boolean {
  return /\.ya?ml$/i.test(name);
}
