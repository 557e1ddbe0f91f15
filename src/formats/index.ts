/**
 * Format Parsers — Barrel export
 */

export { parseJson, isJson, stripBom, stripLeadingNoise } from './json';
export { parseYaml, isYamlFile } from './yaml';

/**
 * Parse document text into a DocNode, choosing the parser by file name
 * and falling back to sniffing the content.
 */
import { DocNode } from '../core/types';
import { ParseError } from '../core/errors';
import { toDocument } from '../core/document';
import { isJson, parseJson } from './json';
import { isYamlFile, parseYaml } from './yaml';

export function parseDocumentText(input: string, artifact: string): DocNode {
  const useJson = /\.json$/i.test(artifact) || (!isYamlFile(artifact) && isJson(input));
  const value = useJson ? parseJson(input, artifact) : parseYaml(input, artifact);

  const document = toDocument(value, artifact);
  if (document.kind !== 'mapping') {
    throw new ParseError(artifact, 'expected a mapping at the top level');
  }
  return document;
}
