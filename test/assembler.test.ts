/**
 * Tests for the Spec Assembler
 */

import { assemblePaths, hasSuccessResponse, PLACEHOLDER_RESPONSE_DESCRIPTION } from '../src/core/assembler';
import { AffectedSet } from '../src/core/detector';
import { fromDocument, getIn, nodesEqual } from '../src/core/document';
import { OperationKeySet, formatOperationKey } from '../src/core/operation-key';
import { toJsonText } from '../src/core/serializer';
import { ChangeSource, OperationKey } from '../src/core/types';
import { api, doc, ok, ref } from './helpers';

const DEFAULTS = { synthesizeDefaultResponse: true, includePathLevelFields: true };

function affectedOf(...items: Array<[OperationKey, ChangeSource]>): AffectedSet {
  const set = new AffectedSet();
  for (const [key, source] of items) set.add(key, source);
  return set;
}

const GET_PET: OperationKey = { method: 'GET', path: '/pet' };
const PATCH_PET: OperationKey = { method: 'PATCH', path: '/pet' };

describe('Spec Assembler', () => {
  // ─── Decision Rule ────────────────────────────────────────────────────

  describe('Decision rule', () => {
    const after = api({
      '/pet': {
        get: ok('Pet'),
        patch: { summary: 'Update', requestBody: { content: { 'application/json': { schema: ref('Pet') } } }, ...ok('Pet') },
      },
    });

    test('includes a new verb on a legacy path and ignores the legacy verb', () => {
      const affected = affectedOf([GET_PET, 'modified'], [PATCH_PET, 'added']);
      const baseline = new OperationKeySet([GET_PET]);

      const { paths, decisions } = assemblePaths(after, affected, baseline, DEFAULTS);

      expect(fromDocument(paths)).toEqual({
        '/pet': {
          patch: {
            summary: 'Update',
            requestBody: { content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } } },
            responses: {
              '200': {
                description: 'ok',
                content: { 'application/json': { schema: { $ref: '#/components/schemas/Pet' } } },
              },
            },
          },
        },
      });
      expect(decisions.map((d) => `${d.decision} ${formatOperationKey(d.key)} (${d.reason})`)).toEqual([
        'IGNORE GET /pet (legacy operation in baseline)',
        'INCLUDE PATCH /pet (new operation)',
      ]);
    });

    test('copies the body verbatim, keeping references', () => {
      const affected = affectedOf([PATCH_PET, 'added']);
      const { paths } = assemblePaths(after, affected, new OperationKeySet(), DEFAULTS);

      const copied = getIn(paths, '/pet', 'patch');
      const original = getIn(after, 'paths', '/pet', 'patch');
      expect(copied && original && nodesEqual(copied, original)).toBe(true);
    });

    test('never visits unaffected operations', () => {
      const { paths, decisions } = assemblePaths(after, new AffectedSet(), new OperationKeySet(), DEFAULTS);
      expect(paths.entries.size).toBe(0);
      expect(decisions).toEqual([]);
    });

    test('does not modify the after document', () => {
      const before = toJsonText(after);
      assemblePaths(after, affectedOf([PATCH_PET, 'added']), new OperationKeySet(), DEFAULTS);
      expect(toJsonText(after)).toBe(before);
    });

    test('explains diff-only inclusions', () => {
      const { decisions } = assemblePaths(after, affectedOf([GET_PET, 'breaking']), new OperationKeySet(), DEFAULTS);
      expect(decisions[0].reason).toBe('changed operation (reported by diff)');
      expect(decisions[0].sources).toEqual(['breaking']);
    });
  });

  // ─── Removed Operations ───────────────────────────────────────────────

  describe('Removed operations', () => {
    test('reports legacy and non-legacy deletions distinctly', () => {
      const after = api({ '/pet': { get: ok() } });
      const affected = affectedOf(
        [{ method: 'DELETE', path: '/pet' }, 'removed'],
        [{ method: 'GET', path: '/old' }, 'removed']
      );
      const baseline = new OperationKeySet([{ method: 'DELETE', path: '/pet' }]);

      const { paths, decisions } = assemblePaths(after, affected, baseline, DEFAULTS);

      expect(paths.entries.size).toBe(0);
      expect(decisions.map((d) => [d.decision, formatOperationKey(d.key), d.reason])).toEqual([
        ['REMOVED', 'DELETE /pet', 'legacy operation deleted'],
        ['REMOVED', 'GET /old', 'operation deleted'],
      ]);
    });
  });

  // ─── Default Responses ────────────────────────────────────────────────

  describe('Default responses', () => {
    const after = api({
      '/orders': {
        post: { responses: { '400': { description: 'bad' } } },
        put: { summary: 'no responses' },
        get: { responses: { default: { description: 'any' } } },
      },
    });
    const all = affectedOf(
      [{ method: 'POST', path: '/orders' }, 'added'],
      [{ method: 'PUT', path: '/orders' }, 'added'],
      [{ method: 'GET', path: '/orders' }, 'added']
    );

    test('adds a placeholder when no success response is declared', () => {
      const { paths, decisions } = assemblePaths(after, all, new OperationKeySet(), DEFAULTS);

      expect(fromDocument(paths)).toEqual({
        '/orders': {
          post: {
            responses: {
              '400': { description: 'bad' },
              default: { description: PLACEHOLDER_RESPONSE_DESCRIPTION },
            },
          },
          put: {
            summary: 'no responses',
            responses: { default: { description: PLACEHOLDER_RESPONSE_DESCRIPTION } },
          },
          get: { responses: { default: { description: 'any' } } },
        },
      });
      expect(decisions.map((d) => d.synthesizedResponse)).toEqual([true, true, false]);
    });

    test('leaves bodies untouched when synthesis is off', () => {
      const { paths } = assemblePaths(after, all, new OperationKeySet(), {
        ...DEFAULTS,
        synthesizeDefaultResponse: false,
      });
      expect(fromDocument(getIn(paths, '/orders', 'put') ?? doc({}))).toEqual({ summary: 'no responses' });
    });

    test('recognises 2xx codes, 2XX and default', () => {
      expect(hasSuccessResponse(doc({ responses: { '201': {} } }))).toBe(true);
      expect(hasSuccessResponse(doc({ responses: { '2XX': {} } }))).toBe(true);
      expect(hasSuccessResponse(doc({ responses: { '404': {}, '302': {} } }))).toBe(false);
      expect(hasSuccessResponse(doc({}))).toBe(false);
    });
  });

  // ─── Path-level Fields ────────────────────────────────────────────────

  describe('Path-level fields', () => {
    const after = api({
      '/order/{id}': {
        parameters: [ref('OrderId', 'parameters')],
        'x-owner': 'store',
        delete: ok(),
      },
    });
    const affected = affectedOf([{ method: 'DELETE', path: '/order/{id}' }, 'modified']);

    test('copies path-level parameters alongside included operations', () => {
      const { paths } = assemblePaths(after, affected, new OperationKeySet(), DEFAULTS);
      expect(fromDocument(paths)).toEqual({
        '/order/{id}': {
          parameters: [{ $ref: '#/components/parameters/OrderId' }],
          delete: { responses: { '200': { description: 'ok' } } },
        },
      });
    });

    test('can leave path-level fields out', () => {
      const { paths } = assemblePaths(after, affected, new OperationKeySet(), {
        ...DEFAULTS,
        includePathLevelFields: false,
      });
      expect(fromDocument(paths)).toEqual({
        '/order/{id}': { delete: { responses: { '200': { description: 'ok' } } } },
      });
    });
  });
});
