/**
 * Tests for the Change Detector
 */

import {
  detectChanges,
  detectStructuralChanges,
  findRemovedOperations,
  keysFromDiff,
  normalizeDiff,
  resolveLocator,
} from '../src/core/detector';
import { ParseError } from '../src/core/errors';
import { formatOperationKey } from '../src/core/operation-key';
import { AffectedOperation } from '../src/core/types';
import { api, ok } from './helpers';

function ids(ops: AffectedOperation[]): string[] {
  return ops.map((op) => formatOperationKey(op.key));
}

function entry(location: string | string[], side: 'source' | 'destination' = 'destination') {
  const details = [{ location }];
  return side === 'source'
    ? { sourceSpecEntityDetails: details, destinationSpecEntityDetails: [] }
    : { sourceSpecEntityDetails: [], destinationSpecEntityDetails: details };
}

describe('Change Detector', () => {
  // ─── Diff Normalisation ───────────────────────────────────────────────

  describe('normalizeDiff', () => {
    test('reads the three buckets in order', () => {
      const entries = normalizeDiff({
        breakingDifferences: [entry('paths./a.get')],
        nonBreakingDifferences: [entry('paths./b.get')],
        unclassifiedDifferences: [entry('paths./c.get')],
      });

      expect(entries.map((e) => e.bucket)).toEqual(['breaking', 'non-breaking', 'unclassified']);
      expect(entries[0].destinationSpecEntityDetails[0].location).toBe('paths./a.get');
    });

    test('falls back to a single differences list', () => {
      const entries = normalizeDiff({ breakingDifferences: [], differences: [entry('paths./a.get')] });
      expect(entries).toHaveLength(1);
      expect(entries[0].bucket).toBe('unclassified');
    });

    test('accepts a bare list and skips entries that are not objects', () => {
      const entries = normalizeDiff([entry('paths./a.get'), 'noise', 42]);
      expect(entries).toHaveLength(1);
    });

    test('treats null as an empty diff', () => {
      expect(normalizeDiff(null)).toEqual([]);
      expect(normalizeDiff(undefined)).toEqual([]);
    });

    test('rejects a scalar report', () => {
      expect(() => normalizeDiff('oops')).toThrow(ParseError);
    });
  });

  // ─── Locator Resolution ───────────────────────────────────────────────

  describe('resolveLocator', () => {
    test('takes the method and path prefix of a dotted locator', () => {
      expect(resolveLocator('paths./pet/{petId}.get.parameters.0')).toEqual({
        path: '/pet/{petId}',
        method: 'GET',
      });
    });

    test('stops at the path when no verb follows', () => {
      expect(resolveLocator('paths./pet')).toEqual({ path: '/pet' });
      expect(resolveLocator('paths./pet.parameters.0')).toEqual({ path: '/pet' });
    });

    test('recovers paths containing dots from the known path keys', () => {
      const known = new Set(['/v1.0/pets']);
      expect(resolveLocator('paths./v1.0/pets.post.requestBody', known)).toEqual({
        path: '/v1.0/pets',
        method: 'POST',
      });
    });

    test('accepts token arrays', () => {
      expect(resolveLocator(['paths', '/files/{name}.json', 'put', 'responses'])).toEqual({
        path: '/files/{name}.json',
        method: 'PUT',
      });
    });

    test('ignores locators outside paths', () => {
      expect(resolveLocator('components.schemas.Pet')).toBeUndefined();
      expect(resolveLocator('paths')).toBeUndefined();
      expect(resolveLocator('paths.')).toBeUndefined();
    });
  });

  // ─── Phase 1 ──────────────────────────────────────────────────────────

  describe('keysFromDiff', () => {
    const before = api({ '/pet': { get: ok(), delete: ok() } });
    const after = api({ '/pet': { get: ok(), put: ok() }, '/store': { get: ok(), post: ok() } });

    test('maps entries onto operation keys with their bucket', () => {
      const ops = keysFromDiff(
        { breakingDifferences: [entry('paths./pet.get.responses.200')] },
        before,
        after
      );
      expect(ops).toEqual([{ key: { method: 'GET', path: '/pet' }, sources: ['breaking'] }]);
    });

    test('expands a path-level locator to every operation under the path', () => {
      const ops = keysFromDiff({ nonBreakingDifferences: [entry('paths./store')] }, before, after);
      expect(ids(ops)).toEqual(['GET /store', 'POST /store']);
    });

    test('reads source-side locators for removed operations', () => {
      const ops = keysFromDiff(
        { breakingDifferences: [entry('paths./pet.delete', 'source')] },
        before,
        after
      );
      expect(ids(ops)).toEqual(['DELETE /pet']);
    });

    test('contributes nothing for an absent diff', () => {
      expect(keysFromDiff(null, before, after)).toEqual([]);
    });
  });

  // ─── Phase 2 ──────────────────────────────────────────────────────────

  describe('detectStructuralChanges', () => {
    test('flags new operations and any structural difference', () => {
      const before = api({
        '/pet': { get: { description: 'List', ...ok() }, post: ok() },
      });
      const after = api({
        '/pet': { get: { description: 'List all pets', ...ok() }, post: ok(), patch: ok() },
      });

      expect(detectStructuralChanges(before, after)).toEqual([
        { key: { method: 'GET', path: '/pet' }, sources: ['modified'] },
        { key: { method: 'PATCH', path: '/pet' }, sources: ['added'] },
      ]);
    });

    test('ignores mapping key order', () => {
      const before = api({ '/pet': { get: { summary: 's', ...ok() } } });
      const after = api({ '/pet': { get: { ...ok(), summary: 's' } } });
      expect(detectStructuralChanges(before, after)).toEqual([]);
    });

    test('lists operations that disappeared', () => {
      const before = api({ '/pet': { get: ok(), delete: ok() }, '/old': { get: ok() } });
      const after = api({ '/pet': { get: ok() } });
      expect(findRemovedOperations(before, after).map(formatOperationKey)).toEqual([
        'DELETE /pet',
        'GET /old',
      ]);
    });
  });

  // ─── Union ────────────────────────────────────────────────────────────

  describe('detectChanges', () => {
    test('unions both phases and records every source', () => {
      const before = api({ '/pet': { get: { summary: 'a', ...ok() } }, '/gone': { get: ok() } });
      const after = api({ '/pet': { get: { summary: 'b', ...ok() }, post: ok() } });

      const affected = detectChanges(
        { breakingDifferences: [entry('paths./pet.get.summary')] },
        before,
        after
      );

      expect(affected.toArray()).toEqual([
        { key: { method: 'GET', path: '/pet' }, sources: ['breaking', 'modified'] },
        { key: { method: 'POST', path: '/pet' }, sources: ['added'] },
        { key: { method: 'GET', path: '/gone' }, sources: ['removed'] },
      ]);
    });

    test('catches changes the diff missed', () => {
      const before = api({ '/pet/findByStatus': { get: { description: 'old', ...ok() } } });
      const after = api({ '/pet/findByStatus': { get: { description: 'new', ...ok() } } });

      const affected = detectChanges({ breakingDifferences: [] }, before, after);
      expect(affected.has({ method: 'GET', path: '/pet/findByStatus' })).toBe(true);
    });
  });
});
