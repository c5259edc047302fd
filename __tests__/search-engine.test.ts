/**
 * Search with wraparound, continuation and cancellation
 */

import { SearchDirection } from '../src/types/session-types';
import { ErrorCategory } from '../src/utils/errors';
import { testUtils } from './setup';

const START = { line: 0, column: 0 };

describe('SearchEngine', () => {
  describe('Continuation', () => {
    test('should find back-to-back occurrences once each', async () => {
      const { search } = await testUtils.buildDocument(['000000000']);

      const columns: number[] = [];
      columns.push((await search.search('00', false, START, SearchDirection.FORWARD)).start);
      for (let i = 0; i < 3; i++) {
        columns.push((await search.next()).start);
      }

      expect(columns).toEqual([0, 2, 4, 6]);
      expect(search.getState()?.matchCount).toBe(4);
    });

    test('should wrap to the first match after the last', async () => {
      const { search } = await testUtils.buildDocument(['000000000']);
      await search.search('00', false, { line: 0, column: 6 }, SearchDirection.FORWARD);

      const wrapped = await search.next();
      expect(wrapped).toMatchObject({ line: 0, start: 0, end: 2, wrapped: true });
    });

    test('should flag wrapped only once the file end is crossed', async () => {
      const { search } = await testUtils.buildDocument(['alpha', 'needle one', 'beta', 'needle two', 'gamma']);

      expect(await search.search('needle', false, START, SearchDirection.FORWARD)).toMatchObject({
        line: 1,
        start: 0,
        text: 'needle',
        wrapped: false
      });
      expect(await search.next()).toMatchObject({ line: 3, wrapped: false });
      expect(await search.next()).toMatchObject({ line: 1, wrapped: true });
    });

    test('should find a single match again after a full cycle', async () => {
      const { search } = await testUtils.buildDocument(['x', 'only here', 'y']);

      expect(await search.search('only', false, START, SearchDirection.FORWARD)).toMatchObject({ line: 1, wrapped: false });
      expect(await search.next()).toMatchObject({ line: 1, start: 0, wrapped: true });
    });

    test('should search backwards and wrap to the end', async () => {
      const { search } = await testUtils.buildDocument(['alpha', 'needle one', 'beta', 'needle two', 'gamma']);

      expect(await search.search('needle', false, { line: 4, column: 0 }, SearchDirection.BACKWARD)).toMatchObject({
        line: 3,
        wrapped: false
      });
      expect(await search.next()).toMatchObject({ line: 1, wrapped: false });
      expect(await search.next()).toMatchObject({ line: 3, wrapped: true });
    });

    test('should step backwards within a line', async () => {
      const { search } = await testUtils.buildDocument(['000000000']);

      expect((await search.search('00', false, { line: 0, column: 8 }, SearchDirection.BACKWARD)).start).toBe(6);
      expect((await search.next()).start).toBe(4);
      expect((await search.previous()).start).toBe(6);
    });

    test('should resume from a position away from the current match', async () => {
      const { search } = await testUtils.buildDocument(['ERR a', 'b', 'ERR c', 'd', 'ERR e']);
      await search.search('ERR', false, START, SearchDirection.FORWARD);

      expect(await search.next({ line: 3, column: 0 })).toMatchObject({ line: 4, wrapped: false });
      expect(await search.previous({ line: 3, column: 0 })).toMatchObject({ line: 2, wrapped: false });
      expect(await search.next({ line: 2, column: 0 })).toMatchObject({ line: 4, wrapped: false });
    });
  });

  describe('Failures', () => {
    test('should report no match after a full cycle', async () => {
      const { search } = await testUtils.buildDocument(['alpha', 'beta']);

      await expect(search.search('zzz', false, START, SearchDirection.FORWARD)).rejects.toMatchObject({
        category: ErrorCategory.NoMatch
      });
      expect(search.currentMatch).toBeNull();
      await expect(search.next()).rejects.toMatchObject({ category: ErrorCategory.NoMatch });
    });

    test('should leave the previous search untouched on an invalid pattern', async () => {
      const { search } = await testUtils.buildDocument(['alpha', 'needle one']);
      await search.search('needle', false, START, SearchDirection.FORWARD);
      const generation = search.generation;

      await expect(search.search('(unclosed', true, START, SearchDirection.FORWARD)).rejects.toMatchObject({
        category: ErrorCategory.InvalidPattern
      });
      expect(search.getState()?.source).toBe('needle');
      expect(search.currentMatch).toMatchObject({ line: 1 });
      expect(search.generation).toBe(generation);
    });

    test('should reject an empty pattern', async () => {
      const { search } = await testUtils.buildDocument(['alpha']);

      await expect(search.search('', false, START, SearchDirection.FORWARD)).rejects.toMatchObject({
        category: ErrorCategory.InvalidPattern
      });
    });

    test('should stop when cancelled', async () => {
      const { search } = await testUtils.buildDocument(['alpha', 'beta']);
      const controller = new AbortController();
      controller.abort();

      await expect(
        search.search('beta', false, START, SearchDirection.FORWARD, { signal: controller.signal })
      ).rejects.toMatchObject({ category: ErrorCategory.Cancelled });
    });
  });

  describe('Matching', () => {
    test('should treat literal patterns literally and skip empty regex matches', async () => {
      const { search } = await testUtils.buildDocument(['a.c abc', 'axxb']);

      expect(await search.search('a.c', false, START, SearchDirection.FORWARD)).toMatchObject({ line: 0, start: 0 });
      expect(search.matchesInLine('a.c abc')).toEqual([{ start: 0, end: 3 }]);

      expect(await search.search('x*', true, START, SearchDirection.FORWARD)).toMatchObject({
        line: 1,
        start: 1,
        end: 3,
        text: 'xx'
      });
    });

    test('should be case-sensitive', async () => {
      const { search } = await testUtils.buildDocument(['Error', 'error']);

      expect(await search.search('error', false, START, SearchDirection.FORWARD)).toMatchObject({ line: 1 });
      expect(search.hasMatchInLine('ERROR')).toBe(false);
    });

    test('should report progress on long scans', async () => {
      const lines = Array.from({ length: 10 }, (_, i) => (i === 9 ? 'target' : `line ${i}`));
      const { search } = await testUtils.buildDocument(lines);
      const fractions: number[] = [];

      await search.search('target', false, START, SearchDirection.FORWARD, {
        onProgress: fraction => fractions.push(fraction)
      });

      expect(fractions).toEqual([4 / 11, 8 / 11]);
    });
  });
});
