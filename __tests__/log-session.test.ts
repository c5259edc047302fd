/**
 * Session commands and queries end to end
 */

import { LogSession } from '../src/log-session';
import { DisplayMode, MatchType, SearchDirection, StatusMessage } from '../src/types/session-types';
import { ErrorCategory } from '../src/utils/errors';
import { testUtils } from './setup';

jest.setTimeout(15000);

const LOG = [
  'boot sequence start',
  'config loaded',
  'ERROR disk quota exceeded',
  'worker 1 ready',
  'worker 2 ready',
  'DEBUG heartbeat',
  'request served',
  'ERROR upstream timeout',
  'DEBUG heartbeat',
  'shutdown requested'
];

describe('LogSession', () => {
  let session: LogSession;

  beforeEach(async () => {
    session = new LogSession();
    const filePath = await testUtils.createLogFile(LOG);
    await session.loadFile(filePath);
  });

  afterEach(async () => {
    await session.close();
  });

  describe('Loading', () => {
    test('should index the file and start in Normal mode', async () => {
      expect(session.getLineCount()).toBe(10);
      expect(session.getMode()).toBe(DisplayMode.NORMAL);
      expect(session.cursorPosition()).toEqual({ line: 0, column: 0 });
      expect(session.progress()).toBeNull();
      expect(await session.getLine(7)).toBe('ERROR upstream timeout');
    });

    test('should notify when a file is loaded', async () => {
      const handler = testUtils.createMockNotificationHandler();
      const other = new LogSession();
      other.onNotification(handler.handler);

      await other.loadFile(await testUtils.createLogFile(['one', 'two']));

      const loaded = handler.getByType('file_loaded');
      expect(loaded).toHaveLength(1);
      expect(loaded[0].metadata).toMatchObject({ lines: 2, bytes: 8 });
      await other.close();
    });

    test('should fail with an IO error for a missing file', async () => {
      const other = new LogSession();

      await expect(other.loadFile(testUtils.getTempFilePath('.missing'))).rejects.toMatchObject({
        category: ErrorCategory.IO
      });
    });

    test('should discard a cancelled load', async () => {
      const other = new LogSession();
      const controller = new AbortController();
      controller.abort();

      expect(await other.loadContent('a\nb\n', { signal: controller.signal })).toBe(false);
      expect(other.getLineCount()).toBe(0);
    });
  });

  describe('Marking and tagging', () => {
    test('should show exactly the tagged ERROR lines in Tagged mode', async () => {
      session.moveCursor(2, 1);
      expect(await session.toggleMark()).toBe(true);
      expect(session.getMarks()).toEqual([
        { id: 1, pattern: 'ERROR', matchType: MatchType.WORD, slot: 0, role: 'mark' }
      ]);

      expect(await session.tagLine(2, false)).toBe(true);
      expect(await session.setMode(1)).toBe(true);
      expect(session.getMode()).toBe(DisplayMode.TAGGED);

      expect(await testUtils.collect(session.visibleLines())).toEqual([2, 7]);

      const rows = await session.visibleRowsForViewport(0, 10, 80);
      expect(rows.map(row => [row.line, row.glyph])).toEqual([
        [2, '*'],
        [7, '*']
      ]);
      expect(rows[0]).toMatchObject({
        text: 'ERROR disk quota exceeded',
        tagGlyph: '*',
        hideGlyph: null,
        hiddenRows: 0,
        highlights: [{ start: 0, end: 5, kind: 'mark', slot: 0, role: 'tag' }]
      });
    });

    test('should toggle a tag mark back to a plain mark', async () => {
      session.moveCursor(2, 1);
      await session.toggleMark();
      await session.tagLine(2, false);
      await session.tagLine(2, false);

      expect(session.getMarks()[0].role).toBe('mark');
      expect((await session.getLineStatus(7)).markTag).toBe(false);
    });

    test('should hide mark matches unless a search finds them', async () => {
      session.moveCursor(5, 0);
      await session.toggleMark();
      expect(await session.hideLine(5, false)).toBe(true);

      expect(session.cursorPosition()).toEqual({ line: 6, column: 0 });
      expect(await testUtils.collect(session.visibleLines())).toEqual([0, 1, 2, 3, 4, 6, 7, 9]);

      const rows = await session.visibleRowsForViewport(0, 3, 80);
      expect(rows.map(row => row.line)).toEqual([0, 1, 2]);

      expect(await session.search('heartbeat', false, SearchDirection.FORWARD)).toBe(true);
      expect(session.cursorPosition()).toEqual({ line: 8, column: 6 });
      expect(await testUtils.collect(session.visibleLines())).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    test('should refuse an ambiguous selection without changing anything', async () => {
      await session.toggleMark({ pattern: 'disk quota' });
      await session.toggleMark({ pattern: 'quota' });
      session.moveCursor(2, 12);

      expect(await session.tagLine(2, false)).toBe(false);
      expect(session.statusMessage()).toBe(StatusMessage.AMBIGUOUS_SELECTION);
      expect((await session.getLineStatus(2)).manualTag).toBe(false);
      expect(session.getMarks().map(mark => mark.role)).toEqual(['mark', 'mark']);
      expect(session.peekUndo()).toMatchObject({ kind: 'markToggle', added: true });
    });

    test('should compose a literal mark from a selection', async () => {
      session.moveCursor(3, 0);
      expect(await session.extendSelection('end', 5)).toBe(true);
      expect(session.getPendingSelection()).toMatchObject({ line: 3, start: 0, end: 6 });

      expect(await session.commitSelection()).toBe(true);
      expect(session.getMarks().map(mark => [mark.pattern, mark.matchType])).toEqual([['worker', MatchType.TEXT]]);

      await session.tagLine(3, false);
      await session.setMode(1);
      expect(await testUtils.collect(session.visibleLines())).toEqual([3, 4]);
    });

    test('should cycle the colour of the mark under the cursor', async () => {
      session.moveCursor(2, 1);
      await session.toggleMark();

      expect(await session.cycleColor(1)).toBe(true);
      expect(session.getMarks()[0].slot).toBe(1);
    });

    test('should show manual glyphs ahead of mark glyphs', async () => {
      session.moveCursor(2, 1);
      await session.toggleMark();
      await session.tagLine(2, false);
      await session.tagLine(2, true);
      await session.setMode(-1);

      const rows = await session.visibleRowsForViewport(2, 1, 80);
      expect(rows[0]).toMatchObject({ line: 2, tagGlyph: 'T', hideGlyph: null, glyph: 'T' });
    });
  });

  describe('Display modes', () => {
    test('should refuse a mode with nothing to display', async () => {
      expect(await session.setMode(1)).toBe(false);
      expect(session.statusMessage()).toBe(StatusMessage.NOTHING_TO_DISPLAY);
      expect(session.getMode()).toBe(DisplayMode.NORMAL);
    });

    test('should stop at the least restrictive mode', async () => {
      expect(await session.setMode(-1)).toBe(true);
      expect(session.getMode()).toBe(DisplayMode.ALL);
      expect(await session.setMode(-1)).toBe(false);
      expect(session.statusMessage()).toBeNull();
    });

    test('should return to the cursor held before switching forward', async () => {
      session.moveCursor(2, 1);
      await session.toggleMark();
      await session.tagLine(2, false);
      session.moveCursor(5, 0);

      await session.setMode(1);
      expect(session.cursorPosition()).toEqual({ line: 7, column: 0 });

      await session.setMode(-1);
      expect(session.getMode()).toBe(DisplayMode.NORMAL);
      expect(session.cursorPosition()).toEqual({ line: 5, column: 0 });
    });
  });

  describe('Search', () => {
    test('should walk matches and report the wrap', async () => {
      expect(await session.search('heartbeat', false, SearchDirection.FORWARD)).toBe(true);
      expect(session.cursorPosition()).toEqual({ line: 5, column: 6 });

      await session.nextMatch();
      expect(session.cursorPosition()).toEqual({ line: 8, column: 6 });
      expect(session.statusMessage()).toBeNull();

      await session.nextMatch();
      expect(session.cursorPosition()).toEqual({ line: 5, column: 6 });
      expect(session.statusMessage()).toBe(StatusMessage.SEARCH_WRAPPED);

      await session.previousMatch();
      expect(session.cursorPosition()).toEqual({ line: 8, column: 6 });
      expect(session.statusMessage()).toBe(StatusMessage.SEARCH_WRAPPED);
    });

    test('should keep the cursor when nothing matches', async () => {
      session.moveCursor(4, 2);

      expect(await session.search('absent', false, SearchDirection.FORWARD)).toBe(false);
      expect(session.statusMessage()).toBe(StatusMessage.NO_MATCHES);
      expect(session.cursorPosition()).toEqual({ line: 4, column: 2 });
    });

    test('should keep the previous search on an invalid pattern', async () => {
      await session.search('served', false, SearchDirection.FORWARD);

      expect(await session.search('[unclosed', true, SearchDirection.FORWARD)).toBe(false);
      expect(session.statusMessage()).toBe(StatusMessage.INVALID_PATTERN);
      expect(session.getSearchState()?.source).toBe('served');
    });

    test('should turn the current match into a mark', async () => {
      await session.search('upstream', false, SearchDirection.FORWARD);
      expect(await session.markFromSearch()).toBe(true);

      expect(session.getMarks().map(mark => [mark.pattern, mark.matchType])).toEqual([['upstream', MatchType.TEXT]]);
      expect(session.getSearchState()).toBeNull();

      await session.undo();
      expect(session.getMarks()).toEqual([]);
    });

    test('should tag through the search match under the cursor', async () => {
      await session.search('quota', false, SearchDirection.FORWARD);
      expect(await session.tagLine(2, false)).toBe(true);

      expect(session.getMarks()).toEqual([
        expect.objectContaining({ pattern: 'quota', matchType: MatchType.TEXT, role: 'tag' })
      ]);
      expect((await session.getLineStatus(2)).markTag).toBe(true);
    });

    test('should continue from the cursor once it has left the current match', async () => {
      await session.loadContent(['ERR a', 'b', 'c', 'd', 'e', 'ERR f', 'g', 'h', 'i', 'ERR j'].join('\n'));
      await session.search('ERR', false, SearchDirection.FORWARD);
      expect(session.cursorPosition()).toEqual({ line: 0, column: 0 });

      session.moveCursor(6, 0);
      await session.nextMatch();
      expect(session.cursorPosition()).toEqual({ line: 9, column: 0 });

      session.moveCursor(2, 0);
      await session.nextMatch();
      expect(session.cursorPosition()).toEqual({ line: 5, column: 0 });
      expect(session.statusMessage()).toBeNull();

      session.moveCursor(7, 0);
      await session.previousMatch();
      expect(session.cursorPosition()).toEqual({ line: 5, column: 0 });
    });

    test('should discard a search superseded by a newer one', async () => {
      const [first, second] = await Promise.all([
        session.search('shutdown', false, SearchDirection.FORWARD),
        session.search('upstream', false, SearchDirection.FORWARD)
      ]);

      expect(first).toBe(false);
      expect(second).toBe(true);
      expect(session.cursorPosition()).toEqual({ line: 7, column: 6 });
      expect(session.getSearchState()?.source).toBe('upstream');
      expect(session.statusMessage()).toBeNull();
    });
  });

  describe('Notifications', () => {
    test('should deliver debug notifications without keeping them', async () => {
      const other = new LogSession({ indexChunkBytes: 16 });
      const handler = testUtils.createMockNotificationHandler();
      other.onNotification(handler.handler);

      await other.loadContent(LOG.join('\n'));

      expect(handler.getByType('index_progress').length).toBeGreaterThan(1);
      expect(other.getNotifications().map(notification => notification.type)).toEqual(['file_loaded']);
      await other.close();
    });

    test('should keep only the newest notifications', async () => {
      const other = new LogSession({ notificationLimit: 2 });
      await other.loadContent(LOG.join('\n'));

      for (const pattern of ['absent', 'missing', 'gone']) {
        await other.search(pattern, false, SearchDirection.FORWARD);
      }

      expect(other.getNotifications().map(notification => notification.metadata.command)).toEqual(['search', 'search']);
      expect(other.getNotifications().map(notification => notification.message)).toEqual([
        'No match for "missing"',
        'No match for "gone"'
      ]);
      await other.close();
    });
  });

  describe('Undo', () => {
    test('should restore a manual tag and then report an empty stack', async () => {
      await session.tagLine(5, true);
      expect((await session.getLineStatus(5)).manualTag).toBe(true);

      expect(await session.undo()).toBe(true);
      expect((await session.getLineStatus(5)).manualTag).toBe(false);

      expect(await session.undo()).toBe(false);
      expect(session.statusMessage()).toBe(StatusMessage.NOTHING_TO_UNDO);
    });

    test('should restore the indent column', async () => {
      expect(await session.setIndentColumn(4)).toBe(true);
      expect(session.getIndentColumn()).toBe(4);

      await session.undo();
      expect(session.getIndentColumn()).toBe(8);
      expect(await session.setIndentColumn(-1)).toBe(false);
    });

    test('should restore a removed mark with its role', async () => {
      session.moveCursor(2, 1);
      await session.toggleMark();
      await session.tagLine(2, false);
      await session.toggleMark();
      expect(session.getMarks()).toEqual([]);

      await session.undo();
      expect(session.getMarks()).toEqual([expect.objectContaining({ pattern: 'ERROR', role: 'tag' })]);
      expect((await session.getLineStatus(7)).markTag).toBe(true);
    });
  });

  describe('Reflow', () => {
    const LONG = 'x'.repeat(100);

    beforeEach(async () => {
      await session.loadContent(['short', LONG, 'after'].join('\n'));
    });

    test('should collapse an overlong line and expand it on toggle', async () => {
      let rows = await session.visibleRowsForViewport(0, 10, 40);
      expect(rows.map(row => [row.line, row.rowIndex])).toEqual([[0, 0], [1, 0], [2, 0]]);
      expect(rows[1].hiddenRows).toBe(2);

      await session.toggleFold(1);
      rows = await session.visibleRowsForViewport(0, 10, 40);
      expect(rows.map(row => [row.line, row.rowIndex])).toEqual([[0, 0], [1, 0], [1, 1], [1, 2], [2, 0]]);
      expect(rows[2].text).toBe(' '.repeat(8) + 'x'.repeat(32));
      expect(rows[3].text).toBe(' '.repeat(8) + 'x'.repeat(28));

      await session.toggleFold(1);
      expect((await session.getLineStatus(1)).fold).toBeNull();
    });

    test('should restore an adjusted row count after expanding', async () => {
      await session.visibleRowsForViewport(0, 10, 40);
      expect(await session.adjustFoldCount(1, 1)).toBe(true);
      expect((await session.getLineStatus(1)).fold).toEqual({ kind: 'collapsed', rowCount: 2 });

      await session.toggleFold(1);
      expect(await session.adjustFoldCount(1, 1)).toBe(false);
      await session.toggleFold(1);
      expect((await session.getLineStatus(1)).fold).toEqual({ kind: 'collapsed', rowCount: 2 });

      await session.undo();
      expect((await session.getLineStatus(1)).fold).toEqual({ kind: 'expanded', scrollOffset: 0, previousRowCount: 2 });
    });

    test('should keep at least one row and no more than the line needs', async () => {
      await session.visibleRowsForViewport(0, 10, 40);

      await session.adjustFoldCount(1, -5);
      expect((await session.getLineStatus(1)).fold).toEqual({ kind: 'collapsed', rowCount: 1 });
      await session.adjustFoldCount(1, 9);
      expect((await session.getLineStatus(1)).fold).toEqual({ kind: 'collapsed', rowCount: 3 });
    });

    test('should refuse to fold before anything is rendered', async () => {
      expect(await session.toggleFold(1)).toBe(false);
      expect(await session.adjustFoldCount(1, 1)).toBe(false);
      expect((await session.getLineStatus(1)).fold).toBeNull();
      expect(session.canUndo()).toBe(false);
    });

    test('should refuse to fold a line that fits on one row', async () => {
      await session.visibleRowsForViewport(0, 10, 40);

      expect(await session.toggleFold(0)).toBe(false);
      expect(await session.adjustFoldCount(2, 1)).toBe(false);
      expect((await session.getLineStatus(0)).fold).toBeNull();
      expect(session.canUndo()).toBe(false);
    });

    test('should count the first highlighted row in the default budget', async () => {
      await session.loadContent(['short', 'x'.repeat(75) + 'NEEDLE' + 'x'.repeat(19)].join('\n'));
      await session.toggleMark({ pattern: 'NEEDLE' });

      const rows = await session.visibleRowsForViewport(0, 10, 40);
      expect(rows.filter(row => row.line === 1).map(row => row.rowIndex)).toEqual([0, 1, 2]);

      expect(await session.adjustFoldCount(1, -1)).toBe(true);
      expect((await session.getLineStatus(1)).fold).toEqual({ kind: 'collapsed', rowCount: 2 });
    });

    test('should report a viewport that is too narrow', async () => {
      expect(await session.visibleRowsForViewport(0, 10, 10)).toEqual([]);
      expect(session.statusMessage()).toBe(StatusMessage.TERMINAL_TOO_SMALL);

      await session.visibleRowsForViewport(0, 10, 40);
      expect(session.statusMessage()).toBeNull();
    });
  });
});
