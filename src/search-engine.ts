/**
 * @fileoverview Single-pattern search over every line of the file
 * @description Searches ignore the display mode and wrap around the file
 * ends. A forward continuation resumes at the end of the previous match, so
 * back-to-back occurrences are each found once. Scans yield to the event loop
 * every `yieldEvery` lines and stop when their signal fires.
 */

import { LineIndex } from './line-index';
import { SplitCache } from './split-cache';
import { SearchDirection } from './types/session-types';
import { type Position, type SearchMatch, type Span } from './types/common';
import { compileSearchPattern, findMatches, firstMatchFrom, hasMatch } from './utils/pattern';
import { ErrorCategory, LogrokError, throwIfAborted } from './utils/errors';
import { yieldToEventLoop } from './utils/background-task';
import { scoped } from './utils/logger';
import { type SearchProbe } from './line-state-table';

const log = scoped('SearchEngine');

export interface SearchOptions {
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

export interface SearchState {
  source: string;
  isRegex: boolean;
  direction: SearchDirection;
  regex: RegExp;
  /** Start of the current match */
  anchor: Position | null;
  /** End column of the current match */
  matchEnd: number;
  wrapped: boolean;
  /** Matches on the anchor line */
  matchCount: number;
}

class SearchEngine implements SearchProbe {
  public generation: number = 0;

  private index: LineIndex;
  private cache: SplitCache;
  private yieldEvery: number;
  private state: SearchState | null = null;
  private current: SearchMatch | null = null;

  constructor(index: LineIndex, cache: SplitCache, options: { yieldEvery?: number } = {}) {
    this.index = index;
    this.cache = cache;
    this.yieldEvery = Math.max(1, options.yieldEvery ?? 4096);
  }

  get active(): boolean {
    return this.state !== null;
  }

  getState(): Readonly<SearchState> | null {
    return this.state;
  }

  get currentMatch(): SearchMatch | null {
    return this.current;
  }

  /**
   * Start a new search. Fails before touching any state if the pattern does not compile.
   */
  async search(
    pattern: string,
    isRegex: boolean,
    from: Position,
    direction: SearchDirection,
    options: SearchOptions = {}
  ): Promise<SearchMatch> {
    const regex = compileSearchPattern(pattern, isRegex);

    this.state = {
      source: pattern,
      isRegex,
      direction,
      regex,
      anchor: null,
      matchEnd: 0,
      wrapped: false,
      matchCount: 0
    };
    this.current = null;
    this.generation++;
    log.debug(`New ${isRegex ? 'regex' : 'literal'} search "${pattern}" ${direction}`);

    const match = direction === SearchDirection.FORWARD
      ? await this._scanForward(regex, from.line, from.column, options)
      : await this._scanBackward(regex, from.line, from.column + 1, options);
    throwIfAborted(options.signal, 'Search');
    return this._accept(match);
  }

  /**
   * Continue in the search direction
   */
  async next(from: Position | null = null, options: SearchOptions = {}): Promise<SearchMatch> {
    const state = this._requireState();
    return this._continue(state, state.direction, from, options);
  }

  /**
   * Continue against the search direction
   */
  async previous(from: Position | null = null, options: SearchOptions = {}): Promise<SearchMatch> {
    const state = this._requireState();
    const reverse = state.direction === SearchDirection.FORWARD ? SearchDirection.BACKWARD : SearchDirection.FORWARD;
    return this._continue(state, reverse, from, options);
  }

  clear(): void {
    if (this.state) {
      this.state = null;
      this.current = null;
      this.generation++;
    }
  }

  hasMatchInLine(content: string): boolean {
    return this.state !== null && hasMatch(this.state.regex, content);
  }

  matchesInLine(content: string): Span[] {
    return this.state ? findMatches(this.state.regex, content) : [];
  }

  // =================== SCANNING ===================

  /**
   * Resume from the anchor while `from` still sits on it (or is not given);
   * otherwise from the first match strictly after, or before, `from`.
   */
  private async _continue(
    state: SearchState,
    direction: SearchDirection,
    from: Position | null,
    options: SearchOptions
  ): Promise<SearchMatch> {
    const anchor = state.anchor;
    let match: SearchMatch | null;
    if (anchor && (from === null || (from.line === anchor.line && from.column === anchor.column))) {
      match = direction === SearchDirection.FORWARD
        ? await this._scanForward(state.regex, anchor.line, state.matchEnd, options)
        : await this._scanBackward(state.regex, anchor.line, anchor.column, options);
    } else {
      const start = from ?? { line: 0, column: 0 };
      match = direction === SearchDirection.FORWARD
        ? await this._scanForward(state.regex, start.line, start.column + 1, options)
        : await this._scanBackward(state.regex, start.line, start.column, options);
    }
    throwIfAborted(options.signal, 'Search');
    return this._accept(match);
  }

  /**
   * First match starting at or after (line, column), wrapping once.
   * The start line is visited again at the end for matches before `column`.
   */
  private async _scanForward(regex: RegExp, line: number, column: number, options: SearchOptions): Promise<SearchMatch | null> {
    const total = this.index.lineCount;
    const startLine = this._clampLine(line);

    for (let step = 0; step <= total; step++) {
      await this._checkpoint(step, total, options);

      const current = (startLine + step) % total;
      const content = await this.cache.getLine(current);
      const wrapped = startLine + step >= total;

      if (step === 0) {
        const span = firstMatchFrom(regex, content, column);
        if (span) return this._match(regex, current, content, span, false);
      } else if (step === total) {
        const span = firstMatchFrom(regex, content, 0);
        if (span && span.start < column) return this._match(regex, current, content, span, true);
      } else {
        const span = firstMatchFrom(regex, content, 0);
        if (span) return this._match(regex, current, content, span, wrapped);
      }
    }
    return null;
  }

  /**
   * Last match starting before (line, column), wrapping once.
   * The start line is visited again at the end for matches at or after `column`.
   */
  private async _scanBackward(regex: RegExp, line: number, column: number, options: SearchOptions): Promise<SearchMatch | null> {
    const total = this.index.lineCount;
    const startLine = this._clampLine(line);

    for (let step = 0; step <= total; step++) {
      await this._checkpoint(step, total, options);

      const current = (((startLine - step) % total) + total) % total;
      const content = await this.cache.getLine(current);
      const wrapped = startLine - step < 0;
      const spans = findMatches(regex, content);

      let candidates: Span[];
      if (step === 0) {
        candidates = spans.filter(span => span.start < column);
      } else if (step === total) {
        candidates = spans.filter(span => span.start >= column);
      } else {
        candidates = spans;
      }

      const last = candidates[candidates.length - 1];
      if (last) {
        return this._match(regex, current, content, last, wrapped || step === total);
      }
    }
    return null;
  }

  private async _checkpoint(step: number, total: number, options: SearchOptions): Promise<void> {
    if (step > 0 && step % this.yieldEvery === 0) {
      options.onProgress?.(step / (total + 1));
      await yieldToEventLoop();
    }
    throwIfAborted(options.signal, 'Search');
  }

  private _match(regex: RegExp, line: number, content: string, span: Span, wrapped: boolean): SearchMatch {
    return {
      line,
      start: span.start,
      end: span.end,
      text: content.slice(span.start, span.end),
      wrapped,
      lineMatchCount: findMatches(regex, content).length
    };
  }

  private _accept(match: SearchMatch | null): SearchMatch {
    const state = this._requireState();
    if (!match) {
      state.anchor = null;
      this.current = null;
      throw new LogrokError(ErrorCategory.NoMatch, `No match for "${state.source}"`);
    }

    state.anchor = { line: match.line, column: match.start };
    state.matchEnd = match.end;
    state.wrapped = match.wrapped;
    state.matchCount = match.lineMatchCount;
    this.current = match;
    return match;
  }

  private _requireState(): SearchState {
    if (!this.state) {
      throw new LogrokError(ErrorCategory.NoMatch, 'No active search');
    }
    return this.state;
  }

  private _clampLine(line: number): number {
    return Math.max(0, Math.min(this.index.lineCount - 1, line));
  }
}

export { SearchEngine };
