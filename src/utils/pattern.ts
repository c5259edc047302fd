/**
 * @fileoverview Pattern compilation and in-line matching helpers
 */

import { MatchType } from '../types/session-types';
import { type Span } from '../types/common';
import { ErrorCategory, LogrokError } from './errors';

/** Characters that end a word */
export const WORD_DELIMITERS = ' \t:.,"\';()[]{}<>=+-*/&|^~!@#$%?';
/** Characters that end a WORD */
export const BIGWORD_DELIMITERS = ' \t';

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function characterClass(chars: string): string {
  return '[' + chars.replace(/[\]\\^\-[]/g, '\\$&') + ']';
}

function delimitersFor(matchType: MatchType): string {
  return matchType === MatchType.BIGWORD ? BIGWORD_DELIMITERS : WORD_DELIMITERS;
}

/**
 * Build the global regular expression for a mark pattern
 */
export function buildMarkRegExp(pattern: string, matchType: MatchType): RegExp {
  if (pattern.length === 0) {
    throw new LogrokError(ErrorCategory.InvalidArgument, 'Mark pattern is empty');
  }

  const literal = escapeRegExp(pattern);
  if (matchType === MatchType.TEXT) {
    return new RegExp(literal, 'g');
  }

  const boundary = characterClass(delimitersFor(matchType));
  return new RegExp(`(?<=^|${boundary})${literal}(?=$|${boundary})`, 'g');
}

/**
 * Compile a search pattern
 * @throws LogrokError(InvalidPattern)
 */
export function compileSearchPattern(pattern: string, isRegex: boolean): RegExp {
  if (pattern.length === 0) {
    throw new LogrokError(ErrorCategory.InvalidPattern, 'Search pattern is empty');
  }
  if (!isRegex) {
    return new RegExp(escapeRegExp(pattern), 'g');
  }

  try {
    return new RegExp(pattern, 'g');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LogrokError(ErrorCategory.InvalidPattern, reason, { pattern });
  }
}

/**
 * First non-empty match starting at or after `from`
 */
export function firstMatchFrom(regex: RegExp, text: string, from: number): Span | null {
  regex.lastIndex = Math.max(0, from);
  while (regex.lastIndex <= text.length) {
    const match = regex.exec(text);
    if (!match) return null;
    if (match[0].length > 0) {
      return { start: match.index, end: match.index + match[0].length };
    }
    regex.lastIndex = match.index + 1;
  }
  return null;
}

/**
 * All non-overlapping, non-empty matches, scanning from the start of the line
 */
export function findMatches(regex: RegExp, text: string): Span[] {
  const spans: Span[] = [];
  let from = 0;
  for (;;) {
    const span = firstMatchFrom(regex, text, from);
    if (!span) break;
    spans.push(span);
    from = span.end;
  }
  return spans;
}

export function hasMatch(regex: RegExp, text: string): boolean {
  return firstMatchFrom(regex, text, 0) !== null;
}

/**
 * Word under a column, or null when the column is on a delimiter or past the end
 */
export function wordAt(text: string, column: number, matchType: MatchType = MatchType.WORD): (Span & { text: string }) | null {
  const delimiters = delimitersFor(matchType);
  if (column < 0 || column >= text.length || delimiters.includes(text[column])) {
    return null;
  }

  let start = column;
  while (start > 0 && !delimiters.includes(text[start - 1])) start--;
  let end = column + 1;
  while (end < text.length && !delimiters.includes(text[end])) end++;

  return { start, end, text: text.slice(start, end) };
}

export function spanCovers(span: Span, column: number): boolean {
  return column >= span.start && column < span.end;
}
