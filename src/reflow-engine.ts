/**
 * @fileoverview Wrapping, indentation, folding and highlight resolution for one line
 * @description The first row of a line holds `width` characters; every
 * continuation row is padded to the indent column and holds
 * `width - indentColumn` characters. Lines that need more than one row are
 * folded: collapsed lines show a row budget, expanded ones every row from a
 * scroll offset.
 */

import { type FoldState, type HighlightSpan, type LayoutRow, type RowHighlight } from './types/common';
import { ErrorCategory, LogrokError } from './utils/errors';

/** Narrowest continuation row that is still usable */
export const MIN_CONTINUATION_WIDTH = 3;

export interface LayoutRequest {
  content: string;
  width: number;
  indentColumn: number;
  fold: FoldState | null;
  highlights: HighlightSpan[];
  defaultFoldRows: number;
}

export interface LineLayout {
  totalRows: number;
  /** Fold state in effect, null when the line fits on one row */
  fold: FoldState | null;
  rows: LayoutRow[];
}

export function minimumWidth(indentColumn: number): number {
  return indentColumn + MIN_CONTINUATION_WIDTH;
}

/**
 * Rows needed to show `length` characters
 */
export function countRows(length: number, width: number, indentColumn: number): number {
  if (length <= width) return 1;
  return Math.ceil((length - width) / (width - indentColumn)) + 1;
}

/**
 * Content column where a row starts
 */
export function rowStart(row: number, width: number, indentColumn: number): number {
  return row === 0 ? 0 : width + (row - 1) * (width - indentColumn);
}

export function rowForColumn(column: number, width: number, indentColumn: number): number {
  if (column < width) return 0;
  return Math.floor((column - width) / (width - indentColumn)) + 1;
}

/**
 * Owner of every character: index into `highlights`, or -1.
 * The shortest covering span wins; equal lengths go to the lower `order`.
 */
export function resolveHighlights(highlights: HighlightSpan[], length: number): Int32Array {
  const owners = new Int32Array(length).fill(-1);

  for (let i = 0; i < highlights.length; i++) {
    const span = highlights[i];
    const spanLength = span.end - span.start;
    for (let column = Math.max(0, span.start); column < Math.min(length, span.end); column++) {
      const owner = owners[column];
      if (owner === -1 || _beats(span, spanLength, highlights[owner])) {
        owners[column] = i;
      }
    }
  }

  return owners;
}

function _beats(candidate: HighlightSpan, candidateLength: number, incumbent: HighlightSpan): boolean {
  const incumbentLength = incumbent.end - incumbent.start;
  if (candidateLength !== incumbentLength) return candidateLength < incumbentLength;
  return candidate.order < incumbent.order;
}

/**
 * Collapsed row budget when the user has not set one
 */
export function defaultRowCount(owners: Int32Array, request: Pick<LayoutRequest, 'width' | 'indentColumn' | 'defaultFoldRows'>): number {
  const first = owners.findIndex(owner => owner !== -1);
  const needed = first === -1 ? 0 : rowForColumn(first, request.width, request.indentColumn) + 1;
  return Math.max(1, request.defaultFoldRows, needed);
}

/**
 * Lay out one line
 * @throws LogrokError(InvalidArgument) when the width leaves no room for continuation rows
 */
export function layout(request: LayoutRequest): LineLayout {
  const { content, width, indentColumn } = request;
  if (width < minimumWidth(indentColumn)) {
    throw new LogrokError(ErrorCategory.InvalidArgument, `Width ${width} is below ${minimumWidth(indentColumn)}`);
  }

  const totalRows = countRows(content.length, width, indentColumn);
  const owners = resolveHighlights(request.highlights, content.length);

  let fold: FoldState | null = null;
  let first = 0;
  let last = totalRows;

  if (totalRows > 1) {
    fold = request.fold ?? { kind: 'collapsed', rowCount: defaultRowCount(owners, request) };
    if (fold.kind === 'collapsed') {
      last = Math.min(totalRows, Math.max(1, fold.rowCount));
    } else {
      first = Math.min(totalRows - 1, Math.max(0, fold.scrollOffset));
    }
  }

  const rows: LayoutRow[] = [];
  for (let row = first; row < last; row++) {
    rows.push(_buildRow(request, owners, row));
  }
  rows[rows.length - 1].hiddenRows = totalRows - last;

  return { totalRows, fold, rows };
}

function _buildRow(request: LayoutRequest, owners: Int32Array, row: number): LayoutRow {
  const { content, width, indentColumn, highlights } = request;
  const start = rowStart(row, width, indentColumn);
  const end = Math.min(content.length, row === 0 ? width : start + width - indentColumn);
  const indent = row === 0 ? 0 : indentColumn;

  const rowHighlights: RowHighlight[] = [];
  let runStart = start;
  for (let column = start; column <= end; column++) {
    const owner = column < end ? owners[column] : -2;
    if (column > start && owner !== owners[column - 1]) {
      const previous = owners[column - 1];
      if (previous >= 0) {
        const span = highlights[previous];
        rowHighlights.push({
          start: runStart - start + indent,
          end: column - start + indent,
          kind: span.kind,
          slot: span.slot,
          role: span.role
        });
      }
      runStart = column;
    }
  }

  return {
    rowIndex: row,
    text: ' '.repeat(indent) + content.slice(start, end),
    column: start,
    indent,
    highlights: rowHighlights,
    hiddenRows: 0
  };
}
