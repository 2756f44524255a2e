/**
 * Coordinate Translator
 *
 * Converts between linear byte offsets and zero-based (row, col)
 * positions by scanning for line breaks.
 */

import { OutOfRangeError } from '../errors.ts';

export const LF = 0x0a;

/**
 * Anything that can be read byte by byte.
 */
export interface ByteSource {
  readonly length: number;
  byteAt(offset: number): number;
}

export interface Position {
  row: number; // Line (0-indexed)
  col: number; // Bytes since the line start (0-indexed)
}

function assertOffset(source: ByteSource, offset: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > source.length) {
    throw new OutOfRangeError(offset, source.length);
  }
}

/**
 * Offset of the first byte of the line containing `offset`.
 */
export function findLineStart(source: ByteSource, offset: number): number {
  assertOffset(source, offset);
  let i = offset;
  while (i > 0 && source.byteAt(i - 1) !== LF) {
    i--;
  }
  return i;
}

/**
 * Offset of the line break ending the line containing `offset`, or the
 * document length on the last line.
 */
export function findLineEnd(source: ByteSource, offset: number): number {
  assertOffset(source, offset);
  let i = offset;
  while (i < source.length && source.byteAt(i) !== LF) {
    i++;
  }
  return i;
}

export function offsetToPosition(source: ByteSource, offset: number): Position {
  assertOffset(source, offset);
  let row = 0;
  let lineStart = 0;
  for (let i = 0; i < offset; i++) {
    if (source.byteAt(i) === LF) {
      row++;
      lineStart = i + 1;
    }
  }
  return { row, col: offset - lineStart };
}

/**
 * Offset of the first byte of `row`, or null past the last line.
 */
export function lineStartOfRow(source: ByteSource, row: number): number | null {
  if (!Number.isInteger(row) || row < 0) return null;
  let offset = 0;
  for (let current = 0; current < row; current++) {
    const end = findLineEnd(source, offset);
    if (end === source.length) return null;
    offset = end + 1;
  }
  return offset;
}

export function positionToOffset(source: ByteSource, position: Position): number {
  const start = lineStartOfRow(source, position.row);
  if (start === null) {
    throw new OutOfRangeError(-1, source.length, `Row ${position.row} is past the last line`);
  }
  const lineLength = findLineEnd(source, start) - start;
  if (!Number.isInteger(position.col) || position.col < 0 || position.col > lineLength) {
    throw new OutOfRangeError(
      start + position.col,
      source.length,
      `Column ${position.col} is outside row ${position.row} (length ${lineLength})`
    );
  }
  return start + position.col;
}

export function countLines(source: ByteSource): number {
  let lines = 1;
  for (let i = 0; i < source.length; i++) {
    if (source.byteAt(i) === LF) lines++;
  }
  return lines;
}
