/**
 * Text Buffer
 *
 * The document as a growable byte array plus the single edit cursor.
 * The cursor is tracked both as a byte offset and as (row, col); every
 * mutation and motion updates the two together.
 */

import { OutOfRangeError } from '../errors.ts';
import {
  LF,
  findLineEnd,
  findLineStart,
  offsetToPosition,
  type ByteSource,
  type Position,
} from './coordinates.ts';

// ============================================
// Types
// ============================================

export type Direction = 'up' | 'down' | 'left' | 'right';

export interface CursorState extends Position {
  offset: number;
}

export type EditCallback = (offset: number) => void;

const INITIAL_CAPACITY = 4096;

// ============================================
// Text Buffer
// ============================================

export class TextBuffer implements ByteSource {
  private data: Uint8Array;
  private size: number;
  private cursor: CursorState = { offset: 0, row: 0, col: 0 };
  private modified = false;
  private editCallbacks: Set<EditCallback> = new Set();

  constructor(initial?: Uint8Array) {
    const length = initial?.length ?? 0;
    this.data = new Uint8Array(Math.max(INITIAL_CAPACITY, length * 2));
    if (initial) {
      this.data.set(initial);
    }
    this.size = length;
  }

  static fromString(text: string): TextBuffer {
    return new TextBuffer(new TextEncoder().encode(text));
  }

  get length(): number {
    return this.size;
  }

  byteAt(offset: number): number {
    if (!Number.isInteger(offset) || offset < 0 || offset >= this.size) {
      throw new OutOfRangeError(offset, this.size);
    }
    return this.data[offset];
  }

  /**
   * Copy of the document bytes.
   */
  getBytes(): Uint8Array {
    return this.data.slice(0, this.size);
  }

  /**
   * View of a range, valid until the next edit.
   */
  view(start: number = 0, end: number = this.size): Uint8Array {
    return this.data.subarray(Math.max(0, start), Math.min(this.size, end));
  }

  getText(): string {
    return new TextDecoder().decode(this.view());
  }

  isModified(): boolean {
    return this.modified;
  }

  /**
   * Called with the offset of every edit.
   */
  onEdit(callback: EditCallback): () => void {
    this.editCallbacks.add(callback);
    return () => this.editCallbacks.delete(callback);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Primitives
  // ─────────────────────────────────────────────────────────────────────────

  insert(offset: number, byte: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.size) {
      throw new OutOfRangeError(offset, this.size);
    }
    if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
      throw new OutOfRangeError(offset, this.size, `Value ${byte} is not a byte`);
    }

    if (this.size === this.data.length) {
      const grown = new Uint8Array(this.data.length * 2);
      grown.set(this.data);
      this.data = grown;
    }

    this.data.copyWithin(offset + 1, offset, this.size);
    this.data[offset] = byte;
    this.size++;
    this.markEdited(offset);
  }

  /**
   * Backspace semantics: removes the byte before `offset`.
   * Returns false at offset 0.
   */
  deleteBefore(offset: number): boolean {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.size) {
      throw new OutOfRangeError(offset, this.size);
    }
    if (offset === 0) return false;

    this.data.copyWithin(offset - 1, offset, this.size);
    this.size--;
    this.markEdited(offset - 1);
    return true;
  }

  findLineStart(offset: number): number {
    return findLineStart(this, offset);
  }

  findLineEnd(offset: number): number {
    return findLineEnd(this, offset);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Cursor
  // ─────────────────────────────────────────────────────────────────────────

  getCursor(): CursorState {
    return { ...this.cursor };
  }

  setCursorOffset(offset: number): void {
    const { row, col } = offsetToPosition(this, offset);
    this.cursor = { offset, row, col };
  }

  /**
   * Move the cursor one step. Returns false when the move is absorbed
   * at a document or line boundary.
   */
  moveCursor(direction: Direction): boolean {
    switch (direction) {
      case 'up':
        return this.moveUp();
      case 'down':
        return this.moveDown();
      case 'left':
        return this.moveLeft();
      case 'right':
        return this.moveRight();
    }
  }

  insertAtCursor(byte: number): void {
    const { offset, row, col } = this.cursor;
    this.insert(offset, byte);
    this.cursor = byte === LF
      ? { offset: offset + 1, row: row + 1, col: 0 }
      : { offset: offset + 1, row, col: col + 1 };
  }

  deleteBackAtCursor(): boolean {
    const { offset, row, col } = this.cursor;
    if (offset === 0) return false;

    const removed = this.byteAt(offset - 1);
    this.deleteBefore(offset);

    if (removed === LF) {
      // Joined with the previous line
      const start = this.findLineStart(offset - 1);
      this.cursor = { offset: offset - 1, row: row - 1, col: offset - 1 - start };
    } else {
      this.cursor = { offset: offset - 1, row, col: col - 1 };
    }
    return true;
  }

  private moveUp(): boolean {
    const { offset, row, col } = this.cursor;
    if (row === 0) return false;

    const lineStart = offset - col;
    const previousStart = this.findLineStart(lineStart - 1);
    const previousLength = lineStart - 1 - previousStart;
    const newCol = Math.min(col, previousLength);

    this.cursor = { offset: previousStart + newCol, row: row - 1, col: newCol };
    return true;
  }

  private moveDown(): boolean {
    const { offset, row, col } = this.cursor;
    const lineEnd = this.findLineEnd(offset);
    // Last line: never advance past the document end
    if (lineEnd === this.size) return false;

    const nextStart = lineEnd + 1;
    const nextLength = this.findLineEnd(nextStart) - nextStart;
    const newCol = Math.min(col, nextLength);

    this.cursor = { offset: nextStart + newCol, row: row + 1, col: newCol };
    return true;
  }

  private moveLeft(): boolean {
    const { offset, row, col } = this.cursor;
    if (col === 0) return false;
    this.cursor = { offset: offset - 1, row, col: col - 1 };
    return true;
  }

  private moveRight(): boolean {
    const { offset, row, col } = this.cursor;
    if (offset === this.size || this.data[offset] === LF) return false;
    this.cursor = { offset: offset + 1, row, col: col + 1 };
    return true;
  }

  private markEdited(offset: number): void {
    this.modified = true;
    for (const callback of this.editCallbacks) {
      callback(offset);
    }
  }
}
