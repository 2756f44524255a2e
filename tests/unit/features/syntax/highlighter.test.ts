/**
 * SyntaxHighlighter Tests
 */

import { describe, test, expect } from 'vitest';
import { SyntaxHighlighter, type HighlightSource } from '../../../../src/features/syntax/highlighter.ts';
import { tokenize } from '../../../../src/features/syntax/lexer.ts';
import { TextBuffer } from '../../../../src/core/text-buffer.ts';
import type { HighlightingError } from '../../../../src/errors.ts';

// ============================================
// Test Setup
// ============================================

function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * A source whose bytes can be swapped without an edit notification.
 */
function createFakeSource(text: string): HighlightSource & { replace: (next: string) => void } {
  let bytes = encode(text);
  const callbacks = new Set<(offset: number) => void>();
  return {
    get length() {
      return bytes.length;
    },
    view: () => bytes,
    onEdit(callback) {
      callbacks.add(callback);
      return () => callbacks.delete(callback);
    },
    replace(next: string) {
      bytes = encode(next);
    },
  };
}

function fullLex(buffer: TextBuffer) {
  return [...tokenize(buffer.getBytes())];
}

// ============================================
// Tests
// ============================================

describe('SyntaxHighlighter', () => {
  test('spansIn returns the spans overlapping the range', () => {
    const highlighter = new SyntaxHighlighter(TextBuffer.fromString('ab cd\nef'));

    expect(highlighter.spansIn(3, 6)).toEqual([
      { start: 3, end: 5, category: 'identifier' },
      { start: 5, end: 6, category: 'plain' },
    ]);
    expect(highlighter.spansIn(1, 3)).toEqual([
      { start: 0, end: 2, category: 'identifier' },
      { start: 2, end: 3, category: 'plain' },
    ]);
  });

  test('lexes only as far as requested', () => {
    const errors: HighlightingError[] = [];
    const highlighter = new SyntaxHighlighter(TextBuffer.fromString('ab `'), (error) => errors.push(error));

    highlighter.spansIn(0, 2);
    expect(errors).toEqual([]);

    highlighter.allSpans();
    expect(errors.map((error) => error.offset)).toEqual([3]);
    expect(highlighter.errors().map((error) => error.offset)).toEqual([3]);
  });

  test('edits after an error keep it without reporting it again', () => {
    const buffer = TextBuffer.fromString('`a b');
    const errors: HighlightingError[] = [];
    const highlighter = new SyntaxHighlighter(buffer, (error) => errors.push(error));

    highlighter.allSpans();
    buffer.insert(4, 0x63);
    expect(highlighter.allSpans()).toEqual(fullLex(buffer));

    expect(errors).toHaveLength(1);
    expect(highlighter.errors().map((error) => error.offset)).toEqual([0]);
  });

  test('deleting the offending byte clears its error', () => {
    const buffer = TextBuffer.fromString('a`');
    const highlighter = new SyntaxHighlighter(buffer);

    highlighter.allSpans();
    expect(highlighter.errors()).toHaveLength(1);

    buffer.deleteBefore(2);
    expect(highlighter.allSpans()).toEqual([{ start: 0, end: 1, category: 'identifier' }]);
    expect(highlighter.errors()).toEqual([]);
  });

  test('closing a block comment re-highlights what follows', () => {
    const buffer = TextBuffer.fromString('/* a b');
    const highlighter = new SyntaxHighlighter(buffer);
    expect(highlighter.allSpans()).toEqual([{ start: 0, end: 6, category: 'blockComment' }]);

    buffer.insert(4, 0x2a); // '*'
    buffer.insert(5, 0x2f); // '/'
    expect(highlighter.allSpans()).toEqual([
      { start: 0, end: 6, category: 'blockComment' },
      { start: 6, end: 7, category: 'plain' },
      { start: 7, end: 8, category: 'identifier' },
    ]);
  });

  test('extending an identifier at its end', () => {
    const buffer = TextBuffer.fromString('ab');
    const highlighter = new SyntaxHighlighter(buffer);
    highlighter.allSpans();

    buffer.insert(2, 0x63);
    expect(highlighter.allSpans()).toEqual([{ start: 0, end: 3, category: 'identifier' }]);
  });

  test('a restart point after an open span falls back to a full relex', () => {
    const source = createFakeSource('"ab');
    const highlighter = new SyntaxHighlighter(source);
    expect(highlighter.allSpans()).toEqual([{ start: 0, end: 3, category: 'stringLiteral' }]);

    source.replace('"abxyz');
    highlighter.invalidate(5);
    expect(highlighter.allSpans()).toEqual([{ start: 0, end: 6, category: 'stringLiteral' }]);
  });

  test('matches a full relex after every edit', () => {
    const buffer = TextBuffer.fromString('int a = 1; /* c */ "s" // x\nb');
    const highlighter = new SyntaxHighlighter(buffer);
    highlighter.allSpans();

    const edits: Array<() => void> = [
      () => buffer.insert(11, 0x2f),       // '/' before the comment
      () => buffer.deleteBefore(12),
      () => buffer.deleteBefore(18),       // drop the closing '/' of */
      () => buffer.insert(17, 0x2f),
      () => buffer.insert(19, 0x22),       // stray quote opens a string
      () => buffer.insert(0, 0x60),        // error byte at the start
      () => buffer.deleteBefore(buffer.length),
      () => buffer.insert(buffer.length, 0x0a),
      () => buffer.deleteBefore(1),
    ];

    for (const edit of edits) {
      edit();
      highlighter.spansIn(0, 5);
      expect(highlighter.allSpans()).toEqual(fullLex(buffer));
    }
  });

  test('dispose stops listening to edits', () => {
    const buffer = TextBuffer.fromString('ab');
    const highlighter = new SyntaxHighlighter(buffer);
    highlighter.allSpans();
    highlighter.dispose();

    buffer.insert(2, 0x63);
    expect(highlighter.allSpans()).toEqual([
      { start: 0, end: 2, category: 'identifier' },
      { start: 2, end: 3, category: 'identifier' },
    ]);
  });
});
