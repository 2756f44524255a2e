/**
 * Highlighting Lexer
 *
 * Splits bytes into highlight spans for a small C-like grammar:
 * block and line comments, string literals, identifiers (letters only),
 * numbers and single-byte punctuation. Comments and strings left open
 * run to the end of input.
 */

import { HighlightingError } from '../../errors.ts';

// ============================================
// Types
// ============================================

export type HighlightCategory =
  | 'plain'
  | 'blockComment'
  | 'lineComment'
  | 'stringLiteral'
  | 'identifier'
  | 'number'
  | 'punctuation';

export interface HighlightSpan {
  start: number; // Byte offset (inclusive)
  end: number;   // Byte offset (exclusive)
  category: HighlightCategory;
}

export type HighlightErrorHandler = (error: HighlightingError) => void;

// ============================================
// Byte Classes
// ============================================

const SPACE = 0x20;
const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const SLASH = 0x2f;
const STAR = 0x2a;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

const PUNCTUATION = new Set([...'()[]{}=,;*&'].map((char) => char.charCodeAt(0)));

function isSpace(byte: number): boolean {
  return byte === SPACE || byte === TAB || byte === LF || byte === CR;
}

function isLatin(byte: number): boolean {
  return (byte >= 0x41 && byte <= 0x5a) || (byte >= 0x61 && byte <= 0x7a);
}

function isDigit(byte: number): boolean {
  return byte >= 0x30 && byte <= 0x39;
}

// ============================================
// Scanners
// ============================================

function scanWhile(source: Uint8Array, from: number, predicate: (byte: number) => boolean): number {
  let i = from;
  while (i < source.length && predicate(source[i])) {
    i++;
  }
  return i;
}

function scanBlockComment(source: Uint8Array, start: number): number {
  // The opener's star may close it: `/*/` is a whole comment
  for (let i = start + 1; i + 1 < source.length; i++) {
    if (source[i] === STAR && source[i + 1] === SLASH) {
      return i + 2;
    }
  }
  return source.length;
}

function scanLineComment(source: Uint8Array, bodyStart: number): number {
  return scanWhile(source, bodyStart, (byte) => byte !== LF && byte !== CR);
}

function scanStringLiteral(source: Uint8Array, bodyStart: number): number {
  for (let i = bodyStart; i < source.length; i++) {
    if (source[i] === QUOTE && source[i - 1] !== BACKSLASH) {
      return i + 1;
    }
  }
  return source.length;
}

// ============================================
// Tokenizer
// ============================================

/**
 * Lazily produce spans from `from` to the end of `source`. Bytes the
 * grammar does not accept are reported through `onError` and come out
 * as one-byte plain spans.
 */
export function* tokenize(
  source: Uint8Array,
  from: number = 0,
  onError?: HighlightErrorHandler
): Generator<HighlightSpan> {
  let p = from;

  while (p < source.length) {
    const byte = source[p];
    const next = p + 1 < source.length ? source[p + 1] : -1;
    let end: number;
    let category: HighlightCategory;

    if (isSpace(byte)) {
      end = scanWhile(source, p, isSpace);
      category = 'plain';
    } else if (byte === SLASH && next === STAR) {
      end = scanBlockComment(source, p);
      category = 'blockComment';
    } else if (byte === SLASH && next === SLASH) {
      end = scanLineComment(source, p + 2);
      category = 'lineComment';
    } else if (byte === QUOTE) {
      end = scanStringLiteral(source, p + 1);
      category = 'stringLiteral';
    } else if (isLatin(byte)) {
      end = scanWhile(source, p, isLatin);
      category = 'identifier';
    } else if (isDigit(byte)) {
      end = scanWhile(source, p, isDigit);
      category = 'number';
    } else if (PUNCTUATION.has(byte)) {
      end = p + 1;
      category = 'punctuation';
    } else {
      onError?.(new HighlightingError(byte, p));
      end = p + 1;
      category = 'plain';
    }

    yield { start: p, end, category };
    p = end;
  }
}

/**
 * Whether a comment or string span ends on its closing delimiter.
 * Other spans are always complete.
 */
export function isTerminated(span: HighlightSpan, source: Uint8Array): boolean {
  const { start, end } = span;
  switch (span.category) {
    case 'blockComment':
      return end - start >= 3 && source[end - 2] === STAR && source[end - 1] === SLASH;
    case 'lineComment':
      return end < source.length;
    case 'stringLiteral':
      return end - start >= 2 && source[end - 1] === QUOTE && source[end - 2] !== BACKSLASH;
    default:
      return true;
  }
}
