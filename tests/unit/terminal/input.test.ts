/**
 * InputDecoder Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { InputDecoder, formatInputBytes } from '../../../src/terminal/input.ts';

// ============================================
// Test Setup
// ============================================

function bytes(...values: number[]): Uint8Array {
  return Uint8Array.from(values);
}

function text(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

// ============================================
// Tests
// ============================================

describe('InputDecoder', () => {
  let decoder: InputDecoder;

  beforeEach(() => {
    decoder = new InputDecoder();
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Single Bytes
  // ─────────────────────────────────────────────────────────────────────────

  describe('single bytes', () => {
    test('printable bytes insert themselves', () => {
      expect(decoder.decode(text('a'))).toEqual({ type: 'insertChar', byte: 0x61 });
      expect(decoder.decode(bytes(0x20))).toEqual({ type: 'insertChar', byte: 0x20 });
      expect(decoder.decode(bytes(0x7e))).toEqual({ type: 'insertChar', byte: 0x7e });
    });

    test('DEL is delete-back', () => {
      expect(decoder.decode(bytes(0x7f))).toEqual({ type: 'deleteBack' });
    });

    test('LF and CR are newline', () => {
      expect(decoder.decode(bytes(0x0a))).toEqual({ type: 'newline' });
      expect(decoder.decode(bytes(0x0d))).toEqual({ type: 'newline' });
    });

    test('lone ESC quits', () => {
      expect(decoder.decode(bytes(0x1b))).toEqual({ type: 'quit' });
    });

    test('Ctrl+C quits', () => {
      expect(decoder.decode(bytes(0x03))).toEqual({ type: 'quit' });
    });

    test('tab inserts a tab by default', () => {
      expect(decoder.decode(bytes(0x09))).toEqual({ type: 'insertChar', byte: 0x09 });
    });

    test('tab is unrecognized when tab insertion is off', () => {
      const strict = new InputDecoder({ tabInsertsTab: false });
      expect(strict.decode(bytes(0x09))).toEqual({ type: 'unrecognized', bytes: bytes(0x09) });
    });

    test('other control bytes are unrecognized', () => {
      expect(decoder.decode(bytes(0x01))).toEqual({ type: 'unrecognized', bytes: bytes(0x01) });
      expect(decoder.decode(bytes(0x08))).toEqual({ type: 'unrecognized', bytes: bytes(0x08) });
    });

    test('high bytes are unrecognized', () => {
      expect(decoder.decode(bytes(0xc3))).toEqual({ type: 'unrecognized', bytes: bytes(0xc3) });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Escape Sequences
  // ─────────────────────────────────────────────────────────────────────────

  describe('escape sequences', () => {
    test('arrow keys move the cursor', () => {
      expect(decoder.decode(text('\x1b[A'))).toEqual({ type: 'moveCursor', direction: 'up' });
      expect(decoder.decode(text('\x1b[B'))).toEqual({ type: 'moveCursor', direction: 'down' });
      expect(decoder.decode(text('\x1b[C'))).toEqual({ type: 'moveCursor', direction: 'right' });
      expect(decoder.decode(text('\x1b[D'))).toEqual({ type: 'moveCursor', direction: 'left' });
    });

    test('other CSI finals are unrecognized', () => {
      expect(decoder.decode(text('\x1b[H'))).toEqual({ type: 'unrecognized', bytes: text('\x1b[H') });
    });

    test('SS3 arrows are unrecognized', () => {
      expect(decoder.decode(text('\x1bOA'))).toEqual({ type: 'unrecognized', bytes: text('\x1bOA') });
    });

    test('truncated sequence is unrecognized', () => {
      expect(decoder.decode(text('\x1b['))).toEqual({ type: 'unrecognized', bytes: text('\x1b[') });
    });

    test('arrow followed by more bytes is unrecognized', () => {
      expect(decoder.decode(text('\x1b[Ax'))).toEqual({ type: 'unrecognized', bytes: text('\x1b[Ax') });
    });

    test('longer CSI sequences are unrecognized', () => {
      expect(decoder.decode(text('\x1b[1;5C'))).toEqual({ type: 'unrecognized', bytes: text('\x1b[1;5C') });
    });

    test('ESC followed by a letter is unrecognized', () => {
      expect(decoder.decode(text('\x1bx'))).toEqual({ type: 'unrecognized', bytes: text('\x1bx') });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Chunks
  // ─────────────────────────────────────────────────────────────────────────

  describe('chunks', () => {
    test('several printable bytes in one read are unrecognized', () => {
      expect(decoder.decode(text('ab'))).toEqual({ type: 'unrecognized', bytes: text('ab') });
    });

    test('empty read is unrecognized', () => {
      expect(decoder.decode(bytes())).toEqual({ type: 'unrecognized', bytes: bytes() });
    });

    test('a rejected chunk does not affect the next one', () => {
      decoder.decode(text('\x1b['));
      expect(decoder.decode(text('A'))).toEqual({ type: 'insertChar', byte: 0x41 });
    });

    test('unrecognized bytes are a copy of the chunk', () => {
      const chunk = text('ab');
      const event = decoder.decode(chunk);
      chunk[0] = 0x7a;
      expect(event).toEqual({ type: 'unrecognized', bytes: text('ab') });
    });
  });
});

describe('formatInputBytes', () => {
  test('printable bytes verbatim', () => {
    expect(formatInputBytes(text('a ~'))).toBe('a ~');
  });

  test('other bytes as hex escapes', () => {
    expect(formatInputBytes(text('\x1b[A'))).toBe('\\x1b[A');
    expect(formatInputBytes(bytes(0x7f, 0x0a, 0xff))).toBe('\\x7f\\x0a\\xff');
  });

  test('empty input', () => {
    expect(formatInputBytes(bytes())).toBe('');
  });
});
