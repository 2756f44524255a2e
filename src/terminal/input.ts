/**
 * Input Decoder
 *
 * Classifies one raw read from the terminal into one edit event. The
 * terminal delivers a whole arrow-key sequence (ESC [ A..D) in a single
 * read, so a lone ESC byte is the quit key and no timeout is used.
 */

import type { Direction } from '../core/text-buffer.ts';

// ============================================
// Types
// ============================================

export type InputEvent =
  | { type: 'insertChar'; byte: number }
  | { type: 'deleteBack' }
  | { type: 'newline' }
  | { type: 'moveCursor'; direction: Direction }
  | { type: 'quit' }
  | { type: 'unrecognized'; bytes: Uint8Array };

type DecoderState =
  | { kind: 'idle' }
  | { kind: 'inEscape'; consumed: number };

export interface InputDecoderOptions {
  /** Tab inserts a tab byte instead of being unrecognized */
  tabInsertsTab?: boolean;
}

// ============================================
// Constants
// ============================================

const ESC_BYTE = 0x1b;
const BRACKET = 0x5b; // '['
const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const DEL = 0x7f;
const CTRL_C = 0x03;

// Final byte of ESC [ x
const ARROW_KEYS: Record<number, Direction> = {
  0x41: 'up',    // A
  0x42: 'down',  // B
  0x43: 'right', // C
  0x44: 'left',  // D
};

const QUIT: InputEvent = { type: 'quit' };

// ============================================
// Decoder
// ============================================

export class InputDecoder {
  private state: DecoderState = { kind: 'idle' };
  private readonly tabInsertsTab: boolean;

  constructor(options: InputDecoderOptions = {}) {
    this.tabInsertsTab = options.tabInsertsTab ?? true;
  }

  /**
   * Decode one read. Never throws; anything unknown comes back as an
   * `unrecognized` event carrying the bytes.
   */
  decode(chunk: Uint8Array): InputEvent {
    this.state = { kind: 'idle' };

    for (let i = 0; i < chunk.length; i++) {
      const result = this.step(chunk[i], i === chunk.length - 1);
      if (result === 'reject') break;
      if (result) {
        this.state = { kind: 'idle' };
        return result;
      }
    }

    this.state = { kind: 'idle' };
    return { type: 'unrecognized', bytes: chunk.slice() };
  }

  /**
   * Advance the state machine by one byte. Returns an event when the
   * chunk is complete, 'reject' when it can no longer match, and null
   * while a sequence is in progress.
   */
  private step(byte: number, isLast: boolean): InputEvent | 'reject' | null {
    const state = this.state;

    if (state.kind === 'idle') {
      if (byte === ESC_BYTE) {
        this.state = { kind: 'inEscape', consumed: 1 };
        return isLast ? QUIT : null;
      }
      if (!isLast) return 'reject';
      return this.decodeSingle(byte) ?? 'reject';
    }

    if (state.consumed === 1) {
      if (byte !== BRACKET || isLast) return 'reject';
      this.state = { kind: 'inEscape', consumed: 2 };
      return null;
    }

    const direction = ARROW_KEYS[byte];
    if (direction === undefined || !isLast) return 'reject';
    return { type: 'moveCursor', direction };
  }

  private decodeSingle(byte: number): InputEvent | null {
    if (byte >= 0x20 && byte <= 0x7e) {
      return { type: 'insertChar', byte };
    }
    switch (byte) {
      case DEL:
        return { type: 'deleteBack' };
      case LF:
      case CR: // Enter arrives as CR once ICRNL is off
        return { type: 'newline' };
      case CTRL_C: // Raw mode turns off the signal
        return QUIT;
      case TAB:
        return this.tabInsertsTab ? { type: 'insertChar', byte } : null;
      default:
        return null;
    }
  }
}

/**
 * Render raw input for the status line: printable bytes as-is, the
 * rest as \xHH.
 */
export function formatInputBytes(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    if (byte >= 0x20 && byte <= 0x7e) {
      out += String.fromCharCode(byte);
    } else {
      out += `\\x${byte.toString(16).padStart(2, '0')}`;
    }
  }
  return out;
}
