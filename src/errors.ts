/**
 * Editor Errors
 *
 * Error taxonomy for the editor. Only StartupError is fatal; the others
 * are reported and the session keeps running.
 */

export type EditorErrorCode = 'STARTUP' | 'OUT_OF_RANGE' | 'HIGHLIGHT' | 'UNRECOGNIZED_INPUT';

export class EditorError extends Error {
  readonly code: EditorErrorCode;

  constructor(code: EditorErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The terminal cannot run the editor (TERM unset or not ANSI-capable).
 */
export class StartupError extends EditorError {
  constructor(message: string) {
    super('STARTUP', message);
  }
}

/**
 * A buffer primitive was given an offset outside the document.
 */
export class OutOfRangeError extends EditorError {
  readonly offset: number;
  readonly length: number;

  constructor(offset: number, length: number, detail?: string) {
    super('OUT_OF_RANGE', detail ?? `Offset ${offset} is outside the document (length ${length})`);
    this.offset = offset;
    this.length = length;
  }
}

/**
 * A byte that no rule of the grammar accepts.
 */
export class HighlightingError extends EditorError {
  readonly byte: number;
  readonly offset: number;

  constructor(byte: number, offset: number) {
    super('HIGHLIGHT', `Unable to highlight byte 0x${byte.toString(16).padStart(2, '0')} at offset ${offset}`);
    this.byte = byte;
    this.offset = offset;
  }
}

/**
 * An input chunk that maps to no edit event.
 */
export class UnrecognizedInputError extends EditorError {
  readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array, rendered: string) {
    super('UNRECOGNIZED_INPUT', `Unrecognized input: ${rendered}`);
    this.bytes = bytes;
  }
}
