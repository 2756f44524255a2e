/**
 * Editor
 *
 * The main loop: read one chunk, decode it into one event, apply the
 * event to the buffer, redraw. Reports from the decoder, the buffer and
 * the highlighter go to the debug log and the status line; none of them
 * stops the session.
 */

import type { Readable } from 'stream';
import { LF } from './core/coordinates.ts';
import { TextBuffer } from './core/text-buffer.ts';
import { Settings } from './config/settings.ts';
import { debugLog } from './debug.ts';
import { EditorError, OutOfRangeError, UnrecognizedInputError } from './errors.ts';
import { SyntaxHighlighter } from './features/syntax/highlighter.ts';
import { InputDecoder, formatInputBytes, type InputEvent } from './terminal/input.ts';
import { KeyReader } from './terminal/key-reader.ts';
import { Renderer, type Size } from './ui/renderer.ts';
import { StatusLine } from './ui/status-line.ts';

// ============================================
// Types
// ============================================

export interface EditorOptions {
  /** Document bytes to start with. Empty when absent */
  initialContent?: Uint8Array;
  /** Raw terminal input */
  input: Readable;
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Current terminal size */
  getSize: () => Size;
  settings?: Settings;
  /** Shown on the status line */
  fileName?: string;
}

export interface EditorResult {
  content: Uint8Array;
  modified: boolean;
}

// ============================================
// Editor
// ============================================

export class Editor {
  readonly buffer: TextBuffer;
  readonly highlighter: SyntaxHighlighter;
  readonly status = new StatusLine();

  private readonly decoder: InputDecoder;
  private readonly renderer: Renderer;
  private readonly reader: KeyReader;
  private readonly getSize: () => Size;

  constructor(options: EditorOptions) {
    const settings = options.settings ?? new Settings();

    this.buffer = new TextBuffer(options.initialContent);
    this.highlighter = new SyntaxHighlighter(this.buffer, (error) => this.report(error));
    this.decoder = new InputDecoder({ tabInsertsTab: settings.get('editor.tabInsertsTab') });
    this.getSize = options.getSize;
    this.renderer = new Renderer(options.getSize(), {
      output: options.output,
      statusLine: settings.get('editor.statusBar.visible'),
    });
    this.reader = new KeyReader(options.input);

    if (options.fileName) {
      this.status.setState({ fileName: options.fileName });
    }
  }

  /**
   * Run until a quit event or the end of input.
   */
  async run(): Promise<EditorResult> {
    this.reader.start();
    try {
      this.render();
      for (;;) {
        const chunk = await this.reader.read();
        if (chunk === null) {
          debugLog('[Editor] Input closed');
          break;
        }
        if (!this.handle(chunk)) break;
      }
    } finally {
      this.reader.stop();
      this.highlighter.dispose();
    }

    return { content: this.buffer.getBytes(), modified: this.buffer.isModified() };
  }

  /**
   * End the loop from outside (signals). The pending read returns null.
   */
  stop(): void {
    this.reader.stop();
  }

  /**
   * Process one input chunk. Returns false on quit.
   */
  handle(chunk: Uint8Array): boolean {
    this.status.setState({ lastInput: chunk });
    this.status.clearMessage();

    const event = this.decoder.decode(chunk);
    debugLog(`[Editor] ${formatInputBytes(chunk)} -> ${event.type}`);

    if (event.type === 'quit') {
      return false;
    }

    try {
      this.apply(event);
    } catch (error) {
      if (!(error instanceof OutOfRangeError)) throw error;
      this.report(error);
    }

    this.render();
    return true;
  }

  render(): void {
    this.renderer.resize(this.getSize());
    this.renderer.render({ buffer: this.buffer, highlighter: this.highlighter, status: this.status });
  }

  private apply(event: Exclude<InputEvent, { type: 'quit' }>): void {
    switch (event.type) {
      case 'insertChar':
        this.buffer.insertAtCursor(event.byte);
        break;
      case 'newline':
        this.buffer.insertAtCursor(LF);
        break;
      case 'deleteBack':
        this.buffer.deleteBackAtCursor();
        break;
      case 'moveCursor':
        this.buffer.moveCursor(event.direction);
        break;
      case 'unrecognized':
        this.report(new UnrecognizedInputError(event.bytes, formatInputBytes(event.bytes)));
        break;
    }
  }

  private report(error: EditorError): void {
    debugLog(`[Editor] ${error.name}: ${error.message}`);
    this.status.setMessage(error.message);
  }
}

/**
 * Create an editor and run it to completion.
 */
export function runEditor(options: EditorOptions): Promise<EditorResult> {
  return new Editor(options).run();
}
