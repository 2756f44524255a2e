/**
 * Renderer
 *
 * Paints the visible part of the document with highlight styles, the
 * status line on the last row, and finally parks the terminal cursor on
 * the edit cursor. Each frame goes out in a single write.
 */

import { findLineEnd, lineStartOfRow } from '../core/coordinates.ts';
import type { TextBuffer } from '../core/text-buffer.ts';
import type { SyntaxHighlighter } from '../features/syntax/highlighter.ts';
import type { HighlightSpan } from '../features/syntax/lexer.ts';
import { CURSOR, SCREEN, STYLE } from '../terminal/ansi.ts';
import type { StatusLine } from './status-line.ts';
import { styleFor } from './theme.ts';
import { Viewport } from './viewport.ts';

// ============================================
// Types
// ============================================

export interface Size {
  width: number;
  height: number;
}

export interface RendererOptions {
  /** Output function. Defaults to process.stdout.write */
  output?: (data: string) => void;
  /** Reserve the last row for the status line */
  statusLine?: boolean;
}

export interface Frame {
  buffer: TextBuffer;
  highlighter: SyntaxHighlighter;
  status: StatusLine;
}

// ============================================
// Renderer Class
// ============================================

export class Renderer {
  private size: Size;
  private output: (data: string) => void;
  private showStatusLine: boolean;
  private viewport = new Viewport();

  constructor(size: Size, options: RendererOptions = {}) {
    this.size = size;
    this.output = options.output ?? ((data: string) => process.stdout.write(data));
    this.showStatusLine = options.statusLine ?? true;
  }

  getSize(): Size {
    return { ...this.size };
  }

  resize(size: Size): void {
    this.size = size;
  }

  getViewport(): Viewport {
    return this.viewport;
  }

  /**
   * Rows available to document text.
   */
  textHeight(): number {
    const reserved = this.showStatusLine ? 1 : 0;
    return Math.max(0, this.size.height - reserved);
  }

  render(frame: Frame): void {
    const { buffer, highlighter, status } = frame;
    const { width, height } = this.size;
    const textHeight = this.textHeight();
    const cursor = buffer.getCursor();

    this.viewport.scrollToCursor(cursor.row, cursor.col, { width, height: textHeight });
    const { top, left } = this.viewport;

    let output = CURSOR.hide;
    let lineStart = lineStartOfRow(buffer, top);

    for (let y = 0; y < textHeight; y++) {
      output += CURSOR.moveTo(y + 1, 1) + SCREEN.clearLine;
      if (lineStart === null) continue;

      const lineEnd = findLineEnd(buffer, lineStart);
      const from = Math.min(lineStart + left, lineEnd);
      const to = Math.min(from + width, lineEnd);
      output += this.renderSegment(buffer, highlighter.spansIn(from, to), from, to);

      lineStart = lineEnd < buffer.length ? lineEnd + 1 : null;
    }

    if (this.showStatusLine && height > 0) {
      status.setState({ cursor: { row: cursor.row, col: cursor.col }, modified: buffer.isModified() });
      output += CURSOR.moveTo(height, 1) + status.render(width);
    }

    output += CURSOR.moveTo(cursor.row - top + 1, cursor.col - left + 1) + CURSOR.show;
    this.output(output);
  }

  /**
   * Bytes [from, to) of one line, styled by the spans covering them.
   */
  private renderSegment(buffer: TextBuffer, spans: HighlightSpan[], from: number, to: number): string {
    let output = '';
    let current = '';
    let spanIndex = 0;

    for (let offset = from; offset < to; offset++) {
      while (spanIndex < spans.length && spans[spanIndex].end <= offset) {
        spanIndex++;
      }
      const span = spans[spanIndex];
      const code = styleFor(span && span.start <= offset ? span.category : 'plain');

      if (code !== current) {
        if (current) output += STYLE.reset;
        output += code;
        current = code;
      }
      output += displayChar(buffer.byteAt(offset));
    }

    if (current) output += STYLE.reset;
    return output;
  }
}

function displayChar(byte: number): string {
  if (byte >= 0x20 && byte <= 0x7e) return String.fromCharCode(byte);
  if (byte === 0x09) return ' ';
  return '?';
}

// ============================================
// Factory Functions
// ============================================

/**
 * Create a renderer that captures output (for testing).
 */
export function createTestRenderer(
  size: Size,
  options: Omit<RendererOptions, 'output'> = {}
): { renderer: Renderer; getOutput: () => string; clearOutput: () => void } {
  let captured = '';

  const renderer = new Renderer(size, {
    ...options,
    output: (data: string) => {
      captured += data;
    },
  });

  return {
    renderer,
    getOutput: () => captured,
    clearOutput: () => {
      captured = '';
    },
  };
}
