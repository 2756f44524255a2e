/**
 * Syntax Highlighter
 *
 * Caches the spans of the last lexing pass and extends them lazily as
 * the renderer asks for more of the document. An edit drops every span
 * that could depend on the edited bytes; lexing resumes from the last
 * boundary before the edit.
 */

import type { HighlightingError } from '../../errors.ts';
import { debugLog } from '../../debug.ts';
import { isTerminated, tokenize, type HighlightErrorHandler, type HighlightSpan } from './lexer.ts';

/**
 * The document as the highlighter sees it.
 */
export interface HighlightSource {
  readonly length: number;
  view(): Uint8Array;
  onEdit(callback: (offset: number) => void): () => void;
}

export class SyntaxHighlighter {
  private spans: HighlightSpan[] = [];
  private reported: HighlightingError[] = [];
  private pending: Generator<HighlightSpan> | null = null;
  private unsubscribe: (() => void) | null;

  constructor(
    private readonly source: HighlightSource,
    private readonly onError?: HighlightErrorHandler
  ) {
    this.unsubscribe = source.onEdit((offset) => this.invalidate(offset));
  }

  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.pending = null;
  }

  /**
   * Forget everything that may depend on bytes at or after `offset`.
   * A span ending before the edit point was decided by bytes that are
   * still in place, so it survives.
   */
  invalidate(offset: number): void {
    this.pending = null;

    let keep = this.spans.length;
    while (keep > 0 && this.spans[keep - 1].end >= offset) {
      keep--;
    }
    this.spans.length = keep;

    const last = this.spans[keep - 1];
    if (last && !isTerminated(last, this.source.view())) {
      debugLog(`[Highlighter] Restart point ${last.end} is inside an open ${last.category}, relexing from 0`);
      this.spans = [];
    }

    const restart = this.lexedTo();
    this.reported = this.reported.filter((error) => error.offset < restart);
  }

  /**
   * Spans overlapping [start, end).
   */
  spansIn(start: number, end: number): HighlightSpan[] {
    this.ensure(end);

    const result: HighlightSpan[] = [];
    for (let i = this.firstSpanEndingAfter(start); i < this.spans.length; i++) {
      const span = this.spans[i];
      if (span.start >= end) break;
      result.push({ ...span });
    }
    return result;
  }

  /**
   * Spans for the whole document.
   */
  allSpans(): HighlightSpan[] {
    this.ensure(this.source.length);
    return this.spans.map((span) => ({ ...span }));
  }

  /**
   * Errors from the spans lexed so far.
   */
  errors(): HighlightingError[] {
    return [...this.reported];
  }

  private lexedTo(): number {
    const last = this.spans[this.spans.length - 1];
    return last ? last.end : 0;
  }

  private ensure(upTo: number): void {
    const target = Math.min(upTo, this.source.length);

    while (this.lexedTo() < target) {
      if (!this.pending) {
        this.pending = tokenize(this.source.view(), this.lexedTo(), (error) => this.report(error));
      }
      const next = this.pending.next();
      if (next.done) {
        this.pending = null;
        break;
      }
      this.spans.push(next.value);
    }
  }

  private report(error: HighlightingError): void {
    this.reported.push(error);
    this.onError?.(error);
  }

  private firstSpanEndingAfter(offset: number): number {
    let low = 0;
    let high = this.spans.length;
    while (low < high) {
      const mid = (low + high) >> 1;
      if (this.spans[mid].end <= offset) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
