/**
 * Key Reader
 *
 * Hands out terminal input one read at a time. Chunks that arrive while
 * the editor is busy rendering wait in a queue, so every read the
 * terminal delivered is decoded on its own.
 */

import type { Readable } from 'stream';
import { debugLog } from '../debug.ts';

interface PendingRead {
  resolve: (chunk: Uint8Array | null) => void;
  reject: (error: Error) => void;
}

export class KeyReader {
  private queue: Uint8Array[] = [];
  private waiting: PendingRead | null = null;
  private isRunning = false;
  private ended = false;
  private failure: Error | null = null;

  constructor(private readonly input: Readable) {}

  /**
   * Start listening for input.
   */
  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    this.input.on('data', this.handleData);
    this.input.on('end', this.handleEnd);
    this.input.on('error', this.handleError);
    this.input.resume();
  }

  /**
   * Stop listening for input. A pending read resolves with null.
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    this.input.removeListener('data', this.handleData);
    this.input.removeListener('end', this.handleEnd);
    this.input.removeListener('error', this.handleError);
    this.input.pause();
    this.handleEnd();
  }

  /**
   * Next chunk, or null once input has ended. Rejects after an input
   * error.
   */
  read(): Promise<Uint8Array | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve(null);

    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  private handleData = (data: Buffer | string): void => {
    const chunk = typeof data === 'string' ? new Uint8Array(Buffer.from(data)) : new Uint8Array(data);
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting.resolve(chunk);
    } else {
      this.queue.push(chunk);
    }
  };

  private handleEnd = (): void => {
    this.ended = true;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting.resolve(null);
    }
  };

  private handleError = (error: Error): void => {
    debugLog(`[KeyReader] Input error: ${error.message}`);
    this.failure = error;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting.reject(error);
    }
  };
}
