/**
 * Status Line
 *
 * Bottom row of the screen: a dump of the last input read, the latest
 * report, and the cursor position.
 */

import type { Position } from '../core/coordinates.ts';
import { STYLE, padToWidth, styled } from '../terminal/ansi.ts';
import { formatInputBytes } from '../terminal/input.ts';

export interface StatusLineState {
  lastInput: Uint8Array;
  cursor: Position;
  modified: boolean;
  fileName?: string;
}

export class StatusLine {
  private state: StatusLineState = {
    lastInput: new Uint8Array(0),
    cursor: { row: 0, col: 0 },
    modified: false,
  };
  private message: string | null = null;

  setState(state: Partial<StatusLineState>): void {
    this.state = { ...this.state, ...state };
  }

  getState(): StatusLineState {
    return { ...this.state };
  }

  /**
   * Show a message until it is replaced or cleared.
   */
  setMessage(message: string): void {
    this.message = message;
  }

  clearMessage(): void {
    this.message = null;
  }

  getMessage(): string | null {
    return this.message;
  }

  /**
   * Plain text of the line, exactly `width` characters.
   */
  compose(width: number): string {
    if (width <= 0) return '';

    const { lastInput, cursor, modified, fileName } = this.state;

    let left = ` ${formatInputBytes(lastInput)}`;
    if (this.message) {
      left += ` | ${this.message}`;
    }

    let right = '';
    if (fileName) {
      right += modified ? `${fileName} [+]  ` : `${fileName}  `;
    } else if (modified) {
      right += '[+]  ';
    }
    right += `Ln ${cursor.row + 1}, Col ${cursor.col + 1} `;

    if (right.length >= width) {
      return padToWidth(right, width);
    }
    return padToWidth(left, width - right.length) + right;
  }

  /**
   * The line in inverse video.
   */
  render(width: number): string {
    return styled(this.compose(width), STYLE.inverse);
  }
}
