/**
 * Viewport
 *
 * The window of the document shown on screen. Scrolls just enough to
 * keep the cursor inside the text area.
 */

import type { Size } from './renderer.ts';

export class Viewport {
  private topRow = 0;
  private leftCol = 0;

  get top(): number {
    return this.topRow;
  }

  get left(): number {
    return this.leftCol;
  }

  scrollToCursor(row: number, col: number, area: Size): void {
    const height = Math.max(1, area.height);
    const width = Math.max(1, area.width);

    if (row < this.topRow) {
      this.topRow = row;
    } else if (row >= this.topRow + height) {
      this.topRow = row - height + 1;
    }

    if (col < this.leftCol) {
      this.leftCol = col;
    } else if (col >= this.leftCol + width) {
      this.leftCol = col - width + 1;
    }
  }
}
