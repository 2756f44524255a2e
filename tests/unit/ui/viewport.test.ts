/**
 * Viewport Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { Viewport } from '../../../src/ui/viewport.ts';

describe('Viewport', () => {
  const area = { width: 10, height: 4 };
  let viewport: Viewport;

  beforeEach(() => {
    viewport = new Viewport();
  });

  test('stays put while the cursor is visible', () => {
    viewport.scrollToCursor(3, 9, area);
    expect([viewport.top, viewport.left]).toEqual([0, 0]);
  });

  test('scrolls down and right just far enough', () => {
    viewport.scrollToCursor(6, 12, area);
    expect([viewport.top, viewport.left]).toEqual([3, 3]);
  });

  test('scrolls back up and left to the cursor', () => {
    viewport.scrollToCursor(20, 20, area);
    viewport.scrollToCursor(5, 2, area);
    expect([viewport.top, viewport.left]).toEqual([5, 2]);
  });

  test('a zero-sized area still follows the cursor', () => {
    viewport.scrollToCursor(2, 3, { width: 0, height: 0 });
    expect([viewport.top, viewport.left]).toEqual([2, 3]);
  });
});
