/**
 * Highlight Styles
 *
 * Fixed SGR attributes per highlight category.
 */

import type { HighlightCategory } from '../features/syntax/lexer.ts';
import { FG, STYLE, style } from '../terminal/ansi.ts';

export const CATEGORY_STYLES: Readonly<Record<HighlightCategory, string>> = {
  plain: '',
  blockComment: style(FG.brightBlack, STYLE.italic),
  lineComment: FG.brightBlack,
  stringLiteral: style(STYLE.bold, FG.yellow),
  identifier: style(STYLE.bold, FG.blue),
  number: FG.magenta,
  punctuation: FG.cyan,
};

export function styleFor(category: HighlightCategory): string {
  return CATEGORY_STYLES[category];
}
