import { CURSOR, SCREEN, STYLE } from './codes.js';
import type { StyleCode } from '@beatgrid/protocol';

/**
 * Fluent ANSI escape sequence builder
 */
export class ANSIBuilder {
  private output: string = '';

  // Cursor movement (0-indexed terminal column and row)
  moveTo(col: number, row: number): this {
    this.output += CURSOR.moveTo(row + 1, col + 1);
    return this;
  }

  hideCursor(): this {
    this.output += CURSOR.hide;
    return this;
  }

  showCursor(): this {
    this.output += CURSOR.show;
    return this;
  }

  // Screen control
  clearScreen(): this {
    this.output += SCREEN.clear;
    return this;
  }

  enterAlternateScreen(): this {
    this.output += SCREEN.enterAlt;
    return this;
  }

  exitAlternateScreen(): this {
    this.output += SCREEN.exitAlt;
    return this;
  }

  disableLineWrap(): this {
    this.output += SCREEN.disableWrap;
    return this;
  }

  enableLineWrap(): this {
    this.output += SCREEN.enableWrap;
    return this;
  }

  // Styles
  resetAttributes(): this {
    this.output += STYLE.reset;
    return this;
  }

  /** Reset, then apply a style token so no earlier style bleeds in */
  setStyle(code: StyleCode): this {
    this.output += STYLE.reset + code;
    return this;
  }

  // Text output
  write(text: string): this {
    this.output += text;
    return this;
  }

  // Build and reset
  build(): string {
    const result = this.output;
    this.output = '';
    return result;
  }
}
