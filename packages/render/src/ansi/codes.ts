/**
 * ANSI escape code constants
 */
export const ESC = '\x1b';
export const CSI = `${ESC}[`;

/**
 * Cursor control
 */
export const CURSOR = {
  /** Move cursor to (row, col) - 1-indexed */
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  /** Hide cursor */
  hide: `${CSI}?25l`,
  /** Show cursor */
  show: `${CSI}?25h`,
} as const;

/**
 * Screen control
 */
export const SCREEN = {
  /** Clear entire screen */
  clear: `${CSI}2J`,
  /** Enter alternate screen buffer */
  enterAlt: `${CSI}?1049h`,
  /** Exit alternate screen buffer */
  exitAlt: `${CSI}?1049l`,
  /** Enable line wrapping */
  enableWrap: `${CSI}?7h`,
  /** Disable line wrapping */
  disableWrap: `${CSI}?7l`,
} as const;

/**
 * Text styling
 */
export const STYLE = {
  /** Reset all attributes */
  reset: `${CSI}0m`,
  /** Bold on */
  bold: `${CSI}1m`,
  /** Dim on */
  dim: `${CSI}2m`,
  /** Italic on */
  italic: `${CSI}3m`,
  /** Underline on */
  underline: `${CSI}4m`,
  /** Blink on */
  blink: `${CSI}5m`,
  /** Inverse on */
  inverse: `${CSI}7m`,
  /** Strikethrough on */
  strikethrough: `${CSI}9m`,
} as const;
