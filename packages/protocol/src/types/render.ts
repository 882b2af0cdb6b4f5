/**
 * Color representation for terminal rendering
 */
export type Color =
  | { type: 'default' }
  | { type: '16'; value: number }
  | { type: '256'; value: number }
  | { type: 'rgb'; value: [number, number, number] };

/**
 * Text attributes for terminal rendering
 */
export interface TextAttributes {
  bold: boolean;
  dim: boolean;
  italic: boolean;
  underline: boolean;
  blink: boolean;
  inverse: boolean;
  strikethrough: boolean;
}

/**
 * Readable description of a style, turned into a StyleCode by the renderer
 */
export interface Style {
  fg?: Color;
  bg?: Color;
  attrs?: Partial<TextAttributes>;
}

/**
 * Opaque style token attached to spans and cells.
 *
 * The buffer only ever compares codes with `===`; it never looks inside them.
 */
export type StyleCode = string;

/**
 * Style of a blank cell (no color, no attributes)
 */
export const BLANK_STYLE: StyleCode = '';

/**
 * Logical contents of one grid cell
 */
export interface Cell {
  readonly char: string;
  readonly code: StyleCode;
}

/**
 * Blank cell (space, no style)
 */
export const BLANK_CELL: Cell = Object.freeze({ char: ' ', code: BLANK_STYLE });
