import type { Style, StyleCode } from '@beatgrid/protocol';
import { BLANK_STYLE } from '@beatgrid/protocol';
import { STYLE } from './codes.js';
import { bgColor, color16, fgColor, type ColorName } from './colors.js';

/**
 * Build the style token for a style description.
 *
 * Equal descriptions always produce the identical string, so spans written
 * with separately built codes still coalesce.
 */
export function styleCode(style: Style): StyleCode {
  let code = '';
  const attrs = style.attrs;
  if (attrs?.bold) code += STYLE.bold;
  if (attrs?.dim) code += STYLE.dim;
  if (attrs?.italic) code += STYLE.italic;
  if (attrs?.underline) code += STYLE.underline;
  if (attrs?.blink) code += STYLE.blink;
  if (attrs?.inverse) code += STYLE.inverse;
  if (attrs?.strikethrough) code += STYLE.strikethrough;
  if (style.fg) code += fgColor(style.fg);
  if (style.bg) code += bgColor(style.bg);
  return code.length > 0 ? code : BLANK_STYLE;
}

/**
 * Shorthand for a 16-color foreground, optionally bold
 */
export function fg(name: ColorName, bold: boolean = false): StyleCode {
  return styleCode({ fg: color16(name), attrs: { bold } });
}
