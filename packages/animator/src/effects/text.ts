import type { Style, StyleCode } from '@beatgrid/protocol';
import { styleCode, type Canvas } from '@beatgrid/render';
import type { Generator } from '../scene/generator.js';
import { pick, type RandomSource } from '../random/seeded-random.js';

/**
 * Generator data used by `typewriter`
 */
export interface TypewriterData {
  text: string;
  offset: number;
}

export interface TypewriterOptions {
  /** Characters revealed per beat */
  speed?: number;
  /** When false, only the offset advances */
  render?: boolean;
}

const CLEAR_COMMAND = /^\[##CLEAR\|(\d+);(\d+)\]?/;

/**
 * Reveal `text` a few characters per beat with a trailing `_` cursor.
 *
 * Only the line being typed is redrawn; finished lines stay on the layer.
 * `~` and `@` are pacing marks: they take a beat slot but are never drawn.
 * Text of the form `[##CLEAR|w;h]` blanks a w by h box instead.
 */
export function typewriter(
  canvas: Canvas,
  generator: Generator<TypewriterData>,
  layer: number,
  x: number,
  y: number,
  code: StyleCode,
  options: TypewriterOptions = {}
): void {
  const speed = options.speed ?? 3;
  const render = options.render ?? true;
  const text = generator.getData('text');
  const offset = generator.getData('offset') ?? 0;
  if (!text) return;

  const clear = CLEAR_COMMAND.exec(text);
  if (clear) {
    if (!render) return;
    const width = Number(clear[1]);
    const height = Number(clear[2]);
    for (let row = 0; row < height; row++) {
      canvas.setString(layer, x, y + row, ' '.repeat(width), code);
    }
    return;
  }

  let consumed = 0;
  for (const [lineNumber, line] of text.split('\n').entries()) {
    const lineOffset = offset - consumed;

    if (lineOffset >= 0 && lineOffset <= line.length && render) {
      let visible = line.slice(0, lineOffset);
      if (lineOffset < line.length) visible += '_';
      canvas.setString(layer, x, y + lineNumber, visible.replace(/[~@]/g, ''), code);
    }

    consumed += line.length + 1;
  }

  generator.setData({ offset: offset + speed });
}

/**
 * Alternate a `##` marker between two styles every beat
 */
export function blink(
  canvas: Canvas,
  layer: number,
  x: number,
  y: number,
  even: StyleCode,
  odd: StyleCode,
  beat: number
): void {
  canvas.setString(layer, x, y, '##', beat % 2 === 0 ? even : odd);
}

/**
 * Redraw `text` bold on even beats and plain on odd ones
 */
export function pulse(
  canvas: Canvas,
  layer: number,
  x: number,
  y: number,
  text: string,
  beat: number,
  style: Style
): void {
  const code = styleCode({ ...style, attrs: { ...style.attrs, bold: beat % 2 === 0 } });
  canvas.setString(layer, x, y, text, code);
}

/**
 * Show the first `progress` share of `text`, the rest as random characters
 */
export function scrambleReveal(
  canvas: Canvas,
  layer: number,
  x: number,
  y: number,
  text: string,
  progress: number,
  random: RandomSource,
  code: StyleCode,
  scrambleChars: string = '!@#$%^&*?<>/~'
): void {
  const glyphs = Array.from(text);
  const revealed = Math.floor(glyphs.length * Math.max(0, Math.min(1, progress)));
  const display = glyphs
    .map((glyph, i) => (i < revealed ? glyph : pick(random, Array.from(scrambleChars)) ?? glyph))
    .join('');
  canvas.setString(layer, x, y, display, code);
}
