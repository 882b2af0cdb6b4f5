import type { StyleCode } from '@beatgrid/protocol';
import { fg, type Canvas } from '@beatgrid/render';
import { pick, randomInt, type RandomSource } from '../random/seeded-random.js';

export const NOISE_CHARS = "!@#$%^&*()_+-=[]{}|;':,.<>?/~`";
export const RAIN_CHARS = 'ﾊﾐﾋｰｳｼﾅﾓﾆｻﾜﾂｵﾘｱﾎﾃﾏｹﾒｴｶｷﾑﾕﾗｾﾈｽﾀﾇﾍ';

/**
 * Scatter `amount` random glyphs over the whole canvas
 */
export function noise(
  canvas: Canvas,
  layer: number,
  amount: number,
  random: RandomSource,
  codes: readonly StyleCode[] = [fg('white')],
  chars: string = NOISE_CHARS
): void {
  const glyphs = Array.from(chars);
  for (let i = 0; i < amount; i++) {
    const x = randomInt(random, 0, canvas.width - 1);
    const y = randomInt(random, 0, canvas.height - 1);
    const glyph = pick(random, glyphs);
    const code = pick(random, codes);
    if (glyph === undefined || code === undefined) return;
    canvas.setChar(layer, x, y, glyph, code);
  }
}

/**
 * Noise in warning colors
 */
export function glitch(
  canvas: Canvas,
  layer: number,
  intensity: number,
  random: RandomSource,
  chars: string = NOISE_CHARS
): void {
  noise(canvas, layer, intensity, random, [fg('red'), fg('yellow'), fg('green'), fg('magenta')], chars);
}

/**
 * Drop random glyphs down the given columns, each cell with a 15% chance
 */
export function matrixRain(
  canvas: Canvas,
  layer: number,
  columns: readonly number[],
  random: RandomSource,
  code: StyleCode = fg('green'),
  chars: string = RAIN_CHARS
): void {
  const glyphs = Array.from(chars);
  for (const column of columns) {
    if (column < 0 || column >= canvas.width) continue;
    for (let y = 0; y < canvas.height; y++) {
      if (random.next() >= 0.15) continue;
      const glyph = pick(random, glyphs);
      if (glyph !== undefined) canvas.setChar(layer, column, y, glyph, code);
    }
  }
}
