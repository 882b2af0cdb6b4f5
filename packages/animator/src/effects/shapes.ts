import type { StyleCode } from '@beatgrid/protocol';
import { fg, type Canvas } from '@beatgrid/render';

/**
 * Sine wave across the full width around row `y`
 */
export function wave(
  canvas: Canvas,
  layer: number,
  y: number,
  amplitude: number,
  frequency: number,
  phase: number,
  char: string = '~',
  code: StyleCode = fg('blue')
): void {
  for (let x = 0; x < canvas.width; x++) {
    const waveY = Math.trunc(y + amplitude * Math.sin(frequency * x + phase));
    canvas.setChar(layer, x, waveY, char, code);
  }
}

/**
 * Horizontal progress bar; `progress` is clamped to [0, 1]
 */
export function loadingBar(
  canvas: Canvas,
  layer: number,
  x: number,
  y: number,
  width: number,
  progress: number,
  code: StyleCode = fg('cyan'),
  fillChar: string = '█',
  emptyChar: string = '░'
): void {
  const filled = Math.floor(width * Math.max(0, Math.min(1, progress)));
  if (filled > 0) {
    canvas.setString(layer, x, y, fillChar.repeat(filled), code);
  }
  if (width - filled > 0) {
    canvas.setString(layer, x + filled, y, emptyChar.repeat(width - filled), code);
  }
}
