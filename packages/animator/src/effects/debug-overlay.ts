import { color16, fg, styleCode, type Canvas } from '@beatgrid/render';
import type { Generator } from '../scene/generator.js';

/** Columns taken by `debugOverlay` */
export const DEBUG_PANEL_WIDTH = 17;
const SCENE_ROWS = 6;
const PALETTE = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const;

function center(text: string, width: number): string {
  const clipped = text.slice(0, width);
  const left = Math.floor((width - clipped.length) / 2);
  return clipped.padStart(clipped.length + left).padEnd(width);
}

/**
 * Beat counters, active scenes, edit count, fps and the color palette,
 * drawn in a `DEBUG_PANEL_WIDTH`-column panel with its top-left corner at (x, y).
 *
 * The scene hosting the overlay is left out of the scene list.
 */
export function debugOverlay<TData extends object>(
  canvas: Canvas,
  generator: Generator<TData>,
  layer: number,
  x: number,
  y: number
): void {
  const highlight = fg('yellow', true);
  const plain = fg('green');
  const globalBeat = generator.manager?.currentBeat ?? 0;
  const localBeat = generator.scene?.internalBeat ?? 0;

  canvas.setString(
    layer,
    x,
    y,
    `${String(globalBeat).padStart(4)} g | ${String(localBeat).padStart(4)} l`,
    highlight
  );

  const scenes = (generator.manager?.activeScenes ?? []).filter((scene) => scene !== generator.scene);
  for (let row = 0; row < SCENE_ROWS; row++) {
    const scene = scenes[row];
    const label = scene ? `${scene.name} (${scene.activeGeneratorCount()})` : '';
    canvas.setString(layer, x, y + 1 + row, center(label, DEBUG_PANEL_WIDTH), plain);
  }

  canvas.setString(layer, x, y + 7, `  ${String(canvas.editsThisFrame).padStart(4)} e/f`, highlight);
  canvas.setString(layer, x, y + 8, ` ${canvas.stats.fps.toFixed(1).padStart(6)} fps`, highlight);

  for (let index = 0; index < 16; index++) {
    const name = PALETTE[index % 8] ?? 'white';
    const code = styleCode({ fg: color16(name), attrs: { bold: index >= 8 } });
    canvas.setChar(layer, x + (index % 8), y + 10 + Math.floor(index / 8), '█', code);
  }
}
