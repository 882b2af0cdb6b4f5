import type { Canvas } from '@beatgrid/render';
import { DEBUG_PANEL_WIDTH, Generator, Scene, debugOverlay } from '@beatgrid/animator';

/**
 * Overlay scene layered on top of the show; drawn on the given layer
 */
export function createDebugScene(canvas: Canvas, layer: number): Scene {
  const panel = new Generator({
    request: (generator) =>
      debugOverlay(canvas, generator, layer, canvas.width - DEBUG_PANEL_WIDTH, 0),
  });
  return new Scene('debug', [panel]);
}
