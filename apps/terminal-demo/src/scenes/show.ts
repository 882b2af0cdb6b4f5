import type { Canvas } from '@beatgrid/render';
import { SceneManager, type BeatEvent, type RandomSource } from '@beatgrid/animator';
import { createDebugScene } from './debug.js';
import { createIntroScene, INTRO_BEATS } from './intro.js';
import { createStormScene, STORM_BEATS } from './storm.js';

export interface ShowOptions {
  debug: boolean;
  /** Number of intro/storm rounds before the intro stays on */
  cycles?: number;
}

/**
 * Wipe every layer, then make `name` the primary scene
 */
const cutTo = (canvas: Canvas, beat: number, name: string): BeatEvent => ({
  beat,
  run: (manager) => {
    canvas.clearAll();
    manager.startScene(name);
  },
});

/**
 * Scene manager for the demo, already showing the first frame of the intro
 */
export function createShow(canvas: Canvas, random: RandomSource, options: ShowOptions): SceneManager {
  const cycle = INTRO_BEATS + STORM_BEATS;
  const events: BeatEvent[] = [];
  for (let round = 0; round < (options.cycles ?? 32); round++) {
    events.push(cutTo(canvas, round * cycle + INTRO_BEATS, 'storm'));
    events.push(cutTo(canvas, (round + 1) * cycle, 'intro'));
  }

  const manager = new SceneManager(
    [
      createIntroScene(canvas),
      createStormScene(canvas, random),
      createDebugScene(canvas, canvas.layerCount - 1),
    ],
    events
  );

  manager.startScene('intro');
  if (options.debug) {
    manager.addScene('debug');
  }
  return manager;
}
