// Beat clock
export {
  BeatLoop,
  type BeatLoopOptions,
  type BeatHandler,
  type AfterBeatHandler,
  type BeatError,
  type LagWarning,
} from './tick/beat-loop.js';

// Randomness
export { SeededRandom, randomInt, pick, type RandomSource } from './random/seeded-random.js';

// Scene model
export { DataStore } from './scene/data-store.js';
export * from './scene/conditions.js';
export { Generator, type GeneratorOptions, type SceneGenerator } from './scene/generator.js';
export { Scene } from './scene/scene.js';
export {
  SceneManager,
  UnknownSceneError,
  swapScene,
  layerScene,
  removeSceneAt,
  type BeatEvent,
} from './scene/scene-manager.js';

// Effects
export {
  typewriter,
  blink,
  pulse,
  scrambleReveal,
  type TypewriterData,
  type TypewriterOptions,
} from './effects/text.js';
export { noise, glitch, matrixRain, NOISE_CHARS, RAIN_CHARS } from './effects/noise.js';
export { wave, loadingBar } from './effects/shapes.js';
export { debugOverlay, DEBUG_PANEL_WIDTH } from './effects/debug-overlay.js';
