import type { Scene } from './scene.js';

/**
 * Something that happens once the global beat counter reaches `beat`
 */
export interface BeatEvent {
  beat: number;
  run: (manager: SceneManager) => void;
}

export class UnknownSceneError extends Error {
  constructor(public readonly sceneName: string) {
    super(`Unknown scene: ${sceneName}`);
    this.name = 'UnknownSceneError';
  }
}

/** Make `name` the primary scene at `beat` */
export const swapScene = (beat: number, name: string, at: number = 0): BeatEvent => ({
  beat,
  run: (manager) => manager.startScene(name, at),
});

/** Layer `name` on top of the active scenes at `beat` */
export const layerScene = (beat: number, name: string, at: number = 0): BeatEvent => ({
  beat,
  run: (manager) => manager.addScene(name, at),
});

/** Drop `name` from the active scenes at `beat` */
export const removeSceneAt = (beat: number, name: string): BeatEvent => ({
  beat,
  run: (manager) => manager.removeScene(name),
});

/**
 * Owns every scene and the global beat counter.
 *
 * Active scenes run in order each beat: the primary scene first, then layered
 * scenes in the order they were added.
 */
export class SceneManager {
  private readonly scenes = new Map<string, Scene>();
  private readonly events = new Map<number, BeatEvent[]>();
  private active: Scene[] = [];
  private beat = -1;

  constructor(scenes: readonly Scene[], events: readonly BeatEvent[] = []) {
    for (const scene of scenes) {
      this.scenes.set(scene.name, scene);
    }
    for (const event of events) {
      const list = this.events.get(event.beat) ?? [];
      list.push(event);
      this.events.set(event.beat, list);
    }
  }

  /**
   * Global beat; -1 before the first `requestNext`
   */
  get currentBeat(): number {
    return this.beat;
  }

  get activeScenes(): readonly Scene[] {
    return this.active;
  }

  /**
   * Replace the primary scene
   */
  startScene(name: string, at: number = 0): void {
    const scene = this.lookup(name);
    if (this.active.length === 0) {
      this.active.push(scene);
    } else {
      this.active[0] = scene;
    }
    scene.start(this, at);
  }

  addScene(name: string, at: number = 0): void {
    const scene = this.lookup(name);
    this.active.push(scene);
    scene.start(this, at);
  }

  removeScene(name: string): void {
    const scene = this.lookup(name);
    this.active = this.active.filter((candidate) => candidate !== scene);
  }

  /**
   * Draw one frame of every active scene, then advance the global beat
   */
  requestNext(render: boolean = true): void {
    for (const scene of [...this.active]) {
      scene.requestFrame(render);
    }
    this.nextBeat();
  }

  setSceneData(name: string, values: Record<string, unknown>): void {
    this.scenes.get(name)?.setData(values);
  }

  /**
   * Merge values into one generator of a scene; unknown scenes and indices
   * are ignored
   */
  setGeneratorData(name: string, index: number, values: Record<string, unknown>): void {
    const scene = this.scenes.get(name);
    if (!scene || !Number.isInteger(index) || index < 0 || index >= scene.generators.length) return;
    scene.generators[index]?.setData(values);
  }

  private nextBeat(): void {
    this.beat++;
    for (const event of this.events.get(this.beat) ?? []) {
      event.run(this);
    }
  }

  private lookup(name: string): Scene {
    const scene = this.scenes.get(name);
    if (!scene) {
      throw new UnknownSceneError(name);
    }
    return scene;
  }
}
