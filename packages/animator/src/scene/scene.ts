import { DataStore } from './data-store.js';
import type { SceneGenerator } from './generator.js';
import type { SceneManager } from './scene-manager.js';

/**
 * Named group of generators sharing one beat counter
 */
export class Scene extends DataStore<Record<string, unknown>> {
  public startBeat = 0;
  public internalBeat = 0;

  constructor(
    public readonly name: string,
    public readonly generators: readonly SceneGenerator[]
  ) {
    super();
  }

  /**
   * Run every generator due on the current scene beat, then advance it.
   * With `render` off the beat advances without drawing.
   */
  requestFrame(render: boolean = true): void {
    const beat = this.internalBeat;

    if (render) {
      for (const generator of this.generators) {
        if (beat < generator.startBeat || !generator.condition(beat)) continue;

        if (beat !== this.startBeat && beat !== generator.startBeat) {
          generator.clear(beat - 1);
        }
        generator.request(beat);
      }
    }

    this.internalBeat++;
  }

  /**
   * (Re)start at scene beat `at`: generators are attached and created, and
   * the first frame is drawn immediately.
   */
  start(manager: SceneManager, at: number): void {
    for (const generator of this.generators) {
      generator.attach(manager, this);
      generator.create();
    }

    this.startBeat = at;
    this.internalBeat = at;
    this.requestFrame();
  }

  /**
   * Generators whose start beat has been reached
   */
  activeGeneratorCount(beat: number = this.internalBeat): number {
    return this.generators.filter((generator) => generator.startBeat <= beat).length;
  }
}
