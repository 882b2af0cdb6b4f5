import { DataStore } from './data-store.js';
import { always, type BeatCondition } from './conditions.js';
import type { Scene } from './scene.js';
import type { SceneManager } from './scene-manager.js';

/**
 * What a scene needs from a generator, independent of its data shape
 */
export interface SceneGenerator {
  readonly startBeat: number;
  condition(beat: number): boolean;
  attach(manager: SceneManager, scene: Scene): void;
  create(): void;
  request(beat: number): void;
  clear(beat: number): void;
  /** Merge values whose keys are only known at run time */
  setData(values: {}): void;
}

export interface GeneratorOptions<TData extends object> {
  startBeat?: number;
  condition?: BeatCondition;
  onCreate?: (generator: Generator<TData>) => void;
  request: (generator: Generator<TData>, beat: number) => void;
  requestClear?: (generator: Generator<TData>, beat: number) => void;
}

/**
 * Produces one visual element of a scene, beat by beat.
 *
 * `request` draws the element for a beat; `requestClear` erases what the
 * previous beat drew and runs just before the next `request`.
 */
export class Generator<TData extends object = Record<string, unknown>>
  extends DataStore<TData>
  implements SceneGenerator
{
  public readonly startBeat: number;
  public manager: SceneManager | null = null;
  public scene: Scene | null = null;

  private readonly options: GeneratorOptions<TData>;
  private readonly shouldRun: BeatCondition;

  constructor(options: GeneratorOptions<TData>) {
    super();
    this.options = options;
    this.startBeat = options.startBeat ?? 0;
    this.shouldRun = options.condition ?? always();
  }

  condition(beat: number): boolean {
    return this.shouldRun(beat);
  }

  attach(manager: SceneManager, scene: Scene): void {
    this.manager = manager;
    this.scene = scene;
  }

  create(): void {
    this.options.onCreate?.(this);
  }

  request(beat: number): void {
    this.options.request(this, beat);
  }

  clear(beat: number): void {
    this.options.requestClear?.(this, beat);
  }
}
