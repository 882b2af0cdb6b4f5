import { EventEmitter } from 'events';
import { DEFAULT_BPM, DEFAULT_CATCH_UP_LIMIT } from '@beatgrid/protocol';

export interface BeatLoopOptions {
  bpm?: number;
  /** Most beats run in one wake-up; beats still overdue after that are skipped */
  catchUpLimit?: number;
  /** Clock in milliseconds */
  now?: () => number;
}

/** Scene writes for one beat */
export type BeatHandler = (beat: number) => void;

/** Runs once per wake-up, after `beats` beats have run */
export type AfterBeatHandler = (beats: number) => void;

export interface LagWarning {
  skippedBeats: number;
  lateBy: number;
}

export interface BeatError {
  beat: number;
  error: unknown;
}

/**
 * Wall-clock metronome.
 *
 * Beat n falls due one interval after beat n - 1, the first one interval after
 * `start()`. A late wake-up runs the overdue beats back to back and then calls
 * the after-beat handlers once, so a slow terminal costs frames rather than
 * scene time. Past `catchUpLimit` the schedule jumps forward, beat numbers
 * stay consecutive and `lagWarning` is emitted.
 *
 * Events: `start`, `stop`, `lagWarning` (LagWarning), `beatError` (BeatError).
 */
export class BeatLoop extends EventEmitter {
  public readonly interval: number;

  private readonly catchUpLimit: number;
  private readonly now: () => number;
  private readonly beatHandlers: BeatHandler[] = [];
  private readonly afterBeatHandlers: AfterBeatHandler[] = [];

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private origin = 0;
  private beat = 0;

  constructor(options: BeatLoopOptions = {}) {
    super();
    const bpm = options.bpm ?? DEFAULT_BPM;
    if (!(bpm > 0) || !Number.isFinite(bpm)) {
      throw new RangeError(`bpm must be a positive number, got ${bpm}`);
    }
    this.interval = 60000 / bpm;
    this.catchUpLimit = Math.max(1, Math.floor(options.catchUpLimit ?? DEFAULT_CATCH_UP_LIMIT));
    this.now = options.now ?? Date.now;
  }

  onBeat(handler: BeatHandler): void {
    this.beatHandlers.push(handler);
  }

  onAfterBeat(handler: AfterBeatHandler): void {
    this.afterBeatHandlers.push(handler);
  }

  /**
   * Number of the next beat to run
   */
  get currentBeat(): number {
    return this.beat;
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.origin = this.now();
    this.beat = 0;

    this.emit('start');
    this.schedule();
  }

  stop(): void {
    if (!this.running) return;

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    this.emit('stop');
  }

  private dueAt(beat: number): number {
    return this.origin + (beat + 1) * this.interval;
  }

  private schedule(): void {
    if (!this.running) return;
    const delay = Math.max(0, this.dueAt(this.beat) - this.now());
    this.timer = setTimeout(() => this.wake(), delay);
  }

  private wake(): void {
    this.timer = null;
    const now = this.now();

    let ran = 0;
    while (this.running && ran < this.catchUpLimit && this.dueAt(this.beat) <= now) {
      this.run(this.beatHandlers, this.beat);
      this.beat++;
      ran++;
    }
    if (!this.running) return;

    const lateBy = now - this.dueAt(this.beat);
    if (lateBy >= 0) {
      const skippedBeats = Math.floor(lateBy / this.interval) + 1;
      this.origin += skippedBeats * this.interval;
      const warning: LagWarning = { skippedBeats, lateBy };
      this.emit('lagWarning', warning);
    }

    if (ran > 0) {
      this.run(this.afterBeatHandlers, ran, this.beat - 1);
    }
    this.schedule();
  }

  /**
   * Call every handler; a throwing handler is reported and the rest still run
   */
  private run<T>(handlers: ReadonlyArray<(arg: T) => void>, arg: T, beat: number = this.beat): void {
    for (const handler of handlers) {
      try {
        handler(arg);
      } catch (error) {
        const report: BeatError = { beat, error };
        this.emit('beatError', report);
      }
    }
  }
}
