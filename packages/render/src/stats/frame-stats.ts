/**
 * Per-frame numbers recorded at every flush
 */
export interface FrameSample {
  spans: number;
  bytes: number;
  edits: number;
}

export interface FrameStatsSnapshot {
  frameCount: number;
  last: FrameSample;
  avgBytesPerFrame: number;
  avgSpansPerFrame: number;
  fps: number;
}

const WINDOW_SIZE = 16;

/**
 * Rolling render statistics for the debug overlay and shutdown summary
 */
export class FrameStats {
  private frameCount = 0;
  private totalBytes = 0;
  private totalSpans = 0;
  private last: FrameSample = { spans: 0, bytes: 0, edits: 0 };
  private timestamps: number[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Record a flushed frame
   */
  record(sample: FrameSample): void {
    this.frameCount++;
    this.totalBytes += sample.bytes;
    this.totalSpans += sample.spans;
    this.last = { ...sample };

    this.timestamps.push(this.now());
    if (this.timestamps.length > WINDOW_SIZE) {
      this.timestamps.shift();
    }
  }

  /**
   * Frames per second over the recent window (0 until two frames exist)
   */
  get fps(): number {
    const first = this.timestamps[0];
    const last = this.timestamps[this.timestamps.length - 1];
    if (first === undefined || last === undefined || this.timestamps.length < 2) return 0;
    const elapsed = last - first;
    return elapsed > 0 ? ((this.timestamps.length - 1) * 1000) / elapsed : 0;
  }

  getStats(): FrameStatsSnapshot {
    return {
      frameCount: this.frameCount,
      last: { ...this.last },
      avgBytesPerFrame: this.frameCount > 0 ? this.totalBytes / this.frameCount : 0,
      avgSpansPerFrame: this.frameCount > 0 ? this.totalSpans / this.frameCount : 0,
      fps: this.fps,
    };
  }

  reset(): void {
    this.frameCount = 0;
    this.totalBytes = 0;
    this.totalSpans = 0;
    this.last = { spans: 0, bytes: 0, edits: 0 };
    this.timestamps = [];
  }
}
