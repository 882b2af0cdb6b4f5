/**
 * OutputPump - backpressure-aware frame writer
 *
 * Frames are diffs: dropping one would leave stale cells on screen until
 * something repaints them. So the pump never discards queued frames. Once the
 * backlog passes `maxQueuedBytes` it reports itself backlogged; the driver then
 * skips `render()` and the writes stay pending in the canvas layers, going out
 * merged with the next frame that is rendered.
 */
export class OutputPump {
  private stream: NodeJS.WritableStream;
  private queue: string[] = [];
  private queuedBytes = 0;
  private waitingForDrain = false;
  private destroyed = false;

  private maxQueuedBytes: number;

  // Metrics
  private skippedFrames = 0;
  private drainCount = 0;
  private totalBytesWritten = 0;
  private totalFramesWritten = 0;
  private peakQueuedBytes = 0;

  // Stored for cleanup
  private drainHandler: () => void;
  private closeHandler: () => void;
  private errorHandler: () => void;

  constructor(stream: NodeJS.WritableStream, options?: { maxQueuedBytes?: number }) {
    this.stream = stream;
    this.maxQueuedBytes = options?.maxQueuedBytes ?? 256 * 1024;

    this.drainHandler = () => {
      if (this.destroyed) return;
      this.drainCount++;
      this.waitingForDrain = false;
      this.flush();
    };

    this.closeHandler = () => {
      this.markDestroyed();
    };

    this.errorHandler = () => {
      this.markDestroyed();
    };

    this.stream.on('drain', this.drainHandler);
    this.stream.on('close', this.closeHandler);
    this.stream.on('error', this.errorHandler);
  }

  private markDestroyed(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.queue = [];
    this.queuedBytes = 0;
  }

  /**
   * Queue a rendered frame and write as much as the stream accepts
   */
  enqueue(frame: string): void {
    if (this.destroyed || frame.length === 0) return;

    this.queue.push(frame);
    this.queuedBytes += Buffer.byteLength(frame, 'utf8');
    if (this.queuedBytes > this.peakQueuedBytes) {
      this.peakQueuedBytes = this.queuedBytes;
    }

    this.flush();
  }

  /**
   * True while the backlog is too large to accept another frame.
   * Callers skip rendering and record it with `noteSkippedFrame()`.
   */
  isBacklogged(): boolean {
    return this.queuedBytes > this.maxQueuedBytes;
  }

  noteSkippedFrame(): void {
    this.skippedFrames++;
  }

  /**
   * Hand queued frames to the stream until it asks us to wait
   */
  private flush(): void {
    if (this.destroyed || this.waitingForDrain) return;

    let frame = this.queue.shift();
    while (frame !== undefined) {
      const bytes = Buffer.byteLength(frame, 'utf8');
      this.queuedBytes -= bytes;
      this.totalBytesWritten += bytes;
      this.totalFramesWritten++;

      if (!this.stream.write(frame)) {
        this.waitingForDrain = true;
        return;
      }
      frame = this.queue.shift();
    }
  }

  getMetrics(): OutputPumpMetrics {
    return {
      queuedBytes: this.queuedBytes,
      peakQueuedBytes: this.peakQueuedBytes,
      skippedFrames: this.skippedFrames,
      drainCount: this.drainCount,
      totalBytesWritten: this.totalBytesWritten,
      totalFramesWritten: this.totalFramesWritten,
      queueLength: this.queue.length,
    };
  }

  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Remove listeners and forget anything still queued
   */
  destroy(): void {
    if (this.destroyed) return;
    this.markDestroyed();

    this.stream.removeListener('drain', this.drainHandler);
    this.stream.removeListener('close', this.closeHandler);
    this.stream.removeListener('error', this.errorHandler);
  }
}

export interface OutputPumpMetrics {
  queuedBytes: number;
  peakQueuedBytes: number;
  skippedFrames: number;
  drainCount: number;
  totalBytesWritten: number;
  totalFramesWritten: number;
  queueLength: number;
}
