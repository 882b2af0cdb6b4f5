// Sentry must be imported first
import './instrument.js';
import * as Sentry from '@sentry/node';

import { ANSIBuilder, Canvas, OutputPump } from '@beatgrid/render';
import { BeatLoop, SeededRandom, type BeatError } from '@beatgrid/animator';
import { loadConfig } from './config.js';
import { createShow } from './scenes/show.js';

async function main(): Promise<void> {
  const config = loadConfig();

  const canvas = new Canvas({
    width: config.width,
    height: config.height,
    layers: config.layers,
  });
  const manager = createShow(canvas, new SeededRandom(config.seed), { debug: config.debug });
  const loop = new BeatLoop({ bpm: config.bpm });
  const pump = new OutputPump(process.stdout);

  let lagWarnings = 0;
  let beatErrors = 0;

  process.stdout.write(
    new ANSIBuilder()
      .enterAlternateScreen()
      .hideCursor()
      .disableLineWrap()
      .clearScreen()
      .build() + canvas.renderBlank()
  );

  loop.onBeat(() => {
    manager.requestNext();
  });

  // One frame per wake-up, however many beats it caught up on. Writes made
  // while the terminal is behind stay pending for the next rendered frame.
  loop.onAfterBeat(() => {
    if (pump.isBacklogged()) {
      pump.noteSkippedFrame();
      return;
    }
    pump.enqueue(canvas.render());
  });

  loop.on('beatError', ({ error }: BeatError) => {
    beatErrors++;
    Sentry.captureException(error);
  });

  loop.on('lagWarning', () => {
    lagWarnings++;
  });

  let isShuttingDown = false;
  const shutdown = (): void => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    loop.stop();
    pump.destroy();
    process.stdout.write(
      new ANSIBuilder()
        .resetAttributes()
        .showCursor()
        .enableLineWrap()
        .exitAlternateScreen()
        .build()
    );

    const stats = canvas.stats.getStats();
    const metrics = pump.getMetrics();
    console.log(
      `[Demo] ${stats.frameCount} frames, ${metrics.totalBytesWritten} bytes, ` +
        `${stats.avgSpansPerFrame.toFixed(1)} spans/frame, ${stats.fps.toFixed(1)} fps`
    );
    console.log(
      `[Demo] ${metrics.skippedFrames} skipped renders, ${lagWarnings} lag warnings, ` +
        `${beatErrors} beat errors`
    );
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  loop.start();
}

main().catch((error: unknown) => {
  console.error('[Demo] Fatal error:', error instanceof Error ? error.message : error);
  Sentry.captureException(error);
  process.exit(1);
});
