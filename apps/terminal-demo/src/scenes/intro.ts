import { BLANK_STYLE, type Rect } from '@beatgrid/protocol';
import { fg, type Canvas } from '@beatgrid/render';
import {
  Generator,
  Scene,
  atBeat,
  blink,
  loadingBar,
  typewriter,
  type TypewriterData,
} from '@beatgrid/animator';

export const INTRO_BEATS = 24;

const TITLE = 'beatgrid\nspans on the beat~~~';
const PROGRESS_START = 4;

export function createIntroScene(canvas: Canvas): Scene {
  const outline: Rect = { x: 0, y: 0, width: canvas.width, height: canvas.height };

  const frame = new Generator({
    condition: atBeat(0),
    request: () => canvas.drawBorder(0, outline, '+-+||+-+', fg('brightBlack')),
  });

  const title = new Generator<TypewriterData>({
    onCreate: (generator) => generator.setData({ text: TITLE, offset: 0 }),
    request: (generator) =>
      typewriter(canvas, generator, 1, 3, 2, fg('green', true), { speed: 2 }),
  });

  const progress = new Generator({
    startBeat: PROGRESS_START,
    request: (_, beat) =>
      loadingBar(
        canvas,
        1,
        3,
        canvas.height - 3,
        canvas.width - 6,
        (beat - PROGRESS_START) / (INTRO_BEATS - 2 * PROGRESS_START)
      ),
  });

  const marker = new Generator({
    request: (_, beat) =>
      blink(canvas, 2, canvas.width - 4, 1, fg('red', true), BLANK_STYLE, beat),
  });

  return new Scene('intro', [frame, title, progress, marker]);
}
