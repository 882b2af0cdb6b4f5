import { BLANK_STYLE } from '@beatgrid/protocol';
import { fg, type Canvas } from '@beatgrid/render';
import {
  Generator,
  Scene,
  everyNBeats,
  glitch,
  matrixRain,
  scrambleReveal,
  wave,
  type RandomSource,
} from '@beatgrid/animator';

export const STORM_BEATS = 32;

const HEADLINE = 'SIGNAL LOST';

export function createStormScene(canvas: Canvas, random: RandomSource): Scene {
  const middle = Math.floor(canvas.height / 2);
  const everything = { x: 0, y: 0, width: canvas.width, height: canvas.height };
  const columns = Array.from({ length: canvas.width }, (_, x) => x).filter((x) => x % 3 === 0);

  // Rain piles up on the bottom layer and is wiped every 8 beats
  const rain = new Generator({
    request: () => matrixRain(canvas, 0, columns, random, fg('green')),
    requestClear: (_, beat) => {
      if (beat % 8 === 7) canvas.fillRect(0, everything, ' ');
    },
  });

  const crackle = new Generator({
    condition: everyNBeats(4),
    request: () => glitch(canvas, 0, 6, random),
  });

  const swell = new Generator({
    request: (_, beat) => wave(canvas, 1, middle, 2, 0.3, beat * 0.5, '~', fg('blue', true)),
    requestClear: (_, beat) => wave(canvas, 1, middle, 2, 0.3, beat * 0.5, ' ', BLANK_STYLE),
  });

  const headline = new Generator({
    request: (_, beat) =>
      scrambleReveal(
        canvas,
        2,
        Math.floor((canvas.width - HEADLINE.length) / 2),
        1,
        HEADLINE,
        beat / 12,
        random,
        fg('red', true)
      ),
  });

  return new Scene('storm', [rain, crackle, swell, headline]);
}
