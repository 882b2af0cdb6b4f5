import { describe, expect, it } from 'vitest';
import { BLANK_STYLE } from '@beatgrid/protocol';
import { Canvas, color16, fg, styleCode } from '@beatgrid/render';
import { Generator } from '../src/scene/generator.js';
import { Scene } from '../src/scene/scene.js';
import { SceneManager } from '../src/scene/scene-manager.js';
import { SeededRandom } from '../src/random/seeded-random.js';
import { blink, pulse, scrambleReveal, typewriter, type TypewriterData } from '../src/effects/text.js';
import { glitch, matrixRain, noise } from '../src/effects/noise.js';
import { loadingBar, wave } from '../src/effects/shapes.js';
import { DEBUG_PANEL_WIDTH, debugOverlay } from '../src/effects/debug-overlay.js';

const RED = fg('red');
const BLUE = fg('blue');

function row(canvas: Canvas, y: number, width: number = canvas.width): string {
  return Array.from({ length: width }, (_, x) => canvas.getChar(0, x, y).char).join('');
}

function typing(text: string): Generator<TypewriterData> {
  const generator = new Generator<TypewriterData>({ request: () => undefined });
  generator.setData({ text, offset: 0 });
  return generator;
}

describe('typewriter', () => {
  it('reveals text with a trailing cursor', () => {
    const canvas = new Canvas({ width: 8, height: 2, layers: 1 });
    const generator = typing('hello');

    typewriter(canvas, generator, 0, 0, 0, RED, { speed: 2 });
    expect(row(canvas, 0)).toBe('_       ');

    typewriter(canvas, generator, 0, 0, 0, RED, { speed: 2 });
    typewriter(canvas, generator, 0, 0, 0, RED, { speed: 2 });
    expect(row(canvas, 0)).toBe('hell_   ');
    expect(generator.getData('offset')).toBe(6);
  });

  it('drops the cursor once a line is complete', () => {
    const canvas = new Canvas({ width: 8, height: 2, layers: 1 });
    const generator = typing('hello');

    typewriter(canvas, generator, 0, 0, 0, RED, { speed: 5 });
    typewriter(canvas, generator, 0, 0, 0, RED, { speed: 5 });

    expect(row(canvas, 0)).toBe('hello   ');
  });

  it('moves to the next row after a newline', () => {
    const canvas = new Canvas({ width: 4, height: 2, layers: 1 });
    const generator = typing('ab\ncd');

    for (let i = 0; i < 5; i++) {
      typewriter(canvas, generator, 0, 0, 0, RED, { speed: 1 });
    }

    expect(row(canvas, 0)).toBe('ab  ');
    expect(row(canvas, 1)).toBe('c_  ');
  });

  it('never draws pacing marks', () => {
    const canvas = new Canvas({ width: 4, height: 1, layers: 1 });
    const generator = typing('a~b');

    typewriter(canvas, generator, 0, 0, 0, RED, { speed: 3 });
    typewriter(canvas, generator, 0, 0, 0, RED, { speed: 3 });

    expect(row(canvas, 0)).toBe('ab  ');
  });

  it('blanks a box for the clear command', () => {
    const canvas = new Canvas({ width: 6, height: 3, layers: 1 });
    canvas.fillRect(0, { x: 0, y: 0, width: 6, height: 3 }, 'X');
    const generator = typing('[##CLEAR|3;2]');

    typewriter(canvas, generator, 0, 1, 0, BLANK_STYLE);

    expect(row(canvas, 0)).toBe('X   XX');
    expect(row(canvas, 1)).toBe('X   XX');
    expect(row(canvas, 2)).toBe('XXXXXX');
    expect(generator.getData('offset')).toBe(0);
  });

  it('only advances when rendering is off', () => {
    const canvas = new Canvas({ width: 8, height: 1, layers: 1 });
    const generator = typing('hello');

    typewriter(canvas, generator, 0, 0, 0, RED, { render: false });

    expect(canvas.pendingSpans(0)).toEqual([]);
    expect(generator.getData('offset')).toBe(3);
  });
});

describe('text effects', () => {
  it('blinks between two styles', () => {
    const canvas = new Canvas({ width: 4, height: 1, layers: 1 });

    blink(canvas, 0, 0, 0, RED, BLUE, 0);
    expect(canvas.getChar(0, 0, 0)).toEqual({ char: '#', code: RED });

    blink(canvas, 0, 0, 0, RED, BLUE, 1);
    expect(canvas.getChar(0, 1, 0)).toEqual({ char: '#', code: BLUE });
  });

  it('pulses bold on even beats', () => {
    const canvas = new Canvas({ width: 4, height: 1, layers: 1 });
    const style = { fg: color16('red') };

    pulse(canvas, 0, 0, 0, 'hi', 2, style);
    expect(canvas.getChar(0, 0, 0).code).toBe(fg('red', true));

    pulse(canvas, 0, 0, 0, 'hi', 3, style);
    expect(canvas.getChar(0, 0, 0).code).toBe(fg('red'));
  });

  it('scrambles the unrevealed part', () => {
    const canvas = new Canvas({ width: 6, height: 1, layers: 1 });

    scrambleReveal(canvas, 0, 0, 0, 'secret', 0.5, new SeededRandom(3n), RED, '*');

    expect(row(canvas, 0)).toBe('sec***');
  });

  it('shows the whole text at full progress', () => {
    const canvas = new Canvas({ width: 6, height: 1, layers: 1 });

    scrambleReveal(canvas, 0, 0, 0, 'secret', 2, new SeededRandom(3n), RED);

    expect(row(canvas, 0)).toBe('secret');
  });
});

describe('noise effects', () => {
  it('writes the requested number of glyphs', () => {
    const canvas = new Canvas({ width: 10, height: 4, layers: 1 });

    noise(canvas, 0, 20, new SeededRandom(9n), [RED], '#');

    const cells = Array.from({ length: 4 }, (_, y) => row(canvas, y)).join('');
    expect(canvas.editsThisFrame).toBe(20);
    expect(cells.replace(/ /g, '').length).toBeGreaterThan(0);
    expect(cells.replace(/[# ]/g, '')).toBe('');
  });

  it('produces identical frames for identical seeds', () => {
    const first = new Canvas({ width: 10, height: 4, layers: 1 });
    const second = new Canvas({ width: 10, height: 4, layers: 1 });

    glitch(first, 0, 15, new SeededRandom(11n));
    glitch(second, 0, 15, new SeededRandom(11n));

    expect(second.render()).toBe(first.render());
  });

  it('rains down every in-range column', () => {
    const canvas = new Canvas({ width: 4, height: 3, layers: 1 });

    matrixRain(canvas, 0, [1, 99], { next: () => 0 }, RED, 'x');

    expect([row(canvas, 0), row(canvas, 1), row(canvas, 2)]).toEqual([' x  ', ' x  ', ' x  ']);
  });
});

describe('shape effects', () => {
  it('draws a flat wave on one row', () => {
    const canvas = new Canvas({ width: 5, height: 3, layers: 1 });

    wave(canvas, 0, 1, 0, 1, 0, '~', BLUE);

    expect(canvas.pendingSpans(0)).toEqual([
      { code: BLUE, start: 10, end: 20, glyphs: ['~', '~', '~', '~', '~'], text: '~~~~~' },
    ]);
  });

  it('merges the filled and empty parts of a loading bar', () => {
    const canvas = new Canvas({ width: 10, height: 1, layers: 1 });

    loadingBar(canvas, 0, 0, 0, 4, 0.5, RED);

    expect(canvas.pendingSpans(0).map((span) => span.text)).toEqual(['██░░']);
  });

  it('clamps progress to the bar width', () => {
    const canvas = new Canvas({ width: 10, height: 1, layers: 1 });

    loadingBar(canvas, 0, 0, 0, 4, 1.5, RED);

    expect(row(canvas, 0, 4)).toBe('████');
    expect(canvas.editsThisFrame).toBe(1);
  });
});

describe('debugOverlay', () => {
  it('lists the other active scenes and the frame numbers', () => {
    const canvas = new Canvas({ width: 20, height: 12, layers: 1 });
    const overlay = new Generator({
      request: (generator) => debugOverlay(canvas, generator, 0, 0, 0),
    });
    const manager = new SceneManager([
      new Scene('debug', [overlay]),
      new Scene('other', [new Generator({ request: () => undefined })]),
    ]);

    manager.startScene('debug');
    expect(row(canvas, 0, 15)).toBe('  -1 g |    0 l');

    manager.addScene('other');
    canvas.render();
    manager.requestNext();

    expect(row(canvas, 0, 15)).toBe('  -1 g |    1 l');
    expect(row(canvas, 1, DEBUG_PANEL_WIDTH)).toBe('    other (1)    ');
    expect(canvas.getChar(0, DEBUG_PANEL_WIDTH, 1).char).toBe(' ');
    expect(row(canvas, 7, 10)).toBe('     7 e/f');
    expect(row(canvas, 8, 11)).toBe('    0.0 fps');
    expect(canvas.getChar(0, 0, 10)).toEqual({ char: '█', code: styleCode({ fg: color16('black') }) });
    expect(canvas.getChar(0, 0, 11).code).toBe(fg('black', true));
  });
});
