import { describe, expect, it } from 'vitest';
import { Canvas, fg } from '@beatgrid/render';
import { SeededRandom } from '@beatgrid/animator';
import { createShow } from '../src/scenes/show.js';
import { INTRO_BEATS } from '../src/scenes/intro.js';

function makeCanvas(): Canvas {
  return new Canvas({ width: 40, height: 12, layers: 5 });
}

describe('createShow', () => {
  it('draws the first intro frame immediately', () => {
    const canvas = makeCanvas();
    createShow(canvas, new SeededRandom(1n), { debug: false });

    expect(canvas.getChar(0, 0, 0)).toEqual({ char: '+', code: fg('brightBlack') });
    expect(canvas.getChar(1, 3, 2)).toEqual({ char: '_', code: fg('green', true) });
  });

  it('cuts to the storm once the intro is over', () => {
    const canvas = makeCanvas();
    const manager = createShow(canvas, new SeededRandom(1n), { debug: false });

    for (let i = 0; i < INTRO_BEATS; i++) manager.requestNext();
    expect(manager.activeScenes.map((scene) => scene.name)).toEqual(['intro']);

    manager.requestNext();
    expect(manager.activeScenes.map((scene) => scene.name)).toEqual(['storm']);
  });

  it('keeps the debug overlay across cuts', () => {
    const canvas = makeCanvas();
    const manager = createShow(canvas, new SeededRandom(1n), { debug: true });

    for (let i = 0; i <= INTRO_BEATS; i++) manager.requestNext();

    expect(manager.activeScenes.map((scene) => scene.name)).toEqual(['storm', 'debug']);
  });

  it('ends every frame with a reset and a cursor park below the grid', () => {
    const canvas = makeCanvas();
    const manager = createShow(canvas, new SeededRandom(1n), { debug: true });

    manager.requestNext();
    const frame = canvas.render();

    expect(frame.endsWith('\x1b[0m\x1b[13;1H')).toBe(true);
    expect(canvas.render()).toBe('\x1b[0m\x1b[13;1H');
  });
});
