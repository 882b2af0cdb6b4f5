import { describe, expect, it } from 'vitest';
import { BLANK_CELL, BLANK_STYLE } from '@beatgrid/protocol';
import { Canvas, CanvasConfigError } from '../src/canvas/canvas.js';
import { fg } from '../src/ansi/style.js';

const RED = fg('red');
const BLUE = fg('blue');

function spans(canvas: Canvas, layer: number = 0): Array<[string, number, string]> {
  return canvas.pendingSpans(layer).map((span) => [span.code, span.start, span.text]);
}

describe('Canvas', () => {
  it('rejects non-positive or fractional dimensions', () => {
    expect(() => new Canvas({ width: 0, height: 3 })).toThrow(CanvasConfigError);
    expect(() => new Canvas({ width: 4, height: 2.5 })).toThrow(/height/);
    expect(() => new Canvas({ width: 4, height: 2, layers: 0 })).toThrow(CanvasConfigError);
  });

  it('defaults to five layers and keeps merge rules as given', () => {
    const rules = [{ name: 'overlay' }];
    const canvas = new Canvas({ width: 4, height: 2, mergeRules: rules });

    expect(canvas.layerCount).toBe(5);
    expect(canvas.mergeRules).toEqual(rules);
  });

  it('maps (x, y) to doubled offsets', () => {
    const canvas = new Canvas({ width: 10, height: 3, layers: 1 });
    canvas.setChar(0, 3, 2, 'q', RED);

    expect(spans(canvas)).toEqual([[RED, 46, 'q']]);
    expect(canvas.getChar(0, 3, 2)).toEqual({ char: 'q', code: RED });
  });

  it('splits a span when a different color is written inside it', () => {
    const canvas = new Canvas({ width: 10, height: 3, layers: 1 });
    canvas.setString(0, 0, 0, 'HELLO', RED);
    canvas.setString(0, 2, 0, 'XX', BLUE);

    expect(spans(canvas)).toEqual([
      [RED, 0, 'HE'],
      [BLUE, 4, 'XX'],
      [RED, 8, 'O'],
    ]);
    expect(canvas.getChar(0, 2, 0)).toEqual({ char: 'X', code: BLUE });
    expect(canvas.getChar(0, 0, 0)).toEqual({ char: 'H', code: RED });
  });

  it('clips strings at the right edge without touching the next row', () => {
    const canvas = new Canvas({ width: 10, height: 3, layers: 1 });
    canvas.setString(0, 8, 0, 'ABCD', RED);

    expect(spans(canvas)).toEqual([[RED, 16, 'AB']]);
    expect(canvas.getChar(0, 9, 0).char).toBe('B');
    expect(canvas.getChar(0, 0, 1)).toBe(BLANK_CELL);
  });

  it('drops glyphs left of column 0', () => {
    const canvas = new Canvas({ width: 10, height: 3, layers: 1 });
    canvas.setString(0, -2, 1, 'ABCD', RED);

    expect(spans(canvas)).toEqual([[RED, 20, 'CD']]);
  });

  it('ignores writes to missing layers and rows outside the grid', () => {
    const canvas = new Canvas({ width: 4, height: 2, layers: 2 });
    canvas.setChar(2, 0, 0, 'a', RED);
    canvas.setChar(-1, 0, 0, 'a', RED);
    canvas.setString(0, 0, 2, 'abc', RED);
    canvas.setChar(0, 4, 0, 'a', RED);
    canvas.setChar(0, 0, -1, 'a', RED);

    expect(spans(canvas, 0)).toEqual([]);
    expect(spans(canvas, 1)).toEqual([]);
    expect(canvas.getChar(5, 0, 0)).toBe(BLANK_CELL);
    expect(canvas.getChar(0, -1, 0)).toBe(BLANK_CELL);
  });

  it('counts one edit per write call on a valid layer', () => {
    const canvas = new Canvas({ width: 4, height: 2, layers: 1 });
    canvas.setChar(0, 0, 0, 'a', RED);
    canvas.setString(0, 0, 1, 'abc', RED);
    canvas.setString(0, 0, 9, 'off-screen', RED);
    canvas.setChar(3, 0, 0, 'a', RED);

    expect(canvas.editsThisFrame).toBe(3);
    canvas.render();
    expect(canvas.editsThisFrame).toBe(0);
  });

  it('writes one row per line and stops at the bottom edge', () => {
    const canvas = new Canvas({ width: 6, height: 2, layers: 1 });
    canvas.setMultilineString(0, 1, 0, 'ab\r\ncd\nef', RED);

    expect(canvas.getChar(0, 1, 0).char).toBe('a');
    expect(canvas.getChar(0, 2, 1).char).toBe('d');
    expect(canvas.editsThisFrame).toBe(2);
  });

  it('fills rectangles and draws borders', () => {
    const canvas = new Canvas({ width: 5, height: 4, layers: 1 });
    canvas.fillRect(0, { x: 3, y: 2, width: 4, height: 4 }, '#', RED);

    expect(spans(canvas)).toEqual([
      [RED, 26, '##'],
      [RED, 36, '##'],
    ]);

    canvas.drawBorder(0, { x: 0, y: 0, width: 3, height: 3 }, '┌─┐││└─┘', BLUE);
    expect(canvas.getChar(0, 0, 0).char).toBe('┌');
    expect(canvas.getChar(0, 1, 0).char).toBe('─');
    expect(canvas.getChar(0, 2, 2).char).toBe('┘');
    expect(canvas.getChar(0, 0, 1).char).toBe('│');
    expect(canvas.getChar(0, 1, 1)).toBe(BLANK_CELL);
  });

  it('repeats the first glyph when the border pattern is not eight glyphs long', () => {
    const canvas = new Canvas({ width: 3, height: 3, layers: 1 });
    canvas.drawBorder(0, { x: 0, y: 0, width: 3, height: 3 }, '*');

    expect(canvas.getChar(0, 2, 0)).toEqual({ char: '*', code: BLANK_STYLE });
    expect(canvas.getChar(0, 2, 1).char).toBe('*');
  });

  it('clears every cell of a layer and keeps it blank after render', () => {
    const canvas = new Canvas({ width: 3, height: 2, layers: 2 });
    canvas.setString(1, 0, 0, 'abc', RED);
    canvas.clearLayer(1);
    canvas.clearLayer(1);
    canvas.render();

    for (let y = 0; y < 2; y++) {
      for (let x = 0; x < 3; x++) {
        expect(canvas.getChar(1, x, y)).toEqual({ char: ' ', code: BLANK_STYLE });
      }
    }
  });

  it('clearAll leaves exactly one span per layer', () => {
    const canvas = new Canvas({ width: 3, height: 2, layers: 3 });
    canvas.setChar(2, 1, 1, 'x', RED);
    canvas.clearAll();

    for (let layer = 0; layer < 3; layer++) {
      expect(spans(canvas, layer)).toEqual([[BLANK_STYLE, 0, '      ']]);
    }
  });

  it('reads the snapshot even after the spans were flushed', () => {
    const canvas = new Canvas({ width: 4, height: 1, layers: 1 });
    canvas.setString(0, 0, 0, 'ab', RED);
    canvas.render();

    expect(canvas.pendingSpans(0)).toEqual([]);
    expect(canvas.getChar(0, 1, 0)).toEqual({ char: 'b', code: RED });
  });
});
