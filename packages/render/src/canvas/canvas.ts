import { z } from 'zod';
import {
  BLANK_CELL,
  BLANK_STYLE,
  CELL_SPAN,
  DEFAULT_LAYER_COUNT,
  type Cell,
  type Rect,
  type StyleCode,
} from '@beatgrid/protocol';
import { ANSIBuilder } from '../ansi/builder.js';
import { Layer } from '../buffer/layer.js';
import type { SpanView } from '../buffer/span.js';
import { SpanRenderer } from '../renderer/span-renderer.js';
import { FrameStats } from '../stats/frame-stats.js';

const canvasConfigSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  layers: z.number().int().positive().default(DEFAULT_LAYER_COUNT),
  mergeRules: z.array(z.unknown()).default([]),
});

/**
 * Canvas construction options
 */
export type CanvasConfig = z.input<typeof canvasConfigSchema>;

/**
 * Thrown when a canvas is constructed with unusable dimensions
 */
export class CanvasConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid canvas config: ${issues.join('; ')}`);
    this.name = 'CanvasConfigError';
  }
}

/**
 * Layered character grid that only streams what changed.
 *
 * Writes outside the grid or to a missing layer are dropped silently, since
 * animations routinely compute positions off-screen during transitions.
 */
export class Canvas {
  public readonly width: number;
  public readonly height: number;
  public readonly layerCount: number;
  /** Opaque rules handed through to scene code; the canvas never reads them */
  public readonly mergeRules: readonly unknown[];
  public readonly stats: FrameStats;

  private readonly layers: Layer[];
  private readonly renderer: SpanRenderer;
  private edits = 0;

  constructor(config: CanvasConfig, stats: FrameStats = new FrameStats()) {
    const parsed = canvasConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new CanvasConfigError(
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    this.width = parsed.data.width;
    this.height = parsed.data.height;
    this.layerCount = parsed.data.layers;
    this.mergeRules = Object.freeze([...parsed.data.mergeRules]);
    this.stats = stats;
    this.layers = Array.from(
      { length: this.layerCount },
      (_, id) => new Layer(id, this.width, this.height)
    );
    this.renderer = new SpanRenderer(this.width, this.height);
  }

  /**
   * Writes since the last render
   */
  get editsThisFrame(): number {
    return this.edits;
  }

  setChar(layer: number, x: number, y: number, char: string, code: StyleCode = BLANK_STYLE): void {
    const target = this.layers[layer];
    if (!target) return;
    this.edits++;

    const col = Math.floor(x);
    const row = Math.floor(y);
    if (col < 0 || col >= this.width || row < 0 || row >= this.height) return;
    target.setChar(this.offset(col, row), char, code);
  }

  /**
   * Write text on one row; glyphs left of column 0 or past the last column
   * are dropped.
   */
  setString(layer: number, x: number, y: number, text: string, code: StyleCode = BLANK_STYLE): void {
    const target = this.layers[layer];
    if (!target) return;
    this.edits++;

    let col = Math.floor(x);
    const row = Math.floor(y);
    if (row < 0 || row >= this.height || col >= this.width) return;

    let glyphs = Array.from(text);
    if (col < 0) {
      glyphs = glyphs.slice(-col);
      col = 0;
    }
    glyphs = glyphs.slice(0, this.width - col);
    if (glyphs.length === 0) return;

    target.setString(this.offset(col, row), glyphs.join(''), code);
  }

  /**
   * Write each line of `text` on its own row, starting at (x, y)
   */
  setMultilineString(
    layer: number,
    x: number,
    y: number,
    text: string,
    code: StyleCode = BLANK_STYLE
  ): void {
    const lines = text.split(/\r?\n/);
    const top = Math.floor(y);
    for (const [i, line] of lines.entries()) {
      if (top + i >= this.height) break;
      this.setString(layer, x, top + i, line, code);
    }
  }

  /**
   * Snapshot contents of a cell; pending spans are never consulted
   */
  getChar(layer: number, x: number, y: number): Cell {
    const target = this.layers[layer];
    const col = Math.floor(x);
    const row = Math.floor(y);
    if (!target || col < 0 || col >= this.width || row < 0 || row >= this.height) {
      return BLANK_CELL;
    }
    return target.getCell(this.offset(col, row));
  }

  /**
   * Fill a rectangle with one glyph, a row at a time
   */
  fillRect(layer: number, rect: Rect, char: string, code: StyleCode = BLANK_STYLE): void {
    const glyph = Array.from(char)[0];
    if (glyph === undefined || rect.width <= 0) return;

    const row = glyph.repeat(rect.width);
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      if (y >= this.height) break;
      this.setString(layer, rect.x, y, row, code);
    }
  }

  /**
   * Draw a rectangle outline.
   *
   * `borderChars` lists top-left, top, top-right, left, right, bottom-left,
   * bottom and bottom-right; any other length repeats its first glyph.
   */
  drawBorder(
    layer: number,
    rect: Rect,
    borderChars: string = '+-+||+-+',
    code: StyleCode = BLANK_STYLE
  ): void {
    if (rect.width <= 0 || rect.height <= 0) return;

    const chars = Array.from(borderChars);
    const pick = (index: number): string =>
      (chars.length === 8 ? chars[index] : chars[0]) ?? '#';
    const [tl, t, tr, l, r, bl, b, br] = [0, 1, 2, 3, 4, 5, 6, 7].map(pick);

    const bottom = rect.y + rect.height - 1;
    const right = rect.x + rect.width - 1;

    for (let x = rect.x; x <= right; x++) {
      const isLeft = x === rect.x;
      const isRight = x === right;
      this.setChar(layer, x, rect.y, (isLeft ? tl : isRight ? tr : t) ?? '#', code);
      this.setChar(layer, x, bottom, (isLeft ? bl : isRight ? br : b) ?? '#', code);
    }

    for (let y = rect.y + 1; y < bottom; y++) {
      this.setChar(layer, rect.x, y, l ?? '#', code);
      this.setChar(layer, right, y, r ?? '#', code);
    }
  }

  clearLayer(layer: number): void {
    this.layers[layer]?.clear();
  }

  clearAll(): void {
    for (const layer of this.layers) {
      layer.clear();
    }
  }

  /**
   * Pending spans of one layer, for diagnostics
   */
  pendingSpans(layer: number): SpanView[] {
    return this.layers[layer]?.pendingSpans() ?? [];
  }

  /**
   * Encode every pending span, bottom layer first, then drain them all
   */
  render(): string {
    const frame = this.renderer.encode(this.layers.map((layer) => layer.pendingSpans()));

    for (const layer of this.layers) {
      layer.drain();
    }

    this.stats.record({
      spans: frame.spanCount,
      bytes: Buffer.byteLength(frame.output, 'utf8'),
      edits: this.edits,
    });
    this.edits = 0;

    return frame.output;
  }

  /**
   * Full blank repaint of the grid area; layers are left untouched
   */
  renderBlank(): string {
    const ansi = new ANSIBuilder().resetAttributes();
    const blankRow = ' '.repeat(this.width * CELL_SPAN);
    for (let row = 0; row < this.height; row++) {
      ansi.moveTo(0, row).write(blankRow);
    }
    return ansi.moveTo(0, this.height).build();
  }

  private offset(col: number, row: number): number {
    return col * CELL_SPAN + row * this.width * CELL_SPAN;
  }
}
