import { CELL_SPAN, type StyleCode } from '@beatgrid/protocol';

/**
 * Read-only view of a pending span, for diagnostics and tests
 */
export interface SpanView {
  code: StyleCode;
  start: number;
  end: number;
  glyphs: readonly string[];
  text: string;
}

/**
 * Run of same-styled glyphs in the flattened coordinate space.
 *
 * Covers `[start, start + glyphs.length * CELL_SPAN)`. Spans are owned by a
 * single Layer and mutated only through it.
 */
export class Span {
  constructor(
    public readonly code: StyleCode,
    public start: number,
    public glyphs: string[]
  ) {}

  get end(): number {
    return this.start + this.glyphs.length * CELL_SPAN;
  }

  get length(): number {
    return this.glyphs.length;
  }

  /**
   * Overwrite the glyph at `loc`, or append when `loc` is the span's end
   */
  putGlyph(loc: number, glyph: string): void {
    const index = (loc - this.start) / CELL_SPAN;
    if (index === this.glyphs.length) {
      this.glyphs.push(glyph);
    } else {
      this.glyphs[index] = glyph;
    }
  }

  /**
   * Glyphs strictly before `loc` as a new span, or null if there are none
   */
  sliceBefore(loc: number): Span | null {
    if (loc <= this.start) return null;
    const count = Math.min(this.glyphs.length, (loc - this.start) / CELL_SPAN);
    return new Span(this.code, this.start, this.glyphs.slice(0, count));
  }

  /**
   * Glyphs at or after `loc` as a new span, or null if there are none
   */
  sliceFrom(loc: number): Span | null {
    if (loc >= this.end) return null;
    const from = Math.max(loc, this.start);
    return new Span(this.code, from, this.glyphs.slice((from - this.start) / CELL_SPAN));
  }

  /**
   * Absorb a same-code span that touches or overlaps this one.
   *
   * Glyphs of this span win where the two overlap.
   */
  absorb(other: Span): void {
    const before = other.sliceBefore(this.start);
    const after = other.sliceFrom(this.end);
    const glyphs = [...(before?.glyphs ?? []), ...this.glyphs, ...(after?.glyphs ?? [])];
    this.start = Math.min(this.start, other.start);
    this.glyphs = glyphs;
  }

  view(): SpanView {
    return {
      code: this.code,
      start: this.start,
      end: this.end,
      glyphs: [...this.glyphs],
      text: this.glyphs.join(''),
    };
  }
}
