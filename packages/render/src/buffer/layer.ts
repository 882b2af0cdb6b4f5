import { BLANK_CELL, BLANK_STYLE, CELL_SPAN, type Cell, type StyleCode } from '@beatgrid/protocol';
import { Span, type SpanView } from './span.js';

/**
 * One independently diffed paint surface.
 *
 * Keeps two views of the same writes, always updated together:
 * - `spans`: sorted, non-overlapping runs that changed since the last flush
 * - `cells`: dense snapshot of what the layer shows now, used for reads
 *
 * Offsets are flattened: `x * 2 + y * width * 2`. Offsets inside a cell are
 * snapped down to the cell's first offset.
 */
export class Layer {
  public readonly capacity: number;
  private spans: Span[] = [];
  private readonly cells: Cell[];

  constructor(
    public readonly id: number,
    public readonly width: number,
    public readonly height: number
  ) {
    this.capacity = width * height * CELL_SPAN;
    this.cells = Array.from({ length: width * height }, () => BLANK_CELL);
  }

  /**
   * Write one glyph at `loc`. Out-of-range offsets are ignored.
   */
  setChar(loc: number, char: string, code: StyleCode): void {
    const at = this.align(loc);
    const glyph = Array.from(char)[0];
    if (at === null || glyph === undefined) return;

    this.cells[at / CELL_SPAN] = { char: glyph, code };

    const index = this.lastStartingAtOrBefore(at);
    const host = this.spans[index];

    if (host && host.end >= at) {
      if (host.code === code) {
        host.putGlyph(at, glyph);
        this.coalesceAround(index);
        return;
      }

      if (host.end > at) {
        const head = host.sliceBefore(at);
        const tail = host.sliceFrom(at + CELL_SPAN);
        const pieces = [head, new Span(code, at, [glyph]), tail].filter(
          (piece): piece is Span => piece !== null
        );
        this.spans.splice(index, 1, ...pieces);
        this.coalesceAround(head ? index + 1 : index);
        return;
      }
    }

    this.spans.splice(index + 1, 0, new Span(code, at, [glyph]));
    this.coalesceAround(index + 1);
  }

  /**
   * Write a run of glyphs starting at `loc`, dropping whatever falls past the
   * end of the layer.
   */
  setString(loc: number, text: string, code: StyleCode): void {
    const at = this.align(loc);
    if (at === null) return;

    const room = (this.capacity - at) / CELL_SPAN;
    const glyphs = Array.from(text).slice(0, room);
    if (glyphs.length === 0) return;

    const firstCell = at / CELL_SPAN;
    glyphs.forEach((char, i) => {
      this.cells[firstCell + i] = { char, code };
    });

    const incoming = new Span(code, at, glyphs);
    const end = incoming.end;
    const head: Span[] = [];
    const tail: Span[] = [];

    // Every span touching [at, end] is consumed: same-code spans fold into the
    // incoming one, other spans give back what lies outside the extent.
    const first = this.firstEndingAtOrAfter(at);
    let last = first;
    for (; last < this.spans.length; last++) {
      const span = this.spans[last];
      if (!span || span.start > end) break;

      if (span.code === code) {
        incoming.absorb(span);
        continue;
      }

      const before = span.sliceBefore(at);
      const after = span.sliceFrom(end);
      if (before) head.push(before);
      if (after) tail.push(after);
    }

    this.spans.splice(first, last - first, ...head, incoming, ...tail);
  }

  /**
   * Blank the whole layer with a single full-size write
   */
  clear(): void {
    this.setString(0, ' '.repeat(this.capacity / CELL_SPAN), BLANK_STYLE);
  }

  /**
   * Current contents at `loc` (blank when out of range)
   */
  getCell(loc: number): Cell {
    const at = this.align(loc);
    if (at === null) return BLANK_CELL;
    return this.cells[at / CELL_SPAN] ?? BLANK_CELL;
  }

  /**
   * Copies of the pending spans in start order
   */
  pendingSpans(): SpanView[] {
    return this.spans.map((span) => span.view());
  }

  get pendingCount(): number {
    return this.spans.length;
  }

  /**
   * Forget every pending span (the snapshot is untouched)
   */
  drain(): void {
    this.spans = [];
  }

  private align(loc: number): number | null {
    if (!Number.isFinite(loc) || loc < 0 || loc >= this.capacity) return null;
    return Math.floor(loc / CELL_SPAN) * CELL_SPAN;
  }

  /**
   * Index of the rightmost span with start <= loc, or -1
   */
  private lastStartingAtOrBefore(loc: number): number {
    let lo = 0;
    let hi = this.spans.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const span = this.spans[mid];
      if (span && span.start <= loc) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo - 1;
  }

  /**
   * Index of the first span with end >= loc (spans.length if none)
   */
  private firstEndingAtOrAfter(loc: number): number {
    let lo = 0;
    let hi = this.spans.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const span = this.spans[mid];
      if (span && span.end < loc) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  /**
   * Merge the span at `index` with touching same-code neighbours
   */
  private coalesceAround(index: number): void {
    const span = this.spans[index];
    if (!span) return;

    const next = this.spans[index + 1];
    if (next && next.code === span.code && next.start === span.end) {
      span.absorb(next);
      this.spans.splice(index + 1, 1);
    }

    const prev = this.spans[index - 1];
    if (prev && prev.code === span.code && prev.end === span.start) {
      prev.absorb(span);
      this.spans.splice(index, 1);
    }
  }
}
