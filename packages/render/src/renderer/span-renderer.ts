import { CELL_SPAN } from '@beatgrid/protocol';
import { ANSIBuilder } from '../ansi/builder.js';
import { cellText } from '../buffer/glyph-width.js';
import type { SpanView } from '../buffer/span.js';

/**
 * Result of encoding one frame
 */
export interface EncodedFrame {
  output: string;
  spanCount: number;
}

/**
 * Encodes pending spans as cursor moves, style tokens and cell text.
 *
 * Layers are emitted in the order given, so later layers are painted over
 * earlier ones by the terminal.
 */
export class SpanRenderer {
  private ansi = new ANSIBuilder();
  private readonly rowSpan: number;

  constructor(
    private readonly width: number,
    private readonly height: number
  ) {
    this.rowSpan = width * CELL_SPAN;
  }

  encode(layers: ReadonlyArray<readonly SpanView[]>): EncodedFrame {
    let spanCount = 0;
    for (const spans of layers) {
      for (const span of spans) {
        this.writeSpan(span);
        spanCount++;
      }
    }

    this.ansi.resetAttributes().moveTo(0, this.height);
    return { output: this.ansi.build(), spanCount };
  }

  /**
   * Cut a span at each row boundary; the style is set once since cursor
   * moves leave it in place.
   */
  private writeSpan(span: SpanView): void {
    let row = Math.floor(span.start / this.rowSpan);
    let cell = (span.start % this.rowSpan) / CELL_SPAN;
    let index = 0;

    while (index < span.glyphs.length && row < this.height) {
      const take = Math.min(this.width - cell, span.glyphs.length - index);
      this.ansi.moveTo(cell * CELL_SPAN, row);
      if (index === 0) this.ansi.setStyle(span.code);
      this.ansi.write(span.glyphs.slice(index, index + take).map(cellText).join(''));

      index += take;
      row++;
      cell = 0;
    }
  }
}
