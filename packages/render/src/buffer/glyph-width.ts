// Terminal display width of a single glyph (wcwidth-style ranges)

/**
 * Display width of one glyph in terminal columns:
 * 0 for zero-width marks, 1 for narrow, 2 for wide (CJK, full-width, emoji),
 * -1 for control characters.
 */
export function glyphWidth(glyph: string): number {
  const codePoint = glyph.codePointAt(0);
  if (codePoint === undefined) return 0;

  if (codePoint < 32 || (codePoint >= 0x7f && codePoint < 0xa0)) return -1;
  if (isZeroWidth(codePoint)) return 0;
  if (isWide(codePoint)) return 2;
  return 1;
}

/**
 * Text that fills exactly one double-width cell.
 *
 * Wide glyphs fill it on their own, narrow glyphs get one pad space, and
 * glyphs that would not advance the cursor correctly are replaced by blanks.
 */
export function cellText(glyph: string): string {
  switch (glyphWidth(glyph)) {
    case 2:
      return glyph;
    case 1:
      return `${glyph} `;
    default:
      return '  ';
  }
}

function isZeroWidth(codePoint: number): boolean {
  // Combining marks
  if (codePoint >= 0x0300 && codePoint <= 0x036f) return true;
  if (codePoint >= 0x1ab0 && codePoint <= 0x1aff) return true;
  if (codePoint >= 0x1dc0 && codePoint <= 0x1dff) return true;
  if (codePoint >= 0x20d0 && codePoint <= 0x20ff) return true;
  if (codePoint >= 0xfe20 && codePoint <= 0xfe2f) return true;

  return codePoint === 0x200b || codePoint === 0x200c || codePoint === 0x200d || codePoint === 0xfeff;
}

function isWide(codePoint: number): boolean {
  // East Asian wide and full-width
  if (codePoint >= 0x1100 && codePoint <= 0x115f) return true;
  if (codePoint >= 0x2329 && codePoint <= 0x232a) return true;
  if (codePoint >= 0x2e80 && codePoint <= 0x303e) return true;
  if (codePoint >= 0x3040 && codePoint <= 0xa4cf) return true;
  if (codePoint >= 0xac00 && codePoint <= 0xd7a3) return true;
  if (codePoint >= 0xf900 && codePoint <= 0xfaff) return true;
  if (codePoint >= 0xfe10 && codePoint <= 0xfe19) return true;
  if (codePoint >= 0xfe30 && codePoint <= 0xfe6f) return true;
  if (codePoint >= 0xff00 && codePoint <= 0xff60) return true;
  if (codePoint >= 0xffe0 && codePoint <= 0xffe6) return true;

  // Emoji
  if (codePoint >= 0x1f300 && codePoint <= 0x1f64f) return true;
  if (codePoint >= 0x1f680 && codePoint <= 0x1f6ff) return true;
  if (codePoint >= 0x1f900 && codePoint <= 0x1faff) return true;

  return false;
}
