// Canvas defaults
export const DEFAULT_CANVAS_WIDTH = 40;
export const DEFAULT_CANVAS_HEIGHT = 12;
export const DEFAULT_LAYER_COUNT = 5;

// Every cell takes two flattened offsets and two terminal columns
export const CELL_SPAN = 2;

// Beat timing
export const DEFAULT_BPM = 120;
export const DEFAULT_CATCH_UP_LIMIT = 4;
