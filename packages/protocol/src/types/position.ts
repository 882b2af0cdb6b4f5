/**
 * Rectangle definition in grid cells
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}
