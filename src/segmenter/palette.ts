import { Rgb } from './common.js';

const PALETTE: readonly Rgb[] = [
  [31, 119, 180],
  [255, 127, 14],
  [44, 160, 44],
  [214, 39, 40],
  [148, 103, 189],
  [140, 86, 75],
  [227, 119, 194],
  [127, 127, 127],
  [188, 189, 34],
  [23, 190, 207],
];

export const PALETTE_SIZE = PALETTE.length;

export function paletteColor(index: number): Rgb {
  if (!Number.isInteger(index) || index < 0) {
    throw new RangeError(`palette index must be a non-negative integer, got ${index}`);
  }
  const [r, g, b] = PALETTE[index % PALETTE.length];
  return [r, g, b];
}
