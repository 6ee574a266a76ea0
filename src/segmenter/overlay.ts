import { Mask, RgbImage } from './common.js';
import { paletteColor } from './palette.js';

export const DEFAULT_ALPHA = 0.5;

/**
 * Tints every pixel covered by a mask with that mask's palette color.
 * Where masks overlap the later one owns the pixel; its color is blended with the
 * source pixel, not with an earlier tint.
 */
export function compositeOverlay(image: RgbImage, masks: readonly Mask[], alpha: number = DEFAULT_ALPHA): RgbImage {
  if (alpha < 0 || alpha > 1) {
    throw new RangeError(`alpha must be within [0, 1], got ${alpha}`);
  }

  const pixels = image.width * image.height;
  const owner = new Int32Array(pixels).fill(-1);
  masks.forEach((mask, k) => {
    for (let i = 0; i < pixels; i++) {
      if (mask.has(i)) owner[i] = k;
    }
  });

  const colors = masks.map((_, k) => paletteColor(k));
  const out = new Uint8Array(image.data);
  for (let i = 0; i < pixels; i++) {
    const k = owner[i];
    if (k < 0) continue;
    const color = colors[k];
    for (let c = 0; c < 3; c++) {
      const idx = i * 3 + c;
      out[idx] = Math.round(image.data[idx] * (1 - alpha) + color[c] * alpha);
    }
  }

  return { width: image.width, height: image.height, channels: 3, data: out };
}
