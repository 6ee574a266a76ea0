import sharp from 'sharp';

import { RgbImage } from '@/segmenter/common.js';
import { InvalidInputError, describeError } from '@/segmenter/errors.js';

export class DnnBlob {
  data: Float32Array;
  shape: number[];

  constructor(data: Float32Array, shape: number[]) {
    this.data = data;
    this.shape = shape;
  }
}

function expandToRgb(data: Buffer, width: number, height: number, channels: number): Uint8Array {
  if (channels === 3) {
    return new Uint8Array(data.buffer, data.byteOffset, data.byteLength).slice();
  }
  const out = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    const src = i * channels;
    if (channels < 3) {
      out.fill(data[src], i * 3, i * 3 + 3);
    } else {
      out[i * 3] = data[src];
      out[i * 3 + 1] = data[src + 1];
      out[i * 3 + 2] = data[src + 2];
    }
  }
  return out;
}

export async function decodeImage(bytes: Uint8Array): Promise<RgbImage> {
  if (!bytes || bytes.length === 0) {
    throw new InvalidInputError('Empty image data');
  }

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await sharp(bytes).rotate().removeAlpha().raw().toBuffer({ resolveWithObject: true });
  } catch (err) {
    throw new InvalidInputError(`Could not decode image: ${describeError(err)}`, { cause: err });
  }

  const { width, height, channels } = decoded.info;
  if (width <= 0 || height <= 0) {
    throw new InvalidInputError(`Decoded image is empty (${width}x${height})`);
  }
  return { width, height, channels: 3, data: expandToRgb(decoded.data, width, height, channels) };
}

export async function encodePng(image: RgbImage): Promise<Buffer> {
  return sharp(image.data, { raw: { width: image.width, height: image.height, channels: 3 } })
    .png()
    .toBuffer();
}

export async function resizeImage(image: RgbImage, width: number, height: number): Promise<RgbImage> {
  if (width === image.width && height === image.height) {
    return image;
  }
  const data = await sharp(image.data, { raw: { width: image.width, height: image.height, channels: 3 } })
    .resize(width, height, { fit: 'fill' })
    .raw()
    .toBuffer();
  return { width, height, channels: 3, data: new Uint8Array(data) };
}

/** Output size after scaling so the longest side is `longSide`. */
export function preprocessShape(height: number, width: number, longSide: number): [number, number] {
  const scale = longSide / Math.max(height, width);
  return [Math.floor(height * scale + 0.5), Math.floor(width * scale + 0.5)];
}

/**
 * Longest side to `size`, zero padded at the bottom and right, NCHW float32.
 */
export async function blobFromImage(
  image: RgbImage,
  size: number = 1024,
  mean: [number, number, number] = [0, 0, 0],
  std: [number, number, number] = [1, 1, 1],
): Promise<DnnBlob> {
  const [dstH, dstW] = preprocessShape(image.height, image.width, size);
  const resized = await resizeImage(image, dstW, dstH);

  const plane = size * size;
  const blob = new Float32Array(3 * plane);
  for (let y = 0; y < dstH; y++) {
    for (let x = 0; x < dstW; x++) {
      const src = (y * dstW + x) * 3;
      const idx = y * size + x;
      for (let c = 0; c < 3; c++) {
        blob[c * plane + idx] = (resized.data[src + c] - mean[c]) / std[c];
      }
    }
  }

  return new DnnBlob(blob, [1, 3, size, size]);
}
