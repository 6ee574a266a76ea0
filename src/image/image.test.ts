import sharp from 'sharp';

import { InvalidInputError } from '@/segmenter/errors.js';
import { blobFromImage, decodeImage, encodePng, preprocessShape, resizeImage } from './image.js';

function solidPng(width: number, height: number, r: number, g: number, b: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r, g, b } } })
    .png()
    .toBuffer();
}

describe('decodeImage', () => {
  it('decodes a PNG into interleaved RGB', async () => {
    const image = await decodeImage(await solidPng(2, 2, 10, 20, 30));

    expect(image.width).toBe(2);
    expect(image.height).toBe(2);
    expect(image.channels).toBe(3);
    expect(Array.from(image.data)).toEqual([10, 20, 30, 10, 20, 30, 10, 20, 30, 10, 20, 30]);
  });

  it('drops the alpha channel', async () => {
    const png = await sharp({ create: { width: 1, height: 1, channels: 4, background: { r: 5, g: 6, b: 7, alpha: 1 } } })
      .png()
      .toBuffer();

    const image = await decodeImage(png);

    expect(Array.from(image.data)).toEqual([5, 6, 7]);
  });

  it('expands grayscale to three equal channels', async () => {
    const gray = await sharp(await solidPng(1, 1, 90, 90, 90)).grayscale().png().toBuffer();

    const image = await decodeImage(gray);

    expect(image.data.length).toBe(3);
    expect(image.data[0]).toBe(image.data[1]);
    expect(image.data[1]).toBe(image.data[2]);
  });

  it('rejects empty and undecodable bytes', async () => {
    await expect(decodeImage(new Uint8Array(0))).rejects.toThrow('Empty image data');
    await expect(decodeImage(Buffer.from('definitely not an image'))).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('encodePng', () => {
  it('keeps every pixel', async () => {
    const image = { width: 2, height: 1, channels: 3 as const, data: new Uint8Array([1, 2, 3, 250, 251, 252]) };

    const png = await encodePng(image);
    const back = await decodeImage(png);

    expect((await sharp(png).metadata()).format).toBe('png');
    expect(Array.from(back.data)).toEqual([1, 2, 3, 250, 251, 252]);
  });
});

describe('preprocessShape', () => {
  it('scales the longest side to the target', () => {
    expect(preprocessShape(480, 640, 1024)).toEqual([768, 1024]);
    expect(preprocessShape(1000, 500, 1024)).toEqual([1024, 512]);
  });
});

describe('resizeImage', () => {
  it('returns the same image when the size already matches', async () => {
    const image = { width: 1, height: 1, channels: 3 as const, data: new Uint8Array([1, 2, 3]) };
    expect(await resizeImage(image, 1, 1)).toBe(image);
  });
});

describe('blobFromImage', () => {
  it('resizes, normalizes and pads to a square NCHW tensor', async () => {
    const image = await decodeImage(await solidPng(2, 1, 10, 20, 30));

    const blob = await blobFromImage(image, 4, [0, 0, 0], [2, 2, 2]);

    expect(blob.shape).toEqual([1, 3, 4, 4]);
    expect(blob.data.length).toBe(48);
    // rows 0-1 hold the 4x2 resized image, rows 2-3 are padding
    expect(blob.data[0]).toBe(5);
    expect(blob.data[16 + 5]).toBe(10);
    expect(blob.data[32 + 7]).toBe(15);
    expect(blob.data[8]).toBe(0);
    expect(blob.data[32 + 15]).toBe(0);
  });
});
