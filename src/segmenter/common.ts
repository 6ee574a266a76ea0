export type Rgb = [number, number, number];

/** Row-major, interleaved 8-bit RGB. */
export interface RgbImage {
  width: number;
  height: number;
  channels: 3;
  data: Uint8Array;
}

export function createImage(width: number, height: number, fill: Rgb = [0, 0, 0]): RgbImage {
  const data = new Uint8Array(width * height * 3);
  for (let i = 0; i < width * height; i++) {
    data[i * 3] = fill[0];
    data[i * 3 + 1] = fill[1];
    data[i * 3 + 2] = fill[2];
  }
  return { width, height, channels: 3, data };
}

/**
 * Per-pixel membership of one candidate object, aligned to the source image.
 * Built once from model output and never modified.
 */
export class Mask {
  readonly width: number;
  readonly height: number;
  readonly confidence: number;
  private readonly bits: Uint8Array;
  private cachedArea: number | null = null;

  /** Any non-zero cell of `bits` is a member; the grid is copied. */
  constructor(width: number, height: number, bits: ArrayLike<number>, confidence: number) {
    if (bits.length !== width * height) {
      throw new RangeError(`mask of ${width}x${height} needs ${width * height} cells, got ${bits.length}`);
    }
    this.width = width;
    this.height = height;
    this.bits = Uint8Array.from(bits, value => (value ? 1 : 0));
    this.confidence = confidence;
  }

  static fromBinary(width: number, height: number, bits: ArrayLike<number | boolean>, confidence: number): Mask {
    return new Mask(width, height, Array.from(bits, value => (value ? 1 : 0)), confidence);
  }

  static fromProbabilities(
    width: number,
    height: number,
    probabilities: ArrayLike<number>,
    confidence: number,
    threshold: number = 0.5,
  ): Mask {
    const out = new Uint8Array(width * height);
    for (let i = 0; i < out.length; i++) {
      out[i] = probabilities[i] >= threshold ? 1 : 0;
    }
    return new Mask(width, height, out, confidence);
  }

  has(index: number): boolean {
    return this.bits[index] === 1;
  }

  get area(): number {
    if (this.cachedArea === null) {
      let count = 0;
      for (let i = 0; i < this.bits.length; i++) {
        count += this.bits[i];
      }
      this.cachedArea = count;
    }
    return this.cachedArea;
  }
}

export interface DetectedObject {
  id: number;
  confidence: number;
  area_pixels: number;
}

export interface SegmentationResult {
  detected_objects: DetectedObject[];
  processing_time: number;
  total_objects: number;
}

/**
 * The pretrained network seen as a black box: image in, ordered masks out.
 * Implementations that are not safe for concurrent use must serialize calls themselves.
 */
export interface SegmentationModel {
  readonly name: string;
  predict(image: RgbImage): Promise<Mask[]>;
}
