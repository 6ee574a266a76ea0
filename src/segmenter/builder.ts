import { performance } from 'perf_hooks';
import * as math from 'mathjs';

import { DetectedObject, Mask, RgbImage, SegmentationModel, SegmentationResult } from './common.js';
import { InvalidInputError, ModelInferenceError, describeError } from './errors.js';
import { compositeOverlay, DEFAULT_ALPHA } from './overlay.js';
import { logger } from './logger.js';

export type BuilderOptions = {
  alpha?: number;
  /** Milliseconds; defaults to `performance.now`. */
  now?: () => number;
};

export interface SegmentationResponse {
  overlay: RgbImage;
  result: SegmentationResult;
}

export function assertValidImage(image: RgbImage | null | undefined): asserts image is RgbImage {
  if (!image) {
    throw new InvalidInputError('No image provided');
  }
  const { width, height, channels, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidInputError(`Image must be non-empty, got ${width}x${height}`);
  }
  if (channels !== 3) {
    throw new InvalidInputError(`Expected 3 channels, got ${channels}`);
  }
  if (data.length !== width * height * 3) {
    throw new InvalidInputError(`Pixel buffer holds ${data.length} bytes, expected ${width * height * 3}`);
  }
}

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function describeObjects(masks: readonly Mask[]): DetectedObject[] {
  return masks.map((mask, id) => ({
    id,
    confidence: clampUnit(mask.confidence),
    area_pixels: mask.area,
  }));
}

/**
 * Runs the model on one image, tints the masks it keeps and describes them.
 * The model handle is passed in so one loaded model can serve every request.
 */
export async function buildSegmentationResponse(
  model: SegmentationModel,
  image: RgbImage,
  options: BuilderOptions = {},
): Promise<SegmentationResponse> {
  assertValidImage(image);
  const now = options.now ?? (() => performance.now());
  const alpha = options.alpha ?? DEFAULT_ALPHA;

  const start = now();
  let masks: Mask[];
  try {
    masks = await model.predict(image);
  } catch (err) {
    if (err instanceof ModelInferenceError) throw err;
    throw new ModelInferenceError(`Model ${model.name} failed: ${describeError(err)}`, { cause: err });
  }

  for (const mask of masks) {
    if (mask.width !== image.width || mask.height !== image.height) {
      throw new ModelInferenceError(
        `Model ${model.name} returned a ${mask.width}x${mask.height} mask for a ${image.width}x${image.height} image`,
      );
    }
  }

  const kept = masks.filter(mask => mask.area > 0);
  logger.debug(`model ${model.name} returned ${masks.length} masks, kept ${kept.length}`);

  const overlay = compositeOverlay(image, kept, alpha);
  const detected = describeObjects(kept);
  const elapsed = Math.max(0, now() - start) / 1000;

  return {
    overlay,
    result: {
      detected_objects: detected,
      processing_time: math.round(elapsed, 2),
      total_objects: detected.length,
    },
  };
}
