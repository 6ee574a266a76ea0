import { getModel } from '@/sam/model_zoo.js';
import { Settings, loadSettings } from '@/segmenter/config.js';
import { setDebug } from '@/segmenter/logger.js';
import { SegmentService } from '@/segmenter/service.js';

export { Mask, createImage } from '@/segmenter/common.js';
export type { DetectedObject, Rgb, RgbImage, SegmentationModel, SegmentationResult } from '@/segmenter/common.js';
export { buildSegmentationResponse, assertValidImage } from '@/segmenter/builder.js';
export type { BuilderOptions, SegmentationResponse } from '@/segmenter/builder.js';
export { SegmentationError, InvalidInputError, ModelInferenceError } from '@/segmenter/errors.js';
export { compositeOverlay, DEFAULT_ALPHA } from '@/segmenter/overlay.js';
export { paletteColor, PALETTE_SIZE } from '@/segmenter/palette.js';
export { toTransportHeaders, serializeResult } from '@/segmenter/headers.js';
export { validateUpload, ALLOWED_CONTENT_TYPES, DEFAULT_MAX_FILE_SIZE } from '@/segmenter/upload.js';
export type { Upload } from '@/segmenter/upload.js';
export { loadSettings } from '@/segmenter/config.js';
export type { Settings } from '@/segmenter/config.js';
export { SegmentService } from '@/segmenter/service.js';
export type { SegmentResponse, SegmentServiceOptions } from '@/segmenter/service.js';
export { decodeImage, encodePng } from '@/image/image.js';
export { SegmentAnything } from '@/sam/segment_anything.js';
export type { SamOptions } from '@/sam/segment_anything.js';
export { getModel, ModelRouter } from '@/sam/model_zoo.js';

/** Loads the model once and returns the service every request goes through. */
export async function createSegmentService(settings: Settings = loadSettings()): Promise<SegmentService> {
  setDebug(settings.debug);
  const model = await getModel(settings.modelName, {
    root: settings.modelRoot,
    baseUrl: settings.modelBaseUrl,
    download: settings.download,
    providers: settings.providers,
    pointsPerSide: settings.pointsPerSide,
    predIouThresh: settings.predIouThresh,
    maskThreshold: settings.maskThreshold,
  });
  return new SegmentService(model, { alpha: settings.overlayAlpha, maxFileSize: settings.maxFileSize });
}
