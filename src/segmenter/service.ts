import { decodeImage, encodePng } from '@/image/image.js';
import { buildSegmentationResponse, BuilderOptions } from './builder.js';
import { SegmentationModel, SegmentationResult } from './common.js';
import { describeError } from './errors.js';
import { toTransportHeaders } from './headers.js';
import { logger } from './logger.js';
import { DEFAULT_MAX_FILE_SIZE, Upload, validateUpload } from './upload.js';

export interface SegmentResponse {
  body: Buffer;
  headers: Record<string, string>;
  result: SegmentationResult;
}

export type SegmentServiceOptions = BuilderOptions & {
  maxFileSize?: number;
};

/**
 * Upload in, PNG overlay and headers out. Holds the one model handle shared by
 * every request.
 */
export class SegmentService {
  readonly model: SegmentationModel;
  private readonly options: SegmentServiceOptions;

  constructor(model: SegmentationModel, options: SegmentServiceOptions = {}) {
    this.model = model;
    this.options = options;
  }

  async segment(upload: Upload): Promise<SegmentResponse> {
    validateUpload(upload, this.options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE);
    logger.info(`Processing image: ${upload.filename} (${upload.data.length} bytes)`);

    try {
      const image = await decodeImage(upload.data);
      const { overlay, result } = await buildSegmentationResponse(this.model, image, this.options);
      const body = await encodePng(overlay);

      logger.info(
        `Segmentation completed for ${upload.filename}. ` +
          `Found ${result.total_objects} objects in ${result.processing_time.toFixed(2)}s`,
      );
      return { body, headers: toTransportHeaders(result, upload.filename), result };
    } catch (err) {
      logger.error(`Segmentation failed for ${upload.filename}: ${describeError(err)}`);
      throw err;
    }
  }
}
