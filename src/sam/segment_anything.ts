import * as ort from 'onnxruntime-node';

import { blobFromImage } from '@/image/image.js';
import { Mask, RgbImage, SegmentationModel } from '@/segmenter/common.js';
import { ModelInferenceError, describeError } from '@/segmenter/errors.js';
import { logger } from '@/segmenter/logger.js';
import { readGraph, normalizesInGraph } from './graph.js';
import { argMax, buildPointGrid, floatData, Point, scaleCoords, TensorLike, thresholdPlane } from './utils.js';

type Triple = [number, number, number];

const SAM_PIXEL_MEAN: Triple = [123.675, 116.28, 103.53];
const SAM_PIXEL_STD: Triple = [58.395, 57.12, 57.375];
const LOW_RES_MASK_SIZE = 256;

export interface SessionLike {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(feeds: Record<string, ort.Tensor>): Promise<Record<string, TensorLike>>;
}

export type SamOptions = {
  providers?: string[];
  pointsPerSide?: number;
  predIouThresh?: number;
  maskThreshold?: number;
  inputSize?: number;
};

/**
 * Segment Anything split into an image encoder and a prompt decoder, prompted
 * with a regular grid of foreground points.
 */
export class SegmentAnything implements SegmentationModel {
  readonly name: string;
  encoderFile: string;
  decoderFile: string;
  encoder: SessionLike | null;
  decoder: SessionLike | null;
  providers: string[];
  pointsPerSide: number;
  predIouThresh: number;
  maskThreshold: number;
  inputSize: number;
  inputMean: Triple = SAM_PIXEL_MEAN;
  inputStd: Triple = SAM_PIXEL_STD;
  private pending: Promise<void> = Promise.resolve();

  constructor(
    name: string,
    encoderFile: string,
    decoderFile: string,
    options: SamOptions = {},
    sessions: { encoder: SessionLike; decoder: SessionLike } | null = null,
  ) {
    if (!encoderFile || !decoderFile) {
      throw new Error('Encoder and decoder model files are required');
    }
    this.name = name;
    this.encoderFile = encoderFile;
    this.decoderFile = decoderFile;
    this.encoder = sessions?.encoder ?? null;
    this.decoder = sessions?.decoder ?? null;
    this.providers = options.providers ?? ['cpu'];
    this.pointsPerSide = options.pointsPerSide ?? 16;
    this.predIouThresh = options.predIouThresh ?? 0.88;
    this.maskThreshold = options.maskThreshold ?? 0.0;
    this.inputSize = options.inputSize ?? 1024;
  }

  async init(): Promise<void> {
    const sessionOptions: ort.InferenceSession.SessionOptions = { executionProviders: this.providers };
    this.encoder ??= await ort.InferenceSession.create(this.encoderFile, sessionOptions);
    this.decoder ??= await ort.InferenceSession.create(this.decoderFile, sessionOptions);

    const graph = await readGraph(this.encoderFile);
    if (normalizesInGraph(graph.nodes)) {
      this.inputMean = [0, 0, 0];
      this.inputStd = [1, 1, 1];
    } else {
      this.inputMean = SAM_PIXEL_MEAN;
      this.inputStd = SAM_PIXEL_STD;
    }
    logger.info('find model:', this.name, this.encoderFile, this.decoderFile, this.inputMean, this.inputStd);
  }

  predict(image: RgbImage): Promise<Mask[]> {
    return this.exclusive(() => this.segment(image));
  }

  /** Sessions are not shared between concurrent runs; calls queue in arrival order. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    this.pending = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async segment(image: RgbImage): Promise<Mask[]> {
    const { encoder, decoder } = this;
    if (!encoder || !decoder) {
      throw new ModelInferenceError(`Model ${this.name} is not initialized`);
    }

    try {
      const embeddings = await this.embed(encoder, image);
      const grid = buildPointGrid(this.pointsPerSide).map(([x, y]): Point => [x * image.width, y * image.height]);
      const points = scaleCoords(grid, image.height, image.width, this.inputSize);
      const fixed = this.fixedDecoderInputs(image);

      const masks: Mask[] = [];
      for (const point of points) {
        const mask = await this.decodePoint(decoder, embeddings, fixed, point, image);
        if (mask) masks.push(mask);
      }
      logger.debug(`${this.name}: ${masks.length} of ${points.length} prompts passed iou ${this.predIouThresh}`);
      return masks;
    } catch (err) {
      if (err instanceof ModelInferenceError) throw err;
      throw new ModelInferenceError(`Inference with ${this.name} failed: ${describeError(err)}`, { cause: err });
    }
  }

  private async embed(encoder: SessionLike, image: RgbImage): Promise<ort.Tensor> {
    const blob = await blobFromImage(image, this.inputSize, this.inputMean, this.inputStd);
    const input = new ort.Tensor('float32', blob.data, blob.shape);
    const results = await encoder.run({ [encoder.inputNames[0]]: input });

    const outputName = encoder.outputNames.includes('image_embeddings') ? 'image_embeddings' : encoder.outputNames[0];
    const output = results[outputName];
    return new ort.Tensor('float32', floatData(output, outputName), [...output.dims]);
  }

  private fixedDecoderInputs(image: RgbImage): Record<string, ort.Tensor> {
    const maskCells = LOW_RES_MASK_SIZE * LOW_RES_MASK_SIZE;
    return {
      mask_input: new ort.Tensor('float32', new Float32Array(maskCells), [1, 1, LOW_RES_MASK_SIZE, LOW_RES_MASK_SIZE]),
      has_mask_input: new ort.Tensor('float32', new Float32Array([0]), [1]),
      orig_im_size: new ort.Tensor('float32', new Float32Array([image.height, image.width]), [2]),
    };
  }

  private async decodePoint(
    decoder: SessionLike,
    embeddings: ort.Tensor,
    fixed: Record<string, ort.Tensor>,
    [x, y]: Point,
    image: RgbImage,
  ): Promise<Mask | null> {
    const available: Record<string, ort.Tensor> = {
      ...fixed,
      image_embeddings: embeddings,
      // the second point is the padding prompt the exported decoder expects
      point_coords: new ort.Tensor('float32', new Float32Array([x, y, 0, 0]), [1, 2, 2]),
      point_labels: new ort.Tensor('float32', new Float32Array([1, -1]), [1, 2]),
    };
    const feeds: Record<string, ort.Tensor> = {};
    for (const name of decoder.inputNames) {
      if (!(name in available)) {
        throw new ModelInferenceError(`Decoder input ${name} is not supported`);
      }
      feeds[name] = available[name];
    }

    const results = await decoder.run(feeds);
    const masksName = decoder.outputNames.includes('masks') ? 'masks' : decoder.outputNames[0];
    const scoresName = decoder.outputNames.includes('iou_predictions') ? 'iou_predictions' : decoder.outputNames[1];
    const logits = floatData(results[masksName], masksName);
    const scores = floatData(results[scoresName], scoresName);

    const dims = results[masksName].dims;
    const [height, width] = dims.slice(-2);
    if (height !== image.height || width !== image.width) {
      throw new ModelInferenceError(
        `Decoder produced ${width}x${height} masks for a ${image.width}x${image.height} image`,
      );
    }

    const best = argMax(scores);
    if (scores[best] < this.predIouThresh) {
      return null;
    }
    const bits = thresholdPlane(logits, best, width * height, this.maskThreshold);
    return new Mask(width, height, bits, scores[best]);
  }
}
