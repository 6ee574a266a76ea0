import fs from 'fs';
import os from 'os';
import path from 'path';
import type * as ort from 'onnxruntime-node';

import { createImage } from '@/segmenter/common.js';
import { ModelInferenceError } from '@/segmenter/errors.js';
import { loadModelType } from './graph.js';
import { SegmentAnything, SessionLike } from './segment_anything.js';
import { TensorLike } from './utils.js';

const DECODER_INPUTS = ['image_embeddings', 'point_coords', 'point_labels', 'mask_input', 'has_mask_input', 'orig_im_size'];

function encoderSession(events: string[] = []): SessionLike {
  return {
    inputNames: ['input_image'],
    outputNames: ['image_embeddings'],
    async run(): Promise<Record<string, TensorLike>> {
      events.push('encode:start');
      await new Promise(resolve => setTimeout(resolve, 5));
      events.push('encode:end');
      return { image_embeddings: { data: new Float32Array(8), dims: [1, 2, 2, 2] } };
    },
  };
}

/** 4x4 masks: plane 0 is empty, plane 1 covers the first row. */
function decoderSession(scores: number[], seen: Record<string, ort.Tensor>[] = [], inputNames = DECODER_INPUTS): SessionLike {
  const logits = new Float32Array(32).fill(-1);
  logits.fill(1, 16, 20);
  return {
    inputNames,
    outputNames: ['masks', 'iou_predictions', 'low_res_masks'],
    async run(feeds: Record<string, ort.Tensor>): Promise<Record<string, TensorLike>> {
      seen.push(feeds);
      return {
        masks: { data: logits, dims: [1, 2, 4, 4] },
        iou_predictions: { data: new Float32Array(scores), dims: [1, 2] },
      };
    },
  };
}

describe('SegmentAnything', () => {
  let dir: string;
  let encoderFile: string;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'segment-overlay-sam-'));
    encoderFile = path.join(dir, 'encoder.onnx');
    const modelProto = await loadModelType();
    fs.writeFileSync(
      encoderFile,
      modelProto.encode(modelProto.fromObject({ graph: { node: [{ name: 'Conv_0', opType: 'Conv' }] } })).finish(),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function build(decoder: SessionLike, encoder: SessionLike = encoderSession()): SegmentAnything {
    return new SegmentAnything('sam_test', encoderFile, 'decoder.onnx', { pointsPerSide: 1, inputSize: 8 }, { encoder, decoder });
  }

  it('uses the SAM pixel statistics when the graph does not normalize', async () => {
    const model = build(decoderSession([0.5, 0.93]));
    await model.init();

    expect(model.inputMean).toEqual([123.675, 116.28, 103.53]);
    expect(model.inputStd).toEqual([58.395, 57.12, 57.375]);
  });

  it('feeds raw pixels when the graph normalizes', async () => {
    const modelProto = await loadModelType();
    const nodes = [{ name: 'Sub_0', opType: 'Sub' }, { name: 'Div_1', opType: 'Div' }];
    fs.writeFileSync(encoderFile, modelProto.encode(modelProto.fromObject({ graph: { node: nodes } })).finish());

    const model = build(decoderSession([0.5, 0.93]));
    await model.init();

    expect(model.inputMean).toEqual([0, 0, 0]);
    expect(model.inputStd).toEqual([1, 1, 1]);
  });

  it('keeps the best mask of each prompt that passes the iou threshold', async () => {
    const seen: Record<string, ort.Tensor>[] = [];
    const model = build(decoderSession([0.5, 0.93], seen));
    await model.init();

    const masks = await model.predict(createImage(4, 4));

    expect(masks).toHaveLength(1);
    expect(masks[0].area).toBe(4);
    expect(masks[0].confidence).toBeCloseTo(0.93, 5);
    expect(Object.keys(seen[0]).sort()).toEqual([...DECODER_INPUTS].sort());
    expect(seen[0].point_coords.data).toEqual(new Float32Array([4, 4, 0, 0]));
    expect(seen[0].point_labels.data).toEqual(new Float32Array([1, -1]));
    expect(seen[0].orig_im_size.data).toEqual(new Float32Array([4, 4]));
  });

  it('prompts once per grid point', async () => {
    const seen: Record<string, ort.Tensor>[] = [];
    const model = new SegmentAnything('sam_test', encoderFile, 'decoder.onnx', { pointsPerSide: 2, inputSize: 8 }, {
      encoder: encoderSession(),
      decoder: decoderSession([0.9, 0.2], seen),
    });
    await model.init();

    const masks = await model.predict(createImage(4, 4));

    expect(seen).toHaveLength(4);
    expect(masks).toHaveLength(4);
    expect(masks.every(mask => mask.area === 0)).toBe(true);
    expect(seen.map(feeds => feeds.point_coords.data)).toEqual([
      new Float32Array([2, 2, 0, 0]),
      new Float32Array([6, 2, 0, 0]),
      new Float32Array([2, 6, 0, 0]),
      new Float32Array([6, 6, 0, 0]),
    ]);
  });

  it('drops prompts below the iou threshold', async () => {
    const model = build(decoderSession([0.5, 0.6]));
    await model.init();

    await expect(model.predict(createImage(4, 4))).resolves.toEqual([]);
  });

  it('runs one prediction at a time', async () => {
    const events: string[] = [];
    const model = build(decoderSession([0.5, 0.93]), encoderSession(events));
    await model.init();

    await Promise.all([model.predict(createImage(4, 4)), model.predict(createImage(4, 4))]);

    expect(events).toEqual(['encode:start', 'encode:end', 'encode:start', 'encode:end']);
  });

  it('refuses to run before init', async () => {
    const model = new SegmentAnything('sam_test', encoderFile, 'decoder.onnx');

    await expect(model.predict(createImage(4, 4))).rejects.toThrow('Model sam_test is not initialized');
  });

  it('reports decoder inputs it cannot provide', async () => {
    const model = build(decoderSession([0.5, 0.93], [], [...DECODER_INPUTS, 'prompt_boxes']));
    await model.init();

    await expect(model.predict(createImage(4, 4))).rejects.toThrow('Decoder input prompt_boxes is not supported');
  });

  it('rejects masks that do not match the image', async () => {
    const model = build(decoderSession([0.5, 0.93]));
    await model.init();

    await expect(model.predict(createImage(2, 2))).rejects.toThrow(ModelInferenceError);
  });

  it('wraps session failures', async () => {
    const broken: SessionLike = {
      inputNames: ['input_image'],
      outputNames: ['image_embeddings'],
      run: () => Promise.reject(new Error('bad alloc')),
    };
    const model = build(decoderSession([0.5, 0.93]), broken);
    await model.init();

    await expect(model.predict(createImage(4, 4))).rejects.toThrow('Inference with sam_test failed: bad alloc');
  });
});
