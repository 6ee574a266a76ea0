import fs from 'fs';
import path from 'path';
import * as glob from 'glob';
import * as ort from 'onnxruntime-node';

import { logger } from '@/segmenter/logger.js';
import { DEFAULT_ROOT, ensureAvailable } from './utils.js';
import { SamOptions, SegmentAnything } from './segment_anything.js';

export type ModelRole = 'encoder' | 'decoder' | 'unknown';

export type GetModelOptions = SamOptions & {
  root?: string;
  baseUrl?: string;
  download?: boolean;
};

export function findOnnxFiles(dirPath: string): string[] {
  return glob.sync('*.onnx', { cwd: dirPath, absolute: true }).sort();
}

export class ModelRouter {
  static classify(session: { inputNames: readonly string[]; outputNames: readonly string[] }): ModelRole {
    if (session.inputNames.includes('image_embeddings')) {
      return 'decoder';
    }
    if (session.outputNames.includes('image_embeddings')) {
      return 'encoder';
    }
    return 'unknown';
  }

  static async route(files: string[], providers: string[]): Promise<{ encoder?: string; decoder?: string }> {
    const found: { encoder?: string; decoder?: string } = {};
    for (const file of files) {
      const session = await ort.InferenceSession.create(file, { executionProviders: providers });
      const role = ModelRouter.classify(session);

      if (role === 'unknown') {
        logger.warn('model not recognized:', file);
      } else if (found[role]) {
        logger.warn('duplicated model role, ignoring:', file, role);
      } else {
        logger.info('find model:', file, role);
        found[role] = file;
      }
    }
    return found;
  }
}

/**
 * Resolves `<root>/models/<name>`, downloading it when allowed, and returns an
 * initialized model. Meant to run once per process.
 */
export async function getModel(name: string, options: GetModelOptions = {}): Promise<SegmentAnything> {
  const root = options.root ?? DEFAULT_ROOT;
  const modelDir = await ensureAvailable('models', name, {
    root,
    baseUrl: options.download ? options.baseUrl : undefined,
  });

  if (!fs.existsSync(modelDir) || !fs.statSync(modelDir).isDirectory()) {
    throw new Error(`model_dir ${modelDir} should exist and be a directory`);
  }

  const files = findOnnxFiles(modelDir);
  const providers = options.providers ?? ['cpu'];
  const { encoder, decoder } = await ModelRouter.route(files, providers);
  if (!encoder || !decoder) {
    throw new Error(`Model ${name} in ${modelDir} needs an image encoder and a mask decoder`);
  }

  const model = new SegmentAnything(path.basename(modelDir), encoder, decoder, { ...options, providers });
  await model.init();
  return model;
}
