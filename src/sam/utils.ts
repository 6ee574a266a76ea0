import fs from 'fs';
import path from 'path';
import os from 'os';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import AdmZip from 'adm-zip';
import axios from 'axios';

import { preprocessShape } from '@/image/image.js';
import { ModelInferenceError } from '@/segmenter/errors.js';
import { logger } from '@/segmenter/logger.js';

export const DEFAULT_ROOT = '~/.segment-overlay';

export function expandHome(filePath: string): string {
  if (filePath === '~' || filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return path.resolve(filePath);
}

export type DownloadOptions = {
  root?: string;
  baseUrl?: string;
};

export async function ensureAvailable(subDir: string, name: string, options: DownloadOptions = {}): Promise<string> {
  return downloadOnnx(subDir, name, options);
}

/**
 * Fetches `<baseUrl>/<name>.zip` and unpacks it into `<root>/<subDir>/<name>`,
 * unless that directory already exists.
 */
export async function downloadOnnx(subDir: string, name: string, options: DownloadOptions = {}): Promise<string> {
  const root = expandHome(options.root ?? DEFAULT_ROOT);
  const dirPath = path.join(root, subDir, name);

  if (fs.existsSync(dirPath)) {
    return dirPath;
  }
  if (!options.baseUrl) {
    throw new Error(`Model ${name} not found at ${dirPath} and no download URL is configured`);
  }

  logger.info('download_path:', dirPath);
  const zipFilePath = path.join(root, subDir, `${name}.zip`);
  const modelUrl = `${options.baseUrl.replace(/\/+$/, '')}/${name}.zip`;

  await downloadFile(modelUrl, zipFilePath, true);
  try {
    fs.mkdirSync(dirPath, { recursive: true });
    const zip = new AdmZip(zipFilePath);
    zip.extractAllTo(dirPath, true);
  } catch (err) {
    fs.rmSync(dirPath, { recursive: true, force: true });
    throw err;
  } finally {
    fs.rmSync(zipFilePath, { force: true });
  }
  return dirPath;
}

export async function downloadFile(url: string, filePath: string, overwrite: boolean = false): Promise<string> {
  if (fs.existsSync(filePath) && !overwrite) {
    return filePath;
  }

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  logger.info(`Downloading ${filePath} from ${url}...`);

  try {
    const response = await axios.get<Readable>(url, { responseType: 'stream' });
    if (response.status !== 200) {
      throw new Error(`unexpected status ${response.status}`);
    }
    await pipeline(response.data, fs.createWriteStream(filePath));
  } catch (err) {
    fs.rmSync(filePath, { force: true });
    throw new Error(`Failed downloading url ${url}`, { cause: err });
  }
  return filePath;
}

export type Point = [number, number];

/** `n × n` points in normalized [0,1] coordinates, row-major, each centred in its cell. */
export function buildPointGrid(n: number): Point[] {
  const offset = 1 / (2 * n);
  const step = n > 1 ? (1 - 2 * offset) / (n - 1) : 0;
  const points: Point[] = [];
  for (let row = 0; row < n; row++) {
    for (let col = 0; col < n; col++) {
      points.push([offset + col * step, offset + row * step]);
    }
  }
  return points;
}

/** Maps pixel coordinates of the original image into the resized model frame. */
export function scaleCoords(points: Point[], origH: number, origW: number, longSide: number): Point[] {
  const [newH, newW] = preprocessShape(origH, origW, longSide);
  return points.map(([x, y]) => [x * (newW / origW), y * (newH / origH)]);
}

export type TensorLike = {
  data: unknown;
  dims: readonly number[];
};

export function floatData(tensor: TensorLike | undefined, name: string): Float32Array {
  if (!tensor) {
    throw new ModelInferenceError(`Missing model output ${name}`);
  }
  if (!(tensor.data instanceof Float32Array)) {
    throw new ModelInferenceError(`Model output ${name} is not float32`);
  }
  return tensor.data;
}

export function argMax(values: ArrayLike<number>): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

/** Binarizes one plane of a mask-logit tensor. */
export function thresholdPlane(logits: Float32Array, plane: number, size: number, threshold: number): Uint8Array {
  const out = new Uint8Array(size);
  const offset = plane * size;
  for (let i = 0; i < size; i++) {
    out[i] = logits[offset + i] > threshold ? 1 : 0;
  }
  return out;
}
