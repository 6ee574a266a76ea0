import path from 'path';
import contentDisposition from 'content-disposition';

import { SegmentationResult } from './common.js';

export const RESULTS_HEADER = 'X-Segmentation-Results';
export const PROCESSING_TIME_HEADER = 'X-Processing-Time';
export const TOTAL_OBJECTS_HEADER = 'X-Total-Objects';

export function serializeResult(result: SegmentationResult): string {
  return JSON.stringify({
    detected_objects: result.detected_objects.map(({ id, confidence, area_pixels }) => ({ id, confidence, area_pixels })),
    processing_time: result.processing_time,
    total_objects: result.total_objects,
  });
}

export function overlayFilename(filename: string): string {
  const base = path.basename(filename, path.extname(filename));
  return `processed_${base}.png`;
}

export function toTransportHeaders(result: SegmentationResult, filename: string): Record<string, string> {
  return {
    'Content-Type': 'image/png',
    [RESULTS_HEADER]: serializeResult(result),
    [PROCESSING_TIME_HEADER]: String(result.processing_time),
    [TOTAL_OBJECTS_HEADER]: String(result.total_objects),
    'Access-Control-Expose-Headers': [RESULTS_HEADER, PROCESSING_TIME_HEADER, TOTAL_OBJECTS_HEADER].join(', '),
    'Content-Disposition': contentDisposition(overlayFilename(filename), { type: 'inline' }),
  };
}
