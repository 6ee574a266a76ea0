import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const SettingsSchema = z.object({
  SEGMENTER_MODEL_ROOT: z.string().min(1).default('~/.segment-overlay'),
  SEGMENTER_MODEL_NAME: z.string().min(1).default('sam_vit_b'),
  SEGMENTER_MODEL_BASE_URL: z.string().url().optional(),
  SEGMENTER_DOWNLOAD: flag.default('false'),
  SEGMENTER_PROVIDERS: z
    .string()
    .default('cpu')
    .transform(value => value.split(',').map(p => p.trim()).filter(p => p.length > 0)),
  SEGMENTER_POINTS_PER_SIDE: z.coerce.number().int().min(1).max(64).default(16),
  SEGMENTER_PRED_IOU_THRESH: z.coerce.number().min(0).max(1).default(0.88),
  SEGMENTER_MASK_THRESHOLD: z.coerce.number().default(0),
  SEGMENTER_OVERLAY_ALPHA: z.coerce.number().min(0).max(1).default(0.5),
  SEGMENTER_MAX_FILE_SIZE_MB: z.coerce.number().positive().default(10),
  SEGMENTER_DEBUG: flag.default('false'),
});

export interface Settings {
  modelRoot: string;
  modelName: string;
  modelBaseUrl?: string;
  download: boolean;
  providers: string[];
  pointsPerSide: number;
  predIouThresh: number;
  maskThreshold: number;
  overlayAlpha: number;
  maxFileSize: number;
  debug: boolean;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid segmenter configuration: ${issues}`);
  }
  const s = parsed.data;
  return {
    modelRoot: s.SEGMENTER_MODEL_ROOT,
    modelName: s.SEGMENTER_MODEL_NAME,
    modelBaseUrl: s.SEGMENTER_MODEL_BASE_URL,
    download: s.SEGMENTER_DOWNLOAD,
    providers: s.SEGMENTER_PROVIDERS,
    pointsPerSide: s.SEGMENTER_POINTS_PER_SIDE,
    predIouThresh: s.SEGMENTER_PRED_IOU_THRESH,
    maskThreshold: s.SEGMENTER_MASK_THRESHOLD,
    overlayAlpha: s.SEGMENTER_OVERLAY_ALPHA,
    maxFileSize: Math.round(s.SEGMENTER_MAX_FILE_SIZE_MB * 1024 * 1024),
    debug: s.SEGMENTER_DEBUG,
  };
}
