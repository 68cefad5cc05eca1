// ---------------------------------------------------------------------------
// Export options
// ---------------------------------------------------------------------------

import { CAMERA_MODEL_NAMES, MODEL_ENCODINGS } from '@sfm-export/sparse-model';
import { z } from 'zod';

import { ExportOptionsError } from './errors.js';

export const exportOptionsSchema = z.object({
  /** Dataset root; receives `images/` and `sparse/0/`. */
  outputDir: z.string().min(1, 'output directory is required'),
  encoding: z.enum(MODEL_ENCODINGS).default('binary'),
  cameraModel: z.enum(CAMERA_MODEL_NAMES).default('OPENCV'),
  /** Render every keyframe of each camera instead of only the current frame. */
  keyframesOnly: z.boolean().default(true),
  /** Extension of the rendered images, without the dot. */
  imageFormat: z
    .string()
    .regex(/^[a-z0-9]+$/, 'image format must be lowercase letters and digits')
    .default('png'),
});

export type ExportOptions = z.infer<typeof exportOptionsSchema>;
export type ExportOptionsInput = z.input<typeof exportOptionsSchema>;

/** Apply defaults and validate. Throws ExportOptionsError listing every bad field. */
export function parseExportOptions(input: unknown): ExportOptions {
  const result = exportOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ExportOptionsError(result.error.flatten().fieldErrors);
  }
  return result.data;
}
