import { z } from 'zod';
import { NEAREST_SCALE_THRESHOLD, TRANSPARENT_ALPHA_THRESHOLD } from '../constants';

const DimensionSchema = z.number().int().nonnegative().finite();

export const ResizeParamsSchema = z.object({
  inputWidth: DimensionSchema,
  inputHeight: DimensionSchema,
  outputWidth: DimensionSchema,
  outputHeight: DimensionSchema
}).superRefine((params, ctx) => {
  const hasOutput = params.outputWidth > 0 && params.outputHeight > 0;
  if (!hasOutput) return;
  if (params.inputWidth === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['inputWidth'], message: 'Source width must be non-zero when the output is non-empty' });
  }
  if (params.inputHeight === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['inputHeight'], message: 'Source height must be non-zero when the output is non-empty' });
  }
});

export const ResampleThresholdsSchema = z.object({
  nearestScaleThreshold: z.number().nonnegative().default(NEAREST_SCALE_THRESHOLD),
  transparentAlphaThreshold: z.number().min(0).max(1).default(TRANSPARENT_ALPHA_THRESHOLD)
});

export type ResampleThresholdsInput = z.input<typeof ResampleThresholdsSchema>;
