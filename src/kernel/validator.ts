import { z } from 'zod';
import { ResampleThresholdsSchema, ResampleThresholdsInput, ResizeParamsSchema } from './schemas';
import type { ResampleThresholds, ResizeParams } from './types';

export interface ParamValidationError {
  field: string;
  message: string;
  severity: 'error' | 'warning';
}

const collectIssues = (error: z.ZodError, errors: ParamValidationError[]) => {
  error.issues.forEach(issue => {
    const field = issue.path.join('.') || '(root)';
    errors.push({
      field,
      message: `Schema Error: ${field}: ${issue.message}`,
      severity: 'error'
    });
  });
};

/**
 * Checks the host-side preconditions of a dispatch. The kernel itself has no
 * error channel, so anything that would produce unspecified output is rejected here.
 */
export const validateResizeParams = (params: ResizeParams): ParamValidationError[] => {
  const errors: ParamValidationError[] = [];
  const result = ResizeParamsSchema.safeParse(params);
  if (!result.success) {
    collectIssues(result.error, errors);
    return errors;
  }

  if (params.outputWidth === 0 || params.outputHeight === 0) {
    errors.push({
      field: params.outputWidth === 0 ? 'outputWidth' : 'outputHeight',
      message: 'Zero output extent: the dispatch is empty and produces no content',
      severity: 'warning'
    });
  }
  return errors;
};

/**
 * Throws on the first error-severity issue. Warnings pass through.
 */
export const assertResizeParams = (params: ResizeParams): void => {
  const errors = validateResizeParams(params).filter(e => e.severity === 'error');
  if (errors.length > 0) {
    throw new Error(`Validation Error: ${errors.map(e => e.message).join('; ')}`);
  }
};

/**
 * Fills in defaults and validates a partial thresholds object.
 */
export const resolveThresholds = (input: ResampleThresholdsInput = {}): ResampleThresholds => {
  const result = ResampleThresholdsSchema.safeParse(input);
  if (!result.success) {
    const errors: ParamValidationError[] = [];
    collectIssues(result.error, errors);
    throw new Error(`Validation Error: ${errors.map(e => e.message).join('; ')}`);
  }
  return result.data;
};
