import { InterpretedExecutor } from '../../interpreter/executor';
import type { ResampleThresholdsInput } from '../../kernel/schemas';
import { TestBackend } from './types';

export const InterpreterBackend: TestBackend = {
  name: 'Interpreter',
  tracksAccess: true,
  byteTolerance: 0,
  createExecutor: async (thresholds?: ResampleThresholdsInput) =>
    new InterpretedExecutor({ thresholds, logHandler: () => { } })
};
