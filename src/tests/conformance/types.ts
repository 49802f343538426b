import type { IResizeExecutor } from '../../kernel/executor';
import type { ResampleThresholdsInput } from '../../kernel/schemas';

export interface TestBackend {
  name: string;
  // CPU backends keep a per-texel write ledger and throw on out-of-range access.
  tracksAccess: boolean;
  // Largest per-channel byte difference tolerated against exact expectations.
  byteTolerance: number;
  createExecutor: (thresholds?: ResampleThresholdsInput) => Promise<IResizeExecutor>;
}
