import type { ResampleThresholds, ResizeParams, WorkgroupCount } from '../kernel/types';
import type { SourceTexture, StorageTexture } from '../kernel/texture';

// ------------------------------------------------------------------
// State
// ------------------------------------------------------------------

export type BuiltinName = 'global_invocation_id';

export interface ActionLogEntry {
  type: 'dispatch';
  target?: string;
  payload?: Record<string, unknown>;
}

/**
 * Everything bound for one dispatch: the two textures, the frozen parameter
 * block and the per-invocation builtins.
 */
export class DispatchContext {
  readonly source: SourceTexture;
  readonly destination: StorageTexture;
  readonly params: ResizeParams;
  readonly thresholds: ResampleThresholds;

  // Builtin Globals (valid during a dispatch)
  builtins: Map<BuiltinName, WorkgroupCount> = new Map();

  // Side Effect Log
  log: ActionLogEntry[] = [];
  discarded = 0;

  constructor(source: SourceTexture, destination: StorageTexture, params: ResizeParams, thresholds: ResampleThresholds) {
    if (destination.width !== params.outputWidth || destination.height !== params.outputHeight) {
      throw new Error(`Runtime Error: destination ${destination.width}x${destination.height} does not match output extent ${params.outputWidth}x${params.outputHeight}`);
    }
    if (source.width !== params.inputWidth || source.height !== params.inputHeight) {
      throw new Error(`Runtime Error: source ${source.width}x${source.height} does not match input extent ${params.inputWidth}x${params.inputHeight}`);
    }
    this.source = source;
    this.destination = destination;
    this.params = Object.freeze({ ...params });
    this.thresholds = Object.freeze({ ...thresholds });
  }

  getBuiltin(name: BuiltinName): WorkgroupCount {
    const val = this.builtins.get(name);
    if (!val) throw new Error(`Runtime Error: builtin '${name}' is only valid during a dispatch`);
    return val;
  }

  logAction(type: ActionLogEntry['type'], target?: string, payload?: Record<string, unknown>) {
    this.log.push({ type, target, payload });
  }
}
