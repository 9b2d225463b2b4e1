// === Error Type ===

export type ErrorCode =
  | 'NBTMAP_E101' // null/undefined root value
  | 'NBTMAP_E102' // serialize root is not a compound
  | 'NBTMAP_E201' // tag class incompatible with the target type
  | 'NBTMAP_E202' // nothing to fill in place
  | 'NBTMAP_E301' // circular reference
  | 'NBTMAP_E302' // maximum depth exceeded
  | 'NBTMAP_E303' // value has no tag mapping
  | 'NBTMAP_E401' // invalid field registration
  | 'NBTMAP_E402'; // duplicate name

export interface ErrorContext {
  /** Dotted path from the root to the failing node, e.g. `root.scores.a`. */
  path?: string;
  /** Descriptor of the target type, e.g. `int32` or `record<Player>`. */
  type?: string;
  /** Kind of the tag involved. */
  tag?: string;
}

export class NbtMapperError extends Error {
  readonly code: ErrorCode;
  readonly context: ErrorContext;
  readonly timestamp: string;

  constructor(opts: {
    code: ErrorCode;
    message: string;
    context?: ErrorContext;
  }) {
    super(opts.message);
    this.name = 'NbtMapperError';
    this.code = opts.code;
    this.context = opts.context ?? {};
    this.timestamp = new Date().toISOString();
  }
}

// === Mapper Configuration (.nbtmapper.yml) ===

export type UnmappedPolicy = 'omit' | 'error';

export interface NbtMapperConfig {
  /** Deepest nesting the walkers will follow before failing. */
  max_depth?: number;
  /** What serialize does with a value no strategy can map. */
  on_unmapped?: UnmappedPolicy;
}
