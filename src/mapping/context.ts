import type { Logger } from '../shared/logger';
import { NbtMapperError, type ErrorCode, type ErrorContext, type UnmappedPolicy } from '../shared/types';

export interface ResolvedOptions {
  maxDepth: number;
  onUnmapped: UnmappedPolicy;
  logger: Logger;
}

/**
 * Position of the walkers inside one top-level call: the dotted path for
 * error messages, the nesting depth, and the objects currently being
 * serialized (for cycle detection).
 */
export class WalkContext {
  constructor(
    readonly options: ResolvedOptions,
    readonly path: string = 'root',
    readonly depth: number = 0,
    private readonly active: Set<object> = new Set(),
  ) {}

  /** Context for a named member (`root.player`) or list index (`root.items[2]`). */
  child(segment: string | number): WalkContext {
    const path = typeof segment === 'number' ? `${this.path}[${segment}]` : `${this.path}.${segment}`;
    if (this.depth + 1 > this.options.maxDepth) {
      throw this.error('NBTMAP_E302', `Maximum depth of ${this.options.maxDepth} exceeded`, { path });
    }
    return new WalkContext(this.options, path, this.depth + 1, this.active);
  }

  /** Marks an object as being walked; fails when it is already on the path. */
  enter(value: object): void {
    if (this.active.has(value)) {
      throw this.error('NBTMAP_E301', `Circular reference at ${this.path}`);
    }
    this.active.add(value);
  }

  leave(value: object): void {
    this.active.delete(value);
  }

  error(code: ErrorCode, message: string, context: ErrorContext = {}): NbtMapperError {
    return new NbtMapperError({ code, message, context: { path: this.path, ...context } });
  }
}
