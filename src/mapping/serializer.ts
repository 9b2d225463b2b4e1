/**
 * Tree walker, serialize direction: value → tag.
 *
 * Each value is resolved to one concrete shape (declared, or inferred from
 * the runtime value for `dynamic`) and dispatched once. Anything that cannot
 * be mapped yields null and is elided by its parent.
 */

import { NbtCompound, NbtTag } from '../tags';
import type { WalkContext } from './context';
import { entriesOf, isPlainObject, mappingToTag, sequenceToTag } from './collections';
import { membersOf, recordTypeOf } from './registry';
import { inferKind, isDefaultValue, scalarToTag } from './scalars';
import { describeType, t, type AnyType, type RecordType, type ScalarKind } from './types';

type ConcreteType = Exclude<AnyType, { shape: 'dynamic' }>;

export function serializeValue(
  name: string | null,
  value: unknown,
  type: AnyType,
  ctx: WalkContext,
): NbtTag | null {
  if (value === null || value === undefined) return null;

  // Pre-built tags are embedded as they are
  if (value instanceof NbtTag) {
    const copy = value.clone();
    if (name !== null) copy.name = name;
    return copy;
  }

  const resolved = resolveShape(value, type);
  if (resolved === null) return unmapped(value, type, ctx);

  switch (resolved.shape) {
    case 'tag':
      return unmapped(value, resolved, ctx);

    case 'scalar':
      return scalarToTag(name, value, resolved.kind) ?? unmapped(value, resolved, ctx);

    case 'sequence': {
      if (!Array.isArray(value)) return unmapped(value, resolved, ctx);
      const values: unknown[] = value;
      return guarded(values, ctx, () => sequenceToTag(name, values, resolved, ctx, serializeValue));
    }

    case 'mapping': {
      const entries = entriesOf(value);
      if (entries === null || typeof value !== 'object') return unmapped(value, resolved, ctx);
      return guarded(value, ctx, () => mappingToTag(name, entries, resolved, ctx, serializeValue));
    }

    case 'record':
      if (typeof value !== 'object') return unmapped(value, resolved, ctx);
      return recordToTag(name, value, recordTypeOf(value) ?? resolved, ctx);
  }
}

/**
 * Compound of every mapped member that produces a tag. A record with no
 * surviving members produces no tag at all.
 */
function recordToTag(
  name: string | null,
  value: object,
  type: RecordType,
  ctx: WalkContext,
): NbtCompound | null {
  return guarded(value, ctx, () => {
    const compound = new NbtCompound(name);

    for (const { member, directive } of membersOf(type.ctor)) {
      const memberValue = member.read(value);
      if (memberValue === null || memberValue === undefined) continue;
      if (directive.hideDefault && isDefaultValue(memberValue, defaultKind(member.type, memberValue))) {
        continue;
      }

      const child = serializeValue(directive.name, memberValue, member.type, ctx.child(directive.name));
      if (child) compound.add(child);
    }

    return compound.count > 0 ? compound : null;
  });
}

function resolveShape(value: unknown, type: AnyType): ConcreteType | null {
  if (type.shape !== 'dynamic') return type;

  const kind = inferKind(value);
  if (kind !== null) return { shape: 'scalar', kind };
  if (Array.isArray(value)) return t.list(t.dynamic());
  if (value instanceof Map) return t.map(t.dynamic());
  if (isPlainObject(value)) return t.dict(t.dynamic());
  if (typeof value === 'object' && value !== null) return recordTypeOf(value) ?? null;
  return null;
}

function defaultKind(type: AnyType, value: unknown): ScalarKind | null {
  if (type.shape === 'scalar') return type.kind;
  if (type.shape === 'dynamic') return inferKind(value);
  return null;
}

function guarded<R>(value: object, ctx: WalkContext, walk: () => R): R {
  ctx.enter(value);
  try {
    return walk();
  } finally {
    ctx.leave(value);
  }
}

function unmapped(value: unknown, type: AnyType, ctx: WalkContext): null {
  if (ctx.options.onUnmapped === 'error') {
    throw ctx.error('NBTMAP_E303', `No tag mapping for ${typeof value} value as ${describeType(type)}`, {
      type: describeType(type),
    });
  }
  ctx.options.logger.debug({ path: ctx.path, type: describeType(type) }, 'Unmapped value omitted');
  return null;
}
