/**
 * Tree walker, deserialize direction: tag → value, or tag → existing value.
 *
 * Members with a mutator are replaced by freshly deserialized values.
 * Members without one (read-only properties, getter-only accessors) keep
 * their current value, which is filled in place instead.
 */

import { NbtCompound, type NbtTag } from '../tags';
import type { WalkContext } from './context';
import {
  fillMapping,
  fillSequence,
  isPlainObject,
  tagToMapping,
  tagToSequence,
} from './collections';
import { construct, membersOf, recordTypeOf } from './registry';
import { kindOfTag, scalarFromTag } from './scalars';
import { describeType, t, type AnyType, type RecordType } from './types';

export function deserializeValue(type: AnyType, tag: NbtTag, ctx: WalkContext): unknown {
  switch (type.shape) {
    case 'tag': {
      const copy = tag.clone();
      copy.name = null;
      return copy;
    }

    case 'scalar': {
      const value = scalarFromTag(tag, type.kind);
      if (value === null) {
        throw ctx.error('NBTMAP_E201', `Cannot read ${tag.kind} tag as ${type.kind}`, {
          type: type.kind,
          tag: tag.kind,
        });
      }
      return value;
    }

    case 'sequence':
      return tagToSequence(type, tag, ctx, deserializeValue);

    case 'mapping':
      return tagToMapping(type, tag, ctx, deserializeValue);

    case 'record': {
      const instance = construct(type.ctor);
      populateRecord(instance, type, tag, ctx);
      return instance;
    }

    case 'dynamic':
      return deserializeDynamic(tag, ctx);
  }
}

/**
 * Populate an existing value in place. Scalars have no structure and are
 * left untouched; collections are cleared and refilled.
 */
export function fillValue(existing: unknown, type: AnyType, tag: NbtTag, ctx: WalkContext): void {
  if (type.shape === 'tag' || type.shape === 'scalar') {
    ctx.options.logger.debug({ path: ctx.path, type: describeType(type) }, 'Fill skipped for leaf value');
    return;
  }
  if (existing === null || existing === undefined) {
    throw ctx.error('NBTMAP_E202', `Nothing to fill at ${ctx.path}`, { type: describeType(type) });
  }

  switch (type.shape) {
    case 'sequence':
      if (!Array.isArray(existing)) throw notFillable(type, ctx);
      fillSequence(existing, type, tag, ctx, deserializeValue);
      return;

    case 'mapping':
      if (!(existing instanceof Map) && !isPlainObject(existing)) throw notFillable(type, ctx);
      fillMapping(existing, type, tag, ctx, deserializeValue);
      return;

    case 'record':
      if (typeof existing !== 'object') throw notFillable(type, ctx);
      populateRecord(existing, recordTypeOf(existing) ?? type, tag, ctx);
      return;

    case 'dynamic':
      fillDynamic(existing, tag, ctx);
      return;
  }
}

/**
 * Assign every mapped member whose exported name appears in the compound.
 * Members without a key in the compound keep their current value.
 */
function populateRecord(instance: object, type: RecordType, tag: NbtTag, ctx: WalkContext): void {
  if (!(tag instanceof NbtCompound)) {
    throw ctx.error('NBTMAP_E201', `Expected a compound tag for ${describeType(type)}, got ${tag.kind}`, {
      type: describeType(type),
      tag: tag.kind,
    });
  }
  if (tag.count === 0) return;

  for (const { member, directive } of membersOf(type.ctor)) {
    const child = tag.get(directive.name);
    if (!child) continue;

    const childCtx = ctx.child(directive.name);
    if (member.isReplaceable(instance)) {
      member.write(instance, deserializeValue(member.type, child, childCtx));
    } else {
      fillValue(member.read(instance), member.type, child, childCtx);
    }
  }
}

/** Natural JS value of a tag: numbers, bigints, strings, arrays and plain objects. */
function deserializeDynamic(tag: NbtTag, ctx: WalkContext): unknown {
  const kind = kindOfTag(tag);
  if (kind !== null) return scalarFromTag(tag, kind);
  if (tag.kind === 'list') return tagToSequence(t.list(t.dynamic()), tag, ctx, deserializeValue);
  return tagToMapping(t.dict(t.dynamic()), tag, ctx, deserializeValue);
}

function fillDynamic(existing: unknown, tag: NbtTag, ctx: WalkContext): void {
  if (Array.isArray(existing)) {
    fillSequence(existing, t.list(t.dynamic()), tag, ctx, deserializeValue);
  } else if (existing instanceof Map) {
    fillMapping(existing, t.map(t.dynamic()), tag, ctx, deserializeValue);
  } else if (isPlainObject(existing)) {
    fillMapping(existing, t.dict(t.dynamic()), tag, ctx, deserializeValue);
  } else if (typeof existing === 'object' && existing !== null) {
    const type = recordTypeOf(existing);
    if (type) populateRecord(existing, type, tag, ctx);
  }
}

function notFillable(type: AnyType, ctx: WalkContext) {
  return ctx.error('NBTMAP_E202', `Existing value at ${ctx.path} cannot be filled as ${describeType(type)}`, {
    type: describeType(type),
  });
}
