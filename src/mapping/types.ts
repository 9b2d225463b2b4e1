/**
 * Structural type descriptors.
 *
 * Every value the mapper handles is described by one of a closed set of
 * shapes. Descriptors are plain data built with the `t` helpers; record
 * descriptors point at a constructor whose members live in the registry.
 *
 * The `__type` field is phantom: it is never set and only carries the JS
 * value type for inference.
 */

import type { NbtTag } from '../tags';

export type ScalarKind =
  | 'int8'
  | 'uint8'
  | 'int16'
  | 'uint16'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float32'
  | 'float64'
  | 'bool'
  | 'string'
  | 'byteArray'
  | 'intArray';

/** JS representation of each scalar kind. */
export interface ScalarValueMap {
  int8: number;
  uint8: number;
  int16: number;
  uint16: number;
  int32: number;
  uint32: number;
  int64: bigint;
  uint64: bigint;
  float32: number;
  float64: number;
  bool: boolean;
  string: string;
  byteArray: Uint8Array;
  intArray: Int32Array;
}

export type Shape = 'tag' | 'scalar' | 'sequence' | 'mapping' | 'record' | 'dynamic';

interface TypeBase<T> {
  readonly shape: Shape;
  readonly __type?: T;
}

export interface TagType<T extends NbtTag = NbtTag> extends TypeBase<T> {
  readonly shape: 'tag';
}

export interface ScalarType<K extends ScalarKind = ScalarKind> extends TypeBase<ScalarValueMap[K]> {
  readonly shape: 'scalar';
  readonly kind: K;
}

export interface SequenceType<E = unknown> extends TypeBase<E[]> {
  readonly shape: 'sequence';
  readonly element: AnyType;
}

export type MappingContainer = 'map' | 'object';

export interface MappingType<V = unknown, C extends MappingContainer = MappingContainer>
  extends TypeBase<C extends 'map' ? Map<string, V> : Record<string, V>> {
  readonly shape: 'mapping';
  /** Only `string` keys are translatable to compound names. */
  readonly key: ScalarKind;
  readonly value: AnyType;
  readonly container: C;
}

export type RecordConstructor<T extends object = object> = new () => T;

export interface RecordType<T extends object = object> extends TypeBase<T> {
  readonly shape: 'record';
  readonly ctor: RecordConstructor<T>;
}

export interface DynamicType extends TypeBase<unknown> {
  readonly shape: 'dynamic';
}

/** Closed union of every descriptor, dispatched on `shape`. */
export type AnyType =
  | TagType
  | ScalarType
  | SequenceType
  | MappingType
  | RecordType
  | DynamicType;

/** JS value type described by a descriptor. */
export type Infer<D> = D extends TypeBase<infer T> ? T : never;

function scalar<K extends ScalarKind>(kind: K): ScalarType<K> {
  return { shape: 'scalar', kind };
}

export const t = {
  int8: () => scalar('int8'),
  uint8: () => scalar('uint8'),
  int16: () => scalar('int16'),
  uint16: () => scalar('uint16'),
  int32: () => scalar('int32'),
  uint32: () => scalar('uint32'),
  int64: () => scalar('int64'),
  uint64: () => scalar('uint64'),
  float32: () => scalar('float32'),
  float64: () => scalar('float64'),
  bool: () => scalar('bool'),
  string: () => scalar('string'),
  byteArray: () => scalar('byteArray'),
  intArray: () => scalar('intArray'),

  tag: (): TagType => ({ shape: 'tag' }),
  dynamic: (): DynamicType => ({ shape: 'dynamic' }),

  list: <D extends AnyType>(element: D): SequenceType<Infer<D>> => ({ shape: 'sequence', element }),

  /** String-keyed `Map`. */
  map: <D extends AnyType>(value: D, key: ScalarKind = 'string'): MappingType<Infer<D>, 'map'> => ({
    shape: 'mapping',
    key,
    value,
    container: 'map',
  }),

  /** String-keyed plain object. */
  dict: <D extends AnyType>(value: D): MappingType<Infer<D>, 'object'> => ({
    shape: 'mapping',
    key: 'string',
    value,
    container: 'object',
  }),

  record: <T extends object>(ctor: RecordConstructor<T>): RecordType<T> => ({ shape: 'record', ctor }),
};

/** Short human-readable form, used in error context and logs. */
export function describeType(type: AnyType): string {
  switch (type.shape) {
    case 'tag':
      return 'tag';
    case 'scalar':
      return type.kind;
    case 'sequence':
      return `list<${describeType(type.element)}>`;
    case 'mapping':
      return `${type.container}<${type.key}, ${describeType(type.value)}>`;
    case 'record':
      return `record<${type.ctor.name || 'anonymous'}>`;
    case 'dynamic':
      return 'dynamic';
  }
}
