/**
 * Barrel export for the mapping engine.
 */
export { serializeObject, deserializeObject, fillObject, createMapper, loadMapper } from './mapper';
export type { Mapper, MapperOptions } from './mapper';

export { defineRecord, membersOf, directiveFor, recordTypeOf, isRegistered } from './registry';
export type {
  FieldSpec,
  RecordDefinition,
  MappingDirective,
  MemberDescriptor,
  MappedMember,
} from './registry';

export { t, describeType } from './types';
export type {
  AnyType,
  Infer,
  ScalarKind,
  ScalarValueMap,
  Shape,
  TagType,
  ScalarType,
  SequenceType,
  MappingType,
  MappingContainer,
  RecordType,
  RecordConstructor,
  DynamicType,
} from './types';

export { defaultValueOf, isDefaultValue } from './scalars';
