/**
 * Member selector: registration-time record layouts.
 *
 * A record type opts its members into mapping by listing them with
 * `defineRecord`. Anything not listed is invisible to both walkers.
 * Layouts of base classes are inherited, base members first.
 */

import { z } from 'zod';
import { NbtMapperError } from '../shared/types';
import { t, type AnyType, type RecordConstructor, type RecordType } from './types';

export interface FieldSpec<T extends object = object> {
  /** Property key on the instance (or on the constructor for static members). */
  key: string;
  type: AnyType;
  /** Exported compound key. Defaults to `key`. */
  name?: string;
  /** Omit the member while it holds its kind's default value. */
  hideDefault?: boolean;
  /** No mutator: the member is populated in place. */
  readonly?: boolean;
  static?: boolean;
  /** Custom accessors, e.g. for `#private` state. A getter without setter is fill-only. */
  get?(target: T): unknown;
  set?(target: T, value: unknown): void;
}

export interface RecordDefinition<T extends object> {
  fields: FieldSpec<T>[];
  /** Factory used instead of `new ctor()` when deserializing. */
  create?(): T;
}

export interface MappingDirective {
  /** Exported compound key. */
  name: string;
  hideDefault: boolean;
}

export interface MemberDescriptor {
  readonly key: string;
  readonly type: AnyType;
  readonly isStatic: boolean;
  read(instance: object): unknown;
  /** False when the member has no mutator and can only be filled in place. */
  isReplaceable(instance: object): boolean;
  write(instance: object, value: unknown): void;
}

export interface MappedMember {
  member: MemberDescriptor;
  directive: MappingDirective;
}

interface RegisteredRecord {
  ctor: RecordConstructor;
  fields: FieldSpec[];
  create?(): object;
}

const fieldDirectiveSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1).optional(),
  hideDefault: z.boolean().optional(),
  readonly: z.boolean().optional(),
  static: z.boolean().optional(),
});

const registry = new Map<object, RegisteredRecord>();
const resolved = new Map<object, MappedMember[]>();

/**
 * Register the mappable members of a record type and return its descriptor.
 * Re-registering a constructor replaces its previous layout.
 */
export function defineRecord<T extends object>(
  ctor: RecordConstructor<T>,
  definition: RecordDefinition<T>,
): RecordType<T> {
  const seen = new Set<string>();
  for (const [index, field] of definition.fields.entries()) {
    const result = fieldDirectiveSchema.safeParse(field);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'field'}: ${issue.message}`)
        .join('; ');
      throw new NbtMapperError({
        code: 'NBTMAP_E401',
        message: `Invalid field #${index} on ${ctor.name}: ${detail}`,
        context: { type: `record<${ctor.name}>` },
      });
    }
    const slot = `${field.static ? 'static ' : ''}${field.key}`;
    if (seen.has(slot)) {
      throw new NbtMapperError({
        code: 'NBTMAP_E401',
        message: `Field "${field.key}" is listed twice on ${ctor.name}`,
        context: { type: `record<${ctor.name}>` },
      });
    }
    seen.add(slot);
  }

  const previous = registry.get(ctor);
  registry.set(ctor, { ctor, fields: definition.fields, create: definition.create });
  // Derived layouts embed this one
  resolved.clear();
  try {
    membersOf(ctor);
  } catch (err) {
    if (previous) registry.set(ctor, previous);
    else registry.delete(ctor);
    resolved.clear();
    throw err;
  }

  return t.record(ctor);
}

/**
 * Ordered mappable members of a record type, inherited ones included.
 * Computed once per constructor.
 */
export function membersOf(ctor: object): MappedMember[] {
  const cached = resolved.get(ctor);
  if (cached) return cached;

  const members: MappedMember[] = [];
  for (const entry of registrationChain(ctor)) {
    for (const field of entry.fields) {
      const mapped: MappedMember = {
        member: describeMember(entry.ctor, field),
        directive: { name: field.name ?? field.key, hideDefault: field.hideDefault ?? false },
      };
      const existing = members.findIndex(
        (m) => m.member.key === field.key && m.member.isStatic === (field.static ?? false),
      );
      if (existing >= 0) {
        members[existing] = mapped;
      } else {
        members.push(mapped);
      }
    }
  }

  const names = new Set<string>();
  for (const { directive } of members) {
    if (names.has(directive.name)) {
      throw new NbtMapperError({
        code: 'NBTMAP_E402',
        message: `Exported name "${directive.name}" is used by more than one member`,
        context: { type: `record<${nameOf(ctor)}>` },
      });
    }
    names.add(directive.name);
  }

  resolved.set(ctor, members);
  return members;
}

/**
 * Mapping directive of a member, or undefined when the member is not mapped.
 * Instance and static members may share a key; `isStatic` picks between them.
 */
export function directiveFor(ctor: object, key: string, isStatic = false): MappingDirective | undefined {
  return membersOf(ctor).find((m) => m.member.key === key && m.member.isStatic === isStatic)?.directive;
}

/**
 * Record descriptor for an instance whose class (or an ancestor) is registered.
 */
export function recordTypeOf(value: object): RecordType | undefined {
  const ctor: unknown = Reflect.get(value, 'constructor');
  if (!isRecordConstructor(ctor) || registrationChain(ctor).length === 0) return undefined;
  return t.record(ctor);
}

export function isRegistered(ctor: object): boolean {
  return registrationChain(ctor).length > 0;
}

/** New instance through the registered factory, or the zero-argument constructor. */
export function construct(ctor: RecordConstructor): object {
  const entry = registry.get(ctor);
  return entry?.create ? entry.create() : new ctor();
}

/** Registered constructors from the most basic class down to `ctor`. */
function registrationChain(ctor: object): RegisteredRecord[] {
  const chain: RegisteredRecord[] = [];
  let current: object | null = ctor;
  while (current !== null && current !== Function.prototype) {
    const entry = registry.get(current);
    if (entry) chain.unshift(entry);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

function describeMember(owner: RecordConstructor, field: FieldSpec): MemberDescriptor {
  const isStatic = field.static ?? false;
  const targetOf = (instance: object): object => (isStatic ? owner : instance);

  return {
    key: field.key,
    type: field.type,
    isStatic,
    read(instance) {
      const target = targetOf(instance);
      return field.get ? field.get(target) : Reflect.get(target, field.key);
    },
    isReplaceable(instance) {
      if (field.readonly) return false;
      if (field.set) return true;
      if (field.get) return false;
      return hasMutator(targetOf(instance), field.key);
    },
    write(instance, value) {
      const target = targetOf(instance);
      if (field.set) {
        field.set(target, value);
        return;
      }
      Reflect.set(target, field.key, value);
    },
  };
}

/** A getter-only accessor or a non-writable property has no mutator. */
function hasMutator(target: object, key: string): boolean {
  let current: object | null = target;
  while (current !== null) {
    const property = Object.getOwnPropertyDescriptor(current, key);
    if (property) {
      return 'value' in property ? property.writable === true : property.set !== undefined;
    }
    current = Object.getPrototypeOf(current);
  }
  return true;
}

function isRecordConstructor(value: unknown): value is RecordConstructor {
  return typeof value === 'function';
}

function nameOf(ctor: object): string {
  const name: unknown = Reflect.get(ctor, 'name');
  return typeof name === 'string' && name ? name : 'anonymous';
}
