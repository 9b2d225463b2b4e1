/**
 * Barrel export for the tag tree.
 */
export {
  NbtTag,
  NbtByte,
  NbtShort,
  NbtInt,
  NbtLong,
  NbtFloat,
  NbtDouble,
  NbtString,
  NbtByteArray,
  NbtIntArray,
} from './tag';
export type { TagKind } from './tag';

export { NbtList, NbtCompound } from './container';
