/**
 * Tag tree leaves: the base tag class and the scalar/array tags.
 *
 * Integer storage widths follow the signed NBT layout. Values are normalised
 * into their storage width on construction, so a tag never holds an
 * out-of-range value.
 */

export type TagKind =
  | 'byte'
  | 'short'
  | 'int'
  | 'long'
  | 'float'
  | 'double'
  | 'string'
  | 'byteArray'
  | 'intArray'
  | 'list'
  | 'compound';

export abstract class NbtTag {
  abstract readonly kind: TagKind;

  /** Meaningful only when this tag is a direct child of a compound. */
  name: string | null;

  protected constructor(name: string | null = null) {
    this.name = name;
  }

  /** Deep copy, including the name. */
  abstract clone(): NbtTag;
}

export class NbtByte extends NbtTag {
  readonly kind = 'byte';
  readonly value: number;

  constructor(name: string | null, value: number) {
    super(name);
    this.value = (value << 24) >> 24;
  }

  clone(): NbtByte {
    return new NbtByte(this.name, this.value);
  }
}

export class NbtShort extends NbtTag {
  readonly kind = 'short';
  readonly value: number;

  constructor(name: string | null, value: number) {
    super(name);
    this.value = (value << 16) >> 16;
  }

  clone(): NbtShort {
    return new NbtShort(this.name, this.value);
  }
}

export class NbtInt extends NbtTag {
  readonly kind = 'int';
  readonly value: number;

  constructor(name: string | null, value: number) {
    super(name);
    this.value = value | 0;
  }

  clone(): NbtInt {
    return new NbtInt(this.name, this.value);
  }
}

export class NbtLong extends NbtTag {
  readonly kind = 'long';
  readonly value: bigint;

  constructor(name: string | null, value: bigint) {
    super(name);
    this.value = BigInt.asIntN(64, value);
  }

  clone(): NbtLong {
    return new NbtLong(this.name, this.value);
  }
}

export class NbtFloat extends NbtTag {
  readonly kind = 'float';
  readonly value: number;

  constructor(name: string | null, value: number) {
    super(name);
    this.value = Math.fround(value);
  }

  clone(): NbtFloat {
    return new NbtFloat(this.name, this.value);
  }
}

export class NbtDouble extends NbtTag {
  readonly kind = 'double';
  readonly value: number;

  constructor(name: string | null, value: number) {
    super(name);
    this.value = value;
  }

  clone(): NbtDouble {
    return new NbtDouble(this.name, this.value);
  }
}

export class NbtString extends NbtTag {
  readonly kind = 'string';
  readonly value: string;

  constructor(name: string | null, value: string) {
    super(name);
    this.value = value;
  }

  clone(): NbtString {
    return new NbtString(this.name, this.value);
  }
}

export class NbtByteArray extends NbtTag {
  readonly kind = 'byteArray';
  readonly value: Uint8Array;

  constructor(name: string | null, value: Uint8Array) {
    super(name);
    this.value = value;
  }

  clone(): NbtByteArray {
    return new NbtByteArray(this.name, Uint8Array.from(this.value));
  }
}

export class NbtIntArray extends NbtTag {
  readonly kind = 'intArray';
  readonly value: Int32Array;

  constructor(name: string | null, value: Int32Array) {
    super(name);
    this.value = value;
  }

  clone(): NbtIntArray {
    return new NbtIntArray(this.name, Int32Array.from(this.value));
  }
}
