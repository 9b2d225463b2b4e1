/**
 * Container tags: ordered lists and named compounds.
 */

import { NbtMapperError } from '../shared/types';
import { NbtTag, type TagKind } from './tag';

export class NbtList extends NbtTag implements Iterable<NbtTag> {
  readonly kind = 'list';
  private readonly children: NbtTag[] = [];

  constructor(name: string | null = null, children: Iterable<NbtTag> = []) {
    super(name);
    for (const child of children) this.add(child);
  }

  get count(): number {
    return this.children.length;
  }

  /** Kind of the elements, taken from the first child. Null while empty. */
  get listKind(): TagKind | null {
    return this.children.length > 0 ? this.children[0].kind : null;
  }

  /** Appends a child. List children carry no name. */
  add(child: NbtTag): void {
    child.name = null;
    this.children.push(child);
  }

  at(index: number): NbtTag | undefined {
    return this.children[index];
  }

  clear(): void {
    this.children.length = 0;
  }

  [Symbol.iterator](): Iterator<NbtTag> {
    return this.children[Symbol.iterator]();
  }

  clone(): NbtList {
    return new NbtList(
      this.name,
      this.children.map((c) => c.clone()),
    );
  }
}

export class NbtCompound extends NbtTag implements Iterable<NbtTag> {
  readonly kind = 'compound';
  private readonly children = new Map<string, NbtTag>();

  constructor(name: string | null = null, children: Iterable<NbtTag> = []) {
    super(name);
    for (const child of children) this.add(child);
  }

  get count(): number {
    return this.children.size;
  }

  /**
   * Adds a named child. Keys are unique and keep insertion order.
   */
  add(child: NbtTag): void {
    if (child.name === null) {
      throw new NbtMapperError({
        code: 'NBTMAP_E402',
        message: 'Compound children must be named',
        context: { tag: child.kind },
      });
    }
    if (this.children.has(child.name)) {
      throw new NbtMapperError({
        code: 'NBTMAP_E402',
        message: `Compound already contains a child named "${child.name}"`,
        context: { tag: child.kind },
      });
    }
    this.children.set(child.name, child);
  }

  get(name: string): NbtTag | undefined {
    return this.children.get(name);
  }

  has(name: string): boolean {
    return this.children.has(name);
  }

  remove(name: string): boolean {
    return this.children.delete(name);
  }

  names(): string[] {
    return [...this.children.keys()];
  }

  [Symbol.iterator](): Iterator<NbtTag> {
    return this.children.values();
  }

  clone(): NbtCompound {
    return new NbtCompound(
      this.name,
      [...this.children.values()].map((c) => c.clone()),
    );
  }
}
