//slotcore/items/Item.ts

import { requires } from "../core/errors";

/** Tag every item carries: its stack size. */
export const COUNT_TAG = "count";

/** Name of the empty sentinel item. */
export const EMPTY_NAME = "";

export type TagEntry = readonly [tag: string, value: number];

/**
 * A named item with integer tags. Equality ignores `count`, so two stacks of
 * different size are still the same kind of item.
 */
export interface Item {
  readonly name: string;
  isEmpty(): boolean;
  hasTag(tag: string): boolean;
  putTag(tag: string, value: number): void;
  /** `count` can never be removed. */
  removeTag(tag: string): void;
  /** The tag must be present. */
  tagValue(tag: string): number;
  /** Snapshot of all tags, ordered by tag name. */
  tagEntries(): TagEntry[];
  equals(other: Item): boolean;
  toString(): string;
}

export class BasicItem implements Item {
  private readonly tags = new Map<string, number>();

  /**
   * `new BasicItem()` is the empty item (count 0); a named item defaults to
   * count 1.
   */
  constructor(
    readonly name: string = EMPTY_NAME,
    count: number = name === EMPTY_NAME ? 0 : 1,
  ) {
    this.putTag(COUNT_TAG, count);
  }

  /** Independent copy: same name, same tags, its own tag map. */
  static copyOf(item: Item): BasicItem {
    const copy = new BasicItem(item.name);
    for (const [tag, value] of item.tagEntries()) {
      copy.putTag(tag, value);
    }
    return copy;
  }

  isEmpty(): boolean {
    return this.name === EMPTY_NAME;
  }

  hasTag(tag: string): boolean {
    return this.tags.has(tag);
  }

  putTag(tag: string, value: number): void {
    requires(Number.isInteger(value), "Item.putTag", `tag '${tag}' needs an integer value, got ${value}`);
    this.tags.set(tag, value);
  }

  removeTag(tag: string): void {
    requires(tag !== COUNT_TAG, "Item.removeTag", `'${COUNT_TAG}' is mandatory`);
    this.tags.delete(tag);
  }

  tagValue(tag: string): number {
    const value = this.tags.get(tag);
    requires(value !== undefined, "Item.tagValue", `item '${this.name}' has no tag '${tag}'`);
    return value;
  }

  tagEntries(): TagEntry[] {
    return Array.from(this.tags.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  equals(other: Item): boolean {
    if (other.name !== this.name) return false;
    return sameNonCountTags(this, other) && sameNonCountTags(other, this);
  }

  toString(): string {
    const parts = this.tagEntries().map(([tag, value]) => `(${tag}, ${value})`);
    return `${this.name}:{${parts.join(", ")} }`;
  }
}

// every non-count tag of `a` is on `b` with the same value
function sameNonCountTags(a: Item, b: Item): boolean {
  for (const [tag, value] of a.tagEntries()) {
    if (tag === COUNT_TAG) continue;
    if (!b.hasTag(tag) || b.tagValue(tag) !== value) return false;
  }
  return true;
}

export function countOf(item: Item): number {
  return item.tagValue(COUNT_TAG);
}

/**
 * Merge `item` into the non-empty stack `dest` when they are equal: counts are
 * summed, every other tag stays as on `dest`. Returns false otherwise.
 */
export function stackOnto(dest: Item, item: Item): boolean {
  if (!dest.equals(item)) return false;
  dest.putTag(COUNT_TAG, countOf(dest) + countOf(item));
  return true;
}

/** Copy of `item` with its count set to `count`; `item` is untouched. */
export function withCount(item: Item, count: number): BasicItem {
  const copy = BasicItem.copyOf(item);
  copy.putTag(COUNT_TAG, count);
  return copy;
}
