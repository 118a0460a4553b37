/**
 * Collection capability set: `Sized + Indexable`.
 *
 * Two structural shapes qualify. Array-likes (arrays, typed arrays) expose
 * `length` and numeric index access; container classes expose `size()`,
 * `get()` and `set()`.
 */

import { CapabilityError } from "./errors.js";

export interface MutableArrayLike<A> {
  readonly length: number;
  [index: number]: A;
}

export interface IndexedCollection<A> {
  size(): number;
  get(index: number): A;
  set(index: number, value: A): void;
}

export type Collection<A> = MutableArrayLike<A> | IndexedCollection<A>;

/** Uniform view over either collection shape. */
export interface CollectionAccess<A> {
  size(): number;
  read(index: number): A;
  write(index: number, value: A): void;
}

export function isIndexedCollection<A>(collection: Collection<A>): collection is IndexedCollection<A> {
  return (
    "size" in collection &&
    typeof collection.size === "function" &&
    "get" in collection &&
    typeof collection.get === "function" &&
    "set" in collection &&
    typeof collection.set === "function"
  );
}

/**
 * Runtime form of the capability check, for values arriving from outside the
 * type system.
 */
export function isCollection(value: unknown): value is Collection<unknown> {
  if (typeof value !== "object" || value === null) return false;
  if ("length" in value && typeof value.length === "number") return true;
  return (
    "size" in value &&
    typeof value.size === "function" &&
    "get" in value &&
    typeof value.get === "function" &&
    "set" in value &&
    typeof value.set === "function"
  );
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

/**
 * Build an accessor bound to `collection` by reference.
 *
 * @throws CapabilityError if the value has neither shape
 */
export function accessCollection<A>(collection: Collection<A>): CollectionAccess<A> {
  if (!isCollection(collection)) {
    throw new CapabilityError(describeValue(collection));
  }

  if (isIndexedCollection(collection)) {
    const indexed = collection;
    return {
      size: () => indexed.size(),
      read: (index) => indexed.get(index),
      write: (index, value) => indexed.set(index, value),
    };
  }

  const array = collection;
  return {
    size: () => array.length,
    read: (index) => array[index],
    write: (index, value) => {
      array[index] = value;
    },
  };
}
