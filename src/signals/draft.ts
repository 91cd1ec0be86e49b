/**
 * Draft copies for `updateMut`.
 *
 * Own properties are copied recursively and every copy keeps its source's
 * prototype, so class instances stay instances of their class. Functions are
 * shared, not copied. State that does not live in own properties (private
 * `#fields`, host objects) is not carried over: such values need a `clone`.
 */

import { InvariantError } from "./errors.js";

type Copies = Map<object, unknown>;

function withPrototypeOf<T extends object>(source: object, copy: T): T {
  const proto: object | null = Object.getPrototypeOf(source);
  if (Object.getPrototypeOf(copy) !== proto) Object.setPrototypeOf(copy, proto);
  return copy;
}

function copyValue(value: unknown, copies: Copies): unknown {
  if (typeof value !== "object" || value === null) return value;
  if (copies.has(value)) return copies.get(value);

  if (value instanceof Date) {
    return withPrototypeOf(value, new Date(value.getTime()));
  }
  if (value instanceof RegExp) {
    return withPrototypeOf(value, new RegExp(value));
  }
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    return withPrototypeOf(value, structuredClone(value));
  }
  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    copies.set(value, copy);
    for (const item of value) copy.push(copyValue(item, copies));
    return withPrototypeOf(value, copy);
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    copies.set(value, copy);
    for (const [key, item] of value) copy.set(key, copyValue(item, copies));
    return withPrototypeOf(value, copy);
  }
  if (value instanceof Set) {
    const copy = new Set<unknown>();
    copies.set(value, copy);
    for (const item of value) copy.add(copyValue(item, copies));
    return withPrototypeOf(value, copy);
  }

  const copy: object = Object.create(Object.getPrototypeOf(value));
  copies.set(value, copy);
  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (!descriptor) continue;
    if ("value" in descriptor) {
      descriptor.value = copyValue(descriptor.value, copies);
    }
    Object.defineProperty(copy, key, descriptor);
  }
  return copy;
}

function sameShape<T>(original: T, copy: unknown): copy is T {
  if (typeof original !== "object" || original === null) {
    return Object.is(original, copy);
  }
  return (
    typeof copy === "object" &&
    copy !== null &&
    Object.getPrototypeOf(copy) === Object.getPrototypeOf(original)
  );
}

/**
 * Deep-copy `value` for mutation. Shared and circular references are copied
 * once, so the draft has the same object graph as the original.
 *
 * @example
 * class Point { constructor(public x: number, public y: number) {} }
 * const draft = draftOf(new Point(1, 2));
 * draft instanceof Point; // true
 */
export function draftOf<T>(value: T): T {
  const draft = copyValue(value, new Map());
  if (!sameShape(value, draft)) {
    throw new InvariantError(
      "updateMut() could not draft this value; pass a clone function",
    );
  }
  return draft;
}
