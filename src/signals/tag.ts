/**
 * Runtime type tags.
 *
 * TypeScript erases `T`, so each registry cell records a tag when it is
 * created and every typed access must present the same tag. A mismatch means
 * a handle is being used against the wrong cell.
 */

export type TypeTag = string;

/**
 * Derive a tag from a value: `typeof` for primitives, `"null"`, `"array"`,
 * and the constructor name for other objects.
 *
 * @example
 * typeTagOf(1); // "number"
 * typeTagOf([1]); // "array"
 * typeTagOf(new Map()); // "Map"
 * typeTagOf(Object.create(null)); // "object"
 */
export function typeTagOf(value: unknown): TypeTag {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value !== "object") return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) return "object";
  const name: unknown = proto.constructor?.name;
  return typeof name === "string" && name !== "" ? name : "object";
}
