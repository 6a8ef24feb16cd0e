/**
 * Optional-extraction helpers for untyped field maps.
 *
 * Each helper looks up one key and returns the value only when it has the
 * expected shape. Absence and shape mismatch both come back as `undefined`;
 * none of these functions throw.
 */

import { z } from "zod";
import type { RawFieldMap } from "./schema.js";

const StringValue = z.string();
const RecordValue = z.record(z.unknown());
const ArrayValue = z.array(z.unknown());

/** String value at `key`, or undefined. */
export function getString(map: RawFieldMap, key: string): string | undefined {
  const result = StringValue.safeParse(map[key]);
  return result.success ? result.data : undefined;
}

/**
 * String value at `key`, or `""`. Used for sub-keys of nested objects where
 * a missing value and an empty one are the same thing.
 */
export function getStringOrEmpty(map: RawFieldMap, key: string): string {
  return getString(map, key) ?? "";
}

/** Nested object at `key` (arrays and null excluded), or undefined. */
export function getRecord(map: RawFieldMap, key: string): RawFieldMap | undefined {
  const result = RecordValue.safeParse(map[key]);
  return result.success ? result.data : undefined;
}

/** Array at `key`, or undefined. Elements are not inspected. */
export function getArray(map: RawFieldMap, key: string): readonly unknown[] | undefined {
  const result = ArrayValue.safeParse(map[key]);
  return result.success ? result.data : undefined;
}

/**
 * String elements of the array at `key`, in order. Non-string elements are
 * skipped; a missing or non-array value gives an empty list.
 */
export function getStringArray(map: RawFieldMap, key: string): string[] {
  const items = getArray(map, key) ?? [];
  const strings: string[] = [];
  for (const item of items) {
    const result = StringValue.safeParse(item);
    if (result.success) strings.push(result.data);
  }
  return strings;
}

/** Narrow an array element to a nested object, or undefined. */
export function asRecord(value: unknown): RawFieldMap | undefined {
  const result = RecordValue.safeParse(value);
  return result.success ? result.data : undefined;
}
