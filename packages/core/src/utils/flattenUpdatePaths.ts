/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

function isNestedRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/**
 * Flattens nested update objects into dotted field-mask paths:
 * `{ data: { stringValue: 'x' } }` becomes `{ 'data.stringValue': 'x' }`.
 * Arrays, Dates and empty objects are leaves.
 */
export function flattenUpdatePaths(
  updates: Record<string, unknown>,
  prefix = '',
): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(updates)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isNestedRecord(value) && Object.keys(value).length > 0) {
      Object.assign(flat, flattenUpdatePaths(value, path));
    } else {
      flat[path] = value;
    }
  }
  return flat;
}
