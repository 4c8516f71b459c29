/**
 * Rendering converted values for output
 */

import type { ScalarValue, ValueKind } from "@argtree/core";

export const formatValue = (value: ScalarValue): string => String(value);

/**
 * JSON has no bigint and no non-finite numbers: both are written as strings
 */
const toJsonValue = (value: ScalarValue): string | number | boolean =>
  typeof value === "bigint" ||
  (typeof value === "number" && !Number.isFinite(value))
    ? String(value)
    : value;

export const formatJsonValue = (
  kind: ValueKind,
  text: string,
  value: ScalarValue
): string => JSON.stringify({ kind, text, value: toJsonValue(value) });

export const formatJsonList = (
  kind: ValueKind,
  values: readonly ScalarValue[]
): string => JSON.stringify({ kind, values: values.map(toJsonValue) });
