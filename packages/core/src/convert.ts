/**
 * Type conversion of option-arguments
 */

import { type Result, ok, error } from "./types/result.js";
import type { Slot } from "./types/option.js";
import {
  INTEGER_BOUNDS,
  type FloatingKind,
  type IntegerKind,
  type SmallIntegerKind,
  type ValueKind,
  type ValueOf,
  type ValueTypeMap,
  type WideIntegerKind,
} from "./types/value-kind.js";

export type ConversionFailure = "syntax-error" | "range-error";

export type ConversionStatus = "ok" | ConversionFailure;

type Conversion<T> = Result<T, ConversionFailure>;

const INTEGER_PATTERN =
  /^\s*([+-]?)(?:0[xX]([0-9a-fA-F]+)|(0[0-7]*)|([1-9][0-9]*))$/;

const FLOAT_PATTERN =
  /^\s*([+-]?)(?:((?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)|(inf(?:inity)?)|(nan))$/i;

const FLT_MAX = 3.4028234663852886e38;
const FLT_MIN = 1.1754943508222875e-38;

/**
 * Parse an integer numeral with base detection: 0x hex, leading 0 octal,
 * decimal otherwise. The whole text must be a numeral.
 */
const parseIntegerNumeral = (text: string): bigint | undefined => {
  const match = INTEGER_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const [, sign, hex, octal, decimal] = match;
  const magnitude =
    hex !== undefined
      ? BigInt(`0x${hex}`)
      : octal !== undefined
        ? octal.length > 1
          ? BigInt(`0o${octal.slice(1)}`)
          : 0n
        : BigInt(decimal ?? "0");
  return sign === "-" ? -magnitude : magnitude;
};

const convertInteger = (text: string, kind: IntegerKind): Conversion<bigint> => {
  const parsed = parseIntegerNumeral(text);
  if (parsed === undefined) {
    return error("syntax-error");
  }
  const bounds = INTEGER_BOUNDS[kind];
  if (parsed < bounds.min || parsed > bounds.max) {
    return error("range-error");
  }
  return ok(parsed);
};

const convertSmallInteger = (
  text: string,
  kind: SmallIntegerKind
): Conversion<number> => {
  const result = convertInteger(text, kind);
  return result.ok ? ok(Number(result.value)) : result;
};

const convertWideInteger = (
  text: string,
  kind: WideIntegerKind
): Conversion<bigint> => convertInteger(text, kind);

const convertFloating = (text: string, kind: FloatingKind): Conversion<number> => {
  const match = FLOAT_PATTERN.exec(text);
  if (!match) {
    return error("syntax-error");
  }
  const [, sign, numeral, infinity] = match;
  const negative = sign === "-";
  if (numeral === undefined) {
    if (infinity !== undefined) {
      return ok(negative ? -Infinity : Infinity);
    }
    return ok(NaN);
  }
  const magnitude = Number(numeral);
  if (!Number.isFinite(magnitude)) {
    return error("range-error");
  }
  // A nonzero mantissa that reads back as 0 has underflowed
  const [mantissa = ""] = numeral.split(/[eE]/);
  if (magnitude === 0 && /[1-9]/.test(mantissa)) {
    return error("range-error");
  }
  const value = negative ? -magnitude : magnitude;
  if (kind === "float") {
    if (magnitude > FLT_MAX || (magnitude !== 0 && magnitude < FLT_MIN)) {
      return error("range-error");
    }
    return ok(Math.fround(value));
  }
  return ok(value);
};

const TRUE_WORDS = ["true", "enabled", "yes", "on"];
const FALSE_WORDS = ["false", "disabled", "no", "off"];

const convertBoolean = (text: string): Conversion<boolean> => {
  const lowered = text.toLowerCase();
  if (TRUE_WORDS.includes(lowered)) {
    return ok(true);
  }
  if (FALSE_WORDS.includes(lowered)) {
    return ok(false);
  }
  const numeric = convertInteger(text, "int");
  if (!numeric.ok || (numeric.value !== 0n && numeric.value !== 1n)) {
    return error("syntax-error");
  }
  return ok(numeric.value === 1n);
};

// More than one character is a range error, not a syntax error
const convertCharacter = (text: string): Conversion<string> => {
  const characters = Array.from(text);
  const [first] = characters;
  if (first === undefined) {
    return error("syntax-error");
  }
  if (characters.length > 1) {
    return error("range-error");
  }
  return ok(first);
};

const convertCharacterCode = (text: string, max: number): Conversion<number> => {
  const result = convertCharacter(text);
  if (!result.ok) {
    return result;
  }
  const code = result.value.codePointAt(0) ?? 0;
  return code > max ? error("range-error") : ok(code);
};

const converters: {
  readonly [K in ValueKind]: (text: string) => Conversion<ValueTypeMap[K]>;
} = {
  string: (text) => ok(text),
  char: convertCharacter,
  schar: (text) => convertCharacterCode(text, 127),
  uchar: (text) => convertCharacterCode(text, 255),
  short: (text) => convertSmallInteger(text, "short"),
  ushort: (text) => convertSmallInteger(text, "ushort"),
  int: (text) => convertSmallInteger(text, "int"),
  uint: (text) => convertSmallInteger(text, "uint"),
  long: (text) => convertWideInteger(text, "long"),
  ulong: (text) => convertWideInteger(text, "ulong"),
  llong: (text) => convertWideInteger(text, "llong"),
  ullong: (text) => convertWideInteger(text, "ullong"),
  int8: (text) => convertSmallInteger(text, "int8"),
  uint8: (text) => convertSmallInteger(text, "uint8"),
  int16: (text) => convertSmallInteger(text, "int16"),
  uint16: (text) => convertSmallInteger(text, "uint16"),
  int32: (text) => convertSmallInteger(text, "int32"),
  uint32: (text) => convertSmallInteger(text, "uint32"),
  int64: (text) => convertWideInteger(text, "int64"),
  uint64: (text) => convertWideInteger(text, "uint64"),
  float: (text) => convertFloating(text, "float"),
  double: (text) => convertFloating(text, "double"),
  ldouble: (text) => convertFloating(text, "ldouble"),
  bool: convertBoolean,
};

/**
 * Convert text to a value of the given kind
 */
export const convertValue = <K extends ValueKind>(
  text: string,
  kind: K
): Result<ValueOf<K>, ConversionFailure> => converters[kind](text);

/**
 * Convert text into a slot. The slot is written only on success.
 *
 * @example
 * const port = slot(0);
 * convertTo("0x1F90", port, "uint16"); // "ok", port.value === 8080
 */
export const convertTo = <K extends ValueKind>(
  text: string,
  target: Slot<ValueOf<K>>,
  kind: K
): ConversionStatus => {
  const result = convertValue(text, kind);
  if (!result.ok) {
    return result.error;
  }
  target.value = result.value;
  return "ok";
};
