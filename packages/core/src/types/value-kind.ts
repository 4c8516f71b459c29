/**
 * Value kinds an option-argument can be converted to
 */

/**
 * TypeScript value produced for each kind. 64-bit integer kinds use bigint,
 * every other numeric kind uses number.
 */
export type ValueTypeMap = {
  readonly string: string;
  readonly char: string;
  readonly schar: number;
  readonly uchar: number;
  readonly short: number;
  readonly ushort: number;
  readonly int: number;
  readonly uint: number;
  readonly long: bigint;
  readonly ulong: bigint;
  readonly llong: bigint;
  readonly ullong: bigint;
  readonly int8: number;
  readonly uint8: number;
  readonly int16: number;
  readonly uint16: number;
  readonly int32: number;
  readonly uint32: number;
  readonly int64: bigint;
  readonly uint64: bigint;
  readonly float: number;
  readonly double: number;
  readonly ldouble: number;
  readonly bool: boolean;
};

export type ValueKind = keyof ValueTypeMap;

export type ValueOf<K extends ValueKind> = ValueTypeMap[K];

export type ScalarValue = ValueTypeMap[ValueKind];

export type CharacterKind = "char" | "schar" | "uchar";

export type SmallIntegerKind =
  | "short"
  | "ushort"
  | "int"
  | "uint"
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "int32"
  | "uint32";

export type WideIntegerKind =
  | "long"
  | "ulong"
  | "llong"
  | "ullong"
  | "int64"
  | "uint64";

export type IntegerKind = SmallIntegerKind | WideIntegerKind;

export type FloatingKind = "float" | "double" | "ldouble";

export type IntegerBounds = {
  readonly min: bigint;
  readonly max: bigint;
};

const signedBounds = (bits: number): IntegerBounds => ({
  min: -(2n ** BigInt(bits - 1)),
  max: 2n ** BigInt(bits - 1) - 1n,
});

const unsignedBounds = (bits: number): IntegerBounds => ({
  min: 0n,
  max: 2n ** BigInt(bits) - 1n,
});

// long is 64 bits wide, as on LP64 platforms
export const INTEGER_BOUNDS: { readonly [K in IntegerKind]: IntegerBounds } = {
  short: signedBounds(16),
  ushort: unsignedBounds(16),
  int: signedBounds(32),
  uint: unsignedBounds(32),
  long: signedBounds(64),
  ulong: unsignedBounds(64),
  llong: signedBounds(64),
  ullong: unsignedBounds(64),
  int8: signedBounds(8),
  uint8: unsignedBounds(8),
  int16: signedBounds(16),
  uint16: unsignedBounds(16),
  int32: signedBounds(32),
  uint32: unsignedBounds(32),
  int64: signedBounds(64),
  uint64: unsignedBounds(64),
};

export const VALUE_KINDS: readonly ValueKind[] = [
  "string",
  "char",
  "schar",
  "uchar",
  "short",
  "ushort",
  "int",
  "uint",
  "long",
  "ulong",
  "llong",
  "ullong",
  "int8",
  "uint8",
  "int16",
  "uint16",
  "int32",
  "uint32",
  "int64",
  "uint64",
  "float",
  "double",
  "ldouble",
  "bool",
];

export const isValueKind = (text: string): text is ValueKind =>
  VALUE_KINDS.some((kind) => kind === text);

export type ValueFamily = "string" | "character" | "integer" | "floating" | "boolean";

export const valueFamily = (kind: ValueKind): ValueFamily => {
  switch (kind) {
    case "string":
      return "string";
    case "char":
    case "schar":
    case "uchar":
      return "character";
    case "float":
    case "double":
    case "ldouble":
      return "floating";
    case "bool":
      return "boolean";
    default:
      return "integer";
  }
};

