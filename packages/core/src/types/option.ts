/**
 * Option declarations
 */

import type { ParserSession } from "./session.js";
import type { ScalarValue, ValueKind, ValueOf } from "./value-kind.js";

/**
 * Mutable cell an option writes into
 */
export type Slot<T> = { value: T };

export const slot = <T>(value: T): Slot<T> => ({ value });

export type FlagAction = "set-true" | "set-false" | "increment" | "decrement";

export type ArgumentShape = "none" | "required" | "optional";

type OptionCommon = {
  readonly shortName?: string;
  readonly longName?: string;
  /** Display name of the option-argument; "[NAME]" marks it optional */
  readonly argName?: string;
  readonly flag?: Slot<number>;
  /** Defaults to "set-true" */
  readonly flagAction?: FlagAction;
  /** Options sharing a nonzero group are mutually exclusive */
  readonly group?: number;
  readonly hidden?: boolean;
  readonly description?: string;
};

export type NoneCallback = {
  readonly shape: "none";
  readonly fn: (session: ParserSession) => void;
};

/**
 * Receives the option-argument as typed by the user (unsplit for lists)
 */
export type RawCallback = {
  readonly shape: "raw";
  readonly fn: (raw: string | undefined, session: ParserSession) => void;
};

export type TypedCallback<K extends ValueKind> = {
  readonly shape: "typed";
  readonly fn: (value: ValueOf<K> | undefined, session: ParserSession) => void;
};

export type TypedArrayCallback<K extends ValueKind> = {
  readonly shape: "typed-array";
  readonly fn: (values: readonly ValueOf<K>[], session: ParserSession) => void;
};

/**
 * Receives the split pieces of a list before conversion
 */
export type RawArrayCallback = {
  readonly shape: "raw-array";
  readonly fn: (pieces: readonly string[], session: ParserSession) => void;
};

export type CallbackShape = OptionEntryCallback["shape"];

export type PlainOption = OptionCommon & {
  readonly kind?: undefined;
  readonly delimiters?: undefined;
  readonly store?: undefined;
  readonly count?: undefined;
  readonly callback?: NoneCallback | RawCallback;
};

export type ScalarOption<K extends ValueKind> = OptionCommon & {
  readonly kind: K;
  readonly delimiters?: undefined;
  readonly store?: Slot<ValueOf<K> | undefined>;
  readonly count?: undefined;
  readonly callback?: NoneCallback | RawCallback | TypedCallback<K>;
};

export type ListOption<K extends ValueKind> = OptionCommon & {
  readonly kind: K;
  /** Any of these characters separates two list items */
  readonly delimiters: string;
  readonly store?: Slot<readonly ValueOf<K>[] | undefined>;
  readonly count?: Slot<number>;
  readonly callback?:
    | NoneCallback
    | RawCallback
    | TypedArrayCallback<K>
    | RawArrayCallback;
};

export type OptionDecl =
  | PlainOption
  | { readonly [K in ValueKind]: ScalarOption<K> | ListOption<K> }[ValueKind];

/**
 * Callback as seen by the executor, independent of the declared kind.
 * Declared with method syntax so every kind-specific callback fits.
 */
export type OptionEntryCallback =
  | { readonly shape: "none"; fn(session: ParserSession): void }
  | {
      readonly shape: "raw";
      fn(raw: string | undefined, session: ParserSession): void;
    }
  | {
      readonly shape: "typed";
      fn(value: ScalarValue | undefined, session: ParserSession): void;
    }
  | {
      readonly shape: "typed-array";
      fn(values: readonly ScalarValue[], session: ParserSession): void;
    }
  | {
      readonly shape: "raw-array";
      fn(pieces: readonly string[], session: ParserSession): void;
    };

/**
 * Kind-erased view of an option declaration
 */
export type OptionEntry = OptionCommon & {
  readonly kind?: ValueKind;
  readonly delimiters?: string;
  readonly store?: Slot<unknown>;
  readonly count?: Slot<number>;
  readonly callback?: OptionEntryCallback;
};

export const argumentShape = (option: OptionEntry): ArgumentShape => {
  if (option.argName === undefined) {
    return "none";
  }
  return option.argName.startsWith("[") ? "optional" : "required";
};

/**
 * Name an option the way it is shown in messages: "-a, --alpha"
 */
export const describeOption = (
  option: OptionEntry,
  longOptions = true
): string => {
  const names: string[] = [];
  if (option.shortName) {
    names.push(`-${option.shortName}`);
  }
  if (longOptions && option.longName) {
    names.push(`--${option.longName}`);
  }
  return names.join(", ");
};
