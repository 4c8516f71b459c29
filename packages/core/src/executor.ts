/**
 * Option execution: conversion, flag mutation, storage and callbacks
 */

import { convertValue } from "./convert.js";
import { splitList, splitPieces } from "./split.js";
import { type ParseError, createParseError } from "./types/errors.js";
import type { FlagAction, OptionEntry, Slot } from "./types/option.js";
import { type Result, ok, error } from "./types/result.js";
import type { ParserSession } from "./types/session.js";
import type { ScalarValue } from "./types/value-kind.js";

type ConvertedArgument =
  | { readonly path: "none" }
  | { readonly path: "scalar"; readonly value: ScalarValue }
  | { readonly path: "list"; readonly values: readonly ScalarValue[] };

const applyFlag = (flag: Slot<number>, action: FlagAction): void => {
  switch (action) {
    case "set-true":
      flag.value = 1;
      break;
    case "set-false":
      flag.value = 0;
      break;
    case "increment":
      flag.value += 1;
      break;
    case "decrement":
      flag.value -= 1;
      break;
  }
};

const convertArgument = (
  option: OptionEntry,
  raw: string | undefined,
  session: ParserSession
): Result<ConvertedArgument, ParseError> => {
  if (raw === undefined || option.kind === undefined) {
    return ok({ path: "none" });
  }

  if (option.delimiters !== undefined) {
    const list = splitList(raw, option.delimiters, option.kind);
    if (!list.ok) {
      const { status, item } = list.error;
      return error(
        status === "syntax-error"
          ? createParseError(
              "invalid-argument",
              `List item not valid: "${item}"`,
              item,
              session.activeCommand
            )
          : createParseError(
              "argument-out-of-range",
              `List item out of range: "${item}"`,
              item,
              session.activeCommand
            )
      );
    }
    return ok({ path: "list", values: list.value });
  }

  const converted = convertValue(raw, option.kind);
  if (!converted.ok) {
    return error(
      converted.error === "syntax-error"
        ? createParseError(
            "invalid-argument",
            `Argument not valid: "${raw}"`,
            raw,
            session.activeCommand
          )
        : createParseError(
            "argument-out-of-range",
            `Value out of range: "${raw}"`,
            raw,
            session.activeCommand
          )
    );
  }
  return ok({ path: "scalar", value: converted.value });
};

const invokeCallback = (
  option: OptionEntry,
  raw: string | undefined,
  converted: ConvertedArgument,
  session: ParserSession
): void => {
  const callback = option.callback;
  if (!callback) {
    return;
  }
  switch (callback.shape) {
    case "none":
      callback.fn(session);
      return;
    case "raw":
      callback.fn(raw, session);
      return;
    case "typed":
      callback.fn(
        converted.path === "scalar" ? converted.value : undefined,
        session
      );
      return;
    case "typed-array":
      callback.fn(converted.path === "list" ? converted.values : [], session);
      return;
    case "raw-array":
      callback.fn(
        raw === undefined ? [] : splitPieces(raw, option.delimiters),
        session
      );
      return;
  }
};

/**
 * Run a matched option with its option-argument, if any. Conversion happens
 * before any side effect, so a failing option changes nothing.
 */
export const executeOption = (
  option: OptionEntry,
  raw: string | undefined,
  session: ParserSession
): Result<void, ParseError> => {
  const converted = convertArgument(option, raw, session);
  if (!converted.ok) {
    return converted;
  }
  const argument = converted.value;

  if (option.flag) {
    applyFlag(option.flag, option.flagAction ?? "set-true");
  }

  if (option.store) {
    if (argument.path === "scalar") {
      option.store.value = argument.value;
    } else if (argument.path === "list") {
      option.store.value = argument.values;
    }
  }

  if (option.delimiters !== undefined && option.count) {
    option.count.value = argument.path === "list" ? argument.values.length : 0;
  }

  invokeCallback(option, raw, argument, session);
  return ok(undefined);
};
