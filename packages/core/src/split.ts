/**
 * List splitting for delimited option-arguments
 */

import { type ConversionFailure, convertValue } from "./convert.js";
import { type Result, collect, mapError } from "./types/result.js";
import type { ValueKind, ValueOf } from "./types/value-kind.js";

export type ListItemFailure = {
  readonly status: ConversionFailure;
  readonly item: string;
};

/**
 * Split text at any of the delimiter characters. Consecutive delimiters
 * produce no empty pieces.
 */
export const splitPieces = (
  text: string,
  delimiters: string | undefined
): string[] => {
  if (!text || delimiters === undefined) {
    return [];
  }
  const separators = new Set(Array.from(delimiters));
  const pieces: string[] = [];
  let piece = "";
  for (const character of text) {
    if (separators.has(character)) {
      if (piece) {
        pieces.push(piece);
      }
      piece = "";
    } else {
      piece += character;
    }
  }
  if (piece) {
    pieces.push(piece);
  }
  return pieces;
};

/**
 * Split text and convert every piece; the first failing piece aborts the split
 */
export const splitList = <K extends ValueKind>(
  text: string,
  delimiters: string | undefined,
  kind: K
): Result<ValueOf<K>[], ListItemFailure> =>
  collect(splitPieces(text, delimiters), (item) =>
    mapError(
      convertValue(item, kind),
      (status): ListItemFailure => ({ status, item })
    )
  );
