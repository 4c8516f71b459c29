/**
 * Section headings in the configured letter case
 */

import type { LetterCase } from "@argtree/core";

export const formatHeading = (word: string, letterCase: LetterCase): string => {
  switch (letterCase) {
    case "lower":
      return `${word.toLowerCase()}:`;
    case "upper":
      return `${word.toUpperCase()}:`;
    case "capitalized":
      return `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}:`;
  }
};
