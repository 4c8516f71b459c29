/**
 * Word-wrapping block printer
 */

/**
 * Lay out text as a block ending at column `end`. The first line is assumed
 * to start at `firstLineIndent` (the caller has already written whatever
 * precedes it); continuation lines are indented to `indent`. Lines break at
 * spaces where possible and at embedded newlines always. A first line
 * starting past `end` is left empty so the text starts on the next line.
 *
 * @example
 * wrapText("one two three", 0, 2, 8); // "one two\n  three\n"
 */
export const wrapText = (
  text: string | undefined,
  firstLineIndent: number,
  indent: number,
  end: number,
  wordWrap = true
): string => {
  if (!wordWrap) {
    return `${text ?? ""}\n`;
  }
  if (!text) {
    return "\n";
  }

  const continuationWidth = Math.max(end - indent, 1);
  let rest = text;
  let output = "";
  let firstLine = true;

  for (;;) {
    const width = firstLine
      ? Math.max(end - firstLineIndent, 0)
      : continuationWidth;
    if (!firstLine) {
      output += " ".repeat(Math.max(indent, 0));
    }
    firstLine = false;

    const newline = rest.indexOf("\n");
    if (newline >= 0 && newline <= width) {
      output += rest.slice(0, newline + 1);
      rest = rest.slice(newline + 1);
      continue;
    }
    if (rest.length <= width) {
      return `${output}${rest}\n`;
    }

    // Break before the last word that does not fit, dropping the spaces
    // around the break
    let cut = width;
    while (cut > 0 && rest[cut] !== " ") {
      cut -= 1;
    }
    while (cut > 0 && rest[cut - 1] === " ") {
      cut -= 1;
    }
    if (cut === 0) {
      cut = width;
    }

    output += `${rest.slice(0, cut)}\n`;
    rest = rest.slice(cut);
    if (rest.startsWith(" ")) {
      rest = rest.slice(1);
    }
  }
};
