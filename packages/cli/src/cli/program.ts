/**
 * The argtree command tree
 */

import {
  type CommandDecl,
  type ConversionFailure,
  type ParseErrorKind,
  type ParserSession,
  type ValueKind,
  VALUE_KINDS,
  convertValue,
  createParseError,
  isValueKind,
  slot,
  splitList,
  valueFamily,
} from "@argtree/core";
import {
  helpCommand,
  helpOption,
  printHelp,
  printParseError,
} from "@argtree/help";
import type { CliIo } from "../types.js";
import { PROGRAM_NAME, VERSION } from "./constants.js";
import { formatJsonList, formatJsonValue, formatValue } from "./format.js";

export type Program = {
  readonly decl: CommandDecl;
};

export const createProgram = (io: CliIo): Program => {
  const verbosity = slot(0);
  const quiet = slot(0);

  const trace = (message: string): void => {
    if (verbosity.value > 0 && quiet.value === 0) {
      io.err.write(`${PROGRAM_NAME}: ${message}\n`);
    }
  };

  const fail = (
    session: ParserSession,
    kind: ParseErrorKind,
    message: string,
    token?: string
  ): void => {
    printParseError(
      io.err,
      createParseError(kind, message, token, session.activeCommand),
      session.settings
    );
    session.exit(1);
  };

  const conversionFailed = (
    session: ParserSession,
    failure: ConversionFailure,
    text: string,
    subject: "Argument" | "List item"
  ): void => {
    if (failure === "syntax-error") {
      fail(session, "invalid-argument", `${subject} not valid: "${text}"`, text);
    } else {
      fail(
        session,
        "argument-out-of-range",
        subject === "Argument"
          ? `Value out of range: "${text}"`
          : `List item out of range: "${text}"`,
        text
      );
    }
  };

  const readKind = (
    session: ParserSession,
    text: string | undefined
  ): ValueKind | undefined => {
    if (text === undefined) {
      fail(
        session,
        "missing-argument",
        `Missing value kind; run "${PROGRAM_NAME} kinds" for the list.`
      );
      return undefined;
    }
    if (!isValueKind(text)) {
      fail(session, "invalid-argument", `Unknown value kind: "${text}"`, text);
      return undefined;
    }
    return text;
  };

  const convertJson = slot(0);
  const convert: CommandDecl = {
    name: "convert",
    about: "Convert values to a value kind.",
    description:
      "Converts every TEXT to KIND and prints one value per line. Integers " +
      "take a 0x prefix for hexadecimal and a leading 0 for octal.",
    operands: "KIND TEXT...",
    options: [
      helpOption(io.out),
      {
        shortName: "j",
        longName: "json",
        flag: convertJson,
        description: "Print one JSON object per value.",
      },
    ],
    handler: (_operands, session) => {
      const kind = readKind(session, session.shift());
      if (kind === undefined) {
        return;
      }
      let converted = 0;
      for (
        let text = session.shift();
        text !== undefined;
        text = session.shift()
      ) {
        trace(`converting "${text}" to ${kind}`);
        const result = convertValue(text, kind);
        if (!result.ok) {
          conversionFailed(session, result.error, text, "Argument");
          return;
        }
        io.out.write(
          `${convertJson.value ? formatJsonValue(kind, text, result.value) : formatValue(result.value)}\n`
        );
        converted += 1;
      }
      if (converted === 0) {
        fail(session, "missing-argument", "Missing TEXT operand.");
      }
    },
  };

  const delimiters = slot<string | undefined>(",");
  const itemKind = slot<string | undefined>(undefined);
  const splitJson = slot(0);
  const split: CommandDecl = {
    name: "split",
    about: "Split lists and convert their items.",
    operands: "TEXT...",
    options: [
      helpOption(io.out),
      {
        shortName: "d",
        longName: "delimiters",
        argName: "CHARS",
        kind: "string",
        store: delimiters,
        description: 'Characters separating list items (default ",").',
      },
      {
        shortName: "t",
        longName: "type",
        argName: "KIND",
        kind: "string",
        store: itemKind,
        description: "Convert items to KIND (default string).",
      },
      {
        shortName: "j",
        longName: "json",
        flag: splitJson,
        description: "Print one JSON object per list.",
      },
    ],
    handler: (_operands, session) => {
      const kind =
        itemKind.value === undefined ? "string" : readKind(session, itemKind.value);
      if (kind === undefined) {
        return;
      }
      const separators = delimiters.value ?? ",";
      let lists = 0;
      for (
        let text = session.shift();
        text !== undefined;
        text = session.shift()
      ) {
        trace(`splitting "${text}" at any of "${separators}"`);
        const list = splitList(text, separators, kind);
        if (!list.ok) {
          conversionFailed(session, list.error.status, list.error.item, "List item");
          return;
        }
        io.out.write(
          splitJson.value
            ? `${formatJsonList(kind, list.value)}\n`
            : list.value.map((value) => `${formatValue(value)}\n`).join("")
        );
        lists += 1;
      }
      if (lists === 0) {
        fail(session, "missing-argument", "Missing TEXT operand.");
      }
    },
  };

  const kindsJson = slot(0);
  const kinds: CommandDecl = {
    name: "kinds",
    about: "List the value kinds.",
    options: [
      helpOption(io.out),
      {
        shortName: "j",
        longName: "json",
        flag: kindsJson,
        description: "Print the list as JSON.",
      },
    ],
    handler: () => {
      if (kindsJson.value) {
        const entries = VALUE_KINDS.map((kind) => ({
          kind,
          family: valueFamily(kind),
        }));
        io.out.write(`${JSON.stringify(entries)}\n`);
        return;
      }
      io.out.write(
        VALUE_KINDS.map((kind) => `${kind.padEnd(9)}${valueFamily(kind)}\n`).join("")
      );
    },
  };

  const help: CommandDecl = {
    name: "help",
    about: "Show help for a command.",
    operands: "[COMMAND]...",
    handler: helpCommand(io),
  };

  const decl: CommandDecl = {
    name: PROGRAM_NAME,
    about: `${PROGRAM_NAME} - convert and split command-line values`,
    operands: "COMMAND",
    options: [
      helpOption(io.out),
      {
        shortName: "v",
        longName: "version",
        description: "Print the version and exit.",
        callback: {
          shape: "none",
          fn: (session) => {
            io.out.write(`${PROGRAM_NAME} v${VERSION}\n`);
            session.exit(0);
          },
        },
      },
      {
        shortName: "V",
        longName: "verbose",
        flag: verbosity,
        flagAction: "increment",
        group: 1,
        description: "Trace what is being done on stderr.",
      },
      {
        shortName: "q",
        longName: "quiet",
        flag: quiet,
        group: 1,
        description: "Print no traces.",
      },
    ],
    subcommands: [convert, split, kinds, help],
    handler: (_operands, session) => {
      const command = session.activeCommand;
      if (command) {
        printHelp(io.out, command, session.settings);
      }
    },
  };

  return { decl };
};
