/**
 * Tests for complete help, the help option and the help command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type CommandDecl,
  createParseError,
  parse,
  resolveChain,
  resolveSettings,
} from "@argtree/core";
import {
  formatHelp,
  helpCommand,
  helpOption,
  printParseError,
  printUsage,
} from "./help.js";
import { buildTree, memorySink, sampleDecl } from "./test-fixtures.js";

const OPTIONS = [
  "  -a, --all          Include hidden files.\n",
  "  -o, --output FILE  Write the result to FILE.\n",
  "      --level[=N]    Set the level.\n",
  "  -V, --verbose\n",
  "  -q, --quiet        Print nothing.\n",
].join("");

const COMMANDS = "  list          List files.\n  copy SRC DST  Copy a file.\n";

describe("formatHelp", () => {
  const root = buildTree(sampleDecl);
  const settings = resolveSettings();

  it("should print about, usage, description, options and commands", () => {
    expect(formatHelp(root, settings)).to.equal(
      "prog - process files\n" +
        "Usage: prog [-a] [-o FILE] [--level[=N]] [-V|-q] FILE...\n" +
        "\nProcesses every FILE in order.\n" +
        "\nOptions:\n" +
        OPTIONS +
        "\nCommands:\n" +
        COMMANDS
    );
  });

  it("should leave out the about text on the error stream", () => {
    expect(formatHelp(root, settings, "stderr").startsWith("Usage: prog")).to.equal(
      true
    );
  });

  it("should leave out commands when subcommands are off", () => {
    const help = formatHelp(root, resolveSettings({ subcommands: false }));
    expect(help.endsWith(`\nOptions:\n${OPTIONS}`)).to.equal(true);
  });

  it("should print only the usage of a bare command", () => {
    const list = resolveChain(root, ["list"]);
    expect(list.ok && formatHelp(list.value, settings)).to.equal(
      "List files.\nUsage: prog list\n"
    );
  });
});

describe("printUsage", () => {
  it("should write only the usage line", () => {
    const out = memorySink();
    printUsage(out, buildTree(sampleDecl), resolveSettings());
    expect(out.chunks).to.deep.equal([
      "Usage: prog [-a] [-o FILE] [--level[=N]] [-V|-q] FILE...\n",
    ]);
  });
});

describe("printParseError", () => {
  const root = buildTree(sampleDecl);
  const parseError = createParseError(
    "unknown-option",
    'Unknown option: "-z"',
    "-z",
    root
  );

  it("should print the error line", () => {
    const err = memorySink();
    printParseError(err, parseError, resolveSettings());
    expect(err.text()).to.equal('error: Unknown option: "-z"\n');
  });

  it("should add the help of the command when configured", () => {
    const err = memorySink();
    const settings = resolveSettings({ printHelpOnError: true });
    printParseError(err, parseError, settings);
    expect(err.text()).to.equal(
      `error: Unknown option: "-z"\n\n${formatHelp(root, settings, "stderr")}`
    );
  });
});

describe("helpOption", () => {
  it("should print the help of the active command and stop", () => {
    const out = memorySink();
    const decl: CommandDecl = {
      name: "tool",
      options: [helpOption(out)],
      subcommands: [{ name: "run", about: "Run it.", options: [helpOption(out)] }],
    };
    const root = buildTree(decl);
    const settings = resolveSettings();
    const result = parse(root, ["tool", "run", "-h", "--unknown"], settings);
    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.halted).to.equal(true);
      expect(result.value.exitCode).to.equal(0);
      expect(result.value.command.name).to.equal("run");
      expect(out.text()).to.equal(formatHelp(result.value.command, settings));
    }
    expect(out.text()).to.equal(
      "Run it.\n" +
        "Usage: tool run [-h]\n" +
        "\nOptions:\n" +
        "  -h, --help  Display this help text and exit.\n"
    );
  });
});

describe("helpCommand", () => {
  const setup = () => {
    const out = memorySink();
    const err = memorySink();
    const root = buildTree({
      name: "tool",
      subcommands: [
        { name: "help", operands: "[COMMAND]...", handler: helpCommand({ out, err }) },
        {
          name: "remote",
          about: "Manage remotes.",
          subcommands: [{ name: "add", about: "Add a remote." }],
        },
      ],
    });
    return { out, err, root };
  };

  it("should print the help of the named command chain", () => {
    const { out, err, root } = setup();
    const result = parse(root, ["tool", "help", "remote", "add"]);
    expect(result.ok && result.value.halted).to.equal(false);
    expect(out.text()).to.equal("Add a remote.\nUsage: tool remote add\n");
    expect(err.text()).to.equal("");
  });

  it("should print the root help without operands", () => {
    const { out, root } = setup();
    parse(root, ["tool", "help"]);
    expect(out.text()).to.equal(
      "Usage: tool\n" +
        "\nCommands:\n" +
        "  help [COMMAND]...\n" +
        "  remote             Manage remotes.\n"
    );
  });

  it("should report unknown commands", () => {
    const { out, err, root } = setup();
    const result = parse(root, ["tool", "help", "nope"]);
    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.halted).to.equal(true);
      expect(result.value.exitCode).to.equal(1);
    }
    expect(err.text()).to.equal('error: Unknown command: "nope"\n');
    expect(out.text()).to.equal("");
  });
});
