/**
 * Tests for the CLI dispatcher
 */

import { describe, it, before, after } from "mocha";
import { expect } from "chai";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CliIo } from "../types.js";
import { VERSION } from "./constants.js";
import { runCli } from "./dispatcher.js";

type Run = {
  readonly code: number;
  readonly out: string;
  readonly err: string;
};

describe("runCli", () => {
  let cwd = "";

  before(() => {
    cwd = mkdtempSync(join(tmpdir(), "argtree-cli-"));
  });

  after(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  const run = async (
    args: readonly string[],
    env: CliIo["env"] = {}
  ): Promise<Run> => {
    const out: string[] = [];
    const err: string[] = [];
    const code = await runCli(args, {
      out: { write: (chunk: string) => out.push(chunk) },
      err: { write: (chunk: string) => err.push(chunk) },
      cwd,
      env,
    });
    return { code, out: out.join(""), err: err.join("") };
  };

  describe("convert", () => {
    it("should print one converted value per line", async () => {
      expect(await run(["convert", "int", "42", "0x10", "017"])).to.deep.equal({
        code: 0,
        out: "42\n16\n15\n",
        err: "",
      });
    });

    it("should print JSON objects", async () => {
      const result = await run(["convert", "-j", "int64", "9007199254740993"]);
      expect(result.out).to.equal(
        '{"kind":"int64","text":"9007199254740993","value":"9007199254740993"}\n'
      );
    });

    it("should fail on values out of range", async () => {
      expect(await run(["convert", "uint8", "300"])).to.deep.equal({
        code: 1,
        out: "",
        err: 'error: Value out of range: "300"\n',
      });
    });

    it("should stop at the first invalid value", async () => {
      expect(await run(["convert", "int", "1", "x", "2"])).to.deep.equal({
        code: 1,
        out: "1\n",
        err: 'error: Argument not valid: "x"\n',
      });
    });

    it("should reject unknown kinds", async () => {
      const result = await run(["convert", "bogus", "1"]);
      expect(result.code).to.equal(1);
      expect(result.err).to.equal('error: Unknown value kind: "bogus"\n');
    });

    it("should require a kind and a value", async () => {
      expect((await run(["convert"])).err).to.equal(
        'error: Missing value kind; run "argtree kinds" for the list.\n'
      );
      expect((await run(["convert", "int"])).err).to.equal(
        "error: Missing TEXT operand.\n"
      );
    });
  });

  describe("split", () => {
    it("should split at any delimiter and convert the items", async () => {
      expect(
        await run(["split", "-t", "int", "-d", ";,", "1;2,3"])
      ).to.deep.equal({ code: 0, out: "1\n2\n3\n", err: "" });
    });

    it("should split at commas by default", async () => {
      expect((await run(["split", "a,,b"])).out).to.equal("a\nb\n");
    });

    it("should print JSON lists", async () => {
      expect((await run(["split", "-j", "--type=uint8", "1,2"])).out).to.equal(
        '{"kind":"uint8","values":[1,2]}\n'
      );
    });

    it("should name the failing item", async () => {
      expect(await run(["split", "-t", "int", "1,x"])).to.deep.equal({
        code: 1,
        out: "",
        err: 'error: List item not valid: "x"\n',
      });
    });
  });

  describe("kinds", () => {
    it("should list kinds with their families", async () => {
      const result = await run(["kinds"]);
      expect(result.code).to.equal(0);
      expect(result.out.startsWith("string   string\nchar     character\n")).to.equal(
        true
      );
      expect(result.out.endsWith("ldouble  floating\nbool     boolean\n")).to.equal(
        true
      );
    });
  });

  describe("global options", () => {
    it("should print the version", async () => {
      expect(await run(["--version", "bogus"])).to.deep.equal({
        code: 0,
        out: `argtree v${VERSION}\n`,
        err: "",
      });
    });

    it("should print the root help without a command", async () => {
      const result = await run([]);
      expect(result.code).to.equal(0);
      expect(
        result.out.startsWith(
          "argtree - convert and split command-line values\n" +
            "Usage: argtree [-h] [-v] [-V|-q] COMMAND\n"
        )
      ).to.equal(true);
      expect((await run(["-h"])).out).to.equal(result.out);
    });

    it("should trace on stderr when verbose", async () => {
      expect(await run(["-V", "convert", "int", "7"])).to.deep.equal({
        code: 0,
        out: "7\n",
        err: 'argtree: converting "7" to int\n',
      });
    });

    it("should reject verbose and quiet together", async () => {
      expect(await run(["-V", "-q", "kinds"])).to.deep.equal({
        code: 1,
        out: "",
        err: "error: Options -V, --verbose and -q, --quiet are mutually exclusive.\n",
      });
    });

    it("should reject unknown options and commands", async () => {
      expect((await run(["--nope"])).err).to.equal(
        'error: Unknown option: "--nope"\n'
      );
      expect((await run(["bogus"])).err).to.equal(
        'error: Unknown command: "bogus"\n'
      );
    });
  });

  describe("help", () => {
    const convertHelp =
      "Convert values to a value kind.\n" +
      "Usage: argtree convert [-h] [-j] KIND TEXT...\n" +
      "\n" +
      "Converts every TEXT to KIND and prints one value per line. Integers take a 0x\n" +
      "prefix for hexadecimal and a leading 0 for octal.\n" +
      "\n" +
      "Options:\n" +
      "  -h, --help  Display this help text and exit.\n" +
      "  -j, --json  Print one JSON object per value.\n";

    it("should print the help of a named command", async () => {
      expect(await run(["help", "convert"])).to.deep.equal({
        code: 0,
        out: convertHelp,
        err: "",
      });
    });

    it("should match the help option of the command", async () => {
      expect((await run(["convert", "--help"])).out).to.equal(convertHelp);
    });

    it("should report unknown commands", async () => {
      expect(await run(["help", "nope"])).to.deep.equal({
        code: 1,
        out: "",
        err: 'error: Unknown command: "nope"\n',
      });
    });
  });

  describe("settings file", () => {
    it("should apply the file named by the environment", async () => {
      const configPath = join(cwd, "settings.json");
      writeFileSync(
        configPath,
        JSON.stringify({ printHelpOnError: true, help: { letterCase: "upper" } }),
        "utf-8"
      );
      const result = await run(["convert", "uint8", "300"], {
        ARGTREE_CONFIG: "settings.json",
      });
      expect(result.code).to.equal(1);
      expect(
        result.err.startsWith(
          'error: Value out of range: "300"\n\n' +
            "USAGE: argtree convert [-h] [-j] KIND TEXT...\n"
        )
      ).to.equal(true);
    });

    it("should fail on an invalid file", async () => {
      const configPath = join(cwd, "invalid.json");
      writeFileSync(configPath, '{ "colors": 1 }', "utf-8");
      expect(
        await run(["kinds"], { ARGTREE_CONFIG: "invalid.json" })
      ).to.deep.equal({
        code: 1,
        out: "",
        err: `error: ${configPath}: unknown setting 'colors'\n`,
      });
    });
  });
});
