/**
 * Tests for parse error formatting
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createParseError,
  formatDeclarationIssue,
  formatParseError,
} from "./errors.js";

describe("errors", () => {
  it("should prefix parse errors", () => {
    const parseError = createParseError(
      "unknown-option",
      'Unknown option: "--x"',
      "--x"
    );
    expect(parseError.token).to.equal("--x");
    expect(formatParseError(parseError)).to.equal(
      'error: Unknown option: "--x"'
    );
  });

  it("should join the path of declaration issues", () => {
    expect(
      formatDeclarationIssue({
        path: ["tool", "run", "--jobs"],
        message: "bad",
      })
    ).to.equal("tool > run > --jobs: bad");
  });
});
