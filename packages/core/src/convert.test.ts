/**
 * Tests for option-argument conversion
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { convertValue, convertTo } from "./convert.js";
import { slot } from "./types/option.js";

describe("convertValue", () => {
  describe("integers", () => {
    it("should detect the base of a numeral", () => {
      expect(convertValue("42", "int")).to.deep.equal({ ok: true, value: 42 });
      expect(convertValue("0x1F90", "uint16")).to.deep.equal({
        ok: true,
        value: 8080,
      });
      expect(convertValue("017", "int")).to.deep.equal({ ok: true, value: 15 });
      expect(convertValue("0", "int")).to.deep.equal({ ok: true, value: 0 });
      expect(convertValue("-25", "short")).to.deep.equal({
        ok: true,
        value: -25,
      });
    });

    it("should accept leading whitespace only", () => {
      expect(convertValue(" 12", "int")).to.deep.equal({ ok: true, value: 12 });
      expect(convertValue("12 ", "int")).to.deep.equal({
        ok: false,
        error: "syntax-error",
      });
    });

    it("should reject text that is not a numeral", () => {
      for (const text of ["", "12abc", "25x", "09", "0x", "--1"]) {
        expect(convertValue(text, "int")).to.deep.equal({
          ok: false,
          error: "syntax-error",
        });
      }
    });

    it("should check the bounds of the kind", () => {
      expect(convertValue("-128", "int8")).to.deep.equal({
        ok: true,
        value: -128,
      });
      expect(convertValue("128", "int8")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
      expect(convertValue("255", "uint8")).to.deep.equal({
        ok: true,
        value: 255,
      });
      expect(convertValue("256", "uint8")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
    });

    it("should treat a negative value for an unsigned kind as out of range", () => {
      expect(convertValue("-1", "uint")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
    });

    it("should produce bigint for 64-bit kinds", () => {
      expect(convertValue("18446744073709551615", "uint64")).to.deep.equal({
        ok: true,
        value: 18446744073709551615n,
      });
      expect(convertValue("9223372036854775808", "int64")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
      expect(convertValue("-9223372036854775808", "long")).to.deep.equal({
        ok: true,
        value: -9223372036854775808n,
      });
    });
  });

  describe("floating point", () => {
    it("should parse decimal and exponent forms", () => {
      expect(convertValue("1.5", "double")).to.deep.equal({
        ok: true,
        value: 1.5,
      });
      expect(convertValue("1e3", "double")).to.deep.equal({
        ok: true,
        value: 1000,
      });
      expect(convertValue("5.", "ldouble")).to.deep.equal({
        ok: true,
        value: 5,
      });
      expect(convertValue("-.25", "double")).to.deep.equal({
        ok: true,
        value: -0.25,
      });
    });

    it("should round single precision values", () => {
      expect(convertValue("3.14", "float")).to.deep.equal({
        ok: true,
        value: Math.fround(3.14),
      });
    });

    it("should accept infinity and nan", () => {
      expect(convertValue("inf", "double")).to.deep.equal({
        ok: true,
        value: Infinity,
      });
      expect(convertValue("-Infinity", "float")).to.deep.equal({
        ok: true,
        value: -Infinity,
      });
      const nan = convertValue("NaN", "double");
      expect(nan.ok && Number.isNaN(nan.value)).to.equal(true);
    });

    it("should round float values to single precision", () => {
      expect(convertValue("0.1", "float")).to.deep.equal({
        ok: true,
        value: Math.fround(0.1),
      });
    });

    it("should report overflow as a range error", () => {
      expect(convertValue("1e39", "float")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
      expect(convertValue("1e400", "double")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
    });

    it("should report underflow as a range error", () => {
      expect(convertValue("1e-400", "double")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
      expect(convertValue("1e-50", "float")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
      expect(convertValue("0e-400", "double")).to.deep.equal({
        ok: true,
        value: 0,
      });
    });

    it("should reject malformed numbers", () => {
      expect(convertValue("abc", "double")).to.deep.equal({
        ok: false,
        error: "syntax-error",
      });
    });
  });

  describe("booleans", () => {
    it("should accept words in any case", () => {
      expect(convertValue("yes", "bool")).to.deep.equal({ ok: true, value: true });
      expect(convertValue("Enabled", "bool")).to.deep.equal({
        ok: true,
        value: true,
      });
      expect(convertValue("OFF", "bool")).to.deep.equal({
        ok: true,
        value: false,
      });
    });

    it("should fall back to the integers 0 and 1", () => {
      expect(convertValue("1", "bool")).to.deep.equal({ ok: true, value: true });
      expect(convertValue("0", "bool")).to.deep.equal({ ok: true, value: false });
      expect(convertValue("0x1", "bool")).to.deep.equal({
        ok: true,
        value: true,
      });
    });

    it("should reject other integers", () => {
      expect(convertValue("2", "bool")).to.deep.equal({
        ok: false,
        error: "syntax-error",
      });
      expect(convertValue("-1", "bool")).to.deep.equal({
        ok: false,
        error: "syntax-error",
      });
    });

    it("should reject anything else", () => {
      expect(convertValue("maybe", "bool")).to.deep.equal({
        ok: false,
        error: "syntax-error",
      });
    });
  });

  describe("characters and strings", () => {
    it("should take exactly one character", () => {
      expect(convertValue("a", "char")).to.deep.equal({ ok: true, value: "a" });
      expect(convertValue("", "char")).to.deep.equal({
        ok: false,
        error: "syntax-error",
      });
      expect(convertValue("ab", "char")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
    });

    it("should produce character codes for schar and uchar", () => {
      expect(convertValue("A", "schar")).to.deep.equal({ ok: true, value: 65 });
      expect(convertValue("é", "schar")).to.deep.equal({
        ok: false,
        error: "range-error",
      });
      expect(convertValue("é", "uchar")).to.deep.equal({
        ok: true,
        value: 233,
      });
    });

    it("should pass strings through", () => {
      expect(convertValue("", "string")).to.deep.equal({ ok: true, value: "" });
    });
  });
});

describe("convertTo", () => {
  it("should write the slot on success", () => {
    const port = slot(0);
    expect(convertTo("0x1F90", port, "uint16")).to.equal("ok");
    expect(port.value).to.equal(8080);
  });

  it("should leave the slot alone on failure", () => {
    const count = slot(5);
    expect(convertTo("x", count, "int")).to.equal("syntax-error");
    expect(convertTo("70000", count, "ushort")).to.equal("range-error");
    expect(count.value).to.equal(5);
  });
});
