/**
 * Tests for error records and message formatting
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  actionError,
  formatErrorMessage,
  inputError,
  quote,
  quoteChar,
  schemaError,
} from "./errors.js";

describe("Errors", () => {
  describe("constructors", () => {
    it("should tag each kind", () => {
      expect(schemaError("InvalidName", "missing name of flag").kind).to.equal(
        "schema"
      );
      expect(inputError("MissingFlagValue", "m", "--out")).to.deep.equal({
        kind: "input",
        code: "MissingFlagValue",
        message: "m",
        subject: "--out",
      });
      expect(actionError("boom").code).to.equal("ActionFailed");
    });
  });

  describe("quoting", () => {
    it("should double-quote names and escape quotes", () => {
      expect(quote("out")).to.equal('"out"');
      expect(quote('a"b')).to.equal('"a\\"b"');
    });

    it("should single-quote characters", () => {
      expect(quoteChar("x")).to.equal("'x'");
      expect(quoteChar("'")).to.equal("'\\''");
    });

    it("should escape characters that do not print", () => {
      expect(quoteChar("\n")).to.equal("'\\n'");
      expect(quoteChar("\t")).to.equal("'\\t'");
      expect(quoteChar("\\")).to.equal("'\\\\'");
      expect(quoteChar("\u0000")).to.equal("'\\x00'");
      expect(quoteChar("\u007f")).to.equal("'\\x7f'");
      expect(quoteChar("\u200b")).to.equal("'\\u200b'");
      expect(quoteChar("\u{e0001}")).to.equal("'\\U000e0001'");
    });

    it("should leave printable characters as they are", () => {
      expect(quoteChar(" ")).to.equal("' '");
      expect(quoteChar("é")).to.equal("'é'");
      expect(quoteChar("\u{10400}")).to.equal("'\u{10400}'");
    });
  });

  describe("formatErrorMessage", () => {
    it("should prefix scoped messages with the program name", () => {
      expect(
        formatErrorMessage("tool", 'no corresponding value for flag: "-o"')
      ).to.equal('tool: no corresponding value for flag: "-o"');
    });

    it("should not prefix twice", () => {
      expect(formatErrorMessage("tool", "tool: failed")).to.equal(
        "tool: failed"
      );
    });

    it("should leave messages without a colon alone", () => {
      expect(formatErrorMessage("tool", "missing name of command")).to.equal(
        "missing name of command"
      );
    });
  });
});
