/**
 * Tests for error reporting collaborators
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { actionError, inputError, schemaError } from "./types/errors.js";
import {
  EXIT_CODES,
  createBufferedIO,
  createErrorHandler,
  defaultErrorHandlers,
} from "./reporting.js";

describe("Reporting", () => {
  it("should keep output and errors apart", () => {
    const io = createBufferedIO();
    io.out("one");
    io.err("two");
    io.out("three");
    expect(io.stdout).to.deep.equal(["one", "three"]);
    expect(io.stderr).to.deep.equal(["two"]);
  });

  it("should write the formatted message and return the exit code", () => {
    const io = createBufferedIO();
    const handler = createErrorHandler(io, 42);
    const code = handler(
      "tool",
      inputError("MissingRequiredFlag", 'no given or default value for flag: "x"')
    );
    expect(code).to.equal(42);
    expect(io.stderr).to.deep.equal([
      'tool: no given or default value for flag: "x"',
    ]);
  });

  it("should map each channel to its own exit code", () => {
    const io = createBufferedIO();
    const handlers = defaultErrorHandlers(io);
    expect(handlers.action("tool", actionError("a"))).to.equal(
      EXIT_CODES.action
    );
    expect(
      handlers.parse("tool", inputError("MissingFlagValue", "b"))
    ).to.equal(EXIT_CODES.parse);
    expect(
      handlers.setup("tool", schemaError("InvalidName", "c"))
    ).to.equal(EXIT_CODES.setup);
    expect([EXIT_CODES.action, EXIT_CODES.parse, EXIT_CODES.setup]).to.deep.equal(
      [1, 2, 3]
    );
    expect(io.stderr).to.deep.equal(["a", "b", "c"]);
  });
});
