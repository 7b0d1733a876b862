/**
 * Tests for action invocation
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { defaultAction, helpAction, invokeAction } from "./action.js";
import { error, ok } from "./types/result.js";

const invocation = { flags: { out: "a" }, arguments: ["x"] };

describe("Action", () => {
  describe("invokeAction", () => {
    it("should pass flags and arguments through", async () => {
      const seen: unknown[] = [];
      const result = await invokeAction((flags, args) => {
        seen.push(flags, args);
      }, invocation);

      expect(result.ok).to.equal(true);
      expect(seen).to.deep.equal([{ out: "a" }, ["x"]]);
    });

    it("should accept an ok result", async () => {
      const result = await invokeAction(() => ok<void, string>(undefined), invocation);
      expect(result.ok).to.equal(true);
    });

    it("should turn an error result into an action error", async () => {
      const result = await invokeAction(
        async () => error<void, string>("quota exceeded"),
        invocation
      );
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error).to.deep.equal({
        kind: "action",
        code: "ActionFailed",
        message: "quota exceeded",
        cause: undefined,
      });
    });

    it("should turn a thrown value into an action error", async () => {
      const result = await invokeAction(() => {
        throw "plain string";
      }, invocation);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.message).to.equal("plain string");
      expect(result.error.cause).to.equal("plain string");
    });
  });

  describe("built-in actions", () => {
    it("should do nothing by default", async () => {
      const result = await invokeAction(defaultAction, invocation);
      expect(result.ok).to.equal(true);
    });

    it("should point the user to --help", () => {
      const result = helpAction(invocation);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("input");
      expect(result.error.code).to.equal("MissingCommand");
      expect(result.error.message).to.equal('use the "--help" global flag');
    });
  });
});
