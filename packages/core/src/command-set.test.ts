/**
 * Tests for command set checking and lookup
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { checkCommandSet, findCommand } from "./command-set.js";
import type { CommandSet } from "./command-set.js";

const commands: CommandSet = [
  { names: ["run", "r"], description: "run the app" },
  { names: ["build"], description: "build the app" },
];

describe("CommandSet", () => {
  describe("checkCommandSet", () => {
    it("should accept distinct names", () => {
      expect(checkCommandSet(commands).ok).to.equal(true);
    });

    it("should reject a name already used as another command's alias", () => {
      const result = checkCommandSet([...commands, { names: ["r"] }]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.kind).to.equal("schema");
      expect(result.error.code).to.equal("DuplicateCommandName");
      expect(result.error.message).to.equal('duplicate command name "r"');
      expect(result.error.subject).to.equal("r");
    });

    it("should reject an alias repeated within one command", () => {
      const result = checkCommandSet([{ names: ["test", "t", "t"] }]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.code).to.equal("DuplicateCommandName");
    });

    it("should report an invalid command before later duplicates", () => {
      const result = checkCommandSet([
        { names: ["run"] },
        { names: [] },
        { names: ["run"] },
      ]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.code).to.equal("MissingCommandName");
    });

    it("should report a duplicate before a later invalid command", () => {
      const result = checkCommandSet([
        { names: ["run"] },
        { names: ["run"] },
        { names: ["bad name"] },
      ]);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.code).to.equal("DuplicateCommandName");
    });
  });

  describe("findCommand", () => {
    it("should find a command by canonical name or alias", () => {
      expect(findCommand(commands, "run")?.names[0]).to.equal("run");
      expect(findCommand(commands, "r")?.names[0]).to.equal("run");
      expect(findCommand(commands, "build")?.names[0]).to.equal("build");
    });

    it("should find nothing for undeclared names", () => {
      expect(findCommand(commands, "ru")).to.be.undefined;
      expect(findCommand(commands, "Run")).to.be.undefined;
      expect(findCommand(commands, "--run")).to.be.undefined;
      expect(findCommand(commands, "")).to.be.undefined;
    });

    it("should find a command exactly for each declared name", () => {
      const declared = commands.flatMap((command) => command.names);
      for (const name of declared) {
        const found = findCommand(commands, name);
        expect(found, name).to.not.be.undefined;
        expect(found?.names).to.include(name);
      }
    });
  });
});
