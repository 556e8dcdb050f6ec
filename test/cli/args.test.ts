import { expect } from "chai";
import { describe, it } from "mocha";

import {
  CliArgumentError,
  helpText,
  parseArgs,
} from "../../lib/cli/args.ts";

describe("parseArgs", () => {
  it("defaults to the REPL", () => {
    expect(parseArgs([])).to.deep.equal({
      help: false,
      version: false,
      demo: false,
    });
  });

  it("reads flags and the seed value", () => {
    expect(parseArgs(["--seed", "abc", "-d", "-v", "-h"])).to.deep.equal({
      help: true,
      version: true,
      demo: true,
      seed: "abc",
    });
    expect(parseArgs(["-s", "42"]).seed).to.equal("42");
  });

  it("requires a value after --seed", () => {
    expect(() => parseArgs(["--seed"])).to.throw(
      CliArgumentError,
      "--seed requires a value",
    );
    expect(() => parseArgs(["-s", "--demo"])).to.throw(
      CliArgumentError,
      "-s requires a value",
    );
  });

  it("rejects unknown options and stray arguments", () => {
    expect(() => parseArgs(["--nope"])).to.throw(
      CliArgumentError,
      "Unknown option: --nope",
    );
    expect(() => parseArgs(["file.txt"])).to.throw(
      CliArgumentError,
      "Unexpected argument: file.txt",
    );
  });
});

describe("helpText", () => {
  it("names the version", () => {
    expect(helpText("9.9.9")).to.contain(
      "Splay tree string map (treemap) v9.9.9",
    );
  });
});
