import { describe, expect, it } from "vitest";

import {
  getFlagInteger,
  parseArgs,
  resolveAgentIdentity,
  resolveCommand
} from "../../src/cli/args.js";

describe("parseArgs", () => {
  it("separates positionals, valued flags and boolean flags", () => {
    expect(parseArgs(["relay", "--port", "9100", "--verbose", "--log", "out.log"])).toEqual({
      positional: ["relay"],
      flags: { "--port": "9100", "--verbose": true, "--log": "out.log" }
    });
  });
});

describe("getFlagInteger", () => {
  it("parses integers and rejects anything else", () => {
    const { flags } = parseArgs(["--port", "9100", "--bad", "9.5", "--bare"]);

    expect(getFlagInteger(flags, "--port")).toBe(9100);
    expect(getFlagInteger(flags, "--missing")).toBeUndefined();
    expect(() => getFlagInteger(flags, "--bad")).toThrow("Invalid --bad value (expected an integer).");
    expect(() => getFlagInteger(flags, "--bare")).toThrow("Invalid --bare value (expected an integer).");
  });
});

describe("resolveAgentIdentity", () => {
  it("maps --company to the proposer and --investor to the evaluator", () => {
    expect(resolveAgentIdentity(parseArgs(["--company", " Acme "]).flags)).toEqual({ role: "proposer", name: "Acme" });
    expect(resolveAgentIdentity(parseArgs(["--investor", "Fund"]).flags)).toEqual({ role: "evaluator", name: "Fund" });
  });

  it("requires exactly one named side", () => {
    expect(() => resolveAgentIdentity(parseArgs(["--company", "Acme", "--investor", "Fund"]).flags)).toThrow(
      "Use either --company or --investor (not both)."
    );
    expect(() => resolveAgentIdentity(parseArgs([]).flags)).toThrow("Specify --company NAME or --investor NAME.");
    expect(() => resolveAgentIdentity(parseArgs(["--company"]).flags)).toThrow("--company requires a name.");
  });
});

describe("resolveCommand", () => {
  it("routes subcommands and the bare agent shorthand", () => {
    expect(resolveCommand(["relay", "--port", "9100"])).toEqual({ command: "relay", rest: ["--port", "9100"] });
    expect(resolveCommand(["--investor", "Fund"])).toEqual({ command: "agent", rest: ["--investor", "Fund"] });
    expect(resolveCommand([])).toEqual({ command: "help", rest: [] });
    expect(resolveCommand(["agent", "--help"])).toEqual({ command: "help", rest: [] });
    expect(resolveCommand(["dance"])).toEqual({ command: null, rest: [] });
  });
});
