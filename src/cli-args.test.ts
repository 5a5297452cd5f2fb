import { describe, expect, it } from "vitest";
import { parseCliArgs } from "./cli-args.js";

describe("parseCliArgs", () => {
  it("defaults to the interactive mode", () => {
    expect(parseCliArgs([])).toEqual({
      provider: undefined,
      model: undefined,
      maxTurns: undefined,
      verbose: false,
      yes: false,
      help: false,
      message: undefined,
    });
  });

  it("reads value flags anywhere and joins the rest into the message", () => {
    const args = parseCliArgs(["fix", "--model", "claude-test", "the", "-v", "build", "--max-turns", "5", "-y"]);
    expect(args.model).toBe("claude-test");
    expect(args.maxTurns).toBe(5);
    expect(args.verbose).toBe(true);
    expect(args.yes).toBe(true);
    expect(args.message).toBe("fix the build");
  });

  it("ignores a value flag without a value", () => {
    const args = parseCliArgs(["--provider", "--help"]);
    expect(args.provider).toBeUndefined();
    expect(args.help).toBe(true);
  });
});
