import { describe, it, expect } from "vitest";
import { parseArgs } from "../src/args.js";

describe("parseArgs", () => {
  it("joins the words into one question", () => {
    expect(parseArgs(["list", "files", "by", "size"])).toEqual({ kind: "ask", question: "list files by size" });
  });

  it("keeps a quoted question as is", () => {
    expect(parseArgs(["find files larger than 100MB"])).toEqual({
      kind: "ask",
      question: "find files larger than 100MB",
    });
  });

  it("shows help without arguments", () => {
    expect(parseArgs([])).toEqual({ kind: "help" });
  });

  it("recognises help and version flags anywhere", () => {
    expect(parseArgs(["list", "-h"])).toEqual({ kind: "help" });
    expect(parseArgs(["--help"])).toEqual({ kind: "help" });
    expect(parseArgs(["-v"])).toEqual({ kind: "version" });
    expect(parseArgs(["--version"])).toEqual({ kind: "version" });
  });

  it("treats a lone `cost` as the subcommand", () => {
    expect(parseArgs(["cost"])).toEqual({ kind: "cost" });
    expect(parseArgs(["cost", "of", "disk"])).toEqual({ kind: "ask", question: "cost of disk" });
  });

  it("rejects unknown options", () => {
    expect(parseArgs(["-x", "list"])).toEqual({ kind: "error", message: "Unknown option: -x" });
  });

  it("passes everything after -- through", () => {
    expect(parseArgs(["--", "-rf", "meaning"])).toEqual({ kind: "ask", question: "-rf meaning" });
    expect(parseArgs(["--", "cost"])).toEqual({ kind: "ask", question: "cost" });
  });
});
