import { describe, it, expect } from "vitest";
import {
  createCharInjectError,
  createMissingCredentialsError,
  createTerminalRestoreError,
  createUnsupportedModelError,
  describeError,
} from "../src/index.js";

describe("error factories", () => {
  it("names every credential source in the message", () => {
    const error = createMissingCredentialsError(["CMDFOR_OPENAI_API_KEY", "OPENAI_API_KEY"]);
    expect(error.message).toBe(
      "CMDFOR_OPENAI_API_KEY or OPENAI_API_KEY environment variable must be set",
    );
  });

  it("carries the rejected model", () => {
    const error = createUnsupportedModelError("gpt-2", ["gpt-4o"]);
    expect(error).toEqual({
      code: "UNSUPPORTED_MODEL",
      message: "Unsupported model: gpt-2",
      model: "gpt-2",
      supported: ["gpt-4o"],
    });
  });
});

describe("describeError", () => {
  it("includes the cause", () => {
    const error = createTerminalRestoreError(new Error("EBADF"));
    expect(describeError(error)).toBe(
      "[TERMINAL_RESTORE] Failed to restore terminal settings: EBADF\n  cause: EBADF",
    );
  });

  it("includes a secondary restore failure", () => {
    const error = { ...createCharInjectError("x", new Error("EIO")), restoreFailure: new Error("EBADF") };
    expect(describeError(error)).toBe(
      '[INJECT] Failed to inject character: "x"\n  cause: EIO\n  restore also failed: EBADF',
    );
  });

  it("omits the cause line for errors without one", () => {
    const error = createMissingCredentialsError(["OPENAI_API_KEY"]);
    expect(describeError(error)).toBe(
      "[MISSING_CREDENTIALS] OPENAI_API_KEY environment variable must be set",
    );
  });
});
