import { describe, it, expect } from "vitest";
import {
  CommandError,
  EmptyBufferError,
  InvalidBufferError,
  UnrecognizedMetaCommandError,
  UnrecognizedQueryError,
  UnrecognizedCommandError,
  isCommandError,
} from "./errors.js";

describe("CommandError", () => {
  it("carries a code per failure", () => {
    expect(new EmptyBufferError().code).toBe("EMPTY_BUFFER");
    expect(new InvalidBufferError().code).toBe("INVALID_BUFFER");
    expect(new UnrecognizedMetaCommandError(".x").code).toBe("UNRECOGNIZED_META_COMMAND");
    expect(new UnrecognizedQueryError("x").code).toBe("UNRECOGNIZED_QUERY");
    expect(new UnrecognizedCommandError().code).toBe("UNRECOGNIZED_COMMAND");
  });

  it("keeps the offending input", () => {
    const error = new UnrecognizedQueryError("drop table t");
    expect(error.input).toBe("drop table t");
    expect(error.name).toBe("UnrecognizedQueryError");
  });

  it("prefixes execution errors when displayed", () => {
    expect(new UnrecognizedCommandError().toDisplayMessage()).toBe(
      "Error executing command: Unrecognized command."
    );
  });
});

describe("isCommandError", () => {
  it("recognizes every subclass", () => {
    expect(isCommandError(new EmptyBufferError())).toBe(true);
    expect(isCommandError(new UnrecognizedCommandError())).toBe(true);
    expect(isCommandError(new CommandError("OTHER", "other"))).toBe(true);
  });

  it("rejects other values", () => {
    expect(isCommandError(new Error("plain"))).toBe(false);
    expect(isCommandError("Input buffer is empty.")).toBe(false);
  });
});
