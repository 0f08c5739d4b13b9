import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  EXIT_CODES,
  IOError,
  InputError,
  StructuralError,
  describeError,
  exitCodeFor,
} from "./index.js";

describe("error taxonomy", () => {
  it("maps each category to its exit code", () => {
    expect(new InputError("bad graph").exitCode).toBe(2);
    expect(new StructuralError("cycle").exitCode).toBe(3);
    expect(new ConfigurationError("no config").exitCode).toBe(4);
    expect(new IOError("disk full", "/tmp/out.yml", "write").exitCode).toBe(5);
  });

  it("keeps path, operation and cause on IOError", () => {
    const cause = new Error("EACCES");
    const error = new IOError("Failed to write out.yml", "out.yml", "write", { cause });

    expect(error.path).toBe("out.yml");
    expect(error.operation).toBe("write");
    expect(error.cause).toBe(cause);
    expect(error.name).toBe("IOError");
    expect(error.category).toBe("io");
  });

  it("treats anything else as unexpected", () => {
    expect(exitCodeFor(new Error("boom"))).toBe(EXIT_CODES.unexpected);
    expect(exitCodeFor("boom")).toBe(1);
    expect(exitCodeFor(new StructuralError("cycle"))).toBe(EXIT_CODES.structural);
  });

  it("describes errors and non-errors", () => {
    expect(describeError(new InputError("bad graph"))).toBe("bad graph");
    expect(describeError(42)).toBe("42");
  });
});
