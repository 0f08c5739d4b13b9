import { describe, it, expect } from "vitest";
import type { PipelineDocument } from "../document/index.js";
import { CircularVariableError, CyclicDependencyError, UnknownDependencyError } from "../errors/index.js";
import { injectDefaults, mergeDefaults } from "./inject.js";

const existing = (): PipelineDocument => ({
  stages: ["build"],
  variables: { PREFIX: "/scratch" },
  default: { tags: ["cpu", "shared"], before_script: ["echo start"], retry: 1 },
  jobs: {
    "zlib-1.3": { stage: "build", script: ["eb zlib/1.3"] },
    "HDF5-1.14.0": { stage: "build", script: ["eb HDF5/1.14.0"], needs: ["zlib-1.3"] },
  },
  extras: { workflow: { name: "builds" } },
});

describe("mergeDefaults", () => {
  it("unions lists with base entries first", () => {
    expect(mergeDefaults({ tags: ["cpu", "shared"] }, { tags: ["gpu", "cpu"] })).toEqual({
      tags: ["gpu", "cpu", "shared"],
    });
  });

  it("merges id tokens with base declarations winning", () => {
    const merged = mergeDefaults(
      { id_tokens: { OLD: { aud: "old" }, SHARED: { aud: "existing" } } },
      { id_tokens: { SHARED: { aud: "base" } } }
    );
    expect(merged.id_tokens).toEqual({ OLD: { aud: "old" }, SHARED: { aud: "base" } });
  });

  it("replaces other keys set by the base and keeps the rest", () => {
    expect(mergeDefaults({ retry: 1, image: "alpine" }, { retry: 2 })).toEqual({ retry: 2, image: "alpine" });
  });
});

describe("injectDefaults", () => {
  it("leaves jobs untouched and layers defaults and variables", () => {
    const document = existing();
    const result = injectDefaults(document, {
      defaults: { tags: ["gpu"], before_script: ["module purge"] },
      variables: { PREFIX: "/opt/software", EB_VERSION: "4.9.0" },
    });

    expect(result.jobs).toEqual(document.jobs);
    expect(result.extras).toEqual({ workflow: { name: "builds" } });
    expect(result.variables).toEqual({ PREFIX: "/scratch", EB_VERSION: "4.9.0" });
    expect(result.default).toEqual({
      tags: ["gpu", "cpu", "shared"],
      before_script: ["module purge", "echo start"],
      retry: 1,
    });
  });

  it("rejects documents whose needs point nowhere", () => {
    const document = existing();
    document.jobs["HDF5-1.14.0"].needs = ["zlib-9"];
    expect(() => injectDefaults(document, { defaults: {}, variables: {} })).toThrow(UnknownDependencyError);
  });

  it("rejects documents with needs cycles", () => {
    const document = existing();
    document.jobs["zlib-1.3"].needs = [{ job: "HDF5-1.14.0" }];
    expect(() => injectDefaults(document, { defaults: {}, variables: {} })).toThrow(CyclicDependencyError);
  });

  it("rejects circular variables after layering", () => {
    expect(() =>
      injectDefaults(existing(), { defaults: {}, variables: { ROOT: "$PREFIX", PREFIX_ALIAS: "x" } })
    ).not.toThrow();
    expect(() =>
      injectDefaults({ ...existing(), variables: { PREFIX: "$ROOT" } }, { defaults: {}, variables: { ROOT: "$PREFIX" } })
    ).toThrow(CircularVariableError);
  });
});
