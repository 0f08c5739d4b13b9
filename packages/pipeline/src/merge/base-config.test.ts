import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigurationNotFoundError, ConfigurationParseError } from "../errors/index.js";
import { loadBaseConfig, parseBaseConfig } from "./base-config.js";

const PARENT_PIPELINE = `
default:
  tags: [gpu]
  before_script:
    - module load EasyBuild
  retry: 2
execute_builds:
  stage: build
  variables:
    EB_VERSION: "4.9.0"
    PREFIX: /opt/software
other_trigger:
  variables:
    EB_VERSION: "5.0.0"
`;

describe("parseBaseConfig", () => {
  it("extracts the default block and the trigger job's variables", () => {
    expect(parseBaseConfig(PARENT_PIPELINE, "parent.yml")).toEqual({
      defaults: { tags: ["gpu"], before_script: ["module load EasyBuild"], retry: 2 },
      variables: { EB_VERSION: "4.9.0", PREFIX: "/opt/software" },
    });
  });

  it("reads the variables of a named trigger job", () => {
    const config = parseBaseConfig(PARENT_PIPELINE, "parent.yml", { triggerJob: "other_trigger" });
    expect(config.variables).toEqual({ EB_VERSION: "5.0.0" });
  });

  it("treats an empty document as an empty configuration", () => {
    expect(parseBaseConfig("", "empty.yml")).toEqual({ defaults: {}, variables: {} });
  });

  it("has no variables when the trigger job is missing", () => {
    expect(parseBaseConfig("default:\n  tags: [cpu]\n", "parent.yml")).toEqual({
      defaults: { tags: ["cpu"] },
      variables: {},
    });
  });

  it("tolerates CI-specific tags elsewhere in the file", () => {
    const text = ".setup:\n  script: [echo setup]\nlint:\n  script: !reference [.setup, script]\n";
    expect(parseBaseConfig(text, "parent.yml")).toEqual({ defaults: {}, variables: {} });
  });

  it("resolves merge keys built from anchors", () => {
    const text = [
      ".shared: &shared",
      "  tags: [gpu]",
      "  retry: 1",
      ".vars: &vars",
      "  EB_VERSION: \"4.9.0\"",
      "default:",
      "  <<: *shared",
      "  retry: 2",
      "execute_builds:",
      "  variables:",
      "    <<: *vars",
      "    PREFIX: /opt/software",
      "",
    ].join("\n");

    expect(parseBaseConfig(text, "parent.yml")).toEqual({
      defaults: { tags: ["gpu"], retry: 2 },
      variables: { EB_VERSION: "4.9.0", PREFIX: "/opt/software" },
    });
  });

  it("treats an empty variables key as no variables", () => {
    expect(parseBaseConfig("default:\n  tags: [gpu]\nexecute_builds:\n  variables:\n", "parent.yml")).toEqual({
      defaults: { tags: ["gpu"] },
      variables: {},
    });
  });

  it("rejects malformed documents", () => {
    expect(() => parseBaseConfig("default: [unclosed", "bad.yml")).toThrow(ConfigurationParseError);
    expect(() => parseBaseConfig("- just\n- a list\n", "bad.yml")).toThrow(
      "Malformed base configuration bad.yml: top level must be a mapping"
    );
  });

  it("reports invalid sections with their path", () => {
    expect(() => parseBaseConfig("default:\n  retry: 5\n", "bad.yml")).toThrow(/default\.retry/);
  });
});

describe("loadBaseConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stagecraft-base-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("distinguishes a missing file from an empty one", () => {
    expect(() => loadBaseConfig(join(dir, "missing.yml"))).toThrow(ConfigurationNotFoundError);

    const empty = join(dir, "empty.yml");
    writeFileSync(empty, "");
    expect(loadBaseConfig(empty)).toEqual({ defaults: {}, variables: {} });
  });

  it("loads a file", () => {
    const path = join(dir, "parent.yml");
    writeFileSync(path, PARENT_PIPELINE);
    expect(loadBaseConfig(path).variables).toEqual({ EB_VERSION: "4.9.0", PREFIX: "/opt/software" });
  });
});
