import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { parsePipelineDocument } from "../document/index.js";
import { PipelineDocumentParseError, UnknownDependencyError } from "../errors/index.js";
import { injectPipeline } from "./inject.js";

const CHILD = `stages:
  - build
variables:
  PREFIX: /scratch
default:
  tags:
    - cpu
zlib-1.3:
  stage: build
  script:
    - eb zlib/1.3
`;

const PARENT = `
default:
  tags: [gpu]
  retry: 1
execute_builds:
  variables:
    PREFIX: /opt/software
    EB_VERSION: "4.9.0"
`;

describe("injectPipeline", () => {
  let dir: string;
  let documentPath: string;
  let basePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "stagecraft-inject-"));
    documentPath = join(dir, "child.yml");
    basePath = join(dir, "parent.yml");
    writeFileSync(documentPath, CHILD);
    writeFileSync(basePath, PARENT);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("rewrites the document in place", async () => {
    const result = await injectPipeline({ documentPath, baseConfigPath: basePath });

    expect(result.written).toBe(true);
    const rewritten = parsePipelineDocument(readFileSync(documentPath, "utf-8"));
    expect(rewritten.default).toEqual({ tags: ["gpu", "cpu"], retry: 1 });
    expect(rewritten.variables).toEqual({ PREFIX: "/scratch", EB_VERSION: "4.9.0" });
    expect(rewritten.jobs).toEqual({ "zlib-1.3": { stage: "build", script: ["eb zlib/1.3"] } });
  });

  it("leaves the file alone on a dry run", async () => {
    const result = await injectPipeline({ documentPath, baseConfigPath: basePath, dryRun: true });

    expect(result.written).toBe(false);
    expect(readFileSync(documentPath, "utf-8")).toBe(CHILD);
    expect(result.text).toContain("EB_VERSION: 4.9.0");
  });

  it("refuses invalid documents without touching them", async () => {
    const broken = `${CHILD}HDF5:\n  needs: [zlib-9]\n`;
    writeFileSync(documentPath, broken);

    await expect(injectPipeline({ documentPath, baseConfigPath: basePath })).rejects.toThrow(
      UnknownDependencyError
    );
    expect(readFileSync(documentPath, "utf-8")).toBe(broken);

    writeFileSync(documentPath, "");
    await expect(injectPipeline({ documentPath, baseConfigPath: basePath })).rejects.toThrow(
      PipelineDocumentParseError
    );
  });
});
