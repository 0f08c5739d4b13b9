import { describe, it, expect } from "vitest";
import { formatGenerateSummary, formatTriggerSnippet } from "./summary.js";

describe("formatTriggerSnippet", () => {
  it("includes the generated file as an artifact of the generator job", () => {
    expect(formatTriggerSnippet("out/ci-child-pipeline.yml", "execute_builds")).toEqual([
      "execute_builds:",
      "  stage: build",
      "  trigger:",
      "    include:",
      "      - artifact: ci-child-pipeline.yml",
      "        job: generate_pipeline",
      "    strategy: depend",
    ]);
  });

  it("names a custom generator job", () => {
    expect(formatTriggerSnippet("child.yml", "builds", "render")[5]).toBe("        job: render");
  });
});

describe("formatGenerateSummary", () => {
  it("lists counts, output and step timings", () => {
    expect(
      formatGenerateSummary({
        outputPath: "child.yml",
        stats: { jobs: 3, edges: 2, stages: 1, variables: 4 },
        stepTimings: { compile: 5, write: 1 },
      })
    ).toEqual([
      "Jobs: 3",
      "Needs edges: 2",
      "Stages: 1",
      "Variables: 4",
      "Written: child.yml",
      "Steps: compile 5ms, write 1ms",
    ]);
  });

  it("omits what did not happen", () => {
    expect(
      formatGenerateSummary({ stats: { jobs: 1, edges: 0, stages: 1, variables: 0 }, stepTimings: {} })
    ).toEqual(["Jobs: 1", "Needs edges: 0", "Stages: 1", "Variables: 0"]);
  });
});
