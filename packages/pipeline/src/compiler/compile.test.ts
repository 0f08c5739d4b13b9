import { describe, it, expect } from "vitest";
import {
  ArtifactCollisionError,
  CyclicDependencyError,
  DuplicateIdentityError,
  EmptyGraphError,
  UnknownDependencyError,
} from "../errors/index.js";
import { DependencyGraphSchema, type DependencyGraphInput } from "../schemas/index.js";
import { compile } from "./compile.js";
import type { CompileOptions } from "./types.js";

const options: CompileOptions = {
  artifacts: { logDir: "/tmp/eblog", buildDir: "/tmp/ebbuild" },
  resources: { cores: 4, walltimeHours: 2 },
  command: { executable: "eb", args: ["--robot"] },
};

const graph = (input: DependencyGraphInput) => DependencyGraphSchema.parse(input);

const PYTORCH = "PyTorch/2.1.2-foss-2023a-CUDA-12.1.1";
const CUDA = "CUDA/12.1.1";
const PYTHON = "Python/3.11.3-GCCcore-12.3.0";

const gpuStack = graph({
  nodes: [
    { identity: PYTORCH, dependencies: [{ identity: CUDA }, { identity: PYTHON, kind: "build-only" }] },
    { identity: CUDA },
    { identity: PYTHON },
  ],
});

describe("compile", () => {
  it("emits one job per node, dependencies first", () => {
    const compiled = compile(gpuStack, options);

    expect(compiled.jobs.map((job) => job.name)).toEqual([
      "CUDA-12.1.1",
      "Python-3.11.3-GCCcore-12.3.0",
      "PyTorch-2.1.2-foss-2023a-CUDA-12.1.1",
    ]);
    expect(compiled.stages).toEqual(["build"]);
    expect(compiled.artifacts).toEqual({ when: "always", expireIn: "1 week" });
    expect(compiled.nameByIdentity.get(PYTORCH)).toBe("PyTorch-2.1.2-foss-2023a-CUDA-12.1.1");
  });

  it("makes a job need exactly its own dependencies", () => {
    const [cuda, , pytorch] = compile(gpuStack, options).jobs;

    expect(pytorch.dependsOn).toEqual(["CUDA-12.1.1", "Python-3.11.3-GCCcore-12.3.0"]);
    expect(cuda.dependsOn).toEqual([]);
  });

  it("builds only the job's own node", () => {
    const [cuda] = compile(gpuStack, options).jobs;

    expect(cuda.command).toEqual({
      script: ["eb --robot CUDA/12.1.1"],
      variables: {
        BUILD_IDENTITY: "CUDA/12.1.1",
        SLURM_CPUS_PER_TASK: "4",
        SBATCH_CPUS_PER_TASK: "4",
        SBATCH_TIME: "2:00:00",
      },
      timeout: "2h",
    });
    expect(cuda.artifactPaths).toEqual([
      "/tmp/eblog/CUDA-12.1.1/*.log",
      "/tmp/ebbuild/CUDA-12.1.1/**/*.log",
    ]);
    expect(cuda.displayName).toBe("CUDA/12.1.1");
  });

  it("returns frozen descriptors", () => {
    const [cuda] = compile(gpuStack, options).jobs;
    expect(Object.isFrozen(cuda)).toBe(true);
    expect(Object.isFrozen(cuda.dependsOn)).toBe(true);
  });

  it("is deterministic", () => {
    expect(compile(gpuStack, options)).toEqual(compile(gpuStack, options));
  });

  it("rejects an empty graph", () => {
    expect(() => compile(graph({ nodes: [] }), options)).toThrow(EmptyGraphError);
  });

  it("rejects repeated identities", () => {
    const duplicated = graph({ nodes: [{ identity: "zlib/1.3" }, { identity: "zlib/1.3" }] });
    expect(() => compile(duplicated, options)).toThrow(DuplicateIdentityError);
  });

  it("rejects edges to identities outside the graph", () => {
    const dangling = graph({ nodes: [{ identity: "A", dependencies: [{ identity: "missing" }] }] });

    expect(() => compile(dangling, options)).toThrow(UnknownDependencyError);
    try {
      compile(dangling, options);
    } catch (error) {
      expect(error).toMatchObject({ identity: "A", missingIdentity: "missing" });
    }
  });

  it("reports the minimal cycle by identity", () => {
    const cyclic = graph({
      nodes: [
        { identity: "X", dependencies: [{ identity: "Y" }] },
        { identity: "Y", dependencies: [{ identity: "X" }] },
      ],
    });

    expect(() => compile(cyclic, options)).toThrow("Dependency cycle detected: X -> Y -> X");
    try {
      compile(cyclic, options);
    } catch (error) {
      expect(error).toBeInstanceOf(CyclicDependencyError);
      expect(error).toMatchObject({ cycle: ["X", "Y"] });
    }
  });

  it("disambiguates job names but not artifact paths", () => {
    const clashing = graph({ nodes: [{ identity: "zlib/1.3" }, { identity: "zlib-1.3" }] });

    expect(() => compile(clashing, options)).toThrow(ArtifactCollisionError);
    try {
      compile(clashing, options);
    } catch (error) {
      expect(error).toMatchObject({
        path: "/tmp/eblog/zlib-1.3/*.log",
        identities: ["zlib/1.3", "zlib-1.3"],
      });
    }
  });

  it("suffixes clashing job names when artifact directories differ", () => {
    const compiled = compile(graph({ nodes: [{ identity: "a+b" }, { identity: "aplusb" }] }), options);
    expect(compiled.jobs.map((job) => job.name)).toEqual(["aplusb", "aplusb-2"]);
  });

  it("lets hidden dependencies be dropped from ordering", () => {
    const hidden = graph({
      nodes: [
        { identity: "A", dependencies: [{ identity: "B", kind: "hidden" }] },
        { identity: "B", dependencies: [{ identity: "A", kind: "hidden" }] },
      ],
    });

    expect(() => compile(hidden, options)).toThrow(CyclicDependencyError);

    const compiled = compile(hidden, { ...options, dependencyPolicy: { hidden: false } });
    expect(compiled.jobs.map((job) => [job.name, job.dependsOn])).toEqual([
      ["A", []],
      ["B", []],
    ]);
  });

  it("stages jobs by dependency depth on request", () => {
    const chain = graph({
      nodes: [
        { identity: "A", dependencies: [{ identity: "B" }] },
        { identity: "B", dependencies: [{ identity: "C" }] },
        { identity: "C" },
        { identity: "D" },
      ],
    });
    const compiled = compile(chain, { ...options, stageStrategy: "depth" });

    expect(compiled.stages).toEqual(["build-0", "build-1", "build-2"]);
    expect(compiled.jobs.map((job) => [job.name, job.stage])).toEqual([
      ["C", "build-0"],
      ["B", "build-1"],
      ["A", "build-2"],
      ["D", "build-0"],
    ]);
  });

  it("carries pipeline variables and artifact settings", () => {
    const compiled = compile(gpuStack, {
      ...options,
      artifacts: { ...options.artifacts, when: "on_failure", expireIn: "3 days" },
      variables: { EASYBUILD_PREFIX: "/opt/easybuild" },
    });

    expect(compiled.variables).toEqual({ EASYBUILD_PREFIX: "/opt/easybuild" });
    expect(compiled.artifacts).toEqual({ when: "on_failure", expireIn: "3 days" });
  });
});
