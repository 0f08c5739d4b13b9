import { describe, it, expect } from "vitest";
import { getContext, getContextLogger, runPipeline, runStep } from "./context.js";

describe("run context", () => {
  it("is undefined outside a run", () => {
    expect(getContext()).toBeUndefined();
  });

  it("exposes run ID and step inside a run", async () => {
    const seen = await runPipeline("run-1", async () => {
      const outer = getContext();
      const inner = await runStep("compile", async () => getContext());
      return { outer, inner, after: getContext() };
    });

    expect(seen.outer).toEqual({ runId: "run-1" });
    expect(seen.inner).toEqual({ runId: "run-1", step: "compile" });
    expect(seen.after).toEqual({ runId: "run-1" });
  });

  it("refuses steps outside a run", async () => {
    await expect(runStep("compile", async () => 1)).rejects.toThrow(
      "runStep called outside pipeline context"
    );
  });

  it("returns a logger outside a run", () => {
    expect(typeof getContextLogger().info).toBe("function");
  });
});
