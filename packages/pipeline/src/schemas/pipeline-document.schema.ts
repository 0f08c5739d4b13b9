/**
 * Pipeline Document Schema
 *
 * Jobs as they appear in an emitted child pipeline. Keys beyond the ones
 * listed are carried through untouched, so reading and rewriting a
 * document never drops job settings.
 */

import { z } from "zod";
import { VariablesSchema } from "./base-config.schema.js";

export const NeedsEntrySchema = z.union([
  z.string(),
  z.object({ job: z.string() }).passthrough(),
]);

export type NeedsEntry = z.infer<typeof NeedsEntrySchema>;

export const ArtifactsBlockSchema = z
  .object({
    when: z.enum(["always", "on_success", "on_failure"]).optional(),
    paths: z.array(z.string()).optional(),
    expire_in: z.string().optional(),
  })
  .passthrough();

export type ArtifactsBlock = z.infer<typeof ArtifactsBlockSchema>;

export const JobRecordSchema = z
  .object({
    stage: z.string().optional(),
    script: z.union([z.string(), z.array(z.string())]).optional(),
    variables: VariablesSchema.optional(),
    timeout: z.string().optional(),
    needs: z.array(NeedsEntrySchema).optional(),
    artifacts: ArtifactsBlockSchema.optional(),
  })
  .passthrough();

export type JobRecord = z.infer<typeof JobRecordSchema>;

/**
 * Extract the job name of a `needs` entry
 */
export function neededJob(entry: NeedsEntry): string {
  return typeof entry === "string" ? entry : entry.job;
}
