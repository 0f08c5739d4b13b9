/**
 * Base Configuration Schema
 *
 * The externally authored parent pipeline file. Only two parts of it are
 * read: the top-level `default` block, and the `variables` of the trigger
 * job that starts the generated child pipeline.
 */

import { z } from "zod";

/**
 * A pipeline variable: a plain scalar, or the expanded form with a
 * description and an opt-out from `$` expansion
 */
export const VariableValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z
    .object({
      value: z.string(),
      description: z.string().optional(),
      expand: z.boolean().optional(),
    })
    .passthrough(),
]);

export type VariableValue = z.infer<typeof VariableValueSchema>;

export const VariablesSchema = z.record(z.string(), VariableValueSchema);

export type Variables = z.infer<typeof VariablesSchema>;

/**
 * Declaration of one ID token (audience only; the token itself is never seen)
 */
export const IdTokenSchema = z
  .object({
    aud: z.union([z.string(), z.array(z.string())]),
  })
  .passthrough();

/**
 * Retry policy: a bare count, or count plus failure conditions
 */
export const RetryPolicySchema = z.union([
  z.number().int().min(0).max(2),
  z
    .object({
      max: z.number().int().min(0).max(2),
      when: z.array(z.string()).optional(),
      exit_codes: z.array(z.number().int()).optional(),
    })
    .passthrough(),
]);

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

/**
 * The `default` block applied to every job. Keys this tool does not know
 * about are carried through untouched.
 */
export const DefaultsBlockSchema = z
  .object({
    tags: z.array(z.string()).optional(),
    before_script: z.array(z.string()).optional(),
    after_script: z.array(z.string()).optional(),
    id_tokens: z.record(z.string(), IdTokenSchema).optional(),
    retry: RetryPolicySchema.optional(),
    image: z.union([z.string(), z.object({ name: z.string() }).passthrough()]).optional(),
    timeout: z.string().optional(),
  })
  .passthrough();

export type DefaultsBlock = z.infer<typeof DefaultsBlockSchema>;

/**
 * A trigger job, as far as this tool cares
 */
export const TriggerJobSchema = z
  .object({
    /** An empty `variables:` key is null in YAML */
    variables: VariablesSchema.nullish(),
  })
  .passthrough();

/**
 * Base configuration after extraction from the parent pipeline file
 */
export interface BaseConfig {
  defaults: DefaultsBlock;
  variables: Variables;
}
