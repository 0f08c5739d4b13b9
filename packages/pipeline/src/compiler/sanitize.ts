/**
 * Job name and artifact directory sanitization
 */

import { RESERVED_TOP_LEVEL_KEYS } from "../constants/index.js";

/**
 * Turn an identity such as `Python/3.11.3-GCCcore-12.3.0` into a job name
 *
 * `/` and `:` become `-`, `+` becomes `plus`, parentheses are dropped,
 * whitespace and anything else outside `[A-Za-z0-9._-]` becomes `-`.
 * Names must start with a letter or `_` and must not be a reserved key;
 * otherwise they get a `job-` prefix.
 */
export function sanitizeJobName(identity: string): string {
  let sanitized = identity
    .replace(/[/:]/g, "-")
    .replace(/\+/g, "plus")
    .replace(/[()]/g, "")
    .replace(/\s/g, "-")
    .replace(/[^A-Za-z0-9._-]/g, "-");

  if (sanitized && (!/^[A-Za-z_]/.test(sanitized) || RESERVED_TOP_LEVEL_KEYS.has(sanitized))) {
    sanitized = `job-${sanitized}`;
  }

  return sanitized || "unknown-job";
}

/**
 * Directory token for an identity, used under the log and build directories
 *
 * Unlike job names these cannot be disambiguated: the build tool decides
 * where it writes, so two identities mapping to one token is an error.
 */
export function artifactToken(identity: string): string {
  return identity
    .replace(/\//g, "-")
    .replace(/[^A-Za-z0-9._+-]/g, "_");
}

/**
 * Hands out unique job names in call order
 *
 * The first identity to claim a sanitized name keeps it; later ones get
 * `-2`, `-3`, ... skipping any name already handed out.
 */
export class JobNameAllocator {
  private readonly taken = new Set<string>();
  private readonly byIdentity = new Map<string, string>();

  allocate(identity: string): string {
    const existing = this.byIdentity.get(identity);
    if (existing !== undefined) {
      return existing;
    }

    const base = sanitizeJobName(identity);
    let name = base;
    let counter = 2;
    while (this.taken.has(name)) {
      name = `${base}-${counter}`;
      counter++;
    }

    this.taken.add(name);
    this.byIdentity.set(identity, name);
    return name;
  }

  /**
   * Final identity -> job name mapping
   */
  get names(): ReadonlyMap<string, string> {
    return this.byIdentity;
  }
}
