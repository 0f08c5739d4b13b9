/**
 * Zod issue formatting for error messages
 */

import type { z } from "zod";

/**
 * One `path: message` line per issue, `(root)` for top-level issues
 *
 * @param prefix - Path segment prepended to every issue path
 */
export function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const segments = prefix !== undefined ? [prefix, ...issue.path] : issue.path;
    const path = segments.length > 0 ? segments.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
