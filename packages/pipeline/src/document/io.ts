/**
 * File access for input and output documents
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { IOError, describeError, getContextLogger } from "@stagecraft/core";

/**
 * Read a whole text file
 *
 * @throws {IOError} The file cannot be read
 */
export function readTextFile(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (error) {
    throw new IOError(`Failed to read ${path}: ${describeError(error)}`, path, "read", {
      cause: error,
    });
  }
}

export function fileExists(path: string): boolean {
  return existsSync(path);
}

/**
 * Write `text` to `path` through a temporary sibling and a rename, so the
 * target is either the old file or the complete new one
 *
 * @throws {IOError} The file cannot be written; the temporary file is removed
 */
export function writeDocumentAtomic(path: string, text: string): void {
  const target = resolve(path);
  const temporary = `${target}.${process.pid}.tmp`;

  try {
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(temporary, text, "utf-8");
    renameSync(temporary, target);
  } catch (error) {
    rmSync(temporary, { force: true });
    throw new IOError(`Failed to write ${path}: ${describeError(error)}`, path, "write", {
      cause: error,
    });
  }

  getContextLogger().debug({ path: target, bytes: Buffer.byteLength(text) }, "Wrote document");
}
