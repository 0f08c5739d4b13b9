/**
 * Error taxonomy shared by all Stagecraft packages
 *
 * Every failure the tool reports belongs to one of four categories. The
 * category decides the process exit code, so callers can tell a broken
 * graph from a missing configuration file without parsing messages.
 */

/**
 * Error categories, in exit-code order
 */
export type ErrorCategory = "input" | "structural" | "configuration" | "io";

/**
 * Process exit code per category
 */
export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  input: 2,
  structural: 3,
  configuration: 4,
  io: 5,
} as const;

/**
 * Base error class for everything Stagecraft reports on purpose
 */
export abstract class StagecraftError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StagecraftError";
  }

  get exitCode(): number {
    return EXIT_CODES[this.category];
  }
}

/**
 * Malformed or missing graph/document input
 */
export class InputError extends StagecraftError {
  readonly category = "input";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InputError";
  }
}

/**
 * Cycles, dangling references, name or path collisions
 */
export class StructuralError extends StagecraftError {
  readonly category = "structural";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StructuralError";
  }
}

/**
 * Missing or malformed base configuration, circular variables
 */
export class ConfigurationError extends StagecraftError {
  readonly category = "configuration";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown when a document cannot be read or written
 */
export class IOError extends StagecraftError {
  readonly category = "io";

  constructor(
    message: string,
    public readonly path: string,
    public readonly operation: "read" | "write",
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "IOError";
  }
}

/**
 * Map any thrown value to the exit code the CLI should use
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof StagecraftError) {
    return error.exitCode;
  }
  return EXIT_CODES.unexpected;
}

/**
 * Render a thrown value as a message, whatever it is
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
