export type KushnErrorKind = "io" | "pattern" | "traversal" | "serialization" | "config";

/**
 * Base class for every failure kushn reports. Callers can switch on `kind`
 * instead of chaining `instanceof` checks.
 */
export abstract class KushnError extends Error {
  abstract readonly kind: KushnErrorKind;
}

/** A file or directory could not be read, or the manifest could not be written. */
export class IoError extends KushnError {
  readonly kind = "io";

  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "IoError";
  }
}

export class PatternError extends KushnError {
  readonly kind = "pattern";

  constructor(
    public readonly pattern: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid ignore pattern "${pattern}": ${reason}`, options);
    this.name = "PatternError";
  }
}

/** A directory entry could not be visited during a strict walk. */
export class TraversalError extends KushnError {
  readonly kind = "traversal";

  constructor(
    public readonly path: string,
    public readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot traverse "${path}": ${reason}`, options);
    this.name = "TraversalError";
  }
}

export class SerializationError extends KushnError {
  readonly kind = "serialization";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SerializationError";
  }
}

export class ConfigError extends KushnError {
  readonly kind = "config";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for the `ENOENT` errors node:fs raises for missing paths. */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
