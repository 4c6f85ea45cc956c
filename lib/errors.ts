/**
 * Errors the core is allowed to throw. Per-entity data problems are never
 * thrown; they travel as `PipelineIssue` values.
 */
export class ProjectionError extends Error {
  constructor(
    message: string,
    public readonly code: string = "PROJECTION_ERROR",
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "ProjectionError";
    Error.captureStackTrace(this, this.constructor);
  }

  static isProjectionError(err: unknown): err is ProjectionError {
    return err instanceof ProjectionError;
  }
}

/** Structurally invalid configuration; raised before any entity is processed. */
export class ConfigurationError extends ProjectionError {
  constructor(public readonly issues: string[]) {
    super(`Invalid projection configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`, "INVALID_CONFIGURATION", {
      issues,
    });
    this.name = "ConfigurationError";
  }
}
