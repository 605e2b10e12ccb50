export type ErrorSeverity = "user" | "system";

/**
 * Base class for errors the pipeline surfaces to its caller.
 * `severity` tells the CLI whether the caller or the environment is at fault.
 */
export class PipelineError extends Error {
  public readonly severity: ErrorSeverity;

  constructor(message: string, severity: ErrorSeverity, options?: ErrorOptions) {
    super(message, options);
    this.name = "PipelineError";
    this.severity = severity;
  }
}

export type InvalidInputReason =
  | "invalid_url"
  | "unsupported_host"
  | "unsupported_video_format"
  | "unsupported_audio_format"
  | "empty_audio";

/** Malformed URL, wrong file extension or empty audio. */
export class InvalidInputError extends PipelineError {
  public readonly reason: InvalidInputReason;

  constructor(message: string, reason: InvalidInputReason) {
    super(message, "user");
    this.name = "InvalidInputError";
    this.reason = reason;
  }
}

export class NotFoundError extends PipelineError {
  public readonly path: string;

  constructor(filePath: string) {
    super(`File not found: ${filePath}`, "user");
    this.name = "NotFoundError";
    this.path = filePath;
  }
}

export type EngineName = "download" | "media" | "speech" | "clipboard" | "http";

/**
 * Failure inside a best-effort external call. Stages convert it into a
 * placeholder value; it is never thrown to the pipeline's caller.
 */
export class EngineError extends Error {
  public readonly engine: EngineName;

  constructor(engine: EngineName, cause: unknown) {
    super(`${engine} engine failed: ${describeError(cause)}`, { cause });
    this.name = "EngineError";
    this.engine = engine;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isUserError(error: unknown): boolean {
  return error instanceof PipelineError && error.severity === "user";
}
