// ── Crew Errors ──────────────────────────────────────────────────────────────

/** Invalid agent, crew, task-template or workflow setup. Fatal at startup. */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(
    message: string,
    public readonly errors: readonly string[] = [message],
  ) {
    super(message);
  }
}

/** Bad request parameters. Nothing has run when this is thrown. */
export class ValidationError extends Error {
  override readonly name = "ValidationError";

  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
  }
}

export class MissingParameterError extends Error {
  override readonly name = "MissingParameterError";

  constructor(public readonly key: string) {
    super(`Missing value for template placeholder "{${key}}"`);
  }
}

export class TimeoutError extends Error {
  override readonly name = "TimeoutError";

  constructor(public readonly timeoutMs: number) {
    super(`Crew invocation exceeded ${timeoutMs}ms`);
  }
}
