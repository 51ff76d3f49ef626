export type FetchErrorCode = "roster_fetch_failed" | "roster_malformed";

export class FetchError extends Error {
  public readonly code: FetchErrorCode;

  public constructor(code: FetchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FetchError";
    this.code = code;
  }
}

export class SendError extends Error {
  public readonly code = "send_failed";

  public constructor(
    public readonly recipient: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SendError";
  }
}

export type ConfigErrorCode = "config_missing" | "config_invalid";

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;

  /** Without a `reason` the variables are unset; with one they are set but unusable. */
  public constructor(
    public readonly variables: string[],
    options?: { reason?: string; cause?: unknown },
  ) {
    super(
      options?.reason
        ? `Invalid configuration ${variables.join(", ")}: ${options.reason}`
        : `Missing required configuration: ${variables.join(", ")}`,
      { cause: options?.cause },
    );
    this.name = "ConfigError";
    this.code = options?.reason ? "config_invalid" : "config_missing";
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
