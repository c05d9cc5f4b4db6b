export class ConfigError extends Error {
  name = "ConfigError";
}

export class TraceFormatError extends Error {
  name = "TraceFormatError";

  constructor(
    public readonly path: string,
    detail: string,
  ) {
    super(`Invalid trace document at ${path}: ${detail}`);
  }
}
