export type ParseErrorReason =
  | "UNBALANCED_MARKERS"
  | "UNKNOWN_BLOCK_TYPE"
  | "MALFORMED_ATTRIBUTE"
  | "INVALID_FRONTMATTER"
  | "UNSUPPORTED_VERSION";

/**
 * Markers or frontmatter in a template or artifact are malformed.
 * Fatal for the file: no partial validation is attempted against it.
 */
export class ParseError extends Error {
  readonly reason: ParseErrorReason;
  readonly line: number;
  path: string | undefined;

  constructor(reason: ParseErrorReason, message: string, line: number, path?: string) {
    super(message);
    this.name = "ParseError";
    this.reason = reason;
    this.line = line;
    this.path = path;
  }
}

/** A template, artifact, registry entry or config file is missing, unreadable or invalid. */
export class ConfigurationError extends Error {
  readonly path: string | undefined;

  constructor(message: string, path?: string) {
    super(message);
    this.name = "ConfigurationError";
    this.path = path;
  }
}

/** Structured error surfaced to the user instead of a stack trace. */
export interface ErrorPayload {
  type: "ParseError" | "ConfigurationError" | "Error";
  reason?: ParseErrorReason;
  path?: string;
  line?: number;
  message: string;
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof ParseError) {
    return {
      type: "ParseError",
      reason: err.reason,
      ...(err.path !== undefined ? { path: err.path } : {}),
      line: err.line,
      message: err.message,
    };
  }
  if (err instanceof ConfigurationError) {
    return {
      type: "ConfigurationError",
      ...(err.path !== undefined ? { path: err.path } : {}),
      message: err.message,
    };
  }
  return {
    type: "Error",
    message: err instanceof Error ? err.message : String(err),
  };
}

/** True when a filesystem error is a missing file. */
export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
