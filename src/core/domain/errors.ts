/**
 * Extractor error hierarchy.
 *
 * Every fatal condition of a run surfaces as one of these; the CLI reports the
 * message and exits non-zero. Unrecognized log lines are not errors.
 */

export class ExtractorError extends Error {
  /** Stable code for programmatic handling */
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: { context?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ExtractorError";
    this.code = code;
    this.context = options?.context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

// ─── Input ────────────────────────────────────────────────────────────────────

export class InputNotFoundError extends ExtractorError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Input ${path} is not a valid file or directory.`, "INPUT_NOT_FOUND", {
      context: { path },
      cause,
    });
    this.name = "InputNotFoundError";
    this.path = path;
  }
}

export class InputReadError extends ExtractorError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? ` ${cause.message}` : "";
    super(`Input ${path} could not be read.${reason}`, "INPUT_UNREADABLE", {
      context: { path },
      cause,
    });
    this.name = "InputReadError";
    this.path = path;
  }
}

// ─── Output ───────────────────────────────────────────────────────────────────

export class OutputDirectoryError extends ExtractorError {
  readonly directory: string;

  constructor(directory: string, cause?: unknown) {
    super(
      `Directory ${directory} could not be created.`,
      "OUTPUT_DIR_UNWRITABLE",
      { context: { directory }, cause },
    );
    this.name = "OutputDirectoryError";
    this.directory = directory;
  }
}

export class OutputWriteError extends ExtractorError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`File ${path} could not be opened for writing.`, "OUTPUT_WRITE_FAILED", {
      context: { path },
      cause,
    });
    this.name = "OutputWriteError";
    this.path = path;
  }
}

export class OutputExistsError extends ExtractorError {
  readonly path: string;

  constructor(path: string) {
    super(
      `Output file ${path} already exists with different content. Rerun with --force to overwrite.`,
      "OUTPUT_EXISTS",
      { context: { path } },
    );
    this.name = "OutputExistsError";
    this.path = path;
  }
}

// ─── Configuration ────────────────────────────────────────────────────────────

export class ConfigurationError extends ExtractorError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, "CONFIG_INVALID", { context, cause });
    this.name = "ConfigurationError";
  }
}

/** Node's errno code of a failed fs call, if there is one. */
export function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}
