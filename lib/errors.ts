/**
 * Error classes shared by the source client, destination providers and the
 * transfer engine. Kept in one module so instanceof checks hold everywhere.
 */

/** Invalid or missing environment configuration. Fatal. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** A precondition of the run could not be established (auth, form listing). Fatal. */
export class SetupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SetupError";
  }
}

export class SourceRequestError extends Error {
  readonly status?: number;
  readonly url: string;

  constructor(url: string, status?: number, message?: string) {
    super(message ?? `Source request failed${status ? ` (HTTP ${status})` : ""}: ${url}`);
    this.name = "SourceRequestError";
    this.status = status;
    this.url = url;
  }

  /** 4xx responses: the resource is wrong or gone, another URL may work. */
  get isClientError(): boolean {
    return this.status !== undefined && this.status >= 400 && this.status < 500;
  }
}

/** The destination already holds an item with this name. */
export class DestinationConflictError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Destination item already exists: ${path}`);
    this.name = "DestinationConflictError";
    this.path = path;
  }
}

export class DestinationNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Destination folder not found: ${path}`);
    this.name = "DestinationNotFoundError";
    this.path = path;
  }
}

export class DestinationRequestError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "DestinationRequestError";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}
