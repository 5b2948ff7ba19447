/**
 * Base error for everything this package throws on purpose.
 * The underlying failure, if any, is kept in `cause`.
 */
export class RepoMetricsError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A collection was asked for but never arrived (first page unreachable,
 * fetch failed, or the repo was not loaded yet).
 */
export class RepoDataUnavailableError extends RepoMetricsError {
  constructor(
    public readonly field: string,
    repoName: string
  ) {
    super(`No ${field} data available for repo: ${repoName}`);
  }
}

export class UnexpectedResponseError extends RepoMetricsError {
  constructor(
    public readonly url: string,
    public readonly body: unknown
  ) {
    super(`Expected a JSON array from ${url}, got ${describe(body)}`);
  }
}

export class CommitFieldMissingError extends RepoMetricsError {
  constructor(public readonly path: string) {
    super(`Commit record has no ${path}`);
  }
}

export class CommitDateFormatError extends RepoMetricsError {
  constructor(
    public readonly value: string,
    public readonly expectedFormat: string
  ) {
    super(`Commit date "${value}" does not match ${expectedFormat}`);
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
