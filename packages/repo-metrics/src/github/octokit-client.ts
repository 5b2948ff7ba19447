import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import env from "../env";

export interface OctokitClientOptions {
  userAgent?: string;
  /** Stands in for the global fetch on every request the client makes. */
  fetch?: typeof fetch;
}

// No auth: every call runs under the forge's anonymous rate limit.
export function createOctokitClient(
  options: OctokitClientOptions = {}
): Octokit {
  return new Octokit({
    userAgent: options.userAgent ?? env.GITHUB_USER_AGENT,
    request: { fetch: options.fetch },
  });
}

/**
 * True when the request never got an HTTP response back (DNS, refused
 * connection, reset socket). Octokit reports those as a RequestError
 * without a `response`; error statuses always carry one.
 */
export function isConnectionError(error: unknown): error is RequestError {
  return error instanceof RequestError && error.response === undefined;
}
