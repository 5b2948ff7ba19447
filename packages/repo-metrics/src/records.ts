/**
 * A record exactly as the forge returned it. Nothing is validated beyond
 * "it is a JSON object"; only commit dates are ever read from it.
 */
export type RepoRecord = Record<string, unknown>;

export type RepoCollection =
  | "contributors"
  | "forks"
  | "releases"
  | "issues"
  | "commits";

export function isRepoRecord(value: unknown): value is RepoRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
