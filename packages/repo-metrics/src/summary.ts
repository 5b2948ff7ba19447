import { isCommitBeforeDate } from "./dates";
import { RepoDataUnavailableError } from "./errors";
import type { RepoRecord } from "./records";
import type { Repo } from "./repo";

export interface RepoSummary {
  owner: string;
  name: string;
  url: string;
  contributors: number | null;
  forks: number | null;
  releases: number | null;
  issues: number | null;
  commits: number | null;
  stars: number | null;
}

/**
 * Counts of everything a loaded repo holds. A `null` count means the
 * collection never arrived, which is not the same as an empty one.
 */
export function summarizeRepo(repo: Repo): RepoSummary {
  return {
    owner: repo.owner,
    name: repo.name,
    url: repo.url,
    contributors: countOf(repo.contributors),
    forks: countOf(repo.forks),
    releases: countOf(repo.releases),
    issues: countOf(repo.issues),
    commits: countOf(repo.commits),
    stars: repo.stars,
  };
}

export function countCommitsBefore(repo: Repo, date: Date): number {
  if (repo.commits === null) {
    throw new RepoDataUnavailableError("commits", repo.name);
  }
  return repo.commits.filter((commit) => isCommitBeforeDate(commit, date))
    .length;
}

function countOf(collection: RepoRecord[] | null): number | null {
  return collection === null ? null : collection.length;
}
