import type { Context } from "./context";
import { RepoDataUnavailableError } from "./errors";
import type { RepoCollection, RepoRecord } from "./records";

export type FieldResult<T> =
  | { status: "ok"; value: T }
  | { status: "unavailable"; reason: string }
  | { status: "error"; error: unknown };

export function ok<T>(value: T): FieldResult<T> {
  return { status: "ok", value };
}

export function unavailable<T>(reason: string): FieldResult<T> {
  return { status: "unavailable", reason };
}

export interface RepoLoadResults {
  contributors: FieldResult<RepoRecord[]>;
  forks: FieldResult<RepoRecord[]>;
  releases: FieldResult<RepoRecord[]>;
  stars: FieldResult<number>;
  issues: FieldResult<RepoRecord[]>;
  commits: FieldResult<RepoRecord[]>;
}

/**
 * A repository hosted on some forge.
 *
 * Owner and name are resolved when the object is built. Everything that
 * needs the network happens in `load()`, field by field, in a fixed order:
 * contributors, forks, releases, stars, issues, commits. A field whose
 * fetch fails or is not supported stays `null` and its outcome is reported
 * in the returned {@link RepoLoadResults}.
 *
 * Subclasses must resolve owner and name; every fetch they leave out
 * reports `unavailable`.
 */
export abstract class Repo {
  readonly owner: string;
  readonly name: string;

  contributors: RepoRecord[] | null = null;
  forks: RepoRecord[] | null = null;
  releases: RepoRecord[] | null = null;
  stars: number | null = null;
  issues: RepoRecord[] | null = null;
  commits: RepoRecord[] | null = null;

  private loading?: Promise<RepoLoadResults>;

  constructor(
    protected readonly ctx: Context,
    readonly url: string
  ) {
    this.owner = this.getOwner();
    this.name = this.getName();
  }

  abstract getOwner(): string;

  abstract getName(): string;

  async getContributors(): Promise<FieldResult<RepoRecord[]>> {
    return this.notImplemented("getContributors");
  }

  async getForks(): Promise<FieldResult<RepoRecord[]>> {
    return this.notImplemented("getForks");
  }

  async getReleases(): Promise<FieldResult<RepoRecord[]>> {
    return this.notImplemented("getReleases");
  }

  async getStars(): Promise<FieldResult<number>> {
    return this.notImplemented("getStars");
  }

  async getIssues(): Promise<FieldResult<RepoRecord[]>> {
    return this.notImplemented("getIssues");
  }

  async getCommits(): Promise<FieldResult<RepoRecord[]>> {
    return this.notImplemented("getCommits");
  }

  getScore(): FieldResult<number> {
    return this.notImplemented("getScore");
  }

  /**
   * Fetches every field once. Later calls resolve to the first call's
   * results without touching the network again.
   */
  load(): Promise<RepoLoadResults> {
    if (!this.loading) {
      this.loading = this.populate();
    }
    return this.loading;
  }

  getTotalContributors(): number {
    return this.total("contributors");
  }

  getTotalForks(): number {
    return this.total("forks");
  }

  getTotalReleases(): number {
    return this.total("releases");
  }

  getTotalIssues(): number {
    return this.total("issues");
  }

  getTotalCommits(): number {
    return this.total("commits");
  }

  toString(): string {
    return `Repo: ${this.name}`;
  }

  private async populate(): Promise<RepoLoadResults> {
    const contributors = await this.settle("contributors", () =>
      this.getContributors()
    );
    this.contributors = valueOf(contributors);

    const forks = await this.settle("forks", () => this.getForks());
    this.forks = valueOf(forks);

    const releases = await this.settle("releases", () => this.getReleases());
    this.releases = valueOf(releases);

    const stars = await this.settle("stars", () => this.getStars());
    this.stars = valueOf(stars);

    const issues = await this.settle("issues", () => this.getIssues());
    this.issues = valueOf(issues);

    const commits = await this.settle("commits", () => this.getCommits());
    this.commits = valueOf(commits);

    return { contributors, forks, releases, stars, issues, commits };
  }

  private async settle<T>(
    field: keyof RepoLoadResults,
    run: () => Promise<FieldResult<T>>
  ): Promise<FieldResult<T>> {
    let result: FieldResult<T>;
    try {
      result = await run();
    } catch (error) {
      result = { status: "error", error };
    }

    if (result.status === "unavailable") {
      this.ctx.logger.info(
        `No ${field} for repo ${this.name}: ${result.reason}`
      );
    } else if (result.status === "error") {
      const message =
        result.error instanceof Error
          ? result.error.message
          : String(result.error);
      this.ctx.logger.info(
        `Failed to get ${field} for repo ${this.name}: ${message}`
      );
    }
    return result;
  }

  private total(field: RepoCollection): number {
    const collection = this[field];
    if (collection === null) {
      throw new RepoDataUnavailableError(field, this.name);
    }
    return collection.length;
  }

  private notImplemented<T>(member: string): FieldResult<T> {
    return unavailable(
      `${member} is not implemented by ${this.constructor.name}`
    );
  }
}

function valueOf<T>(result: FieldResult<T>): T | null {
  return result.status === "ok" ? result.value : null;
}
