import type { Context } from "../context";
import env from "../env";
import { UnexpectedResponseError } from "../errors";
import { RepoCollection, RepoRecord, isRepoRecord } from "../records";
import { FieldResult, Repo, ok, unavailable } from "../repo";
import {
  OctokitClientOptions,
  createOctokitClient,
  isConnectionError,
} from "./octokit-client";

export interface GithubRepoOptions extends OctokitClientOptions {
  /** Defaults to GITHUB_API_URL. */
  apiUrl?: string;
}

const ACCEPT_HEADER = "application/vnd.github.v3+json";

export class GithubRepo extends Repo {
  static readonly maxElementsPerPage = 100;
  static readonly maxPages = 10;

  private readonly options: GithubRepoOptions;

  constructor(ctx: Context, url: string, options: GithubRepoOptions = {}) {
    super(ctx, url);
    this.options = options;
  }

  static async create(
    ctx: Context,
    url: string,
    options: GithubRepoOptions = {}
  ): Promise<GithubRepo> {
    const repo = new GithubRepo(ctx, url, options);
    await repo.load();
    return repo;
  }

  getOwner(): string {
    return this.parseGithubUrl(-2, "Getting owner of repo: ");
  }

  getName(): string {
    return this.parseGithubUrl(-1, "Getting name of repo: ");
  }

  // https://docs.github.com/en/rest/repos/repos#list-repository-contributors
  async getContributors(): Promise<FieldResult<RepoRecord[]>> {
    return this.fetchCollection("contributors");
  }

  // https://docs.github.com/en/rest/repos/forks#list-forks
  async getForks(): Promise<FieldResult<RepoRecord[]>> {
    return this.fetchCollection("forks");
  }

  // https://docs.github.com/en/rest/releases/releases#list-releases
  async getReleases(): Promise<FieldResult<RepoRecord[]>> {
    return this.fetchCollection("releases");
  }

  // https://docs.github.com/en/rest/issues/issues#list-repository-issues
  async getIssues(): Promise<FieldResult<RepoRecord[]>> {
    // closed issues are left out unless asked for
    return this.fetchCollection("issues", "state=all");
  }

  // https://docs.github.com/en/rest/commits/commits#list-commits
  async getCommits(): Promise<FieldResult<RepoRecord[]>> {
    return this.fetchCollection("commits");
  }

  /**
   * Fetches every page of `apiEndpoint` and concatenates them in order.
   *
   * A page holding exactly `maxElementsPerPage` records means another page
   * may follow; at most `maxPages` pages are requested and anything beyond
   * is dropped without notice. If the first request cannot reach the forge
   * the result is `null`; if a later one cannot, the pages fetched so far
   * are returned. HTTP error statuses are not connection failures and are
   * thrown.
   *
   * See https://docs.github.com/en/rest/using-the-rest-api/using-pagination-in-the-rest-api
   */
  async paginatedApiCall(
    apiEndpoint: string,
    extraParams?: string
  ): Promise<RepoRecord[] | null> {
    const { maxElementsPerPage, maxPages } = GithubRepo;
    const octokit = createOctokitClient(this.options);
    const url = GithubRepo.getApiUrl(apiEndpoint, extraParams);

    const fetchPage = async (pageUrl: string): Promise<RepoRecord[]> => {
      const response = await octokit.request({
        method: "GET",
        url: pageUrl,
        headers: { accept: ACCEPT_HEADER },
      });
      return toPage(pageUrl, response.data);
    };

    this.ctx.logger.info(`Making first API call to ${url}`);
    let data: RepoRecord[];
    try {
      data = await fetchPage(url);
    } catch (error) {
      if (isConnectionError(error)) return null;
      throw error;
    }

    let pageNumber = 1;
    let paginate = data.length === maxElementsPerPage;
    while (paginate) {
      pageNumber += 1;
      const pageUrl = `${url}&page=${pageNumber}`;
      this.ctx.logger.info(`Making paginated API call to ${pageUrl}`);

      let page: RepoRecord[];
      try {
        page = await fetchPage(pageUrl);
      } catch (error) {
        if (isConnectionError(error)) return data;
        throw error;
      }

      paginate = page.length === maxElementsPerPage && pageNumber < maxPages;
      data = data.concat(page);
    }

    this.ctx.logger.info(`Number of elements retrieved: ${data.length}`);
    return data;
  }

  static getApiUrl(apiEndpoint: string, extraParams?: string): string {
    let url = `${apiEndpoint}?`;
    url += extraParams ? `${extraParams}&` : "";
    url += `per_page=${GithubRepo.maxElementsPerPage}`;
    return url;
  }

  private async fetchCollection(
    collection: RepoCollection,
    extraParams?: string
  ): Promise<FieldResult<RepoRecord[]>> {
    this.ctx.logger.info(`Getting ${collection} for repo: ${this.name}`);
    const apiUrl = (this.options.apiUrl ?? env.GITHUB_API_URL).replace(
      /\/+$/,
      ""
    );
    const apiEndpoint = `${apiUrl}/repos/${this.owner}/${this.name}/${collection}`;

    const data = await this.paginatedApiCall(apiEndpoint, extraParams);
    if (data === null) {
      return unavailable(`could not connect to ${apiEndpoint}`);
    }
    return ok(data);
  }

  private parseGithubUrl(position: number, logText: string): string {
    const segments = this.url.split("/");
    const elementParsed = segments[segments.length + position] ?? "";
    this.ctx.logger.info(`${logText}${elementParsed}`);
    return elementParsed;
  }
}

function toPage(url: string, body: unknown): RepoRecord[] {
  if (!Array.isArray(body) || !body.every(isRepoRecord)) {
    throw new UnexpectedResponseError(url, body);
  }
  return body;
}
