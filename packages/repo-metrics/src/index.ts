export { createContext } from "./context";
export type { Context, Logger } from "./context";
export * from "./errors";
export * from "./dates";
export * from "./repo";
export * from "./summary";
export { GithubRepo } from "./github/client";
export type { GithubRepoOptions } from "./github/client";
export {
  createOctokitClient,
  isConnectionError,
} from "./github/octokit-client";
export type { OctokitClientOptions } from "./github/octokit-client";
export type { RepoCollection, RepoRecord } from "./records";
