import type { RequestParameters, ResponseHeaders } from "@octokit/types";

export type FeedKind = "commits" | "issues";

export interface RepositoryRef {
  owner: string;
  name: string;
}

export interface RepositoryEntry {
  ref: RepositoryRef;
  isOfficial: boolean;
}

export interface RepositoryConfigInput {
  official: string[];
  unofficial: string[];
}

export interface OrgSnapshot {
  org: string;
  repos: string[];
  fetchedAt: string;
}

export interface FeedCursor {
  page: number;
  since: string | null;
}

export type RepoCursors = Record<FeedKind, FeedCursor>;

/**
 * Everything the engine persists between runs. Seen keys are held as sets in
 * memory and written as arrays in insertion order.
 */
export interface CacheState {
  commitKeys: Set<string>;
  issueKeys: Set<string>;
  orgSnapshots: Record<string, OrgSnapshot>;
  repoCursors: Record<string, RepoCursors>;
}

export interface CommitRecord {
  sha: string;
  author: string;
  repository: string;
  url: string;
  date: string | null;
  message: string;
  fileNames: string[];
  isOfficial: boolean;
}

export interface IssueRecord {
  number: number;
  title: string;
  state: string;
  author: string;
  repository: string;
  url: string;
  createdAt: string | null;
  closedAt: string | null;
  isOfficial: boolean;
}

export interface PullRequestRecord extends IssueRecord {
  mergedAt: string | null;
}

export type ActivityRecord =
  | { kind: "commit"; record: CommitRecord }
  | { kind: "issue"; record: IssueRecord }
  | { kind: "pullRequest"; record: PullRequestRecord };

export type IdentityKind = "login" | "name" | "anonymous";

export interface ContributorIdentity {
  key: string;
  kind: IdentityKind;
}

export interface ContributorRecord {
  login: string;
  identityKind: IdentityKind;
  profileUrl: string | null;
  commits: CommitRecord[];
  issues: IssueRecord[];
  pullRequests: PullRequestRecord[];
  languages: Record<string, number>;
}

export interface LeaderboardDocument {
  users: ContributorRecord[];
}

export interface RawAuthor {
  login?: string | null;
  name?: string | null;
}

export interface CommitItem {
  kind: "commit";
  sha: string;
  author: RawAuthor;
  date: string | null;
  message: string;
  fileNames: string[];
}

export interface IssueItem {
  kind: "issue" | "pullRequest";
  number: number;
  title: string;
  state: string;
  author: RawAuthor;
  url: string | null;
  createdAt: string | null;
  closedAt: string | null;
  mergedAt: string | null;
}

export type FeedItem = CommitItem | IssueItem;

export interface TransportResponse {
  status: number;
  data: unknown;
  headers: ResponseHeaders;
}

/**
 * The slice of Octokit the transport relies on. Production code hands in
 * `octokit.request`; tests hand in a `vi.fn()`.
 */
export interface RequestClient {
  request(route: string, params?: RequestParameters): Promise<TransportResponse>;
}

export type Sleep = (ms: number) => Promise<void>;

export interface RunSummary {
  repositories: number;
  contributors: number;
  commits: number;
  issues: number;
  pullRequests: number;
  interruptedFeeds: number;
}
