import { repositoryKey, repositoryUrl } from "./config";
import type { Leaderboard } from "./leaderboard";
import type {
  ActivityRecord,
  CacheState,
  CommitItem,
  ContributorIdentity,
  FeedItem,
  IssueItem,
  RawAuthor,
  RepositoryEntry,
  RepositoryRef,
} from "./types";

export const ANONYMOUS_IDENTITY: ContributorIdentity = { key: "anonymous", kind: "anonymous" };

export type AbsorbResult =
  | { status: "absorbed"; identity: ContributorIdentity; activity: ActivityRecord }
  | { status: "duplicate"; key: string };

export interface RunCounters {
  commits: number;
  issues: number;
  pullRequests: number;
}

/**
 * Login first, then the free-text commit author name. GitHub reports a null
 * author for commits whose email is not linked to an account, so the same
 * person can show up once under a login and once under a name; the two are
 * deliberately not reconciled.
 */
export function resolveIdentity(author: RawAuthor): ContributorIdentity {
  const login = author.login?.trim();
  if (login) {
    return { key: login, kind: "login" };
  }
  const name = author.name?.trim();
  if (name) {
    return { key: name, kind: "name" };
  }
  return ANONYMOUS_IDENTITY;
}

// repository names are case-insensitive on GitHub
export function issueSeenKey(ref: RepositoryRef, number: number): string {
  return `${repositoryKey(ref)}#${number}`;
}

/**
 * Folds feed items into the leaderboard. Keys are recorded in the run's seen
 * sets before the record is handed on, so a repeat later in the same run, or
 * in any later run that loads the same cache, is rejected.
 */
export class Aggregator {
  readonly counters: RunCounters = { commits: 0, issues: 0, pullRequests: 0 };

  constructor(
    private readonly state: CacheState,
    private readonly leaderboard: Leaderboard
  ) {}

  isCommitSeen(sha: string): boolean {
    return this.state.commitKeys.has(sha);
  }

  absorb(item: FeedItem, entry: RepositoryEntry): AbsorbResult {
    return item.kind === "commit" ? this.absorbCommit(item, entry) : this.absorbIssue(item, entry);
  }

  private absorbCommit(item: CommitItem, entry: RepositoryEntry): AbsorbResult {
    if (this.state.commitKeys.has(item.sha)) {
      return { status: "duplicate", key: item.sha };
    }
    this.state.commitKeys.add(item.sha);

    const identity = resolveIdentity(item.author);
    const base = repositoryUrl(entry.ref);
    const activity: ActivityRecord = {
      kind: "commit",
      record: {
        sha: item.sha,
        author: identity.key,
        repository: base,
        url: `${base}/commit/${item.sha}`,
        date: item.date,
        message: item.message,
        fileNames: item.fileNames,
        isOfficial: entry.isOfficial,
      },
    };
    return this.record(identity, activity, item.sha);
  }

  private absorbIssue(item: IssueItem, entry: RepositoryEntry): AbsorbResult {
    const key = issueSeenKey(entry.ref, item.number);
    if (this.state.issueKeys.has(key)) {
      return { status: "duplicate", key };
    }
    this.state.issueKeys.add(key);

    const identity = resolveIdentity(item.author);
    const base = repositoryUrl(entry.ref);
    const fields = {
      number: item.number,
      title: item.title,
      state: item.state,
      author: identity.key,
      repository: base,
      createdAt: item.createdAt,
      closedAt: item.closedAt,
      isOfficial: entry.isOfficial,
    };
    const activity: ActivityRecord =
      item.kind === "pullRequest"
        ? {
            kind: "pullRequest",
            record: { ...fields, url: item.url ?? `${base}/pull/${item.number}`, mergedAt: item.mergedAt },
          }
        : {
            kind: "issue",
            record: { ...fields, url: item.url ?? `${base}/issues/${item.number}` },
          };
    return this.record(identity, activity, key);
  }

  private record(identity: ContributorIdentity, activity: ActivityRecord, key: string): AbsorbResult {
    // a reset cache can replay activity the leaderboard already holds
    if (!this.leaderboard.add(identity, activity)) {
      return { status: "duplicate", key };
    }
    switch (activity.kind) {
      case "commit":
        this.counters.commits += 1;
        break;
      case "issue":
        this.counters.issues += 1;
        break;
      case "pullRequest":
        this.counters.pullRequests += 1;
        break;
    }
    return { status: "absorbed", identity, activity };
  }
}
