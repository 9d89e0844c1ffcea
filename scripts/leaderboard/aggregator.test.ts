import { describe, expect, it } from "vitest";

import { ANONYMOUS_IDENTITY, Aggregator, issueSeenKey, resolveIdentity } from "./aggregator";
import { Leaderboard } from "./leaderboard";
import { createEmptyState } from "./state-store";
import type { CommitItem, IssueItem, RepositoryEntry } from "./types";

const official: RepositoryEntry = { ref: { owner: "acme", name: "widgets" }, isOfficial: true };
const community: RepositoryEntry = { ref: { owner: "fans", name: "plugins" }, isOfficial: false };

function commitItem(sha: string, login: string | null, name: string | null = null): CommitItem {
  return {
    kind: "commit",
    sha,
    author: { login, name },
    date: "2024-02-01T00:00:00Z",
    message: `change ${sha}`,
    fileNames: ["index.ts"],
  };
}

function issueItem(number: number, kind: IssueItem["kind"], url: string | null = null): IssueItem {
  return {
    kind,
    number,
    title: `item ${number}`,
    state: "open",
    author: { login: "alice" },
    url,
    createdAt: "2024-02-01T00:00:00Z",
    closedAt: null,
    mergedAt: null,
  };
}

describe("resolveIdentity", () => {
  it("prefers the login, then the author name", () => {
    expect(resolveIdentity({ login: "alice", name: "Alice A." })).toEqual({ key: "alice", kind: "login" });
    expect(resolveIdentity({ login: null, name: "  Bob Builder " })).toEqual({ key: "Bob Builder", kind: "name" });
    expect(resolveIdentity({ login: " ", name: "" })).toBe(ANONYMOUS_IDENTITY);
  });
});

describe("Aggregator", () => {
  it("records each commit once per SHA", () => {
    const state = createEmptyState();
    const leaderboard = new Leaderboard();
    const aggregator = new Aggregator(state, leaderboard);

    const first = aggregator.absorb(commitItem("c1", "alice"), official);
    const repeat = aggregator.absorb(commitItem("c1", "alice"), community);

    expect(first.status).toBe("absorbed");
    expect(repeat).toEqual({ status: "duplicate", key: "c1" });
    expect(aggregator.isCommitSeen("c1")).toBe(true);
    expect(aggregator.counters).toEqual({ commits: 1, issues: 0, pullRequests: 0 });
    expect(leaderboard.get({ key: "alice", kind: "login" })?.commits).toEqual([
      {
        sha: "c1",
        author: "alice",
        repository: "https://github.com/acme/widgets",
        url: "https://github.com/acme/widgets/commit/c1",
        date: "2024-02-01T00:00:00Z",
        message: "change c1",
        fileNames: ["index.ts"],
        isOfficial: true,
      },
    ]);
  });

  it("keeps login and name identities apart", () => {
    const leaderboard = new Leaderboard();
    const aggregator = new Aggregator(createEmptyState(), leaderboard);

    aggregator.absorb(commitItem("c1", "alice"), official);
    aggregator.absorb(commitItem("c2", null, "alice"), official);
    aggregator.absorb(commitItem("c3", null, null), official);

    expect(leaderboard.size).toBe(3);
    expect(leaderboard.get({ key: "alice", kind: "name" })?.commits.map((record) => record.sha)).toEqual(["c2"]);
    expect(leaderboard.get(ANONYMOUS_IDENTITY)?.profileUrl).toBeNull();
  });

  it("files pull requests and issues separately and keys them by repository and number", () => {
    const state = createEmptyState();
    const leaderboard = new Leaderboard();
    const aggregator = new Aggregator(state, leaderboard);

    aggregator.absorb(issueItem(4, "issue"), community);
    aggregator.absorb(issueItem(5, "pullRequest", "https://github.com/fans/plugins/pull/5"), community);
    const again = aggregator.absorb(issueItem(4, "issue"), community);
    aggregator.absorb(issueItem(4, "issue"), official);

    expect(again).toEqual({ status: "duplicate", key: "fans/plugins#4" });
    expect([...state.issueKeys]).toEqual(["fans/plugins#4", "fans/plugins#5", "acme/widgets#4"]);
    expect(aggregator.counters).toEqual({ commits: 0, issues: 2, pullRequests: 1 });

    const alice = leaderboard.get({ key: "alice", kind: "login" });
    expect(alice?.issues.map((record) => [record.url, record.isOfficial])).toEqual([
      ["https://github.com/fans/plugins/issues/4", false],
      ["https://github.com/acme/widgets/issues/4", true],
    ]);
    expect(alice?.pullRequests[0]).toEqual({
      number: 5,
      title: "item 5",
      state: "open",
      author: "alice",
      repository: "https://github.com/fans/plugins",
      url: "https://github.com/fans/plugins/pull/5",
      createdAt: "2024-02-01T00:00:00Z",
      closedAt: null,
      isOfficial: false,
      mergedAt: null,
    });
  });

  it("does not count activity the leaderboard already holds", () => {
    const leaderboard = new Leaderboard();
    new Aggregator(createEmptyState(), leaderboard).absorb(commitItem("c1", "alice"), official);

    const fresh = new Aggregator(createEmptyState(), leaderboard);
    const result = fresh.absorb(commitItem("c1", "alice"), official);

    expect(result).toEqual({ status: "duplicate", key: "c1" });
    expect(fresh.counters.commits).toBe(0);
    expect(fresh.isCommitSeen("c1")).toBe(true);
    expect(issueSeenKey(official.ref, 9)).toBe("acme/widgets#9");
    expect(issueSeenKey({ owner: "Acme", name: "Widgets" }, 9)).toBe("acme/widgets#9");
  });
});
