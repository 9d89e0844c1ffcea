import { Aggregator } from "./aggregator";
import { formatRepositoryRef, repositoryKey } from "./config";
import { describeError } from "./errors";
import { createCommitFeed } from "./feeds/commits";
import { createIssueFeed } from "./feeds/issues";
import type { Leaderboard, LeaderboardStore } from "./leaderboard";
import { advanceCursor, drainFeed, streamFeed } from "./paginator";
import type { FeedOutcome, FeedSource } from "./paginator";
import { RepositorySetResolver } from "./resolver";
import { initialRepoCursors } from "./state-store";
import type { StateStore } from "./state-store";
import type { RateLimitedTransport } from "./transport";
import type {
  FeedCursor,
  FeedItem,
  RepositoryConfigInput,
  RepositoryEntry,
  RunSummary,
  Sleep,
} from "./types";

export interface LeaderboardRuntime {
  transport: RateLimitedTransport;
  stateStore: StateStore;
  leaderboardStore: LeaderboardStore;
  repositories: RepositoryConfigInput;
  perPage: number;
  orgTtlMs: number;
  pageDelayMs: number;
  sleep: Sleep;
  now: () => number;
  debug: boolean;
}

export interface RunResult {
  summary: RunSummary;
  leaderboard: Leaderboard;
}

function toIsoSeconds(epochMs: number): string {
  return new Date(epochMs).toISOString().split(".")[0] + "Z";
}

function describeOutcome(outcome: FeedOutcome): string {
  return outcome.status === "exhausted"
    ? `drained after ${outcome.pages} page(s)`
    : `stopped at page ${outcome.page}: ${outcome.reason}`;
}

/**
 * One collection run. Repositories and their two feeds are processed strictly
 * in sequence against a single run state; after every repository the
 * leaderboard and then the cache are written, so completed work survives a
 * crash and a crash between the two writes only causes a replay that the
 * leaderboard merge absorbs.
 */
export async function runLeaderboard(runtime: LeaderboardRuntime): Promise<RunResult> {
  const { transport, stateStore, leaderboardStore, debug } = runtime;
  const runStartedAt = toIsoSeconds(runtime.now());

  const state = await stateStore.load();
  const leaderboard = await leaderboardStore.load();
  const aggregator = new Aggregator(state, leaderboard);

  const resolver = new RepositorySetResolver({
    transport,
    state,
    perPage: runtime.perPage,
    ttlMs: runtime.orgTtlMs,
    pageDelayMs: runtime.pageDelayMs,
    sleep: runtime.sleep,
    now: runtime.now,
    debug,
  });
  const repositories = [...(await resolver.resolve(runtime.repositories)).values()];
  console.log(`ℹ️  Resolved ${repositories.length} repositories`);

  const checkpoint = async () => {
    await leaderboardStore.save(leaderboard);
    await stateStore.save(state);
  };

  const processFeed = async <T extends FeedItem>(
    source: FeedSource<T>,
    cursor: FeedCursor,
    entry: RepositoryEntry
  ): Promise<FeedOutcome> => {
    const feed = streamFeed(source, cursor, { pageDelayMs: runtime.pageDelayMs, sleep: runtime.sleep, debug });
    return drainFeed(feed, (item) => {
      const result = aggregator.absorb(item, entry);
      if (debug) {
        console.log(
          result.status === "absorbed"
            ? `[${source.label}] ✅ ${result.activity.kind} → ${result.identity.key}`
            : `[${source.label}] ⏭️  ${result.key} already recorded`
        );
      }
    });
  };

  let interruptedFeeds = 0;

  for (const [index, entry] of repositories.entries()) {
    const slug = formatRepositoryRef(entry.ref);
    const cursorKey = repositoryKey(entry.ref);
    console.log(`\n⏳ [${index + 1}/${repositories.length}] ${slug}${entry.isOfficial ? "" : " (unofficial)"}`);

    const cursors = state.repoCursors[cursorKey] ?? initialRepoCursors();

    const commitOutcome = await processFeed(
      createCommitFeed({
        transport,
        repository: entry.ref,
        perPage: runtime.perPage,
        isSeen: (sha) => aggregator.isCommitSeen(sha),
      }),
      cursors.commits,
      entry
    );
    cursors.commits = advanceCursor(cursors.commits, commitOutcome, runStartedAt);

    const issueOutcome = await processFeed(
      createIssueFeed({ transport, repository: entry.ref, perPage: runtime.perPage }),
      cursors.issues,
      entry
    );
    cursors.issues = advanceCursor(cursors.issues, issueOutcome, runStartedAt);

    for (const [feed, outcome] of [
      ["commits", commitOutcome],
      ["issues", issueOutcome],
    ] as const) {
      if (outcome.status === "interrupted") {
        interruptedFeeds += 1;
        const log = outcome.error ? console.error : console.warn;
        log(`⚠️  [${slug}] ${feed} ${describeOutcome(outcome)}; will resume from this page next run`);
        if (debug && outcome.error instanceof Error && outcome.error.stack) {
          console.error(outcome.error.stack);
        }
      } else if (debug) {
        console.log(`[${slug}] ${feed} ${describeOutcome(outcome)}`);
      }
    }

    state.repoCursors[cursorKey] = cursors;
    try {
      await checkpoint();
    } catch (error) {
      console.error(`❌ Checkpoint after ${slug} failed: ${describeError(error)}`);
    }
  }

  await checkpoint();

  const summary: RunSummary = {
    repositories: repositories.length,
    contributors: leaderboard.size,
    commits: aggregator.counters.commits,
    issues: aggregator.counters.issues,
    pullRequests: aggregator.counters.pullRequests,
    interruptedFeeds,
  };

  console.log(
    `\n✅ Leaderboard updated: ${summary.contributors} contributors, ${summary.commits} commits, ${summary.issues} issues, ${summary.pullRequests} pull requests processed` +
      (interruptedFeeds > 0 ? ` (${interruptedFeeds} feed(s) will resume next run)` : "")
  );

  return { summary, leaderboard };
}
