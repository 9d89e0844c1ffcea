import { describeError } from "./errors";
import type { FeedCursor, FeedKind, Sleep, TransportResponse } from "./types";

export type FeedOutcome =
  | { status: "exhausted"; pages: number }
  | { status: "interrupted"; page: number; reason: string; error?: unknown };

export type ShapeResult<T> =
  | { kind: "item"; value: T }
  | { kind: "skip"; reason?: string }
  | { kind: "interrupt"; reason: string };

export interface FeedSource<T> {
  feed: FeedKind;
  label: string;
  fetchPage(page: number, since: string | null): Promise<TransportResponse>;
  shape(raw: unknown): Promise<ShapeResult<T>>;
}

export interface StreamOptions {
  pageDelayMs: number;
  sleep: Sleep;
  debug?: boolean;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Walks a page-numbered collection from `cursor.page` until a page comes back
 * empty. Items are yielded one at a time; the generator's return value tells
 * the caller whether the feed drained or stopped early, and at which page.
 * The cursor itself is never mutated here, see `advanceCursor`.
 */
export async function* streamFeed<T>(
  source: FeedSource<T>,
  cursor: FeedCursor,
  options: StreamOptions
): AsyncGenerator<T, FeedOutcome, void> {
  let page = cursor.page;
  let pages = 0;
  console.log(`[${source.label}] ${source.feed} since=${cursor.since ?? "none"} page=${page}`);

  while (true) {
    let response: TransportResponse;
    try {
      response = await source.fetchPage(page, cursor.since);
    } catch (error) {
      return { status: "interrupted", page, reason: describeError(error), error };
    }

    if (!isSuccessStatus(response.status)) {
      return { status: "interrupted", page, reason: `HTTP ${response.status}` };
    }
    if (!Array.isArray(response.data)) {
      return { status: "interrupted", page, reason: "unexpected payload (not a list)" };
    }

    const items: unknown[] = response.data;
    console.log(`[${source.label}] page ${page}: got ${items.length} ${source.feed}`);
    if (items.length === 0) {
      return { status: "exhausted", pages };
    }

    for (const raw of items) {
      let shaped: ShapeResult<T>;
      try {
        shaped = await source.shape(raw);
      } catch (error) {
        return { status: "interrupted", page, reason: describeError(error), error };
      }
      if (shaped.kind === "interrupt") {
        return { status: "interrupted", page, reason: shaped.reason };
      }
      if (shaped.kind === "skip") {
        if (options.debug && shaped.reason) {
          console.log(`[${source.label}] ⏭️  ${shaped.reason}`);
        }
        continue;
      }
      yield shaped.value;
    }

    pages += 1;
    page += 1;
    await options.sleep(options.pageDelayMs);
  }
}

/**
 * Consumes a feed, handing every item to `onItem` before the next one is
 * produced, and returns the feed's outcome.
 */
export async function drainFeed<T>(
  feed: AsyncGenerator<T, FeedOutcome, void>,
  onItem: (item: T) => void | Promise<void>
): Promise<FeedOutcome> {
  while (true) {
    const step = await feed.next();
    if (step.done) {
      return step.value;
    }
    await onItem(step.value);
  }
}

export function advanceCursor(cursor: FeedCursor, outcome: FeedOutcome, now: string): FeedCursor {
  switch (outcome.status) {
    case "exhausted":
      return { page: 1, since: now };
    case "interrupted":
      return { page: outcome.page, since: cursor.since };
  }
}
