import { z } from "zod";

import { readJsonTolerant, writeJsonAtomic } from "./json-file";
import type { CacheState, FeedCursor, OrgSnapshot, RepoCursors } from "./types";

const looseObjectSchema = z.record(z.string(), z.unknown());

const cursorSchema = z.object({
  page: z.number().int().positive(),
  since: z.string().nullable().default(null),
});

const orgSnapshotSchema = z.object({
  org: z.string(),
  repos: z.array(z.string()),
  fetchedAt: z.string(),
});

export interface PersistedCache {
  commitKeys: string[];
  issueKeys: string[];
  orgSnapshots: Record<string, OrgSnapshot>;
  repoCursors: Record<string, RepoCursors>;
}

export function initialCursor(): FeedCursor {
  return { page: 1, since: null };
}

export function initialRepoCursors(): RepoCursors {
  return { commits: initialCursor(), issues: initialCursor() };
}

export function createEmptyState(): CacheState {
  return {
    commitKeys: new Set(),
    issueKeys: new Set(),
    orgSnapshots: {},
    repoCursors: {},
  };
}

function readKeyList(value: unknown): string[] {
  const parsed = z.array(z.unknown()).safeParse(value);
  if (!parsed.success) {
    return [];
  }
  return parsed.data.filter((key): key is string => typeof key === "string" && key.length > 0);
}

function readCursor(value: unknown): FeedCursor {
  const parsed = cursorSchema.safeParse(value);
  return parsed.success ? parsed.data : initialCursor();
}

/**
 * Builds a `CacheState` from whatever was on disk. Anything that is not an
 * object yields `null`; malformed members are replaced or dropped one by one.
 */
export function parseCacheDocument(raw: unknown): CacheState | null {
  const document = looseObjectSchema.safeParse(raw);
  if (!document.success) {
    return null;
  }
  const { commitKeys, issueKeys, orgSnapshots, repoCursors } = document.data;
  const state = createEmptyState();

  for (const key of readKeyList(commitKeys)) {
    state.commitKeys.add(key);
  }
  for (const key of readKeyList(issueKeys)) {
    state.issueKeys.add(key);
  }

  const snapshots = looseObjectSchema.safeParse(orgSnapshots);
  if (snapshots.success) {
    for (const [org, value] of Object.entries(snapshots.data)) {
      const snapshot = orgSnapshotSchema.safeParse(value);
      if (snapshot.success) {
        state.orgSnapshots[org] = snapshot.data;
      } else {
        console.warn(`⚠️  Dropping malformed organization snapshot for ${org}`);
      }
    }
  }

  const cursors = looseObjectSchema.safeParse(repoCursors);
  if (cursors.success) {
    for (const [slug, value] of Object.entries(cursors.data)) {
      const entry = looseObjectSchema.safeParse(value);
      if (!entry.success) {
        console.warn(`⚠️  Dropping malformed cursor for ${slug}`);
        continue;
      }
      state.repoCursors[slug] = {
        commits: readCursor(entry.data.commits),
        issues: readCursor(entry.data.issues),
      };
    }
  }

  return state;
}

export function serializeCacheState(state: CacheState): PersistedCache {
  return {
    commitKeys: Array.from(state.commitKeys),
    issueKeys: Array.from(state.issueKeys),
    orgSnapshots: state.orgSnapshots,
    repoCursors: state.repoCursors,
  };
}

export class StateStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<CacheState> {
    const raw = await readJsonTolerant(this.filePath, "cache");
    if (raw === null) {
      return createEmptyState();
    }
    const state = parseCacheDocument(raw);
    if (!state) {
      console.warn(`⚠️  Cache at ${this.filePath} is not an object; resetting`);
      return createEmptyState();
    }
    return state;
  }

  async save(state: CacheState): Promise<void> {
    await writeJsonAtomic(this.filePath, serializeCacheState(state));
  }
}
