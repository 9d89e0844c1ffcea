import { z } from "zod";

import { readJsonTolerant, writeJsonAtomic } from "./json-file";
import { summarizeLanguages } from "./languages";
import type {
  ActivityRecord,
  ContributorIdentity,
  ContributorRecord,
  IdentityKind,
  LeaderboardDocument,
} from "./types";

const identityKindSchema = z.enum(["login", "name", "anonymous"]);

const commitRecordSchema = z.object({
  sha: z.string(),
  author: z.string(),
  repository: z.string(),
  url: z.string(),
  date: z.string().nullable().default(null),
  message: z.string().default(""),
  fileNames: z.array(z.string()).default([]),
  isOfficial: z.boolean().default(false),
});

const issueRecordSchema = z.object({
  number: z.number().int(),
  title: z.string().default(""),
  state: z.string().default("open"),
  author: z.string(),
  repository: z.string(),
  url: z.string(),
  createdAt: z.string().nullable().default(null),
  closedAt: z.string().nullable().default(null),
  isOfficial: z.boolean().default(false),
});

const pullRequestRecordSchema = issueRecordSchema.extend({
  mergedAt: z.string().nullable().default(null),
});

const userSchema = z.object({
  login: z.string().min(1),
  identityKind: identityKindSchema.default("login"),
  commits: z.array(z.unknown()).default([]),
  issues: z.array(z.unknown()).default([]),
  pullRequests: z.array(z.unknown()).default([]),
});

const documentSchema = z.object({
  users: z.array(z.unknown()),
});

function parseEach<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  values: unknown[],
  label: string,
  login: string
): T[] {
  const parsed: T[] = [];
  values.forEach((value, index) => {
    const result = schema.safeParse(value);
    if (result.success) {
      parsed.push(result.data);
    } else {
      console.warn(`⚠️  Dropping malformed ${label} record #${index + 1} for ${login}`);
    }
  });
  return parsed;
}

export function identityMapKey(identity: ContributorIdentity): string {
  return `${identity.kind}:${identity.key}`;
}

export function profileUrlFor(identity: ContributorIdentity): string | null {
  return identity.kind === "login" ? `https://github.com/${identity.key}` : null;
}

export function activityKey(activity: ActivityRecord): string {
  switch (activity.kind) {
    case "commit":
      return `commit:${activity.record.sha}`;
    case "issue":
      return `issue:${activity.record.repository.toLowerCase()}#${activity.record.number}`;
    case "pullRequest":
      return `pull:${activity.record.repository.toLowerCase()}#${activity.record.number}`;
  }
}

function activityCount(user: ContributorRecord): number {
  return user.commits.length + user.issues.length + user.pullRequests.length;
}

/**
 * Per-contributor accumulator. Records are only ever appended, and an
 * activity already present anywhere on the board is ignored, so merging a run
 * into a prior document is a union.
 */
export class Leaderboard {
  private readonly contributors = new Map<string, ContributorRecord>();
  private readonly knownActivity = new Set<string>();

  static fromDocument(document: LeaderboardDocument): Leaderboard {
    const leaderboard = new Leaderboard();
    leaderboard.merge(document);
    return leaderboard;
  }

  get size(): number {
    return this.contributors.size;
  }

  get(identity: ContributorIdentity): ContributorRecord | undefined {
    return this.contributors.get(identityMapKey(identity));
  }

  add(identity: ContributorIdentity, activity: ActivityRecord): boolean {
    const key = activityKey(activity);
    if (this.knownActivity.has(key)) {
      return false;
    }
    this.knownActivity.add(key);

    const contributor = this.ensureContributor(identity);
    switch (activity.kind) {
      case "commit":
        contributor.commits.push(activity.record);
        break;
      case "issue":
        contributor.issues.push(activity.record);
        break;
      case "pullRequest":
        contributor.pullRequests.push(activity.record);
        break;
    }
    return true;
  }

  merge(document: LeaderboardDocument): void {
    for (const user of document.users) {
      const identity: ContributorIdentity = { key: user.login, kind: user.identityKind };
      this.ensureContributor(identity);
      for (const record of user.commits) {
        this.add(identity, { kind: "commit", record });
      }
      for (const record of user.issues) {
        this.add(identity, { kind: "issue", record });
      }
      for (const record of user.pullRequests) {
        this.add(identity, { kind: "pullRequest", record });
      }
    }
  }

  toDocument(): LeaderboardDocument {
    const users = [...this.contributors.values()]
      .map((user) => ({ ...user, languages: summarizeLanguages(user.commits) }))
      .sort((a, b) => activityCount(b) - activityCount(a) || a.login.localeCompare(b.login));
    return { users };
  }

  private ensureContributor(identity: ContributorIdentity): ContributorRecord {
    const mapKey = identityMapKey(identity);
    const existing = this.contributors.get(mapKey);
    if (existing) {
      return existing;
    }
    const created: ContributorRecord = {
      login: identity.key,
      identityKind: identity.kind,
      profileUrl: profileUrlFor(identity),
      commits: [],
      issues: [],
      pullRequests: [],
      languages: {},
    };
    this.contributors.set(mapKey, created);
    return created;
  }
}

/**
 * Reads a leaderboard written by an earlier run. Unknown or malformed entries
 * are dropped individually; a document without a `users` list is empty.
 */
export function parseLeaderboardDocument(raw: unknown): LeaderboardDocument | null {
  const document = documentSchema.safeParse(raw);
  if (!document.success) {
    return null;
  }
  const users: ContributorRecord[] = [];
  for (const value of document.data.users) {
    const parsed = userSchema.safeParse(value);
    if (!parsed.success) {
      console.warn("⚠️  Dropping malformed leaderboard entry");
      continue;
    }
    const { login, commits, issues, pullRequests } = parsed.data;
    const identityKind: IdentityKind = parsed.data.identityKind;
    users.push({
      login,
      identityKind,
      profileUrl: profileUrlFor({ key: login, kind: identityKind }),
      commits: parseEach(commitRecordSchema, commits, "commit", login),
      issues: parseEach(issueRecordSchema, issues, "issue", login),
      pullRequests: parseEach(pullRequestRecordSchema, pullRequests, "pull request", login),
      languages: {},
    });
  }
  return { users };
}

export class LeaderboardStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<Leaderboard> {
    const raw = await readJsonTolerant(this.filePath, "leaderboard");
    if (raw === null) {
      return new Leaderboard();
    }
    const document = parseLeaderboardDocument(raw);
    if (!document) {
      console.warn(`⚠️  Leaderboard at ${this.filePath} has no users list; starting empty`);
      return new Leaderboard();
    }
    return Leaderboard.fromDocument(document);
  }

  async save(leaderboard: Leaderboard): Promise<void> {
    await writeJsonAtomic(this.filePath, leaderboard.toDocument());
  }
}
