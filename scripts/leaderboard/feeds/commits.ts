import path from "node:path";
import { z } from "zod";

import { formatRepositoryRef } from "../config";
import { isSuccessStatus } from "../paginator";
import type { FeedSource, ShapeResult } from "../paginator";
import type { RateLimitedTransport } from "../transport";
import type { CommitItem, RepositoryRef } from "../types";

const commitListItemSchema = z.object({
  sha: z.string().min(1),
  author: z.object({ login: z.string().optional() }).nullable().optional(),
  commit: z.object({
    message: z.string().optional(),
    author: z
      .object({
        name: z.string().nullable().optional(),
        date: z.string().nullable().optional(),
      })
      .nullable()
      .optional(),
  }),
});

const commitDetailSchema = z.object({
  files: z.array(z.object({ filename: z.string() })).nullable().optional(),
});

interface CommitFeedParams {
  transport: RateLimitedTransport;
  repository: RepositoryRef;
  perPage: number;
  isSeen: (sha: string) => boolean;
}

function firstLine(message: string | undefined): string {
  return (message ?? "").split("\n")[0].trim();
}

/**
 * Commits need a second call per SHA to learn which files were touched, so
 * SHAs that are already known are skipped before that call is made.
 */
export function createCommitFeed({ transport, repository, perPage, isSeen }: CommitFeedParams): FeedSource<CommitItem> {
  const { owner, name } = repository;
  const label = formatRepositoryRef(repository);

  return {
    feed: "commits",
    label,
    fetchPage(page, since) {
      return transport.request("GET /repos/{owner}/{repo}/commits", {
        owner,
        repo: name,
        per_page: perPage,
        page,
        ...(since ? { since } : {}),
      });
    },
    async shape(raw): Promise<ShapeResult<CommitItem>> {
      const parsed = commitListItemSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn(`⚠️  [${label}] skipping malformed commit entry`);
        return { kind: "skip" };
      }
      const { sha, author, commit } = parsed.data;
      if (isSeen(sha)) {
        return { kind: "skip", reason: `commit ${sha} already seen` };
      }

      const detail = await transport.request("GET /repos/{owner}/{repo}/commits/{ref}", {
        owner,
        repo: name,
        ref: sha,
      });
      if (!isSuccessStatus(detail.status)) {
        return { kind: "interrupt", reason: `commit ${sha} detail HTTP ${detail.status}` };
      }
      const details = commitDetailSchema.safeParse(detail.data);
      if (!details.success) {
        return { kind: "interrupt", reason: `commit ${sha} detail payload unreadable` };
      }

      // merge commits often report no files at all
      const fileNames = (details.data.files ?? []).map((file) => path.posix.basename(file.filename));

      return {
        kind: "item",
        value: {
          kind: "commit",
          sha,
          author: { login: author?.login ?? null, name: commit.author?.name ?? null },
          date: commit.author?.date ?? null,
          message: firstLine(commit.message),
          fileNames,
        },
      };
    },
  };
}
