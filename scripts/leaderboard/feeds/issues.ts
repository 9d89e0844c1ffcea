import { z } from "zod";

import { formatRepositoryRef } from "../config";
import type { FeedSource, ShapeResult } from "../paginator";
import type { RateLimitedTransport } from "../transport";
import type { IssueItem, RepositoryRef } from "../types";

const issueListItemSchema = z.object({
  number: z.number().int(),
  title: z.string().nullable().optional(),
  state: z.string().nullable().optional(),
  html_url: z.string().nullable().optional(),
  user: z.object({ login: z.string().optional() }).nullable().optional(),
  created_at: z.string().nullable().optional(),
  closed_at: z.string().nullable().optional(),
  pull_request: z
    .object({ merged_at: z.string().nullable().optional() })
    .nullable()
    .optional(),
});

interface IssueFeedParams {
  transport: RateLimitedTransport;
  repository: RepositoryRef;
  perPage: number;
}

/**
 * The issues endpoint lists issues and pull requests together; an item is a
 * pull request when it carries a `pull_request` object.
 */
export function createIssueFeed({ transport, repository, perPage }: IssueFeedParams): FeedSource<IssueItem> {
  const { owner, name } = repository;
  const label = formatRepositoryRef(repository);

  return {
    feed: "issues",
    label,
    fetchPage(page, since) {
      return transport.request("GET /repos/{owner}/{repo}/issues", {
        owner,
        repo: name,
        state: "all",
        per_page: perPage,
        page,
        ...(since ? { since } : {}),
      });
    },
    async shape(raw): Promise<ShapeResult<IssueItem>> {
      const parsed = issueListItemSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn(`⚠️  [${label}] skipping malformed issue entry`);
        return { kind: "skip" };
      }
      const issue = parsed.data;
      const pullRequest = issue.pull_request ?? null;

      return {
        kind: "item",
        value: {
          kind: pullRequest ? "pullRequest" : "issue",
          number: issue.number,
          title: issue.title ?? "",
          state: issue.state ?? "open",
          author: { login: issue.user?.login ?? null },
          url: issue.html_url ?? null,
          createdAt: issue.created_at ?? null,
          closedAt: issue.closed_at ?? null,
          mergedAt: pullRequest?.merged_at ?? null,
        },
      };
    },
  };
}
