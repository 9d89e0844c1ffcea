import type { RequestParameters } from "@octokit/types";

import type { RequestClient, TransportResponse } from "../types";

export interface FakeCommit {
  sha: string;
  login: string | null;
  name: string;
  date: string;
  files: string[];
}

export interface FakeIssue {
  number: number;
  login: string;
  title: string;
  updatedAt: string;
  pullRequest?: boolean;
}

export interface FakeRepository {
  commits: FakeCommit[];
  issues: FakeIssue[];
}

interface Failure {
  route: string;
  status: number;
  data: unknown;
  page?: number;
  slug?: string;
  remaining: number;
}

function ok(data: unknown): TransportResponse {
  return { status: 200, data, headers: {} };
}

const notFound: TransportResponse = { status: 404, data: { message: "Not Found" }, headers: {} };

function slice<T>(items: T[], page: number, perPage: number): T[] {
  return items.slice((page - 1) * perPage, page * perPage);
}

function sinceFilter(params: RequestParameters): (timestamp: string) => boolean {
  const since = typeof params.since === "string" ? Date.parse(params.since) : null;
  return (timestamp) => since === null || Date.parse(timestamp) >= since;
}

/**
 * In-process stand-in for the handful of REST routes the collector uses.
 * Pages are served from plain arrays; failures can be queued per route.
 */
export class FakeGitHub implements RequestClient {
  readonly calls: Array<{ route: string; params: RequestParameters }> = [];
  private readonly failures: Failure[] = [];

  constructor(
    readonly repositories: Record<string, FakeRepository>,
    readonly organizations: Record<string, string[]> = {}
  ) {}

  failNext(
    route: string,
    status: number,
    options: { page?: number; slug?: string; data?: unknown; times?: number } = {}
  ): void {
    this.failures.push({
      route,
      status,
      data: options.data ?? { message: "Server Error" },
      page: options.page,
      slug: options.slug,
      remaining: options.times ?? 1,
    });
  }

  // GitHub matches owner and name case-insensitively
  private findRepository(slug: string): FakeRepository | undefined {
    const match = Object.keys(this.repositories).find((candidate) => candidate.toLowerCase() === slug.toLowerCase());
    return match === undefined ? undefined : this.repositories[match];
  }

  callsTo(route: string): RequestParameters[] {
    return this.calls.filter((call) => call.route === route).map((call) => call.params);
  }

  async request(route: string, params: RequestParameters = {}): Promise<TransportResponse> {
    this.calls.push({ route, params });
    const page = Number(params.page ?? 1);
    const perPage = Number(params.per_page ?? 30);
    const slug = `${String(params.owner)}/${String(params.repo)}`;

    const failure = this.failures.find(
      (candidate) =>
        candidate.remaining > 0 &&
        candidate.route === route &&
        (candidate.page === undefined || candidate.page === page) &&
        (candidate.slug === undefined || candidate.slug === slug)
    );
    if (failure) {
      failure.remaining -= 1;
      return { status: failure.status, data: failure.data, headers: {} };
    }

    const repository = this.findRepository(slug);

    switch (route) {
      case "GET /orgs/{org}/repos": {
        const repos = this.organizations[String(params.org)];
        if (!repos) {
          return notFound;
        }
        return ok(slice(repos, page, perPage).map((fullName) => ({ name: fullName.split("/")[1], full_name: fullName })));
      }
      case "GET /repos/{owner}/{repo}/commits": {
        if (!repository) {
          return notFound;
        }
        const matches = sinceFilter(params);
        return ok(
          slice(
            repository.commits.filter((commit) => matches(commit.date)),
            page,
            perPage
          ).map((commit) => ({
            sha: commit.sha,
            author: commit.login ? { login: commit.login } : null,
            commit: { message: `commit ${commit.sha}`, author: { name: commit.name, date: commit.date } },
          }))
        );
      }
      case "GET /repos/{owner}/{repo}/commits/{ref}": {
        const commit = repository?.commits.find((candidate) => candidate.sha === params.ref);
        if (!commit) {
          return notFound;
        }
        return ok({ sha: commit.sha, files: commit.files.map((filename) => ({ filename })) });
      }
      case "GET /repos/{owner}/{repo}/issues": {
        if (!repository) {
          return notFound;
        }
        const matches = sinceFilter(params);
        return ok(
          slice(
            repository.issues.filter((issue) => matches(issue.updatedAt)),
            page,
            perPage
          ).map((issue) => ({
            number: issue.number,
            title: issue.title,
            state: "open",
            html_url: `https://github.com/${slug}/${issue.pullRequest ? "pull" : "issues"}/${issue.number}`,
            user: { login: issue.login },
            created_at: issue.updatedAt,
            closed_at: null,
            ...(issue.pullRequest ? { pull_request: { merged_at: null } } : {}),
          }))
        );
      }
      default:
        return notFound;
    }
  }
}
