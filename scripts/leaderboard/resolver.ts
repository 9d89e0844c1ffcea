import type { RequestParameters } from "@octokit/types";
import { z } from "zod";

import { parseReference, repositoryKey } from "./config";
import { describeError } from "./errors";
import { defaultSleep } from "./rate-limiter";
import type { RateLimitedTransport } from "./transport";
import type { CacheState, RepositoryConfigInput, RepositoryEntry, RepositoryRef, Sleep } from "./types";

export const ORG_TTL_MS = 7 * 24 * 60 * 60 * 1000;

const repoListSchema = z.array(
  z.object({
    name: z.string(),
    full_name: z.string().optional(),
  })
);

interface ResolverOptions {
  transport: RateLimitedTransport;
  state: CacheState;
  perPage?: number;
  ttlMs?: number;
  pageDelayMs?: number;
  sleep?: Sleep;
  now?: () => number;
  debug?: boolean;
}

interface RepositoryListing {
  complete: boolean;
  notFound: boolean;
  repos: string[];
}

function toRepositoryRef(slug: string): RepositoryRef | null {
  const parsed = parseReference(slug);
  return parsed.kind === "repository" ? parsed.ref : null;
}

/**
 * Turns the configured official/unofficial reference lists into concrete
 * repositories. Organization listings are cached in the run state and only
 * refreshed once they are older than the TTL.
 */
export class RepositorySetResolver {
  private readonly transport: RateLimitedTransport;
  private readonly state: CacheState;
  private readonly perPage: number;
  private readonly ttlMs: number;
  private readonly pageDelayMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly debug: boolean;

  constructor(options: ResolverOptions) {
    this.transport = options.transport;
    this.state = options.state;
    this.perPage = options.perPage ?? 100;
    this.ttlMs = options.ttlMs ?? ORG_TTL_MS;
    this.pageDelayMs = options.pageDelayMs ?? 100;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;
  }

  async resolve(input: RepositoryConfigInput): Promise<Map<string, RepositoryEntry>> {
    const resolved = new Map<string, RepositoryEntry>();

    for (const ref of await this.expand(input.official)) {
      resolved.set(repositoryKey(ref), { ref, isOfficial: true });
    }
    // official provenance wins when a repository is listed on both sides
    for (const ref of await this.expand(input.unofficial)) {
      const key = repositoryKey(ref);
      if (!resolved.has(key)) {
        resolved.set(key, { ref, isOfficial: false });
      }
    }

    return resolved;
  }

  private async expand(entries: string[]): Promise<RepositoryRef[]> {
    const refs: RepositoryRef[] = [];
    for (const entry of entries) {
      const parsed = parseReference(entry);
      if (parsed.kind === "malformed") {
        console.warn(`⚠️  Bad repository entry '${parsed.input}' (${parsed.reason}); skipping`);
        continue;
      }
      if (parsed.kind === "repository") {
        refs.push(parsed.ref);
        continue;
      }
      for (const slug of await this.expandOrganization(parsed.org)) {
        const ref = toRepositoryRef(slug);
        if (ref) {
          refs.push(ref);
        }
      }
    }
    return refs;
  }

  async expandOrganization(org: string): Promise<string[]> {
    const snapshot = this.state.orgSnapshots[org];
    const now = this.now();
    if (snapshot && snapshot.repos.length > 0 && now - Date.parse(snapshot.fetchedAt) <= this.ttlMs) {
      if (this.debug) {
        console.log(`[ORG] ${org}: reusing ${snapshot.repos.length} cached repos from ${snapshot.fetchedAt}`);
      }
      return snapshot.repos;
    }

    let listing = await this.listRepositories(org, "GET /orgs/{org}/repos", { org });
    if (listing.notFound) {
      console.log(`[ORG] ${org} is not an organization; trying user repositories`);
      listing = await this.listRepositories(org, "GET /users/{username}/repos", { username: org });
    }

    if (listing.complete) {
      this.state.orgSnapshots[org] = {
        org,
        repos: listing.repos,
        fetchedAt: new Date(now).toISOString(),
      };
      console.log(`[ORG] ${org}: ${listing.repos.length} repositories`);
      return listing.repos;
    }

    if (snapshot) {
      console.warn(`⚠️  [ORG] ${org}: listing incomplete, keeping snapshot from ${snapshot.fetchedAt}`);
      return snapshot.repos;
    }
    console.warn(`⚠️  [ORG] ${org}: listing incomplete, using ${listing.repos.length} repositories for this run only`);
    return listing.repos;
  }

  private async listRepositories(
    owner: string,
    route: string,
    params: RequestParameters
  ): Promise<RepositoryListing> {
    const repos: string[] = [];
    for (let page = 1; ; page += 1) {
      console.log(`[ORG] listing ${owner}, page ${page}`);
      const response = await this.transport
        .request(route, { ...params, per_page: this.perPage, page })
        .catch((error: unknown) => {
          console.error(`❌ [ORG] ${owner}: ${describeError(error)}`);
          return null;
        });
      if (!response) {
        return { complete: false, notFound: false, repos };
      }
      const { status, data } = response;

      if (status === 404) {
        console.warn(`⚠️  [ORG] ${owner} not found (404)`);
        return { complete: false, notFound: page === 1, repos };
      }
      if (status < 200 || status >= 300) {
        console.warn(`⚠️  [ORG] ${owner} list error: ${status}`);
        return { complete: false, notFound: false, repos };
      }

      const parsed = repoListSchema.safeParse(data);
      if (!parsed.success) {
        console.warn(`⚠️  [ORG] ${owner}: unexpected payload on page ${page}`);
        return { complete: false, notFound: false, repos };
      }
      if (parsed.data.length === 0) {
        return { complete: true, notFound: false, repos };
      }

      repos.push(...parsed.data.map((repo) => repo.full_name ?? `${owner}/${repo.name}`));
      await this.sleep(this.pageDelayMs);
    }
  }
}
