import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ORG_TTL_MS, RepositorySetResolver } from "./resolver";
import { createEmptyState } from "./state-store";
import { RateLimitedTransport } from "./transport";
import type { CacheState, TransportResponse } from "./types";

const NOW = Date.parse("2024-06-01T12:00:00.000Z");
const HOUR_MS = 60 * 60 * 1000;

function ok(data: unknown): TransportResponse {
  return { status: 200, data, headers: {} };
}

function buildResolver(request: ReturnType<typeof vi.fn>, state: CacheState) {
  const sleep = vi.fn().mockResolvedValue(undefined);
  const transport = new RateLimitedTransport({ request }, { sleep });
  return new RepositorySetResolver({ transport, state, sleep, now: () => NOW, pageDelayMs: 0 });
}

describe("RepositorySetResolver", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("re-lists an organization whose snapshot is older than the TTL", async () => {
    const state = createEmptyState();
    state.orgSnapshots.acme = {
      org: "acme",
      repos: ["acme/retired"],
      fetchedAt: new Date(NOW - 8 * 24 * HOUR_MS).toISOString(),
    };
    const request = vi
      .fn()
      .mockResolvedValueOnce(ok([{ name: "widgets", full_name: "acme/widgets" }, { name: "gadgets", full_name: "acme/gadgets" }]))
      .mockResolvedValueOnce(ok([]));

    const resolved = await buildResolver(request, state).resolve({ official: ["acme"], unofficial: [] });

    expect([...resolved.keys()]).toEqual(["acme/widgets", "acme/gadgets"]);
    expect(request).toHaveBeenCalledTimes(2);
    expect(request).toHaveBeenNthCalledWith(1, "GET /orgs/{org}/repos", { org: "acme", per_page: 100, page: 1 });
    expect(request).toHaveBeenNthCalledWith(2, "GET /orgs/{org}/repos", { org: "acme", per_page: 100, page: 2 });
    expect(state.orgSnapshots.acme).toEqual({
      org: "acme",
      repos: ["acme/widgets", "acme/gadgets"],
      fetchedAt: "2024-06-01T12:00:00.000Z",
    });
  });

  it("reuses a fresh snapshot without calling the API", async () => {
    const state = createEmptyState();
    state.orgSnapshots.acme = {
      org: "acme",
      repos: ["acme/widgets"],
      fetchedAt: new Date(NOW - HOUR_MS).toISOString(),
    };
    const request = vi.fn();

    const resolved = await buildResolver(request, state).resolve({ official: ["acme"], unofficial: [] });

    expect(request).not.toHaveBeenCalled();
    expect(resolved.get("acme/widgets")).toEqual({ ref: { owner: "acme", name: "widgets" }, isOfficial: true });
  });

  it("drops malformed entries and keeps resolving the rest", async () => {
    const request = vi.fn();

    const resolved = await buildResolver(request, createEmptyState()).resolve({
      official: ["acme/widgets/extra", "acme/widgets", ""],
      unofficial: ["https://github.com/other/tool.git"],
    });

    expect([...resolved.values()]).toEqual([
      { ref: { owner: "acme", name: "widgets" }, isOfficial: true },
      { ref: { owner: "other", name: "tool" }, isOfficial: false },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      "⚠️  Bad repository entry 'acme/widgets/extra' (expected owner/name, got 3 segments); skipping"
    );
    expect(request).not.toHaveBeenCalled();
  });

  it("keeps official provenance when a repository is listed on both sides", async () => {
    const resolved = await buildResolver(vi.fn(), createEmptyState()).resolve({
      official: ["Acme/Widgets"],
      unofficial: ["acme/widgets", "acme/gadgets"],
    });

    expect(resolved.get("acme/widgets")).toEqual({ ref: { owner: "Acme", name: "Widgets" }, isOfficial: true });
    expect(resolved.get("acme/gadgets")?.isOfficial).toBe(false);
    expect(resolved.size).toBe(2);
  });

  it("falls back to a user's repositories when the organization does not exist", async () => {
    const state = createEmptyState();
    const request = vi
      .fn()
      .mockResolvedValueOnce({ status: 404, data: { message: "Not Found" }, headers: {} })
      .mockResolvedValueOnce(ok([{ name: "dotfiles" }]))
      .mockResolvedValueOnce(ok([]));

    const resolved = await buildResolver(request, state).resolve({ official: [], unofficial: ["octocat"] });

    expect(request).toHaveBeenNthCalledWith(2, "GET /users/{username}/repos", { username: "octocat", per_page: 100, page: 1 });
    expect(resolved.get("octocat/dotfiles")).toEqual({ ref: { owner: "octocat", name: "dotfiles" }, isOfficial: false });
    expect(state.orgSnapshots.octocat?.repos).toEqual(["octocat/dotfiles"]);
  });

  it("keeps a stale snapshot when the refresh stops early", async () => {
    const state = createEmptyState();
    const fetchedAt = new Date(NOW - ORG_TTL_MS - HOUR_MS).toISOString();
    state.orgSnapshots.acme = { org: "acme", repos: ["acme/widgets"], fetchedAt };
    const request = vi.fn().mockResolvedValueOnce({ status: 502, data: "Bad Gateway", headers: {} });

    const repos = await buildResolver(request, state).expandOrganization("acme");

    expect(repos).toEqual(["acme/widgets"]);
    expect(state.orgSnapshots.acme.fetchedAt).toBe(fetchedAt);
  });

  it("uses a partial listing for this run only when no snapshot exists", async () => {
    const state = createEmptyState();
    const request = vi
      .fn()
      .mockResolvedValueOnce(ok([{ name: "widgets", full_name: "acme/widgets" }]))
      .mockResolvedValueOnce({ status: 500, data: {}, headers: {} });

    const repos = await buildResolver(request, state).expandOrganization("acme");

    expect(repos).toEqual(["acme/widgets"]);
    expect(state.orgSnapshots.acme).toBeUndefined();
  });
});
