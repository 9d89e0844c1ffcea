#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Octokit } from "@octokit/rest";

import { mergeRepositoryInputs, readRepositoryConfig, resolveToken } from "./config";
import { runLeaderboard } from "./engine";
import { LeaderboardStore } from "./leaderboard";
import { RateLimiter, defaultSleep } from "./rate-limiter";
import { renderLeaderboardTable } from "./report";
import { ORG_TTL_MS } from "./resolver";
import { StateStore } from "./state-store";
import { RateLimitedTransport } from "./transport";
import type { RequestClient } from "./types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const PROJECT_ROOT = path.resolve(__dirname, "..", "..");
const DEFAULT_CONFIG_PATH = path.join(PROJECT_ROOT, "config", "repos.json");
const DEFAULT_CACHE_PATH = path.join(PROJECT_ROOT, "data", "cache.json");
const DEFAULT_OUTPUT_PATH = path.join(PROJECT_ROOT, "data", "leaderboard.json");

function collect(value: string, previous: string[] = []): string[] {
  previous.push(value);
  return previous;
}

function positiveInteger(flag: string) {
  return (value: string) => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new Error(`${flag} must be a positive integer`);
    }
    return parsed;
  };
}

function resolveFromRoot(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(PROJECT_ROOT, filePath);
}

const program = new Command();

program
  .description("Incrementally collect GitHub commits, issues and pull requests into a contributor leaderboard")
  .option("-c, --config <path>", "JSON file with \"official\" and \"unofficial\" repository lists", DEFAULT_CONFIG_PATH)
  .option("-r, --repo <owner/name|org|url>", "Official repository or organization to include (can be repeated)", collect)
  .option("-u, --unofficial-repo <owner/name|org|url>", "Unofficial repository or organization to include (can be repeated)", collect)
  .option("--cache <path>", "Incremental fetch cache", DEFAULT_CACHE_PATH)
  .option("-o, --output <path>", "Leaderboard document to merge into", DEFAULT_OUTPUT_PATH)
  .option("--per-page <number>", "Items requested per page (max 100)", positiveInteger("--per-page"), 100)
  .option("--org-ttl-days <number>", "Days before an organization's repository list is refreshed", positiveInteger("--org-ttl-days"), ORG_TTL_MS / (24 * 60 * 60 * 1000))
  .option("--page-delay <ms>", "Pause between page requests", (value) => Number.parseInt(value, 10), 100)
  .option("--top <number>", "Contributors to show in the final table", positiveInteger("--top"), 10)
  .option("--allow-anonymous", "Run without GITHUB_TOKEN at the unauthenticated quota", false)
  .option("--debug", "Enable verbose per-item logging")
  .parse(process.argv);

async function run() {
  const options = program.opts<{
    config: string;
    repo?: string[];
    unofficialRepo?: string[];
    cache: string;
    output: string;
    perPage: number;
    orgTtlDays: number;
    pageDelay: number;
    top: number;
    allowAnonymous: boolean;
    debug?: boolean;
  }>();

  if (options.debug) {
    console.log("ℹ️  Debug mode enabled");
  }

  const token = resolveToken(process.env, options.allowAnonymous);

  const configPath = resolveFromRoot(options.config);
  const hasInline = Boolean(options.repo?.length || options.unofficialRepo?.length);
  // the config file is optional only when references were passed on the command line
  const fileInput = hasInline && configPath === DEFAULT_CONFIG_PATH ? null : await readRepositoryConfig(configPath);
  const repositories = mergeRepositoryInputs(fileInput, {
    official: options.repo,
    unofficial: options.unofficialRepo,
  });
  if (repositories.official.length === 0 && repositories.unofficial.length === 0) {
    throw new Error("No repositories specified. Use --config, --repo or --unofficial-repo.");
  }

  const octokit = new Octokit({
    auth: token ?? undefined,
    userAgent: "contributor-leaderboard/0.1",
  });
  const client: RequestClient = {
    request: (route, params) => octokit.request(route, params),
  };
  const rateLimiter = new RateLimiter({ sleep: defaultSleep });
  const transport = new RateLimitedTransport(client, { rateLimiter, sleep: defaultSleep });

  const pageDelayMs = Number.isFinite(options.pageDelay) && options.pageDelay >= 0 ? options.pageDelay : 100;

  const { leaderboard } = await runLeaderboard({
    transport,
    stateStore: new StateStore(resolveFromRoot(options.cache)),
    leaderboardStore: new LeaderboardStore(resolveFromRoot(options.output)),
    repositories,
    perPage: Math.min(options.perPage, 100),
    orgTtlMs: options.orgTtlDays * 24 * 60 * 60 * 1000,
    pageDelayMs,
    sleep: defaultSleep,
    now: Date.now,
    debug: Boolean(options.debug),
  });

  if (leaderboard.size > 0) {
    console.log(`\n🏆 Top ${Math.min(options.top, leaderboard.size)} contributors:`);
    console.log(renderLeaderboardTable(leaderboard.toDocument(), options.top));
  }
}

run().catch((error) => {
  console.error("\n❌ Leaderboard collection failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
