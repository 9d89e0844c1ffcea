import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";

import type { RepositoryConfigInput, RepositoryRef } from "./types";

export type ParsedReference =
  | { kind: "organization"; org: string }
  | { kind: "repository"; ref: RepositoryRef }
  | { kind: "malformed"; input: string; reason: string };

const referenceListSchema = z.array(z.string());

const repositoryConfigSchema = z.union([
  z.object({
    official: referenceListSchema.default([]),
    unofficial: referenceListSchema.default([]),
  }),
  referenceListSchema.transform((official) => ({ official, unofficial: [] })),
]);

export function formatRepositoryRef(ref: RepositoryRef): string {
  return `${ref.owner}/${ref.name}`;
}

export function repositoryKey(ref: RepositoryRef): string {
  return formatRepositoryRef(ref).toLowerCase();
}

export function repositoryUrl(ref: RepositoryRef): string {
  return `https://github.com/${ref.owner}/${ref.name}`;
}

/**
 * Reduces a configured reference to an `owner` or `owner/name` path.
 * URLs lose their scheme, host, surrounding slashes and a trailing `.git`.
 */
export function normalizeReference(raw: string): string | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }
  if (!/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  let pathname: string;
  try {
    pathname = new URL(trimmed).pathname;
  } catch {
    return null;
  }
  const stripped = pathname.replace(/^\/+/, "").replace(/\/+$/, "");
  const withoutSuffix = stripped.endsWith(".git") ? stripped.slice(0, -4) : stripped;
  return withoutSuffix.length > 0 ? withoutSuffix : null;
}

export function parseReference(raw: string): ParsedReference {
  const normalized = normalizeReference(raw);
  if (normalized === null) {
    return { kind: "malformed", input: raw, reason: "empty reference" };
  }
  const segments = normalized.split("/");
  if (segments.some((segment) => segment.length === 0)) {
    return { kind: "malformed", input: raw, reason: "empty path segment" };
  }
  if (segments.length === 1) {
    return { kind: "organization", org: segments[0] };
  }
  if (segments.length === 2) {
    return { kind: "repository", ref: { owner: segments[0], name: segments[1] } };
  }
  return { kind: "malformed", input: raw, reason: `expected owner/name, got ${segments.length} segments` };
}

export async function readRepositoryConfig(filePath: string): Promise<RepositoryConfigInput> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`Repository config file not found: ${resolved}`);
  }
  const raw: unknown = await fs.readJson(resolved);
  const parsed = repositoryConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Repository config ${resolved} must hold "official"/"unofficial" arrays of strings: ${parsed.error.issues
        .map((issue) => issue.message)
        .join("; ")}`
    );
  }
  return parsed.data;
}

export function mergeRepositoryInputs(
  fromFile: RepositoryConfigInput | null,
  inline: { official?: string[]; unofficial?: string[] }
): RepositoryConfigInput {
  return {
    official: [...(fromFile?.official ?? []), ...(inline.official ?? [])],
    unofficial: [...(fromFile?.unofficial ?? []), ...(inline.unofficial ?? [])],
  };
}

export function resolveToken(
  env: Record<string, string | undefined>,
  allowAnonymous: boolean
): string | null {
  const token = env.GITHUB_TOKEN || env.PAT_TOKEN;
  if (token) {
    return token;
  }
  if (!allowAnonymous) {
    throw new Error("GITHUB_TOKEN (or PAT_TOKEN) is required. Set it via environment variable or .env file, or pass --allow-anonymous.");
  }
  console.warn("⚠️  No GITHUB_TOKEN found; continuing unauthenticated (60 requests/hour).");
  return null;
}
