import { describe, expect, it } from "vitest";

import { renderLeaderboardTable } from "./report";
import type { ContributorRecord } from "./types";

function contributor(login: string, identityKind: ContributorRecord["identityKind"], commits: number): ContributorRecord {
  return {
    login,
    identityKind,
    profileUrl: null,
    commits: Array.from({ length: commits }, (_, index) => ({
      sha: `${login}-${index}`,
      author: login,
      repository: "https://github.com/acme/widgets",
      url: `https://github.com/acme/widgets/commit/${login}-${index}`,
      date: null,
      message: "",
      fileNames: [],
      isOfficial: true,
    })),
    issues: [],
    pullRequests: [],
    languages: commits > 1 ? { TypeScript: 4, Go: 1 } : {},
  };
}

describe("renderLeaderboardTable", () => {
  it("lists the top contributors with their counts and main language", () => {
    const output = renderLeaderboardTable(
      {
        users: [contributor("alice", "login", 3), contributor("Bob Builder", "name", 1), contributor("carol", "login", 1)],
      },
      2
    );
    const lines = output.split("\n");

    expect(lines[1]).toContain("Contributor");
    expect(lines[1]).toContain("Top language");
    expect(output).toContain("│ 1 │ alice ");
    expect(output).toContain("TypeScript");
    expect(output).toContain("Bob Builder (name)");
    expect(output).not.toContain("carol");
    expect(lines).toHaveLength(7);
  });
});
