import Table from "cli-table3";

import type { LeaderboardDocument } from "./types";

export function renderLeaderboardTable(document: LeaderboardDocument, limit: number): string {
  const table = new Table({
    head: ["#", "Contributor", "Commits", "Issues", "PRs", "Top language"],
    style: { head: [], border: [] },
  });
  document.users.slice(0, limit).forEach((user, index) => {
    const [topLanguage] = Object.keys(user.languages);
    table.push([
      index + 1,
      user.identityKind === "login" ? user.login : `${user.login} (${user.identityKind})`,
      user.commits.length,
      user.issues.length,
      user.pullRequests.length,
      topLanguage ?? "-",
    ]);
  });
  return table.toString();
}
