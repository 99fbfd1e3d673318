import chalk from "chalk";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { renderStatsTable } from "../table";
import type { RepoStats } from "../type";

const stats: RepoStats[] = [
  {
    repoName: "acme/api",
    commits: { totalCommits: 12, additions: 2500, deletions: 300 },
    issues: { newIssues: 4, closedIssues: 1, comments: 9 },
    failures: [],
  },
  {
    repoName: "acme/web",
    commits: { totalCommits: 0, additions: 0, deletions: 0 },
    issues: { newIssues: 0, closedIssues: 0, comments: 0 },
    failures: [{ scope: "commits", reason: "not_found", message: "Not Found" }],
  },
];

function rowCells(table: string, label: string): string[] {
  const row = table.split("\n").find((line) => line.includes(label));
  return (row ?? "")
    .split("│")
    .map((cell) => cell.trim())
    .filter((cell) => cell.length > 0);
}

describe("renderStatsTable", () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it("renders one row per repository and a total row", () => {
    const table = renderStatsTable(stats, true);

    expect(rowCells(table, "Repository")).toEqual(["Repository", "Commits", "Lines +/-", "Net", "New", "Closed", "Comments"]);
    expect(rowCells(table, "acme/api")).toEqual(["acme/api", "12", "+2,500,-300", "+2,200", "4", "1", "9"]);
    expect(rowCells(table, "acme/web")).toEqual(["acme/web (!)", "0", "+0,-0", "0", "0", "0", "0"]);
    expect(rowCells(table, "Total")).toEqual(["Total", "12", "+2,500,-300", "+2,200", "4", "1", "9"]);
  });

  it("leaves out issue columns when issues are excluded", () => {
    const table = renderStatsTable(stats, false);

    expect(rowCells(table, "Repository")).toEqual(["Repository", "Commits", "Lines +/-", "Net"]);
  });
});
