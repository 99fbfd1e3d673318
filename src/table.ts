import Table from "cli-table3";
import chalk from "chalk";

import { computeTotals, formatInteger, formatSigned } from "./report";
import type { RepoStats } from "./type";

export function renderStatsTable(stats: RepoStats[], includeIssues: boolean): string {
  const head = [
    chalk.cyan("Repository"),
    chalk.cyan("Commits"),
    chalk.cyan("Lines +/-"),
    chalk.cyan("Net"),
    ...(includeIssues ? [chalk.cyan("New"), chalk.cyan("Closed"), chalk.cyan("Comments")] : []),
  ];
  const table = new Table({
    head,
    colAligns: ["left", ...Array<"right">(head.length - 1).fill("right")],
    style: { head: [], border: [] },
    wordWrap: true,
  });

  for (const repo of stats) {
    const name = repo.failures.length > 0 ? chalk.yellow(`${repo.repoName} (!)`) : chalk.green(repo.repoName);
    table.push([
      name,
      formatInteger(repo.commits.totalCommits),
      formatPM(repo.commits.additions, repo.commits.deletions),
      formatSigned(repo.commits.additions - repo.commits.deletions),
      ...(includeIssues ? issueCells(repo) : []),
    ]);
  }

  const totals = computeTotals(stats, includeIssues);
  table.push([
    chalk.bold("Total"),
    chalk.bold(formatInteger(totals.totalCommits)),
    formatPM(totals.additions, totals.deletions),
    chalk.bold(formatSigned(totals.net)),
    ...(totals.issues
      ? [
          chalk.bold(formatInteger(totals.issues.newIssues)),
          chalk.bold(formatInteger(totals.issues.closedIssues)),
          chalk.bold(formatInteger(totals.issues.comments)),
        ]
      : []),
  ]);

  return table.toString();
}

function issueCells(repo: RepoStats): string[] {
  if (!repo.issues) {
    return ["-", "-", "-"];
  }
  return [
    formatInteger(repo.issues.newIssues),
    formatInteger(repo.issues.closedIssues),
    formatInteger(repo.issues.comments),
  ];
}

function formatPM(plus: number, minus: number): string {
  return `${chalk.blue("+" + formatInteger(plus))}${chalk.gray(",")}${chalk.red("-" + formatInteger(minus))}`;
}
