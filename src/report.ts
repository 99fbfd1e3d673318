import type { FetchFailure, IssueStats, RepoStats, ReportKind, ReportTotals } from "./type";

const integerFormatter = new Intl.NumberFormat("en-US");
const signedFormatter = new Intl.NumberFormat("en-US", { signDisplay: "exceptZero" });

export function formatInteger(value: number): string {
  return integerFormatter.format(Math.trunc(value));
}

export function formatSigned(value: number): string {
  return signedFormatter.format(Math.trunc(value));
}

/** `YYYY-MM-DD HH:MM` in UTC. */
export function formatUtcMinute(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

function formatUtcSecond(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

export function reportTitle(kind: ReportKind): string {
  return `GitHub ${kind.charAt(0).toUpperCase()}${kind.slice(1)} Report`;
}

export function computeTotals(stats: RepoStats[], includeIssues: boolean): ReportTotals {
  const totals = stats.reduce(
    (accumulator, repo) => {
      accumulator.totalCommits += repo.commits.totalCommits;
      accumulator.additions += repo.commits.additions;
      accumulator.deletions += repo.commits.deletions;
      return accumulator;
    },
    { totalCommits: 0, additions: 0, deletions: 0 },
  );

  const result: ReportTotals = { ...totals, net: totals.additions - totals.deletions };

  if (includeIssues) {
    result.issues = stats.reduce<IssueStats>(
      (accumulator, repo) => {
        if (!repo.issues) {
          return accumulator;
        }
        accumulator.newIssues += repo.issues.newIssues;
        accumulator.closedIssues += repo.issues.closedIssues;
        accumulator.comments += repo.issues.comments;
        return accumulator;
      },
      { newIssues: 0, closedIssues: 0, comments: 0 },
    );
  }

  return result;
}

function issueLines(issues: IssueStats): string[] {
  return [
    `  - New issues: ${formatInteger(issues.newIssues)}`,
    `  - Closed issues: ${formatInteger(issues.closedIssues)}`,
    `  - Comments: ${formatInteger(issues.comments)}`,
  ];
}

function failureLine(failure: FetchFailure): string {
  return `  ! Incomplete data: ${failure.scope} fetch failed (${failure.reason})`;
}

/**
 * Renders the plain-text report sent to every channel. The output depends
 * only on its arguments; `generatedAt` defaults to the current time.
 */
export function generateReport(
  stats: RepoStats[],
  kind: ReportKind,
  since: Date,
  until: Date,
  includeIssues: boolean,
  generatedAt: Date = new Date(),
): string {
  const totals = computeTotals(stats, includeIssues);

  const lines = [
    reportTitle(kind),
    `Window: ${formatUtcMinute(since)} UTC to ${formatUtcMinute(until)} UTC`,
    `Repositories: ${formatInteger(stats.length)}`,
    "",
    "Totals:",
    `  - Commits: ${formatInteger(totals.totalCommits)}`,
    `  - Additions: ${formatInteger(totals.additions)}`,
    `  - Deletions: ${formatInteger(totals.deletions)}`,
    `  - Net change: ${formatSigned(totals.net)}`,
  ];

  if (totals.issues) {
    lines.push(...issueLines(totals.issues));
  }

  lines.push("", "Details:", "");

  for (const repo of stats) {
    const { commits } = repo;
    lines.push(
      `[${repo.repoName}]`,
      `  - Commits: ${formatInteger(commits.totalCommits)}`,
      `  - Additions: ${formatInteger(commits.additions)}`,
      `  - Deletions: ${formatInteger(commits.deletions)}`,
      `  - Net change: ${formatSigned(commits.additions - commits.deletions)}`,
    );

    if (includeIssues && repo.issues) {
      lines.push(...issueLines(repo.issues));
    }

    lines.push(...repo.failures.map(failureLine), "");
  }

  lines.push("---", `Generated at: ${formatUtcSecond(generatedAt)} UTC`);

  return lines.join("\n");
}
