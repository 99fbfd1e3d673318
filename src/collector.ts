import chalk from "chalk";

import { ActivitySourceError, type ActivitySource } from "./github";
import {
  emptyCommitStats,
  emptyIssueStats,
  type CommitStats,
  type FetchFailure,
  type FetchOutcome,
  type IssueStats,
  type RepoStats,
} from "./type";

function isWithin(date: Date, since: Date, until: Date): boolean {
  const time = date.getTime();
  return time >= since.getTime() && time <= until.getTime();
}

export class StatsCollector {
  constructor(private readonly source: ActivitySource) {}

  async fetchCommits(repoName: string, since: Date, until: Date): Promise<FetchOutcome<CommitStats>> {
    const stats = emptyCommitStats();

    try {
      for await (const commit of this.source.listCommits(repoName, { since, until })) {
        // Merge commits carry the lines of the branch they merge.
        if (commit.parentCount > 1) {
          continue;
        }

        stats.totalCommits += 1;

        try {
          const lines = await this.source.getCommitStats(repoName, commit.sha);
          if (lines) {
            stats.additions += lines.additions;
            stats.deletions += lines.deletions;
          }
        } catch (error) {
          if (!(error instanceof ActivitySourceError)) {
            throw error;
          }
          // the commit still counts, only its line totals are unknown
        }
      }
    } catch (error) {
      if (error instanceof ActivitySourceError) {
        console.error(chalk.red(`Failed to fetch commits of ${repoName}: ${error.message}`));
        return { ok: false, failure: { scope: "commits", reason: error.kind, message: error.message } };
      }
      throw error;
    }

    return { ok: true, stats };
  }

  /**
   * Comments are accrued only for issues created inside the window, so
   * discussion on older issues is not counted.
   */
  async fetchIssues(repoName: string, since: Date, until: Date): Promise<FetchOutcome<IssueStats>> {
    const stats = emptyIssueStats();

    try {
      for await (const issue of this.source.listIssues(repoName, since)) {
        if (isWithin(issue.createdAt, since, until)) {
          stats.newIssues += 1;
          stats.comments += issue.comments;
        }

        if (issue.closedAt && isWithin(issue.closedAt, since, until)) {
          stats.closedIssues += 1;
        }
      }
    } catch (error) {
      if (error instanceof ActivitySourceError) {
        console.error(chalk.red(`Failed to fetch issues of ${repoName}: ${error.message}`));
        return { ok: false, failure: { scope: "issues", reason: error.kind, message: error.message } };
      }
      throw error;
    }

    return { ok: true, stats };
  }

  async collectRepoStats(repoName: string, since: Date, until: Date, includeIssues: boolean): Promise<RepoStats> {
    console.log(chalk.cyan(`Collecting stats for ${repoName}...`));

    const failures: FetchFailure[] = [];

    const commitOutcome = await this.fetchCommits(repoName, since, until);
    let commits: CommitStats;
    if (commitOutcome.ok) {
      commits = commitOutcome.stats;
    } else {
      commits = emptyCommitStats();
      failures.push(commitOutcome.failure);
    }

    if (!includeIssues) {
      return { repoName, commits, failures };
    }

    const issueOutcome = await this.fetchIssues(repoName, since, until);
    let issues: IssueStats;
    if (issueOutcome.ok) {
      issues = issueOutcome.stats;
    } else {
      issues = emptyIssueStats();
      failures.push(issueOutcome.failure);
    }

    return { repoName, commits, issues, failures };
  }

  async collectAllStats(repoNames: string[], since: Date, until: Date, includeIssues: boolean): Promise<RepoStats[]> {
    const allStats: RepoStats[] = [];

    for (const repoName of repoNames) {
      try {
        allStats.push(await this.collectRepoStats(repoName, since, until, includeIssues));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(`Unexpected error while processing ${repoName}: ${message}`));
        const zeroed: RepoStats = {
          repoName,
          commits: emptyCommitStats(),
          failures: [{ scope: "repository", reason: "unexpected", message }],
        };
        if (includeIssues) {
          zeroed.issues = emptyIssueStats();
        }
        allStats.push(zeroed);
      }
    }

    return allStats;
  }
}
