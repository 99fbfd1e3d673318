export type ReportKind = "daily" | "weekly";

export const REPORT_KINDS: readonly ReportKind[] = ["daily", "weekly"];

export interface TimeWindow {
  readonly since: Date;
  readonly until: Date;
}

export interface LineStats {
  additions: number;
  deletions: number;
}

export interface CommitStats extends LineStats {
  totalCommits: number;
}

export interface IssueStats {
  newIssues: number;
  closedIssues: number;
  comments: number;
}

export type ActivityErrorKind = "not_found" | "unauthorized" | "rate_limited" | "api_error";

export interface FetchFailure {
  scope: "commits" | "issues" | "repository";
  reason: ActivityErrorKind | "unexpected";
  message: string;
}

export type FetchOutcome<T> = { ok: true; stats: T } | { ok: false; failure: FetchFailure };

export interface RepoStats {
  repoName: string;
  commits: CommitStats;
  // Absent when issues are excluded from the report, never zero-filled for that case.
  issues?: IssueStats;
  failures: FetchFailure[];
}

export interface ReportTotals extends CommitStats {
  net: number;
  issues?: IssueStats;
}

export interface SendResults {
  email: boolean;
  onebot: boolean;
}

export function emptyCommitStats(): CommitStats {
  return { totalCommits: 0, additions: 0, deletions: 0 };
}

export function emptyIssueStats(): IssueStats {
  return { newIssues: 0, closedIssues: 0, comments: 0 };
}
