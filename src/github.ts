import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";

import type { ActivityErrorKind, LineStats, TimeWindow } from "./type";

export interface CommitSummary {
  sha: string;
  parentCount: number;
}

export interface IssueSummary {
  createdAt: Date;
  closedAt?: Date;
  comments: number;
}

/**
 * Read access to the commit and issue history of a hosted repository.
 * `repo` is always an `owner/name` string.
 */
export interface ActivitySource {
  listCommits(repo: string, window: TimeWindow): AsyncIterable<CommitSummary>;
  getCommitStats(repo: string, sha: string): Promise<LineStats | undefined>;
  /** Issues (open and closed) updated at or after `since`. */
  listIssues(repo: string, since: Date): AsyncIterable<IssueSummary>;
}

export class ActivitySourceError extends Error {
  readonly kind: ActivityErrorKind;
  readonly status?: number;

  constructor(kind: ActivityErrorKind, message: string, status?: number) {
    super(message);
    this.name = "ActivitySourceError";
    this.kind = kind;
    this.status = status;
  }
}

interface RepoRef {
  owner: string;
  repo: string;
}

export function parseRepoName(repoName: string): RepoRef {
  const [owner, repo, ...rest] = repoName.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new ActivitySourceError("not_found", `Invalid repository name: ${repoName} (expected owner/name)`);
  }
  return { owner, repo };
}

export function classifyStatus(status: number): ActivityErrorKind {
  switch (status) {
    case 404:
      return "not_found";
    case 401:
      return "unauthorized";
    case 403:
    case 429:
      return "rate_limited";
    default:
      return "api_error";
  }
}

function translateError(error: unknown, context: string): unknown {
  if (error instanceof RequestError) {
    return new ActivitySourceError(classifyStatus(error.status), `${context}: ${error.message}`, error.status);
  }
  return error;
}

export class OctokitActivitySource implements ActivitySource {
  private readonly octokit: Octokit;

  constructor(token: string) {
    this.octokit = new Octokit({ auth: token });
  }

  async *listCommits(repoName: string, window: TimeWindow): AsyncIterable<CommitSummary> {
    const { owner, repo } = parseRepoName(repoName);

    const iterator = this.octokit.paginate.iterator(this.octokit.repos.listCommits, {
      owner,
      repo,
      since: window.since.toISOString(),
      until: window.until.toISOString(),
      per_page: 100,
    });

    try {
      for await (const { data } of iterator) {
        for (const commit of data) {
          yield { sha: commit.sha, parentCount: commit.parents.length };
        }
      }
    } catch (error) {
      throw translateError(error, `Listing commits of ${repoName}`);
    }
  }

  async getCommitStats(repoName: string, sha: string): Promise<LineStats | undefined> {
    const { owner, repo } = parseRepoName(repoName);

    try {
      const { data } = await this.octokit.repos.getCommit({ owner, repo, ref: sha });
      if (!data.stats) {
        return undefined;
      }
      return {
        additions: data.stats.additions ?? 0,
        deletions: data.stats.deletions ?? 0,
      };
    } catch (error) {
      throw translateError(error, `Reading commit ${sha} of ${repoName}`);
    }
  }

  async *listIssues(repoName: string, since: Date): AsyncIterable<IssueSummary> {
    const { owner, repo } = parseRepoName(repoName);

    // The issues endpoint returns pull requests too; they are counted like issues.
    const iterator = this.octokit.paginate.iterator(this.octokit.issues.listForRepo, {
      owner,
      repo,
      state: "all",
      since: since.toISOString(),
      per_page: 100,
    });

    try {
      for await (const { data } of iterator) {
        for (const issue of data) {
          yield {
            createdAt: new Date(issue.created_at),
            closedAt: issue.closed_at ? new Date(issue.closed_at) : undefined,
            comments: issue.comments,
          };
        }
      }
    } catch (error) {
      throw translateError(error, `Listing issues of ${repoName}`);
    }
  }
}
