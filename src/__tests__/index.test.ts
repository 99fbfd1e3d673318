import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";

import type { ActivitySource, CommitSummary, IssueSummary } from "../github";
import { runCli } from "../index";
import type { LineStats, TimeWindow } from "../type";

const commitLines: Record<string, LineStats> = {
  a1: { additions: 10, deletions: 1 },
  b2: { additions: 5, deletions: 2 },
  m3: { additions: 100, deletions: 100 },
};

class StubActivitySource implements ActivitySource {
  async *listCommits(_repo: string, _window: TimeWindow): AsyncIterable<CommitSummary> {
    yield { sha: "a1", parentCount: 1 };
    yield { sha: "b2", parentCount: 1 };
    yield { sha: "m3", parentCount: 2 };
  }

  async getCommitStats(_repo: string, sha: string): Promise<LineStats | undefined> {
    return commitLines[sha];
  }

  async *listIssues(_repo: string, _since: Date): AsyncIterable<IssueSummary> {
    yield* [];
  }
}

describe("runCli", () => {
  let configDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let createActivitySource: (token: string) => ActivitySource;
  const env = { GITHUB_TOKEN: "test-token" };

  beforeEach(async () => {
    process.exitCode = undefined;
    configDir = await mkdtemp(path.join(os.tmpdir(), "activity-cli-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    createActivitySource = vi.fn((_token: string) => new StubActivitySource());
  });

  afterEach(async () => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    await rm(configDir, { recursive: true, force: true });
  });

  async function writeJson(fileName: string, value: unknown): Promise<void> {
    await writeFile(path.join(configDir, fileName), JSON.stringify(value), "utf8");
  }

  async function run(kind: string, extra: string[] = [], runEnv: Record<string, string> = env): Promise<void> {
    await runCli(["node", "github-activity-report", kind, "--config-dir", configDir, ...extra], {
      env: runEnv,
      createActivitySource,
    });
  }

  it("does nothing for a disabled report without a lookback", async () => {
    await writeJson("settings.json", { weekly_report: { enabled: false } });
    await writeJson("repos.json", ["acme/api"]);

    await run("weekly");

    expect(process.exitCode).toBeUndefined();
    expect(createActivitySource).not.toHaveBeenCalled();
  });

  it("runs a daily report while the weekly section is broken", async () => {
    await writeJson("settings.json", {
      daily_report: { enabled: true, days_back: 1, include_issues: false },
      weekly_report: { enabled: true },
    });
    await writeJson("repos.json", ["acme/api"]);

    await run("daily", ["--dry-run"]);

    expect(process.exitCode).toBeUndefined();
    expect(createActivitySource).toHaveBeenCalledWith("test-token");
  });

  it("exits with 1 without GITHUB_TOKEN", async () => {
    await writeJson("settings.json", { daily_report: { enabled: true, days_back: 1 } });
    await writeJson("repos.json", ["acme/api"]);

    await run("daily", [], {});

    expect(process.exitCode).toBe(1);
    expect(createActivitySource).not.toHaveBeenCalled();
  });

  it("exits with 1 on an empty repository list", async () => {
    await writeJson("settings.json", { daily_report: { enabled: true, days_back: 1 } });
    await writeJson("repos.json", []);

    await run("daily");

    expect(process.exitCode).toBe(1);
  });

  it("prints the report on a dry run", async () => {
    await writeJson("settings.json", { daily_report: { enabled: true, days_back: 1, include_issues: false } });
    await writeJson("repos.json", ["acme/api"]);

    await run("daily", ["--dry-run"]);

    expect(process.exitCode).toBeUndefined();
    const logged = logSpy.mock.calls.map(([first]) => String(first));
    const heading = logged.indexOf("Report content:");
    expect(heading).toBeGreaterThan(-1);
    const content = logged[heading + 2].split("\n");
    expect(content[0]).toBe("GitHub Daily Report");
    expect(content.slice(4, 9)).toEqual([
      "Totals:",
      "  - Commits: 2",
      "  - Additions: 15",
      "  - Deletions: 3",
      "  - Net change: +12",
    ]);
    expect(content).toContain("[acme/api]");
  });
});
