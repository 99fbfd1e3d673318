import "dotenv/config";

import { Argument, Command } from "commander";
import chalk from "chalk";

import { StatsCollector } from "./collector";
import {
  ConfigError,
  DEFAULT_CONFIG_DIR,
  loadEnvConfig,
  loadRepositories,
  loadSettings,
  notificationConfig,
  reportSettingsFor,
  type AppConfig,
} from "./config";
import { OctokitActivitySource, type ActivitySource } from "./github";
import { NotificationDispatcher } from "./notify";
import { formatUtcMinute, generateReport, reportTitle } from "./report";
import { computeTimeWindow, deliverReport, printReport } from "./run";
import { renderStatsTable } from "./table";
import { REPORT_KINDS, type RepoStats, type ReportKind } from "./type";

interface CliOptions {
  configDir: string;
  dryRun: boolean;
  check: boolean;
  color: boolean;
}

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  createActivitySource?: (token: string) => ActivitySource;
}

interface RunContext {
  env: Record<string, string | undefined>;
  createActivitySource: (token: string) => ActivitySource;
}

function isReportKind(value: string): value is ReportKind {
  return REPORT_KINDS.some((kind) => kind === value);
}

export async function runCli(argv: string[], dependencies: CliDependencies = {}): Promise<void> {
  const context: RunContext = {
    env: dependencies.env ?? process.env,
    createActivitySource: dependencies.createActivitySource ?? ((token) => new OctokitActivitySource(token)),
  };
  const program = new Command();

  program
    .name("github-activity-report")
    .description("Collects commit and issue activity of GitHub repositories and sends a summary report")
    .addArgument(new Argument("<kind>", "Report kind").choices(REPORT_KINDS))
    .option("-c, --config-dir <path>", "Directory containing settings.json and repos.json", DEFAULT_CONFIG_DIR)
    .option("--dry-run", "Print the report instead of sending it", false)
    .option("--check", "Validate environment and configuration, then exit", false)
    .option("--no-color", "Disable coloured console output")
    .action(async (kind: string, options: CliOptions) => {
      if (!options.color) {
        chalk.level = 0;
      }
      if (!isReportKind(kind)) {
        fail(`Unknown report kind: ${kind}`);
        return;
      }
      if (options.check) {
        await check(kind, options, context);
        return;
      }
      await execute(kind, options, context);
    });

  await program.parseAsync(argv);
}

function fail(message: string, error?: unknown): void {
  console.error(chalk.red(message));
  if (process.env.DEBUG && error) {
    console.error(error);
  }
  process.exitCode = 1;
}

/**
 * Builds the run configuration. Resolves to `undefined` when the report kind
 * is disabled; throws `ConfigError` on anything missing or malformed.
 */
async function loadAppConfig(
  kind: ReportKind,
  configDir: string,
  context: RunContext,
): Promise<AppConfig | undefined> {
  const env = loadEnvConfig(context.env);
  const settings = await loadSettings(configDir);
  const report = reportSettingsFor(settings, kind);

  if (!report.enabled) {
    return undefined;
  }

  const repositories = await loadRepositories(configDir);
  return { ...env, report, repositories, emailRecipients: settings.emailRecipients };
}

async function check(kind: ReportKind, options: CliOptions, context: RunContext): Promise<void> {
  try {
    const env = loadEnvConfig(context.env);
    const settings = await loadSettings(options.configDir);
    const report = reportSettingsFor(settings, kind);
    const repositories = await loadRepositories(options.configDir);

    console.log(chalk.green("GITHUB_TOKEN is set"));
    if (report.enabled) {
      const issues = report.includeIssues ? "included" : "excluded";
      console.log(chalk.green(`${kind} report: enabled, ${report.daysBack} day(s) back, issues ${issues}`));
    } else {
      console.log(chalk.yellow(`${kind} report: disabled`));
    }
    console.log(chalk.green(`${repositories.length} repositories: ${repositories.join(", ")}`));

    const dispatcher = new NotificationDispatcher({
      email: env.email,
      onebot: env.onebot,
      envRecipient: env.envRecipient,
      configRecipients: settings.emailRecipients,
    });
    const channels = dispatcher.describeChannels();
    console.log(`Email: ${channels.email}`);
    console.log(`OneBot: ${channels.onebot}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    fail(`Configuration check failed: ${message}`, error);
  }
}

async function execute(kind: ReportKind, options: CliOptions, context: RunContext): Promise<void> {
  console.log(chalk.cyan(`Generating ${kind} report...`));

  let config: AppConfig | undefined;
  try {
    config = await loadAppConfig(kind, options.configDir, context);
  } catch (error) {
    if (error instanceof ConfigError) {
      fail(`Configuration error: ${error.message}`, error);
      return;
    }
    throw error;
  }

  if (!config) {
    console.log(chalk.yellow(`The ${kind} report is disabled, nothing to do.`));
    return;
  }

  const { report, repositories } = config;
  console.log(chalk.cyan(`Repositories (${repositories.length}): ${repositories.join(", ")}`));

  const { since, until } = computeTimeWindow(report.daysBack);
  console.log(chalk.cyan(`Window: ${formatUtcMinute(since)} UTC → ${formatUtcMinute(until)} UTC`));

  const collector = new StatsCollector(context.createActivitySource(config.githubToken));

  let stats: RepoStats[];
  try {
    stats = await collector.collectAllStats(repositories, since, until, report.includeIssues);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    fail(`Failed to collect statistics: ${message}`, error);
    return;
  }
  console.log(renderStatsTable(stats, report.includeIssues));

  let content: string;
  try {
    content = generateReport(stats, kind, since, until, report.includeIssues);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    fail(`Failed to render the report: ${message}`, error);
    return;
  }

  if (options.dryRun) {
    printReport(content);
    return;
  }

  const dispatcher = new NotificationDispatcher(notificationConfig(config));
  await deliverReport(dispatcher, reportTitle(kind), content);

  console.log(chalk.green(`${kind} report finished`));
}

if (require.main === module) {
  runCli(process.argv).catch((error) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Unexpected failure: ${message}`));
    process.exit(1);
  });
}
