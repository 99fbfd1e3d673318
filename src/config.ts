import { promises as fs } from "node:fs";
import path from "node:path";

import chalk from "chalk";
import { z } from "zod";

import type { ReportKind } from "./type";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_CONFIG_DIR = "config";
export const SETTINGS_FILE = "settings.json";
export const REPOSITORIES_FILE = "repos.json";

const REPOSITORY_PATTERN = /^[^/\s]+\/[^/\s]+$/;

// Report sections stay unparsed here; reportSettingsFor validates the one it is asked for.
const SettingsSchema = z.record(z.string(), z.unknown());

const ReportToggleSchema = z.object({
  enabled: z.boolean().default(false),
});

const ReportSettingsSchema = z.object({
  days_back: z.number().int().positive(),
  include_issues: z.boolean().default(true),
});

const RecipientsSchema = z.array(z.string()).default([]);

const RepositoriesSchema = z
  .array(z.string().regex(REPOSITORY_PATTERN, "expected an owner/name repository"))
  .min(1, "no repositories configured");

export interface EnabledReportSettings {
  enabled: true;
  daysBack: number;
  includeIssues: boolean;
}

export type ReportSettings = EnabledReportSettings | { enabled: false };

export interface SettingsDocument {
  sections: Record<string, unknown>;
  emailRecipients: string[];
}

export interface EmailChannelConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  useTls: boolean;
}

export interface OneBotChannelConfig {
  url: string;
  userId: number;
}

export type ChannelConfig<T> = { configured: true; config: T } | { configured: false; reason: string };

export interface NotificationConfig {
  email: ChannelConfig<EmailChannelConfig>;
  onebot: ChannelConfig<OneBotChannelConfig>;
  envRecipient?: string;
  configRecipients: string[];
}

export interface EnvConfig {
  githubToken: string;
  email: ChannelConfig<EmailChannelConfig>;
  onebot: ChannelConfig<OneBotChannelConfig>;
  envRecipient?: string;
}

export interface AppConfig extends EnvConfig {
  report: EnabledReportSettings;
  repositories: string[];
  emailRecipients: string[];
}

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function missingVariables(env: Env, names: string[]): string[] {
  return names.filter((name) => readEnv(env, name) === undefined);
}

function loadEmailChannel(env: Env): ChannelConfig<EmailChannelConfig> {
  const missing = missingVariables(env, ["EMAIL_USER", "EMAIL_PASSWORD", "SMTP_HOST", "SMTP_PORT"]);
  if (missing.length > 0) {
    return { configured: false, reason: `missing ${missing.join(", ")}` };
  }

  const rawPort = readEnv(env, "SMTP_PORT") ?? "";
  const port = Number.parseInt(rawPort, 10);
  if (!/^\d+$/.test(rawPort) || port <= 0 || port > 65535) {
    return { configured: false, reason: `invalid SMTP_PORT: ${rawPort}` };
  }

  return {
    configured: true,
    config: {
      host: readEnv(env, "SMTP_HOST") ?? "",
      port,
      user: readEnv(env, "EMAIL_USER") ?? "",
      password: readEnv(env, "EMAIL_PASSWORD") ?? "",
      useTls: (readEnv(env, "SMTP_USE_TLS") ?? "true").toLowerCase() === "true",
    },
  };
}

function loadOneBotChannel(env: Env): ChannelConfig<OneBotChannelConfig> {
  const missing = missingVariables(env, ["ONEBOT_URL", "ONEBOT_QQ"]);
  if (missing.length > 0) {
    return { configured: false, reason: `missing ${missing.join(", ")}` };
  }

  const rawUserId = readEnv(env, "ONEBOT_QQ") ?? "";
  if (!/^\d+$/.test(rawUserId)) {
    return { configured: false, reason: `invalid ONEBOT_QQ: ${rawUserId}` };
  }

  return {
    configured: true,
    config: {
      url: readEnv(env, "ONEBOT_URL") ?? "",
      userId: Number.parseInt(rawUserId, 10),
    },
  };
}

/**
 * Reads the access token and the notification channels from an environment
 * map. Throws `ConfigError` when `GITHUB_TOKEN` is absent.
 */
export function loadEnvConfig(env: Env): EnvConfig {
  const githubToken = readEnv(env, "GITHUB_TOKEN");
  if (!githubToken) {
    throw new ConfigError("Missing required environment variable: GITHUB_TOKEN");
  }

  return {
    githubToken,
    email: loadEmailChannel(env),
    onebot: loadOneBotChannel(env),
    envRecipient: readEnv(env, "EMAIL_RECIPIENT"),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${filePath}: ${message}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${filePath}: ${message}`);
  }
}

export async function loadSettings(configDir: string): Promise<SettingsDocument> {
  const filePath = path.join(configDir, SETTINGS_FILE);
  const parsed = SettingsSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings in ${filePath}: ${formatIssues(parsed.error)}`);
  }

  // A bad recipient list only costs the email channel its fallback recipients.
  const recipients = RecipientsSchema.safeParse(parsed.data.email_recipients);
  if (!recipients.success) {
    console.error(chalk.yellow(`Ignoring email_recipients in ${filePath}: ${formatIssues(recipients.error)}`));
  }

  return { sections: parsed.data, emailRecipients: recipients.success ? recipients.data : [] };
}

/**
 * Validates the `<kind>_report` section. A disabled section needs nothing
 * but its `enabled` flag.
 */
export function reportSettingsFor(settings: SettingsDocument, kind: ReportKind): ReportSettings {
  const key = `${kind}_report`;
  const section = settings.sections[key];
  if (section === undefined) {
    throw new ConfigError(`No ${key} section in ${SETTINGS_FILE}`);
  }

  const toggle = ReportToggleSchema.safeParse(section);
  if (!toggle.success) {
    throw new ConfigError(`Invalid ${key} in ${SETTINGS_FILE}: ${formatIssues(toggle.error)}`);
  }
  if (!toggle.data.enabled) {
    return { enabled: false };
  }

  const report = ReportSettingsSchema.safeParse(section);
  if (!report.success) {
    throw new ConfigError(`Invalid ${key} in ${SETTINGS_FILE}: ${formatIssues(report.error)}`);
  }
  return { enabled: true, daysBack: report.data.days_back, includeIssues: report.data.include_issues };
}

export async function loadRepositories(configDir: string): Promise<string[]> {
  const filePath = path.join(configDir, REPOSITORIES_FILE);
  const parsed = RepositoriesSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new ConfigError(`Invalid repository list in ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function notificationConfig(config: AppConfig): NotificationConfig {
  return {
    email: config.email,
    onebot: config.onebot,
    envRecipient: config.envRecipient,
    configRecipients: config.emailRecipients,
  };
}
