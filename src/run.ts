import chalk from "chalk";

import type { NotificationDispatcher } from "./notify";
import type { SendResults, TimeWindow } from "./type";

const DAY_MS = 24 * 60 * 60 * 1000;
const SEPARATOR = "=".repeat(50);

/** `until` is today's UTC midnight, `since` lies `daysBack` days before it. */
export function computeTimeWindow(daysBack: number, now: Date = new Date()): TimeWindow {
  const until = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  const since = new Date(until.getTime() - daysBack * DAY_MS);
  return Object.freeze({ since, until });
}

export function printReport(content: string): void {
  console.log(`\n${SEPARATOR}`);
  console.log("Report content:");
  console.log(SEPARATOR);
  console.log(content);
  console.log(SEPARATOR);
}

/**
 * Sends the report through every configured channel. The report is printed
 * to the console when no channel succeeds.
 */
export async function deliverReport(
  dispatcher: Pick<NotificationDispatcher, "sendAll">,
  subject: string,
  content: string,
): Promise<SendResults | undefined> {
  let results: SendResults | undefined;

  try {
    results = await dispatcher.sendAll(subject, content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`Error while sending notifications: ${message}`));
    printReport(content);
    return undefined;
  }

  console.log(results.email ? chalk.green("✓ Email sent") : chalk.yellow("✗ Email failed or not configured"));
  console.log(results.onebot ? chalk.green("✓ OneBot message sent") : chalk.yellow("✗ OneBot failed or not configured"));

  if (!results.email && !results.onebot) {
    console.log(chalk.yellow("Warning: no notification channel delivered the report"));
    printReport(content);
  }

  return results;
}
