import chalk from "chalk";
import { createTransport, type SendMailOptions } from "nodemailer";
import { z } from "zod";

import type { EmailChannelConfig, NotificationConfig, OneBotChannelConfig } from "./config";
import type { SendResults } from "./type";

const ONEBOT_TIMEOUT_MS = 30_000;

const OneBotResponseSchema = z.object({
  status: z.string().optional(),
  msg: z.string().optional(),
});

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export type MailTransportFactory = (config: EmailChannelConfig) => MailTransport;

export interface DispatcherDependencies {
  createMailTransport?: MailTransportFactory;
  fetchFn?: typeof fetch;
}

function createSmtpTransport(config: EmailChannelConfig): MailTransport {
  return createTransport({
    host: config.host,
    port: config.port,
    secure: false,
    requireTLS: config.useTls,
    ignoreTLS: !config.useTls,
    auth: { user: config.user, pass: config.password },
  });
}

export class NotificationDispatcher {
  private readonly createMailTransport: MailTransportFactory;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly config: NotificationConfig,
    dependencies: DispatcherDependencies = {},
  ) {
    this.createMailTransport = dependencies.createMailTransport ?? createSmtpTransport;
    this.fetchFn = dependencies.fetchFn ?? fetch;
  }

  describeChannels(): Record<keyof SendResults, string> {
    return {
      email: this.config.email.configured ? "configured" : `skipped (${this.config.email.reason})`,
      onebot: this.config.onebot.configured ? "configured" : `skipped (${this.config.onebot.reason})`,
    };
  }

  /** Explicit recipients first, then `EMAIL_RECIPIENT`, then the settings list. */
  resolveRecipients(recipients?: string[]): string[] {
    if (recipients) {
      return recipients;
    }
    if (this.config.envRecipient) {
      return [this.config.envRecipient];
    }
    return this.config.configRecipients;
  }

  async sendEmail(subject: string, content: string, recipients?: string[]): Promise<boolean> {
    const channel = this.config.email;
    if (!channel.configured) {
      console.log(chalk.yellow(`Email channel skipped: ${channel.reason}`));
      return false;
    }

    const to = this.resolveRecipients(recipients);
    if (to.length === 0) {
      console.error(chalk.red("Email channel has no recipients"));
      return false;
    }

    try {
      const transport = this.createMailTransport(channel.config);
      await transport.sendMail({
        from: channel.config.user,
        to: to.join(", "),
        subject,
        text: content,
      });
      console.log(chalk.green(`Email sent to ${to.join(", ")}`));
      return true;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Failed to send email: ${detail}`));
      return false;
    }
  }

  async sendOneBot(message: string): Promise<boolean> {
    const channel = this.config.onebot;
    if (!channel.configured) {
      console.log(chalk.yellow(`OneBot channel skipped: ${channel.reason}`));
      return false;
    }

    return this.postOneBot(channel.config, message);
  }

  private async postOneBot(config: OneBotChannelConfig, message: string): Promise<boolean> {
    try {
      const response = await this.fetchFn(config.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          user_id: config.userId,
          message: message.replace(/\\n/g, "\n"),
        }),
        signal: AbortSignal.timeout(ONEBOT_TIMEOUT_MS),
      });

      if (response.status !== 200) {
        console.error(chalk.red(`OneBot request failed with status ${response.status}`));
        return false;
      }

      const parsed = OneBotResponseSchema.safeParse(await response.json());
      if (!parsed.success || parsed.data.status !== "ok") {
        const detail = parsed.success ? parsed.data.msg ?? "unknown error" : "malformed response";
        console.error(chalk.red(`OneBot returned an error: ${detail}`));
        return false;
      }

      console.log(chalk.green(`OneBot message sent to ${config.userId}`));
      return true;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Failed to send OneBot message: ${detail}`));
      return false;
    }
  }

  async sendAll(subject: string, content: string, recipients?: string[]): Promise<SendResults> {
    const email = this.config.email.configured ? await this.sendEmail(subject, content, recipients) : false;
    const onebot = this.config.onebot.configured ? await this.sendOneBot(content) : false;
    return { email, onebot };
  }
}
