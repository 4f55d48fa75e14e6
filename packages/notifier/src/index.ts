import { randomUUID } from "node:crypto";
import type { Summary } from "../../summarizer/src/index";
import { formatReportDate, type DatasetCode, type ReportDate } from "../../ingestor/src/index";
import { createSubsystemLogger, type Logger, type SubsystemLogger } from "../../staging/src/index";

export interface SummaryMessage {
  subject: string;
  body: string;
}

export interface Notification {
  id: string;
  channel: string;
  status: "sent";
  sentAt: string;
  payload: Record<string, unknown>;
}

export interface Notifier {
  publish(message: SummaryMessage): Promise<Notification>;
}

export class DeliveryFailedError extends Error {
  readonly code = "DeliveryFailed";

  readonly channel: string;

  constructor(channel: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeliveryFailedError";
    this.channel = channel;
  }
}

export interface SlackNotifierOptions {
  slackToken: string;
  channel: string;
  fetchImpl?: typeof fetch;
  apiUrl?: string;
}

const SLACK_POST_MESSAGE_URL = "https://slack.com/api/chat.postMessage";

export class SlackNotifier implements Notifier {
  private readonly options: Required<SlackNotifierOptions>;

  constructor(options: SlackNotifierOptions) {
    this.options = {
      slackToken: options.slackToken,
      channel: options.channel,
      fetchImpl: options.fetchImpl ?? fetch,
      apiUrl: options.apiUrl ?? SLACK_POST_MESSAGE_URL
    };
  }

  async publish(message: SummaryMessage): Promise<Notification> {
    const text = `*${message.subject}*\n${message.body}`;

    let data: { ok: boolean; error?: string; ts?: string };
    try {
      const response = await this.options.fetchImpl(this.options.apiUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/json; charset=utf-8",
          Authorization: `Bearer ${this.options.slackToken}`
        },
        body: JSON.stringify({
          channel: this.options.channel,
          text
        })
      });
      data = parseSlackResponse(await response.json());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DeliveryFailedError(this.options.channel, `Slack delivery failed: ${reason}`, { cause: error });
    }

    if (!data.ok) {
      throw new DeliveryFailedError(
        this.options.channel,
        `Slack rejected the message: ${data.error ?? "unknown_error"}`
      );
    }

    return {
      id: randomUUID(),
      channel: this.options.channel,
      status: "sent",
      sentAt: new Date().toISOString(),
      payload: { subject: message.subject, text, ts: data.ts }
    };
  }
}

export class ConsoleNotifier implements Notifier {
  private readonly log: SubsystemLogger;

  constructor(logger?: Logger) {
    this.log = createSubsystemLogger("notifier", logger);
  }

  async publish(message: SummaryMessage): Promise<Notification> {
    this.log.info(`${message.subject}\n${message.body}`);
    return {
      id: randomUUID(),
      channel: "stdout",
      status: "sent",
      sentAt: new Date().toISOString(),
      payload: { subject: message.subject, text: message.body }
    };
  }
}

export function formatSummaryMessage(input: {
  dataset: DatasetCode;
  reportDate: ReportDate;
  summary: Summary;
  stagingKey: string;
}): SummaryMessage {
  const day = formatReportDate(input.reportDate);
  return {
    subject: `AER ${input.dataset} summary – ${day}`,
    body: [
      `Daily AER Summary – ${day}`,
      `Dataset: ${input.dataset}`,
      "",
      input.summary.text,
      "",
      `Source (temporary staging key): ${input.stagingKey}`
    ].join("\n")
  };
}

export function formatFailureNotice(input: {
  dataset: string;
  reportDate?: string;
  status: string;
  message?: string;
}): SummaryMessage {
  const day = input.reportDate ?? "unknown date";
  return {
    subject: `AER ${input.dataset} summary failed – ${day}`,
    body: [
      `The ${input.dataset} run for ${day} ended with ${input.status}.`,
      input.message ?? "No further detail was recorded."
    ].join("\n")
  };
}

function parseSlackResponse(value: unknown): { ok: boolean; error?: string; ts?: string } {
  if (typeof value === "object" && value !== null && "ok" in value) {
    const ok = Boolean(value.ok);
    const error = "error" in value && typeof value.error === "string" ? value.error : undefined;
    const ts = "ts" in value && typeof value.ts === "string" ? value.ts : undefined;
    return { ok, error, ts };
  }

  return { ok: false, error: "invalid_response" };
}
