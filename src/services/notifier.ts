import type { Item } from "../types/listing.js";
import { logger } from "../utils/logger.js";
import { NotifyError } from "./errors.js";

const LINE_PUSH_ENDPOINT = "https://api.line.me/v2/bot/message/push";
const LINE_TEXT_LIMIT = 5000;

export type NotifyResult = { ok: true } | { ok: false; error: NotifyError };

export interface NotifyContext {
  source?: string;
  keyword?: string;
  itemId?: string;
}

/** Delivers one message. Never throws: failures come back as `{ ok: false }`. */
export interface Notifier {
  readonly channel: string;
  send(message: string, context?: NotifyContext): Promise<NotifyResult>;
}

const priceFormatter = new Intl.NumberFormat("en-US");

export function formatItemMessage(item: Item): string {
  return [
    `[${item.source.toUpperCase()}] New listing found!`,
    "",
    `Title: ${item.title}`,
    `Price: ¥${priceFormatter.format(item.price)}`,
    `URL: ${item.url}`,
  ].join("\n");
}

interface LineNotifierOptions {
  channelAccessToken: string;
  userId: string;
  timeoutMs?: number;
  endpoint?: string;
}

export class LineNotifier implements Notifier {
  readonly channel = "line";
  private readonly channelAccessToken: string;
  private readonly userId: string;
  private readonly timeoutMs: number;
  private readonly endpoint: string;

  constructor(options: LineNotifierOptions) {
    this.channelAccessToken = options.channelAccessToken.trim();
    this.userId = options.userId.trim();
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.endpoint = options.endpoint ?? LINE_PUSH_ENDPOINT;
  }

  get configured(): boolean {
    return Boolean(this.channelAccessToken && this.userId);
  }

  async send(message: string, context: NotifyContext = {}): Promise<NotifyResult> {
    if (!this.configured) {
      const missing = this.channelAccessToken ? "LINE_USER_ID" : "LINE_CHANNEL_ACCESS_TOKEN";
      logger.warn("notify_skipped_not_configured", { channel: this.channel, missing, ...context });
      return {
        ok: false,
        error: new NotifyError(`${missing} is not set`, { reason: "not_configured", ...context }),
      };
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.channelAccessToken}`,
        },
        body: JSON.stringify({
          to: this.userId,
          messages: [{ type: "text", text: message.slice(0, LINE_TEXT_LIMIT) }],
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        return {
          ok: false,
          error: new NotifyError(`LINE push failed with status ${response.status}${body ? `: ${body}` : ""}`, {
            reason: "http",
            status: response.status,
            ...context,
          }),
        };
      }

      logger.debug("notify_sent", { channel: this.channel, ...context });
      return { ok: true };
    } catch (error) {
      return {
        ok: false,
        error: new NotifyError(
          controller.signal.aborted
            ? `LINE push timed out after ${this.timeoutMs}ms`
            : `LINE push failed: ${error instanceof Error ? error.message : String(error)}`,
          { reason: "network", cause: error, ...context },
        ),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
