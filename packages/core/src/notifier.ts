import { signPayload } from "@docrelay/crypto";
import { classifyError, errorFromResponse, withRetry } from "@docrelay/errors";
import { createSilentLogger, type Logger } from "@docrelay/logger";
import type { SettingsResolver } from "@docrelay/settings";
import type { RetryPolicy } from "@docrelay/types";

export type NotificationEvent =
  | "document.delivered"
  | "document.partially_delivered"
  | "document.failed"
  | "credential.failed";

export interface INotifier {
  notify(event: NotificationEvent, data: Record<string, unknown>): Promise<void>;
}

/** Drops every event; used when no notifier is wired. */
export const NO_NOTIFIER: INotifier = {
  notify: async () => undefined,
};

export const EVENT_HEADER = "x-docrelay-event";
export const SIGNATURE_HEADER = "x-docrelay-signature";

const WEBHOOK_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 1_000, factor: 2, maxDelayMs: 10_000 };

export interface WebhookNotifierOptions {
  settings: SettingsResolver;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * POSTs `{ event, timestamp, data }` as JSON to `notify.webhook_url`; nothing is sent
 * while it is unset. With `notify.webhook_secret` set, the exact body is signed as
 * `X-Docrelay-Signature: sha256=<hex HMAC-SHA256>`. Transient failures are retried a
 * few times; after that the event is logged and dropped, never thrown.
 */
export class WebhookNotifier implements INotifier {
  private readonly settings: SettingsResolver;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: WebhookNotifierOptions) {
    this.settings = options.settings;
    this.logger = options.logger ?? createSilentLogger();
    this.sleep = options.sleep;
    this.now = options.now ?? (() => new Date());
  }

  async notify(event: NotificationEvent, data: Record<string, unknown>): Promise<void> {
    try {
      await this.send(event, data);
    } catch (error: unknown) {
      this.logger.warn({ event, errorClass: classifyError(error), err: error }, "notification not delivered");
    }
  }

  private async send(event: NotificationEvent, data: Record<string, unknown>): Promise<void> {
    const [url, secret, timeoutMs] = await Promise.all([
      this.settings.get("notify.webhook_url"),
      this.settings.get("notify.webhook_secret"),
      this.settings.getNumber("notify.timeout_ms"),
    ]);
    const target = url.value;
    if (!target) {
      return;
    }

    const body = JSON.stringify({ event, timestamp: this.now().toISOString(), data });
    const headers: Record<string, string> = {
      "content-type": "application/json",
      [EVENT_HEADER]: event,
    };
    if (secret.value) {
      headers[SIGNATURE_HEADER] = `sha256=${signPayload(body, secret.value)}`;
    }

    await withRetry(
      async () => {
        const response = await fetch(target, {
          method: "POST",
          headers,
          body,
          signal: AbortSignal.timeout(timeoutMs),
        });
        if (!response.ok) {
          throw await errorFromResponse(response, "Webhook");
        }
      },
      { ...WEBHOOK_RETRY, operation: "webhook", logger: this.logger, sleep: this.sleep },
    );
    this.logger.info({ event }, "notification sent");
  }
}
