import { DeliveryError, errorMessage } from "./errors.js";
import type { NotificationTransport } from "./notifier.js";

export interface TelegramTransportOptions {
  botToken: string;
  baseUrl?: string;
  timeoutMs?: number;
}

interface TelegramResponse {
  ok?: boolean;
  description?: string;
}

function isTelegramResponse(value: unknown): value is TelegramResponse {
  return typeof value === "object" && value !== null;
}

/** Telegram Bot API sendMessage; the recipient is a chat id. */
export function createTelegramTransport(options: TelegramTransportOptions): NotificationTransport {
  const baseUrl = options.baseUrl ?? "https://api.telegram.org";
  const timeoutMs = options.timeoutMs ?? 10_000;
  const endpoint = `${baseUrl}/bot${options.botToken}/sendMessage`;

  return {
    name: "telegram",
    async send(recipient, text) {
      let res: Response;
      try {
        res = await fetch(endpoint, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            chat_id: recipient,
            text,
            parse_mode: "Markdown",
            disable_web_page_preview: false,
          }),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (e) {
        throw new DeliveryError(`Telegram request failed: ${errorMessage(e)}`, { cause: e });
      }
      const body: unknown = await res.json().catch(() => null);
      const parsed = isTelegramResponse(body) ? body : {};
      if (!res.ok || parsed.ok === false) {
        throw new DeliveryError(`Telegram API ${res.status}: ${parsed.description ?? res.statusText}`);
      }
    },
  };
}
