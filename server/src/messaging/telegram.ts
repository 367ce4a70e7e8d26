/**
 * Telegram Bot API Messenger
 *
 * sendMessage over fetch, with failures sorted into transient (retry
 * later) and permanent (the bot can no longer write to the chat).
 */

import { createComponentLogger } from "../logging.js";
import type { Messenger, SendResult } from "./types.js";

const log = createComponentLogger("messaging.telegram");

export const DEFAULT_TELEGRAM_API_BASE = "https://api.telegram.org";

export interface TelegramMessengerOptions {
  token: string;
  /** Default: https://api.telegram.org */
  apiBase?: string;
  /** Injected in tests */
  fetch?: typeof fetch;
}

interface TelegramApiResponse {
  ok: boolean;
  description?: string;
  messageId?: number;
  retryAfterSeconds?: number;
}

// ============================================
// ERROR CLASSIFICATION
// ============================================

export function classifyTelegramFailure(status: number, description: string, retryAfterSeconds?: number): SendResult {
  const error = `Telegram ${status}: ${description}`;

  if (status === 429 || status >= 500) {
    return {
      ok: false,
      kind: "transient",
      error,
      retryAfterMs: retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : undefined,
    };
  }
  // A rejected token is our configuration, not the chat's fault
  if (status === 401) {
    return { ok: false, kind: "transient", error };
  }
  // 403 (blocked, kicked), 400 "chat not found", "group chat was deactivated", ...
  return { ok: false, kind: "permanent", error };
}

/** fetch itself threw: DNS, refused connection, reset, abort */
export function classifyThrownError(error: unknown): SendResult {
  const message = error instanceof Error ? error.message : String(error);
  return { ok: false, kind: "transient", error: message };
}

function parseApiResponse(body: unknown): TelegramApiResponse | null {
  if (typeof body !== "object" || body === null || !("ok" in body)) return null;

  const response: TelegramApiResponse = { ok: body.ok === true };
  if ("description" in body && typeof body.description === "string") {
    response.description = body.description;
  }
  if ("result" in body && typeof body.result === "object" && body.result !== null && "message_id" in body.result) {
    const messageId = body.result.message_id;
    if (typeof messageId === "number") response.messageId = messageId;
  }
  if ("parameters" in body && typeof body.parameters === "object" && body.parameters !== null && "retry_after" in body.parameters) {
    const retryAfter = body.parameters.retry_after;
    if (typeof retryAfter === "number") response.retryAfterSeconds = retryAfter;
  }
  return response;
}

// ============================================
// MESSENGER
// ============================================

export class TelegramMessenger implements Messenger {
  private readonly token: string;
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TelegramMessengerOptions) {
    if (!options.token.trim()) {
      throw new Error("Telegram bot token is required");
    }
    this.token = options.token;
    this.apiBase = (options.apiBase ?? DEFAULT_TELEGRAM_API_BASE).replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(chatId: number, text: string, signal?: AbortSignal): Promise<SendResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiBase}/bot${this.token}/sendMessage`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          parse_mode: "HTML",
          disable_web_page_preview: true,
        }),
        signal,
      });
    } catch (error) {
      log.warn("sendMessage request failed", { chatId, error });
      return classifyThrownError(error);
    }

    let body: unknown = null;
    try {
      body = await response.json();
    } catch (error) {
      log.debug("sendMessage returned a non-JSON body", { chatId, status: response.status, error });
    }
    const payload = parseApiResponse(body);

    if (response.ok && payload?.ok) {
      return { ok: true, messageId: payload.messageId };
    }

    const result = classifyTelegramFailure(
      response.status,
      payload?.description ?? (response.statusText || "unknown error"),
      payload?.retryAfterSeconds,
    );
    log.warn("sendMessage rejected", { chatId, status: response.status, kind: result.ok ? undefined : result.kind });
    return result;
  }
}
