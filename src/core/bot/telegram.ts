/**
 * Minimal Telegram Bot API client
 */

import { AppConfig } from "../config/index";
import type { MessageSender } from "../services/delivery";

export class TelegramApiError extends Error {
  constructor(
    public method: string,
    public status: number,
    public description: string,
  ) {
    super(`Telegram ${method} failed (${status}): ${description}`);
    this.name = "TelegramApiError";
  }
}

export interface TelegramMessage {
  messageId: number;
  chatId: number;
  fromId: number | null;
  text: string | null;
}

export interface TelegramUpdate {
  updateId: number;
  message: TelegramMessage | null;
}

export interface TelegramClientOptions {
  apiBase?: string;
  requestTimeoutMs?: number;
}

const isRecord = (v: unknown): v is Record<string, unknown> =>
  !!v && typeof v === "object" && !Array.isArray(v);

function toMessage(v: unknown): TelegramMessage | null {
  if (!isRecord(v) || typeof v.message_id !== "number") return null;
  if (!isRecord(v.chat) || typeof v.chat.id !== "number") return null;
  return {
    messageId: v.message_id,
    chatId: v.chat.id,
    fromId: isRecord(v.from) && typeof v.from.id === "number" ? v.from.id : null,
    text: typeof v.text === "string" ? v.text : null,
  };
}

export function toUpdate(v: unknown): TelegramUpdate | null {
  if (!isRecord(v) || typeof v.update_id !== "number") return null;
  return { updateId: v.update_id, message: toMessage(v.message) };
}

/** Blocked, deactivated or deleted chats */
export function isChatGone(error: unknown): boolean {
  if (!(error instanceof TelegramApiError)) return false;
  const d = error.description.toLowerCase();
  return (
    error.status === 403 ||
    (error.status === 400 && d.includes("chat not found"))
  );
}

export class TelegramClient implements MessageSender {
  private readonly apiBase: string;
  private readonly requestTimeoutMs: number;

  constructor(
    private readonly token: string,
    options: TelegramClientOptions = {},
  ) {
    if (!token) throw new Error("Telegram bot token is required");
    this.apiBase = (options.apiBase ?? AppConfig.TELEGRAM_API_BASE).replace(
      /\/+$/,
      "",
    );
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15000;
  }

  private async call(
    method: string,
    body: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const r = await fetch(`${this.apiBase}/bot${this.token}/${method}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });
    const payload: unknown = await r.json().catch(() => null);
    if (!isRecord(payload) || payload.ok !== true) {
      const description =
        isRecord(payload) && typeof payload.description === "string"
          ? payload.description
          : r.statusText || "unknown error";
      throw new TelegramApiError(method, r.status, description);
    }
    return payload.result;
  }

  async sendMessage(chatId: number, text: string): Promise<void> {
    await this.call(
      "sendMessage",
      { chat_id: chatId, text, disable_web_page_preview: true },
      AbortSignal.timeout(this.requestTimeoutMs),
    );
  }

  /**
   * Long-polls for updates after `offset`
   * @param timeoutS - Server-side wait in seconds
   */
  async getUpdates(
    offset: number,
    timeoutS: number,
    signal?: AbortSignal,
  ): Promise<TelegramUpdate[]> {
    const timeout = AbortSignal.timeout(timeoutS * 1000 + this.requestTimeoutMs);
    const result = await this.call(
      "getUpdates",
      { offset, timeout: timeoutS, allowed_updates: ["message"] },
      signal ? AbortSignal.any([signal, timeout]) : timeout,
    );
    if (!Array.isArray(result)) return [];
    return result.flatMap((u) => {
      const update = toUpdate(u);
      return update ? [update] : [];
    });
  }

  isRecipientGone(error: unknown): boolean {
    return isChatGone(error);
  }
}
