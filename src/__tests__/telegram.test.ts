import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  TelegramApiError,
  TelegramClient,
  isChatGone,
  toUpdate,
} from "../core/bot/telegram";

const API = "https://telegram.test";

const ok = (result: unknown) =>
  new Response(JSON.stringify({ ok: true, result }), { status: 200 });

const fail = (status: number, description: string) =>
  new Response(JSON.stringify({ ok: false, error_code: status, description }), {
    status,
  });

describe("toUpdate", () => {
  it("maps a text message", () => {
    expect(
      toUpdate({
        update_id: 9,
        message: {
          message_id: 3,
          chat: { id: -100, type: "group" },
          from: { id: 5 },
          text: "/start",
        },
      }),
    ).toEqual({
      updateId: 9,
      message: { messageId: 3, chatId: -100, fromId: 5, text: "/start" },
    });
  });

  it("keeps updates without a usable message", () => {
    expect(toUpdate({ update_id: 10, edited_message: {} })).toEqual({
      updateId: 10,
      message: null,
    });
  });

  it("rejects values without an update id", () => {
    expect(toUpdate({ message: {} })).toBeNull();
    expect(toUpdate("nope")).toBeNull();
  });
});

describe("isChatGone", () => {
  it("recognises blocked and missing chats", () => {
    expect(
      isChatGone(new TelegramApiError("sendMessage", 403, "Forbidden: bot was blocked by the user")),
    ).toBe(true);
    expect(
      isChatGone(new TelegramApiError("sendMessage", 400, "Bad Request: chat not found")),
    ).toBe(true);
  });

  it("leaves other failures alone", () => {
    expect(
      isChatGone(new TelegramApiError("sendMessage", 429, "Too Many Requests")),
    ).toBe(false);
    expect(
      isChatGone(new TelegramApiError("sendMessage", 400, "Bad Request: message is too long")),
    ).toBe(false);
    expect(isChatGone(new Error("Forbidden"))).toBe(false);
  });
});

describe("TelegramClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requires a token", () => {
    expect(() => new TelegramClient("")).toThrow("Telegram bot token is required");
  });

  it("posts messages to the bot endpoint", async () => {
    fetchMock.mockResolvedValue(ok({ message_id: 1 }));
    const client = new TelegramClient("test-token", { apiBase: `${API}/` });

    await client.sendMessage(42, "hello");

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${API}/bottest-token/sendMessage`);
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: 42,
      text: "hello",
      disable_web_page_preview: true,
    });
  });

  it("raises the API description on failure", async () => {
    fetchMock.mockResolvedValue(fail(403, "Forbidden: bot was blocked by the user"));
    const client = new TelegramClient("test-token", { apiBase: API });

    const error = await client.sendMessage(42, "hello").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TelegramApiError);
    expect(client.isRecipientGone(error)).toBe(true);
    expect(error instanceof Error ? error.message : "").toBe(
      "Telegram sendMessage failed (403): Forbidden: bot was blocked by the user",
    );
  });

  it("falls back to the status text when the body is not JSON", async () => {
    fetchMock.mockResolvedValue(
      new Response("<html>bad gateway</html>", { status: 502, statusText: "Bad Gateway" }),
    );
    const client = new TelegramClient("test-token", { apiBase: API });

    await expect(client.sendMessage(42, "hello")).rejects.toThrow(
      "Telegram sendMessage failed (502): Bad Gateway",
    );
  });

  it("returns parsed updates and skips malformed ones", async () => {
    fetchMock.mockResolvedValue(
      ok([
        { update_id: 1, message: { message_id: 1, chat: { id: 7 }, text: "/help" } },
        { nope: true },
      ]),
    );
    const client = new TelegramClient("test-token", { apiBase: API });

    const updates = await client.getUpdates(5, 0);

    expect(updates).toEqual([
      {
        updateId: 1,
        message: { messageId: 1, chatId: 7, fromId: null, text: "/help" },
      },
    ]);
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({
      offset: 5,
      timeout: 0,
      allowed_updates: ["message"],
    });
  });
});
