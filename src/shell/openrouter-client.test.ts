import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { callOpenRouter, complete } from "./openrouter-client.js";

function makeResponse(status: number, body: unknown): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
  } as unknown as Response;
}

const MODEL = "openai/gpt-4o-mini";
const API_KEY = "test-api-key";
const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";

function makeChoice(content: string | null) {
  return { choices: [{ message: { role: "assistant", content }, finish_reason: "stop" }] };
}

describe("callOpenRouter", () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts to the correct URL with correct headers and body", async () => {
    mockFetch.mockResolvedValue(makeResponse(200, makeChoice("Hello!")));

    await callOpenRouter([{ role: "user", content: "Hi" }], MODEL, API_KEY, { temperature: 0 });

    expect(mockFetch).toHaveBeenCalledWith(`${DEFAULT_BASE_URL}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${API_KEY}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ model: MODEL, messages: [{ role: "user", content: "Hi" }], temperature: 0 }),
      signal: undefined,
    });
  });

  it("leaves temperature out unless it is given", async () => {
    mockFetch.mockResolvedValue(makeResponse(200, makeChoice("ok")));
    await callOpenRouter([{ role: "user", content: "Hi" }], MODEL, API_KEY, { baseUrl: "http://localhost:9999/v1" });

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe("http://localhost:9999/v1/chat/completions");
    expect(JSON.parse(init.body)).toEqual({ model: MODEL, messages: [{ role: "user", content: "Hi" }] });
  });

  it("throws on non-2xx responses", async () => {
    mockFetch.mockResolvedValue(makeResponse(429, { error: "rate limited" }));
    await expect(callOpenRouter([{ role: "user", content: "Hi" }], MODEL, API_KEY)).rejects.toThrow(
      `HTTP 429 from ${DEFAULT_BASE_URL}/chat/completions`,
    );
  });

  it("throws on payloads without choices", async () => {
    mockFetch.mockResolvedValue(makeResponse(200, { choices: [] }));
    await expect(callOpenRouter([{ role: "user", content: "Hi" }], MODEL, API_KEY)).rejects.toThrow(
      "Unexpected chat completion payload",
    );
  });
});

describe("complete", () => {
  let mockFetch: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    mockFetch = vi.fn();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends a system and a user message and returns the reply text", async () => {
    mockFetch.mockResolvedValue(makeResponse(200, makeChoice("The answer")));

    const reply = await complete("Be brief.", "What is 2+2?", MODEL, API_KEY);

    expect(reply).toBe("The answer");
    const body = JSON.parse(mockFetch.mock.calls[0]?.[1].body);
    expect(body.messages).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "What is 2+2?" },
    ]);
  });

  it("returns an empty string when the model sends no content", async () => {
    mockFetch.mockResolvedValue(makeResponse(200, makeChoice(null)));
    expect(await complete("s", "u", MODEL, API_KEY)).toBe("");
  });
});
