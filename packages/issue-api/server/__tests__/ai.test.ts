import { describe, it, expect, vi, beforeEach } from "vitest";

const create = vi.hoisted(() => vi.fn());

vi.mock("../ai/openaiClient", () => ({
  getOpenAI: () => ({ chat: { completions: { create } } })
}));

import { classifyAIError, createOpenAiSuggestionClient } from "../suggestions/ai";
import { AiSuggestionError } from "../errors";
import type { ChatMessage } from "../suggestions/ai";

const messages: ChatMessage[] = [
  { role: "system", content: "be helpful" },
  { role: "user", content: "{}" }
];

function reply(content: string | null) {
  return { choices: [{ message: { role: "assistant", content } }] };
}

function apiFailure(status: number, headers?: Record<string, string>) {
  return Object.assign(new Error(`status ${status}`), { status, headers });
}

function client(overrides: { retries?: number; timeoutMs?: number } = {}) {
  return createOpenAiSuggestionClient({
    apiKey: "test-key",
    model: "gpt-3.5-turbo",
    temperature: 0.5,
    timeoutMs: overrides.timeoutMs ?? 1_000,
    retries: overrides.retries ?? 2,
    baseDelayMs: 0
  });
}

beforeEach(() => {
  create.mockReset();
});

describe("createOpenAiSuggestionClient", () => {
  it("sends the transcript and returns the first choice", async () => {
    create.mockResolvedValueOnce(reply("Sentient toaster detected 🍞"));

    await expect(client().complete(messages)).resolves.toBe("Sentient toaster detected 🍞");
    expect(create).toHaveBeenCalledWith(
      { model: "gpt-3.5-turbo", temperature: 0.5, messages },
      { timeout: 1_000 }
    );
  });

  it("hands the per-attempt timeout to the SDK on every attempt", async () => {
    create.mockRejectedValueOnce(apiFailure(503)).mockResolvedValueOnce(reply("ok"));

    await client({ timeoutMs: 250 }).complete(messages);

    expect(create).toHaveBeenCalledTimes(2);
    expect(create.mock.calls[0][1]).toEqual({ timeout: 250 });
    expect(create.mock.calls[1][1]).toEqual({ timeout: 250 });
  });

  it("retries server errors", async () => {
    create.mockRejectedValueOnce(apiFailure(500)).mockResolvedValueOnce(reply("ok"));

    await expect(client().complete(messages)).resolves.toBe("ok");
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    create.mockRejectedValue(apiFailure(400));

    const err = await client().complete(messages).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AiSuggestionError);
    expect(err).toMatchObject({ code: "AI_UNAVAILABLE", status: 503 });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("reports provider rate limiting with its retry-after", async () => {
    create.mockRejectedValue(apiFailure(429, { "retry-after": "3" }));

    const err = await client({ retries: 1 }).complete(messages).catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "AI_RATE_LIMITED", status: 429, retryAfterMs: 3000 });
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("gives up on a hung request", async () => {
    create.mockReturnValue(new Promise(() => {}));

    const err = await client({ retries: 0, timeoutMs: 10 })
      .complete(messages)
      .catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "AI_TIMEOUT", status: 503 });
  });

  it("rejects an empty reply", async () => {
    create.mockResolvedValueOnce(reply("   "));

    const err = await client().complete(messages).catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "AI_INVALID_RESPONSE", status: 502 });
  });
});

describe("classifyAIError", () => {
  it("passes an already classified error through", () => {
    const original = new AiSuggestionError("AI_TIMEOUT", "slow", 503);
    expect(classifyAIError(original)).toBe(original);
  });

  it("reads retry-after from fetch-style headers", () => {
    const err = apiFailure(429);
    Object.assign(err, { headers: new Headers({ "retry-after": "2" }) });
    expect(classifyAIError(err).retryAfterMs).toBe(2000);
  });

  it("treats anything unrecognised as unavailable", () => {
    expect(classifyAIError("nope")).toMatchObject({
      code: "AI_UNAVAILABLE",
      message: "AI service is temporarily unavailable."
    });
  });
});
