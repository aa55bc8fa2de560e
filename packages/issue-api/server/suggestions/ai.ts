import { getOpenAI } from "../ai/openaiClient";
import {
  errorCode,
  errorMessage,
  errorStatus,
  retryAfterMs,
  withRetries,
  withTimeout
} from "../ai/retry";
import { AiSuggestionError } from "../errors";
import { logger } from "../logger";

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

/**
 * Anything that turns a chat transcript into a single reply.
 */
export interface SuggestionClient {
  complete(messages: ChatMessage[]): Promise<string>;
}

export type OpenAiSuggestionClientOptions = {
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  retries: number;
  baseDelayMs?: number;
};

/* -----------------------------
        Helpers
----------------------------- */

export function classifyAIError(err: unknown): AiSuggestionError {
  if (err instanceof AiSuggestionError) return err;

  if (errorStatus(err) === 429) {
    return new AiSuggestionError(
      "AI_RATE_LIMITED",
      "Too many AI requests. Please try again shortly.",
      429,
      retryAfterMs(err)
    );
  }

  if (/timed out/i.test(errorMessage(err))) {
    return new AiSuggestionError("AI_TIMEOUT", "AI request timed out. Please retry.", 503);
  }

  return new AiSuggestionError(
    "AI_UNAVAILABLE",
    "AI service is temporarily unavailable.",
    503
  );
}

function safeErrMeta(err: unknown) {
  return {
    name: err instanceof Error ? err.name : undefined,
    message: errorMessage(err),
    status: errorStatus(err),
    code: errorCode(err)
  };
}

/* -----------------------------
        Main Export
----------------------------- */

export function createOpenAiSuggestionClient(
  opts: OpenAiSuggestionClientOptions
): SuggestionClient {
  return {
    async complete(messages) {
      const openai = getOpenAI(opts.apiKey);
      const start = Date.now();

      let content: string | null | undefined;
      try {
        const resp = await withRetries(
          (attempt) =>
            withTimeout(
              openai.chat.completions.create(
                { model: opts.model, temperature: opts.temperature, messages },
                // bounds the HTTP call too; withTimeout alone only stops waiting
                { timeout: opts.timeoutMs }
              ),
              opts.timeoutMs,
              `openai.chat.completions.create (attempt ${attempt})`
            ),
          { retries: opts.retries, baseDelayMs: opts.baseDelayMs }
        );
        content = resp.choices[0]?.message.content;
      } catch (err) {
        logger.error("[AI] Suggestion request failed", safeErrMeta(err));
        throw classifyAIError(err);
      }

      if (!content || content.trim() === "") {
        throw new AiSuggestionError(
          "AI_INVALID_RESPONSE",
          "AI service returned an empty suggestion.",
          502
        );
      }

      logger.info(`[AI] Suggestion generated in ${Date.now() - start}ms`, {
        model: opts.model
      });
      return content;
    }
  };
}
