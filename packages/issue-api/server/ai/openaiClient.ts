import OpenAI from "openai";

let _openai: OpenAI | null = null;
let _openaiKey: string | null = null;

export function getOpenAI(apiKey: string | undefined) {
  if (!apiKey) {
    throw new Error(
      "OPENAI_API_KEY is missing. Set it in packages/issue-api/.env.local (dev) or the deployment env."
    );
  }

  if (!_openai || _openaiKey !== apiKey) {
    // retries and timeouts are handled by withRetries/withTimeout
    _openai = new OpenAI({ apiKey, maxRetries: 0 });
    _openaiKey = apiKey;
  }
  return _openai;
}
