import { z } from 'zod';

export type TokenUsage = {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
};

export const emptyUsage = (): TokenUsage => ({
  prompt_tokens: 0,
  completion_tokens: 0,
  total_tokens: 0
});

// ~4 characters per token
export const estimateTokens = (chars: number): number => Math.floor(chars / 4);

export function estimateUsage(promptChars: number, completionChars: number): TokenUsage {
  const prompt = estimateTokens(promptChars);
  const completion = estimateTokens(completionChars);
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: prompt + completion };
}

export function addUsage(running: TokenUsage, delta: TokenUsage): TokenUsage {
  const prompt = running.prompt_tokens + delta.prompt_tokens;
  const completion = running.completion_tokens + delta.completion_tokens;
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: prompt + completion };
}

// Anything that isn't a non-negative integer reads as 0
const Count = z.number().int().nonnegative().catch(0);

// Gemini SDK responses are camelCase, raw REST dumps may be snake_case
const CountFields = z.object({
  promptTokenCount: Count,
  candidatesTokenCount: Count,
  totalTokenCount: Count,
  prompt_token_count: Count,
  candidates_token_count: Count,
  total_token_count: Count
});

function readCounts(source: unknown): TokenUsage {
  const parsed = CountFields.safeParse(source);
  if (!parsed.success) return emptyUsage();
  const c = parsed.data;
  return {
    prompt_tokens: c.promptTokenCount || c.prompt_token_count,
    completion_tokens: c.candidatesTokenCount || c.candidates_token_count,
    total_tokens: c.totalTokenCount || c.total_token_count
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Token usage for one completion call.
 *
 * Looks at the structured usage metadata first, then at flat count fields on
 * the response itself, and only when both report a total of zero falls back
 * to a character-count estimate of the prompt and the generated text.
 */
export function extractUsage(response: unknown, promptChars: number, completionText: string): TokenUsage {
  let usage = emptyUsage();

  if (isRecord(response)) {
    usage = readCounts(response.usageMetadata ?? response.usage_metadata);
    if (usage.total_tokens === 0) usage = readCounts(response);
  }

  if (usage.total_tokens === 0) {
    usage = estimateUsage(promptChars, completionText.length);
  }
  return usage;
}
