import { describe, expect, it } from 'vitest';
import { addUsage, emptyUsage, estimateTokens, extractUsage } from '../lib/ai/usage.js';

describe('extractUsage', () => {
  it('reads camelCase usage metadata', () => {
    const response = {
      usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 30, totalTokenCount: 42 }
    };
    expect(extractUsage(response, 1000, 'ignored')).toEqual({
      prompt_tokens: 12,
      completion_tokens: 30,
      total_tokens: 42
    });
  });

  it('reads snake_case usage metadata', () => {
    const response = {
      usage_metadata: { prompt_token_count: 5, candidates_token_count: 7, total_token_count: 12 }
    };
    expect(extractUsage(response, 0, '')).toEqual({ prompt_tokens: 5, completion_tokens: 7, total_tokens: 12 });
  });

  it('falls back to count fields on the response itself', () => {
    const response = { promptTokenCount: 3, candidatesTokenCount: 4, totalTokenCount: 7 };
    expect(extractUsage(response, 0, '')).toEqual({ prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 });
  });

  it('estimates from character counts when no source reports a total', () => {
    const response = { usageMetadata: { totalTokenCount: 0 } };
    expect(extractUsage(response, 41, 'abcdefghij')).toEqual({
      prompt_tokens: 10,
      completion_tokens: 2,
      total_tokens: 12
    });
  });

  it('estimates for responses that are not objects', () => {
    expect(extractUsage(null, 8, 'abcd')).toEqual({ prompt_tokens: 2, completion_tokens: 1, total_tokens: 3 });
  });

  it('reads malformed counts as zero', () => {
    const response = {
      usageMetadata: { promptTokenCount: -3, candidatesTokenCount: 'many', totalTokenCount: 9 }
    };
    expect(extractUsage(response, 400, 'x')).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 9 });
  });
});

describe('usage arithmetic', () => {
  it('estimates about four characters per token', () => {
    expect(estimateTokens(0)).toBe(0);
    expect(estimateTokens(3)).toBe(0);
    expect(estimateTokens(17)).toBe(4);
  });

  it('adds usage and recomputes the total', () => {
    const running = { prompt_tokens: 1, completion_tokens: 2, total_tokens: 99 };
    expect(addUsage(running, { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 })).toEqual({
      prompt_tokens: 4,
      completion_tokens: 6,
      total_tokens: 10
    });
  });

  it('returns a fresh zero usage each time', () => {
    const a = emptyUsage();
    a.total_tokens = 5;
    expect(emptyUsage()).toEqual({ prompt_tokens: 0, completion_tokens: 0, total_tokens: 0 });
  });
});
