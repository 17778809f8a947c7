import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  GeminiCompletionClient,
  listGeminiModels,
  promptLength,
  toGeminiRequest,
  type ChatMessage
} from '../lib/ai/clients.js';

const { constructed, generateContent, getGenerativeModel, get } = vi.hoisted(() => {
  const generateContent = vi.fn();
  return {
    constructed: vi.fn(),
    generateContent,
    getGenerativeModel: vi.fn(() => ({ generateContent })),
    get: vi.fn()
  };
});

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    constructor(apiKey: string) {
      constructed(apiKey);
    }
    getGenerativeModel = getGenerativeModel;
  }
}));

vi.mock('axios', () => ({ default: { get } }));

const reply = (text: string, usageMetadata?: Record<string, number>) => ({
  response: { text: () => text, usageMetadata }
});

describe('toGeminiRequest', () => {
  it('wraps a plain prompt as one user turn', () => {
    expect(toGeminiRequest('hi')).toEqual({ contents: [{ role: 'user', parts: [{ text: 'hi' }] }] });
  });

  it('moves system messages into the system instruction', () => {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'Be brief' },
      { role: 'system', content: 'Cite' },
      { role: 'user', content: 'Q' },
      { role: 'assistant', content: 'A' },
      { role: 'user', content: 'Q2' }
    ];

    expect(toGeminiRequest(messages)).toEqual({
      contents: [
        { role: 'user', parts: [{ text: 'Q' }] },
        { role: 'model', parts: [{ text: 'A' }] },
        { role: 'user', parts: [{ text: 'Q2' }] }
      ],
      systemInstruction: 'Be brief\n\nCite'
    });
    expect(promptLength(messages)).toBe(16);
  });
});

describe('GeminiCompletionClient', () => {
  it('sends the prompt with default settings and reads usage metadata', async () => {
    generateContent.mockResolvedValueOnce(
      reply('Hello', { promptTokenCount: 4, candidatesTokenCount: 6, totalTokenCount: 10 })
    );
    const client = new GeminiCompletionClient({ apiKey: 'test-secret', model: 'gemini-2.0-flash' });

    const result = await client.complete('hi');

    expect(constructed).toHaveBeenCalledWith('test-secret');
    expect(getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      generationConfig: { temperature: 0.3, maxOutputTokens: 512 }
    });
    expect(generateContent).toHaveBeenCalledWith({ contents: [{ role: 'user', parts: [{ text: 'hi' }] }] });
    expect(result).toEqual({ text: 'Hello', usage: { prompt_tokens: 4, completion_tokens: 6, total_tokens: 10 } });
  });

  it('lets a call override the output budget', async () => {
    generateContent.mockResolvedValueOnce(reply('ok', { totalTokenCount: 3, promptTokenCount: 1, candidatesTokenCount: 2 }));
    const client = new GeminiCompletionClient({ apiKey: 'test-secret', model: 'gemini-1.5-pro', temperature: 0.7 });

    await client.complete('hi', { maxOutputTokens: 64 });

    expect(getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-1.5-pro',
      generationConfig: { temperature: 0.7, maxOutputTokens: 64 }
    });
  });

  it('estimates usage when the response has none', async () => {
    generateContent.mockResolvedValueOnce(reply('abcdefgh'));
    const client = new GeminiCompletionClient({ apiKey: 'test-secret', model: 'gemini-2.0-flash' });

    const { usage } = await client.complete('x'.repeat(20));

    expect(usage).toEqual({ prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 });
  });

  it('lets provider errors through', async () => {
    generateContent.mockRejectedValueOnce(new Error('[429 Too Many Requests] quota'));
    const client = new GeminiCompletionClient({ apiKey: 'test-secret', model: 'gemini-2.0-flash' });

    await expect(client.complete('hi')).rejects.toThrow('[429 Too Many Requests] quota');
  });
});

describe('listGeminiModels', () => {
  afterEach(() => get.mockReset());

  it('follows page tokens', async () => {
    get
      .mockResolvedValueOnce({ data: { models: [{ name: 'models/a' }], nextPageToken: 'p2' } })
      .mockResolvedValueOnce({ data: { models: [{ name: 'models/b', displayName: 'B' }] } });

    const models = await listGeminiModels('test-secret');

    expect(models).toEqual([{ name: 'models/a' }, { name: 'models/b', displayName: 'B' }]);
    expect(get).toHaveBeenCalledTimes(2);
    expect(get).toHaveBeenNthCalledWith(1, 'https://generativelanguage.googleapis.com/v1beta/models', {
      headers: { 'x-goog-api-key': 'test-secret' },
      params: { pageSize: 1000 },
      timeout: 30000
    });
    expect(get).toHaveBeenNthCalledWith(2, 'https://generativelanguage.googleapis.com/v1beta/models', {
      headers: { 'x-goog-api-key': 'test-secret' },
      params: { pageSize: 1000, pageToken: 'p2' },
      timeout: 30000
    });
  });

  it('stops after twenty pages', async () => {
    get.mockResolvedValue({ data: { models: [], nextPageToken: 'again' } });

    expect(await listGeminiModels('test-secret')).toEqual([]);
    expect(get).toHaveBeenCalledTimes(20);
  });

  it('rejects malformed listings', async () => {
    get.mockResolvedValueOnce({ data: { models: [{ displayName: 'no name' }] } });

    await expect(listGeminiModels('test-secret')).rejects.toThrow();
  });
});
