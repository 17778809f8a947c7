import axios from 'axios';
import { GoogleGenerativeAI, type Content, type GenerateContentRequest } from '@google/generative-ai';
import { z } from 'zod';
import { createLogger } from '../log.js';
import { extractUsage, type TokenUsage } from './usage.js';

const log = createLogger('gemini');

// --- Completion -----------------------------------------------------------
export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export type PromptInput = string | ChatMessage[];

export type GenerationSettings = {
  maxOutputTokens: number;
  temperature: number;
};

export type Completion = {
  text: string;
  usage: TokenUsage;
};

/** One round trip to a text-generation provider. Provider errors are thrown as-is. */
export interface CompletionClient {
  readonly model: string;
  complete(input: PromptInput, settings?: Partial<GenerationSettings>): Promise<Completion>;
}

export type CompletionClientConfig = {
  apiKey: string;
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
};

export type CompletionClientFactory = (config: CompletionClientConfig) => CompletionClient;

export function promptLength(input: PromptInput): number {
  if (typeof input === 'string') return input.length;
  return input.reduce((n, m) => n + m.content.length, 0);
}

export function toGeminiRequest(input: PromptInput): GenerateContentRequest {
  if (typeof input === 'string') {
    return { contents: [{ role: 'user', parts: [{ text: input }] }] };
  }

  const system = input.filter((m) => m.role === 'system').map((m) => m.content);
  const contents: Content[] = input
    .filter((m) => m.role !== 'system')
    .map((m) => ({ role: m.role === 'assistant' ? 'model' : 'user', parts: [{ text: m.content }] }));

  return system.length > 0 ? { contents, systemInstruction: system.join('\n\n') } : { contents };
}

export class GeminiCompletionClient implements CompletionClient {
  readonly model: string;
  private readonly genAI: GoogleGenerativeAI;
  private readonly defaults: GenerationSettings;

  constructor({ apiKey, model, temperature = 0.3, maxOutputTokens = 512 }: CompletionClientConfig) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.model = model;
    this.defaults = { temperature, maxOutputTokens };
  }

  async complete(input: PromptInput, settings: Partial<GenerationSettings> = {}): Promise<Completion> {
    const { temperature, maxOutputTokens } = { ...this.defaults, ...settings };
    const model = this.genAI.getGenerativeModel({
      model: this.model,
      generationConfig: { temperature, maxOutputTokens }
    });

    const result = await model.generateContent(toGeminiRequest(input));
    const text = result.response.text();
    const usage = extractUsage(result.response, promptLength(input), text);

    log.debug(`${this.model} -> ${text.length} chars`, usage);
    return { text, usage };
  }
}

export const createGeminiClient: CompletionClientFactory = (config) => new GeminiCompletionClient(config);

// --- Model listing (REST) -------------------------------------------------
const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';
const MAX_MODEL_PAGES = 20;

const ProviderModelSchema = z.object({
  name: z.string(),
  displayName: z.string().optional(),
  description: z.string().optional(),
  supportedGenerationMethods: z.array(z.string()).optional()
});

const ModelPageSchema = z.object({
  models: z.array(ProviderModelSchema).default([]),
  nextPageToken: z.string().optional()
});

export type ProviderModel = z.infer<typeof ProviderModelSchema>;

export async function listGeminiModels(apiKey: string): Promise<ProviderModel[]> {
  const models: ProviderModel[] = [];
  let pageToken: string | undefined;

  for (let page = 0; page < MAX_MODEL_PAGES; page++) {
    const { data } = await axios.get(`${GEMINI_API_BASE}/models`, {
      headers: { 'x-goog-api-key': apiKey },
      params: { pageSize: 1000, ...(pageToken ? { pageToken } : {}) },
      timeout: 30000
    });

    const parsed = ModelPageSchema.parse(data);
    models.push(...parsed.models);
    pageToken = parsed.nextPageToken;
    if (!pageToken) break;
  }
  return models;
}
