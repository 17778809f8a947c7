// Single-shot research agent: one compressed prompt, retried on provider quota errors
import {
  createGeminiClient,
  type CompletionClient,
  type CompletionClientFactory
} from '../../lib/ai/clients.js';
import { emptyUsage, type TokenUsage } from '../../lib/ai/usage.js';
import { DEFAULT_MODEL, requireApiKey } from '../../lib/env.js';
import { errorMessage, isRateLimitError, truncate, type ConfigError } from '../../lib/errors.js';
import { createLogger } from '../../lib/log.js';
import { err, ok, type Result } from '../../lib/result.js';
import {
  PROMPT_CONCISE,
  QUOTA_EXCEEDED_MESSAGE,
  RESEARCH_CAPABILITIES,
  RESEARCH_ERROR_MESSAGE
} from './prompt.js';

const log = createLogger('research-agent');

export const DEFAULT_MAX_TOKENS = 512;
export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_RETRIES = 2;
const ERROR_DETAIL_CHARS = 200;

export type ResearchResult = Readonly<{
  text: string;
  usage: Readonly<TokenUsage>;
}>;

export type ResearchAgentInfo = {
  model: string;
  status: 'ready';
  capabilities: string[];
};

export type ResearchAgentOptions = {
  apiKey?: string;
  modelName?: string;
  maxTokens?: number;
  temperature?: number;
  clientFactory?: CompletionClientFactory;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const result = (text: string, usage: TokenUsage): ResearchResult =>
  Object.freeze({ text, usage: Object.freeze({ ...usage }) });

export class ResearchAgent {
  readonly modelName: string;
  readonly maxTokens: number;
  private readonly client: CompletionClient;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(client: CompletionClient, maxTokens: number, sleep: (ms: number) => Promise<void> = defaultSleep) {
    this.client = client;
    this.modelName = client.model;
    this.maxTokens = maxTokens;
    this.sleep = sleep;
  }

  /**
   * Answer a query in at most maxTokens/2 words.
   *
   * Never throws for provider failures: quota errors are retried with
   * 1s, 2s, 4s... backoff and then reported as text, any other error is
   * reported as text straight away. Both come back with zeroed usage.
   */
  async research(query: string, maxRetries: number = DEFAULT_MAX_RETRIES): Promise<ResearchResult> {
    const prompt = PROMPT_CONCISE(query, this.maxTokens);

    for (let attempt = 0; ; attempt++) {
      try {
        const { text, usage } = await this.client.complete(prompt, { maxOutputTokens: this.maxTokens });
        log.info(`${this.modelName} answered (${usage.total_tokens} tokens)`);
        return result(text, usage);
      } catch (error) {
        const message = errorMessage(error);

        if (!isRateLimitError(error)) {
          log.error('research failed:', message);
          return result(RESEARCH_ERROR_MESSAGE(truncate(message, ERROR_DETAIL_CHARS)), emptyUsage());
        }

        if (attempt >= maxRetries) {
          log.warn(`rate limited after ${attempt + 1} attempts, giving up`);
          return result(QUOTA_EXCEEDED_MESSAGE(truncate(message, ERROR_DETAIL_CHARS)), emptyUsage());
        }

        const waitMs = 2 ** attempt * 1000;
        log.warn(`Rate limit hit, retrying in ${waitMs / 1000} seconds...`);
        await this.sleep(waitMs);
      }
    }
  }

  getInfo(): ResearchAgentInfo {
    return {
      model: this.modelName,
      status: 'ready',
      capabilities: [...RESEARCH_CAPABILITIES]
    };
  }
}

export function createResearchAgent({
  apiKey,
  modelName = DEFAULT_MODEL,
  maxTokens = DEFAULT_MAX_TOKENS,
  temperature = DEFAULT_TEMPERATURE,
  clientFactory = createGeminiClient,
  sleep
}: ResearchAgentOptions): Result<ResearchAgent, ConfigError> {
  const key = requireApiKey(apiKey);
  if (!key.ok) return err(key.error);

  const client = clientFactory({ apiKey: key.data, model: modelName, temperature, maxOutputTokens: maxTokens });
  return ok(new ResearchAgent(client, maxTokens, sleep));
}
