// Lazily built agents, one per configuration. Entries live for the whole process.
import { createResearchAgent, type ResearchAgent } from '../agents/research/index.js';
import type { CompletionClientFactory } from '../lib/ai/clients.js';
import { createDeepResearchAgent, type DeepResearchAgent } from '../lib/ai/graphs/research/graph.js';
import type { ConfigError } from '../lib/errors.js';
import { createLogger } from '../lib/log.js';
import { ok, type Result } from '../lib/result.js';

const log = createLogger('registry');

export type AgentRegistryOptions = {
  apiKey?: string;
  clientFactory?: CompletionClientFactory;
};

export class AgentRegistry {
  private readonly apiKey?: string;
  private readonly clientFactory?: CompletionClientFactory;
  private readonly agents = new Map<string, ResearchAgent>();
  private readonly deepAgents = new Map<string, DeepResearchAgent>();

  constructor({ apiKey, clientFactory }: AgentRegistryOptions = {}) {
    this.apiKey = apiKey;
    this.clientFactory = clientFactory;
  }

  /** Single-shot agent for (model, maxTokens). Configuration failures are not cached. */
  getAgent(modelName: string, maxTokens: number): Result<ResearchAgent, ConfigError> {
    const key = JSON.stringify([modelName, maxTokens]);
    const cached = this.agents.get(key);
    if (cached) return ok(cached);

    const created = createResearchAgent({
      apiKey: this.apiKey,
      modelName,
      maxTokens,
      clientFactory: this.clientFactory
    });
    if (created.ok) {
      this.agents.set(key, created.data);
      log.info(`created research agent ${modelName} (max ${maxTokens} tokens)`);
    }
    return created;
  }

  getDeepAgent(modelName: string): Result<DeepResearchAgent, ConfigError> {
    const cached = this.deepAgents.get(modelName);
    if (cached) return ok(cached);

    const created = createDeepResearchAgent({
      apiKey: this.apiKey,
      modelName,
      clientFactory: this.clientFactory
    });
    if (created.ok) {
      this.deepAgents.set(modelName, created.data);
      log.info(`created deep research agent ${modelName}`);
    }
    return created;
  }

  get size(): { agents: number; deepAgents: number } {
    return { agents: this.agents.size, deepAgents: this.deepAgents.size };
  }
}
