// Deep research for product-management questions: seven chained completion calls
import { createGeminiClient, type CompletionClient, type CompletionClientFactory } from '../../clients.js';
import { addUsage, emptyUsage } from '../../usage.js';
import { DEFAULT_MODEL, requireApiKey } from '../../../env.js';
import { errorMessage, type ConfigError } from '../../../errors.js';
import { createLogger } from '../../../log.js';
import { err, ok, type Result } from '../../../result.js';
import {
  DEEP_RESEARCH_ERROR_REPORT,
  DEEP_RESEARCH_FEATURES,
  STAGES,
  initialState,
  renderReport,
  type DeepResearchInfo,
  type DeepResearchResult,
  type PipelineState
} from './contracts.js';
import { emitAction, emitProgress } from './eventEmitter.js';

const log = createLogger('deep-research');

export const DEEP_RESEARCH_TEMPERATURE = 0.7;
// Stage outputs are long; this budget does not follow the request's max_tokens
export const DEEP_RESEARCH_MAX_OUTPUT_TOKENS = 8192;

export type DeepResearchAgentOptions = {
  apiKey?: string;
  modelName?: string;
  temperature?: number;
  clientFactory?: CompletionClientFactory;
};

export class DeepResearchAgent {
  readonly modelName: string;
  private readonly client: CompletionClient;

  constructor(client: CompletionClient) {
    this.client = client;
    this.modelName = client.model;
  }

  /**
   * Run every stage in order. Each stage sees the outputs written by the
   * stages before it and adds its call's tokens to the running usage.
   * Any failure discards the partial state and yields one error report;
   * how far it got is only reported through logs and the failure event.
   */
  async deepResearch(query: string): Promise<DeepResearchResult> {
    const startTime = Date.now();
    const state: PipelineState = initialState(query, emptyUsage());
    let completed = 0;

    emitAction('research_started', 'Deep research started', query, { model: this.modelName });

    try {
      for (const stage of STAGES) {
        log.info(`Step ${completed + 1}/${STAGES.length}: ${stage.title}...`);

        const { text, usage } = await this.client.complete([{ role: 'user', content: stage.prompt(state) }]);
        state[stage.output] = text;
        state.current_step = stage.title;
        state.usage = addUsage(state.usage, usage);
        completed++;

        emitProgress({
          stage: stage.key,
          title: stage.title,
          step: completed,
          totalSteps: STAGES.length,
          query,
          usage: state.usage
        });
      }

      state.final_report = renderReport(state);
      state.current_step = 'Synthesis Complete';

      log.info(`Completed in ${Date.now() - startTime}ms, ${state.usage.total_tokens} tokens`);
      emitAction('research_complete', 'Deep research complete', query, { usage: state.usage });

      return {
        report: state.final_report,
        meta: {
          steps_completed: STAGES.length,
          model: this.modelName,
          mode: 'deep_research',
          usage: state.usage
        }
      };
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Failed at step ${completed + 1}:`, message);
      emitAction('research_failed', 'Deep research failed', message, { steps_completed: completed });

      return {
        report: DEEP_RESEARCH_ERROR_REPORT(message),
        meta: {
          steps_completed: STAGES.length,
          model: this.modelName,
          mode: 'deep_research',
          usage: emptyUsage(),
          error: message
        }
      };
    }
  }

  getInfo(): DeepResearchInfo {
    return {
      mode: 'deep_research',
      model: this.modelName,
      workflow_steps: STAGES.length,
      optimized_for: 'Product Management',
      features: [...DEEP_RESEARCH_FEATURES]
    };
  }
}

export function createDeepResearchAgent({
  apiKey,
  modelName = DEFAULT_MODEL,
  temperature = DEEP_RESEARCH_TEMPERATURE,
  clientFactory = createGeminiClient
}: DeepResearchAgentOptions): Result<DeepResearchAgent, ConfigError> {
  const key = requireApiKey(apiKey);
  if (!key.ok) return err(key.error);

  const client = clientFactory({
    apiKey: key.data,
    model: modelName,
    temperature,
    maxOutputTokens: DEEP_RESEARCH_MAX_OUTPUT_TOKENS
  });
  return ok(new DeepResearchAgent(client));
}
