import fs from 'fs';
import path from 'path';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { ModelDescriptor } from '../lib/ai/models.js';
import type { AppConfig } from '../lib/env.js';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/log.js';
import type { AgentRegistry } from './agentRegistry.js';
import type { SlidingWindowRateLimiter } from './rateLimiter.js';

const log = createLogger('api');

export const API_VERSION = '0.1.0';

export type AppDeps = {
  config: AppConfig;
  registry: AgentRegistry;
  rateLimiter: SlidingWindowRateLimiter;
  listModels: () => Promise<ModelDescriptor[]>;
  staticDir?: string;
};

const researchRequestSchema = (config: AppConfig) =>
  z.object({
    query: z.string().refine((q) => q.trim().length > 0, 'query must be a non-empty string'),
    model: z.string().trim().min(1).default(config.defaultModel),
    max_tokens: z.number().int().positive().default(config.defaultMaxTokens)
  });

// Express 4 does not forward rejected promises to the error middleware
const route =
  (handler: (req: Request, res: Response) => Promise<unknown>) =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

export function createApp({ config, registry, rateLimiter, listModels, staticDir }: AppDeps): Express {
  const app = express();
  const ResearchRequest = researchRequestSchema(config);

  app.use(express.json());
  if (staticDir && fs.existsSync(staticDir)) {
    app.use('/static', express.static(staticDir));
  }

  // Parses the body or answers 400; returns null when the response is already sent
  const parseResearchRequest = (req: Request, res: Response) => {
    const parsed = ResearchRequest.safeParse(req.body ?? {});
    if (parsed.success) return parsed.data;

    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
    res.status(400).json({ error: `Invalid request: ${issues}` });
    return null;
  };

  // Global limiter, consulted before any provider call
  const admit = (res: Response): boolean => {
    const decision = rateLimiter.check();
    if (decision.allowed) return true;

    log.warn(`rate limited, retry after ${decision.retryAfterSeconds}s`);
    res.setHeader('Retry-After', String(decision.retryAfterSeconds));
    res.status(429).json({
      error: rateLimiter.rejectionMessage(decision.retryAfterSeconds),
      retry_after: decision.retryAfterSeconds
    });
    return false;
  };

  app.get('/', (_req: Request, res: Response) => {
    const indexPath = staticDir ? path.join(staticDir, 'index.html') : undefined;
    if (indexPath && fs.existsSync(indexPath)) {
      return res.sendFile(indexPath);
    }
    res.json({
      message: 'Research Agent API',
      version: API_VERSION,
      endpoints: ['GET /health', 'GET /agent/info', 'GET /models', 'POST /research', 'POST /deep-research']
    });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', message: 'Research Agent is running', version: API_VERSION });
  });

  app.get('/agent/info', (_req: Request, res: Response) => {
    const agent = registry.getAgent(config.defaultModel, config.defaultMaxTokens);
    if (!agent.ok) {
      return res.json({
        status: 'not_configured',
        message: 'Agent not configured. Please set GOOGLE_API_KEY environment variable.'
      });
    }

    const deep = registry.getDeepAgent(config.defaultModel);
    res.json({
      ...agent.data.getInfo(),
      ...(deep.ok ? { deep_research: deep.data.getInfo() } : {})
    });
  });

  app.get('/models', route(async (_req, res) => {
    const models = await listModels();
    if (models.length === 0) {
      return res.status(500).json({ error: 'Could not fetch models. Please check GOOGLE_API_KEY.' });
    }
    res.json({ models });
  }));

  app.post('/research', route(async (req, res) => {
    const body = parseResearchRequest(req, res);
    if (!body || !admit(res)) return;

    const agent = registry.getAgent(body.model, body.max_tokens);
    if (!agent.ok) return res.status(500).json({ error: agent.error.message });

    log.info(`research model=${body.model} max_tokens=${body.max_tokens}`);
    const { text, usage } = await agent.data.research(body.query);

    res.json({
      query: body.query,
      result: text,
      model: agent.data.modelName,
      token_usage: usage
    });
  }));

  app.post('/deep-research', route(async (req, res) => {
    const body = parseResearchRequest(req, res);
    if (!body || !admit(res)) return;

    // max_tokens is accepted but unused: stage budgets are fixed by the pipeline
    const agent = registry.getDeepAgent(body.model);
    if (!agent.ok) return res.status(500).json({ error: agent.error.message });

    log.info(`deep research model=${body.model}`);
    const { report, meta } = await agent.data.deepResearch(body.query);

    res.json({
      query: body.query,
      result: report,
      model: agent.data.modelName,
      mode: meta.mode,
      steps_completed: meta.steps_completed,
      token_usage: meta.usage
    });
  }));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(error);
    if (status >= 500) log.error('Unhandled error:', error);
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : errorMessage(error) });
  });

  return app;
}
