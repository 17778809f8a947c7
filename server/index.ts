import fs from 'fs';
import path from 'path';
import { createServer } from 'http';
import { EventEmitter } from 'events';
import { fileURLToPath } from 'url';
import { setResearchEmitter } from '../lib/ai/graphs/research/eventEmitter.js';
import { listAvailableModels } from '../lib/ai/models.js';
import { loadConfig } from '../lib/env.js';
import { createLogger } from '../lib/log.js';
import { AgentRegistry } from './agentRegistry.js';
import { createApp } from './app.js';
import { attachProgressSocket } from './progressSocket.js';
import { SlidingWindowRateLimiter } from './rateLimiter.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const log = createLogger('server');

// Sources run from server/, the build from dist/server/
const staticDir = [path.join(__dirname, '../public'), path.join(__dirname, '../../public')].find((dir) =>
  fs.existsSync(dir)
);

const config = loadConfig();

const registry = new AgentRegistry({ apiKey: config.googleApiKey });
const rateLimiter = new SlidingWindowRateLimiter({
  maxRequests: config.rateLimit.maxRequests,
  windowSeconds: config.rateLimit.windowSeconds
});

const app = createApp({
  config,
  registry,
  rateLimiter,
  listModels: () => listAvailableModels({ apiKey: config.googleApiKey }),
  staticDir
});

const server = createServer(app);

// Pipeline progress goes out over the WebSocket on the same port
export const researchEmitter = new EventEmitter();
setResearchEmitter(researchEmitter);
attachProgressSocket(server, researchEmitter);

if (!config.googleApiKey) {
  log.warn('GOOGLE_API_KEY is not set; research endpoints will answer 500 until it is configured');
}

server.listen(config.port, config.host, () => {
  log.info(`🚀 Research Agent running on http://localhost:${config.port}`);
  log.info('📡 WebSocket progress stream ready');
});
