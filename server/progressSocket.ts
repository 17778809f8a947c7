// Broadcast deep-research progress to every connected WebSocket client
import type { EventEmitter } from 'events';
import type { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { ResearchAction, ResearchProgress } from '../lib/ai/graphs/research/eventEmitter.js';
import { createLogger } from '../lib/log.js';

const log = createLogger('ws');

export function attachProgressSocket(server: Server, researchEmitter: EventEmitter): WebSocketServer {
  const wss = new WebSocketServer({ server });
  const clients = new Set<WebSocket>();

  wss.on('connection', (ws: WebSocket) => {
    clients.add(ws);
    log.debug(`client connected (${clients.size})`);

    ws.on('error', (error) => log.warn('socket error:', error.message));
    ws.on('close', () => {
      clients.delete(ws);
      log.debug(`client disconnected (${clients.size})`);
    });
  });

  const broadcast = (type: 'AGENT_ACTION' | 'RESEARCH_PROGRESS', event: ResearchAction | ResearchProgress) => {
    const message = JSON.stringify({ type, ...event });
    for (const ws of clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(message);
    }
  };

  const actionHandler = (action: ResearchAction) => broadcast('AGENT_ACTION', action);
  const progressHandler = (progress: ResearchProgress) => broadcast('RESEARCH_PROGRESS', progress);

  researchEmitter.on('action', actionHandler);
  researchEmitter.on('progress', progressHandler);

  wss.on('close', () => {
    researchEmitter.off('action', actionHandler);
    researchEmitter.off('progress', progressHandler);
  });

  return wss;
}
