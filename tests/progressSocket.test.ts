import { EventEmitter } from 'events';
import { createServer, type Server } from 'http';
import { afterEach, describe, expect, it } from 'vitest';
import { WebSocket, type WebSocketServer } from 'ws';
import { attachProgressSocket } from '../server/progressSocket.js';

let server: Server | undefined;
let wss: WebSocketServer | undefined;
const sockets: WebSocket[] = [];

async function start(emitter: EventEmitter): Promise<string> {
  const httpServer = createServer();
  server = httpServer;
  wss = attachProgressSocket(httpServer, emitter);
  await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
  const address = httpServer.address();
  if (!address || typeof address === 'string') throw new Error('server has no port');
  return `ws://127.0.0.1:${address.port}`;
}

async function connect(url: string): Promise<WebSocket> {
  const ws = new WebSocket(url);
  sockets.push(ws);
  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });
  return ws;
}

const nextMessage = (ws: WebSocket) =>
  new Promise<unknown>((resolve) => ws.once('message', (data) => resolve(JSON.parse(data.toString()))));

afterEach(async () => {
  for (const ws of sockets.splice(0)) ws.terminate();
  const currentWss = wss;
  const currentServer = server;
  wss = undefined;
  server = undefined;
  if (currentWss) await new Promise<void>((resolve) => currentWss.close(() => resolve()));
  if (currentServer) await new Promise<void>((resolve) => currentServer.close(() => resolve()));
});

describe('attachProgressSocket', () => {
  it('broadcasts progress to every client', async () => {
    const emitter = new EventEmitter();
    const url = await start(emitter);
    const a = await connect(url);
    const b = await connect(url);

    const received = Promise.all([nextMessage(a), nextMessage(b)]);
    emitter.emit('progress', { stage: 'plan', title: 'Planning', step: 1, totalSteps: 7 });

    expect(await received).toEqual([
      { type: 'RESEARCH_PROGRESS', stage: 'plan', title: 'Planning', step: 1, totalSteps: 7 },
      { type: 'RESEARCH_PROGRESS', stage: 'plan', title: 'Planning', step: 1, totalSteps: 7 }
    ]);
  });

  it('tags lifecycle events as agent actions', async () => {
    const emitter = new EventEmitter();
    const ws = await connect(await start(emitter));

    const received = nextMessage(ws);
    emitter.emit('action', { action: 'research_started', title: 'Deep research started', description: 'q' });

    expect(await received).toEqual({
      type: 'AGENT_ACTION',
      action: 'research_started',
      title: 'Deep research started',
      description: 'q'
    });
  });

  it('stops listening when the socket server closes', async () => {
    const emitter = new EventEmitter();
    await start(emitter);
    expect(emitter.listenerCount('progress')).toBe(1);

    const currentWss = wss;
    wss = undefined;
    if (currentWss) await new Promise<void>((resolve) => currentWss.close(() => resolve()));

    expect(emitter.listenerCount('progress')).toBe(0);
    expect(emitter.listenerCount('action')).toBe(0);
  });
});
