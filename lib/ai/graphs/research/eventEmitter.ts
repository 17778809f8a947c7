// Event emitter for research progress tracking
// The server registers one and forwards events to connected sockets
import type { EventEmitter } from 'node:events';
import { errorMessage } from '../../../errors.js';
import { createLogger } from '../../../log.js';
import type { TokenUsage } from '../../usage.js';
import type { StageKey } from './contracts.js';

export type ResearchAction = {
  action: 'research_started' | 'research_complete' | 'research_failed';
  title: string;
  description: string;
  meta?: Record<string, unknown>;
  timestamp: string;
};

export type ResearchProgress = {
  stage: StageKey;
  title: string;
  step: number;
  totalSteps: number;
  query: string;
  usage: TokenUsage;
  timestamp: string;
};

const log = createLogger('research-events');

let emitter: EventEmitter | null = null;

// A failing listener must not abort the pipeline
function publish(name: 'action' | 'progress', event: ResearchAction | ResearchProgress) {
  if (!emitter) return;
  try {
    emitter.emit(name, event);
  } catch (error) {
    log.warn(`${name} listener failed:`, errorMessage(error));
  }
}

export function setResearchEmitter(eventEmitter: EventEmitter | null) {
  emitter = eventEmitter;
}

export function emitAction(
  action: ResearchAction['action'],
  title: string,
  description: string,
  meta?: Record<string, unknown>
) {
  publish('action', { action, title, description, meta, timestamp: new Date().toISOString() });
}

export function emitProgress(data: Omit<ResearchProgress, 'timestamp'>) {
  publish('progress', { ...data, timestamp: new Date().toISOString() });
}
