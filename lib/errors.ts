// Error types and helpers shared by the agents and the gateway

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : text.substring(0, max);
}

/**
 * Provider quota / throttling errors. Gemini reports these as HTTP 429 with a
 * RESOURCE_EXHAUSTED status, either in the message or on a `status` field.
 */
export function isRateLimitError(error: unknown): boolean {
  const message = errorMessage(error);
  if (message.includes('429') || message.includes('RESOURCE_EXHAUSTED')) return true;

  if (typeof error === 'object' && error !== null && 'status' in error) {
    return error.status === 429;
  }
  return false;
}
