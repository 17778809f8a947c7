import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { err, ok, type Result } from './result.js';

export const DEFAULT_MODEL = 'gemini-2.0-flash';

const EnvSchema = z.object({
  GOOGLE_API_KEY: z.string().trim().optional(),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  DEFAULT_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  DEFAULT_MAX_TOKENS: z.coerce.number().int().positive().default(512),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().positive().default(60)
});

export type AppConfig = {
  googleApiKey?: string;
  port: number;
  host: string;
  defaultModel: string;
  defaultMaxTokens: number;
  rateLimit: {
    maxRequests: number;
    windowSeconds: number;
  };
};

export const MISSING_API_KEY_MESSAGE =
  'GOOGLE_API_KEY not found in environment variables. Please set it in your .env file or environment.';

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat "" like an absent variable so defaults apply
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== '')
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }

  const e = parsed.data;
  return {
    googleApiKey: e.GOOGLE_API_KEY,
    port: e.PORT,
    host: e.HOST,
    defaultModel: e.DEFAULT_MODEL,
    defaultMaxTokens: e.DEFAULT_MAX_TOKENS,
    rateLimit: {
      maxRequests: e.RATE_LIMIT_MAX_REQUESTS,
      windowSeconds: e.RATE_LIMIT_WINDOW_SECONDS
    }
  };
}

export function requireApiKey(apiKey: string | undefined): Result<string, ConfigError> {
  if (!apiKey || !apiKey.trim()) return err(new ConfigError(MISSING_API_KEY_MESSAGE));
  return ok(apiKey.trim());
}
