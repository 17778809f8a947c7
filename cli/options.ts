import minimist from 'minimist';
import { err, ok, type Result } from '../lib/result.js';

export type CliOptions = {
  query?: string;
  deep: boolean;
  listModels: boolean;
  help: boolean;
  model: string;
  maxTokens: number;
};

export const USAGE = `Usage:
  Research:      npm start -- --q "Your question" [--model gemini-2.0-flash] [--max-tokens 512]
  Deep research: npm start -- --q "Your product question" --deep [--model gemini-2.0-flash]
  Models:        npm start -- --models`;

export function parseCliArgs(
  args: string[],
  defaults: { model: string; maxTokens: number }
): Result<CliOptions, string> {
  // npm forwards a bare "--" separator
  const argv = minimist(args.filter((a) => a !== '--'), {
    string: ['query', 'model', 'max-tokens'],
    boolean: ['deep', 'models', 'help'],
    alias: { q: 'query', d: 'deep', m: 'model', t: 'max-tokens', h: 'help' }
  });

  let maxTokens = defaults.maxTokens;
  const rawMaxTokens: unknown = argv['max-tokens'];
  if (typeof rawMaxTokens === 'string' && rawMaxTokens !== '') {
    maxTokens = Number(rawMaxTokens);
    if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
      return err(`--max-tokens must be a positive integer, got "${rawMaxTokens}"`);
    }
  }

  const query = typeof argv.query === 'string' && argv.query.trim() ? argv.query : undefined;
  const model = typeof argv.model === 'string' && argv.model.trim() ? argv.model.trim() : defaults.model;

  return ok({
    query,
    deep: argv.deep === true,
    listModels: argv.models === true,
    help: argv.help === true,
    model,
    maxTokens
  });
}
