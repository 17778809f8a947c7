#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { createResearchAgent } from './agents/research/index.js';
import { USAGE, parseCliArgs } from './cli/options.js';
import { createDeepResearchAgent } from './lib/ai/graphs/research/graph.js';
import { listAvailableModels } from './lib/ai/models.js';
import { loadConfig } from './lib/env.js';
import { errorMessage } from './lib/errors.js';

async function main() {
  const config = loadConfig();
  const parsed = parseCliArgs(process.argv.slice(2), {
    model: config.defaultModel,
    maxTokens: config.defaultMaxTokens
  });

  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exit(1);
  }
  const options = parsed.data;

  if (options.help) {
    console.log(USAGE);
    return;
  }

  if (options.listModels) {
    const models = await listAvailableModels({ apiKey: config.googleApiKey });
    if (models.length === 0) {
      console.error('No models available. Please check GOOGLE_API_KEY.');
      process.exit(1);
    }
    for (const m of models) {
      console.log(`${m.price_indicator.padEnd(8)} ${m.name}  ${m.display_name}`);
    }
    return;
  }

  if (!options.query) {
    console.error(USAGE);
    process.exit(1);
  }

  if (options.deep) {
    const agent = createDeepResearchAgent({ apiKey: config.googleApiKey, modelName: options.model });
    if (!agent.ok) {
      console.error(`❌ ${agent.error.message}`);
      process.exit(1);
    }

    console.log(`🚀 Deep research with ${options.model} (7 steps)...\n`);
    const { report, meta } = await agent.data.deepResearch(options.query);

    console.log(report);
    console.log('\n=== META ===');
    console.log(meta);

    if (meta.error) process.exit(1);

    // --- Save Markdown to disk ---
    const outDir = path.resolve('generated_files');
    if (!fs.existsSync(outDir)) fs.mkdirSync(outDir, { recursive: true });
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const filePath = path.join(outDir, `report-${timestamp}.md`);
    fs.writeFileSync(filePath, report, 'utf8');
    console.log(`\nMarkdown report saved to: ${filePath}`);
    return;
  }

  const agent = createResearchAgent({
    apiKey: config.googleApiKey,
    modelName: options.model,
    maxTokens: options.maxTokens
  });
  if (!agent.ok) {
    console.error(`❌ ${agent.error.message}`);
    process.exit(1);
  }

  const { text, usage } = await agent.data.research(options.query);
  console.log(text);
  console.log(`\n=== TOKENS === prompt ${usage.prompt_tokens}, completion ${usage.completion_tokens}, total ${usage.total_tokens}`);
}

main().catch((e) => {
  console.error('Fatal error:', errorMessage(e));
  process.exit(1);
});
