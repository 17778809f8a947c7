// Model catalog: provider listing tagged with a name-based price tier, cheapest first
import { createLogger } from '../log.js';
import { errorMessage } from '../errors.js';
import { listGeminiModels, type ProviderModel } from './clients.js';

const log = createLogger('models');

export type ModelDescriptor = {
  name: string;
  display_name: string;
  description: string;
  price_tier: number;
  price_indicator: string;
};

/** 0 = cheapest. Experimental builds first, then flash, pro, ultra. */
export function getModelPriceTier(modelName: string): number {
  const name = modelName.toLowerCase();
  if (name.includes('exp')) return 0;
  if (name.includes('flash')) return 1;
  if (name.includes('pro')) return 2;
  if (name.includes('ultra')) return 3;
  return 1;
}

export function getPriceIndicator(tier: number): string {
  return tier < 3 ? '💰'.repeat(tier + 1) : '💰💰💰+';
}

export const FALLBACK_MODELS: readonly ModelDescriptor[] = [
  {
    name: 'gemini-1.5-flash',
    display_name: 'Gemini 1.5 Flash',
    description: 'Fast and efficient model',
    price_tier: 1,
    price_indicator: '💰💰'
  },
  {
    name: 'gemini-1.5-pro',
    display_name: 'Gemini 1.5 Pro',
    description: 'Advanced model for complex tasks',
    price_tier: 2,
    price_indicator: '💰💰💰'
  }
];

// Models without capability metadata are kept
export function isTextGenerationModel(model: ProviderModel): boolean {
  if (!model.supportedGenerationMethods) return true;
  return model.supportedGenerationMethods.includes('generateContent');
}

export function toModelDescriptor(model: ProviderModel): ModelDescriptor {
  const name = model.name.replace('models/', '');
  const tier = getModelPriceTier(name);
  return {
    name,
    display_name: model.displayName || name,
    description: model.description ?? '',
    price_tier: tier,
    price_indicator: getPriceIndicator(tier)
  };
}

export type ModelCatalogOptions = {
  apiKey?: string;
  fetchModels?: (apiKey: string) => Promise<ProviderModel[]>;
};

export async function listAvailableModels({
  apiKey,
  fetchModels = listGeminiModels
}: ModelCatalogOptions): Promise<ModelDescriptor[]> {
  if (!apiKey) return [];

  try {
    const models = (await fetchModels(apiKey))
      .filter(isTextGenerationModel)
      .map(toModelDescriptor);

    // Array.prototype.sort is stable, so ties keep listing order
    models.sort((a, b) => a.price_tier - b.price_tier);
    log.debug(`listed ${models.length} models`);
    return models;
  } catch (error) {
    log.warn('Error listing models, using fallback list:', errorMessage(error));
    return FALLBACK_MODELS.map((m) => ({ ...m }));
  }
}
