import { ChatOpenAI } from "@langchain/openai";

// routing classifies, analysis extracts structure, drafting writes prose.
export const MODEL_ALIASES = ["routing", "analysis", "drafting"] as const;
export type ModelAlias = (typeof MODEL_ALIASES)[number];

export type ModelSettings = {
  model: string;
  temperature: number;
  maxRetries: number;
};

const DEFAULT_SETTINGS: Record<ModelAlias, ModelSettings> = {
  routing: { model: "gpt-4o-mini", temperature: 0, maxRetries: 1 },
  analysis: { model: "gpt-4o", temperature: 0.2, maxRetries: 1 },
  drafting: { model: "gpt-4o", temperature: 0.7, maxRetries: 1 },
};

const flowSettings = new Map<ModelAlias, ModelSettings>();
const models = new Map<ModelAlias, ChatOpenAI>();

export function modelSettings(alias: ModelAlias): ModelSettings {
  return flowSettings.get(alias) ?? DEFAULT_SETTINGS[alias];
}

/**
 * Replace the settings behind an alias, typically from a flow file's `config.models`.
 * The next `getModel(alias)` builds a fresh client.
 */
export function setModelConfig(alias: ModelAlias, settings: ModelSettings): void {
  flowSettings.set(alias, settings);
  models.delete(alias);
}

// One ChatOpenAI per alias, created on first use.
export function getModel(alias: ModelAlias): ChatOpenAI {
  const cached = models.get(alias);
  if (cached) return cached;

  if (!process.env.OPENAI_API_KEY) {
    throw new Error(`OPENAI_API_KEY is required to create the "${alias}" model.`);
  }
  const model = new ChatOpenAI({ ...modelSettings(alias) });
  models.set(alias, model);
  return model;
}

export function resetModels(): void {
  flowSettings.clear();
  models.clear();
}
