import { LLMProvider, LLMProviderConfig, LLMProviderType, Summarizer } from './types';
import { OpenAILLMProvider } from './openaiProvider';
import { AnthropicLLMProvider } from './anthropicProvider';
import { GeminiLLMProvider } from './geminiProvider';
import { config, Config } from '../config';

/**
 * Creates an LLM provider from a custom config
 */
export function createLLMProviderFromConfig(providerConfig: LLMProviderConfig): LLMProvider {
  switch (providerConfig.type) {
    case 'openai':
      return new OpenAILLMProvider(providerConfig);
    case 'anthropic':
      return new AnthropicLLMProvider(providerConfig);
    case 'gemini':
      return new GeminiLLMProvider(providerConfig);
    default: {
      const unknownType: never = providerConfig.type;
      throw new Error(`Unknown LLM provider type: ${String(unknownType)}`);
    }
  }
}

/**
 * Model and endpoint settings for a provider type, without the credential
 */
export function providerSettings(
  providerType: LLMProviderType,
  cfg: Config = config
): Omit<LLMProviderConfig, 'apiKey'> {
  switch (providerType) {
    case 'openai':
      return {
        type: 'openai',
        model: cfg.openaiModel,
        apiBase: cfg.openaiApiBase,
        maxRetries: cfg.llmMaxRetries,
      };
    case 'anthropic':
      return { type: 'anthropic', model: cfg.anthropicModel, maxRetries: cfg.llmMaxRetries };
    case 'gemini':
      return { type: 'gemini', model: cfg.geminiModel, maxRetries: cfg.llmMaxRetries };
  }
}

/**
 * Summarizer backed by one provider type; the credential arrives per call
 */
export class ProviderSummarizer implements Summarizer {
  private settings: Omit<LLMProviderConfig, 'apiKey'>;
  private maxChars: number;
  private createProvider: (providerConfig: LLMProviderConfig) => LLMProvider;

  constructor(
    providerType: LLMProviderType = config.summaryProvider,
    options: {
      cfg?: Config;
      createProvider?: (providerConfig: LLMProviderConfig) => LLMProvider;
    } = {}
  ) {
    const cfg = options.cfg ?? config;
    this.settings = providerSettings(providerType, cfg);
    this.maxChars = cfg.summaryMaxChars;
    this.createProvider = options.createProvider ?? createLLMProviderFromConfig;
  }

  get providerType(): LLMProviderType {
    return this.settings.type;
  }

  async summarize(text: string, prompt: string, apiKey: string): Promise<string> {
    console.info(`[llm] Summarizing ${text.length} characters with ${this.settings.type}`);
    const provider = this.createProvider({ ...this.settings, apiKey });
    return provider.summarize({ transcript: text, prompt, maxChars: this.maxChars });
  }
}
