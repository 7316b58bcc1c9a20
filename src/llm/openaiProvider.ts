import OpenAI from 'openai';
import {
  LLMProvider,
  LLMProviderConfig,
  SummaryInput,
  SUMMARY_SYSTEM_PROMPT,
  buildSummaryPrompt,
} from './types';
import { callWithRetry } from './retry';

export class OpenAILLMProvider implements LLMProvider {
  readonly type = 'openai' as const;
  private client: OpenAI;
  private model: string;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'openai') {
      throw new Error('Invalid config type for OpenAILLMProvider');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
    });
    this.model = config.model ?? 'gpt-4o';
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
  }

  async summarize(input: SummaryInput): Promise<string> {
    const prompt = buildSummaryPrompt(input);

    return callWithRetry('OpenAI', this.maxRetries, this.retryDelayMs, async () => {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: 0.3,
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new Error('Empty response from OpenAI');
      }

      return content;
    });
  }
}
