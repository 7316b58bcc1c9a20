import Anthropic from '@anthropic-ai/sdk';
import {
  LLMProvider,
  LLMProviderConfig,
  SummaryInput,
  SUMMARY_SYSTEM_PROMPT,
  buildSummaryPrompt,
} from './types';
import { callWithRetry } from './retry';

export class AnthropicLLMProvider implements LLMProvider {
  readonly type = 'anthropic' as const;
  private client: Anthropic;
  private model: string;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'anthropic') {
      throw new Error('Invalid config type for AnthropicLLMProvider');
    }

    this.client = new Anthropic({
      apiKey: config.apiKey,
    });
    this.model = config.model ?? 'claude-sonnet-4-20250514';
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
  }

  async summarize(input: SummaryInput): Promise<string> {
    const prompt = buildSummaryPrompt(input);

    return callWithRetry('Anthropic', this.maxRetries, this.retryDelayMs, async () => {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: 4096,
        system: SUMMARY_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: prompt }],
      });

      const parts: string[] = [];
      for (const block of response.content) {
        if (block.type === 'text') {
          parts.push(block.text);
        }
      }

      const content = parts.join('').trim();
      if (!content) {
        throw new Error('Empty response from Anthropic');
      }

      return content;
    });
  }
}
