import { GoogleGenAI } from '@google/genai';
import {
  LLMProvider,
  LLMProviderConfig,
  SummaryInput,
  SUMMARY_SYSTEM_PROMPT,
  buildSummaryPrompt,
} from './types';
import { callWithRetry } from './retry';

export class GeminiLLMProvider implements LLMProvider {
  readonly type = 'gemini' as const;
  private client: GoogleGenAI;
  private model: string;
  private maxRetries: number;
  private retryDelayMs: number;

  constructor(config: LLMProviderConfig) {
    if (config.type !== 'gemini') {
      throw new Error('Invalid config type for GeminiLLMProvider');
    }

    this.client = new GoogleGenAI({
      apiKey: config.apiKey,
    });
    this.model = config.model ?? 'gemini-2.0-flash';
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
  }

  async summarize(input: SummaryInput): Promise<string> {
    const prompt = buildSummaryPrompt(input);

    return callWithRetry('Gemini', this.maxRetries, this.retryDelayMs, async () => {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          systemInstruction: SUMMARY_SYSTEM_PROMPT,
          temperature: 0.3,
        },
      });

      const content = response.text?.trim();
      if (!content) {
        throw new Error('Empty response from Gemini');
      }

      return content;
    });
  }
}
