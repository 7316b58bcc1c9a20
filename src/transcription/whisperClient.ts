import OpenAI from 'openai';
import fs from 'fs';
import { config } from '../config';
import { TranscriptionApi } from './types';

export interface WhisperClientConfig {
  apiBase: string;
  model: string;
}

/**
 * OpenAI-compatible audio transcription endpoint
 */
export class WhisperClient implements TranscriptionApi {
  private apiBase: string;
  private model: string;
  private cached: { apiKey: string; client: OpenAI } | null = null;

  constructor(clientConfig?: Partial<WhisperClientConfig>) {
    this.apiBase = clientConfig?.apiBase ?? config.openaiApiBase;
    this.model = clientConfig?.model ?? config.transcriptionModel;
  }

  async transcribe(audioPath: string, apiKey: string): Promise<string> {
    console.info(`[transcription] Transcribing ${audioPath} with ${this.model}`);

    const transcript = await this.getClient(apiKey).audio.transcriptions.create({
      model: this.model,
      file: fs.createReadStream(audioPath),
    });

    return transcript.text;
  }

  private getClient(apiKey: string): OpenAI {
    if (this.cached?.apiKey === apiKey) {
      return this.cached.client;
    }

    const client = new OpenAI({ apiKey, baseURL: this.apiBase });
    this.cached = { apiKey, client };
    return client;
  }
}
