import type { SummaryProviderType } from '../config';

/**
 * Supported LLM provider types
 */
export type LLMProviderType = SummaryProviderType;

/**
 * Configuration for an LLM provider
 */
export interface LLMProviderConfig {
  type: LLMProviderType;
  apiKey: string;
  model?: string;
  apiBase?: string;
  maxRetries?: number;
  /** First backoff delay; doubles on every further attempt */
  retryDelayMs?: number;
}

/**
 * Input for transcript summarization
 */
export interface SummaryInput {
  /** Normalized transcript text */
  transcript: string;
  /** Caller-supplied instruction, e.g. "List the key arguments" */
  prompt: string;
  /** Transcripts longer than this are truncated before being sent */
  maxChars?: number;
}

/**
 * LLM Provider interface - all providers must implement this
 */
export interface LLMProvider {
  /**
   * Provider type identifier
   */
  readonly type: LLMProviderType;

  /**
   * Summarizes a transcript following the caller's prompt
   * @returns Summary text
   */
  summarize(input: SummaryInput): Promise<string>;
}

/**
 * Summarization capability consumed by the pipeline
 */
export interface Summarizer {
  summarize(text: string, prompt: string, apiKey: string): Promise<string>;
}

export const SUMMARY_SYSTEM_PROMPT =
  'You summarize video transcripts. Follow the user instruction exactly and base every statement on the transcript. Reply in plain text.';

const TRUNCATION_MARKER = '\n[...truncated...]';

/**
 * Cuts a transcript to at most maxChars, marking the cut
 */
export function truncateTranscript(transcript: string, maxChars?: number): string {
  if (!maxChars || transcript.length <= maxChars) {
    return transcript;
  }
  return transcript.slice(0, maxChars) + TRUNCATION_MARKER;
}

/**
 * Prompt template for transcript summarization
 */
export function buildSummaryPrompt(input: SummaryInput): string {
  return `INSTRUCTION:
${input.prompt.trim()}

TRANSCRIPT:
${truncateTranscript(input.transcript, input.maxChars)}`;
}
