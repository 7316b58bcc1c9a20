import dotenv from 'dotenv';
import path from 'path';

// Load environment variables
dotenv.config();

export type SummaryProviderType = 'openai' | 'anthropic' | 'gemini';

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // OpenAI
  openaiApiKey: string;
  openaiApiBase: string;
  openaiModel: string;

  // Transcription (OpenAI-compatible audio endpoint)
  transcriptionApiKey: string;
  transcriptionModel: string;

  // Anthropic
  anthropicApiKey: string;
  anthropicModel: string;

  // Gemini
  geminiApiKey: string;
  geminiModel: string;

  summaryProvider: SummaryProviderType;

  // File paths
  dataDir: string;
  jobsDir: string;
  workDir: string;

  // External tools
  ytDlpPath: string;
  ytDlpCookiesPath: string;
  ffmpegPath: string;
  ffprobePath: string;

  // Acquisition defaults
  subtitleLanguage: string;
  preferAutoSubtitles: boolean;
  maxTranscriptionDurationSeconds: number;
  keepArtifacts: boolean;

  // Summarization
  llmMaxRetries: number;
  summaryMaxChars: number;
}

type Env = Record<string, string | undefined>;

function getEnvString(env: Env, key: string, defaultValue: string = ''): string {
  return env[key] ?? defaultValue;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key]?.trim().toLowerCase();
  if (!value) return defaultValue;
  return value === '1' || value === 'true' || value === 'yes';
}

function getSummaryProvider(env: Env): SummaryProviderType {
  const value = getEnvString(env, 'SUMMARY_PROVIDER', 'gemini').toLowerCase();
  if (value === 'openai' || value === 'anthropic' || value === 'gemini') {
    return value;
  }
  throw new Error(`Unknown SUMMARY_PROVIDER "${value}" (expected openai, anthropic or gemini)`);
}

export function loadConfig(env: Env = process.env): Config {
  const dataDir = getEnvString(env, 'DATA_DIR', './data');
  const openaiApiKey = getEnvString(env, 'OPENAI_API_KEY');

  return {
    // Server
    port: getEnvNumber(env, 'PORT', 3001),
    nodeEnv: getEnvString(env, 'NODE_ENV', 'development'),

    // OpenAI
    openaiApiKey,
    openaiApiBase: getEnvString(env, 'OPENAI_API_BASE', 'https://api.openai.com/v1'),
    openaiModel: getEnvString(env, 'OPENAI_MODEL', 'gpt-4o'),

    // Transcription
    // A blank value (as dotenv reads `KEY=`) counts as unset
    transcriptionApiKey: getEnvString(env, 'TRANSCRIPTION_API_KEY').trim() || openaiApiKey,
    transcriptionModel: getEnvString(env, 'TRANSCRIPTION_MODEL', 'whisper-1'),

    // Anthropic
    anthropicApiKey: getEnvString(env, 'ANTHROPIC_API_KEY'),
    anthropicModel: getEnvString(env, 'ANTHROPIC_MODEL', 'claude-sonnet-4-20250514'),

    // Gemini
    geminiApiKey: getEnvString(env, 'GEMINI_API_KEY'),
    geminiModel: getEnvString(env, 'GEMINI_MODEL', 'gemini-2.0-flash'),

    summaryProvider: getSummaryProvider(env),

    // File paths
    dataDir,
    jobsDir: getEnvString(env, 'JOBS_DIR', path.join(dataDir, 'jobs')),
    workDir: getEnvString(env, 'WORK_DIR', path.join(dataDir, 'work')),

    // External tools
    ytDlpPath: getEnvString(env, 'YTDLP_PATH', 'yt-dlp'),
    ytDlpCookiesPath: getEnvString(env, 'YTDLP_COOKIES'),
    ffmpegPath: getEnvString(env, 'FFMPEG_PATH', 'ffmpeg'),
    ffprobePath: getEnvString(env, 'FFPROBE_PATH', 'ffprobe'),

    // Acquisition defaults
    subtitleLanguage: getEnvString(env, 'SUBTITLE_LANGUAGE', 'en'),
    preferAutoSubtitles: getEnvBoolean(env, 'PREFER_AUTO_SUBTITLES', false),
    maxTranscriptionDurationSeconds: getEnvNumber(env, 'MAX_TRANSCRIPTION_DURATION', 300),
    keepArtifacts: getEnvBoolean(env, 'KEEP_ARTIFACTS', false),

    // Summarization
    llmMaxRetries: getEnvNumber(env, 'LLM_MAX_RETRIES', 3),
    summaryMaxChars: getEnvNumber(env, 'SUMMARY_MAX_CHARS', 120000),
  };
}

/**
 * Returns the API key the configured summary provider authenticates with
 */
export function getSummaryApiKey(cfg: Config): string {
  switch (cfg.summaryProvider) {
    case 'openai':
      return cfg.openaiApiKey;
    case 'anthropic':
      return cfg.anthropicApiKey;
    case 'gemini':
      return cfg.geminiApiKey;
  }
}

export const config = loadConfig();
