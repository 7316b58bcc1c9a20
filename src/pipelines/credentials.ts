import { config, Config, getSummaryApiKey } from '../config';

export type CredentialName = 'summarization' | 'transcription';

/**
 * Supplies each credential on demand; the pipeline asks for the
 * transcription key only after the subtitle path has failed.
 */
export interface CredentialSource {
  summarizationKey(): string | undefined;
  transcriptionKey(): string | undefined;
}

/**
 * Raised when a stage needs a credential that is not configured
 */
export class MissingCredentialError extends Error {
  readonly credential: CredentialName;

  constructor(credential: CredentialName) {
    super(`Missing ${credential} API key`);
    this.name = 'MissingCredentialError';
    this.credential = credential;
  }
}

function present(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Credentials read from the loaded configuration
 */
export function credentialsFromConfig(cfg: Config = config): CredentialSource {
  return {
    summarizationKey: () => present(getSummaryApiKey(cfg)),
    transcriptionKey: () => present(cfg.transcriptionApiKey),
  };
}
