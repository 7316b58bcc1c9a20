import { parseArgs } from 'util';
import { config, Config } from '../config';
import type { PipelineResult, SummaryPipeline, SummaryRequest } from '../pipelines/summaryPipeline';

export const USAGE = `Usage: summarize "<prompt>" <url> [options]

Extracts a transcript of the video (subtitles, or audio transcription when
there are none) and summarizes it following the prompt.

Options:
  --lang <code>       Subtitle language code (default: SUBTITLE_LANGUAGE or "en")
  --auto-sub          Request auto-generated subtitles directly
  --keep-artifacts    Leave downloaded subtitle files in the work directory
  -h, --help          Show this help`;

export interface CliOptions {
  request: SummaryRequest;
  keepArtifacts: boolean;
}

export type ParsedCli = { kind: 'run'; options: CliOptions } | { kind: 'help' } | { kind: 'error'; message: string };

const CLI_OPTIONS = {
  lang: { type: 'string' },
  'auto-sub': { type: 'boolean', default: false },
  'keep-artifacts': { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function readArgs(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
}

/**
 * Parses command-line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: string[], cfg: Config = config): ParsedCli {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    return { kind: 'error', message: error instanceof Error ? error.message : String(error) };
  }

  if (parsed.values.help) {
    return { kind: 'help' };
  }

  const [prompt, url, ...extra] = parsed.positionals;
  if (!prompt || !url) {
    return { kind: 'error', message: 'Both a prompt and a video URL are required' };
  }
  if (extra.length > 0) {
    return { kind: 'error', message: `Unexpected arguments: ${extra.join(' ')}` };
  }

  return {
    kind: 'run',
    options: {
      request: {
        url,
        prompt,
        language: parsed.values.lang ?? cfg.subtitleLanguage,
        preferAutoSubtitles: parsed.values['auto-sub'] || cfg.preferAutoSubtitles,
      },
      keepArtifacts: parsed.values['keep-artifacts'] || cfg.keepArtifacts,
    },
  };
}

export interface CliIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Formats a failed run for the terminal
 */
export function describeFailure(result: Extract<PipelineResult, { status: 'failed' }>): string {
  switch (result.reason) {
    case 'MissingCredential':
      return `Missing credential (${result.missingCredential ?? 'unknown'}): ${result.message}`;
    case 'NoTranscriptAvailable':
      return `No transcript available: ${result.message}`;
    case 'SummarizationFailed':
      return `Summarization failed: ${result.message}`;
  }
}

/**
 * Runs the CLI and returns the process exit code; stdout carries only the summary
 * @param createPipeline - Builds the pipeline for the effective configuration
 */
export async function runCli(
  argv: string[],
  io: CliIo,
  createPipeline: (cfg: Config) => Pick<SummaryPipeline, 'run'>,
  cfg: Config = config
): Promise<number> {
  const parsed = parseCliArgs(argv, cfg);

  if (parsed.kind === 'help') {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  if (parsed.kind === 'error') {
    io.stderr.write(`${parsed.message}\n\n${USAGE}\n`);
    return 2;
  }

  const { request, keepArtifacts } = parsed.options;
  io.stderr.write(`[cli] Fetching transcript for ${request.url} (lang=${request.language})\n`);

  const pipeline = createPipeline({ ...cfg, keepArtifacts });
  const result = await pipeline.run(request);

  if (result.status === 'done') {
    io.stdout.write(`${result.summary}\n`);
    return 0;
  }

  io.stderr.write(`${describeFailure(result)}\n`);
  return 1;
}
