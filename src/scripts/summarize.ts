import { Console } from 'console';
import { runCli } from '../cli/summarizeCli';
import { createSummaryPipeline } from '../pipelines';

// Component logs go to stderr so stdout holds only the summary
globalThis.console = new Console({ stdout: process.stderr, stderr: process.stderr });

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr }, createSummaryPipeline)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[cli] Unexpected error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
