import fs from 'fs';
import { createApp } from './app';
import { config } from './config';
import { jobStore } from './jobs';
import { createSummaryPipeline } from './pipelines';

// Ensure data directories exist
const dirs = [config.dataDir, config.jobsDir, config.workDir];
for (const dir of dirs) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

const app = createApp({ store: jobStore, pipeline: createSummaryPipeline(config) });

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n📝 ClipBrief Backend`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`   Summary provider: ${config.summaryProvider}`);
  console.info(`\n   API Endpoints:`);
  console.info(`   - GET    /api/health          - Check service status`);
  console.info(`   - GET    /api/jobs            - List all jobs`);
  console.info(`   - POST   /api/jobs            - Create new job`);
  console.info(`   - GET    /api/jobs/:id        - Get job details`);
  console.info(`   - POST   /api/jobs/:id/start  - Start processing`);
  console.info(`   - DELETE /api/jobs/:id        - Delete a job`);
  console.info(`\n`);
});

export default app;
