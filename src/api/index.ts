import { Router } from 'express';
import { createJobsRouter, JobsRouterDeps } from './jobs';
import { createHealthRouter, HealthRouterDeps } from './health';

export type ApiDeps = JobsRouterDeps & { health?: HealthRouterDeps };

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();

  router.use('/jobs', createJobsRouter(deps));
  router.use('/health', createHealthRouter(deps.health));

  return router;
}
