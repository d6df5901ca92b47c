import { Router } from 'express';
import type { StatusQueryService } from '../../services/status/StatusQueryService';
import { addStatus } from './add';
import { listStatuses } from './list';
import { getStatus } from './get';
import { getStatusSummary } from './summary';

export function createStatusRouter(statusService: StatusQueryService): Router {
  const router = Router();

  router.post('/add', addStatus(statusService));
  router.get('/healthcheck', listStatuses(statusService));
  router.get('/healthcheck/:name', getStatus(statusService));
  router.get('/summary', getStatusSummary(statusService));

  return router;
}
