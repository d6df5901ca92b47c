import { NextFunction, Request, Response } from 'express';
import type { StatusQueryService } from '../../services/status/StatusQueryService';
import { formatStatusOverview } from '../formatters';

export function listStatuses(statusService: StatusQueryService) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json(formatStatusOverview(statusService.getAll(), new Date()));
    } catch (error) {
      next(error);
    }
  };
}
