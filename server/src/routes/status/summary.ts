import { NextFunction, Request, Response } from 'express';
import type { StatusQueryService } from '../../services/status/StatusQueryService';
import { formatStatusSummary } from '../formatters';

export function getStatusSummary(statusService: StatusQueryService) {
  return (_req: Request, res: Response, next: NextFunction): void => {
    try {
      res.json(formatStatusSummary(statusService.getSummary(), new Date()));
    } catch (error) {
      next(error);
    }
  };
}
