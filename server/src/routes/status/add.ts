import { NextFunction, Request, Response } from 'express';
import type { StatusQueryService } from '../../services/status/StatusQueryService';
import { formatStatusCreated } from '../formatters';

export function addStatus(statusService: StatusQueryService) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const { id, record } = statusService.recordStatus(req.body);
      res.status(201).json(formatStatusCreated(id, record));
    } catch (error) {
      next(error);
    }
  };
}
