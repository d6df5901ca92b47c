import { NextFunction, Request, Response } from 'express';
import type { StatusQueryService } from '../../services/status/StatusQueryService';
import { ValidationError } from '../../utils/errors';
import { formatServiceStatus } from '../formatters';

export function getStatus(statusService: StatusQueryService) {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      const name = req.params.name.trim();
      if (name === '') {
        throw new ValidationError('Service name cannot be empty', 'name');
      }

      res.json(formatServiceStatus(statusService.getOne(name), new Date()));
    } catch (error) {
      next(error);
    }
  };
}
