import type { NextFunction, Request, Response } from 'express';
import { body, validationResult } from 'express-validator';

function rejectInvalid(req: Request, res: Response, next: NextFunction): void {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({ errors: errors.array() });
    return;
  }
  next();
}

export const validateClaim = [
  body('id').isString().withMessage('Image id must be a string').trim().notEmpty().withMessage('Image id is required'),
  rejectInvalid,
];
