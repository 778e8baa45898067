import type { NextFunction, Request, Response } from 'express';
import { body, validationResult } from 'express-validator';

export const MIN_VIEWPORT = 64;
export const MAX_VIEWPORT = 7680;

const handleValidationErrors = (req: Request, res: Response, next: NextFunction): void => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    res.status(400).json({ errors: errors.array() });
    return;
  }
  next();
};

export const validateViewport = [
  body('width')
    .isInt({ min: MIN_VIEWPORT, max: MAX_VIEWPORT })
    .withMessage(`width must be an integer between ${MIN_VIEWPORT} and ${MAX_VIEWPORT}`)
    .toInt(),
  body('height')
    .isInt({ min: MIN_VIEWPORT, max: MAX_VIEWPORT })
    .withMessage(`height must be an integer between ${MIN_VIEWPORT} and ${MAX_VIEWPORT}`)
    .toInt(),
  handleValidationErrors,
];
