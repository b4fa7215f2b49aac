import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { PlannerError } from '../domain/errors';
import { sendError, sendServerError, sendValidationError } from '../middleware/responseHelper';

export const formatZodIssues = (err: ZodError): string[] =>
  err.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    sendValidationError(res, formatZodIssues(err));
    return;
  }

  if (err instanceof PlannerError) {
    if (err.status >= 500) {
      console.error(`[api] ${req.method} ${req.originalUrl} failed:`, err);
    } else {
      console.warn(`[api] ${req.method} ${req.originalUrl} → ${err.code}: ${err.message}`);
    }
    sendError(res, err.message, err.status, { code: err.code, ...err.details });
    return;
  }

  // express.json() reports malformed bodies as 400s
  if (err instanceof SyntaxError && 'body' in err) {
    sendValidationError(res, 'Request body is not valid JSON');
    return;
  }

  console.error('❌ SERVER ERROR:', err);
  sendServerError(res);
}
