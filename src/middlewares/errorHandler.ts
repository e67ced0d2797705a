import { Request, Response, NextFunction } from 'express';
import { config } from '@/config/env';
import { InfrastructureError, InvalidArgumentError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { PROTOCOL_HEADER, CHECK_IN_PROTOCOL_VERSION, encodeFault } from '@/services/outcome.encoder';

// express.json() rejects unparseable bodies with a SyntaxError tagged 'entity.parse.failed'
const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

// eslint-disable-next-line @typescript-eslint/no-unused-vars
export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  const error = isBodyParseError(err) ? new InvalidArgumentError('Request body must be valid JSON.') : err;
  const { statusCode, payload } = encodeFault(error);

  if (error instanceof InfrastructureError) {
    logger.error('ErrorHandler', `Dependency fault (${error.dependency}) on ${req.method} ${req.originalUrl}`, error.cause ?? error);
  } else if (statusCode >= 500) {
    logger.error('ErrorHandler', `Unhandled fault on ${req.method} ${req.originalUrl}`, error);
  }

  res.setHeader(PROTOCOL_HEADER, String(CHECK_IN_PROTOCOL_VERSION));
  res.status(statusCode).json({
    ...payload,
    ...(config.nodeEnv === 'development' && error instanceof Error && { stack: error.stack }),
  });
};
