/**
 * Request Context Middleware
 *
 * Every request gets a traceId (client x-trace-id / x-request-id when it is
 * a sane token, a fresh UUID otherwise) and a child logger bound to it.
 * The traceId is echoed back and flows into pipeline runs started by the request.
 */

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, type Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

const TRACE_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function clientTraceId(req: Request): string | undefined {
  for (const name of ['x-trace-id', 'x-request-id']) {
    const header = req.headers[name];
    const value = typeof header === 'string' ? header.trim() : undefined;
    if (value && TRACE_ID_PATTERN.test(value)) return value;
  }
  return undefined;
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const traceId = clientTraceId(req) ?? uuidv4();

  req.traceId = traceId;
  req.log = logger.child({ traceId });
  res.setHeader('x-trace-id', traceId);

  next();
}
