/**
 * HTTP Logging Middleware
 *
 * One line per request and one per response, both through req.log so they
 * carry the traceId. Response level follows the status code. Paths in the quiet set
 * (health checks) log at debug.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';

export interface HttpLoggingOptions {
  quietPaths?: readonly string[];
}

export function createHttpLoggingMiddleware(options: HttpLoggingOptions = {}): RequestHandler {
  const quiet = new Set(options.quietPaths ?? []);

  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    const path = req.originalUrl.split('?')[0] ?? req.path;
    const isHealthCheck = quiet.has(path);

    req.log[isHealthCheck ? 'debug' : 'info']({
      method: req.method,
      path,
      query: req.query,
    }, 'HTTP request');

    res.on('finish', () => {
      const level = res.statusCode >= 500 ? 'error'
        : res.statusCode >= 400 ? 'warn'
          : isHealthCheck ? 'debug' : 'info';

      req.log[level]({
        method: req.method,
        path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startTime,
        contentLength: res.getHeader('content-length'),
      }, 'HTTP response');
    });

    next();
  };
}
