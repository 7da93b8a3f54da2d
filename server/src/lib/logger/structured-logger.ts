/**
 * Structured Logger with Pino
 *
 * - Fast JSON logging with Pino
 * - Daily rotated log files (opt-in via LOG_TO_FILE)
 * - Pretty console output in DEV
 * - Automatic secret redaction
 * - Request / restaurant scoped child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

let fileStream: rfs.RotatingFileStream | undefined;
if (config.toFile && config.level !== 'silent') {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  fileStream = rfs.createStream('server.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const streamLevel = config.level === 'silent' ? 'error' : config.level;

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream([
    ...(config.console && config.level !== 'silent' ? [{
      level: streamLevel,
      stream: config.pretty
        ? pinoPretty({
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          })
        : process.stdout,
    }] : []),

    ...(fileStream ? [{
      level: streamLevel,
      stream: fileStream,
    }] : []),
  ])
);

export type Logger = pino.Logger;

/**
 * Normalize an unknown thrown value for log context
 */
export function errorContext(err: unknown): { name: string; message: string } {
  if (err instanceof Error) {
    return { name: err.name, message: err.message };
  }
  return { name: 'NonError', message: String(err) };
}
