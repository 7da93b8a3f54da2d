/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevelName = 'silent' | 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  level: LogLevelName;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const LEVELS: readonly LogLevelName[] = ['silent', 'debug', 'info', 'warn', 'error'];

function parseLevel(raw: string | undefined, fallback: LogLevelName): LogLevelName {
  const match = LEVELS.find(level => level === raw?.trim().toLowerCase());
  return match ?? fallback;
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = env.NODE_ENV !== 'production';
  // node:test marks its child processes; keep test output readable
  const underTestRunner = env.NODE_TEST_CONTEXT !== undefined;

  return {
    level: parseLevel(env.LOG_LEVEL, underTestRunner ? 'silent' : 'info'),
    pretty: env.LOG_PRETTY === 'true' || (isDev && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    rotateDays: Number(env.LOG_ROTATE_DAYS || 14),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,x-api-key,key,token,password,apiKey,api_key,secret,headers.authorization')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
