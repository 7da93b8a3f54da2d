/**
 * Configuration Validator
 * Fail fast on misconfiguration
 *
 * Validates required environment variables at startup
 * Ensures system has necessary configuration to operate
 */

import { logger } from '../logger/structured-logger.js';

export interface ConfigRequirements {
  required: string[];
  optional: string[];
}

/**
 * Configuration requirements for the application
 */
export const CONFIG_REQUIREMENTS: ConfigRequirements = {
  required: [
    'LLM_TIMEOUT_MS',        // No implicit timeout for vision/text calls
    'PLACES_TIMEOUT_MS',     // No implicit timeout for the scraping actor
  ],
  optional: [
    'OPENAI_API_KEY',        // Without it menu processing answers 503
    'APIFY_API_TOKEN',       // Without it background discovery is skipped
    'SUPABASE_URL',
    'SUPABASE_KEY',
    'LOG_LEVEL',
    'NODE_ENV',
    'PORT'
  ]
};

export interface ValidationResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ConfigValidator {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly requirements: ConfigRequirements = CONFIG_REQUIREMENTS
  ) {}

  /**
   * Validate configuration against requirements
   * Returns result with missing/warning details
   */
  validate(): ValidationResult {
    const missing: string[] = [];
    const warnings: string[] = [];

    for (const key of this.requirements.required) {
      if (!this.env[key]) {
        missing.push(key);
      }
    }

    for (const key of this.requirements.optional) {
      if (!this.env[key]) {
        warnings.push(`Optional config ${key} not set`);
      }
    }

    // Supabase is needed unless the in-memory store is selected
    if (this.env.STORE_DRIVER !== 'memory') {
      for (const key of ['SUPABASE_URL', 'SUPABASE_KEY']) {
        if (!this.env[key]) missing.push(key);
      }
    }

    return {
      valid: missing.length === 0,
      missing,
      warnings
    };
  }

  /**
   * Validate configuration or throw ConfigError
   * Use this at application startup to fail fast
   */
  validateOrThrow(): void {
    const result = this.validate();

    if (!result.valid) {
      const message = `Missing required configuration: ${result.missing.join(', ')}`;

      logger.error({
        missing: result.missing,
        required: this.requirements.required
      }, 'Configuration validation failed');

      throw new ConfigError(message);
    }

    if (result.warnings.length > 0) {
      logger.warn({
        warnings: result.warnings
      }, 'Configuration warnings');
    }

    logger.info(this.getConfigSummary(), 'Configuration validated');
  }

  /**
   * Get current configuration summary (sanitized)
   */
  getConfigSummary(): Record<string, string | boolean> {
    return {
      storeDriver: this.env.STORE_DRIVER || 'supabase',
      logLevel: this.env.LOG_LEVEL || 'info',
      nodeEnv: this.env.NODE_ENV || 'development',
      hasOpenAIKey: !!this.env.OPENAI_API_KEY,
      hasApifyToken: !!this.env.APIFY_API_TOKEN
    };
  }
}
