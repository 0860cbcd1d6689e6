/**
 * Configuration Validator
 *
 * env.ts already rejects malformed values; this step checks the
 * combinations that only matter at startup and logs what is degraded.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../../config/env.js';
import { ConfigError } from '../../config/env.js';

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const KNOWN_PROVIDERS = ['openai', 'none', 'disabled'];

export class ConfigValidator {
  constructor(
    private readonly config: AppConfig,
    private readonly logger: Logger
  ) {}

  validate(): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { config } = this;

    if (!KNOWN_PROVIDERS.includes(config.llmProvider)) {
      warnings.push(`Unknown LLM_PROVIDER "${config.llmProvider}"; enrichment disabled`);
    } else if (config.llmProvider === 'openai' && !config.openaiApiKey) {
      warnings.push('OPENAI_API_KEY not set; summaries are empty and geometry uses the deterministic builder');
    }

    if (config.strictSummary && (config.llmProvider !== 'openai' || !config.openaiApiKey)) {
      errors.push('ANALYSIS_STRICT_SUMMARY requires a configured LLM provider');
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * Use this at application startup to fail fast
   */
  validateOrThrow(): void {
    const result = this.validate();

    if (!result.valid) {
      this.logger.error({ errors: result.errors }, 'Configuration validation failed');
      throw new ConfigError(`Invalid configuration: ${result.errors.join('; ')}`);
    }

    if (result.warnings.length > 0) {
      this.logger.warn({ warnings: result.warnings }, 'Configuration warnings');
    }

    this.logger.info(this.getConfigSummary(), 'Configuration validated');
  }

  getConfigSummary(): Record<string, string | number | boolean> {
    const { config } = this;
    return {
      env: config.env,
      logLevel: config.logLevel,
      llmProvider: config.llmProvider,
      hasOpenAIKey: Boolean(config.openaiApiKey),
      overpassEndpoints: config.overpassUrls.length,
      poiRadiusMeters: config.poiRadiusMeters,
      strictSummary: config.strictSummary
    };
  }
}
