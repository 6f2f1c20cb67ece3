/**
 * Configuration Management
 *
 * Centralized configuration for the tailoring pipeline.
 * Merge order: defaults < environment (.env included) < command-line overrides.
 */

import 'dotenv/config';
import * as path from 'path';
import { TailorErrorFactory } from '../errors/types';
import { LLMClient } from '../../shared/llm/client';
import { LLM_PROVIDERS, LLMProvider } from '../../shared/llm/types';
import type { RequestDelays, SlotBudgets } from '../types';

/**
 * Complete pipeline configuration
 */
export interface TailorConfig {
  budgets: SlotBudgets;

  // Pauses between consecutive service calls, for rate limits only
  delays: RequestDelays;

  llm: {
    provider: LLMProvider;
    model?: string;
    apiKey?: string;
  };

  paths: {
    sourceDir: string;
    outputDir: string;
    finalDir: string;
    templateDir: string;
  };
}

/**
 * Values the command line may override; undefined means "not given"
 */
export interface ConfigOverrides {
  maxExperiences?: number;
  maxProjects?: number;
  maxSkillsPerCategory?: number;
  requestDelayMs?: number;
  provider?: string;
  model?: string;
  apiKey?: string;
  sourceDir?: string;
  outputDir?: string;
  finalDir?: string;
  templateDir?: string;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: TailorConfig = {
  budgets: {
    maxExperiences: 3,
    maxProjects: 2,
    maxSkillsPerCategory: 8
  },
  delays: {
    skillsMs: 300,
    optimizerMs: 500
  },
  llm: {
    provider: 'openai'
  },
  paths: {
    sourceDir: 'about-me',
    outputDir: 'intermediate-outputs',
    finalDir: 'output',
    // Shipped with the package; the same relative location from src/ and dist/
    templateDir: path.resolve(__dirname, '..', '..', '..', 'latex-template')
  }
};

/**
 * Environment variable holding the API key for each provider
 */
export const API_KEY_ENV: Record<LLMProvider, string> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY'
};

function isProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some(provider => provider === value);
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: TailorConfig;

  constructor(overrides: ConfigOverrides = {}, private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(overrides);
    this.validateConfig();
  }

  /**
   * Load configuration from environment variables and overrides
   */
  private loadConfig(overrides: ConfigOverrides): TailorConfig {
    const env = this.env;
    const envDelay = this.parseInt(env.TAILOR_REQUEST_DELAY_MS);
    const delayOverride = overrides.requestDelayMs ?? envDelay;

    return {
      budgets: {
        maxExperiences: overrides.maxExperiences
          ?? this.parseInt(env.TAILOR_MAX_EXPERIENCES)
          ?? DEFAULT_CONFIG.budgets.maxExperiences,
        maxProjects: overrides.maxProjects
          ?? this.parseInt(env.TAILOR_MAX_PROJECTS)
          ?? DEFAULT_CONFIG.budgets.maxProjects,
        maxSkillsPerCategory: overrides.maxSkillsPerCategory
          ?? this.parseInt(env.TAILOR_MAX_SKILLS_PER_CATEGORY)
          ?? DEFAULT_CONFIG.budgets.maxSkillsPerCategory
      },
      delays: {
        skillsMs: delayOverride ?? DEFAULT_CONFIG.delays.skillsMs,
        optimizerMs: delayOverride ?? DEFAULT_CONFIG.delays.optimizerMs
      },
      llm: {
        provider: this.parseProvider(overrides.provider ?? env.LLM_PROVIDER),
        model: overrides.model || env.LLM_MODEL || undefined,
        apiKey: overrides.apiKey || undefined
      },
      paths: {
        sourceDir: overrides.sourceDir ?? DEFAULT_CONFIG.paths.sourceDir,
        outputDir: overrides.outputDir ?? DEFAULT_CONFIG.paths.outputDir,
        finalDir: overrides.finalDir ?? DEFAULT_CONFIG.paths.finalDir,
        templateDir: overrides.templateDir ?? DEFAULT_CONFIG.paths.templateDir
      }
    };
  }

  /**
   * Validate configuration
   */
  private validateConfig(): void {
    const { budgets, delays } = this.config;

    for (const [key, value] of Object.entries(budgets)) {
      if (!Number.isInteger(value) || value < 0) {
        throw TailorErrorFactory.configurationError(key, 'Must be a non-negative integer');
      }
    }

    for (const [key, value] of Object.entries(delays)) {
      if (!Number.isFinite(value) || value < 0) {
        throw TailorErrorFactory.configurationError(key, 'Must be a non-negative number of milliseconds');
      }
    }
  }

  /**
   * Get configuration
   */
  getConfig(): TailorConfig {
    return { ...this.config };
  }

  /**
   * Resolve the API key: explicit override first, then the provider's variable
   */
  resolveApiKey(): string | undefined {
    const { provider, apiKey } = this.config.llm;
    return apiKey || this.env[API_KEY_ENV[provider]] || undefined;
  }

  /**
   * Parse integer from environment variable; unset or unparseable reads as undefined
   */
  private parseInt(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? undefined : parsed;
  }

  private parseProvider(value: string | undefined): LLMProvider {
    if (!value) return DEFAULT_CONFIG.llm.provider;
    const normalized = value.toLowerCase();
    if (!isProvider(normalized)) {
      throw TailorErrorFactory.configurationError(
        'provider',
        `Must be one of ${LLM_PROVIDERS.join(', ')} (got "${value}")`
      );
    }
    return normalized;
  }
}

/**
 * Build the text-generation client described by the configuration
 *
 * @throws TailorError MISSING_API_KEY when no key is available
 */
export function createLLMClientFromEnv(manager: ConfigManager): LLMClient {
  const { llm } = manager.getConfig();
  const apiKey = manager.resolveApiKey();

  if (!apiKey) {
    throw TailorErrorFactory.missingApiKey(llm.provider, API_KEY_ENV[llm.provider]);
  }

  return new LLMClient({
    provider: llm.provider,
    apiKey,
    ...(llm.model ? { model: llm.model } : {})
  });
}
