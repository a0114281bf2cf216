/**
 * Environment configuration
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUT_MS } from './jira-client';
import { LOG_LEVELS, LogLevel } from './logger';
import { ProviderSettings } from './provider';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const envSchema = z.object({
  JIRA_BASE_URL: z.string().url(),
  JIRA_EMAIL: z.string().min(1),
  JIRA_API_TOKEN: z.string().min(1),
  JIRA_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  JIRA_SYNC_LOG_LEVEL: logLevelSchema.default('info'),
});

export interface EnvSettings {
  provider: ProviderSettings;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read Jira credentials and sync options from the environment
 */
export function loadEnvSettings(env: NodeJS.ProcessEnv, typeName?: string): EnvSettings {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const name = issue.path.join('.');
      return name === 'JIRA_SYNC_LOG_LEVEL'
        ? `${name}: expected one of ${LOG_LEVELS.join(', ')}`
        : `${name}: ${issue.message}`;
    });
    throw new ConfigError('Invalid Jira environment configuration', issues);
  }

  return {
    provider: {
      typeName,
      jira: {
        baseUrl: parsed.data.JIRA_BASE_URL,
        email: parsed.data.JIRA_EMAIL,
        apiToken: parsed.data.JIRA_API_TOKEN,
        timeoutMs: parsed.data.JIRA_TIMEOUT_MS,
      },
    },
    logLevel: parsed.data.JIRA_SYNC_LOG_LEVEL,
  };
}
