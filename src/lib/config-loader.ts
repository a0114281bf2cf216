/**
 * Loader for the declarative sync configuration file
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigError } from './config';
import { SyncConfig } from './types';

export const DEFAULT_CONFIG_FILE = 'jira-sync.json';

const blockNamePattern = /^[A-Za-z_][A-Za-z0-9_-]*$/;

const blockSchema = z.object({
  type: z.string().min(1),
  name: z.string().regex(blockNamePattern, 'must start with a letter or underscore and contain only letters, digits, "_" and "-"'),
  config: z.record(z.union([z.string(), z.number(), z.null()])).default({}),
});

const syncConfigSchema = z.object({
  provider: z
    .object({
      typeName: z.string().min(1).optional(),
    })
    .default({}),
  data: z.array(blockSchema).default([]),
  resources: z.array(blockSchema).default([]),
});

/**
 * Validate an already-parsed configuration object
 */
export function parseSyncConfig(raw: unknown, source = DEFAULT_CONFIG_FILE): SyncConfig {
  const parsed = syncConfigSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${source}`, issues);
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const block of [...parsed.data.data, ...parsed.data.resources]) {
    const address = `${block.type}.${block.name}`;
    if (seen.has(address)) {
      duplicates.push(`${address}: declared more than once`);
    }
    seen.add(address);
  }
  if (duplicates.length > 0) {
    throw new ConfigError(`Invalid configuration in ${source}`, duplicates);
  }

  return parsed.data;
}

/**
 * Read and validate the configuration file at the given path
 */
export function loadSyncConfig(filepath: string): SyncConfig {
  if (!fs.existsSync(filepath)) {
    throw new ConfigError('Configuration file not found', [filepath]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filepath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Unable to parse ${filepath}`, [error instanceof Error ? error.message : String(error)]);
  }

  return parseSyncConfig(raw, filepath);
}
