/**
 * Persisted sync state, stored as JSON beside the configuration file
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { SyncState } from './types';

export const STATE_FILE_NAME = '.jira-sync-state.json';

const recordSchema = z.record(z.union([z.string(), z.number(), z.null()]));

const stateSchema = z.object({
  version: z.literal(1),
  lastSync: z.string(),
  data: z.record(recordSchema),
  resources: z.record(
    z.object({
      type: z.string(),
      attributes: recordSchema,
    })
  ),
});

export function emptyState(): SyncState {
  return {
    version: 1,
    lastSync: new Date(0).toISOString(),
    data: {},
    resources: {},
  };
}

export class StateStore {
  private stateFile: string;

  constructor(stateFile: string) {
    this.stateFile = stateFile;
  }

  /** State file path for a configuration file */
  static forConfig(configPath: string): StateStore {
    return new StateStore(path.join(path.dirname(configPath), STATE_FILE_NAME));
  }

  get filepath(): string {
    return this.stateFile;
  }

  /**
   * Load state from disk. A missing file is an empty state; an unreadable
   * or invalid one is an error.
   */
  load(): SyncState {
    if (!fs.existsSync(this.stateFile)) {
      return emptyState();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.stateFile, 'utf-8'));
    } catch (error) {
      throw new Error(
        `Failed to load sync state from ${this.stateFile}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = stateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Sync state in ${this.stateFile} is invalid: ${parsed.error.issues[0]?.message ?? 'unknown error'}`);
    }

    return parsed.data;
  }

  save(state: SyncState): void {
    fs.writeFileSync(this.stateFile, JSON.stringify(state, null, 2), 'utf-8');
  }
}
