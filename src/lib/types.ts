/**
 * Shared types for the Jira configuration sync
 */

/** A single attribute value as stored in config, plan and state records */
export type AttributeValue = string | number | null;

/** Attribute name → value, keyed by the names declared in a handler's schema */
export type AttributeRecord = Record<string, AttributeValue>;

export type WorkflowSchemeModel = {
  id: string;
  name: string | null;
  description: string | null;
};

export type StatusModel = {
  id: string;
  name: string | null;
  description: string | null;
  category: string | null;
};

export type IssueScreenModel = {
  id: string;
  name: string | null;
  description: string | null;
};

export interface ProjectModel {
  id: string | null;
  key: string | null;
  name: string | null;
  description: string | null;
  avatarId: number | null;
  fieldConfigurationScheme: number | null;
  issueTypeScheme: number | null;
  issueTypeScreenScheme: number | null;
  workflowScheme: number | null;
  leadAccountId: string | null;
  projectTypeKey: string | null;
  url: string | null;
}

export interface ProjectCreatePayload {
  key: string;
  name: string;
  description?: string;
  avatarId?: number;
  fieldConfigurationScheme?: number;
  issueTypeScheme?: number;
  issueTypeScreenScheme?: number;
  workflowScheme?: number;
  leadAccountId?: string;
  projectTypeKey?: string;
  url?: string;
}

export interface ProjectUpdatePayload {
  key?: string;
  name?: string;
  description?: string;
  avatarId?: number;
  projectTypeKey?: string;
  url?: string;
}

/** One `{ type, name, config }` block of the declarative configuration file */
export interface ConfigBlock {
  type: string;
  name: string;
  config: Record<string, AttributeValue>;
}

export interface SyncConfig {
  provider: {
    typeName?: string;
  };
  data: ConfigBlock[];
  resources: ConfigBlock[];
}

export interface StoredResource {
  type: string;
  attributes: AttributeRecord;
}

export interface SyncState {
  version: 1;
  lastSync: string;
  data: Record<string, AttributeRecord>;
  resources: Record<string, StoredResource>;
}

export type ChangeAction = 'create' | 'update' | 'delete' | 'no-op';

interface ChangeBase {
  address: string;
  type: string;
  /** Attributes whose planned value differs from the refreshed state */
  changedAttributes: string[];
}

export type PlannedChange =
  | (ChangeBase & { action: 'create'; plan: AttributeRecord; prior: null })
  | (ChangeBase & { action: 'update'; plan: AttributeRecord; prior: AttributeRecord })
  | (ChangeBase & { action: 'no-op'; plan: AttributeRecord; prior: AttributeRecord })
  | (ChangeBase & { action: 'delete'; plan: null; prior: AttributeRecord });
