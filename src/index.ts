/**
 * Jira Config Sync - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { JiraClient, JiraApiError, DEFAULT_TIMEOUT_MS } from './lib/jira-client';
export type { JiraApi, JiraClientConfig, PageParams, RequestOptions } from './lib/jira-client';
export * from './lib/field-mapper';
export * from './lib/diagnostics';
export * from './lib/schema';
export { HandlerRegistry } from './lib/handlers/registry';
export * from './lib/handlers/types';
export { WorkflowSchemeDataSource } from './lib/handlers/workflow-scheme-data-source';
export { StatusDataSource } from './lib/handlers/status-data-source';
export { IssueScreenDataSource } from './lib/handlers/issue-screen-data-source';
export { ProjectResource, PROJECT_TYPE_KEYS } from './lib/handlers/project-resource';
export * from './lib/provider';
export { ConfigError, loadEnvSettings } from './lib/config';
export type { EnvSettings } from './lib/config';
export { DEFAULT_CONFIG_FILE, loadSyncConfig, parseSyncConfig } from './lib/config-loader';
export { StateStore, STATE_FILE_NAME, emptyState } from './lib/state-store';
export * from './lib/sync-engine';
export { ChangeReviewer } from './lib/change-reviewer';
export { Logger, logger, LOG_LEVELS } from './lib/logger';
export type { LogLevel, LogFields } from './lib/logger';

export * from './lib/types';
