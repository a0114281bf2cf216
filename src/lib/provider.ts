/**
 * Provider context: the configured Jira client shared by every handler
 */

import { IssueScreenDataSource } from './handlers/issue-screen-data-source';
import { ProjectResource } from './handlers/project-resource';
import { HandlerRegistry } from './handlers/registry';
import { StatusDataSource } from './handlers/status-data-source';
import { WorkflowSchemeDataSource } from './handlers/workflow-scheme-data-source';
import { JiraApi, JiraClient, JiraClientConfig } from './jira-client';

export const DEFAULT_PROVIDER_TYPE_NAME = 'atlassian';

export interface ProviderSettings {
  typeName?: string;
  jira: JiraClientConfig;
}

export interface ProviderContext {
  readonly typeName: string;
  readonly client: JiraApi;
}

/**
 * Build the context once; it is never mutated afterwards
 */
export function createProviderContext(settings: ProviderSettings, client?: JiraApi): ProviderContext {
  return Object.freeze({
    typeName: settings.typeName ?? DEFAULT_PROVIDER_TYPE_NAME,
    client: client ?? new JiraClient(settings.jira),
  });
}

/**
 * Register every data source and resource handler against a context
 */
export function createHandlerRegistry(context: ProviderContext): HandlerRegistry {
  const registry = new HandlerRegistry(context.typeName);

  registry.register(new WorkflowSchemeDataSource(context));
  registry.register(new StatusDataSource(context));
  registry.register(new IssueScreenDataSource(context));
  registry.register(new ProjectResource(context));

  return registry;
}
