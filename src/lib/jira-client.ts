/**
 * Jira Cloud REST API (v3) client using axios
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import {
  jiraCreatedProjectSchema,
  jiraIssueTypeSchemeProjectsPageSchema,
  jiraProjectSchema,
  jiraScreenPageSchema,
  jiraStatusSchema,
  jiraWorkflowSchemeSchema,
  JiraCreatedProject,
  JiraIssueTypeSchemeProjectsPage,
  JiraProject,
  JiraScreenPage,
  JiraStatus,
  JiraWorkflowScheme,
} from './jira-schemas';
import { ProjectCreatePayload, ProjectUpdatePayload } from './types';

export const DEFAULT_TIMEOUT_MS = 30000;

export interface JiraClientConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
  timeoutMs?: number;
  /** Replaces axios' HTTP transport */
  adapter?: AxiosAdapter;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface PageParams {
  startAt: number;
  maxResults: number;
}

/**
 * Error raised for every failed call: transport failures, non-2xx responses
 * and responses that do not match the expected shape.
 */
export class JiraApiError extends Error {
  readonly status?: number;
  /** Raw response body, when the API sent one */
  readonly body?: string;

  constructor(message: string, options: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'JiraApiError';
    this.status = options.status;
    this.body = options.body;
  }
}

/**
 * The calls the entity handlers make against Jira
 */
export interface JiraApi {
  getWorkflowScheme(id: number, options?: RequestOptions): Promise<JiraWorkflowScheme>;
  getStatuses(ids: string[], options?: RequestOptions): Promise<JiraStatus[]>;
  getScreens(params: PageParams & { ids: number[] }, options?: RequestOptions): Promise<JiraScreenPage>;
  createProject(payload: ProjectCreatePayload, options?: RequestOptions): Promise<JiraCreatedProject>;
  getProject(projectIdOrKey: string, options?: RequestOptions): Promise<JiraProject>;
  updateProject(
    projectIdOrKey: string,
    payload: ProjectUpdatePayload,
    options?: RequestOptions
  ): Promise<JiraProject>;
  deleteProject(projectIdOrKey: string, enableUndo: boolean, options?: RequestOptions): Promise<void>;
  getIssueTypeSchemesForProjects(
    params: PageParams & { projectIds: number[] },
    options?: RequestOptions
  ): Promise<JiraIssueTypeSchemeProjectsPage>;
  assignIssueTypeScheme(issueTypeSchemeId: string, projectId: string, options?: RequestOptions): Promise<void>;
}

export class JiraClient implements JiraApi {
  private client: AxiosInstance;

  constructor(config: JiraClientConfig) {
    this.client = axios.create({
      baseURL: `${config.baseUrl.replace(/\/+$/, '')}/rest/api/3`,
      auth: {
        username: config.email,
        password: config.apiToken,
      },
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      // Jira expects repeated keys (id=1&id=2), not id[]=1
      paramsSerializer: { indexes: null },
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      adapter: config.adapter,
    });
  }

  async getWorkflowScheme(id: number, options: RequestOptions = {}): Promise<JiraWorkflowScheme> {
    return this.request(
      { method: 'GET', url: `/workflowscheme/${id}`, params: { returnDraftIfExists: false } },
      jiraWorkflowSchemeSchema,
      options
    );
  }

  async getStatuses(ids: string[], options: RequestOptions = {}): Promise<JiraStatus[]> {
    return this.request(
      { method: 'GET', url: '/statuses', params: { id: ids } },
      z.array(jiraStatusSchema),
      options
    );
  }

  async getScreens(
    params: PageParams & { ids: number[] },
    options: RequestOptions = {}
  ): Promise<JiraScreenPage> {
    return this.request(
      {
        method: 'GET',
        url: '/screens',
        params: { id: params.ids, startAt: params.startAt, maxResults: params.maxResults },
      },
      jiraScreenPageSchema,
      options
    );
  }

  async createProject(
    payload: ProjectCreatePayload,
    options: RequestOptions = {}
  ): Promise<JiraCreatedProject> {
    return this.request({ method: 'POST', url: '/project', data: payload }, jiraCreatedProjectSchema, options);
  }

  async getProject(projectIdOrKey: string, options: RequestOptions = {}): Promise<JiraProject> {
    return this.request(
      { method: 'GET', url: `/project/${encodeURIComponent(projectIdOrKey)}` },
      jiraProjectSchema,
      options
    );
  }

  async updateProject(
    projectIdOrKey: string,
    payload: ProjectUpdatePayload,
    options: RequestOptions = {}
  ): Promise<JiraProject> {
    return this.request(
      { method: 'PUT', url: `/project/${encodeURIComponent(projectIdOrKey)}`, data: payload },
      jiraProjectSchema,
      options
    );
  }

  async deleteProject(
    projectIdOrKey: string,
    enableUndo: boolean,
    options: RequestOptions = {}
  ): Promise<void> {
    await this.send(
      { method: 'DELETE', url: `/project/${encodeURIComponent(projectIdOrKey)}`, params: { enableUndo } },
      options
    );
  }

  async getIssueTypeSchemesForProjects(
    params: PageParams & { projectIds: number[] },
    options: RequestOptions = {}
  ): Promise<JiraIssueTypeSchemeProjectsPage> {
    return this.request(
      {
        method: 'GET',
        url: '/issuetypescheme/project',
        params: { projectId: params.projectIds, startAt: params.startAt, maxResults: params.maxResults },
      },
      jiraIssueTypeSchemeProjectsPageSchema,
      options
    );
  }

  async assignIssueTypeScheme(
    issueTypeSchemeId: string,
    projectId: string,
    options: RequestOptions = {}
  ): Promise<void> {
    await this.send(
      { method: 'PUT', url: '/issuetypescheme/project', data: { issueTypeSchemeId, projectId } },
      options
    );
  }

  /**
   * Issue a request and validate the response body against a schema
   */
  private async request<T>(
    config: AxiosRequestConfig,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions
  ): Promise<T> {
    const response = await this.send(config, options);
    const parsed = schema.safeParse(response.data);

    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new JiraApiError(`Unexpected response from ${config.method} ${config.url}: ${issues}`, {
        status: response.status,
        body: rawBody(response.data),
      });
    }

    return parsed.data;
  }

  private async send(
    config: AxiosRequestConfig,
    options: RequestOptions
  ): Promise<{ status: number; data: unknown }> {
    try {
      const response = await this.client.request<unknown>({ ...config, signal: options.signal });
      return { status: response.status, data: response.data };
    } catch (error) {
      throw toJiraApiError(error);
    }
  }
}

function toJiraApiError(error: unknown): JiraApiError {
  if (axios.isAxiosError(error)) {
    return new JiraApiError(error.message, {
      status: error.response?.status,
      body: error.response ? rawBody(error.response.data) : undefined,
      cause: error,
    });
  }

  if (error instanceof Error) {
    return new JiraApiError(error.message, { cause: error });
  }

  return new JiraApiError(String(error));
}

function rawBody(data: unknown): string | undefined {
  if (data === undefined || data === null || data === '') {
    return undefined;
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}
