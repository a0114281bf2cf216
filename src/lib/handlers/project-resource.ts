/**
 * Jira project resource
 */

import { Diagnostics, reportError } from '../diagnostics';
import {
  applyProjectResponse,
  findIssueTypeSchemeForProject,
  parseNumericId,
  projectFromRecord,
  projectToRecord,
  toProjectCreatePayload,
  toProjectUpdatePayload,
} from '../field-mapper';
import { JiraProject } from '../jira-schemas';
import { logger } from '../logger';
import { ProviderContext } from '../provider';
import { defaultValue, lengthAtMost, oneOf, Schema, useStateForUnknown } from '../schema';
import { AttributeRecord, ProjectModel } from '../types';
import { HandlerResponse, OperationContext, ResourceHandler } from './types';

export const PROJECT_TYPE_KEYS = ['software', 'service_desk', 'business'];

const projectSchema: Schema = {
  version: 1,
  markdownDescription: 'Jira Project Resource',
  attributes: {
    id: {
      type: 'string',
      markdownDescription: 'The ID of the project.',
      computed: true,
      planModifiers: [useStateForUnknown()],
    },
    key: {
      type: 'string',
      markdownDescription:
        'Project keys must be unique and start with an uppercase letter followed by one or more uppercase alphanumeric characters. The maximum length is 10 characters.',
      required: true,
      validators: [lengthAtMost(10)],
    },
    name: {
      type: 'string',
      markdownDescription: 'The name of the project.',
      required: true,
    },
    description: {
      type: 'string',
      markdownDescription: 'A brief description of the project.',
      optional: true,
      computed: true,
      planModifiers: [useStateForUnknown(), defaultValue('')],
    },
    avatar_id: {
      type: 'int64',
      markdownDescription: "An integer value for the project's avatar.",
      optional: true,
      computed: true,
      planModifiers: [useStateForUnknown()],
    },
    field_configuration_scheme: {
      type: 'int64',
      markdownDescription: 'The ID of the field configuration scheme for the project.',
      optional: true,
    },
    issue_type_scheme: {
      type: 'int64',
      markdownDescription:
        'The ID of the issue type scheme for the project. If you specify the issue type scheme you cannot specify the project template key.',
      optional: true,
      computed: true,
      planModifiers: [useStateForUnknown()],
    },
    issue_type_screen_scheme: {
      type: 'int64',
      markdownDescription:
        'The ID of the issue type screen scheme for the project. If you specify the issue type screen scheme you cannot specify the project template key.',
      optional: true,
    },
    workflow_scheme: {
      type: 'int64',
      markdownDescription:
        'The ID of the workflow scheme for the project. If you specify the workflow scheme you cannot specify the project template key.',
      optional: true,
    },
    lead_account_id: {
      type: 'string',
      markdownDescription:
        'The account ID of the project lead. Either lead or leadAccountId must be set when creating a project. Cannot be provided with lead.',
      optional: true,
      computed: true,
    },
    project_type_key: {
      type: 'string',
      markdownDescription:
        "The project type, which defines the application-specific feature set. If you don't specify the project template you have to specify the project type. Valid values: software, service_desk, business",
      optional: true,
      computed: true,
      validators: [oneOf(...PROJECT_TYPE_KEYS)],
    },
    url: {
      type: 'string',
      markdownDescription: 'A link to information about this project, such as project documentation.',
      optional: true,
      computed: true,
      planModifiers: [useStateForUnknown(), defaultValue('')],
    },
  },
};

function missingId(diagnostics: Diagnostics): HandlerResponse {
  diagnostics.addAttributeError('id', 'Missing Resource Identifier', 'The project state holds no "id" attribute.');
  return { state: null, diagnostics };
}

export class ProjectResource implements ResourceHandler {
  readonly kind = 'resource' as const;
  private context: ProviderContext;

  constructor(context: ProviderContext) {
    this.context = context;
  }

  metadata(providerTypeName: string): string {
    return `${providerTypeName}_jira_project`;
  }

  schema(): Schema {
    return projectSchema;
  }

  importState(id: string): AttributeRecord {
    return { id };
  }

  async create(ctx: OperationContext, request: { plan: AttributeRecord }): Promise<HandlerResponse> {
    logger.debug('Creating project');
    const diagnostics = new Diagnostics();

    try {
      const plan = projectFromRecord(request.plan);
      logger.debug('Loaded project plan', { createPlan: plan });

      const created = await this.context.client.createProject(toProjectCreatePayload(plan), ctx);
      logger.debug('Created project', { id: created.id });

      // Everything but the id is kept as planned
      const state = projectToRecord({ ...plan, id: created.id });
      logger.debug('Storing project into the state', { createNewState: state });
      return { state, diagnostics };
    } catch (error) {
      reportError(diagnostics, error, 'Unable to create project');
      return { state: null, diagnostics };
    }
  }

  async read(ctx: OperationContext, request: { state: AttributeRecord }): Promise<HandlerResponse> {
    logger.debug('Reading project resource');
    const diagnostics = new Diagnostics();

    let state: ProjectModel;
    try {
      state = projectFromRecord(request.state);
    } catch (error) {
      reportError(diagnostics, error, 'Unable to load project state');
      return { state: null, diagnostics };
    }
    logger.debug('Loaded project from state', { readState: state });

    const projectId = state.id;
    if (projectId === null) {
      return missingId(diagnostics);
    }

    let next: ProjectModel;
    try {
      const project = await this.context.client.getProject(projectId, ctx);
      logger.debug('Retrieved project from API state');
      next = applyProjectResponse(state, project);
    } catch (error) {
      reportError(diagnostics, error, 'Unable to get project');
      return { state: null, diagnostics };
    }

    try {
      const remoteId = next.id ?? projectId;
      const page = await this.context.client.getIssueTypeSchemesForProjects(
        { projectIds: [parseNumericId(remoteId)], startAt: 0, maxResults: 1 },
        ctx
      );

      const issueTypeScheme = findIssueTypeSchemeForProject(page.values, remoteId);
      if (issueTypeScheme !== undefined) {
        next = { ...next, issueTypeScheme };
      }
    } catch (error) {
      reportError(diagnostics, error, 'Unable to get issue type schemes for project');
      return { state: null, diagnostics };
    }

    const newState = projectToRecord(next);
    logger.debug('Storing project into the state', { readNewState: newState });
    return { state: newState, diagnostics };
  }

  async update(
    ctx: OperationContext,
    request: { plan: AttributeRecord; state: AttributeRecord }
  ): Promise<HandlerResponse> {
    logger.debug('Updating project resource');
    const diagnostics = new Diagnostics();

    let plan: ProjectModel;
    let state: ProjectModel;
    try {
      plan = projectFromRecord(request.plan);
      state = projectFromRecord(request.state);
    } catch (error) {
      reportError(diagnostics, error, 'Unable to load project plan');
      return { state: null, diagnostics };
    }
    logger.debug('Loaded project plan', { updatePlan: plan });
    logger.debug('Loaded project from state', { updateState: state });

    // The update is keyed on the prior state's id, never the plan's
    const projectId = state.id;
    if (projectId === null) {
      return missingId(diagnostics);
    }

    let updated: JiraProject;
    try {
      updated = await this.context.client.updateProject(projectId, toProjectUpdatePayload(plan), ctx);
      logger.debug('Updated project in API state');
    } catch (error) {
      reportError(diagnostics, error, 'Unable to update project');
      return { state: null, diagnostics };
    }

    if (plan.issueTypeScheme !== null && plan.issueTypeScheme !== 0) {
      try {
        await this.context.client.assignIssueTypeScheme(String(plan.issueTypeScheme), updated.id, ctx);
        logger.debug('Assigned issue type scheme to project');
      } catch (error) {
        reportError(diagnostics, error, 'Unable to assign issue type scheme to project');
        return { state: null, diagnostics };
      }
    }

    try {
      const result = applyProjectResponse({ ...state, issueTypeScheme: plan.issueTypeScheme }, updated);
      const newState = projectToRecord(result);
      logger.debug('Storing project into the state', { updateNewState: newState });
      return { state: newState, diagnostics };
    } catch (error) {
      reportError(diagnostics, error, 'Unable to read updated project');
      return { state: null, diagnostics };
    }
  }

  async delete(ctx: OperationContext, request: { state: AttributeRecord }): Promise<HandlerResponse> {
    logger.debug('Deleting project resource');
    const diagnostics = new Diagnostics();

    let state: ProjectModel;
    try {
      state = projectFromRecord(request.state);
    } catch (error) {
      reportError(diagnostics, error, 'Unable to load project state');
      return { state: null, diagnostics };
    }
    logger.debug('Loaded project from state');

    if (state.id === null) {
      return missingId(diagnostics);
    }

    try {
      await this.context.client.deleteProject(state.id, false, ctx);
      logger.debug('Deleted project from API state');
    } catch (error) {
      reportError(diagnostics, error, 'Unable to delete project');
      return { state: null, diagnostics };
    }

    return { state: null, diagnostics };
  }
}
