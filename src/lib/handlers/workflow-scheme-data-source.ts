/**
 * Jira workflow scheme data source
 */

import { Diagnostics, reportError } from '../diagnostics';
import { parseNumericId, stringAttribute } from '../field-mapper';
import { logger } from '../logger';
import { ProviderContext } from '../provider';
import { Schema } from '../schema';
import { AttributeRecord, WorkflowSchemeModel } from '../types';
import { DataSourceHandler, HandlerResponse, OperationContext } from './types';

const workflowSchemeSchema: Schema = {
  markdownDescription: 'Jira Workflow Scheme Data Source',
  attributes: {
    id: {
      type: 'string',
      markdownDescription: 'The ID of the workflow scheme.',
      required: true,
    },
    name: {
      type: 'string',
      markdownDescription: 'The name of the workflow scheme.',
      computed: true,
    },
    description: {
      type: 'string',
      markdownDescription: 'The description of the workflow scheme.',
      computed: true,
    },
  },
};

export class WorkflowSchemeDataSource implements DataSourceHandler {
  readonly kind = 'data' as const;
  private context: ProviderContext;

  constructor(context: ProviderContext) {
    this.context = context;
  }

  metadata(providerTypeName: string): string {
    return `${providerTypeName}_jira_workflow_scheme`;
  }

  schema(): Schema {
    return workflowSchemeSchema;
  }

  async read(ctx: OperationContext, request: { config: AttributeRecord }): Promise<HandlerResponse> {
    logger.debug('Reading workflow scheme data source');
    const diagnostics = new Diagnostics();

    let id: string;
    let workflowSchemeId: number;
    try {
      id = stringAttribute(request.config, 'id') ?? '';
      workflowSchemeId = parseNumericId(id);
    } catch (error) {
      reportError(diagnostics, error, 'Unable to read workflow scheme config');
      return { state: null, diagnostics };
    }
    logger.debug('Loaded workflow scheme config', { readConfig: request.config });

    try {
      const workflowScheme = await this.context.client.getWorkflowScheme(workflowSchemeId, ctx);
      logger.debug('Retrieved workflow scheme from API state', { readApiState: workflowScheme });

      const state: WorkflowSchemeModel = {
        id,
        name: workflowScheme.name,
        description: workflowScheme.description ?? '',
      };

      logger.debug('Storing workflow scheme info into the state');
      return { state, diagnostics };
    } catch (error) {
      reportError(diagnostics, error, 'Unable to get Jira workflow scheme');
      return { state: null, diagnostics };
    }
  }
}
