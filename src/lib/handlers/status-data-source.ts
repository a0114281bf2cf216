/**
 * Jira status data source
 */

import { Diagnostics, reportError } from '../diagnostics';
import { stringAttribute } from '../field-mapper';
import { logger } from '../logger';
import { ProviderContext } from '../provider';
import { Schema } from '../schema';
import { AttributeRecord, StatusModel } from '../types';
import { DataSourceHandler, HandlerResponse, OperationContext } from './types';

const statusSchema: Schema = {
  markdownDescription: 'Jira Status Data Source',
  attributes: {
    id: {
      type: 'string',
      markdownDescription: 'The ID of the status.',
      required: true,
    },
    name: {
      type: 'string',
      markdownDescription:
        'The name of the status. The name must be unique. The maximum length is 255 characters.',
      computed: true,
    },
    description: {
      type: 'string',
      markdownDescription: 'The description of the status. The maximum length is 255 characters.',
      computed: true,
    },
    category: {
      type: 'string',
      markdownDescription: 'The category of the status.',
      computed: true,
    },
  },
};

export class StatusDataSource implements DataSourceHandler {
  readonly kind = 'data' as const;
  private context: ProviderContext;

  constructor(context: ProviderContext) {
    this.context = context;
  }

  metadata(providerTypeName: string): string {
    return `${providerTypeName}_jira_status`;
  }

  schema(): Schema {
    return statusSchema;
  }

  async read(ctx: OperationContext, request: { config: AttributeRecord }): Promise<HandlerResponse> {
    logger.debug('Reading status data source');
    const diagnostics = new Diagnostics();

    let id: string;
    try {
      id = stringAttribute(request.config, 'id') ?? '';
    } catch (error) {
      reportError(diagnostics, error, 'Unable to read status config');
      return { state: null, diagnostics };
    }
    logger.debug('Loaded status config', { readConfig: request.config });

    // Status ids are passed through as given; only emptiness is rejected
    if (id === '') {
      diagnostics.addAttributeError(
        'id',
        'Unable to parse value of "id" attribute.',
        'Value of "id" attribute can only be a numeric string.'
      );
      return { state: null, diagnostics };
    }

    try {
      const statuses = await this.context.client.getStatuses([id], ctx);
      logger.debug('Retrieved status from API state', { readApiState: statuses });

      const status = statuses[0];
      if (!status) {
        diagnostics.addError('Client Error', `Unable to get Jira status, got error: no status found with ID ${id}`);
        return { state: null, diagnostics };
      }

      const state: StatusModel = {
        id,
        name: status.name,
        description: status.description ?? '',
        category: status.statusCategory,
      };

      logger.debug('Storing status info into the state');
      return { state, diagnostics };
    } catch (error) {
      reportError(diagnostics, error, 'Unable to get Jira status');
      return { state: null, diagnostics };
    }
  }
}
