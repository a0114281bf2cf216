/**
 * Jira issue screen data source
 */

import { Diagnostics, reportError } from '../diagnostics';
import { parseNumericId, stringAttribute } from '../field-mapper';
import { logger } from '../logger';
import { ProviderContext } from '../provider';
import { Schema } from '../schema';
import { AttributeRecord, IssueScreenModel } from '../types';
import { DataSourceHandler, HandlerResponse, OperationContext } from './types';

const SCREEN_PAGE_SIZE = 50;

const issueScreenSchema: Schema = {
  markdownDescription: 'Jira Issue Screen Data Source',
  attributes: {
    id: {
      type: 'string',
      markdownDescription: 'The ID of the issue screen.',
      required: true,
    },
    name: {
      type: 'string',
      markdownDescription:
        'The name of the screen. The name must be unique. The maximum length is 255 characters.',
      computed: true,
    },
    description: {
      type: 'string',
      markdownDescription: 'The description of the screen. The maximum length is 255 characters.',
      computed: true,
    },
  },
};

export class IssueScreenDataSource implements DataSourceHandler {
  readonly kind = 'data' as const;
  private context: ProviderContext;

  constructor(context: ProviderContext) {
    this.context = context;
  }

  metadata(providerTypeName: string): string {
    return `${providerTypeName}_jira_issue_screen`;
  }

  schema(): Schema {
    return issueScreenSchema;
  }

  async read(ctx: OperationContext, request: { config: AttributeRecord }): Promise<HandlerResponse> {
    logger.debug('Reading issue screen data source');
    const diagnostics = new Diagnostics();

    let id: string;
    let issueScreenId: number;
    try {
      id = stringAttribute(request.config, 'id') ?? '';
      issueScreenId = parseNumericId(id);
    } catch (error) {
      reportError(diagnostics, error, 'Unable to read issue screen config');
      return { state: null, diagnostics };
    }
    logger.debug('Loaded issue screen config', { readConfig: request.config });

    try {
      const page = await this.context.client.getScreens(
        { ids: [issueScreenId], startAt: 0, maxResults: SCREEN_PAGE_SIZE },
        ctx
      );
      logger.debug('Retrieved issue screen from API state', { readApiState: page });

      const screen = page.values[0];
      if (!screen) {
        diagnostics.addError('Client Error', `Unable to get issue screen, got error: no screen found with ID ${id}`);
        return { state: null, diagnostics };
      }

      const state: IssueScreenModel = {
        id,
        name: screen.name,
        description: screen.description ?? '',
      };

      logger.debug('Storing issue screen info into the state');
      return { state, diagnostics };
    } catch (error) {
      reportError(diagnostics, error, 'Unable to get issue screen');
      return { state: null, diagnostics };
    }
  }
}
