import { JiraApiError } from '../../../src/lib/jira-client';
import { WorkflowSchemeDataSource } from '../../../src/lib/handlers/workflow-scheme-data-source';
import { createFakeJiraApi, createTestContext } from '../../helpers/fake-jira';

describe('WorkflowSchemeDataSource', () => {
  const api = createFakeJiraApi();
  const dataSource = new WorkflowSchemeDataSource(createTestContext(api));

  beforeEach(() => {
    jest.resetAllMocks();
  });

  it('should be named after the provider type', () => {
    expect(dataSource.metadata('atlassian')).toBe('atlassian_jira_workflow_scheme');
  });

  it('should map the scheme fields into state with one call', async () => {
    api.getWorkflowScheme.mockResolvedValue({ id: '10000', name: 'Software Simplified', description: 'For teams' });

    const response = await dataSource.read({}, { config: { id: '10000', name: null, description: null } });

    expect(response.diagnostics.hasError()).toBe(false);
    expect(response.state).toEqual({ id: '10000', name: 'Software Simplified', description: 'For teams' });
    expect(api.getWorkflowScheme).toHaveBeenCalledTimes(1);
    expect(api.getWorkflowScheme).toHaveBeenCalledWith(10000, {});
  });

  it('should store an absent description as an empty string', async () => {
    api.getWorkflowScheme.mockResolvedValue({ id: '10000', name: 'Software Simplified' });

    const response = await dataSource.read({}, { config: { id: '10000' } });

    expect(response.state).toEqual({ id: '10000', name: 'Software Simplified', description: '' });
  });

  it('should reject a non-numeric id without calling Jira', async () => {
    const response = await dataSource.read({}, { config: { id: 'default' } });

    expect(response.state).toBeNull();
    expect(response.diagnostics.errors()).toEqual([
      {
        severity: 'error',
        summary: 'Unable to parse value of "id" attribute.',
        detail: 'Value of "id" attribute can only be a numeric string.',
        attributePath: 'id',
      },
    ]);
    expect(api.getWorkflowScheme).not.toHaveBeenCalled();
  });

  it('should report client failures with the response body', async () => {
    api.getWorkflowScheme.mockRejectedValue(
      new JiraApiError('Request failed with status code 404', { status: 404, body: 'Not Found' })
    );

    const response = await dataSource.read({}, { config: { id: '10000' } });

    expect(response.state).toBeNull();
    expect(response.diagnostics.errors()).toEqual([
      {
        severity: 'error',
        summary: 'Client Error',
        detail: 'Unable to get Jira workflow scheme, got error: Request failed with status code 404\nNot Found',
      },
    ]);
  });
});
