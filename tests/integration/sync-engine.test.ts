import fs from 'fs';
import { DiagnosticsError } from '../../src/lib/diagnostics';
import { JiraApiError } from '../../src/lib/jira-client';
import { createHandlerRegistry } from '../../src/lib/provider';
import { emptyState, StateStore } from '../../src/lib/state-store';
import { parseAddress, SyncEngine } from '../../src/lib/sync-engine';
import { AttributeRecord, SyncConfig, SyncState } from '../../src/lib/types';
import { createFakeJiraApi, createTestContext, jiraProject } from '../helpers/fake-jira';

jest.mock('fs');

const STATE_PATH = '/work/.jira-sync-state.json';
const PROJECT = 'atlassian_jira_project';
const ADDRESS = `${PROJECT}.main`;

const remoteState: AttributeRecord = {
  id: '10001',
  key: 'TES',
  name: 'Test Project',
  description: 'Project used in tests',
  avatar_id: 10402,
  field_configuration_scheme: null,
  issue_type_scheme: 10200,
  issue_type_screen_scheme: null,
  workflow_scheme: null,
  lead_account_id: 'lead-account',
  project_type_key: 'software',
  url: 'https://docs.example.com/tes',
};

const matchingConfig = {
  key: 'TES',
  name: 'Test Project',
  description: 'Project used in tests',
  url: 'https://docs.example.com/tes',
  avatar_id: 10402,
  issue_type_scheme: 10200,
};

function syncConfig(resources: SyncConfig['resources'], data: SyncConfig['data'] = []): SyncConfig {
  return { provider: {}, data, resources };
}

describe('SyncEngine', () => {
  const mockedFs = jest.mocked(fs);
  const api = createFakeJiraApi();
  let files: Record<string, string>;
  let engine: SyncEngine;

  function seedState(resources: SyncState['resources']): void {
    files[STATE_PATH] = JSON.stringify({ ...emptyState(), resources });
  }

  function savedState(): SyncState {
    return JSON.parse(files[STATE_PATH]);
  }

  beforeEach(() => {
    jest.resetAllMocks();
    files = {};

    mockedFs.existsSync.mockImplementation((p) => String(p) in files);
    mockedFs.readFileSync.mockImplementation((p) => files[String(p)]);
    mockedFs.writeFileSync.mockImplementation((p, data) => {
      files[String(p)] = String(data);
    });

    api.getProject.mockResolvedValue(jiraProject());
    api.getIssueTypeSchemesForProjects.mockResolvedValue({
      values: [{ issueTypeScheme: { id: '10200', name: 'Software' }, projectIds: ['10001'] }],
    });

    engine = new SyncEngine(createHandlerRegistry(createTestContext(api)), StateStore.forConfig('/work/jira-sync.json'));
  });

  describe('plan', () => {
    it('should plan a create for a resource missing from state', async () => {
      const result = await engine.plan(
        syncConfig([{ type: PROJECT, name: 'main', config: { key: 'TES', name: 'Test Project', project_type_key: 'software' } }])
      );

      expect(result.errors).toEqual([]);
      expect(result.changes).toEqual([
        {
          address: ADDRESS,
          type: PROJECT,
          action: 'create',
          changedAttributes: [
            'key',
            'name',
            'description',
            'field_configuration_scheme',
            'issue_type_screen_scheme',
            'workflow_scheme',
            'project_type_key',
            'url',
          ],
          plan: {
            key: 'TES',
            name: 'Test Project',
            description: '',
            field_configuration_scheme: null,
            issue_type_screen_scheme: null,
            workflow_scheme: null,
            project_type_key: 'software',
            url: '',
          },
          prior: null,
        },
      ]);
      expect(api.getProject).not.toHaveBeenCalled();
      expect(mockedFs.writeFileSync).not.toHaveBeenCalled();
    });

    it('should read data sources into the plan result', async () => {
      api.getStatuses.mockResolvedValue([{ id: '10002', name: 'Done', statusCategory: 'DONE' }]);

      const result = await engine.plan(syncConfig([], [{ type: 'atlassian_jira_status', name: 'done', config: { id: '10002' } }]));

      expect(result.data).toEqual({
        'data.atlassian_jira_status.done': { id: '10002', name: 'Done', description: '', category: 'DONE' },
      });
    });

    it('should plan no change when Jira matches the configuration', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });

      const result = await engine.plan(syncConfig([{ type: PROJECT, name: 'main', config: matchingConfig }]));

      expect(result.changes).toHaveLength(1);
      expect(result.changes[0].action).toBe('no-op');
      expect(result.changes[0].changedAttributes).toEqual([]);
    });

    it('should plan an update with the changed attributes', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });

      const result = await engine.plan(
        syncConfig([{ type: PROJECT, name: 'main', config: { ...matchingConfig, name: 'Renamed' } }])
      );

      expect(result.changes[0]).toMatchObject({
        action: 'update',
        changedAttributes: ['name'],
        prior: remoteState,
      });
      expect(result.changes[0].plan).toMatchObject({ id: '10001', name: 'Renamed' });
    });

    it('should plan a delete for a resource removed from the configuration', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });

      const result = await engine.plan(syncConfig([]));

      expect(result.changes).toEqual([
        { address: ADDRESS, type: PROJECT, action: 'delete', changedAttributes: [], plan: null, prior: remoteState },
      ]);
      expect(api.getProject).not.toHaveBeenCalled();
    });

    it('should collect validation and type errors per address', async () => {
      const result = await engine.plan(
        syncConfig([
          { type: PROJECT, name: 'main', config: { key: 'WAYTOOLONGKEY', name: 'Test Project' } },
          { type: 'atlassian_jira_board', name: 'board', config: {} },
        ])
      );

      expect(result.changes).toEqual([]);
      expect(result.errors).toEqual([
        {
          address: ADDRESS,
          diagnostics: [
            {
              severity: 'error',
              summary: 'Invalid Attribute Value Length',
              detail: 'Attribute key string length must be at most 10, got: 13',
              attributePath: 'key',
            },
          ],
        },
        {
          address: 'atlassian_jira_board.board',
          diagnostics: [
            {
              severity: 'error',
              summary: 'Invalid resource type',
              detail: 'The provider does not support resource type "atlassian_jira_board".',
            },
          ],
        },
      ]);
    });

    it('should report a failed refresh', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });
      api.getProject.mockRejectedValue(new JiraApiError('Request failed with status code 503'));

      const result = await engine.plan(syncConfig([{ type: PROJECT, name: 'main', config: matchingConfig }]));

      expect(result.changes).toEqual([]);
      expect(result.errors[0].diagnostics[0].detail).toBe(
        'Unable to get project, got error: Request failed with status code 503'
      );
    });
  });

  describe('apply', () => {
    it('should create and record the new resource', async () => {
      api.createProject.mockResolvedValue({ id: '10001', key: 'TES' });
      const planned = await engine.plan(
        syncConfig([{ type: PROJECT, name: 'main', config: { key: 'TES', name: 'Test Project', project_type_key: 'software' } }])
      );

      const result = await engine.apply(planned);

      expect(result.created).toEqual([ADDRESS]);
      expect(result.errors).toEqual([]);
      const state = savedState();
      expect(state.resources[ADDRESS].attributes.id).toBe('10001');
      expect(state.resources[ADDRESS].type).toBe(PROJECT);
      expect(state.lastSync).not.toBe('1970-01-01T00:00:00.000Z');
    });

    it('should update through the handler and store the result', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });
      api.updateProject.mockResolvedValue(jiraProject({ name: 'Renamed' }));
      const planned = await engine.plan(
        syncConfig([{ type: PROJECT, name: 'main', config: { ...matchingConfig, name: 'Renamed' } }])
      );

      const result = await engine.apply(planned);

      expect(result.updated).toEqual([ADDRESS]);
      expect(api.updateProject).toHaveBeenCalledWith('10001', expect.objectContaining({ name: 'Renamed' }), {});
      expect(api.assignIssueTypeScheme).toHaveBeenCalledWith('10200', '10001', {});
      expect(savedState().resources[ADDRESS].attributes.name).toBe('Renamed');
    });

    it('should delete and forget the resource', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });
      const planned = await engine.plan(syncConfig([]));

      const result = await engine.apply(planned);

      expect(result.deleted).toEqual([ADDRESS]);
      expect(api.deleteProject).toHaveBeenCalledTimes(1);
      expect(api.deleteProject).toHaveBeenCalledWith('10001', false, {});
      expect(savedState().resources).toEqual({});
    });

    it('should keep unchanged resources and store data source reads', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });
      api.getStatuses.mockResolvedValue([{ id: '10002', name: 'Done', statusCategory: 'DONE' }]);
      const planned = await engine.plan(
        syncConfig(
          [{ type: PROJECT, name: 'main', config: matchingConfig }],
          [{ type: 'atlassian_jira_status', name: 'done', config: { id: '10002' } }]
        )
      );

      const result = await engine.apply(planned);

      expect(result.unchanged).toEqual([ADDRESS]);
      const state = savedState();
      expect(state.resources[ADDRESS].attributes).toEqual(remoteState);
      expect(state.data['data.atlassian_jira_status.done'].name).toBe('Done');
    });

    it('should settle after creating from a minimal config', async () => {
      api.createProject.mockResolvedValue({ id: '10001', key: 'TES' });
      const config = syncConfig([
        { type: PROJECT, name: 'main', config: { key: 'TES', name: 'Test Project', project_type_key: 'software' } },
      ]);
      await engine.apply(await engine.plan(config));

      const replanned = await engine.plan(config);
      const result = await engine.apply(replanned);

      expect(replanned.changes).toHaveLength(1);
      expect(replanned.changes[0].action).toBe('no-op');
      expect(result.unchanged).toEqual([ADDRESS]);
      expect(api.updateProject).not.toHaveBeenCalled();
      expect(savedState().resources[ADDRESS].attributes).toEqual(remoteState);
    });

    it('should drop data sources removed from the configuration', async () => {
      files[STATE_PATH] = JSON.stringify({
        ...emptyState(),
        data: { 'data.atlassian_jira_status.old': { id: '3', name: 'Old', description: '', category: 'TODO' } },
      });
      api.getStatuses.mockResolvedValue([{ id: '10002', name: 'Done', statusCategory: 'DONE' }]);
      const planned = await engine.plan(syncConfig([], [{ type: 'atlassian_jira_status', name: 'done', config: { id: '10002' } }]));

      await engine.apply(planned);

      expect(Object.keys(savedState().data)).toEqual(['data.atlassian_jira_status.done']);
    });

    it('should report a failed change and go on with the rest', async () => {
      seedState({ 'atlassian_jira_project.old': { type: PROJECT, attributes: { ...remoteState, id: '10005' } } });
      api.createProject.mockRejectedValue(new JiraApiError('Request failed with status code 400', { body: 'Bad key' }));
      const planned = await engine.plan(
        syncConfig([{ type: PROJECT, name: 'main', config: { key: 'TES', name: 'Test Project' } }])
      );

      const result = await engine.apply(planned);

      expect(result.errors).toEqual([
        {
          address: ADDRESS,
          diagnostics: [
            {
              severity: 'error',
              summary: 'Client Error',
              detail: 'Unable to create project, got error: Request failed with status code 400\nBad key',
            },
          ],
        },
      ]);
      expect(result.deleted).toEqual(['atlassian_jira_project.old']);
      expect(savedState().resources).toEqual({});
    });
  });

  describe('importResource', () => {
    it('should read the entity and store it at the address', async () => {
      const attributes = await engine.importResource(ADDRESS, '10001');

      expect(attributes).toEqual(remoteState);
      expect(savedState().resources[ADDRESS]).toEqual({ type: PROJECT, attributes });
    });

    it('should refuse an address that is already managed', async () => {
      seedState({ [ADDRESS]: { type: PROJECT, attributes: remoteState } });

      await expect(engine.importResource(ADDRESS, '10001')).rejects.toThrow(`${ADDRESS} is already managed`);
    });

    it('should refuse data source and unknown types', async () => {
      await expect(engine.importResource('atlassian_jira_status.done', '3')).rejects.toThrow(DiagnosticsError);
    });

    it('should surface read failures as diagnostics', async () => {
      api.getProject.mockRejectedValue(new JiraApiError('Request failed with status code 404'));

      await expect(engine.importResource(ADDRESS, '10001')).rejects.toThrow(
        'Client Error: Unable to get project, got error: Request failed with status code 404'
      );
      expect(files[STATE_PATH]).toBeUndefined();
    });
  });

  describe('parseAddress', () => {
    it('should split type and name', () => {
      expect(parseAddress('atlassian_jira_project.main')).toEqual({ type: 'atlassian_jira_project', name: 'main' });
    });

    it('should reject addresses without a name', () => {
      expect(() => parseAddress('atlassian_jira_project')).toThrow(
        'Invalid resource address: atlassian_jira_project. Expected "<type>.<name>"'
      );
      expect(() => parseAddress('atlassian_jira_project.')).toThrow('Invalid resource address');
    });
  });
});
