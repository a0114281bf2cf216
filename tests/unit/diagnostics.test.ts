import {
  clientErrorDetail,
  Diagnostics,
  DiagnosticsError,
  formatDiagnostic,
  reportError,
} from '../../src/lib/diagnostics';
import { FieldMappingError } from '../../src/lib/field-mapper';
import { JiraApiError } from '../../src/lib/jira-client';

describe('diagnostics', () => {
  it('should only count errors towards hasError', () => {
    const diagnostics = new Diagnostics();
    diagnostics.addWarning('Deprecated attribute', 'Use "lead_account_id" instead.');

    expect(diagnostics.hasError()).toBe(false);
    expect(diagnostics.length).toBe(1);

    diagnostics.addError('Client Error', 'boom');

    expect(diagnostics.hasError()).toBe(true);
    expect(diagnostics.errors()).toEqual([{ severity: 'error', summary: 'Client Error', detail: 'boom' }]);
  });

  it('should append diagnostics from another list', () => {
    const first = new Diagnostics();
    const second = new Diagnostics();
    second.addAttributeError('key', 'Invalid Attribute Value Length', 'too long');

    first.append(second);
    first.append([{ severity: 'warning', summary: 'Note', detail: 'noted' }]);

    expect(first.all().map((d) => d.summary)).toEqual(['Invalid Attribute Value Length', 'Note']);
  });

  it('should format attribute diagnostics with their path', () => {
    expect(
      formatDiagnostic({ severity: 'error', summary: 'Missing required argument', detail: 'No key.', attributePath: 'key' })
    ).toBe('Missing required argument (attribute "key"): No key.');
    expect(formatDiagnostic({ severity: 'error', summary: 'Client Error', detail: 'boom' })).toBe('Client Error: boom');
  });

  it('should join formatted diagnostics in DiagnosticsError', () => {
    const error = new DiagnosticsError([
      { severity: 'error', summary: 'A', detail: 'first' },
      { severity: 'error', summary: 'B', detail: 'second' },
    ]);

    expect(error.message).toBe('A: first\nB: second');
    expect(error.diagnostics).toHaveLength(2);
  });

  describe('clientErrorDetail', () => {
    it('should append the raw body when there is one', () => {
      const error = new JiraApiError('Request failed with status code 400', { status: 400, body: '{"errors":{}}' });

      expect(clientErrorDetail('Unable to get project', error)).toBe(
        'Unable to get project, got error: Request failed with status code 400\n{"errors":{}}'
      );
    });

    it('should use the message alone otherwise', () => {
      expect(clientErrorDetail('Unable to get project', new JiraApiError('socket hang up'))).toBe(
        'Unable to get project, got error: socket hang up'
      );
    });
  });

  describe('reportError', () => {
    it('should keep the attribute path of mapping errors', () => {
      const diagnostics = new Diagnostics();
      reportError(diagnostics, new FieldMappingError('Value out of range', 'too big', 'avatar_id'), 'Unable to create project');

      expect(diagnostics.errors()).toEqual([
        { severity: 'error', summary: 'Value out of range', detail: 'too big', attributePath: 'avatar_id' },
      ]);
    });

    it('should report mapping errors without a path as plain errors', () => {
      const diagnostics = new Diagnostics();
      reportError(diagnostics, new FieldMappingError('Unexpected API Response', 'no avatar'), 'Unable to get project');

      expect(diagnostics.errors()).toEqual([{ severity: 'error', summary: 'Unexpected API Response', detail: 'no avatar' }]);
    });

    it('should report client errors as Client Error', () => {
      const diagnostics = new Diagnostics();
      reportError(diagnostics, new JiraApiError('timeout of 30000ms exceeded'), 'Unable to delete project');

      expect(diagnostics.errors()).toEqual([
        {
          severity: 'error',
          summary: 'Client Error',
          detail: 'Unable to delete project, got error: timeout of 30000ms exceeded',
        },
      ]);
    });

    it('should rethrow anything else', () => {
      const diagnostics = new Diagnostics();
      const bug = new TypeError('undefined is not a function');

      expect(() => reportError(diagnostics, bug, 'Unable to get project')).toThrow(bug);
      expect(diagnostics.length).toBe(0);
    });
  });
});
