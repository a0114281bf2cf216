/**
 * Structured diagnostics returned by handler operations
 */

import { FieldMappingError } from './field-mapper';
import { JiraApiError } from './jira-client';

export type Severity = 'error' | 'warning';

export interface Diagnostic {
  severity: Severity;
  summary: string;
  detail: string;
  /** Configuration attribute the diagnostic is about, if any */
  attributePath?: string;
}

export class Diagnostics {
  private readonly items: Diagnostic[] = [];

  addError(summary: string, detail: string): void {
    this.items.push({ severity: 'error', summary, detail });
  }

  addWarning(summary: string, detail: string): void {
    this.items.push({ severity: 'warning', summary, detail });
  }

  addAttributeError(attributePath: string, summary: string, detail: string): void {
    this.items.push({ severity: 'error', summary, detail, attributePath });
  }

  append(other: Diagnostics | Diagnostic[]): void {
    const list = other instanceof Diagnostics ? other.all() : other;
    this.items.push(...list);
  }

  hasError(): boolean {
    return this.items.some((d) => d.severity === 'error');
  }

  errors(): Diagnostic[] {
    return this.items.filter((d) => d.severity === 'error');
  }

  all(): Diagnostic[] {
    return [...this.items];
  }

  get length(): number {
    return this.items.length;
  }
}

export class DiagnosticsError extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    super(diagnostics.map(formatDiagnostic).join('\n'));
    this.name = 'DiagnosticsError';
    this.diagnostics = diagnostics;
  }
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.attributePath ? ` (attribute "${diagnostic.attributePath}")` : '';
  return `${diagnostic.summary}${where}: ${diagnostic.detail}`;
}

/**
 * Detail text for a failed remote call: the error message, followed by the
 * raw response body when the API returned one.
 */
export function clientErrorDetail(action: string, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const body = error instanceof JiraApiError && error.body ? `\n${error.body}` : '';
  return `${action}, got error: ${message}${body}`;
}

/**
 * Record an error raised inside a handler operation. Mapping errors keep
 * their attribute path; client errors become "Client Error" diagnostics.
 * Anything else is rethrown.
 */
export function reportError(diagnostics: Diagnostics, error: unknown, action: string): void {
  if (error instanceof FieldMappingError) {
    if (error.attributePath) {
      diagnostics.addAttributeError(error.attributePath, error.summary, error.detail);
    } else {
      diagnostics.addError(error.summary, error.detail);
    }
    return;
  }

  if (error instanceof JiraApiError) {
    diagnostics.addError('Client Error', clientErrorDetail(action, error));
    return;
  }

  throw error;
}
