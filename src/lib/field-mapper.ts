/**
 * Pure conversions between attribute records, typed models and Jira payloads
 */

import { JiraIssueTypeSchemeProjects, JiraProject } from './jira-schemas';
import {
  AttributeRecord,
  AttributeValue,
  ProjectCreatePayload,
  ProjectModel,
  ProjectUpdatePayload,
} from './types';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/** Avatar URLs look like `/rest/api/3/universal_avatar/view/type/project/avatar/<id>` */
const AVATAR_ID_SEGMENT = 9;

/**
 * A value could not be converted. Attribute errors carry the offending path.
 */
export class FieldMappingError extends Error {
  readonly summary: string;
  readonly detail: string;
  readonly attributePath?: string;

  constructor(summary: string, detail: string, attributePath?: string) {
    super(`${summary}: ${detail}`);
    this.name = 'FieldMappingError';
    this.summary = summary;
    this.detail = detail;
    this.attributePath = attributePath;
  }
}

function valueOf(record: AttributeRecord, name: string): AttributeValue {
  return Object.prototype.hasOwnProperty.call(record, name) ? record[name] : null;
}

export function stringAttribute(record: AttributeRecord, name: string): string | null {
  const value = valueOf(record, name);
  if (value === null || typeof value === 'string') {
    return value;
  }
  throw new FieldMappingError(
    'Incorrect attribute value type',
    `Inappropriate value for attribute "${name}": string required.`,
    name
  );
}

export function int64Attribute(record: AttributeRecord, name: string): number | null {
  const value = valueOf(record, name);
  if (value === null || (typeof value === 'number' && Number.isSafeInteger(value))) {
    return value;
  }
  throw new FieldMappingError(
    'Incorrect attribute value type',
    `Inappropriate value for attribute "${name}": whole number required.`,
    name
  );
}

/**
 * Parse a decimal integer the way an id attribute is written: an optional
 * sign followed by digits, nothing else.
 */
export function parseNumericId(value: string | null, attribute = 'id'): number {
  const parsed = value !== null && /^[+-]?\d+$/.test(value) ? Number(value) : NaN;

  if (!Number.isSafeInteger(parsed)) {
    throw new FieldMappingError(
      `Unable to parse value of "${attribute}" attribute.`,
      `Value of "${attribute}" attribute can only be a numeric string.`,
      attribute
    );
  }

  return parsed;
}

/**
 * Narrow an int64 attribute to the 32-bit integers the Jira API accepts.
 * Null stays unset.
 */
export function toInt32(value: number | null, attribute: string): number | undefined {
  if (value === null) {
    return undefined;
  }

  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new FieldMappingError(
      'Value out of range',
      `Value of "${attribute}" attribute must be a 32-bit integer, got: ${value}.`,
      attribute
    );
  }

  return value;
}

/**
 * Extract the numeric avatar id from the path of a project avatar URL
 */
export function avatarIdFromUrl(avatarUrl: string | undefined): number {
  if (!avatarUrl) {
    throw new FieldMappingError('Unexpected API Response', 'The project has no 16x16 avatar URL to derive "avatar_id" from.');
  }

  let pathname: string;
  try {
    pathname = new URL(avatarUrl).pathname;
  } catch (error) {
    throw new FieldMappingError(
      'Unexpected API Response',
      `Unable to parse avatar URL "${avatarUrl}": ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const segment = pathname.split('/')[AVATAR_ID_SEGMENT];
  if (segment === undefined || !/^\d+$/.test(segment)) {
    throw new FieldMappingError(
      'Unexpected API Response',
      `Avatar URL "${avatarUrl}" has no numeric avatar id at path segment ${AVATAR_ID_SEGMENT}.`
    );
  }

  return Number(segment);
}

/**
 * Find the issue type scheme whose project list contains the given project id
 */
export function findIssueTypeSchemeForProject(
  associations: JiraIssueTypeSchemeProjects[],
  projectId: string
): number | undefined {
  const match = associations.find((association) => association.projectIds.includes(projectId));
  if (!match) {
    return undefined;
  }
  return parseNumericId(match.issueTypeScheme.id, 'issue_type_scheme');
}

export function projectFromRecord(record: AttributeRecord): ProjectModel {
  return {
    id: stringAttribute(record, 'id'),
    key: stringAttribute(record, 'key'),
    name: stringAttribute(record, 'name'),
    description: stringAttribute(record, 'description'),
    avatarId: int64Attribute(record, 'avatar_id'),
    fieldConfigurationScheme: int64Attribute(record, 'field_configuration_scheme'),
    issueTypeScheme: int64Attribute(record, 'issue_type_scheme'),
    issueTypeScreenScheme: int64Attribute(record, 'issue_type_screen_scheme'),
    workflowScheme: int64Attribute(record, 'workflow_scheme'),
    leadAccountId: stringAttribute(record, 'lead_account_id'),
    projectTypeKey: stringAttribute(record, 'project_type_key'),
    url: stringAttribute(record, 'url'),
  };
}

export function projectToRecord(project: ProjectModel): AttributeRecord {
  return {
    id: project.id,
    key: project.key,
    name: project.name,
    description: project.description,
    avatar_id: project.avatarId,
    field_configuration_scheme: project.fieldConfigurationScheme,
    issue_type_scheme: project.issueTypeScheme,
    issue_type_screen_scheme: project.issueTypeScreenScheme,
    workflow_scheme: project.workflowScheme,
    lead_account_id: project.leadAccountId,
    project_type_key: project.projectTypeKey,
    url: project.url,
  };
}

// Unset and empty values become undefined, which JSON serialization leaves out
function optionalString(value: string | null): string | undefined {
  return value === null || value === '' ? undefined : value;
}

// An empty string is sent so the field is cleared in Jira
function clearableString(value: string | null): string | undefined {
  return value === null ? undefined : value;
}

function requiredString(value: string | null, attribute: string): string {
  if (value === null || value === '') {
    throw new FieldMappingError(
      'Missing required argument',
      `The argument "${attribute}" is required, but no definition was found.`,
      attribute
    );
  }
  return value;
}

export function toProjectCreatePayload(plan: ProjectModel): ProjectCreatePayload {
  return {
    key: requiredString(plan.key, 'key'),
    name: requiredString(plan.name, 'name'),
    description: optionalString(plan.description),
    avatarId: toInt32(plan.avatarId, 'avatar_id'),
    fieldConfigurationScheme: toInt32(plan.fieldConfigurationScheme, 'field_configuration_scheme'),
    issueTypeScheme: toInt32(plan.issueTypeScheme, 'issue_type_scheme'),
    issueTypeScreenScheme: toInt32(plan.issueTypeScreenScheme, 'issue_type_screen_scheme'),
    workflowScheme: toInt32(plan.workflowScheme, 'workflow_scheme'),
    leadAccountId: optionalString(plan.leadAccountId),
    projectTypeKey: optionalString(plan.projectTypeKey),
    url: optionalString(plan.url),
  };
}

export function toProjectUpdatePayload(plan: ProjectModel): ProjectUpdatePayload {
  return {
    key: optionalString(plan.key),
    name: optionalString(plan.name),
    description: clearableString(plan.description),
    avatarId: toInt32(plan.avatarId, 'avatar_id'),
    projectTypeKey: optionalString(plan.projectTypeKey),
    url: clearableString(plan.url),
  };
}

/**
 * Overlay the fields Jira reports for a project onto a model. Fields the
 * project endpoint does not return (scheme assignments) keep the model's value.
 */
export function applyProjectResponse(model: ProjectModel, project: JiraProject): ProjectModel {
  return {
    ...model,
    id: project.id,
    key: project.key,
    name: project.name,
    description: project.description ?? '',
    avatarId: avatarIdFromUrl(project.avatarUrls?.['16x16']),
    leadAccountId: project.lead?.accountId ?? null,
    projectTypeKey: project.projectTypeKey ?? null,
    url: project.url ?? '',
  };
}
