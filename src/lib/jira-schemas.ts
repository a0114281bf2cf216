/**
 * Response schemas for the Jira Cloud REST API (v3) endpoints the handlers use
 */

import { z } from 'zod';

const numericId = z.union([z.number(), z.string()]).transform((value) => String(value));

export const jiraProjectSchema = z.object({
  id: numericId,
  key: z.string(),
  name: z.string(),
  description: z.string().optional(),
  avatarUrls: z.record(z.string()).optional(),
  lead: z
    .object({
      accountId: z.string(),
    })
    .optional(),
  projectTypeKey: z.string().optional(),
  url: z.string().optional(),
});

export const jiraCreatedProjectSchema = z.object({
  id: numericId,
  key: z.string(),
  self: z.string().optional(),
});

export const jiraWorkflowSchemeSchema = z.object({
  id: numericId,
  name: z.string(),
  description: z.string().optional(),
});

export const jiraStatusSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  statusCategory: z.string(),
});

export const jiraScreenSchema = z.object({
  id: numericId,
  name: z.string(),
  description: z.string().optional(),
});

export const jiraIssueTypeSchemeProjectsSchema = z.object({
  issueTypeScheme: z.object({
    id: z.string(),
    name: z.string(),
  }),
  projectIds: z.array(z.string()),
});

export function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    startAt: z.number().optional(),
    maxResults: z.number().optional(),
    total: z.number().optional(),
    isLast: z.boolean().optional(),
    values: z.array(item),
  });
}

export const jiraScreenPageSchema = pageOf(jiraScreenSchema);
export const jiraIssueTypeSchemeProjectsPageSchema = pageOf(jiraIssueTypeSchemeProjectsSchema);

export type JiraProject = z.infer<typeof jiraProjectSchema>;
export type JiraCreatedProject = z.infer<typeof jiraCreatedProjectSchema>;
export type JiraWorkflowScheme = z.infer<typeof jiraWorkflowSchemeSchema>;
export type JiraStatus = z.infer<typeof jiraStatusSchema>;
export type JiraScreen = z.infer<typeof jiraScreenSchema>;
export type JiraScreenPage = z.infer<typeof jiraScreenPageSchema>;
export type JiraIssueTypeSchemeProjects = z.infer<typeof jiraIssueTypeSchemeProjectsSchema>;
export type JiraIssueTypeSchemeProjectsPage = z.infer<typeof jiraIssueTypeSchemeProjectsPageSchema>;
