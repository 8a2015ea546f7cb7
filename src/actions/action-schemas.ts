import { z } from 'zod';
import { jsonValueSchema } from '../utils/json-value.schema';

const issueName = z.string().min(1).describe('Issue name, e.g. "000007_fix_login"');

export const setVariableArgs = z.object({
  name: z.string().min(1).describe('Context variable to set'),
  value: jsonValueSchema.describe('JSON value to store'),
});

export const logArgs = z.object({
  message: z.string().describe('Message to log'),
  level: z.enum(['debug', 'log', 'warn', 'error']).optional(),
});

export const abortArgs = z.object({
  reason: z.string().min(1).describe('Why the run is being aborted'),
});

export const issueCreateArgs = z.object({
  name: issueName,
  content: z.string().default('').describe('Markdown body of the issue'),
});

export const issueUpdateArgs = z.object({
  name: issueName,
  content: z.string().describe('New markdown content'),
  append: z
    .boolean()
    .optional()
    .describe('Append to the existing content instead of replacing it'),
});

export const issueNameArgs = z.object({ name: issueName });

export const noArgs = z.object({});

export const issueMergeArgs = z.object({
  name: issueName,
  delete_branch: z
    .boolean()
    .optional()
    .describe('Delete the work branch after a successful merge'),
});
