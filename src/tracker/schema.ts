import { z } from 'zod';

// Only the envelope is validated strictly. Individual fields are read
// leniently in fields.ts so one odd field never rejects a whole issue.

export const RawIssueSchema = z.object({
  key: z.string().min(1),
  fields: z.record(z.unknown()),
});

export type RawIssue = z.infer<typeof RawIssueSchema>;

export const SearchResponseSchema = z.object({
  startAt: z.number().int().default(0),
  maxResults: z.number().int().default(50),
  total: z.number().int().default(0),
  issues: z.array(RawIssueSchema).default([]),
});

export const CommentResponseSchema = z.object({
  id: z.string(),
});

export const NamedSchema = z.object({ name: z.string() });

export const ParentSchema = z.object({
  key: z.string(),
  fields: z.object({ summary: z.string().default('') }).default({}),
});

export const IssueLinkSchema = z.object({
  type: z.object({
    inward: z.string(),
    outward: z.string(),
  }),
  inwardIssue: z.object({ key: z.string() }).optional(),
  outwardIssue: z.object({ key: z.string() }).optional(),
});

export const ErrorBodySchema = z.object({
  errorMessages: z.array(z.string()).default([]),
  errors: z.record(z.string()).default({}),
});
