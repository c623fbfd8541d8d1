import { z } from 'zod';

export const CURRENT_SESSION_VERSION = 2;

export const SESSION_STATUSES = ['in-progress', 'in-review'] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export const WorkLogEntrySchema = z.object({
  timestamp: z.string(),
  action: z.string(),
});

export const WorkSessionSchema = z.object({
  version: z.literal(CURRENT_SESSION_VERSION),
  issueNumber: z.number().int().positive(),
  title: z.string(),
  branch: z.string().min(1),
  /** null when the shared PR could not be created */
  prNumber: z.number().int().positive().nullable(),
  status: z.enum(SESSION_STATUSES),
  /** Board status recorded at the last hand-off, used to spot the review back-edge */
  lastStatus: z.string().nullable(),
  startedAt: z.string(),
  workLog: z.array(WorkLogEntrySchema),
  filesModified: z.array(z.string()),
  nextSteps: z.array(z.string()),
  testInstructions: z.string(),
});

export type WorkLogEntry = z.infer<typeof WorkLogEntrySchema>;

export type WorkSession = z.infer<typeof WorkSessionSchema>;

/**
 * Snake-case (v1) document. Numbers were stored as strings and `pr_number`
 * could be "failed".
 */
export const LegacySessionSchema = z.object({
  issue_number: z.union([z.string(), z.number()]),
  title: z.string().default(''),
  branch: z.string().default('wip'),
  pr_number: z.union([z.string(), z.number()]).nullable().optional(),
  status: z.string().default('in-progress'),
  last_status: z.string().nullable().optional(),
  started_at: z.string(),
  work_log: z.array(WorkLogEntrySchema).default([]),
  files_modified: z.array(z.string()).default([]),
  next_steps: z.array(z.string()).default([]),
  test_instructions: z.string().default(''),
});

export type LegacySession = z.infer<typeof LegacySessionSchema>;
