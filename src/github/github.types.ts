// src/github/github.types.ts
import { z } from 'zod';

export const workflowRunSchema = z.object({
  id: z.number().optional(),
  status: z.string(),
  conclusion: z.string().nullable(),
  html_url: z.string(),
});

export const workflowRunsResponseSchema = z.object({
  total_count: z.number().optional(),
  workflow_runs: z.array(workflowRunSchema),
});

export type WorkflowRun = z.infer<typeof workflowRunSchema>;

export interface DispatchResult {
  succeeded: boolean;
  message: string;
}

export type RunLookup =
  | { kind: 'found'; run: WorkflowRun }
  | { kind: 'empty' }
  | { kind: 'http-error'; status: number }
  | { kind: 'error'; message: string };
