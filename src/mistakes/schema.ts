/**
 * Durable store file validation
 */

import { z } from 'zod';
import { ToolNameSchema } from '../trace/schema.js';
import { MISTAKE_TYPES } from './types.js';

export const MistakeRecordSchema = z.object({
  mistake_type: z.enum(MISTAKE_TYPES),
  description: z.string(),
  corrective_rule: z.string(),
  identity_key: z.string().min(1),
  frequency: z.number().int().min(1),
  last_seen: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: 'last_seen must be an ISO-8601 timestamp',
  }),
  tools: z.array(ToolNameSchema).optional(),
  question: z.string().optional(),
});

export const RunStatsSchema = z.object({
  total_runs: z.number().int().nonnegative(),
  successful_runs: z.number().int().nonnegative(),
});

export const MistakeStoreFileSchema = z
  .object({
    version: z.literal(1).optional(),
    mistakes: z.array(MistakeRecordSchema).default([]),
    run_stats: RunStatsSchema.default({ total_runs: 0, successful_runs: 0 }),
  })
  .refine((file) => file.run_stats.successful_runs <= file.run_stats.total_runs, {
    message: 'successful_runs cannot exceed total_runs',
    path: ['run_stats'],
  });
