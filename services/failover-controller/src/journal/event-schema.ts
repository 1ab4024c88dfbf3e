/**
 * zod schema for failover events read back from storage.
 */

import { z } from 'zod';

export const StepRecordSchema = z.object({
  name: z.string(),
  status: z.enum(['pending', 'running', 'succeeded', 'skipped', 'failed', 'cancelled', 'compensated', 'compensation_failed']),
  attempts: z.number().int().min(0),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
  error: z.string().optional(),
  detail: z.string().optional()
});

export const FailoverEventSchema = z.object({
  id: z.string().min(1),
  serviceId: z.string().min(1),
  fromRegion: z.string().min(1),
  toRegion: z.string().min(1),
  trigger: z.enum(['automatic', 'manual']),
  reason: z.string(),
  triggeredAt: z.number(),
  phase: z.enum(['in_progress', 'verifying', 'rolling_back', 'completed', 'rolled_back', 'aborted']),
  steps: z.array(StepRecordSchema),
  replicationLagMs: z.number().optional(),
  targetStateBefore: z.enum(['healthy', 'degraded', 'unreachable', 'promoting', 'promoted', 'failed']).optional(),
  cancelledBy: z.string().optional(),
  completedAt: z.number().optional()
});
