/**
 * Zod Schema Validation for the Fleet Configuration
 *
 * Shape checks only. Cross-references between regions and services
 * (declared regions, single primary, M > N) live in fleet-loader.ts.
 *
 * Validation runs once at load time, before any probe is scheduled.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

export const PositiveIntSchema = z
  .number()
  .int()
  .positive('Value must be a positive integer');

export const NonNegativeIntSchema = z
  .number()
  .int()
  .min(0, 'Value cannot be negative');

/**
 * HTTP(S) URL. Health endpoints and control planes are plain HTTP services.
 */
export const HttpUrlSchema = z
  .string()
  .url('Invalid URL format')
  .regex(/^https?:\/\//, 'URL must start with http:// or https://');

export const IdentifierSchema = z
  .string()
  .min(1, 'Identifier is required')
  .regex(/^[a-z0-9][a-z0-9-_.]*$/i, 'Identifier may only contain letters, digits, "-", "_" and "."');

// =============================================================================
// Threshold Schemas
// =============================================================================

export const SloWindowsSchema = z.record(z.string().min(1), PositiveIntSchema);

/**
 * Every field optional: values are layered over the built-in defaults.
 */
export const ThresholdOverridesSchema = z.object({
  probeIntervalMs: PositiveIntSchema.optional(),
  probeTimeoutMs: PositiveIntSchema.optional(),
  degradeFailureThreshold: PositiveIntSchema.optional().describe('N'),
  degradeFailureWindowMs: PositiveIntSchema.optional().describe('T'),
  recoverySuccessThreshold: PositiveIntSchema.optional().describe('M'),
  hardBurnRateThreshold: z.number().positive().optional(),
  sloWindows: SloWindowsSchema.optional(),
  verificationProbes: PositiveIntSchema.optional(),
  stepTimeoutMs: PositiveIntSchema.optional(),
  stepMaxAttempts: PositiveIntSchema.optional(),
  stepInitialBackoffMs: NonNegativeIntSchema.optional(),
  stepMaxBackoffMs: NonNegativeIntSchema.optional(),
  escalationIntervalMs: PositiveIntSchema.optional(),
}).strict();

// =============================================================================
// Fleet Schemas
// =============================================================================

export const RegionRoleSchema = z.enum(['primary', 'standby', 'cold']);

export const RegionSpecSchema = z.object({
  id: IdentifierSchema,
  displayName: z.string().optional(),
});

export const CandidateSpecSchema = z.object({
  regionId: IdentifierSchema,
  role: RegionRoleSchema,
  healthEndpoint: HttpUrlSchema,
  controlUrl: HttpUrlSchema.optional(),
});

export const SloSpecSchema = z.object({
  target: z
    .number()
    .gt(0, 'SLO target must be greater than 0')
    .lt(1, 'SLO target must be less than 1'),
  latencyCeilingMs: PositiveIntSchema.optional(),
});

export const ServiceSpecSchema = z.object({
  id: IdentifierSchema,
  candidates: z.array(CandidateSpecSchema).min(2, 'A service needs at least two candidate regions'),
  slo: SloSpecSchema,
  rtoMs: PositiveIntSchema,
  rpoMs: NonNegativeIntSchema,
  thresholds: ThresholdOverridesSchema.optional(),
});

export const FleetConfigSchema = z.object({
  regions: z.array(RegionSpecSchema).min(1, 'At least one region is required'),
  defaults: ThresholdOverridesSchema.optional(),
  services: z.array(ServiceSpecSchema).min(1, 'At least one service is required'),
});

export type ThresholdOverrides = z.infer<typeof ThresholdOverridesSchema>;
export type RegionSpec = z.infer<typeof RegionSpecSchema>;
export type CandidateSpec = z.infer<typeof CandidateSpecSchema>;
export type ServiceSpec = z.infer<typeof ServiceSpecSchema>;
export type FleetConfig = z.infer<typeof FleetConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: Array<{
    path: string;
    message: string;
  }>;
}

/**
 * Validate data against a schema and return a detailed result.
 * Does NOT throw.
 */
export function validateWithDetails<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}
