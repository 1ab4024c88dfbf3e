/**
 * @regionguard/config
 *
 * Fleet file schemas and loader, threshold defaults, process settings.
 */

export { DEFAULT_THRESHOLDS, DEFAULT_SLO_WINDOWS } from './thresholds';

export {
  loadFleetConfig,
  parseFleetConfig,
  resolveThresholds
} from './fleet-loader';

export {
  FleetConfigSchema,
  ServiceSpecSchema,
  CandidateSpecSchema,
  RegionSpecSchema,
  SloSpecSchema,
  ThresholdOverridesSchema,
  HttpUrlSchema,
  validateWithDetails
} from './schemas';
export type {
  FleetConfig,
  ServiceSpec,
  CandidateSpec,
  RegionSpec,
  ThresholdOverrides,
  ValidationResult
} from './schemas';

export {
  getControllerSettings,
  parseOverrideApiKeys
} from './service-config';
export type { ControllerSettings, OverrideApiKey } from './service-config';
