/**
 * Fleet Configuration Loader
 *
 * Reads the fleet file (YAML or JSON), validates its shape with zod, then
 * checks cross-references. Any problem raises a single ConfigurationError
 * listing every issue found, before probing starts.
 *
 * The returned FleetDefinition is deeply frozen.
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, getErrorMessage } from '@regionguard/core';
import type {
  CandidateRegion,
  ControllerThresholds,
  FleetDefinition,
  RegionDefinition,
  ServiceDefinition
} from '@regionguard/types';
import { FleetConfigSchema, validateWithDetails } from './schemas';
import type { FleetConfig, ServiceSpec, ThresholdOverrides } from './schemas';
import { DEFAULT_THRESHOLDS } from './thresholds';

/**
 * Load and validate a fleet file. `.yaml`/`.yml` are parsed as YAML,
 * everything else as JSON.
 */
export function loadFleetConfig(path: string): FleetDefinition {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read fleet configuration ${path}`, [getErrorMessage(error)]);
  }

  let raw: unknown;
  try {
    const extension = extname(path).toLowerCase();
    raw = extension === '.yaml' || extension === '.yml' ? parseYaml(text) : JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse fleet configuration ${path}`, [getErrorMessage(error)]);
  }

  return parseFleetConfig(raw);
}

/**
 * Validate an already-parsed fleet document.
 */
export function parseFleetConfig(raw: unknown): FleetDefinition {
  const validation = validateWithDetails(FleetConfigSchema, raw);
  if (!validation.success || !validation.data) {
    const issues = (validation.errors ?? []).map(e => (e.path ? `${e.path}: ${e.message}` : e.message));
    throw new ConfigurationError('Invalid fleet configuration', issues);
  }

  const config = validation.data;
  const issues = crossCheck(config);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid fleet configuration', issues);
  }

  const regions: RegionDefinition[] = config.regions.map(region =>
    Object.freeze(region.displayName ? { id: region.id, displayName: region.displayName } : { id: region.id })
  );
  const services = config.services.map(service => resolveService(service, config.defaults));

  return Object.freeze({
    regions: Object.freeze(regions),
    services: Object.freeze(services)
  });
}

/**
 * Layer service overrides over fleet defaults over built-in defaults.
 */
export function resolveThresholds(
  defaults: ThresholdOverrides | undefined,
  overrides: ThresholdOverrides | undefined
): ControllerThresholds {
  const pick = <K extends keyof ControllerThresholds>(key: K, value: ControllerThresholds[K] | undefined, fleet: ControllerThresholds[K] | undefined): ControllerThresholds[K] =>
    value ?? fleet ?? DEFAULT_THRESHOLDS[key];

  return {
    probeIntervalMs: pick('probeIntervalMs', overrides?.probeIntervalMs, defaults?.probeIntervalMs),
    probeTimeoutMs: pick('probeTimeoutMs', overrides?.probeTimeoutMs, defaults?.probeTimeoutMs),
    degradeFailureThreshold: pick('degradeFailureThreshold', overrides?.degradeFailureThreshold, defaults?.degradeFailureThreshold),
    degradeFailureWindowMs: pick('degradeFailureWindowMs', overrides?.degradeFailureWindowMs, defaults?.degradeFailureWindowMs),
    recoverySuccessThreshold: pick('recoverySuccessThreshold', overrides?.recoverySuccessThreshold, defaults?.recoverySuccessThreshold),
    hardBurnRateThreshold: pick('hardBurnRateThreshold', overrides?.hardBurnRateThreshold, defaults?.hardBurnRateThreshold),
    sloWindows: Object.freeze({
      ...DEFAULT_THRESHOLDS.sloWindows,
      ...defaults?.sloWindows,
      ...overrides?.sloWindows
    }),
    verificationProbes: pick('verificationProbes', overrides?.verificationProbes, defaults?.verificationProbes),
    stepTimeoutMs: pick('stepTimeoutMs', overrides?.stepTimeoutMs, defaults?.stepTimeoutMs),
    stepMaxAttempts: pick('stepMaxAttempts', overrides?.stepMaxAttempts, defaults?.stepMaxAttempts),
    stepInitialBackoffMs: pick('stepInitialBackoffMs', overrides?.stepInitialBackoffMs, defaults?.stepInitialBackoffMs),
    stepMaxBackoffMs: pick('stepMaxBackoffMs', overrides?.stepMaxBackoffMs, defaults?.stepMaxBackoffMs),
    escalationIntervalMs: pick('escalationIntervalMs', overrides?.escalationIntervalMs, defaults?.escalationIntervalMs)
  };
}

function resolveService(spec: ServiceSpec, defaults: ThresholdOverrides | undefined): ServiceDefinition {
  const candidates: CandidateRegion[] = spec.candidates.map(candidate => Object.freeze({
    regionId: candidate.regionId,
    role: candidate.role,
    healthEndpoint: candidate.healthEndpoint,
    ...(candidate.controlUrl ? { controlUrl: candidate.controlUrl } : {})
  }));

  return Object.freeze({
    id: spec.id,
    candidates: Object.freeze(candidates),
    slo: Object.freeze(
      spec.slo.latencyCeilingMs !== undefined
        ? { target: spec.slo.target, latencyCeilingMs: spec.slo.latencyCeilingMs }
        : { target: spec.slo.target }
    ),
    rtoMs: spec.rtoMs,
    rpoMs: spec.rpoMs,
    thresholds: Object.freeze(resolveThresholds(defaults, spec.thresholds))
  });
}

function crossCheck(config: FleetConfig): string[] {
  const issues: string[] = [];

  const declaredRegions = new Set<string>();
  for (const region of config.regions) {
    if (declaredRegions.has(region.id)) {
      issues.push(`regions: duplicate region id "${region.id}"`);
    }
    declaredRegions.add(region.id);
  }

  const serviceIds = new Set<string>();
  for (const service of config.services) {
    const label = `services.${service.id}`;
    if (serviceIds.has(service.id)) {
      issues.push(`${label}: duplicate service id`);
    }
    serviceIds.add(service.id);

    const seen = new Set<string>();
    for (const candidate of service.candidates) {
      if (!declaredRegions.has(candidate.regionId)) {
        issues.push(`${label}: candidate region "${candidate.regionId}" is not declared in regions`);
      }
      if (seen.has(candidate.regionId)) {
        issues.push(`${label}: candidate region "${candidate.regionId}" listed twice`);
      }
      seen.add(candidate.regionId);
    }

    const primaries = service.candidates.filter(candidate => candidate.role === 'primary').length;
    if (primaries !== 1) {
      issues.push(`${label}: expected exactly one primary candidate, found ${primaries}`);
    }

    const thresholds = resolveThresholds(config.defaults, service.thresholds);
    if (thresholds.recoverySuccessThreshold <= thresholds.degradeFailureThreshold) {
      issues.push(
        `${label}: recoverySuccessThreshold (${thresholds.recoverySuccessThreshold}) must be greater than ` +
        `degradeFailureThreshold (${thresholds.degradeFailureThreshold})`
      );
    }
    if (thresholds.hardBurnRateThreshold <= 1) {
      issues.push(`${label}: hardBurnRateThreshold must be greater than 1, got ${thresholds.hardBurnRateThreshold}`);
    }
    if (thresholds.probeTimeoutMs > thresholds.probeIntervalMs) {
      issues.push(`${label}: probeTimeoutMs (${thresholds.probeTimeoutMs}) must not exceed probeIntervalMs (${thresholds.probeIntervalMs})`);
    }
    if (thresholds.stepInitialBackoffMs > thresholds.stepMaxBackoffMs) {
      issues.push(`${label}: stepInitialBackoffMs must not exceed stepMaxBackoffMs`);
    }

    const { short, long } = thresholds.sloWindows;
    if (short >= long) {
      issues.push(`${label}: sloWindows.short (${short}) must be shorter than sloWindows.long (${long})`);
    }
  }

  return issues;
}
