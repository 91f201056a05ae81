import {
  evidenceConfig,
  safetyConfig,
  timelineConfig,
  type ConfidencePropagation,
} from '../config';
import { EngineConfigurationError } from './common/errors';

/**
 * Tunable thresholds for one engine instance
 */
export interface EngineOptions {
  /** Days allowed between a period's end and the next start before it counts as a treatment gap. */
  continuityWindowDays?: number;
  /** Concurrent use of two drugs at or above this many days is flagged as significant. */
  significantOverlapDays?: number;
  /** Confidence multiplier for a period whose regimen came from a same-day conflict. */
  conflictPenalty?: number;
  exactRuleConfidence?: number;
  classRuleConfidence?: number;
  confidencePropagation?: ConfidencePropagation;
  /** Findings and changes below this confidence are queued for review instead of asserted. */
  reviewThreshold?: number;
}

export type ResolvedEngineOptions = Required<EngineOptions>;

/**
 * Default options, from the environment-backed config
 */
const DEFAULT_OPTIONS: ResolvedEngineOptions = {
  continuityWindowDays: timelineConfig.continuityWindowDays,
  significantOverlapDays: timelineConfig.significantOverlapDays,
  conflictPenalty: timelineConfig.conflictPenalty,
  exactRuleConfidence: safetyConfig.exactRuleConfidence,
  classRuleConfidence: safetyConfig.classRuleConfidence,
  confidencePropagation: safetyConfig.confidencePropagation,
  reviewThreshold: evidenceConfig.reviewThreshold,
};

const UNIT_INTERVAL_KEYS = [
  'conflictPenalty',
  'exactRuleConfidence',
  'classRuleConfidence',
  'reviewThreshold',
] as const;

const NON_NEGATIVE_KEYS = ['continuityWindowDays', 'significantOverlapDays'] as const;

/**
 * Merge caller options over the defaults and reject out-of-range values.
 */
export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const resolved: ResolvedEngineOptions = {
    continuityWindowDays: options.continuityWindowDays ?? DEFAULT_OPTIONS.continuityWindowDays,
    significantOverlapDays: options.significantOverlapDays ?? DEFAULT_OPTIONS.significantOverlapDays,
    conflictPenalty: options.conflictPenalty ?? DEFAULT_OPTIONS.conflictPenalty,
    exactRuleConfidence: options.exactRuleConfidence ?? DEFAULT_OPTIONS.exactRuleConfidence,
    classRuleConfidence: options.classRuleConfidence ?? DEFAULT_OPTIONS.classRuleConfidence,
    confidencePropagation: options.confidencePropagation ?? DEFAULT_OPTIONS.confidencePropagation,
    reviewThreshold: options.reviewThreshold ?? DEFAULT_OPTIONS.reviewThreshold,
  };

  for (const key of NON_NEGATIVE_KEYS) {
    const value = resolved[key];
    if (!Number.isFinite(value) || value < 0) {
      throw new EngineConfigurationError(`${key} must be a non-negative number (received ${value})`);
    }
  }

  for (const key of UNIT_INTERVAL_KEYS) {
    const value = resolved[key];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new EngineConfigurationError(`${key} must be between 0 and 1 (received ${value})`);
    }
  }

  if (resolved.confidencePropagation !== 'minimum' && resolved.confidencePropagation !== 'product') {
    throw new EngineConfigurationError(
      `confidencePropagation must be "minimum" or "product" (received ${String(resolved.confidencePropagation)})`,
    );
  }

  return resolved;
}

/** Combine the confidences of the facts a finding depends on. */
export function propagateConfidence(
  confidences: ReadonlyArray<number>,
  mode: ConfidencePropagation,
): number {
  if (confidences.length === 0) {
    return 1;
  }
  return mode === 'product'
    ? confidences.reduce((product, value) => product * value, 1)
    : Math.min(...confidences);
}

export function roundConfidence(value: number): number {
  return Math.round(value * 10000) / 10000;
}
