/**
 * Configuration for the reasoning engine
 * Reads from environment variables (process.env)
 *
 * Optional environment variables:
 * - TIMELINE_CONTINUITY_WINDOW_DAYS: Days allowed between an explicit end and the next
 *   period before the gap counts as a treatment gap (default 0)
 * - TIMELINE_SIGNIFICANT_OVERLAP_DAYS: Concurrent use at or above this length is flagged (default 7)
 * - TIMELINE_CONFLICT_PENALTY: Confidence multiplier for periods built from a same-day conflict (default 0.5)
 * - SAFETY_EXACT_RULE_CONFIDENCE / SAFETY_CLASS_RULE_CONFIDENCE: Rule confidences (0.95 / 0.75)
 * - SAFETY_CONFIDENCE_PROPAGATION: "minimum" or "product" (default "minimum")
 * - EVIDENCE_REVIEW_THRESHOLD: Findings below this confidence go to review (default 0.4)
 * - RULE_CATALOG_DIR: Directory holding the rule catalog JSON files
 * - SENTRY_DSN: Enables error reporting
 *
 * Every value can also be overridden per engine through EngineOptions.
 */

import * as path from 'path';

export type ConfidencePropagation = 'minimum' | 'product';

const readNumber = (name: string, fallback: number): number => {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
};

const readPropagation = (): ConfidencePropagation =>
    process.env.SAFETY_CONFIDENCE_PROPAGATION === 'product' ? 'product' : 'minimum';

export const timelineConfig = {
    continuityWindowDays: readNumber('TIMELINE_CONTINUITY_WINDOW_DAYS', 0),
    significantOverlapDays: readNumber('TIMELINE_SIGNIFICANT_OVERLAP_DAYS', 7),
    conflictPenalty: readNumber('TIMELINE_CONFLICT_PENALTY', 0.5),
};

export const safetyConfig = {
    exactRuleConfidence: readNumber('SAFETY_EXACT_RULE_CONFIDENCE', 0.95),
    classRuleConfidence: readNumber('SAFETY_CLASS_RULE_CONFIDENCE', 0.75),
    confidencePropagation: readPropagation(),
};

export const evidenceConfig = {
    reviewThreshold: readNumber('EVIDENCE_REVIEW_THRESHOLD', 0.4),
};

export const catalogConfig = {
    directory: process.env.RULE_CATALOG_DIR || path.join(__dirname, 'data', 'catalog'),
};

export const sentryConfig = {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.NODE_ENV || 'development',
};
