/**
 * Evidence Composer
 *
 * Attaches a rationale (consulted facts, catalog text, confidence) to every
 * finding and change event. Anything below the review threshold is not
 * asserted: it goes to the review queue with the facts that were consulted.
 */

import * as functions from 'firebase-functions';

import type { ChangeEvent, Finding, IsoDate } from '../types/clinical';
import { formatRegimen } from '../utils/doses';
import { compareIdentifiers } from '../utils/medicationName';
import { resolveEngineOptions, type EngineOptions } from './engineOptions';

export type ConfidenceLabel = 'high' | 'moderate' | 'low' | 'very_low';

export interface RationaleFacts {
  sourceRecordIds: string[];
  ruleIds: string[];
  periodIds: string[];
  dates: IsoDate[];
  catalogVersion: string;
}

export interface Rationale {
  summary: string;
  facts: RationaleFacts;
  mechanism: string | null;
  management: string | null;
  /** Ordered reasoning, from matched facts to the resulting confidence. */
  steps: string[];
  confidence: number;
  confidenceLabel: ConfidenceLabel;
}

export interface ExplainedFinding {
  finding: Finding;
  rationale: Rationale;
}

export interface ExplainedChange {
  change: ChangeEvent;
  rationale: Rationale;
}

interface ReviewBase {
  facts: RationaleFacts;
  confidence: number;
  reason: string;
}

export type ReviewItem =
  | (ReviewBase & { itemType: 'finding'; finding: Finding })
  | (ReviewBase & { itemType: 'change'; change: ChangeEvent });

export interface EvidenceBundle {
  findings: ExplainedFinding[];
  changes: ExplainedChange[];
  pendingReview: ReviewItem[];
}

export function confidenceLabel(confidence: number): ConfidenceLabel {
  if (confidence >= 0.9) return 'high';
  if (confidence >= 0.7) return 'moderate';
  if (confidence >= 0.5) return 'low';
  return 'very_low';
}

const uniqueSorted = (values: string[]): string[] => Array.from(new Set(values)).sort(compareIdentifiers);

// =============================================================================
// Findings
// =============================================================================

function findingRuleIds(finding: Finding): string[] {
  switch (finding.kind) {
    case 'drug_drug_interaction':
    case 'drug_class_interaction':
      return uniqueSorted([finding.rule.id, ...finding.supportingClassRules.map((rule) => rule.id)]);
    case 'contraindication':
      return uniqueSorted([finding.rule.id, ...finding.supportingRules.map((rule) => rule.id)]);
    case 'allergy_conflict':
    case 'duplicate_therapy':
      return [finding.ruleSource.ruleId];
    default: {
      const unreachable: never = finding;
      return unreachable;
    }
  }
}

function findingSummary(finding: Finding): string {
  switch (finding.kind) {
    case 'drug_drug_interaction':
      return `${finding.drugs[0]} + ${finding.drugs[1]}: ${finding.severity} drug interaction`;
    case 'drug_class_interaction':
      return `${finding.drugs[0]} (${finding.classes[0]}) + ${finding.drugs[1]} (${finding.classes[1]}): ${finding.severity} class interaction`;
    case 'allergy_conflict':
      return `${finding.drug} conflicts with documented ${finding.allergen} allergy`;
    case 'contraindication':
      return `${finding.drug} with ${finding.condition}: ${finding.severity} contraindication`;
    case 'duplicate_therapy':
      return finding.therapeuticClass === null
        ? `${finding.drugs[0]} is active under more than one regimen`
        : `Duplicate ${finding.therapeuticClass} therapy: ${finding.drugs.join(', ')}`;
    default: {
      const unreachable: never = finding;
      return unreachable;
    }
  }
}

function findingSteps(finding: Finding): string[] {
  const steps: string[] = [];
  switch (finding.kind) {
    case 'drug_drug_interaction':
      steps.push(`Both ${finding.drugs.join(' and ')} are active`);
      steps.push(`Exact rule ${finding.rule.id} matched`);
      if (finding.supportingClassRules.length > 0) {
        steps.push(
          `Class rules also matched: ${finding.supportingClassRules.map((rule) => rule.id).join(', ')}`,
        );
      }
      break;
    case 'drug_class_interaction':
      steps.push(`Both ${finding.drugs.join(' and ')} are active`);
      steps.push(`Class rule ${finding.rule.id} matched ${finding.classes.join(' / ')}`);
      break;
    case 'allergy_conflict':
      steps.push(`${finding.drug} is active`);
      steps.push(`Allergy to ${finding.allergen} matched by ${finding.matchedVia.replace('_', ' ')}`);
      break;
    case 'contraindication':
      steps.push(`${finding.drug} is active and ${finding.condition} is a chronic condition`);
      steps.push(`Rule ${finding.rule.id} matched by ${finding.matchedVia}`);
      break;
    case 'duplicate_therapy':
      steps.push(
        finding.therapeuticClass === null
          ? `${finding.drugs[0]} has overlapping active regimens`
          : `${finding.drugs.length} active drugs share class ${finding.therapeuticClass}`,
      );
      break;
    default: {
      const unreachable: never = finding;
      return unreachable;
    }
  }
  steps.push(
    `Confidence ${finding.confidence} = fact confidence ${finding.factConfidence} × ${finding.ruleSource.level} rule confidence ${finding.ruleConfidence}`,
  );
  return steps;
}

function findingFacts(finding: Finding): RationaleFacts {
  return {
    sourceRecordIds: finding.sourceRecordIds,
    ruleIds: findingRuleIds(finding),
    periodIds: [],
    dates: [],
    catalogVersion: finding.ruleSource.catalogVersion,
  };
}

export function explainFinding(finding: Finding): Rationale {
  return {
    summary: findingSummary(finding),
    facts: findingFacts(finding),
    mechanism: finding.mechanism,
    management: finding.recommendation,
    steps: findingSteps(finding),
    confidence: finding.confidence,
    confidenceLabel: confidenceLabel(finding.confidence),
  };
}

// =============================================================================
// Changes
// =============================================================================

function changeSummary(change: ChangeEvent): string {
  const previous = change.previousValue ? formatRegimen(change.previousValue) : null;
  const next = change.newValue ? formatRegimen(change.newValue) : null;

  switch (change.kind) {
    case 'started':
      return `Started ${change.drug}${next ? ` ${next}` : ''}`;
    case 'stopped':
      return `Stopped ${change.drug}`;
    case 'resumed':
      return `Resumed ${change.drug}${next ? ` ${next}` : ''} after a ${change.gapDays ?? 0}-day gap`;
    case 'continued':
      return `Continued ${change.drug}${next ? ` ${next}` : ''}`;
    case 'dose_increased':
      return `Increased ${change.drug} from ${previous} to ${next}`;
    case 'dose_decreased':
      return `Decreased ${change.drug} from ${previous} to ${next}`;
    case 'frequency_changed':
      return `Changed ${change.drug} frequency from ${previous} to ${next}`;
    default: {
      const unreachable: never = change.kind;
      return unreachable;
    }
  }
}

function changeFacts(change: ChangeEvent, catalogVersion: string): RationaleFacts {
  return {
    sourceRecordIds: change.sourceRecordIds,
    ruleIds: [],
    periodIds: change.periodIds,
    dates: [change.date],
    catalogVersion,
  };
}

export function explainChange(change: ChangeEvent, catalogVersion: string): Rationale {
  const steps = [`Observed on ${change.date} in ${change.sourceRecordIds.join(', ')}`];
  if (change.conflict) {
    steps.push(
      `Same-day conflict resolved in favour of the latest record; superseded ${change.conflict.supersededRecordIds.join(', ')}`,
    );
  }
  steps.push(`Confidence ${change.confidence} from record extraction`);

  return {
    summary: changeSummary(change),
    facts: changeFacts(change, catalogVersion),
    mechanism: null,
    management: null,
    steps,
    confidence: change.confidence,
    confidenceLabel: confidenceLabel(change.confidence),
  };
}

// =============================================================================
// Compose
// =============================================================================

const reviewReason = (confidence: number, threshold: number): string =>
  `Confidence ${confidence} is below the review threshold of ${threshold}`;

/**
 * Explain every finding and change; items under the review threshold are
 * queued for review instead of receiving an asserted rationale.
 */
export function composeEvidence(
  findings: ReadonlyArray<Finding>,
  changes: ReadonlyArray<ChangeEvent>,
  catalogVersion: string,
  options: EngineOptions = {},
): EvidenceBundle {
  const { reviewThreshold } = resolveEngineOptions(options);
  const bundle: EvidenceBundle = { findings: [], changes: [], pendingReview: [] };

  for (const finding of findings) {
    if (finding.confidence < reviewThreshold) {
      bundle.pendingReview.push({
        itemType: 'finding',
        finding,
        facts: findingFacts(finding),
        confidence: finding.confidence,
        reason: reviewReason(finding.confidence, reviewThreshold),
      });
    } else {
      bundle.findings.push({ finding, rationale: explainFinding(finding) });
    }
  }

  for (const change of changes) {
    if (change.confidence < reviewThreshold) {
      bundle.pendingReview.push({
        itemType: 'change',
        change,
        facts: changeFacts(change, catalogVersion),
        confidence: change.confidence,
        reason: reviewReason(change.confidence, reviewThreshold),
      });
    } else {
      bundle.changes.push({ change, rationale: explainChange(change, catalogVersion) });
    }
  }

  if (bundle.pendingReview.length > 0) {
    functions.logger.info('[evidenceComposer] Items queued for review', {
      pendingReview: bundle.pendingReview.length,
      threshold: reviewThreshold,
    });
  }

  return bundle;
}
