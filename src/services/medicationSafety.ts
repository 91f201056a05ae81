/**
 * Medication Safety Service
 *
 * Evaluates the active medication set against the rule catalog:
 * 1. Drug interactions (exact pair rules, falling back to class rules)
 * 2. Allergy conflicts (substance, class and cross-reactivity)
 * 3. Contraindications for the patient's chronic conditions
 * 4. Duplicate therapy (two active drugs in one therapeutic class)
 */

import * as functions from 'firebase-functions';

import type { RuleCatalog } from '../data/ruleCatalog';
import {
  SEVERITY_RANK,
  type AllergyConflictFinding,
  type AllergyEntry,
  type AllergyMatch,
  type ContraindicationFinding,
  type Diagnostic,
  type DrugClassInteractionFinding,
  type DrugDrugInteractionFinding,
  type DuplicateTherapyFinding,
  type Finding,
  type MedicationPeriod,
  type PatientContext,
  type RiskLevel,
  type RuleLevel,
  type Severity,
} from '../types/clinical';
import { regimenKey } from '../utils/doses';
import { compareIdentifiers, normalizeDrugIdentity, normalizeTerm } from '../utils/medicationName';
import {
  propagateConfidence,
  resolveEngineOptions,
  roundConfidence,
  type EngineOptions,
  type ResolvedEngineOptions,
} from './engineOptions';

export interface SafetyEvaluationResult {
  findings: Finding[];
  diagnostics: Diagnostic[];
}

interface ActiveDrug {
  drug: string;
  /** Latest-starting active period; the others are extra active regimens. */
  period: MedicationPeriod;
  extraPeriods: MedicationPeriod[];
  classes: ReadonlyArray<string>;
  known: boolean;
}

interface NormalizedAllergy {
  substance: string;
  reaction: string | null;
}

interface ScoringContext {
  catalog: RuleCatalog;
  config: ResolvedEngineOptions;
}

const lowerSeverity = (a: Severity, b: Severity): Severity =>
  SEVERITY_RANK[a] <= SEVERITY_RANK[b] ? a : b;

function score(
  scoring: ScoringContext,
  drugs: ReadonlyArray<ActiveDrug>,
  level: RuleLevel,
  ruleConfidence?: number,
): { confidence: number; factConfidence: number; ruleConfidence: number } {
  const factConfidence = roundConfidence(
    propagateConfidence(
      drugs.map((entry) => entry.period.confidence),
      scoring.config.confidencePropagation,
    ),
  );
  const effectiveRuleConfidence =
    ruleConfidence ??
    (level === 'exact' ? scoring.config.exactRuleConfidence : scoring.config.classRuleConfidence);

  return {
    confidence: roundConfidence(factConfidence * effectiveRuleConfidence),
    factConfidence,
    ruleConfidence: effectiveRuleConfidence,
  };
}

const recordIdsOf = (drugs: ReadonlyArray<ActiveDrug>): string[] =>
  Array.from(
    new Set(
      drugs.flatMap((entry) => [
        ...entry.period.sourceRecordIds,
        ...entry.extraPeriods.flatMap((period) => period.sourceRecordIds),
      ]),
    ),
  ).sort(compareIdentifiers);

// =============================================================================
// Active set and context
// =============================================================================

function collectActiveDrugs(
  activePeriods: ReadonlyArray<MedicationPeriod>,
  catalog: RuleCatalog,
): ActiveDrug[] {
  const byDrug = new Map<string, MedicationPeriod[]>();
  for (const period of activePeriods) {
    const list = byDrug.get(period.drug) ?? [];
    list.push(period);
    byDrug.set(period.drug, list);
  }

  return Array.from(byDrug.entries())
    .sort(([a], [b]) => compareIdentifiers(a, b))
    .map(([drug, periods]) => {
      const [period, ...extraPeriods] = [...periods].sort(
        (a, b) => compareIdentifiers(b.start, a.start) || compareIdentifiers(a.id, b.id),
      );
      return {
        drug,
        period,
        extraPeriods,
        classes: catalog.classesOf(drug),
        known: catalog.isKnownDrug(drug),
      };
    });
}

/** One entry per allergen; the first documented reaction is kept. */
function normalizeAllergies(allergies: PatientContext['allergies']): NormalizedAllergy[] {
  const seen = new Map<string, NormalizedAllergy>();
  for (const entry of allergies) {
    const allergy: AllergyEntry = typeof entry === 'string' ? { substance: entry } : entry;
    const substance = allergy.substance.trim();
    if (!substance) continue;
    const reaction = allergy.reaction?.trim() || null;
    const key = normalizeTerm(substance);
    const existing = seen.get(key);
    if (!existing || (existing.reaction === null && reaction !== null)) {
      seen.set(key, { substance, reaction });
    }
  }
  return Array.from(seen.values());
}

const normalizeConditions = (conditions: ReadonlyArray<string>): string[] =>
  Array.from(new Set(conditions.map(normalizeTerm).filter((condition) => condition.length > 0))).sort(
    compareIdentifiers,
  );

// =============================================================================
// Checks
// =============================================================================

/**
 * Pairwise interaction check. An exact rule wins; matching class rules are
 * attached as supporting evidence. Without an exact rule, the most severe
 * class rule becomes the finding.
 */
function checkDrugInteractions(
  drugs: ReadonlyArray<ActiveDrug>,
  scoring: ScoringContext,
): Array<DrugDrugInteractionFinding | DrugClassInteractionFinding> {
  const findings: Array<DrugDrugInteractionFinding | DrugClassInteractionFinding> = [];
  const { catalog } = scoring;

  for (let i = 0; i < drugs.length; i++) {
    for (let j = i + 1; j < drugs.length; j++) {
      const [first, second] =
        compareIdentifiers(drugs[i].drug, drugs[j].drug) <= 0 ? [drugs[i], drugs[j]] : [drugs[j], drugs[i]];
      const pair: [string, string] = [first.drug, second.drug];
      const exact = catalog.findDrugInteraction(first.drug, second.drug);
      const classMatches = catalog.findClassInteractions(first.classes, second.classes);

      if (exact) {
        findings.push({
          kind: 'drug_drug_interaction',
          id: `drug_drug_interaction:${pair.join('+')}`,
          drugs: pair,
          severity: exact.severity,
          rule: exact,
          supportingClassRules: classMatches.map((match) => match.rule),
          ruleSource: { ruleId: exact.id, level: 'exact', catalogVersion: catalog.version },
          mechanism: exact.mechanism,
          recommendation: exact.management,
          sourceRecordIds: recordIdsOf([first, second]),
          ...score(scoring, [first, second], 'exact', exact.confidence),
        });
        continue;
      }

      const [strongest, ...supporting] = classMatches;
      if (!strongest) continue;

      findings.push({
        kind: 'drug_class_interaction',
        id: `drug_class_interaction:${pair.join('+')}`,
        drugs: pair,
        classes: strongest.classes,
        severity: strongest.rule.severity,
        rule: strongest.rule,
        supportingClassRules: supporting.map((match) => match.rule),
        ruleSource: { ruleId: strongest.rule.id, level: 'class', catalogVersion: catalog.version },
        mechanism: strongest.rule.mechanism,
        recommendation: strongest.rule.management,
        sourceRecordIds: recordIdsOf([first, second]),
        ...score(scoring, [first, second], 'class', strongest.rule.confidence),
      });
    }
  }

  return findings;
}

/**
 * Allergy check. Direct substance and class matches default to
 * contraindicated; the catalog may lower that for the documented reaction.
 * Cross-reactivity uses the severity its rule states.
 */
function checkAllergyConflicts(
  drugs: ReadonlyArray<ActiveDrug>,
  allergies: ReadonlyArray<NormalizedAllergy>,
  scoring: ScoringContext,
): AllergyConflictFinding[] {
  const findings: AllergyConflictFinding[] = [];
  const { catalog } = scoring;

  for (const entry of drugs) {
    for (const allergy of allergies) {
      const allergenTerm = normalizeTerm(allergy.substance);
      const reactionSeverity = allergy.reaction ? catalog.reactionSeverity(allergy.reaction) : undefined;
      const reactionNote = allergy.reaction ? ` (${allergy.reaction})` : '';

      let matchedVia: AllergyMatch | null = null;
      let severity: Severity = reactionSeverity ?? 'contraindicated';
      let ruleId = `allergy:${allergenTerm}`;
      let level: RuleLevel = 'exact';
      let mechanism = '';
      let recommendation = `Do not administer ${entry.drug}; select an agent the patient is not allergic to.`;

      if (normalizeDrugIdentity(allergy.substance) === entry.drug) {
        matchedVia = 'substance';
        mechanism = `Patient has a documented allergy to ${entry.drug}${reactionNote}.`;
      } else if (entry.classes.includes(allergenTerm)) {
        const className = catalog.classById(allergenTerm)?.name ?? allergenTerm;
        matchedVia = 'class';
        level = 'class';
        mechanism = `${entry.drug} belongs to the ${className} class; patient has a documented ${allergy.substance} allergy${reactionNote}.`;
      } else {
        const rule = catalog
          .crossReactivityFor(allergenTerm)
          .find((candidate) => candidate.target === entry.drug || entry.classes.includes(candidate.target));
        if (rule) {
          matchedVia = 'cross_reactivity';
          level = 'class';
          ruleId = rule.id;
          severity = reactionSeverity ? lowerSeverity(rule.severity, reactionSeverity) : rule.severity;
          mechanism = `${rule.mechanism}. Patient has a documented ${allergy.substance} allergy${reactionNote}.`;
          recommendation = `Confirm the ${allergy.substance} allergy history before giving ${entry.drug}; prefer an unrelated agent.`;
        }
      }

      if (!matchedVia) continue;

      findings.push({
        kind: 'allergy_conflict',
        id: `allergy_conflict:${entry.drug}+${allergenTerm}`,
        drug: entry.drug,
        allergen: allergy.substance,
        reaction: allergy.reaction,
        matchedVia,
        severity,
        ruleSource: { ruleId, level, catalogVersion: catalog.version },
        mechanism,
        recommendation,
        sourceRecordIds: recordIdsOf([entry]),
        ...score(scoring, [entry], level),
      });
    }
  }

  return findings;
}

/**
 * Contraindication check for every active drug and chronic condition. The
 * most severe matching rule is reported; other matches are supporting rules.
 */
function checkContraindications(
  drugs: ReadonlyArray<ActiveDrug>,
  conditions: ReadonlyArray<string>,
  scoring: ScoringContext,
): ContraindicationFinding[] {
  const findings: ContraindicationFinding[] = [];
  const { catalog } = scoring;

  for (const entry of drugs) {
    for (const condition of conditions) {
      const [top, ...rest] = catalog.findContraindications(entry.drug, entry.classes, condition);
      if (!top) continue;

      const level: RuleLevel = top.matchedVia === 'drug' ? 'exact' : 'class';
      findings.push({
        kind: 'contraindication',
        id: `contraindication:${entry.drug}+${condition}`,
        drug: entry.drug,
        condition,
        matchedVia: top.matchedVia,
        rule: top.rule,
        supportingRules: rest.map((match) => match.rule),
        severity: top.rule.severity,
        ruleSource: { ruleId: top.rule.id, level, catalogVersion: catalog.version },
        mechanism: top.rule.mechanism,
        recommendation: top.rule.management || `Review the use of ${entry.drug} with ${condition}.`,
        sourceRecordIds: recordIdsOf([entry]),
        ...score(scoring, [entry], level, top.rule.confidence),
      });
    }
  }

  return findings;
}

/**
 * Duplicate therapy: one drug active under two regimens, or two or more
 * drugs active in one non-broad class. A class group covered by a
 * combination-therapy allowance is noted as a diagnostic instead.
 */
function checkDuplicateTherapy(
  drugs: ReadonlyArray<ActiveDrug>,
  scoring: ScoringContext,
  diagnostics: Diagnostic[],
): DuplicateTherapyFinding[] {
  const findings: DuplicateTherapyFinding[] = [];
  const { catalog } = scoring;

  for (const entry of drugs) {
    // Periods that share a regimen are one therapy, not a duplicate.
    const regimens = new Set([entry.period, ...entry.extraPeriods].map((period) => regimenKey(period.regimen)));
    if (regimens.size < 2) continue;
    findings.push({
      kind: 'duplicate_therapy',
      id: `duplicate_therapy:${entry.drug}`,
      drugs: [entry.drug],
      therapeuticClass: null,
      severity: 'moderate',
      ruleSource: { ruleId: 'duplicate:same-drug', level: 'exact', catalogVersion: catalog.version },
      mechanism: `${entry.drug} is active under ${regimens.size} different regimens at the same time.`,
      recommendation: `Confirm which ${entry.drug} regimen is current and discontinue the other.`,
      sourceRecordIds: recordIdsOf([entry]),
      ...score(scoring, [entry], 'exact'),
    });
  }

  const membersByClass = new Map<string, ActiveDrug[]>();
  for (const entry of drugs) {
    for (const classId of entry.classes) {
      const therapeuticClass = catalog.classById(classId);
      if (!therapeuticClass || therapeuticClass.broad) continue;
      const members = membersByClass.get(classId) ?? [];
      members.push(entry);
      membersByClass.set(classId, members);
    }
  }

  for (const classId of Array.from(membersByClass.keys()).sort(compareIdentifiers)) {
    const members = membersByClass.get(classId) ?? [];
    if (members.length < 2) continue;

    const memberDrugs = members.map((member) => member.drug);
    const allowance = catalog.findCombinationAllowance(classId, memberDrugs);
    if (allowance) {
      diagnostics.push({
        kind: 'allowlisted_combination',
        drugs: memberDrugs,
        therapeuticClass: classId,
        allowanceId: allowance.id,
      });
      continue;
    }

    const therapeuticClass = catalog.classById(classId);
    const className = therapeuticClass?.name ?? classId;
    findings.push({
      kind: 'duplicate_therapy',
      id: `duplicate_therapy:${classId}:${memberDrugs.join('+')}`,
      drugs: memberDrugs,
      therapeuticClass: classId,
      severity: therapeuticClass?.duplicateSeverity ?? 'moderate',
      ruleSource: { ruleId: `duplicate:${classId}`, level: 'class', catalogVersion: catalog.version },
      mechanism: `${memberDrugs.join(' and ')} are both ${className} agents; combined use duplicates the same mechanism.`,
      recommendation: `Confirm both ${className} agents are intended; otherwise discontinue one.`,
      sourceRecordIds: recordIdsOf(members),
      ...score(scoring, members, 'class'),
    });
  }

  return findings;
}

// =============================================================================
// Ordering and summary
// =============================================================================

/** Entities a finding is about, used for ordering and display. */
export function involvedEntities(finding: Finding): string[] {
  switch (finding.kind) {
    case 'drug_drug_interaction':
    case 'drug_class_interaction':
    case 'duplicate_therapy':
      return [...finding.drugs];
    case 'allergy_conflict':
      return [finding.drug, finding.allergen];
    case 'contraindication':
      return [finding.drug, finding.condition];
    default: {
      const unreachable: never = finding;
      return unreachable;
    }
  }
}

export function compareFindings(a: Finding, b: Finding): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    compareIdentifiers(involvedEntities(a).join('|'), involvedEntities(b).join('|')) ||
    compareIdentifiers(a.kind, b.kind) ||
    compareIdentifiers(a.id, b.id)
  );
}

/**
 * Overall risk for a set of findings: any contraindicated finding is
 * critical, two or more major findings are high, a single major finding is
 * moderate, anything else is low.
 */
export function overallRiskLevel(findings: ReadonlyArray<Finding>): RiskLevel {
  if (findings.length === 0) return 'minimal';
  if (findings.some((finding) => finding.severity === 'contraindicated')) return 'critical';
  const majorCount = findings.filter((finding) => finding.severity === 'major').length;
  if (majorCount >= 2) return 'high';
  if (majorCount === 1) return 'moderate';
  return 'low';
}

// =============================================================================
// Entry point
// =============================================================================

/**
 * Run every safety check over the active periods. Drugs missing from the
 * catalog's class table only take part in exact checks and are reported as
 * catalog gaps.
 */
export function evaluateSafety(
  activePeriods: ReadonlyArray<MedicationPeriod>,
  context: PatientContext,
  catalog: RuleCatalog,
  options: EngineOptions = {},
): SafetyEvaluationResult {
  const scoring: ScoringContext = { catalog, config: resolveEngineOptions(options) };
  const diagnostics: Diagnostic[] = [];
  const drugs = collectActiveDrugs(activePeriods, catalog);

  for (const entry of drugs) {
    if (!entry.known) {
      diagnostics.push({
        kind: 'catalog_gap',
        drug: entry.drug,
        note: 'No therapeutic class membership; only exact-pair rules were checked.',
      });
    }
  }

  const findings: Finding[] = [
    ...checkDrugInteractions(drugs, scoring),
    ...checkAllergyConflicts(drugs, normalizeAllergies(context.allergies), scoring),
    ...checkContraindications(drugs, normalizeConditions(context.chronicConditions), scoring),
    ...checkDuplicateTherapy(drugs, scoring, diagnostics),
  ].sort(compareFindings);

  functions.logger.info('[medicationSafety] Checks completed', {
    activeDrugs: drugs.length,
    findings: findings.length,
    catalogGaps: diagnostics.filter((diagnostic) => diagnostic.kind === 'catalog_gap').length,
    riskLevel: overallRiskLevel(findings),
  });

  if (findings.some((finding) => SEVERITY_RANK[finding.severity] >= SEVERITY_RANK.major)) {
    functions.logger.warn('[medicationSafety] High severity findings', {
      findings: findings
        .filter((finding) => SEVERITY_RANK[finding.severity] >= SEVERITY_RANK.major)
        .map((finding) => ({ kind: finding.kind, severity: finding.severity, ruleId: finding.ruleSource.ruleId })),
    });
  }

  return { findings, diagnostics };
}
