/**
 * Clinical Reasoning Type Definitions
 *
 * Types for medication records, timeline periods, change events,
 * safety findings and diagnostics shared across the engine stages.
 */

// =============================================================================
// Primitives
// =============================================================================

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

export type Severity = 'minor' | 'moderate' | 'major' | 'contraindicated';

export const SEVERITY_RANK: Record<Severity, number> = {
    minor: 1,
    moderate: 2,
    major: 3,
    contraindicated: 4,
};

export const FREQUENCY_CODES = [
    'QD',
    'BID',
    'TID',
    'QID',
    'QHS',
    'Q4H',
    'Q6H',
    'Q8H',
    'Q12H',
    'QOD',
    'QW',
    'PRN',
] as const;

export type FrequencyCode = (typeof FREQUENCY_CODES)[number];

export const ROUTES = [
    'oral',
    'iv',
    'im',
    'sc',
    'topical',
    'inhaled',
    'sublingual',
    'rectal',
    'transdermal',
    'ophthalmic',
    'otic',
    'nasal',
    'other',
] as const;

export type Route = (typeof ROUTES)[number];

// =============================================================================
// Inputs
// =============================================================================

export type RecordStatus = 'active' | 'discontinued';

/**
 * One normalized medication observation, as produced by the upstream
 * extraction/normalization collaborator.
 */
export interface MedicationRecord {
    drugGenericName: string;
    doseValue: number;
    doseUnit: string;
    frequencyCode: FrequencyCode;
    route: Route;
    observedDate: IsoDate;
    explicitEndDate: IsoDate | null;
    sourcePrescriptionId: string;
    sourceVisitDate?: IsoDate;
    extractionConfidence: number;
    prescriber?: string;
    diagnoses?: string[];
    symptoms?: string[];
    /** ISO timestamp of when the prescription was recorded; breaks same-day ties. */
    recordedAt?: string;
    status?: RecordStatus;
}

export interface AllergyEntry {
    substance: string;
    reaction?: string;
}

export interface PatientContext {
    asOfDate: IsoDate;
    allergies: Array<string | AllergyEntry>;
    chronicConditions: string[];
    patientId?: string;
}

// =============================================================================
// Timeline
// =============================================================================

export interface Dose {
    value: number;
    unit: string;
}

export interface Regimen {
    dose: Dose;
    frequency: FrequencyCode;
}

export type PeriodEndReason = 'explicit' | 'superseded' | 'discontinued';

/** One visit's worth of records folded into a period. */
export interface PeriodObservation {
    date: IsoDate;
    sourceRecordIds: string[];
    /** Same-day records with a conflicting regimen that lost the tie-break. */
    supersededRecordIds: string[];
    confidence: number;
}

export interface MedicationPeriod {
    id: string;
    drug: string;
    start: IsoDate;
    end: IsoDate | null;
    endReason: PeriodEndReason | null;
    regimen: Regimen;
    route: Route;
    sourceRecordIds: string[];
    observations: PeriodObservation[];
    confidence: number;
    supersededRecordIds: string[];
    overlapsPrevious: boolean;
    diagnoses: string[];
    prescribers: string[];
}

export interface TreatmentGap {
    drug: string;
    from: IsoDate;
    to: IsoDate;
    days: number;
}

export interface RegimenOverlap {
    drug: string;
    periodIds: [string, string];
    from: IsoDate;
    to: IsoDate;
}

export interface ConcurrentUse {
    drugs: [string, string];
    from: IsoDate;
    to: IsoDate;
    days: number;
    significant: boolean;
}

export interface TimelineSnapshot {
    asOfDate: IsoDate;
    periods: MedicationPeriod[];
    byDrug: Record<string, MedicationPeriod[]>;
    active: MedicationPeriod[];
    gaps: TreatmentGap[];
    overlaps: RegimenOverlap[];
    concurrentUse: ConcurrentUse[];
    currentDrugs: string[];
    historicalDrugs: string[];
}

export type ChangeKind =
    | 'started'
    | 'stopped'
    | 'dose_increased'
    | 'dose_decreased'
    | 'frequency_changed'
    | 'continued'
    | 'resumed';

export interface ChangeEvent {
    id: string;
    drug: string;
    date: IsoDate;
    kind: ChangeKind;
    previousValue: Regimen | null;
    newValue: Regimen | null;
    periodIds: string[];
    sourceRecordIds: string[];
    confidence: number;
    gapDays?: number;
    /** Same-day conflicting prescriptions that lost the tie-break for this change. */
    conflict?: { supersededRecordIds: string[] };
}

// =============================================================================
// Findings
// =============================================================================

export type RuleLevel = 'exact' | 'class';

export interface RuleSource {
    ruleId: string;
    level: RuleLevel;
    catalogVersion: string;
}

export interface DrugInteractionRule {
    id: string;
    drugA: string;
    drugB: string;
    severity: Severity;
    mechanism: string;
    management: string;
    confidence?: number;
}

export interface ClassInteractionRule {
    id: string;
    classA: string;
    classB: string;
    severity: Severity;
    mechanism: string;
    management: string;
    confidence?: number;
}

export interface ContraindicationRule {
    id: string;
    drugOrClass: string;
    condition: string;
    severity: Severity;
    mechanism: string;
    management: string;
    confidence?: number;
}

interface FindingBase {
    id: string;
    severity: Severity;
    ruleSource: RuleSource;
    mechanism: string;
    recommendation: string;
    confidence: number;
    factConfidence: number;
    ruleConfidence: number;
    sourceRecordIds: string[];
}

export interface DrugDrugInteractionFinding extends FindingBase {
    kind: 'drug_drug_interaction';
    drugs: [string, string];
    rule: DrugInteractionRule;
    supportingClassRules: ClassInteractionRule[];
}

export interface DrugClassInteractionFinding extends FindingBase {
    kind: 'drug_class_interaction';
    drugs: [string, string];
    classes: [string, string];
    rule: ClassInteractionRule;
    supportingClassRules: ClassInteractionRule[];
}

export type AllergyMatch = 'substance' | 'class' | 'cross_reactivity';

export interface AllergyConflictFinding extends FindingBase {
    kind: 'allergy_conflict';
    drug: string;
    allergen: string;
    reaction: string | null;
    matchedVia: AllergyMatch;
}

export interface ContraindicationFinding extends FindingBase {
    kind: 'contraindication';
    drug: string;
    condition: string;
    matchedVia: 'drug' | 'class';
    rule: ContraindicationRule;
    supportingRules: ContraindicationRule[];
}

export interface DuplicateTherapyFinding extends FindingBase {
    kind: 'duplicate_therapy';
    drugs: string[];
    /** null when the same drug is active under two regimens. */
    therapeuticClass: string | null;
}

export type Finding =
    | DrugDrugInteractionFinding
    | DrugClassInteractionFinding
    | AllergyConflictFinding
    | ContraindicationFinding
    | DuplicateTherapyFinding;

export type FindingKind = Finding['kind'];

export type RiskLevel = 'critical' | 'high' | 'moderate' | 'low' | 'minimal';

// =============================================================================
// Diagnostics
// =============================================================================

export type Diagnostic =
    | { kind: 'invalid_record'; sourceId: string; issues: string[] }
    | { kind: 'future_record'; sourceId: string; observedDate: IsoDate }
    | { kind: 'catalog_gap'; drug: string; note: string }
    | {
        kind: 'ambiguous_same_day';
        drug: string;
        date: IsoDate;
        keptRecordId: string;
        supersededRecordIds: string[];
    }
    | {
        kind: 'orphan_discontinuation';
        drug: string;
        date: IsoDate;
        sourceRecordIds: string[];
        supersededRecordIds: string[];
    }
    | { kind: 'overlapping_regimens'; drug: string; periodIds: [string, string]; from: IsoDate; to: IsoDate }
    | { kind: 'unit_mismatch'; drug: string; date: IsoDate; fromUnit: string; toUnit: string }
    | { kind: 'allowlisted_combination'; drugs: string[]; therapeuticClass: string; allowanceId: string };

export type DiagnosticKind = Diagnostic['kind'];
