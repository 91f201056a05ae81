/**
 * Change Detector
 *
 * Classifies what happened to each drug between consecutive periods:
 * started, continued, dose_increased, dose_decreased, frequency_changed,
 * stopped and resumed. Depends only on the periods and the as-of date.
 */

import * as functions from 'firebase-functions';

import type {
  ChangeEvent,
  ChangeKind,
  Diagnostic,
  IsoDate,
  MedicationPeriod,
  MedicationRecord,
  PeriodObservation,
  Regimen,
  TreatmentGap,
} from '../types/clinical';
import { compareIsoDates } from '../utils/dates';
import { compareDoses, sameRegimen } from '../utils/doses';
import { compareIdentifiers, normalizeDrugIdentity } from '../utils/medicationName';
import { resolveEngineOptions, type EngineOptions } from './engineOptions';
import { findTreatmentGaps, type GapBeforePeriod } from './timelineBuilder';

export interface ChangeDetectionResult {
  changes: ChangeEvent[];
  gaps: TreatmentGap[];
  diagnostics: Diagnostic[];
}

interface SequencedEvent {
  event: ChangeEvent;
  sequence: number;
}

const conflictOf = (observation: PeriodObservation): ChangeEvent['conflict'] =>
  observation.supersededRecordIds.length > 0
    ? { supersededRecordIds: observation.supersededRecordIds }
    : undefined;

function makeEvent(
  drug: string,
  date: IsoDate,
  kind: ChangeKind,
  fields: {
    previousValue: Regimen | null;
    newValue: Regimen | null;
    periodIds: string[];
    observation: PeriodObservation;
    gapDays?: number;
  },
): ChangeEvent {
  const event: ChangeEvent = {
    id: `change:${drug}:${date}:${kind}`,
    drug,
    date,
    kind,
    previousValue: fields.previousValue,
    newValue: fields.newValue,
    periodIds: fields.periodIds,
    sourceRecordIds: fields.observation.sourceRecordIds,
    confidence: fields.observation.confidence,
  };
  if (fields.gapDays !== undefined) {
    event.gapDays = fields.gapDays;
  }
  const conflict = conflictOf(fields.observation);
  if (conflict) {
    event.conflict = conflict;
  }
  return event;
}

const lastObservation = (period: MedicationPeriod): PeriodObservation =>
  period.observations[period.observations.length - 1];

/**
 * Kind of a contiguous transition between two regimens. A dose change wins
 * over a frequency change.
 */
function classifyTransition(
  drug: string,
  date: IsoDate,
  previous: Regimen,
  next: Regimen,
  diagnostics: Diagnostic[],
): ChangeKind {
  if (sameRegimen(previous, next)) {
    return 'continued';
  }

  const dose = compareDoses(previous.dose, next.dose);
  if (!dose.comparable) {
    diagnostics.push({
      kind: 'unit_mismatch',
      drug,
      date,
      fromUnit: previous.dose.unit,
      toUnit: next.dose.unit,
    });
  }
  if (dose.direction > 0) return 'dose_increased';
  if (dose.direction < 0) return 'dose_decreased';
  if (previous.frequency !== next.frequency) return 'frequency_changed';
  return 'continued';
}

function detectDrugChanges(
  drug: string,
  periods: ReadonlyArray<MedicationPeriod>,
  asOfDate: IsoDate,
  continuityWindowDays: number,
  diagnostics: Diagnostic[],
): { events: ChangeEvent[]; gaps: TreatmentGap[] } {
  const events: ChangeEvent[] = [];
  const gaps = findTreatmentGaps(periods, continuityWindowDays);
  const gapByIndex = new Map<number, GapBeforePeriod>(gaps.map((entry) => [entry.index, entry]));

  periods.forEach((period, index) => {
    const opening = period.observations[0];
    const gapEntry = gapByIndex.get(index);

    if (index === 0) {
      events.push(
        makeEvent(drug, period.start, 'started', {
          previousValue: null,
          newValue: period.regimen,
          periodIds: [period.id],
          observation: opening,
        }),
      );
    } else if (gapEntry) {
      const { previous, gap } = gapEntry;
      events.push(
        makeEvent(drug, gap.from, 'stopped', {
          previousValue: previous.regimen,
          newValue: null,
          periodIds: [previous.id],
          observation: lastObservation(previous),
          gapDays: gap.days,
        }),
        makeEvent(drug, period.start, 'resumed', {
          previousValue: previous.regimen,
          newValue: period.regimen,
          periodIds: [previous.id, period.id],
          observation: opening,
          gapDays: gap.days,
        }),
      );
    } else {
      const previous = periods[index - 1];
      const kind = classifyTransition(drug, period.start, previous.regimen, period.regimen, diagnostics);
      events.push(
        makeEvent(drug, period.start, kind, {
          previousValue: previous.regimen,
          newValue: period.regimen,
          periodIds: [previous.id, period.id],
          observation: opening,
        }),
      );
    }

    for (const observation of period.observations.slice(1)) {
      events.push(
        makeEvent(drug, observation.date, 'continued', {
          previousValue: period.regimen,
          newValue: period.regimen,
          periodIds: [period.id],
          observation,
        }),
      );
    }
  });

  // Therapy that ended on or before the as-of date closes with a terminal stop.
  let terminal: { end: IsoDate; period: MedicationPeriod } | null = null;
  let stillOpen = false;
  for (const period of periods) {
    if (period.end === null) {
      stillOpen = true;
      break;
    }
    if (!terminal || compareIsoDates(period.end, terminal.end) >= 0) {
      terminal = { end: period.end, period };
    }
  }

  if (!stillOpen && terminal && compareIsoDates(terminal.end, asOfDate) <= 0) {
    events.push(
      makeEvent(drug, terminal.end, 'stopped', {
        previousValue: terminal.period.regimen,
        newValue: null,
        periodIds: [terminal.period.id],
        observation: lastObservation(terminal.period),
      }),
    );
  }

  return { events, gaps: gaps.map((entry) => entry.gap) };
}

/**
 * Change events for every drug, ordered by date, then drug, then the order
 * in which they happened for that drug.
 */
export function detectChanges(
  periodsByDrug: Readonly<Record<string, ReadonlyArray<MedicationPeriod>>>,
  asOfDate: IsoDate,
  options: EngineOptions = {},
): ChangeDetectionResult {
  const config = resolveEngineOptions(options);
  const diagnostics: Diagnostic[] = [];
  const sequenced: SequencedEvent[] = [];
  const gaps: TreatmentGap[] = [];

  for (const drug of Object.keys(periodsByDrug).sort(compareIdentifiers)) {
    const periods = [...periodsByDrug[drug]].sort(
      (a, b) => compareIsoDates(a.start, b.start) || compareIdentifiers(a.id, b.id),
    );
    const result = detectDrugChanges(drug, periods, asOfDate, config.continuityWindowDays, diagnostics);
    result.events.forEach((event, sequence) => sequenced.push({ event, sequence }));
    gaps.push(...result.gaps);
  }

  const changes = sequenced
    .sort(
      (a, b) =>
        compareIsoDates(a.event.date, b.event.date) ||
        compareIdentifiers(a.event.drug, b.event.drug) ||
        a.sequence - b.sequence,
    )
    .map((entry) => entry.event);

  functions.logger.info('[changeDetector] Classified medication changes', {
    drugs: Object.keys(periodsByDrug).length,
    changes: changes.length,
    gaps: gaps.length,
  });

  return { changes, gaps, diagnostics };
}

/** Changes a clinician would see; `continued` events are kept for queries only. */
export function visibleChanges(changes: ReadonlyArray<ChangeEvent>): ChangeEvent[] {
  return changes.filter((change) => change.kind !== 'continued');
}

// =============================================================================
// Visit comparison
// =============================================================================

export interface RegimenChange {
  drug: string;
  kind: Extract<ChangeKind, 'dose_increased' | 'dose_decreased' | 'frequency_changed'>;
  previous: Regimen;
  current: Regimen;
}

export interface VisitComparison {
  earlierVisitDate: IsoDate;
  laterVisitDate: IsoDate;
  newDrugs: string[];
  discontinuedDrugs: string[];
  continuedDrugs: string[];
  regimenChanges: RegimenChange[];
  diagnostics: Diagnostic[];
}

/**
 * Regimens listed at one visit, keyed by drug. The most recently recorded
 * record wins when a visit lists a drug more than once; a drug whose winning
 * record documents it as discontinued is not listed.
 */
function regimensAtVisit(
  records: ReadonlyArray<MedicationRecord>,
  visitDate: IsoDate,
): Map<string, Regimen> {
  const latest = new Map<string, MedicationRecord>();
  const recordedAt = (record: MedicationRecord) =>
    record.recordedAt ? Date.parse(record.recordedAt) : Number.NEGATIVE_INFINITY;

  for (const record of records) {
    if ((record.sourceVisitDate ?? record.observedDate) !== visitDate) continue;
    const drug = normalizeDrugIdentity(record.drugGenericName);
    const current = latest.get(drug);
    if (
      !current ||
      recordedAt(record) > recordedAt(current) ||
      (recordedAt(record) === recordedAt(current) &&
        compareIdentifiers(record.sourcePrescriptionId, current.sourcePrescriptionId) > 0)
    ) {
      latest.set(drug, record);
    }
  }

  const listed = new Map<string, Regimen>();
  for (const [drug, record] of latest) {
    if (record.status !== 'discontinued') {
      listed.set(drug, {
        dose: { value: record.doseValue, unit: record.doseUnit },
        frequency: record.frequencyCode,
      });
    }
  }
  return listed;
}

/**
 * Compare the medication lists of two visits.
 */
export function compareVisits(
  records: ReadonlyArray<MedicationRecord>,
  earlierVisitDate: IsoDate,
  laterVisitDate: IsoDate,
): VisitComparison {
  const earlier = regimensAtVisit(records, earlierVisitDate);
  const later = regimensAtVisit(records, laterVisitDate);

  const comparison: VisitComparison = {
    earlierVisitDate,
    laterVisitDate,
    newDrugs: [],
    discontinuedDrugs: [],
    continuedDrugs: [],
    regimenChanges: [],
    diagnostics: [],
  };

  for (const [drug, current] of later) {
    const previous = earlier.get(drug);
    if (!previous) {
      comparison.newDrugs.push(drug);
      continue;
    }
    const kind = classifyTransition(drug, laterVisitDate, previous, current, comparison.diagnostics);
    if (kind === 'continued') {
      comparison.continuedDrugs.push(drug);
    } else if (kind === 'dose_increased' || kind === 'dose_decreased' || kind === 'frequency_changed') {
      comparison.regimenChanges.push({ drug, kind, previous, current });
    }
  }

  for (const drug of earlier.keys()) {
    if (!later.has(drug)) {
      comparison.discontinuedDrugs.push(drug);
    }
  }

  comparison.newDrugs.sort(compareIdentifiers);
  comparison.discontinuedDrugs.sort(compareIdentifiers);
  comparison.continuedDrugs.sort(compareIdentifiers);
  comparison.regimenChanges.sort((a, b) => compareIdentifiers(a.drug, b.drug));
  return comparison;
}
