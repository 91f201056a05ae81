/**
 * Timeline Builder
 *
 * Folds a patient's medication records into per-drug medication periods:
 * 1. Same-day records are merged, or resolved by the latest-recorded record
 * 2. Unchanged regimens extend the open period
 * 3. A new dose or frequency closes the open period and opens the next one
 * 4. Explicit end dates and discontinued records close periods
 *
 * The snapshot also carries the active set as of the evaluation date,
 * treatment gaps, same-drug regimen overlaps and cross-drug concurrent use.
 */

import * as functions from 'firebase-functions';

import type {
  ConcurrentUse,
  Diagnostic,
  IsoDate,
  MedicationPeriod,
  PeriodEndReason,
  PeriodObservation,
  Regimen,
  RegimenOverlap,
  Route,
  TimelineSnapshot,
  TreatmentGap,
} from '../types/clinical';
import { compareIsoDates, daysBetween, maxIsoDate, minIsoDate } from '../utils/dates';
import { regimenKey, sameRegimen } from '../utils/doses';
import { compareIdentifiers } from '../utils/medicationName';
import { resolveEngineOptions, roundConfidence, type EngineOptions } from './engineOptions';
import type { NormalizedRecord } from './recordValidation';

export interface TimelineBuildResult {
  snapshot: TimelineSnapshot;
  /** Records that contributed to a period, by drug then observation order. */
  records: NormalizedRecord[];
  diagnostics: Diagnostic[];
}

interface Observation {
  date: IsoDate;
  discontinued: boolean;
  regimen: Regimen;
  route: Route;
  endDate: IsoDate | null;
  sourceRecordIds: string[];
  supersededRecordIds: string[];
  confidence: number;
  diagnoses: string[];
  prescribers: string[];
}

interface PeriodDraft {
  drug: string;
  start: IsoDate;
  end: IsoDate | null;
  endReason: PeriodEndReason | null;
  regimen: Regimen;
  route: Route;
  observations: Observation[];
  extraRecordIds: string[];
  overlapsPrevious: boolean;
}

const recordedAtMs = (record: NormalizedRecord): number =>
  record.recordedAt ? Date.parse(record.recordedAt) : Number.NEGATIVE_INFINITY;

/** Observation date, then recording time, then source id. */
export function compareRecords(a: NormalizedRecord, b: NormalizedRecord): number {
  const byDate = compareIsoDates(a.observedDate, b.observedDate);
  if (byDate !== 0) return byDate;
  const recordedA = recordedAtMs(a);
  const recordedB = recordedAtMs(b);
  if (recordedA !== recordedB) return recordedA < recordedB ? -1 : 1;
  return compareIdentifiers(a.sourcePrescriptionId, b.sourcePrescriptionId);
}

const regimenOf = (record: NormalizedRecord): Regimen => ({
  dose: { value: record.doseValue, unit: record.doseUnit },
  frequency: record.frequencyCode,
});

const stateOf = (record: NormalizedRecord): string =>
  record.status === 'discontinued' ? 'discontinued' : regimenKey(regimenOf(record));

const sortedUnique = (values: Iterable<string>): string[] =>
  Array.from(new Set(values)).sort(compareIdentifiers);

/**
 * Collapse one drug's records for one date into a single observation.
 * Records are sorted, so the last one is the most recently recorded.
 */
function resolveDay(
  drug: string,
  dayRecords: NormalizedRecord[],
  diagnostics: Diagnostic[],
): Observation {
  const winner = dayRecords[dayRecords.length - 1];
  const winnerState = stateOf(winner);
  const kept = dayRecords.filter((record) => stateOf(record) === winnerState);
  const superseded = dayRecords.filter((record) => stateOf(record) !== winnerState);

  const supersededRecordIds = sortedUnique(superseded.map((record) => record.sourcePrescriptionId));
  if (supersededRecordIds.length > 0) {
    diagnostics.push({
      kind: 'ambiguous_same_day',
      drug,
      date: winner.observedDate,
      keptRecordId: winner.sourcePrescriptionId,
      supersededRecordIds,
    });
  }

  const endDate = kept.reduce<IsoDate | null>(
    (latest, record) =>
      record.explicitEndDate === null
        ? latest
        : latest === null
          ? record.explicitEndDate
          : maxIsoDate(latest, record.explicitEndDate),
    null,
  );

  return {
    date: winner.observedDate,
    discontinued: winner.status === 'discontinued',
    regimen: regimenOf(winner),
    route: winner.route,
    endDate,
    sourceRecordIds: sortedUnique(kept.map((record) => record.sourcePrescriptionId)),
    supersededRecordIds,
    confidence: Math.min(...kept.map((record) => record.extractionConfidence)),
    diagnoses: sortedUnique(kept.flatMap((record) => record.diagnoses ?? [])),
    prescribers: sortedUnique(kept.flatMap((record) => (record.prescriber ? [record.prescriber] : []))),
  };
}

function groupByDate(records: NormalizedRecord[]): NormalizedRecord[][] {
  const days: NormalizedRecord[][] = [];
  for (const record of records) {
    const current = days[days.length - 1];
    if (current && current[0].observedDate === record.observedDate) {
      current.push(record);
    } else {
      days.push([record]);
    }
  }
  return days;
}

const openPeriod = (drug: string, observation: Observation, overlapsPrevious: boolean): PeriodDraft => ({
  drug,
  start: observation.date,
  end: observation.endDate,
  endReason: observation.endDate ? 'explicit' : null,
  regimen: observation.regimen,
  route: observation.route,
  observations: [observation],
  extraRecordIds: [],
  overlapsPrevious,
});

const absorb = (period: PeriodDraft, observation: Observation): void => {
  period.observations.push(observation);
  if (observation.endDate) {
    period.end = period.end === null ? observation.endDate : maxIsoDate(period.end, observation.endDate);
    period.endReason = 'explicit';
  }
};

/**
 * Walk one drug's observations in date order and produce its periods.
 */
function buildDrugPeriods(
  drug: string,
  observations: Observation[],
  overlaps: RegimenOverlap[],
  diagnostics: Diagnostic[],
): PeriodDraft[] {
  const periods: PeriodDraft[] = [];

  for (const observation of observations) {
    const last = periods[periods.length - 1];

    if (observation.discontinued) {
      if (!last) {
        diagnostics.push({
          kind: 'orphan_discontinuation',
          drug,
          date: observation.date,
          sourceRecordIds: observation.sourceRecordIds,
          supersededRecordIds: observation.supersededRecordIds,
        });
      } else if (last.end === null || compareIsoDates(last.end, observation.date) > 0) {
        last.end = observation.date;
        last.endReason = 'discontinued';
        last.extraRecordIds.push(...observation.sourceRecordIds, ...observation.supersededRecordIds);
      }
      continue;
    }

    if (!last) {
      periods.push(openPeriod(drug, observation, false));
      continue;
    }

    if (last.end === null) {
      if (sameRegimen(last.regimen, observation.regimen)) {
        absorb(last, observation);
      } else {
        last.end = observation.date;
        last.endReason = 'superseded';
        periods.push(openPeriod(drug, observation, false));
      }
      continue;
    }

    const startsInsideLast = compareIsoDates(observation.date, last.end) < 0;
    if (startsInsideLast && sameRegimen(last.regimen, observation.regimen)) {
      absorb(last, observation);
      if (observation.endDate === null) {
        last.end = null;
        last.endReason = null;
      }
      continue;
    }

    const next = openPeriod(drug, observation, startsInsideLast);
    periods.push(next);

    if (startsInsideLast) {
      const to = next.end === null ? last.end : minIsoDate(last.end, next.end);
      const periodIds: [string, string] = [periodId(last), periodId(next)];
      overlaps.push({ drug, periodIds, from: observation.date, to });
      diagnostics.push({ kind: 'overlapping_regimens', drug, periodIds, from: observation.date, to });
    }
  }

  return periods;
}

function periodId(period: Pick<PeriodDraft, 'drug' | 'start'>): string {
  return `period:${period.drug}:${period.start}`;
}

function finalizePeriod(draft: PeriodDraft, conflictPenalty: number): MedicationPeriod {
  const penalize = (observation: Observation): number =>
    roundConfidence(
      observation.confidence * (observation.supersededRecordIds.length > 0 ? conflictPenalty : 1),
    );

  const observations: PeriodObservation[] = draft.observations.map((observation) => ({
    date: observation.date,
    sourceRecordIds: observation.sourceRecordIds,
    supersededRecordIds: observation.supersededRecordIds,
    confidence: penalize(observation),
  }));

  return {
    id: periodId(draft),
    drug: draft.drug,
    start: draft.start,
    end: draft.end,
    endReason: draft.endReason,
    regimen: draft.regimen,
    route: draft.route,
    sourceRecordIds: sortedUnique([
      ...draft.observations.flatMap((observation) => observation.sourceRecordIds),
      ...draft.extraRecordIds,
    ]),
    observations,
    confidence: Math.min(...observations.map((observation) => observation.confidence)),
    supersededRecordIds: sortedUnique(
      draft.observations.flatMap((observation) => observation.supersededRecordIds),
    ),
    overlapsPrevious: draft.overlapsPrevious,
    diagnoses: sortedUnique(draft.observations.flatMap((observation) => observation.diagnoses)),
    prescribers: sortedUnique(draft.observations.flatMap((observation) => observation.prescribers)),
  };
}

// =============================================================================
// Snapshot queries
// =============================================================================

/** A period is active when it has started and has not ended by the as-of date. */
export function isActiveOn(period: MedicationPeriod, asOfDate: IsoDate): boolean {
  return (
    compareIsoDates(period.start, asOfDate) <= 0 &&
    (period.end === null || compareIsoDates(period.end, asOfDate) > 0)
  );
}

export interface GapBeforePeriod {
  /** Index of the period that resumes therapy. */
  index: number;
  /** Period whose end opened the gap. */
  previous: MedicationPeriod;
  gap: TreatmentGap;
}

/**
 * Treatment gaps within one drug's periods (sorted by start). Coverage is
 * tracked across overlapping periods, so a gap only opens once every earlier
 * period has ended.
 */
export function findTreatmentGaps(
  periods: ReadonlyArray<MedicationPeriod>,
  continuityWindowDays: number,
): GapBeforePeriod[] {
  const gaps: GapBeforePeriod[] = [];
  if (periods.length === 0) {
    return gaps;
  }

  let coverage = periods[0];
  for (let index = 1; index < periods.length; index++) {
    const period = periods[index];
    if (coverage.end !== null) {
      const days = daysBetween(coverage.end, period.start);
      if (days > continuityWindowDays) {
        gaps.push({
          index,
          previous: coverage,
          gap: { drug: period.drug, from: coverage.end, to: period.start, days },
        });
      }
    }

    if (coverage.end !== null && (period.end === null || compareIsoDates(period.end, coverage.end) >= 0)) {
      coverage = period;
    }
  }

  return gaps;
}

/**
 * Overlapping use of two different drugs, one entry per continuous stretch.
 * Open-ended and future-dated ends are capped at the as-of date.
 */
export function findConcurrentUse(
  periods: ReadonlyArray<MedicationPeriod>,
  asOfDate: IsoDate,
  significantOverlapDays: number,
): ConcurrentUse[] {
  const capEnd = (period: MedicationPeriod): IsoDate =>
    period.end === null ? asOfDate : minIsoDate(period.end, asOfDate);

  const intervalsByPair = new Map<string, { drugs: [string, string]; ranges: Array<[IsoDate, IsoDate]> }>();

  for (let i = 0; i < periods.length; i++) {
    for (let j = i + 1; j < periods.length; j++) {
      const a = periods[i];
      const b = periods[j];
      if (a.drug === b.drug) continue;

      const from = maxIsoDate(a.start, b.start);
      const to = minIsoDate(capEnd(a), capEnd(b));
      if (compareIsoDates(from, to) >= 0) continue;

      const drugs: [string, string] = compareIdentifiers(a.drug, b.drug) <= 0 ? [a.drug, b.drug] : [b.drug, a.drug];
      const key = drugs.join('::');
      const entry = intervalsByPair.get(key) ?? { drugs, ranges: [] };
      entry.ranges.push([from, to]);
      intervalsByPair.set(key, entry);
    }
  }

  const result: ConcurrentUse[] = [];
  for (const { drugs, ranges } of intervalsByPair.values()) {
    ranges.sort((x, y) => compareIsoDates(x[0], y[0]) || compareIsoDates(x[1], y[1]));
    let [from, to] = ranges[0];
    const flush = () => {
      const days = daysBetween(from, to);
      result.push({ drugs, from, to, days, significant: days >= significantOverlapDays });
    };
    for (const [nextFrom, nextTo] of ranges.slice(1)) {
      if (compareIsoDates(nextFrom, to) <= 0) {
        to = maxIsoDate(to, nextTo);
      } else {
        flush();
        [from, to] = [nextFrom, nextTo];
      }
    }
    flush();
  }

  return result.sort(
    (x, y) =>
      compareIdentifiers(x.drugs[0], y.drugs[0]) ||
      compareIdentifiers(x.drugs[1], y.drugs[1]) ||
      compareIsoDates(x.from, y.from),
  );
}

export interface TimelineSummary {
  asOfDate: IsoDate;
  totalPeriods: number;
  currentMedicationCount: number;
  historicalMedicationCount: number;
  treatmentGapCount: number;
  regimenOverlapCount: number;
  significantConcurrentUseCount: number;
  earliestStart: IsoDate | null;
}

export function summarizeTimeline(snapshot: TimelineSnapshot): TimelineSummary {
  const earliestStart = snapshot.periods.reduce<IsoDate | null>(
    (earliest, period) => (earliest === null ? period.start : minIsoDate(earliest, period.start)),
    null,
  );

  return {
    asOfDate: snapshot.asOfDate,
    totalPeriods: snapshot.periods.length,
    currentMedicationCount: snapshot.currentDrugs.length,
    historicalMedicationCount: snapshot.historicalDrugs.length,
    treatmentGapCount: snapshot.gaps.length,
    regimenOverlapCount: snapshot.overlaps.length,
    significantConcurrentUseCount: snapshot.concurrentUse.filter((use) => use.significant).length,
    earliestStart,
  };
}

// =============================================================================
// Build
// =============================================================================

/**
 * Build the medication timeline as of a date. Input order does not matter;
 * records observed after the as-of date are left out.
 */
export function buildTimeline(
  records: ReadonlyArray<NormalizedRecord>,
  asOfDate: IsoDate,
  options: EngineOptions = {},
): TimelineBuildResult {
  const config = resolveEngineOptions(options);
  const diagnostics: Diagnostic[] = [];
  const overlaps: RegimenOverlap[] = [];

  const recordsByDrug = new Map<string, NormalizedRecord[]>();
  for (const record of records) {
    if (compareIsoDates(record.observedDate, asOfDate) > 0) {
      diagnostics.push({
        kind: 'future_record',
        sourceId: record.sourcePrescriptionId,
        observedDate: record.observedDate,
      });
      continue;
    }
    const list = recordsByDrug.get(record.drug) ?? [];
    list.push(record);
    recordsByDrug.set(record.drug, list);
  }

  const drugs = Array.from(recordsByDrug.keys()).sort(compareIdentifiers);
  const byDrug: Record<string, MedicationPeriod[]> = {};
  const periods: MedicationPeriod[] = [];
  const gaps: TreatmentGap[] = [];
  const accepted: NormalizedRecord[] = [];

  for (const drug of drugs) {
    const sorted = [...(recordsByDrug.get(drug) ?? [])].sort(compareRecords);
    const observations = groupByDate(sorted).map((day) => resolveDay(drug, day, diagnostics));
    const drugPeriods = buildDrugPeriods(drug, observations, overlaps, diagnostics).map((draft) =>
      finalizePeriod(draft, config.conflictPenalty),
    );

    if (drugPeriods.length === 0) {
      continue;
    }

    byDrug[drug] = drugPeriods;
    periods.push(...drugPeriods);
    accepted.push(...sorted);
    gaps.push(...findTreatmentGaps(drugPeriods, config.continuityWindowDays).map((entry) => entry.gap));
  }

  const active = periods.filter((period) => isActiveOn(period, asOfDate));
  const currentDrugs = sortedUnique(active.map((period) => period.drug));
  const historicalDrugs = Object.keys(byDrug).filter((drug) => !currentDrugs.includes(drug));

  const snapshot: TimelineSnapshot = {
    asOfDate,
    periods,
    byDrug,
    active,
    gaps,
    overlaps,
    concurrentUse: findConcurrentUse(periods, asOfDate, config.significantOverlapDays),
    currentDrugs,
    historicalDrugs,
  };

  functions.logger.info('[timelineBuilder] Built medication timeline', {
    records: records.length,
    drugs: drugs.length,
    periods: periods.length,
    active: active.length,
    gaps: gaps.length,
    overlaps: overlaps.length,
  });

  return { snapshot, records: accepted, diagnostics };
}
