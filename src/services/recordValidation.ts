/**
 * Medication record validation
 *
 * Records come from the upstream extraction collaborator and are checked here
 * before any timeline work. A bad record is dropped from the evaluation with
 * an invalid_record diagnostic; the remaining records still evaluate.
 */

import * as functions from 'firebase-functions';
import { z } from 'zod';

import {
  FREQUENCY_CODES,
  ROUTES,
  type Diagnostic,
  type MedicationRecord,
} from '../types/clinical';
import { compareIsoDates, isIsoDate } from '../utils/dates';
import { normalizeDrugIdentity } from '../utils/medicationName';

const isoDateSchema = z.string().refine(isIsoDate, { message: 'must be a valid YYYY-MM-DD date' });

const optionalStringList = z.array(z.string().trim().min(1)).optional();

export const medicationRecordSchema = z
  .object({
    drugGenericName: z.string().trim().min(1, 'drug identity is required'),
    doseValue: z.number().positive('dose must be greater than zero'),
    doseUnit: z.string().trim().min(1, 'dose unit is required'),
    frequencyCode: z.enum(FREQUENCY_CODES),
    route: z.enum(ROUTES),
    observedDate: isoDateSchema,
    explicitEndDate: isoDateSchema.nullable().default(null),
    sourcePrescriptionId: z.string().trim().min(1, 'source prescription id is required'),
    sourceVisitDate: isoDateSchema.optional(),
    extractionConfidence: z.number().min(0).max(1),
    prescriber: z.string().trim().min(1).optional(),
    diagnoses: optionalStringList,
    symptoms: optionalStringList,
    recordedAt: z
      .string()
      .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'must be an ISO timestamp' })
      .optional(),
    status: z.enum(['active', 'discontinued']).optional(),
  })
  .superRefine((record, ctx) => {
    // Refinements still run when a field failed; only compare dates that parsed.
    if (
      isIsoDate(record.observedDate) &&
      isIsoDate(record.explicitEndDate) &&
      compareIsoDates(record.explicitEndDate, record.observedDate) < 0
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['explicitEndDate'],
        message: 'end date is before the observed date',
      });
    }
  });

/**
 * A record that passed validation, with its drug identity resolved.
 */
export interface NormalizedRecord extends MedicationRecord {
  drug: string;
  sourceVisitDate: string;
}

export interface RecordValidationResult {
  records: NormalizedRecord[];
  diagnostics: Diagnostic[];
}

const sourceIdOf = (raw: unknown, index: number): string => {
  if (raw && typeof raw === 'object' && 'sourcePrescriptionId' in raw) {
    const id = raw.sourcePrescriptionId;
    if (typeof id === 'string' && id.trim().length > 0) {
      return id.trim();
    }
  }
  return `record[${index}]`;
};

const fingerprint = (record: MedicationRecord): string =>
  JSON.stringify(record, Object.keys(record).sort());

/**
 * Validate raw records. A prescription may list several drugs, so duplicates
 * are records sharing both the source prescription id and the drug: they are
 * kept once when identical and all rejected when they disagree.
 */
export function validateRecords(rawRecords: ReadonlyArray<unknown>): RecordValidationResult {
  const diagnostics: Diagnostic[] = [];
  const bySourceItem = new Map<string, NormalizedRecord[]>();

  rawRecords.forEach((raw, index) => {
    const parsed = medicationRecordSchema.safeParse(raw);
    if (!parsed.success) {
      diagnostics.push({
        kind: 'invalid_record',
        sourceId: sourceIdOf(raw, index),
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`,
        ),
      });
      return;
    }

    const record: NormalizedRecord = {
      ...parsed.data,
      drug: normalizeDrugIdentity(parsed.data.drugGenericName),
      sourceVisitDate: parsed.data.sourceVisitDate ?? parsed.data.observedDate,
    };
    const key = `${record.sourcePrescriptionId}::${record.drug}`;
    const existing = bySourceItem.get(key) ?? [];
    existing.push(record);
    bySourceItem.set(key, existing);
  });

  const records: NormalizedRecord[] = [];
  for (const group of bySourceItem.values()) {
    const [first] = group;
    const distinct = new Set(group.map(fingerprint));
    if (distinct.size > 1) {
      diagnostics.push({
        kind: 'invalid_record',
        sourceId: first.sourcePrescriptionId,
        issues: [`${group.length} conflicting records share this source prescription id for ${first.drug}`],
      });
      continue;
    }
    records.push(first);
  }

  if (diagnostics.length > 0) {
    functions.logger.warn('[recordValidation] Rejected medication records', {
      received: rawRecords.length,
      accepted: records.length,
      rejected: diagnostics.length,
    });
  }

  return { records, diagnostics };
}
