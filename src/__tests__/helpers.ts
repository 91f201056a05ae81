/**
 * Shared fixtures for engine tests
 */

import { buildRuleCatalog, type RawRuleCatalog, type RuleCatalog } from '../data/ruleCatalog';
import { validateRecords, type NormalizedRecord } from '../services/recordValidation';
import type { MedicationRecord, PatientContext } from '../types/clinical';

type RecordInput = Partial<MedicationRecord> &
    Pick<MedicationRecord, 'drugGenericName' | 'observedDate' | 'sourcePrescriptionId'>;

export function makeRecord(input: RecordInput): MedicationRecord {
    return {
        doseValue: 10,
        doseUnit: 'mg',
        frequencyCode: 'QD',
        route: 'oral',
        explicitEndDate: null,
        extractionConfidence: 1,
        ...input,
    };
}

/** Validate fixture records; fails loudly if a fixture is itself invalid. */
export function normalizeRecords(records: MedicationRecord[]): NormalizedRecord[] {
    const result = validateRecords(records);
    if (result.diagnostics.length > 0) {
        throw new Error(`Invalid fixture records: ${JSON.stringify(result.diagnostics)}`);
    }
    return result.records;
}

export function makeContext(overrides: Partial<PatientContext> = {}): PatientContext {
    return {
        asOfDate: '2024-06-01',
        allergies: [],
        chronicConditions: [],
        ...overrides,
    };
}

export const TEST_CATALOG_DATA: RawRuleCatalog = {
    meta: { version: 'test-1' },
    therapeuticClasses: [
        { id: 'nsaid', name: 'NSAID', duplicateSeverity: 'major' },
        { id: 'anticoagulant', name: 'Anticoagulant', duplicateSeverity: 'major' },
        { id: 'antiplatelet', name: 'Antiplatelet' },
        { id: 'penicillin', name: 'Penicillin' },
        { id: 'cephalosporin', name: 'Cephalosporin' },
        { id: 'beta_lactam', name: 'Beta-lactam', broad: true },
        { id: 'statin', name: 'Statin', duplicateSeverity: 'major' },
        { id: 'biguanide', name: 'Biguanide' },
        { id: 'insulin', name: 'Insulin' },
        { id: 'antidiabetic', name: 'Antidiabetic', broad: true },
    ],
    classMembership: [
        { drug: 'ibuprofen', class: 'nsaid' },
        { drug: 'naproxen', class: 'nsaid' },
        { drug: 'warfarin', class: 'anticoagulant' },
        { drug: 'aspirin', class: 'antiplatelet' },
        { drug: 'clopidogrel', class: 'antiplatelet' },
        { drug: 'amoxicillin', class: 'penicillin' },
        { drug: 'amoxicillin', class: 'beta_lactam' },
        { drug: 'cephalexin', class: 'cephalosporin' },
        { drug: 'cephalexin', class: 'beta_lactam' },
        { drug: 'atorvastatin', class: 'statin' },
        { drug: 'simvastatin', class: 'statin' },
        { drug: 'metformin', class: 'biguanide' },
        { drug: 'metformin', class: 'antidiabetic' },
        { drug: 'insulin glargine', class: 'insulin' },
        { drug: 'insulin glargine', class: 'antidiabetic' },
        { drug: 'insulin lispro', class: 'insulin' },
        { drug: 'insulin lispro', class: 'antidiabetic' },
    ],
    drugInteractions: [
        {
            id: 'ddi-warfarin-aspirin',
            drugA: 'Warfarin',
            drugB: 'Aspirin',
            severity: 'major',
            mechanism: 'Additive bleeding risk',
            management: 'Avoid unless indicated; monitor INR',
        },
    ],
    classInteractions: [
        {
            id: 'cci-nsaid-anticoagulant',
            classA: 'nsaid',
            classB: 'anticoagulant',
            severity: 'major',
            mechanism: 'NSAIDs add to anticoagulant bleeding risk',
            management: 'Avoid NSAIDs with anticoagulants',
        },
        {
            id: 'cci-antiplatelet-anticoagulant',
            classA: 'antiplatelet',
            classB: 'anticoagulant',
            severity: 'major',
            mechanism: 'Additive antithrombotic effect',
            management: 'Confirm the combination is intended',
        },
    ],
    contraindications: [
        {
            id: 'ci-metformin-renal',
            drugOrClass: 'metformin',
            condition: 'renal_impairment',
            severity: 'contraindicated',
            mechanism: 'Lactic acidosis risk',
            management: 'Do not use when eGFR is below 30',
        },
        {
            id: 'ci-nsaid-renal',
            drugOrClass: 'nsaid',
            condition: 'renal_impairment',
            severity: 'major',
            mechanism: 'Reduced renal perfusion',
            management: 'Avoid NSAIDs',
        },
    ],
    allergyRules: {
        crossReactivity: [
            {
                id: 'xr-penicillin-cephalosporin',
                allergen: 'penicillin',
                target: 'cephalosporin',
                severity: 'major',
                mechanism: 'Shared beta-lactam ring',
            },
        ],
        reactionSeverities: [{ reaction: 'rash', severity: 'moderate' }],
    },
    combinationTherapies: [
        {
            id: 'basal-bolus-insulin',
            therapeuticClass: 'insulin',
            drugs: ['insulin glargine', 'insulin lispro'],
            reason: 'Basal-bolus regimen',
        },
    ],
};

export function makeTestCatalog(): RuleCatalog {
    return buildRuleCatalog(TEST_CATALOG_DATA, 'test');
}
