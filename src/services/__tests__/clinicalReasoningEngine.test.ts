/**
 * Clinical Reasoning Engine Tests
 */

import * as functions from 'firebase-functions';

import { makeContext, makeRecord, makeTestCatalog } from '../../__tests__/helpers';
import { clearRuleCatalogCacheForTests } from '../../data/ruleCatalog';
import { ClinicalReasoningEngine, createClinicalReasoningEngine } from '../clinicalReasoningEngine';
import { EngineConfigurationError, PatientContextValidationError } from '../common/errors';
import { nodeId } from '../knowledgeGraph';
import * as medicationSafety from '../medicationSafety';

const records: unknown[] = [
    makeRecord({
        drugGenericName: 'Metformin',
        doseValue: 500,
        frequencyCode: 'BID',
        observedDate: '2024-01-15',
        sourcePrescriptionId: 'rx-1',
    }),
    makeRecord({
        drugGenericName: 'Metformin',
        doseValue: 1000,
        frequencyCode: 'BID',
        observedDate: '2024-03-15',
        sourcePrescriptionId: 'rx-2',
    }),
    makeRecord({ drugGenericName: 'Warfarin', observedDate: '2024-01-01', sourcePrescriptionId: 'rx-3' }),
    makeRecord({ drugGenericName: 'Aspirin', doseValue: 81, observedDate: '2024-02-01', sourcePrescriptionId: 'rx-4' }),
    { drugGenericName: '', doseValue: 5, sourcePrescriptionId: 'rx-bad' },
];

describe('ClinicalReasoningEngine', () => {
    const engine = createClinicalReasoningEngine({ catalog: makeTestCatalog() });

    beforeEach(() => {
        jest.clearAllMocks();
    });

    it('evaluates a patient end to end', () => {
        const result = engine.evaluate(records, makeContext());

        expect(result.asOfDate).toBe('2024-06-01');
        expect(result.catalogVersion).toBe('test-1');
        expect(result.snapshot.currentDrugs).toEqual(['aspirin', 'metformin', 'warfarin']);
        expect(result.changes.map(({ change }) => [change.date, change.drug, change.kind])).toEqual([
            ['2024-01-01', 'warfarin', 'started'],
            ['2024-01-15', 'metformin', 'started'],
            ['2024-02-01', 'aspirin', 'started'],
            ['2024-03-15', 'metformin', 'dose_increased'],
        ]);
        expect(result.findings.map(({ finding }) => finding.id)).toEqual(['drug_drug_interaction:aspirin+warfarin']);
        expect(result.riskLevel).toBe('moderate');
        expect(result.pendingReview).toEqual([]);
    });

    it('keeps evaluating when some records are invalid', () => {
        const result = engine.evaluate(records, makeContext());

        expect(result.diagnostics).toHaveLength(1);
        expect(result.diagnostics[0]).toMatchObject({ kind: 'invalid_record', sourceId: 'rx-bad' });
        expect(result.summary.diagnosticCounts).toEqual({ invalid_record: 1 });
    });

    it('summarizes the evaluation', () => {
        const { summary } = engine.evaluate(records, makeContext());

        expect(summary.findingsBySeverity).toEqual({ contraindicated: 0, major: 1, moderate: 0, minor: 0 });
        expect(summary.changeCount).toBe(4);
        expect(summary.pendingReviewCount).toBe(0);
        expect(summary.timeline).toMatchObject({ totalPeriods: 4, currentMedicationCount: 3 });
        expect(summary.graph.edgesByType.takes).toBe(3);
        expect(summary.graph.edgesByType.interacts_with).toBe(1);
    });

    it('leaves findings held for review out of the graph', () => {
        const result = engine.evaluate(
            [
                makeRecord({
                    drugGenericName: 'Warfarin',
                    observedDate: '2024-01-01',
                    sourcePrescriptionId: 'rx-1',
                    extractionConfidence: 0.3,
                }),
                makeRecord({ drugGenericName: 'Aspirin', doseValue: 81, observedDate: '2024-02-01', sourcePrescriptionId: 'rx-2' }),
            ],
            makeContext(),
        );

        expect(result.findings).toEqual([]);
        expect(
            result.pendingReview.flatMap((item) => (item.itemType === 'finding' ? [item.finding.id] : [])),
        ).toEqual(['drug_drug_interaction:aspirin+warfarin']);
        expect(result.graph.edges.map((edge) => edge.type)).toEqual(['takes', 'takes']);
    });

    it('projects only records that reached the timeline', () => {
        const result = engine.evaluate(
            [
                makeRecord({ drugGenericName: 'Warfarin', observedDate: '2024-09-01', sourcePrescriptionId: 'rx-1' }),
                makeRecord({ drugGenericName: 'Aspirin', doseValue: 81, observedDate: '2024-02-01', sourcePrescriptionId: 'rx-2' }),
            ],
            makeContext(),
        );

        expect(result.snapshot.currentDrugs).toEqual(['aspirin']);
        expect(result.diagnostics).toEqual([{ kind: 'future_record', sourceId: 'rx-1', observedDate: '2024-09-01' }]);
        expect(result.graph.edges.map((edge) => [edge.type, edge.target, edge.evidence])).toEqual([
            ['takes', nodeId('medication', 'aspirin'), ['rx-2']],
        ]);
        expect(result.graph.nodes.map((node) => node.id)).not.toContain(nodeId('medication', 'warfarin'));
    });

    it('returns the same result for the same inputs', () => {
        const first = engine.evaluate(records, makeContext());
        const second = engine.evaluate([...records].reverse(), makeContext());

        expect(second).toEqual(first);
    });

    it('rejects an invalid patient context', () => {
        let caught: unknown;
        try {
            engine.evaluate(records, makeContext({ asOfDate: '2024-13-01' }));
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(PatientContextValidationError);
        expect(caught).toMatchObject({
            code: 'invalid_patient_context',
            issues: ['asOfDate: must be a valid YYYY-MM-DD date'],
        });
    });

    it('reports and rethrows unexpected failures', () => {
        const spy = jest.spyOn(medicationSafety, 'evaluateSafety').mockImplementation(() => {
            throw new Error('safety check failed');
        });

        try {
            expect(() => engine.evaluate(records, makeContext())).toThrow('safety check failed');
            expect(functions.logger.error).toHaveBeenCalledWith('[error]', expect.any(Error));
        } finally {
            spy.mockRestore();
        }
    });

    it('rejects invalid options', () => {
        expect(() => new ClinicalReasoningEngine(makeTestCatalog(), { reviewThreshold: 2 })).toThrow(
            EngineConfigurationError,
        );
    });

    it('loads the bundled catalog when none is given', () => {
        clearRuleCatalogCacheForTests();

        expect(createClinicalReasoningEngine().catalogVersion).toBe('2024.12.1');
    });
});
