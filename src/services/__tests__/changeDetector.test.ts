/**
 * Change Detector Tests
 */

import { makeRecord, normalizeRecords } from '../../__tests__/helpers';
import type { MedicationRecord } from '../../types/clinical';
import { compareVisits, detectChanges, visibleChanges } from '../changeDetector';
import type { EngineOptions } from '../engineOptions';
import { buildTimeline } from '../timelineBuilder';

const AS_OF = '2024-06-01';

const changesFor = (records: MedicationRecord[], options: EngineOptions = {}) => {
    const { snapshot } = buildTimeline(normalizeRecords(records), AS_OF, options);
    return detectChanges(snapshot.byDrug, AS_OF, options);
};

describe('detectChanges', () => {
    it('classifies a start followed by a dose increase', () => {
        const { changes, gaps, diagnostics } = changesFor([
            makeRecord({
                drugGenericName: 'metformin',
                doseValue: 500,
                frequencyCode: 'BID',
                observedDate: '2024-01-15',
                sourcePrescriptionId: 'rx-1',
            }),
            makeRecord({
                drugGenericName: 'metformin',
                doseValue: 1000,
                frequencyCode: 'BID',
                observedDate: '2024-03-15',
                sourcePrescriptionId: 'rx-2',
            }),
        ]);

        expect(gaps).toEqual([]);
        expect(diagnostics).toEqual([]);
        expect(changes).toEqual([
            {
                id: 'change:metformin:2024-01-15:started',
                drug: 'metformin',
                date: '2024-01-15',
                kind: 'started',
                previousValue: null,
                newValue: { dose: { value: 500, unit: 'mg' }, frequency: 'BID' },
                periodIds: ['period:metformin:2024-01-15'],
                sourceRecordIds: ['rx-1'],
                confidence: 1,
            },
            {
                id: 'change:metformin:2024-03-15:dose_increased',
                drug: 'metformin',
                date: '2024-03-15',
                kind: 'dose_increased',
                previousValue: { dose: { value: 500, unit: 'mg' }, frequency: 'BID' },
                newValue: { dose: { value: 1000, unit: 'mg' }, frequency: 'BID' },
                periodIds: ['period:metformin:2024-01-15', 'period:metformin:2024-03-15'],
                sourceRecordIds: ['rx-2'],
                confidence: 1,
            },
        ]);
    });

    it('emits a stop and a resume around a treatment gap', () => {
        const { changes, gaps } = changesFor([
            makeRecord({
                drugGenericName: 'atorvastatin',
                observedDate: '2024-01-01',
                explicitEndDate: '2024-01-31',
                sourcePrescriptionId: 'rx-1',
            }),
            makeRecord({ drugGenericName: 'atorvastatin', observedDate: '2024-04-01', sourcePrescriptionId: 'rx-2' }),
        ]);

        expect(changes.map((change) => [change.date, change.kind, change.gapDays])).toEqual([
            ['2024-01-01', 'started', undefined],
            ['2024-01-31', 'stopped', 61],
            ['2024-04-01', 'resumed', 61],
        ]);
        expect(changes[2].periodIds).toEqual(['period:atorvastatin:2024-01-01', 'period:atorvastatin:2024-04-01']);
        expect(gaps).toEqual([{ drug: 'atorvastatin', from: '2024-01-31', to: '2024-04-01', days: 61 }]);
    });

    it('treats a break inside the continuity window as a continuation', () => {
        const { changes, gaps } = changesFor(
            [
                makeRecord({
                    drugGenericName: 'atorvastatin',
                    observedDate: '2024-01-01',
                    explicitEndDate: '2024-01-31',
                    sourcePrescriptionId: 'rx-1',
                }),
                makeRecord({ drugGenericName: 'atorvastatin', observedDate: '2024-02-10', sourcePrescriptionId: 'rx-2' }),
            ],
            { continuityWindowDays: 14 },
        );

        expect(gaps).toEqual([]);
        expect(changes.map((change) => change.kind)).toEqual(['started', 'continued']);
    });

    it('records continued observations but hides them from the visible list', () => {
        const { changes } = changesFor([
            makeRecord({ drugGenericName: 'amlodipine', observedDate: '2024-01-01', sourcePrescriptionId: 'rx-1' }),
            makeRecord({ drugGenericName: 'amlodipine', observedDate: '2024-02-01', sourcePrescriptionId: 'rx-2' }),
        ]);

        expect(changes.map((change) => [change.date, change.kind])).toEqual([
            ['2024-01-01', 'started'],
            ['2024-02-01', 'continued'],
        ]);
        expect(visibleChanges(changes).map((change) => change.kind)).toEqual(['started']);
    });

    it('ends discontinued therapy with a terminal stop', () => {
        const { changes } = changesFor([
            makeRecord({ drugGenericName: 'warfarin', observedDate: '2024-01-10', sourcePrescriptionId: 'rx-1' }),
            makeRecord({
                drugGenericName: 'warfarin',
                observedDate: '2024-03-01',
                status: 'discontinued',
                sourcePrescriptionId: 'rx-2',
            }),
        ]);

        expect(changes.map((change) => [change.date, change.kind])).toEqual([
            ['2024-01-10', 'started'],
            ['2024-03-01', 'stopped'],
        ]);
        expect(changes[1]).toMatchObject({ previousValue: { dose: { value: 10, unit: 'mg' } }, newValue: null });
    });

    it('does not stop therapy whose end is after the as-of date', () => {
        const { changes } = changesFor([
            makeRecord({
                drugGenericName: 'amoxicillin',
                observedDate: '2024-05-28',
                explicitEndDate: '2024-06-07',
                sourcePrescriptionId: 'rx-1',
            }),
        ]);

        expect(changes.map((change) => change.kind)).toEqual(['started']);
    });

    it('prefers a dose change over a frequency change', () => {
        const { changes } = changesFor([
            makeRecord({
                drugGenericName: 'metoprolol',
                doseValue: 50,
                frequencyCode: 'QD',
                observedDate: '2024-01-01',
                sourcePrescriptionId: 'rx-1',
            }),
            makeRecord({
                drugGenericName: 'metoprolol',
                doseValue: 25,
                frequencyCode: 'BID',
                observedDate: '2024-02-01',
                sourcePrescriptionId: 'rx-2',
            }),
            makeRecord({
                drugGenericName: 'metoprolol',
                doseValue: 25,
                frequencyCode: 'TID',
                observedDate: '2024-03-01',
                sourcePrescriptionId: 'rx-3',
            }),
        ]);

        expect(changes.map((change) => change.kind)).toEqual(['started', 'dose_decreased', 'frequency_changed']);
    });

    it('flags doses in different unit families', () => {
        const { changes, diagnostics } = changesFor([
            makeRecord({ drugGenericName: 'prednisone', doseValue: 10, observedDate: '2024-01-01', sourcePrescriptionId: 'rx-1' }),
            makeRecord({
                drugGenericName: 'prednisone',
                doseValue: 5,
                doseUnit: 'mL',
                observedDate: '2024-02-01',
                sourcePrescriptionId: 'rx-2',
            }),
        ]);

        expect(changes[1].kind).toBe('dose_decreased');
        expect(diagnostics).toEqual([
            { kind: 'unit_mismatch', drug: 'prednisone', date: '2024-02-01', fromUnit: 'mg', toUnit: 'mL' },
        ]);
    });

    it('carries same-day conflicts onto the change', () => {
        const { changes } = changesFor([
            makeRecord({
                drugGenericName: 'lisinopril',
                doseValue: 10,
                observedDate: '2024-02-01',
                recordedAt: '2024-02-01T09:00:00Z',
                sourcePrescriptionId: 'rx-a',
            }),
            makeRecord({
                drugGenericName: 'lisinopril',
                doseValue: 20,
                observedDate: '2024-02-01',
                recordedAt: '2024-02-01T15:00:00Z',
                sourcePrescriptionId: 'rx-b',
            }),
        ]);

        expect(changes).toHaveLength(1);
        expect(changes[0]).toMatchObject({
            kind: 'started',
            sourceRecordIds: ['rx-b'],
            confidence: 0.5,
            conflict: { supersededRecordIds: ['rx-a'] },
        });
    });

    it('orders changes by date and then by drug', () => {
        const { changes } = changesFor([
            makeRecord({ drugGenericName: 'warfarin', observedDate: '2024-02-01', sourcePrescriptionId: 'rx-1' }),
            makeRecord({ drugGenericName: 'aspirin', observedDate: '2024-02-01', sourcePrescriptionId: 'rx-2' }),
            makeRecord({ drugGenericName: 'zolpidem', observedDate: '2024-01-01', sourcePrescriptionId: 'rx-3' }),
        ]);

        expect(changes.map((change) => change.drug)).toEqual(['zolpidem', 'aspirin', 'warfarin']);
    });

    describe('stop and resume sequences', () => {
        const rx = (drugGenericName: string, sourcePrescriptionId: string, extra: Partial<MedicationRecord>) =>
            makeRecord({ drugGenericName, sourcePrescriptionId, observedDate: '2024-01-01', ...extra });

        const scenarios: Array<{ name: string; records: MedicationRecord[]; expected: Record<string, string[]> }> = [
            {
                name: 'overlapping explicit ends, a gap and a terminal stop',
                records: [
                    rx('metformin', 'rx-1', { doseValue: 500, explicitEndDate: '2024-03-01' }),
                    rx('metformin', 'rx-2', { doseValue: 1000, observedDate: '2024-02-01', explicitEndDate: '2024-04-01' }),
                    rx('metformin', 'rx-3', { doseValue: 500, observedDate: '2024-05-01', explicitEndDate: '2024-05-20' }),
                ],
                expected: { metformin: ['started', 'dose_increased', 'stopped', 'resumed', 'stopped'] },
            },
            {
                name: 'a discontinued record followed by a restart',
                records: [
                    rx('warfarin', 'rx-1', {}),
                    rx('warfarin', 'rx-2', { observedDate: '2024-03-01', status: 'discontinued' }),
                    rx('warfarin', 'rx-3', { observedDate: '2024-04-01' }),
                ],
                expected: { warfarin: ['started', 'stopped', 'resumed'] },
            },
            {
                name: 'a repeated discontinuation',
                records: [
                    rx('aspirin', 'rx-1', {}),
                    rx('aspirin', 'rx-2', { observedDate: '2024-03-01', status: 'discontinued' }),
                    rx('aspirin', 'rx-3', { observedDate: '2024-04-01', status: 'discontinued' }),
                ],
                expected: { aspirin: ['started', 'stopped'] },
            },
            {
                name: 'a superseded regimen that ends explicitly, beside a second drug',
                records: [
                    rx('atorvastatin', 'rx-1', {}),
                    rx('atorvastatin', 'rx-2', { doseValue: 20, observedDate: '2024-02-01' }),
                    rx('atorvastatin', 'rx-3', { doseValue: 20, observedDate: '2024-03-01', explicitEndDate: '2024-04-01' }),
                    rx('warfarin', 'rx-4', { observedDate: '2024-02-15', status: 'active' }),
                    rx('warfarin', 'rx-5', { observedDate: '2024-03-15', status: 'discontinued' }),
                ],
                expected: {
                    atorvastatin: ['started', 'dose_increased', 'continued', 'stopped'],
                    warfarin: ['started', 'stopped'],
                },
            },
        ];

        it.each(scenarios)('keeps each drug in order with no repeated stop: $name', ({ records, expected }) => {
            const { changes } = changesFor(records);

            const kindsByDrug: Record<string, string[]> = {};
            for (const drug of Object.keys(expected)) {
                const events = changes.filter((change) => change.drug === drug);
                const dates = events.map((change) => change.date);
                const kinds = events.map((change) => change.kind);

                expect(dates).toEqual([...dates].sort());
                kinds.forEach((kind, index) => {
                    if (index > 0 && kind === 'stopped') {
                        expect(kinds[index - 1]).not.toBe('stopped');
                    }
                });
                kindsByDrug[drug] = kinds;
            }

            expect(kindsByDrug).toEqual(expected);
        });
    });
});

describe('compareVisits', () => {
    const visit = (
        drugGenericName: string,
        sourceVisitDate: string,
        doseValue: number,
        sourcePrescriptionId: string,
    ): MedicationRecord =>
        makeRecord({ drugGenericName, sourceVisitDate, observedDate: sourceVisitDate, doseValue, sourcePrescriptionId });

    it('lists new, discontinued, continued and changed drugs', () => {
        const records = [
            visit('Metformin', '2024-01-15', 500, 'rx-1'),
            visit('Lisinopril', '2024-01-15', 10, 'rx-2'),
            visit('Atorvastatin', '2024-01-15', 20, 'rx-3'),
            visit('Metformin', '2024-03-15', 1000, 'rx-4'),
            visit('Lisinopril', '2024-03-15', 10, 'rx-5'),
            visit('Aspirin', '2024-03-15', 81, 'rx-6'),
        ];

        expect(compareVisits(records, '2024-01-15', '2024-03-15')).toEqual({
            earlierVisitDate: '2024-01-15',
            laterVisitDate: '2024-03-15',
            newDrugs: ['aspirin'],
            discontinuedDrugs: ['atorvastatin'],
            continuedDrugs: ['lisinopril'],
            regimenChanges: [
                {
                    drug: 'metformin',
                    kind: 'dose_increased',
                    previous: { dose: { value: 500, unit: 'mg' }, frequency: 'QD' },
                    current: { dose: { value: 1000, unit: 'mg' }, frequency: 'QD' },
                },
            ],
            diagnostics: [],
        });
    });

    it('drops a drug the later visit documents as discontinued', () => {
        const records = [
            visit('Warfarin', '2024-01-15', 5, 'rx-1'),
            { ...visit('Warfarin', '2024-03-15', 5, 'rx-2'), status: 'discontinued' as const },
        ];

        const comparison = compareVisits(records, '2024-01-15', '2024-03-15');
        expect(comparison.discontinuedDrugs).toEqual(['warfarin']);
        expect(comparison.continuedDrugs).toEqual([]);
    });
});
