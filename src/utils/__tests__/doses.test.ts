import { compareDoses, formatRegimen, regimenKey, sameRegimen, sameUnitFamily } from '../doses';

describe('dose utilities', () => {
    it('converts within a unit family before comparing', () => {
        expect(compareDoses({ value: 0.5, unit: 'g' }, { value: 500, unit: 'mg' })).toEqual({
            direction: 0,
            comparable: true,
        });
        expect(compareDoses({ value: 500, unit: 'mcg' }, { value: 1, unit: 'mg' })).toEqual({
            direction: 1,
            comparable: true,
        });
        expect(compareDoses({ value: 20, unit: 'mg' }, { value: 10, unit: 'mg' })).toEqual({
            direction: -1,
            comparable: true,
        });
    });

    it('compares raw values across unit families and reports it', () => {
        expect(compareDoses({ value: 10, unit: 'mg' }, { value: 20, unit: 'mL' })).toEqual({
            direction: 1,
            comparable: false,
        });
        expect(sameUnitFamily({ value: 1, unit: 'IU' }, { value: 1, unit: 'units' })).toBe(true);
        expect(sameUnitFamily({ value: 1, unit: 'puff' }, { value: 1, unit: 'mg' })).toBe(false);
    });

    it('treats equivalent doses at the same frequency as one regimen', () => {
        const grams = { dose: { value: 1, unit: 'g' }, frequency: 'BID' as const };
        const milligrams = { dose: { value: 1000, unit: 'mg' }, frequency: 'BID' as const };
        expect(regimenKey(grams)).toBe('1000:mass:BID');
        expect(sameRegimen(grams, milligrams)).toBe(true);
        expect(sameRegimen(grams, { ...milligrams, frequency: 'TID' })).toBe(false);
    });

    it('formats a regimen with its original unit', () => {
        expect(formatRegimen({ dose: { value: 500, unit: 'mg' }, frequency: 'BID' })).toBe('500 mg BID');
    });
});
