import { chooseAssumption } from '../../models/Assumption';
import { getOccupationCategory } from '../../models/CaseConfig';
import { getAverageGrowthRate } from '../../models/GrowthSchedule';
import { baseCase } from '../fixtures/caseConfigs';

describe('chooseAssumption', () => {
  it('should choose the table when no value is supplied', () => {
    expect(chooseAssumption<number>(undefined)).toEqual({ kind: 'table' });
  });

  it('should choose an override for any supplied value, including 0', () => {
    expect(chooseAssumption(0)).toEqual({ kind: 'override', value: 0 });
    expect(chooseAssumption(0.037)).toEqual({ kind: 'override', value: 0.037 });
  });
});

describe('getOccupationCategory', () => {
  it('should return the SOC major group', () => {
    expect(getOccupationCategory(baseCase.occupation)).toBe('11');
    expect(getOccupationCategory({ socCode: '29-1141', baseSalary: 1 })).toBe('29');
  });
});

describe('getAverageGrowthRate', () => {
  it('should average the scheduled rates', () => {
    const average = getAverageGrowthRate({
      basis: 'table',
      entries: [
        { yearIndex: 0, calendarYear: 2025, rate: 0.02, carriedForward: false },
        { yearIndex: 1, calendarYear: 2026, rate: 0.04, carriedForward: false },
      ],
    });
    expect(average).toBeCloseTo(0.03, 12);
  });

  it('should be 0 for an empty schedule', () => {
    expect(getAverageGrowthRate({ basis: 'override', entries: [] })).toBe(0);
  });
});
