import { ageInYears, calendarYear, horizonLength, parseIsoDate, splitYears, yearFractions } from '../../utils/time';

describe('parseIsoDate', () => {
  it('should parse a valid date as UTC midnight', () => {
    expect(parseIsoDate('2025-01-01')?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('should accept a leap day in a leap year', () => {
    expect(parseIsoDate('2024-02-29')).not.toBeNull();
  });

  it('should reject impossible dates', () => {
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2025-13-01')).toBeNull();
  });

  it('should reject other formats', () => {
    expect(parseIsoDate('01/01/2025')).toBeNull();
    expect(parseIsoDate('2025-1-1')).toBeNull();
  });
});

describe('ageInYears', () => {
  it('should divide elapsed days by 365.25', () => {
    expect(ageInYears('1980-01-01', '2025-01-01')).toBe(16437 / 365.25);
  });

  it('should be 0 for the same date', () => {
    expect(ageInYears('2025-06-30', '2025-06-30')).toBe(0);
  });

  it('should count exactly four years across one leap day', () => {
    expect(ageInYears('2020-01-01', '2024-01-01')).toBe(4);
  });

  it('should throw for an invalid date', () => {
    expect(() => ageInYears('1980-02-30', '2025-01-01')).toThrow('Invalid date "1980-02-30"');
  });
});

describe('calendarYear', () => {
  it('should return the year of the date', () => {
    expect(calendarYear('2025-12-31')).toBe(2025);
  });
});

describe('horizonLength', () => {
  it('should round partial years up', () => {
    expect(horizonLength(13.75)).toBe(14);
    expect(horizonLength(14)).toBe(14);
  });

  it('should be 0 for no years', () => {
    expect(horizonLength(0)).toBe(0);
  });
});

describe('splitYears', () => {
  it('should split whole years and remainder', () => {
    expect(splitYears(2.5)).toEqual({ wholeYears: 2, remainder: 0.5 });
  });

  it('should treat a remainder at or below the epsilon as zero', () => {
    expect(splitYears(3 + 1e-7)).toEqual({ wholeYears: 3, remainder: 0 });
  });

  it('should handle less than one year', () => {
    expect(splitYears(0.25)).toEqual({ wholeYears: 0, remainder: 0.25 });
  });
});

describe('yearFractions', () => {
  it('should list whole years then the remainder', () => {
    expect(yearFractions(2.5)).toEqual([1, 1, 0.5]);
  });

  it('should omit a remainder at or below the epsilon', () => {
    expect(yearFractions(3)).toEqual([1, 1, 1]);
    expect(yearFractions(1 + 1e-7)).toEqual([1]);
  });

  it('should be empty for zero years', () => {
    expect(yearFractions(0)).toEqual([]);
  });
});
