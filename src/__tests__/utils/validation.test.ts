import { CaseConfigSchema, parseCaseConfig } from '../../utils/validation';
import { InvalidConfigError } from '../../utils/errors';
import { baseCase } from '../fixtures/caseConfigs';

function issuesOf(input: unknown): string[] {
  try {
    parseCaseConfig(input);
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('CaseConfigSchema', () => {
  it('should validate a complete case', () => {
    expect(CaseConfigSchema.safeParse(baseCase).success).toBe(true);
  });

  it('should validate a case with every override', () => {
    const result = CaseConfigSchema.safeParse({
      ...baseCase,
      assumptions: {
        retirementAgeHint: 67,
        lifeExpectancyYears: 30,
        worklifeMethod: 'retirement_age_hint',
        worklifeYears: 12,
        discountRate: 0.03,
        discountSeries: 'treasury_10y',
        wageGrowthRate: -0.01,
      },
    });
    expect(result.success).toBe(true);
  });

  it('should reject a birth date after the evaluation date', () => {
    const issues = issuesOf({
      ...baseCase,
      person: { ...baseCase.person, dateOfBirth: '2025-01-02' },
    });
    expect(issues).toEqual(['person.evaluationDate: Date of birth must not be after the evaluation date']);
  });

  it('should accept a birth date equal to the evaluation date', () => {
    const result = CaseConfigSchema.safeParse({
      ...baseCase,
      person: { ...baseCase.person, dateOfBirth: '2025-01-01' },
    });
    expect(result.success).toBe(true);
  });

  it('should reject a non-positive base salary', () => {
    const issues = issuesOf({
      ...baseCase,
      occupation: { ...baseCase.occupation, baseSalary: 0 },
    });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('occupation.baseSalary:')).toBe(true);
  });

  it('should reject an impossible calendar date', () => {
    const issues = issuesOf({
      ...baseCase,
      person: { ...baseCase.person, dateOfBirth: '1980-02-30' },
    });
    expect(issues).toContain('person.dateOfBirth: Expected a valid YYYY-MM-DD date');
  });

  it('should reject a malformed SOC code', () => {
    const issues = issuesOf({
      ...baseCase,
      occupation: { ...baseCase.occupation, socCode: '112022' },
    });
    expect(issues).toEqual(['occupation.socCode: Expected a SOC code such as 11-2022']);
  });

  it('should reject an unknown education level', () => {
    const result = CaseConfigSchema.safeParse({
      ...baseCase,
      person: { ...baseCase.person, educationLevel: 'Doctorate' },
    });
    expect(result.success).toBe(false);
  });

  it('should reject a discount rate of -100% or lower', () => {
    const result = CaseConfigSchema.safeParse({ ...baseCase, assumptions: { discountRate: -1 } });
    expect(result.success).toBe(false);
  });

  it('should reject a negative life expectancy override', () => {
    const result = CaseConfigSchema.safeParse({ ...baseCase, assumptions: { lifeExpectancyYears: -1 } });
    expect(result.success).toBe(false);
  });

  it('should require a retirement age hint for the retirement age method', () => {
    const issues = issuesOf({ ...baseCase, assumptions: { worklifeMethod: 'retirement_age_hint' } });
    expect(issues).toEqual([
      'assumptions.retirementAgeHint: retirementAgeHint is required when worklifeMethod is retirement_age_hint',
    ]);
  });

  it('should reject a missing assumptions object', () => {
    const { assumptions, ...withoutAssumptions } = baseCase;
    expect(assumptions).toEqual({});
    expect(CaseConfigSchema.safeParse(withoutAssumptions).success).toBe(false);
  });
});

describe('parseCaseConfig', () => {
  it('should return the validated configuration', () => {
    expect(parseCaseConfig(baseCase)).toEqual(baseCase);
  });

  it('should throw InvalidConfigError for the config stage', () => {
    expect(() => parseCaseConfig({})).toThrow(InvalidConfigError);
    try {
      parseCaseConfig({});
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (error instanceof InvalidConfigError) {
        expect(error.stage).toBe('config');
        expect(error.issues.length).toBeGreaterThan(0);
      }
    }
  });
});
