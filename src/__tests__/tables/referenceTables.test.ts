import { StaticReferenceTables, loadReferenceTables } from '../../tables/referenceTables';
import { TableLookupError } from '../../utils/errors';
import { InMemoryTableProvider, createFakeTables, fakeDocuments, fakeTableSource } from '../fixtures/tables';

describe('StaticReferenceTables', () => {
  const tables = createFakeTables();

  it('should return a life table row with its citation', () => {
    const { row, citation } = tables.lifeExpectancy(30, 'male');

    expect(row).toEqual({ sex: 'male', age: 30, remainingYears: 65 });
    expect(citation).toEqual({
      sourceLabel: 'Test life table',
      sourceLocator: 'life_table row 132 (sex=male, age=30)',
    });
  });

  it('should report the maximum age per sex', () => {
    expect(tables.lifeTableMaxAge('female')).toBe(100);
    expect(tables.lifeTableMaxAge('male')).toBe(100);
  });

  it('should find the participation bracket containing the whole age', () => {
    expect(tables.participation(24.9, 'female', 'PhD').row.participationFactor).toBe(0.75);
    expect(tables.participation(25, 'female', 'PhD').row.participationFactor).toBe(0.5);
    expect(tables.participation(100, 'male', 'Other').row.participationFactor).toBe(0.125);
  });

  it('should report wage growth coverage per category', () => {
    expect(tables.wageGrowthCoverage('11')).toEqual({ firstYear: 2023, lastYear: 2026 });
    expect(tables.wageGrowthCoverage('29')).toEqual({ firstYear: 2024, lastYear: 2025 });
  });

  it('should name the table and key of a missing row', () => {
    let caught: unknown;
    try {
      tables.discountRate('treasury_30y', 2025);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TableLookupError);
    if (caught instanceof TableLookupError) {
      expect(caught.table).toBe('discount_rates');
      expect(caught.key).toEqual({ series: 'treasury_30y', year: 2025 });
      expect(caught.stage).toBe('tables');
      expect(caught.message).toBe('No discount_rates row for series=treasury_30y, year=2025');
    }
  });

  it('should throw for a sex with no life table rows', () => {
    const femaleOnly = new StaticReferenceTables({
      ...fakeDocuments,
      lifeTable: {
        ...fakeDocuments.lifeTable,
        rows: fakeDocuments.lifeTable.rows.filter((row) => row.sex === 'female'),
      },
    });

    expect(() => femaleOnly.lifeTableMaxAge('male')).toThrow('No life_table row for sex=male');
  });

  it('should reject duplicate keys', () => {
    expect(
      () =>
        new StaticReferenceTables({
          ...fakeDocuments,
          wageGrowth: {
            ...fakeDocuments.wageGrowth,
            rows: [...fakeDocuments.wageGrowth.rows, { category: '11', year: 2025, rate: 0.05 }],
          },
        })
    ).toThrow('Duplicate wage_growth row for category=11, year=2025');
  });

  it('should freeze returned rows', () => {
    expect(Object.isFrozen(tables.wageGrowth(2025, '11').row)).toBe(true);
  });
});

describe('loadReferenceTables', () => {
  it('should load every table and close the provider', async () => {
    const provider = new InMemoryTableProvider(fakeTableSource());

    const tables = await loadReferenceTables(provider);

    expect(provider.loads).toEqual(['life_table', 'worklife_table', 'wage_growth', 'discount_rates']);
    expect(provider.closeCount).toBe(1);
    expect(tables.discountRate('treasury_1y', 2024).row.rate).toBe(0.05);
  });

  it('should close the provider when a load fails', async () => {
    const provider = new InMemoryTableProvider(fakeTableSource(), 1);

    await expect(loadReferenceTables(provider)).rejects.toThrow('Table source unavailable for life_table');
    expect(provider.closeCount).toBe(1);
  });

  it('should reject malformed documents', async () => {
    const provider = new InMemoryTableProvider({
      ...fakeTableSource(),
      wage_growth: { name: 'wage_growth', sourceLabel: 'Broken', rows: [{ category: '11', year: 2025, rate: -0.02 }] },
    });

    await expect(loadReferenceTables(provider)).rejects.toThrow('Reference table "wage_growth" is malformed');
    expect(provider.closeCount).toBe(1);
  });
});
