import { z } from "zod";
import { EducationLevel, Sex } from "../models/CaseConfig";
import { Citation, Cited } from "../models/Citation";
import {
  DiscountRateRow,
  LifeTableRow,
  ReferenceTables,
  TableKey,
  WageGrowthRow,
  WorklifeTableRow,
  YearCoverage,
} from "../models/ReferenceTables";
import { TableLookupError } from "../utils/errors";
import {
  DiscountRatesDocument,
  DiscountRatesDocumentSchema,
  LifeTableDocument,
  LifeTableDocumentSchema,
  WageGrowthDocument,
  WageGrowthDocumentSchema,
  WorklifeTableDocument,
  WorklifeTableDocumentSchema,
  formatIssues,
} from "../utils/validation";
import { TableProvider } from "./tableProvider";

export interface ReferenceTableDocuments {
  lifeTable: LifeTableDocument;
  worklifeTable: WorklifeTableDocument;
  wageGrowth: WageGrowthDocument;
  discountRates: DiscountRatesDocument;
}

interface IndexedRow<T> {
  row: Readonly<T>;
  citation: Citation;
}

function cite(document: { name: string; sourceLabel: string }, rowIndex: number, detail: string): Citation {
  return {
    sourceLabel: document.sourceLabel,
    sourceLocator: `${document.name} row ${rowIndex + 1} (${detail})`,
  };
}

function indexRows<T>(
  table: TableKey,
  document: { name: string; sourceLabel: string; rows: T[] },
  keyOf: (row: T) => string,
  describe: (row: T) => string
): Map<string, IndexedRow<T>> {
  const index = new Map<string, IndexedRow<T>>();
  document.rows.forEach((row, rowIndex) => {
    const key = keyOf(row);
    if (index.has(key)) {
      throw new Error(`Duplicate ${table} row for ${describe(row)}`);
    }
    index.set(key, {
      row: Object.freeze({ ...row }),
      citation: Object.freeze(cite(document, rowIndex, describe(row))),
    });
  });
  return index;
}

function coverageByGroup<T>(rows: T[], groupOf: (row: T) => string, yearOf: (row: T) => number): Map<string, YearCoverage> {
  const coverage = new Map<string, YearCoverage>();
  for (const row of rows) {
    const group = groupOf(row);
    const year = yearOf(row);
    const existing = coverage.get(group);
    coverage.set(group, {
      firstYear: existing ? Math.min(existing.firstYear, year) : year,
      lastYear: existing ? Math.max(existing.lastYear, year) : year,
    });
  }
  return coverage;
}

/**
 * In-memory reference tables, indexed once at construction and never mutated afterwards.
 */
export class StaticReferenceTables implements ReferenceTables {
  private readonly lifeRows: Map<string, IndexedRow<LifeTableRow>>;
  private readonly maxAgeBySex: Map<Sex, number> = new Map();
  private readonly worklifeRows: Array<IndexedRow<WorklifeTableRow>>;
  private readonly wageRows: Map<string, IndexedRow<WageGrowthRow>>;
  private readonly wageCoverage: Map<string, YearCoverage>;
  private readonly discountRows: Map<string, IndexedRow<DiscountRateRow>>;

  constructor(documents: ReferenceTableDocuments) {
    const { lifeTable, worklifeTable, wageGrowth, discountRates } = documents;

    this.lifeRows = indexRows(
      "life_table",
      lifeTable,
      (row) => `${row.sex}|${row.age}`,
      (row) => `sex=${row.sex}, age=${row.age}`
    );
    for (const row of lifeTable.rows) {
      this.maxAgeBySex.set(row.sex, Math.max(this.maxAgeBySex.get(row.sex) ?? 0, row.age));
    }

    this.worklifeRows = worklifeTable.rows.map((row, rowIndex) => ({
      row: Object.freeze({ ...row }),
      citation: Object.freeze(
        cite(
          worklifeTable,
          rowIndex,
          `sex=${row.sex}, education=${row.education}, ages=${row.ageFrom}-${row.ageTo}`
        )
      ),
    }));

    this.wageRows = indexRows(
      "wage_growth",
      wageGrowth,
      (row) => `${row.category}|${row.year}`,
      (row) => `category=${row.category}, year=${row.year}`
    );
    this.wageCoverage = coverageByGroup(
      wageGrowth.rows,
      (row) => row.category,
      (row) => row.year
    );

    this.discountRows = indexRows(
      "discount_rates",
      discountRates,
      (row) => `${row.series}|${row.year}`,
      (row) => `series=${row.series}, year=${row.year}`
    );

    Object.freeze(this);
  }

  lifeExpectancy(age: number, sex: Sex): Cited<LifeTableRow> {
    const entry = this.lifeRows.get(`${sex}|${age}`);
    if (!entry) {
      throw new TableLookupError("life_table", { sex, age });
    }
    return entry;
  }

  lifeTableMaxAge(sex: Sex): number {
    const maxAge = this.maxAgeBySex.get(sex);
    if (maxAge === undefined) {
      throw new TableLookupError("life_table", { sex });
    }
    return maxAge;
  }

  /**
   * Participation row whose age bracket contains the whole-year part of `age`.
   */
  participation(age: number, sex: Sex, education: EducationLevel): Cited<WorklifeTableRow> {
    const wholeAge = Math.floor(age);
    const entry = this.worklifeRows.find(
      ({ row }) =>
        row.sex === sex &&
        row.education === education &&
        row.ageFrom <= wholeAge &&
        wholeAge <= row.ageTo
    );
    if (!entry) {
      throw new TableLookupError("worklife_table", { sex, education, age: wholeAge });
    }
    return entry;
  }

  wageGrowth(year: number, category: string): Cited<WageGrowthRow> {
    const entry = this.wageRows.get(`${category}|${year}`);
    if (!entry) {
      throw new TableLookupError("wage_growth", { category, year });
    }
    return entry;
  }

  wageGrowthCoverage(category: string): YearCoverage {
    const coverage = this.wageCoverage.get(category);
    if (!coverage) {
      throw new TableLookupError("wage_growth", { category });
    }
    return coverage;
  }

  discountRate(series: string, year: number): Cited<DiscountRateRow> {
    const entry = this.discountRows.get(`${series}|${year}`);
    if (!entry) {
      throw new TableLookupError("discount_rates", { series, year });
    }
    return entry;
  }
}

async function loadDocument<T>(
  provider: TableProvider,
  key: TableKey,
  schema: z.ZodType<T>
): Promise<T> {
  const raw = await provider.load(key);
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Reference table "${key}" is malformed: ${formatIssues(result.error).join("; ")}`);
  }
  return result.data;
}

/**
 * Loads and validates every table from the provider, then closes it.
 * The provider is closed whether or not loading succeeds.
 */
export async function loadReferenceTables(provider: TableProvider): Promise<ReferenceTables> {
  try {
    const lifeTable = await loadDocument(provider, "life_table", LifeTableDocumentSchema);
    const worklifeTable = await loadDocument(provider, "worklife_table", WorklifeTableDocumentSchema);
    const wageGrowth = await loadDocument(provider, "wage_growth", WageGrowthDocumentSchema);
    const discountRates = await loadDocument(provider, "discount_rates", DiscountRatesDocumentSchema);
    return new StaticReferenceTables({ lifeTable, worklifeTable, wageGrowth, discountRates });
  } finally {
    if (provider.close) {
      await provider.close();
    }
  }
}
