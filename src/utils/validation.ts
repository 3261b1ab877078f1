import { z } from "zod";
import {
  ACTIVE_STATUSES,
  CaseConfig,
  EDUCATION_LEVELS,
  SEXES,
  WORKLIFE_METHODS,
} from "../models/CaseConfig";
import { InvalidConfigError } from "./errors";
import { parseIsoDate } from "./time";

/**
 * Zod validation schemas for input data validation.
 * These schemas ensure data integrity before any calculation begins.
 */

const IsoDateSchema = z
  .string()
  .refine((value) => parseIsoDate(value) !== null, "Expected a valid YYYY-MM-DD date");

/**
 * Schema for the decedent. Dates compare lexically because both are YYYY-MM-DD.
 */
export const PersonSchema = z
  .object({
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    dateOfBirth: IsoDateSchema,
    evaluationDate: IsoDateSchema,
    sex: z.enum(SEXES),
    educationLevel: z.enum(EDUCATION_LEVELS),
    activeStatus: z.enum(ACTIVE_STATUSES),
  })
  .refine((person) => person.dateOfBirth <= person.evaluationDate, {
    message: "Date of birth must not be after the evaluation date",
    path: ["evaluationDate"],
  });

/**
 * Schema for the occupation. Base salary must be strictly positive.
 */
export const OccupationSchema = z.object({
  socCode: z.string().regex(/^\d{2}-\d{4}$/, "Expected a SOC code such as 11-2022"),
  title: z.string().optional(),
  county: z.string().optional(),
  state: z.string().optional(),
  baseSalary: z.number().positive(),
});

/**
 * Schema for the optional overrides. Rates are decimals and must exceed -100%.
 */
export const AssumptionsSchema = z
  .object({
    retirementAgeHint: z.number().min(0).max(130).optional(),
    lifeExpectancyYears: z.number().min(0).optional(),
    worklifeMethod: z.enum(WORKLIFE_METHODS).optional(),
    worklifeYears: z.number().min(0).optional(),
    discountRate: z.number().gt(-1).optional(),
    discountSeries: z.string().min(1).optional(),
    wageGrowthRate: z.number().gt(-1).optional(),
  })
  .refine(
    (assumptions) =>
      assumptions.worklifeMethod !== "retirement_age_hint" ||
      assumptions.retirementAgeHint !== undefined,
    {
      message: "retirementAgeHint is required when worklifeMethod is retirement_age_hint",
      path: ["retirementAgeHint"],
    }
  );

export const CaseConfigSchema = z.object({
  caseId: z.string().min(1),
  person: PersonSchema,
  occupation: OccupationSchema,
  assumptions: AssumptionsSchema,
});

/**
 * Flattens zod issues into "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validates an untrusted case configuration.
 *
 * @throws InvalidConfigError listing every failing field
 */
export function parseCaseConfig(input: unknown): CaseConfig {
  const result = CaseConfigSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Schemas for the bundled reference table documents.
 */
export const LifeTableDocumentSchema = z.object({
  name: z.string(),
  sourceLabel: z.string(),
  rows: z.array(
    z.object({
      sex: z.enum(SEXES),
      age: z.number().int().min(0),
      remainingYears: z.number().min(0),
    })
  ),
});

export const WorklifeTableDocumentSchema = z.object({
  name: z.string(),
  sourceLabel: z.string(),
  rows: z.array(
    z
      .object({
        sex: z.enum(SEXES),
        education: z.enum(EDUCATION_LEVELS),
        ageFrom: z.number().int().min(0),
        ageTo: z.number().int().min(0),
        participationFactor: z.number().min(0).max(1),
      })
      .refine((row) => row.ageFrom <= row.ageTo, "ageFrom must not exceed ageTo")
  ),
});

export const WageGrowthDocumentSchema = z.object({
  name: z.string(),
  sourceLabel: z.string(),
  rows: z.array(
    z.object({
      category: z.string().min(1),
      year: z.number().int(),
      rate: z.number().min(0),
    })
  ),
});

export const DiscountRatesDocumentSchema = z.object({
  name: z.string(),
  sourceLabel: z.string(),
  rows: z.array(
    z.object({
      series: z.string().min(1),
      year: z.number().int(),
      rate: z.number().gt(-1),
    })
  ),
});

export type LifeTableDocument = z.infer<typeof LifeTableDocumentSchema>;
export type WorklifeTableDocument = z.infer<typeof WorklifeTableDocumentSchema>;
export type WageGrowthDocument = z.infer<typeof WageGrowthDocumentSchema>;
export type DiscountRatesDocument = z.infer<typeof DiscountRatesDocumentSchema>;
