/**
 * Citation data structures
 */

export interface Citation {
  sourceLabel: string;
  sourceLocator: string;
}

/** A table row together with where it came from. */
export interface Cited<T> {
  row: T;
  citation: Citation;
}

export const USER_OVERRIDE_LABEL = "User override";
export const CASE_CONFIGURATION_LABEL = "Case configuration";
