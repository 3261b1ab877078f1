import { ReferenceTables } from "../models/ReferenceTables";
import { loadReferenceTables } from "./referenceTables";
import { TableProvider } from "./tableProvider";

/**
 * Loads the reference tables once and shares them across case runs.
 * A failed load is forgotten so the next caller retries it.
 */
export class ReferenceTableCache {
  private readonly provider: TableProvider;
  private pending: Promise<ReferenceTables> | null = null;

  constructor(provider: TableProvider) {
    this.provider = provider;
  }

  get(): Promise<ReferenceTables> {
    if (!this.pending) {
      this.pending = loadReferenceTables(this.provider).catch((error: unknown) => {
        this.pending = null;
        throw error;
      });
    }
    return this.pending;
  }
}
