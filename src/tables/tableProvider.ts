import * as fs from "fs/promises";
import * as path from "path";
import { TableKey } from "../models/ReferenceTables";

/**
 * Source of raw reference table documents.
 * Documents are validated by the caller, so providers may return parsed JSON as-is.
 */
export interface TableProvider {
  load(key: TableKey): Promise<unknown>;
  /** Releases whatever backs the provider. Called once after loading, even on failure. */
  close?(): Promise<void>;
}

/**
 * Reads `<directory>/<key>.json` for each table.
 */
export class FileTableProvider implements TableProvider {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async load(key: TableKey): Promise<unknown> {
    const filePath = path.join(this.directory, `${key}.json`);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to read reference table "${key}" from ${filePath}: ${message}`);
    }
    try {
      return JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Reference table "${key}" at ${filePath} is not valid JSON: ${message}`);
    }
  }
}
