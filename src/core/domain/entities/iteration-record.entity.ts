import type { MetadataKey } from "./config.entity.js";

export interface Measurement {
  label: string;
  /** snake_case column the label maps to */
  column: string;
  value: number;
  /** Decimal text exactly as it appeared in the log */
  text: string;
}

export interface IterationRecord {
  index: number;
  values: Map<string, Measurement>;
}

export interface ResultTable {
  /** Columns in first-seen order */
  columns: string[];
  records: IterationRecord[];
}

export type LogMetadata = Partial<Record<MetadataKey, string>> & {
  signatureSeen: boolean;
  /** `<label>_count` column → last count logged for that agent type and state */
  population: Map<string, string>;
};
