import { readFileSync } from "node:fs";
import type {
  IterationRecord,
  LogMetadata,
  Measurement,
  ResultTable,
} from "../domain/entities/iteration-record.entity.js";
import { InputNotFoundError, InputReadError, errnoCode } from "../domain/errors.js";
import type { ILogger } from "../domain/services/logger.service.js";
import {
  isDecimal,
  toColumnName,
  type MarkerSet,
} from "../../infrastructure/utils/marker.utils.js";

export interface ParseLogOptions {
  markers: MarkerSet;
  signature?: string;
}

export interface ParseResult {
  table: ResultTable;
  metadata: LogMetadata;
  unrecognizedLines: number;
}

/**
 * Single pass over a log. Each line is tried against the iteration marker,
 * then the measurement markers, then the metadata and population markers;
 * anything else is skipped.
 *
 * Values accumulate into the open iteration. An iteration marker closes it,
 * and so does a label that already has a value in it.
 */
export class ParseLogUseCase {
  constructor(
    private options: ParseLogOptions,
    private logger: ILogger,
  ) {}

  parseFile(path: string): ParseResult {
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") throw new InputNotFoundError(path, e);
      throw new InputReadError(path, e);
    }
    return this.parse(text);
  }

  parse(text: string): ParseResult {
    const { markers, signature } = this.options;
    const builder = new TableBuilder();
    const metadata: LogMetadata = { signatureSeen: false, population: new Map() };
    let unrecognizedLines = 0;

    const lines = text.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trimEnd();
      if (line.length === 0) continue;

      if (signature && line.startsWith(signature)) {
        metadata.signatureSeen = true;
        continue;
      }

      if (markers.iteration?.test(line)) {
        builder.open();
        continue;
      }

      const measurement = this.matchMeasurement(line);
      if (measurement) {
        builder.add(measurement);
        continue;
      }

      if (this.matchMetadata(line, metadata)) continue;
      if (this.matchPopulation(line, metadata)) continue;

      unrecognizedLines++;
      this.logger.debug(`Skipping unrecognized line ${i + 1}: ${line}`);
    }

    return { table: builder.finish(), metadata, unrecognizedLines };
  }

  private matchMeasurement(line: string): Measurement | null {
    for (const marker of this.options.markers.measurements) {
      const match = marker.regex.exec(line);
      if (!match?.groups) continue;
      const label = (marker.label ?? match.groups.label ?? "").trim();
      const text = (match.groups.value ?? "").trim();
      const column = toColumnName(label);
      if (!column || !isDecimal(text)) continue;
      return { label, column, value: Number(text), text };
    }
    return null;
  }

  private matchPopulation(line: string, metadata: LogMetadata): boolean {
    const groups = this.options.markers.population?.exec(line)?.groups;
    if (!groups) return false;
    const name = toColumnName(groups.label ?? "");
    const count = (groups.value ?? "").trim();
    if (!name || !isDecimal(count)) return false;
    metadata.population.set(`${name}_count`, count);
    return true;
  }

  private matchMetadata(line: string, metadata: LogMetadata): boolean {
    for (const { key, regex } of this.options.markers.metadata) {
      const value = regex.exec(line)?.groups?.value;
      if (value === undefined) continue;
      metadata[key] = value.trim();
      return true;
    }
    return false;
  }
}

class TableBuilder {
  private table: ResultTable = { columns: [], records: [] };
  private seenColumns = new Set<string>();
  private current: IterationRecord | null = null;

  open(): IterationRecord {
    this.close();
    const record: IterationRecord = {
      index: this.table.records.length,
      values: new Map(),
    };
    this.current = record;
    return record;
  }

  add(measurement: Measurement): void {
    let record = this.current ?? this.open();
    if (record.values.has(measurement.column)) record = this.open();
    record.values.set(measurement.column, measurement);
    if (!this.seenColumns.has(measurement.column)) {
      this.seenColumns.add(measurement.column);
      this.table.columns.push(measurement.column);
    }
  }

  finish(): ResultTable {
    this.close();
    return this.table;
  }

  private close(): void {
    if (this.current) this.table.records.push(this.current);
    this.current = null;
  }
}
