import { existsSync, readFileSync, writeFileSync } from "node:fs";
import type {
  LogMetadata,
  ResultTable,
} from "../domain/entities/iteration-record.entity.js";
import { OutputExistsError, OutputWriteError } from "../domain/errors.js";
import type { IOverwritePrompt } from "../domain/services/overwrite-prompt.service.js";
import { toCsv } from "../../infrastructure/utils/csv.utils.js";

export type WriteOutcome = "written" | "overwritten" | "unchanged";

export interface CsvRenderOptions {
  /** Add input_file, total_processing_time and population count columns */
  includeMetadata: boolean;
  inputFile: string;
  metadata: LogMetadata;
}

export interface WriteCsvRequest extends CsvRenderOptions {
  table: ResultTable;
  outputPath: string;
  force: boolean;
}

export function renderCsv(table: ResultTable, options: CsvRenderOptions): string {
  const lead = options.includeMetadata
    ? ["input_file", "total_processing_time"]
    : [];
  const leadCells = options.includeMetadata
    ? [options.inputFile, options.metadata.totalProcessingTime ?? ""]
    : [];

  const population = options.includeMetadata
    ? [...options.metadata.population]
    : [];

  const headers = [
    ...lead,
    "iteration",
    ...population.map(([column]) => column),
    ...table.columns,
  ];
  const rows = table.records.map((record) => [
    ...leadCells,
    String(record.index),
    ...population.map(([, count]) => count),
    ...table.columns.map((column) => record.values.get(column)?.text ?? ""),
  ]);
  return toCsv(headers, rows);
}

export class WriteCsvUseCase {
  constructor(private prompt: IOverwritePrompt) {}

  async execute(request: WriteCsvRequest): Promise<WriteOutcome> {
    const content = renderCsv(request.table, request);
    const { outputPath } = request;

    let outcome: WriteOutcome = "written";
    if (existsSync(outputPath)) {
      if (this.readExisting(outputPath) === content) return "unchanged";
      if (!request.force && !(await this.prompt.confirmOverwrite(outputPath))) {
        throw new OutputExistsError(outputPath);
      }
      outcome = "overwritten";
    }

    try {
      writeFileSync(outputPath, content, "utf-8");
    } catch (e) {
      throw new OutputWriteError(outputPath, e);
    }
    return outcome;
  }

  private readExisting(path: string): string {
    try {
      return readFileSync(path, "utf-8");
    } catch (e) {
      throw new OutputWriteError(path, e);
    }
  }
}
