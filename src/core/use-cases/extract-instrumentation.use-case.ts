import { join } from "node:path";
import type { Config } from "../domain/entities/config.entity.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { IOverwritePrompt } from "../domain/services/overwrite-prompt.service.js";
import { compileMarkers } from "../../infrastructure/utils/marker.utils.js";
import {
  deriveOutputNames,
  ensureOutputDir,
} from "../../infrastructure/utils/storage.utils.js";
import { DiscoverInputsUseCase } from "./discover-inputs.use-case.js";
import { ParseLogUseCase } from "./parse-log.use-case.js";
import { WriteCsvUseCase, type WriteOutcome } from "./write-csv.use-case.js";

export interface ExtractRequest {
  inputs: string[];
  outputDir: string;
  force?: boolean;
  /** Overrides output.includeMetadata when set */
  includeMetadata?: boolean;
}

export interface FileExtractionResult {
  inputFile: string;
  outputFile: string;
  iterations: number;
  columns: string[];
  unrecognizedLines: number;
  outcome: WriteOutcome;
}

/**
 * Extractor: discover inputs, then for each log parse → CSV. Files are
 * processed in order and the first fatal error stops the run. Files without
 * the configured signature are skipped with a warning.
 */
export class ExtractInstrumentationUseCase {
  private discoverInputs = new DiscoverInputsUseCase();
  private parseLog: ParseLogUseCase;
  private writeCsv: WriteCsvUseCase;

  constructor(
    private config: Config,
    private logger: ILogger,
    prompt: IOverwritePrompt,
  ) {
    this.parseLog = new ParseLogUseCase(
      {
        markers: compileMarkers(config.markers),
        signature: config.log.signature,
      },
      logger,
    );
    this.writeCsv = new WriteCsvUseCase(prompt);
  }

  async execute(request: ExtractRequest): Promise<FileExtractionResult[]> {
    const inputFiles = this.discoverInputs.execute({ paths: request.inputs });
    ensureOutputDir(request.outputDir);

    const includeMetadata =
      request.includeMetadata ?? this.config.output.includeMetadata;
    const names = deriveOutputNames(inputFiles, this.config.output.extension);
    const results: FileExtractionResult[] = [];

    this.logger.info(`Processing ${inputFiles.length} input file(s)`);
    for (let i = 0; i < inputFiles.length; i++) {
      const inputFile = inputFiles[i];
      const outputFile = join(request.outputDir, names[i]);
      this.logger.debug(`Parsing ${inputFile}`);

      const { table, metadata, unrecognizedLines } =
        this.parseLog.parseFile(inputFile);

      const { signature } = this.config.log;
      if (signature && !metadata.signatureSeen) {
        this.logger.warn(
          `Skipping ${inputFile}: no line starting with "${signature}"`,
        );
        continue;
      }
      if (metadata.device) this.logger.debug(`Device: ${metadata.device}`);
      if (metadata.initialStates) {
        this.logger.debug(`Initial states: ${metadata.initialStates}`);
      }
      if (metadata.outputDir) {
        this.logger.debug(`Simulation output dir: ${metadata.outputDir}`);
      }
      if (unrecognizedLines > 0) {
        this.logger.debug(`Skipped ${unrecognizedLines} unrecognized line(s)`);
      }
      if (table.records.length === 0) {
        this.logger.warn(`No instrumentation found in ${inputFile}`);
      }

      const outcome = await this.writeCsv.execute({
        table,
        metadata,
        inputFile,
        includeMetadata,
        outputPath: outputFile,
        force: request.force ?? false,
      });

      const verb = outcome === "unchanged" ? "Unchanged" : "Wrote";
      this.logger.info(
        `${verb} ${outputFile} (${table.records.length} iterations, ${table.columns.length} columns)`,
      );
      results.push({
        inputFile,
        outputFile,
        iterations: table.records.length,
        columns: table.columns,
        unrecognizedLines,
        outcome,
      });
    }
    return results;
  }
}
