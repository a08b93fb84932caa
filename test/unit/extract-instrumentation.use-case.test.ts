import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { ExtractInstrumentationUseCase } from "../../src/core/use-cases/extract-instrumentation.use-case.js";
import {
  InputNotFoundError,
  OutputDirectoryError,
  OutputExistsError,
} from "../../src/core/domain/errors.js";
import type { ConfigInput } from "../../src/adapters/validation.js";
import { fixturePath, makeConfig, makeTempDir } from "../support/fixtures.js";
import { MemoryLogger } from "../support/memory-logger.js";

describe("ExtractInstrumentationUseCase", () => {
  let dir: string;
  let outputDir: string;
  let logger: MemoryLogger;
  const confirmOverwrite = vi.fn<(path: string) => Promise<boolean>>();

  const createExtractor = (input: ConfigInput = {}) =>
    new ExtractInstrumentationUseCase(makeConfig(input), logger, { confirmOverwrite });

  beforeEach(() => {
    dir = makeTempDir();
    outputDir = join(dir, "out");
    logger = new MemoryLogger();
    confirmOverwrite.mockReset();
    confirmOverwrite.mockResolvedValue(false);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes one row per iteration", async () => {
    const results = await createExtractor().execute({
      inputs: [fixturePath("two-iterations.log")],
      outputDir,
    });

    expect(readFileSync(join(outputDir, "two-iterations.csv"), "utf-8")).toBe(
      "iteration,processing_time\n0,12.5\n1,13.1\n",
    );
    expect(results).toEqual([
      {
        inputFile: fixturePath("two-iterations.log"),
        outputFile: join(outputDir, "two-iterations.csv"),
        iterations: 2,
        columns: ["processing_time"],
        unrecognizedLines: 0,
        outcome: "written",
      },
    ]);
    expect(logger.messages("info")).toEqual([
      "Processing 1 input file(s)",
      `Wrote ${join(outputDir, "two-iterations.csv")} (2 iterations, 1 columns)`,
    ]);
  });

  it("produces byte-identical output when run twice", async () => {
    const request = { inputs: [fixturePath("flamegpu-console.log")], outputDir };
    await createExtractor().execute(request);
    const first = readFileSync(join(outputDir, "flamegpu-console.csv"));
    const firstMtime = statSync(join(outputDir, "flamegpu-console.csv")).mtimeMs;

    const [second] = await createExtractor().execute(request);

    expect(second.outcome).toBe("unchanged");
    expect(readFileSync(join(outputDir, "flamegpu-console.csv")).equals(first)).toBe(true);
    expect(statSync(join(outputDir, "flamegpu-console.csv")).mtimeMs).toBe(firstMtime);
    expect(confirmOverwrite).not.toHaveBeenCalled();
  });

  it("adds metadata columns when requested", async () => {
    const input = fixturePath("flamegpu-console.log");
    await createExtractor().execute({ inputs: [input], outputDir, includeMetadata: true });

    expect(readFileSync(join(outputDir, "flamegpu-console.csv"), "utf-8")).toBe(
      [
        "input_file,total_processing_time,iteration,boid_default_count,output_location,move",
        `${input},42.123,0,1024,0.250,1.5`,
        `${input},42.123,1,1024,0.245,1.25`,
        `${input},42.123,2,1024,,1.75`,
        "",
      ].join("\n"),
    );
  });

  it("takes the metadata switch from config when the request leaves it unset", async () => {
    await createExtractor({ output: { includeMetadata: true } }).execute({
      inputs: [fixturePath("two-iterations.log")],
      outputDir,
    });

    expect(readFileSync(join(outputDir, "two-iterations.csv"), "utf-8").split("\n")[0]).toBe(
      "input_file,total_processing_time,iteration,processing_time",
    );
  });

  it("writes a header-only file for an empty log and warns", async () => {
    const empty = join(dir, "empty.log");
    writeFileSync(empty, "");

    const [result] = await createExtractor().execute({ inputs: [empty], outputDir });

    expect(result.iterations).toBe(0);
    expect(readFileSync(join(outputDir, "empty.csv"), "utf-8")).toBe("iteration\n");
    expect(logger.messages("warn")).toEqual([`No instrumentation found in ${empty}`]);
  });

  it("names colliding outputs apart", async () => {
    const other = join(dir, "two-iterations.txt");
    copyFileSync(fixturePath("two-iterations.log"), other);

    const results = await createExtractor().execute({
      inputs: [fixturePath("two-iterations.log"), other],
      outputDir,
    });

    expect(results.map((r) => r.outputFile)).toEqual([
      join(outputDir, "two-iterations.csv"),
      join(outputDir, "two-iterations__1.csv"),
    ]);
  });

  it("skips logs without the configured signature and keeps going", async () => {
    const logs = join(dir, "logs");
    mkdirSync(logs);
    copyFileSync(fixturePath("two-iterations.log"), join(logs, "a-stray.log"));
    copyFileSync(fixturePath("flamegpu-console.log"), join(logs, "b-run.log"));

    const results = await createExtractor({
      log: { signature: "FLAMEGPU Console mode" },
    }).execute({ inputs: [logs], outputDir });

    expect(results.map((r) => r.outputFile)).toEqual([join(outputDir, "b-run.csv")]);
    expect(existsSync(join(outputDir, "a-stray.csv"))).toBe(false);
    expect(logger.messages("warn")).toEqual([
      `Skipping ${join(logs, "a-stray.log")}: no line starting with "FLAMEGPU Console mode"`,
    ]);
  });

  it("accepts logs carrying the configured signature", async () => {
    const [result] = await createExtractor({
      log: { signature: "FLAMEGPU Console mode" },
    }).execute({ inputs: [fixturePath("flamegpu-console.log")], outputDir });

    expect(result.iterations).toBe(3);
    expect(result.unrecognizedLines).toBe(1);
  });

  it("fails on a differing existing file unless forced", async () => {
    const existing = join(outputDir, "two-iterations.csv");
    await createExtractor().execute({ inputs: [fixturePath("two-iterations.log")], outputDir });
    writeFileSync(existing, "stale\n");

    await expect(
      createExtractor().execute({ inputs: [fixturePath("two-iterations.log")], outputDir }),
    ).rejects.toThrow(OutputExistsError);
    expect(readFileSync(existing, "utf-8")).toBe("stale\n");

    const [forced] = await createExtractor().execute({
      inputs: [fixturePath("two-iterations.log")],
      outputDir,
      force: true,
    });
    expect(forced.outcome).toBe("overwritten");
    expect(readFileSync(existing, "utf-8")).toBe("iteration,processing_time\n0,12.5\n1,13.1\n");
  });

  it("fails before writing anything when an input is missing", async () => {
    await expect(
      createExtractor().execute({
        inputs: [fixturePath("two-iterations.log"), join(dir, "missing.log")],
        outputDir,
      }),
    ).rejects.toThrow(InputNotFoundError);
    expect(() => statSync(outputDir)).toThrow();
  });

  it("fails when the output directory cannot be created", async () => {
    writeFileSync(join(dir, "blocker"), "");

    await expect(
      createExtractor().execute({
        inputs: [fixturePath("two-iterations.log")],
        outputDir: join(dir, "blocker", "out"),
      }),
    ).rejects.toThrow(OutputDirectoryError);
  });
});
