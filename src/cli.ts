/**
 * Command-line surface for the delivery pipeline
 *
 * Flags override values from an optional JSON config file, which override
 * the built-in defaults.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Command, Option } from "commander";
import { Effect, Logger, LogLevel } from "effect";
import { CohortError, FileError, ValidationError } from "./errors";
import { getPlatform, runToPromise } from "./io/runtime";
import { DEFAULT_PIPELINE_CONFIG, deliveryPipeline, type PipelineResult } from "./pipeline";
import { GenotypeToolkit } from "./toolkit";
import { type PipelineConfig, PipelineConfigSchema } from "./types";

export const CLI_NAME = "cohort-delivery";

/**
 * Parsed `run` options
 */
export interface RunOptions {
  projectId?: string;
  cohortFile?: string;
  exclusionFile: string[];
  batch: string[];
  workDir?: string;
  deliveryDir?: string;
  stagingRoot?: string;
  toolkit?: string;
  vcf?: boolean;
  transferMethod?: "copy" | "sync";
  keepIntermediates?: boolean;
  parallelSubsets?: boolean;
  config?: string;
  logLevel: "debug" | "info" | "warning" | "error" | "none";
  logFormat: "pretty" | "json";
}

const LOG_LEVELS = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
} as const;

const PartialConfigSchema = PipelineConfigSchema.partial();

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Configuration fields given on the command line
 *
 * Repeatable flags count only when used; absent flags are left out so the
 * config file and defaults can supply them.
 */
export function flagsToConfig(options: RunOptions): Partial<PipelineConfig> {
  return {
    ...(options.projectId !== undefined && { projectId: options.projectId }),
    ...(options.cohortFile !== undefined && { cohortFile: options.cohortFile }),
    ...(options.exclusionFile.length > 0 && { exclusionFiles: options.exclusionFile }),
    ...(options.batch.length > 0 && { batchPrefixes: options.batch }),
    ...(options.workDir !== undefined && { workDir: options.workDir }),
    ...(options.deliveryDir !== undefined && { deliveryDir: options.deliveryDir }),
    ...(options.stagingRoot !== undefined && { stagingRoot: options.stagingRoot }),
    ...(options.toolkit !== undefined && { toolkitExecutable: options.toolkit }),
    ...(options.vcf !== undefined && { exportVcf: options.vcf }),
    ...(options.transferMethod !== undefined && { transferMethod: options.transferMethod }),
    ...(options.keepIntermediates !== undefined && { keepIntermediates: options.keepIntermediates }),
    ...(options.parallelSubsets !== undefined && { parallelSubsets: options.parallelSubsets }),
  };
}

/**
 * Read and validate a JSON config file holding any subset of the fields
 */
export const readConfigFile = (
  path: string
): Effect.Effect<Partial<PipelineConfig>, FileError | ValidationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs
      .readFileString(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));
    const json = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (error) =>
        new ValidationError(
          `Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
          "preflight",
          `File: ${path}`
        ),
    });
    const result = PartialConfigSchema(json);
    if (result instanceof type.errors) {
      return yield* Effect.fail(
        new ValidationError(`Invalid config file: ${result.summary}`, "preflight", `File: ${path}`)
      );
    }
    return result;
  });

/**
 * Combine defaults, config file and flags into a validated configuration
 */
export const resolveCliConfig = (
  options: RunOptions
): Effect.Effect<PipelineConfig, FileError | ValidationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fromFile = options.config !== undefined ? yield* readConfigFile(options.config) : {};
    const result = PipelineConfigSchema({ ...DEFAULT_PIPELINE_CONFIG, ...fromFile, ...flagsToConfig(options) });
    if (result instanceof type.errors) {
      return yield* Effect.fail(new ValidationError(`Invalid configuration: ${result.summary}`, "preflight"));
    }
    return result;
  });

/**
 * Human-readable summary of a finished run
 */
export function formatSummary(result: PipelineResult): string {
  const lines = [
    `Samples: ${result.filterReport.originalCount} -> ${result.filterReport.finalCount} after exclusions`,
  ];
  if (result.mergeReport !== null) {
    const merge = result.mergeReport;
    lines.push(
      `Merge: ${merge.status}, ${merge.batchCount} batches, ${merge.finalSampleCount} samples, ${merge.finalMarkerCount} markers`,
      `Conflicting markers excluded: ${merge.conflictMarkerCount}`
    );
    if (merge.exportPath !== null) lines.push(`VCF: ${merge.exportPath}`);
  }
  lines.push(
    `Manifest: ${result.manifest.totalFiles} files, ${result.manifest.totalSizeBytes} bytes`,
    `Transfer: ${result.transferReport.fileCount} files to ${result.transferReport.destinationDir}, verified=${result.transferReport.verified}`
  );
  return lines.join("\n");
}

async function runCommand(options: RunOptions): Promise<void> {
  const program = resolveCliConfig(options).pipe(
    Effect.flatMap((config) =>
      deliveryPipeline(config).pipe(Effect.provide(GenotypeToolkit.layer(config.toolkitExecutable)))
    ),
    Logger.withMinimumLogLevel(LOG_LEVELS[options.logLevel]),
    Effect.provide(options.logFormat === "json" ? Logger.json : Logger.pretty),
    Effect.provide(getPlatform())
  );

  const result = await runToPromise(program);
  console.log(formatSummary(result));
  if (!result.transferReport.verified) {
    process.exitCode = 2;
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof CohortError) return error.toString();
  return error instanceof Error ? error.message : String(error);
}

/**
 * Build the command-line program
 */
export function buildProgram(): Command {
  const program = new Command().name(CLI_NAME).description("Assemble, merge and deliver a genotyped cohort");

  program
    .command("run")
    .description("filter, merge, manifest and transfer a cohort delivery")
    .option("--project-id <id>", "project identifier")
    .option("--cohort-file <path>", "cohort sample list")
    .option("--exclusion-file <path>", "exclusion list (repeatable)", collect, [])
    .option("--batch <prefix>", "genotype batch prefix (repeatable)", collect, [])
    .option("--work-dir <path>", "directory for intermediate files")
    .option("--delivery-dir <path>", "directory assembled for delivery")
    .option("--staging-root <path>", "root of the researcher staging area")
    .option("--toolkit <path>", "genotype toolkit executable")
    .option("--vcf", "export the merged cohort as VCF (default)")
    .option("--no-vcf", "skip VCF export")
    .addOption(new Option("--transfer-method <method>", "transfer method").choices(["copy", "sync"]))
    .option("--keep-intermediates", "keep the merge workspace")
    .option("--parallel-subsets", "subset batches concurrently")
    .option("--config <path>", "JSON config file")
    .addOption(
      new Option("--log-level <level>", "minimum log level")
        .choices(["debug", "info", "warning", "error", "none"])
        .default("info")
    )
    .addOption(new Option("--log-format <format>", "log format").choices(["pretty", "json"]).default("pretty"))
    .action(async (options: RunOptions) => {
      try {
        await runCommand(options);
      } catch (error) {
        console.error(describeFailure(error));
        process.exitCode = 1;
      }
    });

  return program;
}
