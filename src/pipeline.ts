/**
 * End-to-end cohort delivery
 *
 *   1. Filter the cohort (remove exclusions)
 *   2. Subset and merge genotypes across batches
 *   3. Generate a delivery manifest with checksums
 *   4. Transfer the package to the researcher staging area
 *
 * Inputs are checked before any step runs; the first hard failure stops the
 * run and names its stage.
 */

import type { CommandExecutor, FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect, Layer } from "effect";
import {
  FileError,
  TransferError,
  UnresolvedConflictError,
  ValidationError,
} from "./errors";
import { isFile } from "./io/file-reader";
import { ensureDirectory } from "./io/file-writer";
import { getPlatform, runToPromise } from "./io/runtime";
import { type MergeGenotypesError, mergeGenotypes } from "./operations/cohort-merge";
import { filterCohort } from "./operations/filter";
import {
  generateManifest,
  MANIFEST_FILENAME,
  STATUS_SUMMARY_FILENAME,
  writeManifest,
  writeStatusSummary,
} from "./operations/manifest";
import { resolveDataset } from "./operations/subset";
import { transferDelivery } from "./operations/transfer";
import { GenotypeToolkit } from "./toolkit";
import type {
  DeliveryManifest,
  FilterReport,
  MergeOptionsInput,
  MergeReport,
  PipelineConfig,
  PipelineConfigInput,
  TransferReport,
} from "./types";
import { PipelineConfigSchema } from "./types";

export const DEFAULT_PIPELINE_CONFIG: Omit<PipelineConfig, "projectId" | "cohortFile"> = {
  exclusionFiles: [],
  batchPrefixes: [],
  workDir: "work",
  deliveryDir: "delivery",
  stagingRoot: "staging",
  toolkitExecutable: "plink",
  exportVcf: true,
  transferMethod: "sync",
  keepIntermediates: false,
  parallelSubsets: false,
};

/**
 * Aggregated output of a delivery run
 */
export interface PipelineResult {
  readonly filterReport: FilterReport;
  /** Null when no batches were configured */
  readonly mergeReport: MergeReport | null;
  readonly manifest: DeliveryManifest;
  readonly transferReport: TransferReport;
}

export type PipelineError = MergeGenotypesError | TransferError | UnresolvedConflictError;

export type PipelineServices =
  | FileSystem.FileSystem
  | Path.Path
  | CommandExecutor.CommandExecutor
  | GenotypeToolkit;

/**
 * Merge a configuration with defaults and validate it
 */
export function resolvePipelineConfig(
  input: PipelineConfigInput
): Effect.Effect<PipelineConfig, ValidationError> {
  const result = PipelineConfigSchema({ ...DEFAULT_PIPELINE_CONFIG, ...input });
  if (result instanceof type.errors) {
    return Effect.fail(new ValidationError(`Invalid pipeline configuration: ${result.summary}`, "preflight"));
  }
  return Effect.succeed(result);
}

/**
 * Check every input before any step runs
 */
const preflight = (config: PipelineConfig) =>
  Effect.gen(function* () {
    if (!(yield* isFile(config.cohortFile))) {
      return yield* Effect.fail(
        new FileError(
          `Cohort file not found: ${config.cohortFile}`,
          config.cohortFile,
          "stat",
          undefined,
          "preflight"
        )
      );
    }
    for (const path of config.exclusionFiles) {
      if (!(yield* isFile(path))) {
        return yield* Effect.fail(
          new FileError(`Exclusion file not found: ${path}`, path, "stat", undefined, "preflight")
        );
      }
    }
    yield* Effect.forEach(config.batchPrefixes, resolveDataset, { discard: true });
    if (yield* isFile(config.stagingRoot)) {
      return yield* Effect.fail(
        new TransferError(
          `Staging root is not a directory: ${config.stagingRoot}`,
          config.deliveryDir,
          config.stagingRoot
        )
      );
    }
  });

/**
 * The delivery pipeline as an Effect program
 *
 * @param now - Date stamped on the manifest and the staging directory
 */
export const deliveryPipeline = (
  input: PipelineConfigInput,
  now: Date = new Date()
): Effect.Effect<PipelineResult, PipelineError, PipelineServices> =>
  Effect.gen(function* () {
    const config = yield* resolvePipelineConfig(input);
    yield* preflight(config);
    yield* ensureDirectory(config.workDir);
    yield* ensureDirectory(config.deliveryDir);

    yield* Effect.logInfo(`Step 1: Filtering cohort for project ${config.projectId}`);
    const filteredPath = `${config.workDir}/cohort_filtered.txt`;
    const filterReport = yield* filterCohort({
      cohortPath: config.cohortFile,
      exclusionPaths: config.exclusionFiles,
      outputPath: filteredPath,
    });
    yield* Effect.logInfo(`Filtered: ${filterReport.originalCount} -> ${filterReport.finalCount} samples`);

    let mergeReport: MergeReport | null = null;
    if (config.batchPrefixes.length > 0) {
      yield* Effect.logInfo(`Step 2: Merging ${config.batchPrefixes.length} batches`);
      mergeReport = yield* mergeGenotypes({
        batchPrefixes: config.batchPrefixes,
        keepList: filteredPath,
        outputPrefix: `${config.deliveryDir}/${config.projectId}_final_genotypes`,
        workDir: config.workDir,
        exportVcf: config.exportVcf,
        keepIntermediates: config.keepIntermediates,
        parallelSubsets: config.parallelSubsets,
      });
      if (mergeReport.status === "failed-conflict") {
        return yield* Effect.fail(
          new UnresolvedConflictError(mergeReport.outputPrefix, mergeReport.residualMarkers)
        );
      }
    }

    yield* Effect.logInfo("Step 3: Generating delivery manifest");
    const manifest = yield* generateManifest(config.deliveryDir, config.projectId, undefined, now);
    yield* writeManifest(manifest, `${config.deliveryDir}/${MANIFEST_FILENAME}`);
    yield* writeStatusSummary(manifest, `${config.deliveryDir}/${STATUS_SUMMARY_FILENAME}`);

    yield* Effect.logInfo("Step 4: Secure transfer");
    const transferReport = yield* transferDelivery({
      sourceDir: config.deliveryDir,
      destRoot: config.stagingRoot,
      projectId: config.projectId,
      method: config.transferMethod,
      manifest,
      now,
    });
    yield* Effect.logInfo(
      `Transfer complete: ${transferReport.fileCount} files, verified=${transferReport.verified}`
    );

    return { filterReport, mergeReport, manifest, transferReport };
  }).pipe(Effect.annotateLogs({ project: input.projectId }), Effect.withLogSpan("delivery"));

/**
 * Platform plus a toolkit backed by `executable`
 */
export function liveLayer(executable: string) {
  return Layer.merge(getPlatform(), GenotypeToolkit.layer(executable).pipe(Layer.provide(getPlatform())));
}

/**
 * Run the delivery pipeline against the real toolkit
 *
 * @example
 * ```typescript
 * const result = await runDeliveryPipeline({
 *   projectId: "PRJ001",
 *   cohortFile: "cohort_all.txt",
 *   exclusionFiles: ["exclusions.csv"],
 *   batchPrefixes: ["batch_01", "batch_02"],
 * });
 * ```
 */
export async function runDeliveryPipeline(input: PipelineConfigInput): Promise<PipelineResult> {
  const executable = input.toolkitExecutable ?? DEFAULT_PIPELINE_CONFIG.toolkitExecutable;
  return runToPromise(deliveryPipeline(input).pipe(Effect.provide(liveLayer(executable))));
}

/**
 * Run only the merge against the real toolkit
 */
export async function runMerge(input: MergeOptionsInput, executable = "plink"): Promise<MergeReport> {
  return runToPromise(mergeGenotypes(input).pipe(Effect.provide(liveLayer(executable))));
}
