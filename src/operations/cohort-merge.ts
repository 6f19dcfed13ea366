/**
 * Multi-batch genotype merge with automatic conflict correction
 *
 * 1. Subset every batch to the keep-list.
 * 2. Merge the subsets, the first batch serving as the base.
 * 3. If markers conflict, exclude them from every batch and merge once more.
 * 4. Count what was written and optionally export VCF.
 *
 * Intermediate files live in a scoped workspace below `workDir` that is
 * removed however the run ends.
 */

import { type FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { type ExportFailedError, type FileError, type ToolkitError, ValidationError } from "../errors";
import { ensureDirectory, removeFileset } from "../io/file-writer";
import { openWorkspace } from "../io/workspace";
import type { GenotypeToolkit } from "../toolkit";
import {
  datasetAt,
  FILESET_EXTENSIONS,
  type MergeOptions,
  type MergeOptionsInput,
  MergeOptionsSchema,
  type MergeReport,
} from "../types";
import { type CorrectionError, resolveMerge, subsetPrefix } from "./correction";
import { exportVcf, VCF_EXTENSION } from "./export";
import { buildMergeReport, countDataset } from "./report";
import { intersectKeepList, readKeepList, resolveDataset, subsetBatches } from "./subset";

const DEFAULT_MERGE_OPTIONS = {
  workDir: "work",
  exportVcf: true,
  keepIntermediates: false,
  parallelSubsets: false,
} as const;

/**
 * Files a run may leave at the output prefix
 */
const OUTPUT_EXTENSIONS = [...FILESET_EXTENSIONS, ".log", VCF_EXTENSION] as const;

export type MergeGenotypesError =
  | CorrectionError
  | ExportFailedError
  | FileError
  | ToolkitError
  | ValidationError;

/**
 * Merge caller options with defaults and validate them
 */
export function mergeOptions(input: MergeOptionsInput): Effect.Effect<MergeOptions, ValidationError> {
  const result = MergeOptionsSchema({ ...DEFAULT_MERGE_OPTIONS, ...input });
  if (result instanceof type.errors) {
    return Effect.fail(new ValidationError(`Invalid merge options: ${result.summary}`, "merge"));
  }
  if (result.batchPrefixes.length === 0) {
    return Effect.fail(new ValidationError("At least one batch prefix is required", "merge"));
  }
  if (result.batchPrefixes.includes(result.outputPrefix)) {
    return Effect.fail(
      new ValidationError("Output prefix must differ from every batch prefix", "merge", `Output: ${result.outputPrefix}`)
    );
  }
  return Effect.succeed(result);
}

/**
 * Run the full merge and return its report
 *
 * A run whose conflicts survive correction still returns a report, with
 * status `failed-conflict`; deciding whether that is fatal is up to the
 * caller.
 *
 * @example
 * ```typescript
 * const report = yield* mergeGenotypes({
 *   batchPrefixes: ["batches/batch_01", "batches/batch_02"],
 *   keepList: "work/cohort_filtered.txt",
 *   outputPrefix: "delivery/PRJ001_final_genotypes",
 * });
 * ```
 */
export const mergeGenotypes = (
  input: MergeOptionsInput
): Effect.Effect<MergeReport, MergeGenotypesError, FileSystem.FileSystem | Path.Path | GenotypeToolkit> =>
  Effect.scoped(
    Effect.gen(function* () {
      const options = yield* mergeOptions(input);
      const path = yield* Path.Path;

      // Inputs are checked before any toolkit process starts
      yield* Effect.forEach(options.batchPrefixes, resolveDataset, { discard: true });
      // Only samples present in every batch may reach the merged output
      const keepList = yield* intersectKeepList(options.batchPrefixes, yield* readKeepList(options.keepList));
      yield* ensureDirectory(path.dirname(options.outputPrefix));
      // Counts must describe this run's output, never an earlier one's
      yield* removeFileset(options.outputPrefix, OUTPUT_EXTENSIONS);

      const workspace = yield* openWorkspace(options.workDir, options.keepIntermediates);
      const batchCount = options.batchPrefixes.length;
      yield* Effect.logInfo(`Subsetting ${batchCount} batch(es) to ${keepList.ids.length} kept sample(s)`);

      const subsets = yield* subsetBatches(
        options.batchPrefixes,
        keepList,
        (index, batchPrefix) => subsetPrefix(workspace, index, batchPrefix, "subset"),
        { concurrent: options.parallelSubsets }
      );

      const state = yield* resolveMerge({
        batchPrefixes: options.batchPrefixes,
        keepList,
        subsets,
        workspace,
        outputPrefix: options.outputPrefix,
        concurrent: options.parallelSubsets,
      });

      const counts = yield* countDataset(datasetAt(options.outputPrefix));
      const exportPath =
        state._tag === "Corrected" && options.exportVcf ? yield* exportVcf(state.dataset) : null;

      const report = buildMergeReport(batchCount, options.outputPrefix, state, counts, exportPath);
      yield* Effect.logInfo(
        `Merge ${report.status}: ${report.finalSampleCount} samples, ${report.finalMarkerCount} markers, ${report.conflictMarkerCount} conflicts excluded`
      );
      return report;
    })
  ).pipe(Effect.withLogSpan("merge"));
