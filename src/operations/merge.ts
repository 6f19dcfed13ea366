/**
 * Dataset merging with a base + append-list protocol
 *
 * The first dataset is the structural base; the rest are named in a merge
 * list file and appended to it. A marker conflict is an expected outcome
 * and comes back as a `Conflict` value, not as a failure.
 */

import type { FileSystem } from "@effect/platform";
import { Data, Effect } from "effect";
import { type FileError, ToolkitError, ValidationError } from "../errors";
import { writeLines, removeIfExists } from "../io/file-writer";
import { type GenotypeToolkit, invoke } from "../toolkit";
import { type Dataset, datasetAt } from "../types";
import { conflictFilePath, detectConflicts } from "./conflicts";

/**
 * Result of one merge operation
 */
export type MergeAttempt = Data.TaggedEnum<{
  /** All inputs merged into `dataset` */
  Merged: { readonly dataset: Dataset };
  /** The inputs disagree on `markers`; nothing was written at the target */
  Conflict: { readonly markers: readonly string[]; readonly attemptPrefix: string };
}>;

export const MergeAttempt = Data.taggedEnum<MergeAttempt>();

/**
 * Path of the append list written for a merge target
 */
export function mergeListPath(targetPrefix: string): string {
  return `${targetPrefix}.merge-list`;
}

/**
 * Merge datasets into `targetPrefix`
 *
 * With fewer than two inputs there is nothing to merge and the single input
 * is returned as is. A nonzero exit status without a conflict list is a
 * hard failure.
 *
 * @param datasets - Inputs; the first is the base
 * @param targetPrefix - Output fileset prefix of the merge
 * @param listPath - Where to write the append list; defaults beside the target
 */
export const mergeDatasets = (
  datasets: readonly Dataset[],
  targetPrefix: string,
  listPath: string = mergeListPath(targetPrefix)
): Effect.Effect<
  MergeAttempt,
  FileError | ToolkitError | ValidationError,
  FileSystem.FileSystem | GenotypeToolkit
> =>
  Effect.gen(function* () {
    const [base, ...rest] = datasets;
    if (base === undefined) {
      return yield* Effect.fail(new ValidationError("No datasets to merge", "merge"));
    }
    if (rest.length === 0) {
      yield* Effect.logWarning("Fewer than 2 datasets; skipping merge");
      return MergeAttempt.Merged({ dataset: base });
    }

    // A conflict list from an earlier run at the same target must not be read as ours
    yield* removeIfExists(conflictFilePath(targetPrefix));

    yield* writeLines(
      listPath,
      rest.map((dataset) => dataset.prefix)
    );

    const args = ["--bfile", base.prefix, "--merge-list", listPath, "--make-bed", "--out", targetPrefix];
    const result = yield* invoke(args);
    const markers = yield* detectConflicts(targetPrefix);

    if (markers.length > 0) {
      yield* Effect.logInfo(`Merge into ${targetPrefix} reported ${markers.length} conflicting marker(s)`);
      return MergeAttempt.Conflict({ markers, attemptPrefix: targetPrefix });
    }
    if (result.exitCode !== 0) {
      return yield* Effect.fail(
        new ToolkitError(
          `Merge exited with status ${result.exitCode} without reporting conflicts`,
          args,
          result.exitCode,
          result.stderr,
          "merge"
        )
      );
    }
    return MergeAttempt.Merged({ dataset: datasetAt(targetPrefix) });
  }).pipe(Effect.annotateLogs({ stage: "merge", target: targetPrefix }));
