/**
 * Bounded conflict correction
 *
 * A merge run moves through at most two attempts:
 *
 * ```
 * Attempting(initial) --Merged-->   Corrected(correctionApplied: false)
 * Attempting(initial) --Conflict--> Attempting(correction, exclusions)
 * Attempting(correction) --Merged-->   Corrected(correctionApplied: true)
 * Attempting(correction) --Conflict--> FailedConflict
 * ```
 *
 * The transition out of the correction round only produces terminal
 * states, so a second correction round cannot be expressed.
 */

import type { FileSystem } from "@effect/platform";
import { Data, Effect } from "effect";
import type { FileError, ToolkitError, ValidationError } from "../errors";
import { copyFileset, writeLines } from "../io/file-writer";
import type { Workspace } from "../io/workspace";
import type { GenotypeToolkit } from "../toolkit";
import { type Dataset, datasetAt } from "../types";
import { MergeAttempt, mergeDatasets } from "./merge";
import { type KeepList, type SubsetError, subsetBatches } from "./subset";

export type CorrectionState = Data.TaggedEnum<{
  Attempting: {
    readonly round: "initial" | "correction";
    /** Markers excluded from every batch in this round */
    readonly exclusions: readonly string[];
  };
  Corrected: {
    readonly dataset: Dataset;
    /** Markers the first attempt reported; empty for a clean merge */
    readonly conflicts: readonly string[];
    readonly correctionApplied: boolean;
  };
  FailedConflict: {
    readonly conflicts: readonly string[];
    /** Markers still conflicting after the exclusions were applied */
    readonly residual: readonly string[];
  };
}>;

export const CorrectionState = Data.taggedEnum<CorrectionState>();

export type Attempting = Data.TaggedEnum.Value<CorrectionState, "Attempting">;
export type Corrected = Data.TaggedEnum.Value<CorrectionState, "Corrected">;
export type TerminalState = Data.TaggedEnum.Value<CorrectionState, "Corrected" | "FailedConflict">;

export const initialState: Attempting = CorrectionState.Attempting({ round: "initial", exclusions: [] });

/**
 * Transition after the first merge attempt
 */
export function afterInitialAttempt(state: Attempting, attempt: MergeAttempt): Corrected | Attempting {
  return MergeAttempt.$match(attempt, {
    Merged: ({ dataset }): Corrected | Attempting =>
      CorrectionState.Corrected({ dataset, conflicts: state.exclusions, correctionApplied: false }),
    Conflict: ({ markers }): Corrected | Attempting =>
      CorrectionState.Attempting({ round: "correction", exclusions: markers }),
  });
}

/**
 * Transition after the correction attempt; always terminal
 */
export function afterCorrectionAttempt(state: Attempting, attempt: MergeAttempt): TerminalState {
  return MergeAttempt.$match(attempt, {
    Merged: ({ dataset }): TerminalState =>
      CorrectionState.Corrected({ dataset, conflicts: state.exclusions, correctionApplied: true }),
    Conflict: ({ markers }): TerminalState =>
      CorrectionState.FailedConflict({ conflicts: state.exclusions, residual: markers }),
  });
}

/**
 * Inputs of a correction run
 */
export interface CorrectionInput {
  readonly batchPrefixes: readonly string[];
  readonly keepList: KeepList;
  /** Subsets produced without exclusions, in batch order */
  readonly subsets: readonly Dataset[];
  readonly workspace: Workspace;
  readonly outputPrefix: string;
  readonly concurrent: boolean;
}

export type CorrectionError = SubsetError | FileError | ToolkitError | ValidationError;

const PROMOTED_EXTENSIONS = [".bed", ".bim", ".fam", ".log"] as const;

/**
 * Output prefix of a batch's subset inside the workspace
 */
export function subsetPrefix(
  workspace: Workspace,
  index: number,
  batchPrefix: string,
  kind: "subset" | "corrected"
): string {
  const name = batchPrefix.split(/[\\/]/).pop() ?? batchPrefix;
  return workspace.path(`${String(index + 1).padStart(2, "0")}_${name}_${kind}`);
}

/**
 * Copy a merged fileset to the final output prefix
 */
const promote = (
  dataset: Dataset,
  outputPrefix: string
): Effect.Effect<Dataset, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (dataset.prefix !== outputPrefix) {
      yield* copyFileset(dataset.prefix, outputPrefix, PROMOTED_EXTENSIONS);
      yield* Effect.logDebug(`Promoted ${dataset.prefix} to ${outputPrefix}`);
    }
    return datasetAt(outputPrefix);
  });

/**
 * Merge the subsets, correcting marker conflicts at most once
 *
 * @returns The terminal state; `Corrected.dataset` sits at the output prefix
 */
export const resolveMerge = (
  input: CorrectionInput
): Effect.Effect<TerminalState, CorrectionError, FileSystem.FileSystem | GenotypeToolkit> =>
  Effect.gen(function* () {
    const { workspace, outputPrefix } = input;

    const firstAttempt = yield* mergeDatasets(input.subsets, workspace.path("merge_attempt"));
    const afterFirst = afterInitialAttempt(initialState, firstAttempt);

    if (afterFirst._tag === "Corrected") {
      const dataset = yield* promote(afterFirst.dataset, outputPrefix);
      return CorrectionState.Corrected({
        dataset,
        conflicts: afterFirst.conflicts,
        correctionApplied: afterFirst.correctionApplied,
      });
    }

    yield* Effect.logInfo(
      `Detected ${afterFirst.exclusions.length} conflicting marker(s); re-subsetting with exclusions`
    );

    const exclusion = { path: workspace.path("conflicts.exclude"), markers: afterFirst.exclusions };
    yield* writeLines(exclusion.path, exclusion.markers);

    const corrected = yield* subsetBatches(
      input.batchPrefixes,
      input.keepList,
      (index, batchPrefix) => subsetPrefix(workspace, index, batchPrefix, "corrected"),
      { exclusion, concurrent: input.concurrent }
    );

    const secondAttempt = yield* mergeDatasets(
      corrected,
      outputPrefix,
      workspace.path("merge_list_corrected")
    );
    const terminal = afterCorrectionAttempt(afterFirst, secondAttempt);

    if (terminal._tag === "FailedConflict") {
      yield* Effect.logWarning(
        `${terminal.residual.length} marker conflict(s) remain after correction; not retrying`
      );
    }
    return terminal;
  }).pipe(Effect.annotateLogs({ stage: "merge" }));
