/**
 * Merge report assembly
 *
 * Counts come from the files a stage persisted, not from what the stage
 * meant to write, so truncated output shows up in the report.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { countRecords } from "../io/file-reader";
import type { Dataset, DatasetCounts, MergeReport, MergeStatus } from "../types";
import type { TerminalState } from "./correction";

/**
 * Count samples (.fam rows) and markers (.bim rows) of a persisted fileset
 */
export const countDataset = (
  dataset: Dataset
): Effect.Effect<DatasetCounts, FileError, FileSystem.FileSystem> =>
  Effect.all({
    sampleCount: countRecords(dataset.fam),
    markerCount: countRecords(dataset.bim),
  });

/**
 * Status of a finished merge
 */
export function mergeStatus(batchCount: number, state: TerminalState): MergeStatus {
  if (state._tag === "FailedConflict") return "failed-conflict";
  if (batchCount < 2) return "single-batch";
  return state.correctionApplied ? "corrected" : "clean";
}

/**
 * Build the merge report from the terminal state and the persisted output
 */
export function buildMergeReport(
  batchCount: number,
  outputPrefix: string,
  state: TerminalState,
  counts: DatasetCounts,
  exportPath: string | null
): MergeReport {
  return {
    batchCount,
    conflictMarkerCount: state.conflicts.length,
    correctionApplied: state._tag === "FailedConflict" || state.correctionApplied,
    finalSampleCount: counts.sampleCount,
    finalMarkerCount: counts.markerCount,
    outputPrefix,
    status: mergeStatus(batchCount, state),
    residualConflictCount: state._tag === "FailedConflict" ? state.residual.length : 0,
    residualMarkers: state._tag === "FailedConflict" ? state.residual : [],
    exportPath,
  };
}
