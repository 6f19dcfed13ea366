/**
 * Sample subsetting of a single batch
 *
 * Restricts a batch to the samples of the keep-list it actually contains,
 * optionally dropping a set of markers, and materializes the result as a new
 * fileset. The input batch is never modified.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import {
  DatasetNotFoundError,
  type FileError,
  NoSamplesRemainingError,
  type ToolkitError,
  ValidationError,
} from "../errors";
import { isFile, readLines } from "../io/file-reader";
import { writeLines } from "../io/file-writer";
import { type GenotypeToolkit, invokeChecked } from "../toolkit";
import { type Dataset, datasetAt, FILESET_EXTENSIONS, type SampleId } from "../types";

/**
 * Sample identifiers to retain, in keep-list order
 */
export interface KeepList {
  readonly path: string;
  readonly ids: readonly string[];
}

/**
 * Marker identifiers to drop, persisted where the toolkit can read them
 */
export interface MarkerExclusion {
  readonly path: string;
  readonly markers: readonly string[];
}

export type SubsetError =
  | DatasetNotFoundError
  | NoSamplesRemainingError
  | FileError
  | ToolkitError
  | ValidationError;

/**
 * Parse keep-list text: one identifier per line, or a whitespace-delimited
 * pair of which the first token is used
 */
export function parseKeepList(text: string): string[] {
  const ids: string[] = [];
  const seen = new Set<string>();
  for (const line of text.split(/\r?\n/)) {
    const token = line.trim().split(/\s+/)[0];
    if (token !== undefined && token !== "" && !seen.has(token)) {
      seen.add(token);
      ids.push(token);
    }
  }
  return ids;
}

/**
 * Read a keep-list file
 */
export const readKeepList = (path: string): Effect.Effect<KeepList, FileError, FileSystem.FileSystem> =>
  Effect.map(readLines(path), (lines) => ({ path, ids: parseKeepList(lines.join("\n")) }));

/**
 * Confirm that a prefix resolves to a complete fileset
 */
export const resolveDataset = (
  prefix: string
): Effect.Effect<Dataset, DatasetNotFoundError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const missing: string[] = [];
    for (const ext of FILESET_EXTENSIONS) {
      if (!(yield* isFile(`${prefix}${ext}`))) {
        missing.push(ext);
      }
    }
    if (missing.length > 0) {
      return yield* Effect.fail(new DatasetNotFoundError(prefix, missing));
    }
    return datasetAt(prefix);
  });

/**
 * Read the family and individual identifiers of a .fam file
 */
export const readSamples = (
  famPath: string
): Effect.Effect<SampleId[], FileError | ValidationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const lines = yield* readLines(famPath);
    const samples: SampleId[] = [];
    for (const [index, line] of lines.entries()) {
      const [familyId, individualId] = line.split(/\s+/);
      if (familyId === undefined || individualId === undefined) {
        return yield* Effect.fail(
          new ValidationError(
            `Malformed sample row ${index + 1}: expected family and individual identifiers`,
            "subset",
            `File: ${famPath}`
          )
        );
      }
      samples.push({ familyId, individualId });
    }
    return samples;
  });

/**
 * Narrow a keep-list to the samples present in every batch
 *
 * Keep-list order is kept. Fails on the first batch that leaves no sample.
 */
export const intersectKeepList = (
  batchPrefixes: readonly string[],
  keepList: KeepList
): Effect.Effect<
  KeepList,
  NoSamplesRemainingError | FileError | ValidationError,
  FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    let ids = keepList.ids;
    for (const prefix of batchPrefixes) {
      const present = new Set((yield* readSamples(datasetAt(prefix).fam)).map((sample) => sample.individualId));
      ids = ids.filter((id) => present.has(id));
      if (ids.length === 0) {
        return yield* Effect.fail(new NoSamplesRemainingError(prefix, keepList.path));
      }
    }
    if (ids.length < keepList.ids.length) {
      yield* Effect.logInfo(
        `${keepList.ids.length - ids.length} keep-list sample(s) are missing from at least one batch`
      );
    }
    return { path: keepList.path, ids };
  });

/**
 * Subset one batch to the keep-list, optionally excluding markers
 *
 * @param batchPrefix - Fileset prefix of the source batch
 * @param keepList - Samples to retain
 * @param outputPrefix - Where the new fileset is written
 * @param exclusion - Markers to drop; omitted or empty drops none
 * @returns The materialized subset
 */
export const subsetBatch = (
  batchPrefix: string,
  keepList: KeepList,
  outputPrefix: string,
  exclusion?: MarkerExclusion
): Effect.Effect<Dataset, SubsetError, FileSystem.FileSystem | GenotypeToolkit> =>
  Effect.gen(function* () {
    const batch = yield* resolveDataset(batchPrefix);
    const wanted = new Set(keepList.ids);
    const retained = (yield* readSamples(batch.fam)).filter((sample) => wanted.has(sample.individualId));

    if (retained.length === 0) {
      return yield* Effect.fail(new NoSamplesRemainingError(batchPrefix, keepList.path));
    }

    // The toolkit matches on the full family/individual pair
    const keepPath = `${outputPrefix}.keep`;
    yield* writeLines(
      keepPath,
      retained.map((sample) => `${sample.familyId} ${sample.individualId}`)
    );

    const args = ["--bfile", batch.prefix, "--keep", keepPath];
    if (exclusion !== undefined && exclusion.markers.length > 0) {
      args.push("--exclude", exclusion.path);
    }
    args.push("--make-bed", "--out", outputPrefix);

    yield* invokeChecked(args, "subset");
    yield* Effect.logDebug(`Retained ${retained.length} sample(s) from ${batchPrefix}`);
    return datasetAt(outputPrefix);
  }).pipe(Effect.annotateLogs({ stage: "subset", batch: batchPrefix }));

/**
 * Subset every batch with the same keep-list and exclusion
 *
 * Each subset writes to its own prefix, so the steps may run concurrently;
 * all of them finish before the returned effect completes.
 *
 * @param prefixFor - Output prefix for the batch at an index
 */
export const subsetBatches = (
  batchPrefixes: readonly string[],
  keepList: KeepList,
  prefixFor: (index: number, batchPrefix: string) => string,
  options: { readonly exclusion?: MarkerExclusion; readonly concurrent?: boolean } = {}
): Effect.Effect<Dataset[], SubsetError, FileSystem.FileSystem | GenotypeToolkit> =>
  Effect.forEach(
    batchPrefixes,
    (batchPrefix, index) => subsetBatch(batchPrefix, keepList, prefixFor(index, batchPrefix), options.exclusion),
    { concurrency: options.concurrent === true ? "unbounded" : 1 }
  );
