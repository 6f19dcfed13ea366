/**
 * Conversion of a merged fileset to block-gzipped VCF
 */

import { Effect } from "effect";
import { ExportFailedError, type ToolkitError } from "../errors";
import { type GenotypeToolkit, invoke } from "../toolkit";
import type { Dataset } from "../types";

export const VCF_EXTENSION = ".vcf.gz";

/**
 * Path of the VCF written for a fileset prefix
 */
export function vcfPath(prefix: string): string {
  return `${prefix}${VCF_EXTENSION}`;
}

/**
 * Export a dataset as `<prefix>.vcf.gz`
 *
 * Overwrites an earlier export of the same dataset.
 *
 * @returns Path of the compressed VCF
 */
export const exportVcf = (
  dataset: Dataset
): Effect.Effect<string, ExportFailedError | ToolkitError, GenotypeToolkit> =>
  Effect.gen(function* () {
    const result = yield* invoke(["--bfile", dataset.prefix, "--recode", "vcf", "bgz", "--out", dataset.prefix]);
    if (result.exitCode !== 0) {
      return yield* Effect.fail(new ExportFailedError(dataset.prefix, result.exitCode, result.stderr));
    }
    yield* Effect.logInfo(`Exported ${vcfPath(dataset.prefix)}`);
    return vcfPath(dataset.prefix);
  }).pipe(Effect.annotateLogs({ stage: "export", prefix: dataset.prefix }));
