/**
 * Core type definitions and option schemas for cohort delivery
 *
 * Option objects are validated with ArkType after defaults are merged, so a
 * bad value is reported once, with every problem in the summary.
 */

import { type } from "arktype";

/**
 * A binary genotype fileset addressed by its storage prefix
 */
export interface Dataset {
  /** Prefix shared by the three member files */
  readonly prefix: string;
  readonly bed: string;
  readonly bim: string;
  readonly fam: string;
}

/**
 * Extensions that make up a complete genotype fileset
 */
export const FILESET_EXTENSIONS = [".bed", ".bim", ".fam"] as const;

/**
 * Resolve the member files of a fileset prefix
 */
export function datasetAt(prefix: string): Dataset {
  return {
    prefix,
    bed: `${prefix}.bed`,
    bim: `${prefix}.bim`,
    fam: `${prefix}.fam`,
  };
}

/**
 * One sample row of a .fam file
 */
export interface SampleId {
  readonly familyId: string;
  readonly individualId: string;
}

/**
 * Counts read back from a persisted fileset
 */
export interface DatasetCounts {
  readonly sampleCount: number;
  readonly markerCount: number;
}

/**
 * Outcome of a single merge run
 *
 * - `clean`: the first attempt merged without conflicts
 * - `corrected`: conflicting markers were excluded and the re-merge succeeded
 * - `failed-conflict`: conflicts remained after the correction round
 * - `single-batch`: fewer than two batches, nothing to merge
 */
export type MergeStatus = "clean" | "corrected" | "failed-conflict" | "single-batch";

/**
 * Final record of a merge run
 */
export interface MergeReport {
  readonly batchCount: number;
  /** Distinct markers reported by the first merge attempt */
  readonly conflictMarkerCount: number;
  readonly correctionApplied: boolean;
  readonly finalSampleCount: number;
  readonly finalMarkerCount: number;
  readonly outputPrefix: string;
  readonly status: MergeStatus;
  /** Distinct markers still conflicting after correction (0 unless failed) */
  readonly residualConflictCount: number;
  readonly residualMarkers: readonly string[];
  /** Path of the compressed VCF, or null when export was skipped */
  readonly exportPath: string | null;
}

/**
 * Summary of a cohort filtering run
 */
export interface FilterReport {
  readonly originalCount: number;
  readonly exclusionCount: number;
  readonly finalCount: number;
  readonly removedCount: number;
  /** Reason label -> number of cohort samples removed for it */
  readonly exclusionReasons: Readonly<Record<string, number>>;
}

/**
 * Checksums of a single delivered file
 */
export interface FileChecksum {
  readonly filename: string;
  readonly fileSize: number;
  readonly md5: string;
  readonly sha256: string;
}

/**
 * Checksum manifest of a delivery directory
 */
export interface DeliveryManifest {
  readonly projectId: string;
  /** YYYY-MM-DD */
  readonly deliveryDate: string;
  readonly files: readonly FileChecksum[];
  readonly totalFiles: number;
  readonly totalSizeBytes: number;
}

export type TransferMethod = "copy" | "sync";

/**
 * Summary of a transfer to the staging area
 */
export interface TransferReport {
  readonly sourceDir: string;
  readonly destinationDir: string;
  readonly method: TransferMethod;
  readonly fileCount: number;
  readonly totalBytes: number;
  readonly verified: boolean;
  /** Manifest entries whose destination checksum differs or is missing */
  readonly checksumMismatches: readonly string[];
}

// =============================================================================
// OPTION SCHEMAS
// =============================================================================

export const TransferMethodSchema = type("'copy' | 'sync'");

/**
 * Options accepted by the merge core
 */
export const MergeOptionsSchema = type({
  batchPrefixes: "string[]",
  keepList: "string>0",
  outputPrefix: "string>0",
  workDir: "string>0",
  exportVcf: "boolean",
  keepIntermediates: "boolean",
  parallelSubsets: "boolean",
});

export type MergeOptions = typeof MergeOptionsSchema.infer;

/**
 * Merge options as callers supply them; unset flags take defaults
 */
export type MergeOptionsInput = Pick<MergeOptions, "batchPrefixes" | "keepList" | "outputPrefix"> &
  Partial<Omit<MergeOptions, "batchPrefixes" | "keepList" | "outputPrefix">>;

/**
 * Layout of an exclusion list file
 */
export const ExclusionFormatSchema = type({
  idColumn: "number.integer>=0",
  "reasonColumn?": "number.integer>=0",
  hasHeader: "boolean",
  delimiter: "string==1",
});

export type ExclusionFormat = typeof ExclusionFormatSchema.infer;

/**
 * End-to-end delivery run configuration
 */
export const PipelineConfigSchema = type({
  projectId: "/^[A-Za-z0-9][A-Za-z0-9_.-]*$/",
  cohortFile: "string>0",
  exclusionFiles: "string[]",
  batchPrefixes: "string[]",
  workDir: "string>0",
  deliveryDir: "string>0",
  stagingRoot: "string>0",
  toolkitExecutable: "string>0",
  exportVcf: "boolean",
  transferMethod: TransferMethodSchema,
  keepIntermediates: "boolean",
  parallelSubsets: "boolean",
});

export type PipelineConfig = typeof PipelineConfigSchema.infer;

/**
 * Pipeline configuration as callers supply it; unset fields take defaults
 */
export type PipelineConfigInput = Pick<PipelineConfig, "projectId" | "cohortFile"> &
  Partial<Omit<PipelineConfig, "projectId" | "cohortFile">>;
