/**
 * cohort-delivery - assemble, merge and deliver genotyped research cohorts
 *
 * Subsets genotype batches to an approved cohort, merges them with automatic
 * strand-conflict correction, exports VCF, and packages the result with a
 * checksum manifest for transfer to a researcher staging area.
 */

// Error types
export {
  CohortError,
  DatasetNotFoundError,
  ExportFailedError,
  FileError,
  NoSamplesRemainingError,
  type Stage,
  ToolkitError,
  TransferError,
  UnresolvedConflictError,
  ValidationError,
} from "./errors";
// File I/O
export { countRecords, isDirectory, isFile, listRegularFiles, readLines, readText } from "./io/file-reader";
export { copyFile, copyFileset, ensureDirectory, removeFileset, removeIfExists, writeLines } from "./io/file-writer";
export { getPlatform, runToPromise } from "./io/runtime";
export { openWorkspace, type Workspace } from "./io/workspace";
// Merge core
export { type MergeGenotypesError, mergeGenotypes, mergeOptions } from "./operations/cohort-merge";
export { CONFLICT_FILE_SUFFIX, conflictFilePath, detectConflicts, parseConflictList } from "./operations/conflicts";
export {
  afterCorrectionAttempt,
  afterInitialAttempt,
  CorrectionState,
  initialState,
  resolveMerge,
} from "./operations/correction";
export { exportVcf, VCF_EXTENSION, vcfPath } from "./operations/export";
export { MergeAttempt, mergeDatasets } from "./operations/merge";
export { buildMergeReport, countDataset, mergeStatus } from "./operations/report";
export {
  intersectKeepList,
  type KeepList,
  type MarkerExclusion,
  parseKeepList,
  readKeepList,
  resolveDataset,
  subsetBatch,
  subsetBatches,
} from "./operations/subset";
// Delivery collaborators
export {
  DEFAULT_EXCLUSION_FORMAT,
  type FilterOptions,
  filterCohort,
  loadExclusionReasons,
  loadExclusionSet,
} from "./operations/filter";
export {
  computeChecksums,
  generateManifest,
  MANIFEST_FILENAME,
  STATUS_SUMMARY_FILENAME,
  writeManifest,
  writeStatusSummary,
} from "./operations/manifest";
export {
  deliveryDirectoryName,
  type TransferOptions,
  transferDelivery,
  verifyTransfer,
} from "./operations/transfer";
// Orchestration
export {
  DEFAULT_PIPELINE_CONFIG,
  deliveryPipeline,
  liveLayer,
  type PipelineResult,
  resolvePipelineConfig,
  runDeliveryPipeline,
  runMerge,
} from "./pipeline";
// External toolkit
export { GenotypeToolkit, type GenotypeToolkitShape, type ToolkitRun } from "./toolkit";
// Core types
export type {
  Dataset,
  DatasetCounts,
  DeliveryManifest,
  ExclusionFormat,
  FileChecksum,
  FilterReport,
  MergeOptions,
  MergeOptionsInput,
  MergeReport,
  MergeStatus,
  PipelineConfig,
  PipelineConfigInput,
  TransferMethod,
  TransferReport,
} from "./types";
export { datasetAt, FILESET_EXTENSIONS } from "./types";
