/**
 * Error handling for cohort assembly and delivery
 *
 * Every failure carries a stable code and, where known, the pipeline stage
 * and paths involved so the failing step can be reproduced by hand.
 */

/**
 * Pipeline stages used to tag failures
 */
export type Stage = "preflight" | "filter" | "subset" | "merge" | "export" | "manifest" | "transfer";

/**
 * Base error class for all cohort delivery errors
 */
export class CohortError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: Stage,
    public readonly context?: string
  ) {
    super(message);
    this.name = "CohortError";
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.stage !== undefined) {
      msg += ` [stage: ${this.stage}]`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Configuration or option values that fail schema validation
 */
export class ValidationError extends CohortError {
  constructor(message: string, stage?: Stage, context?: string) {
    super(message, "VALIDATION_ERROR", stage, context);
    this.name = "ValidationError";
  }
}

/**
 * File I/O errors with the offending path and operation
 */
export class FileError extends CohortError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "copy" | "remove" | "list" | "mkdir",
    public readonly systemError?: unknown,
    stage?: Stage
  ) {
    super(message, "FILE_ERROR", stage, `Path: ${filePath}`);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space in the working or delivery directory";
    }
    return undefined;
  }
}

/**
 * A batch prefix that does not resolve to a complete .bed/.bim/.fam fileset
 */
export class DatasetNotFoundError extends CohortError {
  constructor(
    public readonly prefix: string,
    public readonly missing: readonly string[]
  ) {
    super(
      `Dataset not found: ${prefix} (missing ${missing.join(", ")})`,
      "DATASET_NOT_FOUND",
      "subset",
      `Prefix: ${prefix}`
    );
    this.name = "DatasetNotFoundError";
  }
}

/**
 * No sample of the keep-list is present in a batch
 */
export class NoSamplesRemainingError extends CohortError {
  constructor(
    public readonly prefix: string,
    public readonly keepList: string
  ) {
    super(
      `No samples from ${keepList} are present in ${prefix}`,
      "NO_SAMPLES_REMAINING",
      "subset",
      `Batch: ${prefix}, keep-list: ${keepList}`
    );
    this.name = "NoSamplesRemainingError";
  }
}

/**
 * The genotype toolkit could not be started or exited with a failure status
 */
export class ToolkitError extends CohortError {
  constructor(
    message: string,
    public readonly args: readonly string[],
    public readonly exitCode?: number,
    public readonly stderr?: string,
    stage?: Stage
  ) {
    super(message, "TOOLKIT_ERROR", stage, `Arguments: ${args.join(" ")}`);
    this.name = "ToolkitError";
  }

  override toString(): string {
    let msg = super.toString();
    if (this.exitCode !== undefined) {
      msg += `\nExit code: ${this.exitCode}`;
    }
    if (this.stderr !== undefined && this.stderr.trim() !== "") {
      msg += `\nStderr: ${this.stderr.trim()}`;
    }
    return msg;
  }
}

/**
 * Interchange-format conversion failed
 */
export class ExportFailedError extends CohortError {
  constructor(
    public readonly prefix: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(
      `VCF export of ${prefix} failed with exit code ${exitCode}`,
      "EXPORT_FAILED",
      "export",
      stderr.trim() !== "" ? stderr.trim() : undefined
    );
    this.name = "ExportFailedError";
  }
}

/**
 * Marker conflicts remained after the single correction round
 */
export class UnresolvedConflictError extends CohortError {
  constructor(
    public readonly outputPrefix: string,
    public readonly residualMarkers: readonly string[]
  ) {
    super(
      `${residualMarkers.length} marker conflict(s) remain after correction for ${outputPrefix}`,
      "UNRESOLVED_CONFLICT",
      "merge",
      `First residual markers: ${residualMarkers.slice(0, 10).join(", ")}`
    );
    this.name = "UnresolvedConflictError";
  }
}

/**
 * Transfer source or destination is unusable, or the sync tool failed
 */
export class TransferError extends CohortError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly destination?: string
  ) {
    super(
      message,
      "TRANSFER_ERROR",
      "transfer",
      destination !== undefined ? `${source} -> ${destination}` : source
    );
    this.name = "TransferError";
  }
}
