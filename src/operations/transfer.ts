/**
 * Transfer of a delivery package to the researcher staging area
 *
 * Packages land in `<root>/<project>_Delivery_<YYYYMMDD>/`, either copied
 * file by file or synced with rsync under fixed permissions. The result is
 * verified afterwards; a failed verification is reported, not raised.
 */

import { Command, type CommandExecutor, type FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError, TransferError } from "../errors";
import { isDirectory, isFile, listRegularFiles } from "../io/file-reader";
import { copyFile, ensureDirectory } from "../io/file-writer";
import type { DeliveryManifest, TransferMethod, TransferReport } from "../types";
import { computeChecksums } from "./manifest";

export const DEFAULT_CHMOD_DIRS = "Du=rwx,Dgo=rx";
export const DEFAULT_CHMOD_FILES = "Fu=rw,Fgo=r";

/**
 * Options of a transfer
 */
export interface TransferOptions {
  readonly sourceDir: string;
  /** Root of the staging area */
  readonly destRoot: string;
  readonly projectId: string;
  readonly method?: TransferMethod;
  readonly chmodDirs?: string;
  readonly chmodFiles?: string;
  /** When given, destination checksums are compared against it */
  readonly manifest?: DeliveryManifest;
  /** Date used in the destination directory name */
  readonly now?: Date;
}

/**
 * Outcome of comparing a transferred directory with its source
 */
export interface VerificationResult {
  readonly fileCount: number;
  readonly totalBytes: number;
  readonly verified: boolean;
  readonly checksumMismatches: readonly string[];
}

/**
 * Name of the dated delivery directory for a project
 */
export function deliveryDirectoryName(projectId: string, now: Date): string {
  const stamp = [
    String(now.getFullYear()),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("");
  return `${projectId}_Delivery_${stamp}`;
}

/**
 * rsync arguments for a permission-controlled directory sync
 */
export function rsyncArgs(source: string, destination: string, chmodDirs: string, chmodFiles: string): string[] {
  return ["-a", `--chmod=${chmodDirs},${chmodFiles}`, `${source}/`, `${destination}/`];
}

const syncDirectory = (
  source: string,
  destination: string,
  chmodDirs: string,
  chmodFiles: string
): Effect.Effect<void, TransferError, CommandExecutor.CommandExecutor> =>
  Effect.gen(function* () {
    const args = rsyncArgs(source, destination, chmodDirs, chmodFiles);
    yield* Effect.logInfo(`Running: rsync ${args.join(" ")}`);
    const exitCode = yield* Command.exitCode(Command.make("rsync", ...args)).pipe(
      Effect.mapError(
        (error) => new TransferError(`Failed to run rsync: ${error.message}`, source, destination)
      )
    );
    if (exitCode !== 0) {
      return yield* Effect.fail(
        new TransferError(`rsync exited with status ${exitCode}`, source, destination)
      );
    }
  });

const copyDirectory = (
  source: string,
  destination: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    for (const file of yield* listRegularFiles(source)) {
      yield* copyFile(file.path, `${destination}/${file.name}`);
    }
  });

/**
 * Compare a destination directory with its source
 *
 * Regular-file counts must match. With a manifest, every listed file must
 * also exist at the destination with the recorded SHA-256.
 */
export const verifyTransfer = (
  sourceDir: string,
  destinationDir: string,
  manifest?: DeliveryManifest
): Effect.Effect<VerificationResult, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const sourceFiles = yield* listRegularFiles(sourceDir);
    const destinationFiles = yield* listRegularFiles(destinationDir);

    const checksumMismatches: string[] = [];
    for (const entry of manifest?.files ?? []) {
      const path = `${destinationDir}/${entry.filename}`;
      if (!(yield* isFile(path))) {
        checksumMismatches.push(entry.filename);
        continue;
      }
      const actual = yield* computeChecksums(path);
      if (actual.sha256 !== entry.sha256) {
        checksumMismatches.push(entry.filename);
      }
    }

    const countsMatch = sourceFiles.length === destinationFiles.length;
    if (!countsMatch) {
      yield* Effect.logWarning(
        `File count mismatch: source=${sourceFiles.length}, dest=${destinationFiles.length}`
      );
    }
    if (checksumMismatches.length > 0) {
      yield* Effect.logWarning(`Checksum mismatch: ${checksumMismatches.join(", ")}`);
    }

    return {
      fileCount: destinationFiles.length,
      totalBytes: destinationFiles.reduce((sum, file) => sum + file.size, 0),
      verified: countsMatch && checksumMismatches.length === 0,
      checksumMismatches,
    };
  });

/**
 * Transfer a delivery directory into the staging area and verify it
 */
export const transferDelivery = (
  options: TransferOptions
): Effect.Effect<
  TransferReport,
  FileError | TransferError,
  FileSystem.FileSystem | CommandExecutor.CommandExecutor
> =>
  Effect.gen(function* () {
    const method = options.method ?? "sync";
    const source = options.sourceDir.replace(/\/+$/, "");

    if (!(yield* isDirectory(source))) {
      return yield* Effect.fail(new TransferError(`Source not found: ${options.sourceDir}`, options.sourceDir));
    }
    if (!(yield* isDirectory(options.destRoot)) && (yield* isFile(options.destRoot))) {
      return yield* Effect.fail(
        new TransferError(`Destination root is not a directory: ${options.destRoot}`, source, options.destRoot)
      );
    }

    const destination = `${options.destRoot.replace(/\/+$/, "")}/${deliveryDirectoryName(
      options.projectId,
      options.now ?? new Date()
    )}`;
    yield* ensureDirectory(destination);

    if (method === "sync") {
      yield* syncDirectory(
        source,
        destination,
        options.chmodDirs ?? DEFAULT_CHMOD_DIRS,
        options.chmodFiles ?? DEFAULT_CHMOD_FILES
      );
    } else {
      yield* copyDirectory(source, destination);
    }

    const verification = yield* verifyTransfer(source, destination, options.manifest);
    return {
      sourceDir: source,
      destinationDir: destination,
      method,
      ...verification,
    };
  }).pipe(Effect.annotateLogs({ stage: "transfer" }));
