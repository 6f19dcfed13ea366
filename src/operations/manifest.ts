/**
 * Delivery manifest generation
 *
 * Records size, MD5 and SHA-256 of every file in a delivery directory so the
 * receiving end (and the transfer step) can verify what arrived.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Stream } from "effect";
import { createHash } from "node:crypto";
import { FileError } from "../errors";
import { isDirectory, listRegularFiles } from "../io/file-reader";
import { writeLines } from "../io/file-writer";
import type { DeliveryManifest, FileChecksum } from "../types";

/**
 * Name fragments of files the manifest never lists (its own outputs)
 */
export const RESERVED_NAME_TOKENS = ["MANIFEST", "STATUS"] as const;

export const MANIFEST_FILENAME = "MANIFEST.tsv";
export const STATUS_SUMMARY_FILENAME = "STATUS_SUMMARY.tsv";

/**
 * Format a date as YYYY-MM-DD in local time
 */
export function isoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/**
 * Compute MD5 and SHA-256 of a file in one streamed pass
 */
export const computeChecksums = (
  path: string
): Effect.Effect<FileChecksum, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const md5 = createHash("md5");
    const sha256 = createHash("sha256");

    yield* fs.stream(path).pipe(
      Stream.runForEach((chunk) =>
        Effect.sync(() => {
          md5.update(chunk);
          sha256.update(chunk);
        })
      )
    );
    const info = yield* fs.stat(path);

    return {
      filename: path.split("/").pop() ?? path,
      fileSize: Number(info.size),
      md5: md5.digest("hex"),
      sha256: sha256.digest("hex"),
    };
  }).pipe(
    Effect.mapError((error) => FileError.fromSystemError("read", path, error))
  );

/**
 * Build the manifest of a delivery directory
 *
 * Lists regular files directly inside the directory, by name, skipping
 * any whose name contains one of `excludePatterns`.
 *
 * @param excludePatterns - Name fragments to skip; defaults to the reserved tokens
 * @param now - Delivery date
 */
export const generateManifest = (
  deliveryDir: string,
  projectId: string,
  excludePatterns: readonly string[] = RESERVED_NAME_TOKENS,
  now: Date = new Date()
): Effect.Effect<DeliveryManifest, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isDirectory(deliveryDir))) {
      return yield* Effect.fail(
        new FileError(`Not a directory: ${deliveryDir}`, deliveryDir, "list", undefined, "manifest")
      );
    }

    const candidates = (yield* listRegularFiles(deliveryDir)).filter(
      (file) => !excludePatterns.some((pattern) => file.name.includes(pattern))
    );
    const files = yield* Effect.forEach(candidates, (file) => computeChecksums(file.path));

    return {
      projectId,
      deliveryDate: isoDate(now),
      files,
      totalFiles: files.length,
      totalSizeBytes: files.reduce((sum, file) => sum + file.fileSize, 0),
    };
  }).pipe(Effect.annotateLogs({ stage: "manifest", directory: deliveryDir }));

/**
 * Write the manifest as TSV: Filename, Size_Bytes, MD5, SHA256
 */
export const writeManifest = (
  manifest: DeliveryManifest,
  outputPath: string
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    yield* writeLines(outputPath, [
      ["Filename", "Size_Bytes", "MD5", "SHA256"].join("\t"),
      ...manifest.files.map((file) => [file.filename, file.fileSize, file.md5, file.sha256].join("\t")),
    ]);
    yield* Effect.logInfo(`Manifest written to ${outputPath} (${manifest.totalFiles} files)`);
  });

/**
 * Write the status summary as TSV: Metric, Value
 *
 * Extra metadata follows the standard rows and may override them.
 */
export const writeStatusSummary = (
  manifest: DeliveryManifest,
  outputPath: string,
  extraMetadata: Readonly<Record<string, string>> = {}
): Effect.Effect<void, FileError, FileSystem.FileSystem> => {
  const metadata: Record<string, string> = {
    Project_ID: manifest.projectId,
    Delivery_Date: manifest.deliveryDate,
    Total_Files: String(manifest.totalFiles),
    Total_Size_Bytes: String(manifest.totalSizeBytes),
    Integrity_Check: "PASS",
    ...extraMetadata,
  };
  return writeLines(outputPath, [
    "Metric\tValue",
    ...Object.entries(metadata).map(([key, value]) => `${key}\t${value}`),
  ]);
};
