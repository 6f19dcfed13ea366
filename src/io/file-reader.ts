/**
 * File reading helpers built on the Effect platform FileSystem
 *
 * Platform failures are mapped to FileError so callers see one error type
 * for every filesystem problem, with the path attached.
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";

/**
 * Check that a path exists and is a regular file
 */
export const isFile = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(path);
    return info.type === "File";
  }).pipe(Effect.orElseSucceed(() => false));

/**
 * Check that a path exists and is a directory
 */
export const isDirectory = (path: string): Effect.Effect<boolean, never, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(path);
    return info.type === "Directory";
  }).pipe(Effect.orElseSucceed(() => false));

/**
 * Read a text file, failing with FileError
 */
export const readText = (path: string): Effect.Effect<string, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));

/**
 * Split text into trimmed, non-blank lines
 */
export function nonBlankLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

/**
 * Read the non-blank lines of a text file
 */
export const readLines = (path: string): Effect.Effect<string[], FileError, FileSystem.FileSystem> =>
  readText(path).pipe(Effect.map(nonBlankLines));

/**
 * Count the records (non-blank lines) of a file, 0 when it is absent
 *
 * Used to audit what a stage actually persisted.
 */
export const countRecords = (path: string): Effect.Effect<number, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isFile(path))) {
      return 0;
    }
    const lines = yield* readLines(path);
    return lines.length;
  });

/**
 * Regular file entry of a directory listing
 */
export interface RegularFile {
  readonly name: string;
  readonly path: string;
  readonly size: number;
}

/**
 * List the regular files directly inside a directory, sorted by name
 */
export const listRegularFiles = (
  directory: string
): Effect.Effect<RegularFile[], FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const names = yield* fs.readDirectory(directory);
    const files: RegularFile[] = [];

    for (const name of [...names].sort()) {
      const path = `${directory.replace(/\/+$/, "")}/${name}`;
      const info = yield* fs.stat(path);
      if (info.type === "File") {
        files.push({ name, path, size: Number(info.size) });
      }
    }
    return files;
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("list", directory, error)));
