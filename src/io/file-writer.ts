/**
 * File writing helpers built on the Effect platform FileSystem
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";

/**
 * Write lines to a file, one per line with a trailing newline
 *
 * An empty list writes an empty file.
 */
export const writeLines = (
  path: string,
  lines: readonly string[]
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, lines.length === 0 ? "" : `${lines.join("\n")}\n`);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));

/**
 * Create a directory and its parents if missing
 */
export const ensureDirectory = (path: string): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.makeDirectory(path, { recursive: true });
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", path, error)));

/**
 * Copy a single file, overwriting the destination
 */
export const copyFile = (from: string, to: string): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.copyFile(from, to);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("copy", from, error)));

/**
 * Remove a file if it exists
 */
export const removeIfExists = (path: string): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(path)) {
      yield* fs.remove(path);
    }
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("remove", path, error)));

/**
 * Copy every existing `<from><ext>` to `<to><ext>`
 *
 * Extensions with no source file are skipped, so optional members such as a
 * log file do not fail the copy.
 *
 * @returns The extensions that were copied
 */
export const copyFileset = (
  from: string,
  to: string,
  extensions: readonly string[]
): Effect.Effect<string[], FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const copied: string[] = [];
    for (const ext of extensions) {
      const source = `${from}${ext}`;
      const exists = yield* fs
        .exists(source)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", source, error)));
      if (exists) {
        yield* copyFile(source, `${to}${ext}`);
        copied.push(ext);
      }
    }
    return copied;
  });

/**
 * Remove every existing `<prefix><ext>`
 */
export const removeFileset = (
  prefix: string,
  extensions: readonly string[]
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.forEach(extensions, (ext) => removeIfExists(`${prefix}${ext}`), { discard: true });
