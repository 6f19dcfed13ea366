/**
 * Scoped working directory for intermediate merge artifacts
 *
 * Each merge run gets its own directory below the configured work root, so
 * concurrent runs (and parallel tests) never write the same paths. The
 * directory is removed when the enclosing Scope closes, on success, failure
 * or interruption alike, unless intermediates are kept for inspection.
 */

import { FileSystem } from "@effect/platform";
import { Effect, type Scope } from "effect";
import { FileError } from "../errors";
import { ensureDirectory } from "./file-writer";

/**
 * Handle to a run's working directory
 */
export interface Workspace {
  readonly directory: string;
  /** Whether the directory outlives the scope */
  readonly kept: boolean;
  /** Path of a named artifact inside the workspace */
  readonly path: (name: string) => string;
}

const RUN_PREFIX = "merge-";

function makeHandle(directory: string, kept: boolean): Workspace {
  return {
    directory,
    kept,
    path: (name) => `${directory}/${name}`,
  };
}

/**
 * Open a workspace below `root`
 *
 * @param root - Work root, created if missing
 * @param keep - Leave the run directory in place after the scope closes
 */
export const openWorkspace = (
  root: string,
  keep = false
): Effect.Effect<Workspace, FileError, FileSystem.FileSystem | Scope.Scope> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* ensureDirectory(root);

    const directory = keep
      ? yield* fs.makeTempDirectory({ directory: root, prefix: RUN_PREFIX })
      : yield* fs.makeTempDirectoryScoped({ directory: root, prefix: RUN_PREFIX });

    yield* Effect.logDebug(`Workspace ${directory}${keep ? " (kept)" : ""}`);
    return makeHandle(directory, keep);
  }).pipe(
    Effect.mapError((error) =>
      error instanceof FileError ? error : FileError.fromSystemError("mkdir", root, error)
    )
  );
