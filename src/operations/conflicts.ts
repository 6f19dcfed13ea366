/**
 * Marker conflict detection
 *
 * The toolkit reports markers whose allele coding or strand disagrees between
 * batches in a side file named `<attempt>-merge.missnp` instead of in its
 * exit status or output. This module is the only place that knows that
 * convention; everything else works with the parsed marker list.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { FileError } from "../errors";
import { isFile, readText } from "../io/file-reader";

/**
 * Suffix the toolkit appends to a merge output prefix for its conflict list
 */
export const CONFLICT_FILE_SUFFIX = "-merge.missnp";

/**
 * Location of the conflict list for a merge attempt
 */
export function conflictFilePath(attemptPrefix: string): string {
  return `${attemptPrefix}${CONFLICT_FILE_SUFFIX}`;
}

/**
 * Parse a conflict list into distinct marker identifiers
 *
 * Takes the first token of every non-blank line and keeps the order of first
 * appearance. Identifiers are opaque strings.
 */
export function parseConflictList(text: string): string[] {
  const markers: string[] = [];
  const seen = new Set<string>();

  for (const line of text.split(/\r?\n/)) {
    const marker = line.trim().split(/\s+/)[0];
    if (marker === undefined || marker === "" || seen.has(marker)) continue;
    seen.add(marker);
    markers.push(marker);
  }
  return markers;
}

/**
 * Read the conflicting markers a merge attempt left behind
 *
 * @returns Distinct marker identifiers; empty when the list is absent or blank
 */
export const detectConflicts = (
  attemptPrefix: string
): Effect.Effect<string[], FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const path = conflictFilePath(attemptPrefix);
    if (!(yield* isFile(path))) {
      return [];
    }
    return parseConflictList(yield* readText(path));
  });
