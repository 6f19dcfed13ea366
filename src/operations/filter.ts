/**
 * Cohort filtering against exclusion lists
 *
 * Removes samples named in one or more exclusion lists (sex mismatches,
 * consent withdrawals, failed QC) from a cohort list. Withdrawn participants
 * must never appear in a delivery, so a missing exclusion file is an error
 * rather than an empty list.
 */

import type { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError, ValidationError } from "../errors";
import { isFile, readText } from "../io/file-reader";
import { writeLines } from "../io/file-writer";
import { type ExclusionFormat, ExclusionFormatSchema, type FilterReport } from "../types";
import { parseKeepList } from "./subset";

export const DEFAULT_EXCLUSION_FORMAT: ExclusionFormat = {
  idColumn: 0,
  hasHeader: true,
  delimiter: ",",
};

enum FieldState {
  FieldStart,
  Unquoted,
  Quoted,
  QuoteInQuoted,
}

/**
 * Split one delimited row, honouring double-quoted fields
 *
 * A doubled quote inside a quoted field stands for one quote. Text after a
 * closing quote is kept as part of the field.
 *
 * @throws {ValidationError} When a quoted field is never closed
 */
export function splitDelimited(line: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = "";
  let state = FieldState.FieldStart;
  let i = 0;

  while (i < line.length) {
    const char = line.charAt(i);
    switch (state) {
      case FieldState.FieldStart:
        if (char === '"') {
          state = FieldState.Quoted;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          current = char;
          state = FieldState.Unquoted;
        }
        i++;
        break;

      case FieldState.Unquoted:
        if (char === delimiter) {
          fields.push(current);
          current = "";
          state = FieldState.FieldStart;
        } else {
          current += char;
        }
        i++;
        break;

      case FieldState.Quoted:
        if (char === '"' && line.charAt(i + 1) === '"') {
          current += '"';
          i += 2;
        } else {
          if (char === '"') {
            state = FieldState.QuoteInQuoted;
          } else {
            current += char;
          }
          i++;
        }
        break;

      case FieldState.QuoteInQuoted:
        if (char === delimiter) {
          fields.push(current);
          current = "";
          state = FieldState.FieldStart;
        } else if (char === '"') {
          current += char;
          state = FieldState.Quoted;
        } else {
          current += char;
          state = FieldState.Unquoted;
        }
        i++;
        break;
    }
  }

  switch (state) {
    case FieldState.Quoted:
      throw new ValidationError("Unclosed quote in delimited row", "filter", `Row: ${line}`);
    case FieldState.Unquoted:
    case FieldState.QuoteInQuoted:
      fields.push(current);
      break;
    case FieldState.FieldStart:
      // empty row, or a trailing delimiter opening an empty last field
      if (line.endsWith(delimiter)) fields.push("");
      break;
  }
  return fields;
}

function resolveFormat(format: Partial<ExclusionFormat>): Effect.Effect<ExclusionFormat, ValidationError> {
  const result = ExclusionFormatSchema({ ...DEFAULT_EXCLUSION_FORMAT, ...format });
  if (result instanceof type.errors) {
    return Effect.fail(new ValidationError(`Invalid exclusion format: ${result.summary}`, "filter"));
  }
  return Effect.succeed(result);
}

const readExclusionRows = (
  path: string,
  format: ExclusionFormat
): Effect.Effect<string[][], FileError | ValidationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isFile(path))) {
      return yield* Effect.fail(
        new FileError(`Exclusion file not found: ${path}`, path, "read", undefined, "filter")
      );
    }
    const lines = (yield* readText(path))
      .split(/\r?\n/)
      .filter((line) => line.trim() !== "");
    const rows: string[][] = [];
    for (const [index, line] of lines.entries()) {
      const fields = yield* Effect.try({
        try: () => splitDelimited(line, format.delimiter),
        catch: (error) =>
          new ValidationError(
            error instanceof Error ? error.message : String(error),
            "filter",
            `File: ${path}, row ${index + 1}`
          ),
      });
      rows.push(fields.map((field) => field.trim()));
    }
    return format.hasHeader ? rows.slice(1) : rows;
  });

/**
 * Read an exclusion file into a set of sample identifiers
 */
export const loadExclusionSet = (
  path: string,
  format: Partial<ExclusionFormat> = {}
): Effect.Effect<Set<string>, FileError | ValidationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const resolved = yield* resolveFormat(format);
    const ids = new Set<string>();
    for (const row of yield* readExclusionRows(path, resolved)) {
      const id = row[resolved.idColumn];
      if (id !== undefined && id !== "") ids.add(id);
    }
    return ids;
  });

/**
 * Read an exclusion file into a map of sample identifier to reason
 *
 * Rows too short to hold both columns are skipped.
 */
export const loadExclusionReasons = (
  path: string,
  format: Partial<ExclusionFormat> = {}
): Effect.Effect<Map<string, string>, FileError | ValidationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const resolved = yield* resolveFormat({ reasonColumn: 1, ...format });
    const reasonColumn = resolved.reasonColumn ?? 1;
    const reasons = new Map<string, string>();
    for (const row of yield* readExclusionRows(path, resolved)) {
      const id = row[resolved.idColumn];
      const reason = row[reasonColumn];
      if (id !== undefined && id !== "" && reason !== undefined) reasons.set(id, reason);
    }
    return reasons;
  });

/**
 * Options of a filtering run
 */
export interface FilterOptions {
  /** One sample identifier per line, or a whitespace-delimited FID/IID pair */
  readonly cohortPath: string;
  readonly exclusionPaths?: readonly string[];
  /** Identifiers to exclude in addition to the files */
  readonly exclusionSet?: ReadonlySet<string>;
  /** Where to write the filtered list; nothing is written when omitted */
  readonly outputPath?: string;
  readonly exclusionFormat?: Partial<ExclusionFormat>;
}

/**
 * Remove excluded samples from a cohort list
 *
 * Cohort order is kept. When the exclusion format names a reason column,
 * the report tallies removed samples per reason.
 */
export const filterCohort = (
  options: FilterOptions
): Effect.Effect<FilterReport, FileError | ValidationError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    if (!(yield* isFile(options.cohortPath))) {
      return yield* Effect.fail(
        new FileError(
          `Cohort file not found: ${options.cohortPath}`,
          options.cohortPath,
          "read",
          undefined,
          "filter"
        )
      );
    }

    const toExclude = new Set(options.exclusionSet ?? []);
    const reasons = new Map<string, string>();
    const format = options.exclusionFormat ?? {};

    for (const path of options.exclusionPaths ?? []) {
      for (const id of yield* loadExclusionSet(path, format)) toExclude.add(id);
      if (format.reasonColumn !== undefined) {
        for (const [id, reason] of yield* loadExclusionReasons(path, format)) reasons.set(id, reason);
      }
    }

    const originalIds = (yield* readText(options.cohortPath))
      .split(/\r?\n/)
      .map((line) => parseKeepList(line)[0])
      .filter((id): id is string => id !== undefined);

    const filtered = originalIds.filter((id) => !toExclude.has(id));

    const exclusionReasons: Record<string, number> = {};
    for (const id of originalIds) {
      const reason = reasons.get(id);
      if (toExclude.has(id) && reason !== undefined) {
        exclusionReasons[reason] = (exclusionReasons[reason] ?? 0) + 1;
      }
    }

    if (options.outputPath !== undefined) {
      yield* writeLines(options.outputPath, filtered);
      yield* Effect.logInfo(`Wrote ${filtered.length} samples to ${options.outputPath}`);
    }

    return {
      originalCount: originalIds.length,
      exclusionCount: toExclude.size,
      finalCount: filtered.length,
      removedCount: originalIds.length - filtered.length,
      exclusionReasons,
    };
  }).pipe(Effect.annotateLogs({ stage: "filter" }));
