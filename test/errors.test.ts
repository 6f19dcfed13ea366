import { describe, expect, test } from "vitest";
import {
  CohortError,
  DatasetNotFoundError,
  ExportFailedError,
  FileError,
  NoSamplesRemainingError,
  TransferError,
  UnresolvedConflictError,
  ValidationError,
} from "../src/errors";

describe("error types", () => {
  test("every error is a CohortError with a stable code", () => {
    const errors = [
      new ValidationError("bad"),
      new DatasetNotFoundError("/b/batch", [".bim"]),
      new NoSamplesRemainingError("/b/batch", "keep.txt"),
      new ExportFailedError("/o/out", 1, ""),
      new UnresolvedConflictError("/o/out", ["rs1"]),
      new TransferError("nope", "/src"),
    ];

    expect(errors.every((error) => error instanceof CohortError)).toBe(true);
    expect(errors.map((error) => error.code)).toEqual([
      "VALIDATION_ERROR",
      "DATASET_NOT_FOUND",
      "NO_SAMPLES_REMAINING",
      "EXPORT_FAILED",
      "UNRESOLVED_CONFLICT",
      "TRANSFER_ERROR",
    ]);
  });

  test("names the stage and context in toString", () => {
    const error = new DatasetNotFoundError("/b/batch", [".bed", ".fam"]);

    expect(error.toString()).toBe(
      "DatasetNotFoundError: Dataset not found: /b/batch (missing .bed, .fam) [stage: subset]\nContext: Prefix: /b/batch"
    );
  });

  test("omits empty context", () => {
    expect(new ValidationError("bad value").toString()).toBe("ValidationError: bad value");
  });

  test("describes the residual conflicts", () => {
    const error = new UnresolvedConflictError("/o/out", ["rs1", "rs2"]);

    expect(error.message).toBe("2 marker conflict(s) remain after correction for /o/out");
    expect(error.stage).toBe("merge");
  });

  test("wraps system errors with the path and operation", () => {
    const error = FileError.fromSystemError("read", "/data/x.txt", new Error("boom"));

    expect(error.filePath).toBe("/data/x.txt");
    expect(error.operation).toBe("read");
    expect(error.message.startsWith("read operation failed: boom")).toBe(true);
  });
});
