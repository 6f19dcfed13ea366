/**
 * End-to-end delivery runs against the in-process toolkit
 */

import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, UnresolvedConflictError, ValidationError } from "../../src/errors";
import { deliveryPipeline } from "../../src/pipeline";
import type { PipelineConfigInput } from "../../src/types";
import { failureOf, flipped, makeFakeToolkit, markers, runWith, testLayer, writeBatch } from "../utils/fake-toolkit";

const NOW = new Date(2025, 5, 30);

describe("deliveryPipeline", () => {
  let dir: string;
  let config: PipelineConfigInput;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "delivery-"));
    const cohortFile = join(dir, "cohort_all.txt");
    const exclusions = join(dir, "withdrawn.csv");
    writeFileSync(cohortFile, "S1\nS2\nS3\nS4\nS5\n");
    writeFileSync(exclusions, "sample_id,reason\nS5,consent\n");
    const samples = [
      ["F1", "S1"],
      ["F2", "S2"],
      ["F3", "S3"],
      ["F4", "S4"],
    ] as const;
    const batchA = writeBatch(dir, "batch_01", samples, markers(3));
    const batchB = writeBatch(dir, "batch_02", [...samples, ["F5", "S5"]], flipped(markers(3), ["rs2"]));
    config = {
      projectId: "PRJ001",
      cohortFile,
      exclusionFiles: [exclusions],
      batchPrefixes: [batchA, batchB],
      workDir: join(dir, "work"),
      deliveryDir: join(dir, "delivery"),
      stagingRoot: join(dir, "staging"),
      transferMethod: "copy",
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("filters, merges with correction, manifests and transfers", async () => {
    const result = await runWith(testLayer(makeFakeToolkit()), deliveryPipeline(config, NOW));

    expect(result.filterReport).toEqual({
      originalCount: 5,
      exclusionCount: 1,
      finalCount: 4,
      removedCount: 1,
      exclusionReasons: {},
    });
    expect(result.mergeReport?.status).toBe("corrected");
    expect(result.mergeReport?.conflictMarkerCount).toBe(1);
    expect(result.mergeReport?.finalSampleCount).toBe(4);
    expect(result.mergeReport?.finalMarkerCount).toBe(2);

    expect(result.manifest.files.map((file) => file.filename)).toEqual([
      "PRJ001_final_genotypes.bed",
      "PRJ001_final_genotypes.bim",
      "PRJ001_final_genotypes.fam",
      "PRJ001_final_genotypes.log",
      "PRJ001_final_genotypes.vcf.gz",
    ]);
    expect(result.manifest.deliveryDate).toBe("2025-06-30");

    const destination = join(dir, "staging", "PRJ001_Delivery_20250630");
    expect(result.transferReport.destinationDir).toBe(destination);
    expect(result.transferReport.fileCount).toBe(7);
    expect(result.transferReport.verified).toBe(true);
    expect(readdirSync(destination)).toContain("MANIFEST.tsv");
    expect(readFileSync(join(destination, "STATUS_SUMMARY.tsv"), "utf8")).toContain("Project_ID\tPRJ001\n");
    expect(readFileSync(join(dir, "work", "cohort_filtered.txt"), "utf8")).toBe("S1\nS2\nS3\nS4\n");
  });

  test("delivers the filtered cohort alone when no batches are configured", async () => {
    const result = await runWith(testLayer(makeFakeToolkit()), deliveryPipeline({ ...config, batchPrefixes: [] }, NOW));

    expect(result.mergeReport).toBeNull();
    expect(result.manifest.totalFiles).toBe(0);
    expect(result.transferReport.fileCount).toBe(2);
  });

  test("stops before manifest and transfer when conflicts survive correction", async () => {
    const error = await failureOf(
      testLayer(makeFakeToolkit({ stickyConflicts: ["rs3"] })),
      deliveryPipeline(config, NOW)
    );

    expect(error).toBeInstanceOf(UnresolvedConflictError);
    if (error instanceof UnresolvedConflictError) {
      expect(error.residualMarkers).toEqual(["rs3"]);
    }
    expect(existsSync(join(dir, "staging"))).toBe(false);
  });

  test("checks inputs before any step runs", async () => {
    const toolkit = makeFakeToolkit();

    const error = await failureOf(
      testLayer(toolkit),
      deliveryPipeline({ ...config, exclusionFiles: [join(dir, "missing.csv")] }, NOW)
    );

    expect(error).toBeInstanceOf(FileError);
    expect(error.stage).toBe("preflight");
    expect(toolkit.calls).toHaveLength(0);
    expect(existsSync(join(dir, "work"))).toBe(false);
  });

  test("rejects an invalid project identifier", async () => {
    const error = await failureOf(testLayer(makeFakeToolkit()), deliveryPipeline({ ...config, projectId: "bad id" }, NOW));

    expect(error).toBeInstanceOf(ValidationError);
  });
});
