import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ToolkitError, ValidationError } from "../../src/errors";
import { MergeAttempt, mergeDatasets, mergeListPath } from "../../src/operations/merge";
import { datasetAt } from "../../src/types";
import { failureOf, flipped, makeFakeToolkit, markers, runWith, testLayer, writeBatch } from "../utils/fake-toolkit";

describe("mergeDatasets", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "merge-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("returns a single input unchanged without running the toolkit", async () => {
    const only = datasetAt(writeBatch(dir, "only", [["F1", "S1"]], markers(2)));
    const toolkit = makeFakeToolkit();

    const attempt = await runWith(testLayer(toolkit), mergeDatasets([only], join(dir, "merged")));

    expect(attempt).toEqual(MergeAttempt.Merged({ dataset: only }));
    expect(toolkit.calls).toHaveLength(0);
  });

  test("fails with ValidationError for no inputs", async () => {
    const error = await failureOf(testLayer(makeFakeToolkit()), mergeDatasets([], join(dir, "merged")));
    expect(error).toBeInstanceOf(ValidationError);
  });

  test("merges the first input with an append list of the rest", async () => {
    const a = datasetAt(writeBatch(dir, "a", [["F1", "S1"]], markers(3)));
    const b = datasetAt(writeBatch(dir, "b", [["F2", "S2"]], markers(3)));
    const c = datasetAt(writeBatch(dir, "c", [["F3", "S3"]], markers(3)));
    const toolkit = makeFakeToolkit();
    const target = join(dir, "merged");

    const attempt = await runWith(testLayer(toolkit), mergeDatasets([a, b, c], target));

    expect(attempt._tag).toBe("Merged");
    expect(readFileSync(mergeListPath(target), "utf8")).toBe(`${b.prefix}\n${c.prefix}\n`);
    expect(toolkit.calls).toEqual([
      ["--bfile", a.prefix, "--merge-list", mergeListPath(target), "--make-bed", "--out", target],
    ]);
    expect(readFileSync(`${target}.fam`, "utf8").trim().split("\n")).toHaveLength(3);
  });

  test("writes the append list where asked", async () => {
    const a = datasetAt(writeBatch(dir, "a", [["F1", "S1"]], markers(1)));
    const b = datasetAt(writeBatch(dir, "b", [["F2", "S2"]], markers(1)));
    const listPath = join(dir, "elsewhere.txt");

    await runWith(testLayer(makeFakeToolkit()), mergeDatasets([a, b], join(dir, "merged"), listPath));

    expect(existsSync(listPath)).toBe(true);
    expect(existsSync(mergeListPath(join(dir, "merged")))).toBe(false);
  });

  test("reports conflicting markers as a Conflict value", async () => {
    const base = markers(4);
    const a = datasetAt(writeBatch(dir, "a", [["F1", "S1"]], base));
    const b = datasetAt(writeBatch(dir, "b", [["F2", "S2"]], flipped(base, ["rs2", "rs4"])));
    const target = join(dir, "attempt");

    const attempt = await runWith(testLayer(makeFakeToolkit()), mergeDatasets([a, b], target));

    expect(attempt).toEqual(MergeAttempt.Conflict({ markers: ["rs2", "rs4"], attemptPrefix: target }));
    expect(existsSync(`${target}.bed`)).toBe(false);
  });

  test("ignores a conflict list left by an earlier run", async () => {
    const a = datasetAt(writeBatch(dir, "a", [["F1", "S1"]], markers(2)));
    const b = datasetAt(writeBatch(dir, "b", [["F2", "S2"]], markers(2)));
    const target = join(dir, "merged");
    writeFileSync(`${target}-merge.missnp`, "rs1\n");

    const attempt = await runWith(testLayer(makeFakeToolkit()), mergeDatasets([a, b], target));

    expect(attempt._tag).toBe("Merged");
  });

  test("fails with ToolkitError on a nonzero exit without conflicts", async () => {
    const a = datasetAt(writeBatch(dir, "a", [["F1", "S1"]], markers(2)));
    const b = datasetAt(writeBatch(dir, "b", [["F2", "S2"]], markers(2)));
    const toolkit = makeFakeToolkit({ failWhen: () => ({ exitCode: 1, stderr: "out of memory" }) });

    const error = await failureOf(testLayer(toolkit), mergeDatasets([a, b], join(dir, "merged")));

    expect(error).toBeInstanceOf(ToolkitError);
    if (error instanceof ToolkitError) {
      expect(error.exitCode).toBe(1);
      expect(error.stderr).toBe("out of memory");
      expect(error.stage).toBe("merge");
    }
  });
});
