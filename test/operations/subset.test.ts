import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DatasetNotFoundError, NoSamplesRemainingError, ToolkitError, ValidationError } from "../../src/errors";
import {
  type KeepList,
  parseKeepList,
  readKeepList,
  resolveDataset,
  subsetBatch,
  subsetBatches,
} from "../../src/operations/subset";
import { failureOf, makeFakeToolkit, markers, runWith, testLayer, writeBatch } from "../utils/fake-toolkit";

function readRows(path: string): string[] {
  return readFileSync(path, "utf8").split("\n").filter((line) => line !== "");
}

describe("parseKeepList", () => {
  test("accepts one identifier per line", () => {
    expect(parseKeepList("S1\nS2\n")).toEqual(["S1", "S2"]);
  });

  test("uses the first token of a whitespace-delimited pair", () => {
    expect(parseKeepList("FAM1 S1\nFAM2\tS2")).toEqual(["FAM1", "FAM2"]);
  });

  test("drops blank lines and duplicates", () => {
    expect(parseKeepList("S1\n\nS1\n  S2  \n")).toEqual(["S1", "S2"]);
  });
});

describe("subsetBatch", () => {
  let dir: string;
  let keepList: KeepList;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "subset-"));
    keepList = { path: join(dir, "keep.txt"), ids: ["S1", "S3", "S9"] };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("retains only keep-list samples present in the batch", async () => {
    const batch = writeBatch(dir, "batch_a", [["F1", "S1"], ["F2", "S2"], ["F3", "S3"]], markers(4));
    const toolkit = makeFakeToolkit();

    const dataset = await runWith(testLayer(toolkit), subsetBatch(batch, keepList, join(dir, "out")));

    expect(dataset.prefix).toBe(join(dir, "out"));
    expect(readRows(join(dir, "out.keep"))).toEqual(["F1 S1", "F3 S3"]);
    expect(readRows(join(dir, "out.fam"))).toEqual(["F1 S1 0 0 0 -9", "F3 S3 0 0 0 -9"]);
    expect(readRows(join(dir, "out.bim"))).toHaveLength(4);
    expect(readRows(join(dir, "batch_a.fam"))).toHaveLength(3);
  });

  test("passes keep, exclude and output flags to the toolkit", async () => {
    const batch = writeBatch(dir, "batch_a", [["F1", "S1"]], markers(3));
    const excludePath = join(dir, "conflicts.exclude");
    writeFileSync(excludePath, "rs2\n");
    const toolkit = makeFakeToolkit();

    await runWith(
      testLayer(toolkit),
      subsetBatch(batch, keepList, join(dir, "out"), { path: excludePath, markers: ["rs2"] })
    );

    expect(toolkit.calls).toEqual([
      ["--bfile", batch, "--keep", join(dir, "out.keep"), "--exclude", excludePath, "--make-bed", "--out", join(dir, "out")],
    ]);
    expect(readRows(join(dir, "out.bim")).map((row) => row.split("\t")[1])).toEqual(["rs1", "rs3"]);
  });

  test("omits --exclude for an empty exclusion", async () => {
    const batch = writeBatch(dir, "batch_a", [["F1", "S1"]], markers(2));
    const toolkit = makeFakeToolkit();

    await runWith(testLayer(toolkit), subsetBatch(batch, keepList, join(dir, "out"), { path: "unused", markers: [] }));

    expect(toolkit.calls[0]).not.toContain("--exclude");
  });

  test("fails with NoSamplesRemainingError before running the toolkit", async () => {
    const batch = writeBatch(dir, "batch_a", [["F2", "S2"]], markers(2));
    const toolkit = makeFakeToolkit();

    const error = await failureOf(testLayer(toolkit), subsetBatch(batch, keepList, join(dir, "out")));

    expect(error).toBeInstanceOf(NoSamplesRemainingError);
    expect(toolkit.calls).toHaveLength(0);
    expect(existsSync(join(dir, "out.bed"))).toBe(false);
  });

  test("fails with DatasetNotFoundError naming missing members", async () => {
    const batch = writeBatch(dir, "batch_a", [["F1", "S1"]], markers(2));
    rmSync(`${batch}.bim`);

    const error = await failureOf(testLayer(makeFakeToolkit()), subsetBatch(batch, keepList, join(dir, "out")));

    expect(error).toBeInstanceOf(DatasetNotFoundError);
    if (error instanceof DatasetNotFoundError) {
      expect(error.missing).toEqual([".bim"]);
    }
  });

  test("rejects a malformed sample row", async () => {
    const batch = writeBatch(dir, "batch_a", [["F1", "S1"]], markers(2));
    writeFileSync(`${batch}.fam`, "F1 S1 0 0 0 -9\nlonely\n");

    const error = await failureOf(testLayer(makeFakeToolkit()), subsetBatch(batch, keepList, join(dir, "out")));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toContain("row 2");
  });

  test("surfaces a toolkit failure as ToolkitError", async () => {
    const batch = writeBatch(dir, "batch_a", [["F1", "S1"]], markers(2));
    const toolkit = makeFakeToolkit({ failWhen: () => ({ exitCode: 7, stderr: "disk full" }) });

    const error = await failureOf(testLayer(toolkit), subsetBatch(batch, keepList, join(dir, "out")));

    expect(error).toBeInstanceOf(ToolkitError);
    if (error instanceof ToolkitError) {
      expect(error.exitCode).toBe(7);
      expect(error.stage).toBe("subset");
    }
  });
});

describe("subsetBatches", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "subsets-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test.each([false, true])("subsets every batch in order (concurrent: %s)", async (concurrent) => {
    const a = writeBatch(dir, "a", [["F1", "S1"]], markers(2));
    const b = writeBatch(dir, "b", [["F2", "S2"]], markers(2));
    const keepList = { path: join(dir, "keep.txt"), ids: ["S1", "S2"] };

    const datasets = await runWith(
      testLayer(makeFakeToolkit()),
      subsetBatches([a, b], keepList, (index) => join(dir, `sub_${index}`), { concurrent })
    );

    expect(datasets.map((dataset) => dataset.prefix)).toEqual([join(dir, "sub_0"), join(dir, "sub_1")]);
  });
});

describe("readKeepList and resolveDataset", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "keep-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads identifiers with their path", async () => {
    const path = join(dir, "keep.txt");
    writeFileSync(path, "S1\nS2 extra\n\n");

    const keepList = await runWith(testLayer(makeFakeToolkit()), readKeepList(path));

    expect(keepList).toEqual({ path, ids: ["S1", "S2"] });
  });

  test("resolves the member paths of a complete fileset", async () => {
    const prefix = writeBatch(dir, "batch", [["F1", "S1"]], markers(1));

    const dataset = await runWith(testLayer(makeFakeToolkit()), resolveDataset(prefix));

    expect(dataset).toEqual({ prefix, bed: `${prefix}.bed`, bim: `${prefix}.bim`, fam: `${prefix}.fam` });
  });

  test("lists every missing member", async () => {
    const error = await failureOf(testLayer(makeFakeToolkit()), resolveDataset(join(dir, "nothing")));

    expect(error).toBeInstanceOf(DatasetNotFoundError);
    expect(error.missing).toEqual([".bed", ".bim", ".fam"]);
  });
});
