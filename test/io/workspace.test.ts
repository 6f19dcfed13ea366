import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { openWorkspace } from "../../src/io/workspace";
import { failureOf, makeFakeToolkit, runWith, testLayer } from "../utils/fake-toolkit";

const layer = testLayer(makeFakeToolkit());

describe("openWorkspace", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "workspace-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test("creates a run directory that is removed with its scope", async () => {
    const directory = await runWith(
      layer,
      Effect.scoped(
        Effect.map(openWorkspace(join(root, "work")), (workspace) => {
          writeFileSync(workspace.path("artifact.txt"), "x");
          expect(existsSync(workspace.path("artifact.txt"))).toBe(true);
          expect(workspace.kept).toBe(false);
          return workspace.directory;
        })
      )
    );

    expect(directory.startsWith(join(root, "work", "merge-"))).toBe(true);
    expect(existsSync(directory)).toBe(false);
  });

  test("removes the directory when the scoped program fails", async () => {
    let directory = "";

    const error = await failureOf(
      layer,
      Effect.scoped(
        Effect.flatMap(openWorkspace(root), (workspace) => {
          directory = workspace.directory;
          return Effect.fail("boom");
        })
      )
    );

    expect(error).toBe("boom");
    expect(directory).not.toBe("");
    expect(existsSync(directory)).toBe(false);
  });

  test("keeps the directory when asked", async () => {
    const directory = await runWith(
      layer,
      Effect.scoped(Effect.map(openWorkspace(root, true), (workspace) => workspace.directory))
    );

    expect(existsSync(directory)).toBe(true);
  });

  test("gives concurrent runs distinct directories", async () => {
    const [a, b] = await runWith(
      layer,
      Effect.scoped(
        Effect.all([openWorkspace(root), openWorkspace(root)], { concurrency: 2 }).pipe(
          Effect.map((workspaces) => workspaces.map((workspace) => workspace.directory))
        )
      )
    );

    expect(a).not.toBe(b);
  });
});
