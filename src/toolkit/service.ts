/**
 * Effect-based service around the external genotype toolkit binary
 *
 * The merge core never spawns processes itself. It asks the
 * `GenotypeToolkit` service to run an argument list and inspects the
 * files the toolkit leaves behind. Swapping the layer swaps the binary:
 *
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const toolkit = yield* GenotypeToolkit;
 *   return yield* toolkit.run(["--bfile", "batch_01", "--freq", "--out", "batch_01"]);
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(Effect.provide(GenotypeToolkit.layer("plink")), Effect.provide(NodeContext.layer))
 * );
 * ```
 *
 * Tests provide an in-process layer instead (see test/utils/fake-toolkit.ts).
 *
 * @module toolkit/service
 */

import { Command, CommandExecutor } from "@effect/platform";
import { Context, Effect, Layer, Stream } from "effect";
import { type Stage, ToolkitError } from "../errors";

/**
 * Result of one toolkit invocation
 */
export interface ToolkitRun {
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Shape of the toolkit service
 */
export interface GenotypeToolkitShape {
  /** Executable the layer was built for, used in log lines */
  readonly executable: string;

  /**
   * Run the toolkit with an argument list
   *
   * A nonzero exit status is returned, not raised: some callers treat it as
   * an expected outcome. Fails only when the process cannot be run.
   */
  readonly run: (args: readonly string[]) => Effect.Effect<ToolkitRun, ToolkitError>;
}

const collectText = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (acc, chunk) => acc + chunk)
  );

function makeCommandToolkit(
  executable: string,
  executor: CommandExecutor.CommandExecutor
): GenotypeToolkitShape {
  return {
    executable,
    run: (args) =>
      Effect.scoped(
        Effect.gen(function* () {
          const process = yield* Command.start(Command.make(executable, ...args));
          const [exitCode, stdout, stderr] = yield* Effect.all(
            [process.exitCode, collectText(process.stdout), collectText(process.stderr)],
            { concurrency: "unbounded" }
          );
          return { args, exitCode: Number(exitCode), stdout, stderr };
        })
      ).pipe(
        Effect.provideService(CommandExecutor.CommandExecutor, executor),
        Effect.mapError(
          (error) =>
            new ToolkitError(`Failed to run ${executable}: ${error.message}`, [executable, ...args])
        )
      ),
  };
}

/**
 * Genotype toolkit service for Effect-based dependency injection
 */
export class GenotypeToolkit extends Context.Tag("@cohort-delivery/GenotypeToolkit")<
  GenotypeToolkit,
  GenotypeToolkitShape
>() {
  /**
   * Toolkit backed by a real executable, resolved through PATH when it has
   * no directory component
   */
  static layer(executable: string): Layer.Layer<GenotypeToolkit, never, CommandExecutor.CommandExecutor> {
    return Layer.effect(
      GenotypeToolkit,
      Effect.map(CommandExecutor.CommandExecutor, (executor) => makeCommandToolkit(executable, executor))
    );
  }
}

/**
 * Run the toolkit and log the command line
 */
export const invoke = (args: readonly string[]): Effect.Effect<ToolkitRun, ToolkitError, GenotypeToolkit> =>
  Effect.gen(function* () {
    const toolkit = yield* GenotypeToolkit;
    yield* Effect.logInfo(`Running: ${toolkit.executable} ${args.join(" ")}`);
    const result = yield* toolkit.run(args);
    yield* Effect.logDebug(`Exit status ${result.exitCode}`);
    return result;
  });

/**
 * Run the toolkit and fail with ToolkitError on a nonzero exit status
 */
export const invokeChecked = (
  args: readonly string[],
  stage: Stage
): Effect.Effect<ToolkitRun, ToolkitError, GenotypeToolkit> =>
  Effect.flatMap(invoke(args), (result) =>
    result.exitCode === 0
      ? Effect.succeed(result)
      : Effect.fail(
          new ToolkitError(
            `Toolkit exited with status ${result.exitCode}`,
            args,
            result.exitCode,
            result.stderr,
            stage
          )
        )
  );
