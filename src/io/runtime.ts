/**
 * Effect platform layer selection and Promise-facing execution
 *
 * Programs in this package declare FileSystem, Path and CommandExecutor as
 * requirements. The Node.js platform layer provides all three.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer for the current runtime
 *
 * @returns Layer providing FileSystem, Path, Terminal and CommandExecutor
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run a fully provided program, rejecting with its typed failure
 *
 * `Effect.runPromise` wraps failures in a FiberFailure; callers of the
 * Promise API expect the package's own error classes instead.
 */
export async function runToPromise<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}
