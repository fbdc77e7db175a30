/**
 * Effect platform layer for file I/O
 *
 * Every file operation in this package is an Effect program that needs the
 * FileSystem and Path services; this module is the single place that
 * decides which implementation provides them.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Get the Effect platform layer (FileSystem, Path, CommandExecutor)
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an Effect program and reject with its failure value
 *
 * `Effect.runPromise` rejects with a wrapper around the failure cause; the
 * Promise-based API of this package rejects with the typed error instead so
 * callers can use `instanceof`.
 */
export async function runEither<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(program));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
