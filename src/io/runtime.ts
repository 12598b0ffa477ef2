/**
 * Effect platform layer for filesystem access
 *
 * Library code describes I/O as Effect programs against the abstract
 * `FileSystem` service; this module supplies the Node.js implementation and
 * runs programs to a Promise at the public boundary.
 */

import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";

/**
 * Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a filesystem program against the platform layer
 *
 * @example
 * ```typescript
 * const size = await runWithPlatform(
 *   Effect.gen(function* () {
 *     const fs = yield* FileSystem.FileSystem;
 *     return (yield* fs.stat('reads.fq')).size;
 *   })
 * );
 * ```
 */
export function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem>
): Promise<A> {
  return Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
}
