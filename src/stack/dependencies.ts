// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Dependency resolution between stacks. `dependsOn` holds names that are
 * resolved late, against the registry at selection time. Expansion is a
 * depth-first post-order walk: a dependency's own dependencies come
 * before it. Unknown names are skipped here and reported by validation.
 */

import { Array as Arr, Chunk, Effect, HashSet, Option } from "effect";
import { type CyclicDependencyError, cyclicDependency } from "../lib/errors";
import { type Registry, byName } from "./registry";
import type { Stack } from "./types";

/** DFS state threaded through the walk. */
interface Walk {
  readonly visited: HashSet.HashSet<string>;
  readonly order: Chunk.Chunk<Stack>;
}

/**
 * `trail` holds the names on the current DFS path. Meeting one of them
 * again closes a cycle, reported from its first occurrence.
 */
const walk = (
  registry: Registry,
  stack: Stack,
  trail: readonly string[],
  initial: Walk
): Effect.Effect<Walk, CyclicDependencyError> =>
  Effect.reduce(stack.dependsOn, initial, (state, depName): Effect.Effect<Walk, CyclicDependencyError> => {
    const seenAt = trail.indexOf(depName);
    if (seenAt >= 0) {
      return Effect.fail(cyclicDependency([...trail.slice(seenAt), depName]));
    }
    if (HashSet.has(state.visited, depName)) {
      return Effect.succeed(state);
    }
    return Option.match(byName(registry, depName), {
      onNone: (): Effect.Effect<Walk> => Effect.succeed(state),
      onSome: (dep): Effect.Effect<Walk, CyclicDependencyError> =>
        Effect.map(walk(registry, dep, [...trail, depName], state), (after) => ({
          visited: HashSet.add(after.visited, depName),
          order: Chunk.append(after.order, dep),
        })),
    });
  });

/**
 * Transitive dependencies of `stack`, each dependency after its own
 * dependencies and each exactly once. `stack` itself is not included.
 */
export const expandDependencies = (
  stack: Stack,
  registry: Registry
): Effect.Effect<readonly Stack[], CyclicDependencyError> =>
  Effect.map(
    walk(registry, stack, [stack.name], { visited: HashSet.empty(), order: Chunk.empty() }),
    (result) => Chunk.toReadonlyArray(result.order)
  );

/**
 * Expands each selected stack in turn and appends it after its
 * dependencies. A stack reached twice keeps its first position.
 */
export const withDependencies = (
  stacks: readonly Stack[],
  registry: Registry
): Effect.Effect<readonly Stack[], CyclicDependencyError> =>
  Effect.map(
    Effect.forEach(stacks, (stack) =>
      Effect.map(expandDependencies(stack, registry), (deps) => [...deps, stack])
    ),
    (groups) => Arr.dedupeWith(Arr.flatten(groups), (a, b) => a.name === b.name)
  );

/** Names in `dependsOn` that match no stack in the registry. */
export const findDanglingDependencies = (stack: Stack, registry: Registry): readonly string[] =>
  Arr.filter(stack.dependsOn, (name) => Option.isNone(byName(registry, name)));

/** Stacks listing `name` as a direct dependency. */
export const dependentsOf = (name: string, registry: Registry): readonly Stack[] =>
  Arr.filter(Arr.fromIterable(registry.stacks.values()), (s) => s.dependsOn.includes(name));
