// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Validation pass over discovered stacks. Issues are collected and
 * reported; none of them stop discovery or a lifecycle command.
 */

import { FileSystem, Path } from "@effect/platform";
import { Array as Arr, Effect, Either, Option, pipe } from "effect";
import { expandDependencies, findDanglingDependencies } from "./dependencies";
import type { Registry } from "./registry";
import type { Stack } from "./types";

export type IssueSeverity = "error" | "warning";

export type IssueKind =
  | "missing-manifest"
  | "dangling-dependency"
  | "dependency-cycle"
  | "name-mismatch"
  | "missing-metadata";

export interface ValidationIssue {
  readonly stack: string;
  readonly severity: IssueSeverity;
  readonly kind: IssueKind;
  readonly message: string;
}

const issue = (
  stack: Stack,
  severity: IssueSeverity,
  kind: IssueKind,
  message: string
): ValidationIssue => ({ stack: stack.name, severity, kind, message });

/** Checks that need only the registry, no filesystem access. */
export const structuralIssues = (
  stack: Stack,
  registry: Registry
): Effect.Effect<readonly ValidationIssue[], never, Path.Path> =>
  Effect.gen(function* () {
    const path = yield* Path.Path;
    const nameMismatch = pipe(
      stack.declaredName,
      Option.filter((declared) => declared !== stack.name),
      Option.map((declared) =>
        issue(
          stack,
          "warning",
          "name-mismatch",
          `metadata contains 'name' field ('${declared}') - name is derived from path and cannot be overridden`
        )
      )
    );

    const dangling = Arr.map(findDanglingDependencies(stack, registry), (dep) =>
      issue(stack, "error", "dangling-dependency", `dependency '${dep}' not found`)
    );

    const cycle = Either.match(yield* Effect.either(expandDependencies(stack, registry)), {
      onLeft: (e) => [issue(stack, "error", "dependency-cycle", e.message)],
      onRight: (): readonly ValidationIssue[] => [],
    });

    const missingMetadata = stack.hasMetaFile
      ? []
      : [issue(stack, "warning", "missing-metadata", `no ${path.basename(stack.metaFile)} file`)];

    return [...Option.toArray(nameMismatch), ...dangling, ...cycle, ...missingMetadata];
  });

/** The manifest may have been removed since discovery. */
const manifestIssues = (
  stack: Stack
): Effect.Effect<readonly ValidationIssue[], never, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const exists = yield* Effect.orElseSucceed(fs.exists(stack.manifest), () => false);
    return exists
      ? []
      : [issue(stack, "error", "missing-manifest", `${path.basename(stack.manifest)} not found`)];
  });

export const validateStacks = (
  stacks: readonly Stack[],
  registry: Registry
): Effect.Effect<readonly ValidationIssue[], never, FileSystem.FileSystem | Path.Path> =>
  Effect.map(
    Effect.forEach(stacks, (stack) =>
      Effect.map(
        Effect.all([manifestIssues(stack), structuralIssues(stack, registry)]),
        ([manifest, structural]) => [...manifest, ...structural]
      )
    ),
    (groups) => Arr.flatten(groups)
  );

export const countBySeverity = (
  issues: readonly ValidationIssue[]
): { readonly errors: number; readonly warnings: number } => ({
  errors: Arr.filter(issues, (i) => i.severity === "error").length,
  warnings: Arr.filter(issues, (i) => i.severity === "warning").length,
});
