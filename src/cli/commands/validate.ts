// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Validation report. Issues are printed, never turned into a failing
 * exit code; only an unknown explicit stack name fails.
 */

import { Array as Arr, Effect, Match, Option, pipe } from "effect";
import { writeJson, writeOutput } from "../../lib/log";
import { listStacks } from "../../stack/registry";
import { SelectionRequest, resolve } from "../../stack/selector";
import type { Stack } from "../../stack/types";
import { type ValidationIssue, countBySeverity, validateStacks } from "../../stack/validate";
import type { AppError } from "../../lib/errors";
import { type CommandContext, type CommandEffect, plural } from "./utils";

export interface ValidateOptions {
  readonly ctx: CommandContext;
  readonly target: Option.Option<string>;
}

export const formatIssue = (issue: ValidationIssue): string =>
  `  ${issue.severity === "error" ? "✗" : "⚠"} ${issue.stack}: ${issue.message}`;

export const formatValidation = (issues: readonly ValidationIssue[]): readonly string[] =>
  issues.length === 0
    ? ["Validating stacks...", "", "✓ All stacks valid"]
    : [
        "Validating stacks...",
        "",
        ...Arr.map(issues, formatIssue),
        "",
        `${plural(issues.length, "issue")} found`,
      ];

const targets = (ctx: CommandContext, target: Option.Option<string>): Effect.Effect<readonly Stack[], AppError> =>
  Option.match(target, {
    onNone: () => Effect.succeed(listStacks(ctx.registry)),
    onSome: (name) => resolve(SelectionRequest.ByName({ name }), ctx.registry),
  });

export const executeValidate = (options: ValidateOptions): CommandEffect =>
  Effect.gen(function* () {
    const { ctx } = options;
    const stacks = yield* targets(ctx, options.target);
    const issues = yield* validateStacks(stacks, ctx.registry);

    yield* pipe(
      Match.value(ctx.format),
      Match.when("json", () =>
        writeJson({ stacks: stacks.length, ...countBySeverity(issues), issues })
      ),
      Match.when("pretty", () => writeOutput(formatValidation(issues).join("\n"))),
      Match.exhaustive
    );
  });
