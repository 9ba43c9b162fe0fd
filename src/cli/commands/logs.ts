// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Log streaming for one or more stacks. Unlike the lifecycle commands,
 * no selector means every stack, and a category or tag that matches
 * nothing is an error.
 */

import { Array as Arr, Effect, Option } from "effect";
import type { LogOptions } from "../../compose/executor";
import { ErrorCode, GeneralError, type StackNotFoundError, stackNotFound } from "../../lib/errors";
import { streamLogs } from "../../stack/orchestrator";
import { displayOrder } from "../../stack/order";
import { type Registry, allStacks, byCategory, byName, byTag } from "../../stack/registry";
import type { Stack } from "../../stack/types";
import { type CommandContext, type CommandEffect, plural } from "./utils";

export interface LogSelection {
  readonly stacks: readonly string[];
  readonly all: boolean;
  readonly category: Option.Option<string>;
  readonly tag: Option.Option<string>;
}

export interface LogsOptions {
  readonly ctx: CommandContext;
  readonly selection: LogSelection;
  readonly logOptions: LogOptions;
}

const noneFound = (message: string): GeneralError =>
  new GeneralError({ code: ErrorCode.GENERAL_ERROR, message });

const nonEmpty = (
  stacks: readonly Stack[],
  message: string
): Effect.Effect<readonly Stack[], GeneralError> =>
  stacks.length === 0 ? Effect.fail(noneFound(message)) : Effect.succeed(displayOrder(stacks));

const byNames = (
  registry: Registry,
  names: readonly string[]
): Effect.Effect<readonly Stack[], StackNotFoundError> =>
  Effect.forEach(names, (name) =>
    Option.match(byName(registry, name), {
      onNone: () => Effect.fail(stackNotFound(name)),
      onSome: (stack) => Effect.succeed(stack),
    })
  );

/**
 * Explicit names first (each must exist, order kept), then --all,
 * --category and --tag; with none of them every stack is shown.
 */
export const selectLogStacks = (
  registry: Registry,
  selection: LogSelection
): Effect.Effect<readonly Stack[], GeneralError | StackNotFoundError> => {
  if (selection.stacks.length > 0) {
    return byNames(registry, Arr.dedupe(selection.stacks));
  }
  if (Option.isSome(selection.category) && !selection.all) {
    const category = selection.category.value;
    return nonEmpty(byCategory(registry, category), `No stacks found in category '${category}'`);
  }
  if (Option.isSome(selection.tag) && !selection.all) {
    const tag = selection.tag.value;
    return nonEmpty(byTag(registry, tag), `No stacks found with tag '${tag}'`);
  }
  return nonEmpty(allStacks(registry), "No stacks found");
};

export const logsHeading = (stacks: readonly Stack[]): string => {
  const [only, ...rest] = stacks;
  return only !== undefined && rest.length === 0
    ? `Showing logs for ${only.name}...`
    : `Showing logs from ${plural(stacks.length, "stack")}...`;
};

export const executeLogs = (options: LogsOptions): CommandEffect =>
  Effect.gen(function* () {
    const stacks = yield* selectLogStacks(options.ctx.registry, options.selection);
    yield* Effect.logInfo(logsHeading(stacks));
    yield* streamLogs(stacks, options.logOptions);
  });
