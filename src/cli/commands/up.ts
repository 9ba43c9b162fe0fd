// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Start stacks. With --with-deps each selected stack is preceded by its
 * dependency closure; with --priority the final set is put in start order.
 */

import { Effect } from "effect";
import type { CyclicDependencyError } from "../../lib/errors";
import { withDependencies } from "../../stack/dependencies";
import { STARTING, startStacks } from "../../stack/orchestrator";
import { startOrder } from "../../stack/order";
import type { Registry } from "../../stack/registry";
import type { SelectionOptions } from "../../stack/selector";
import type { Stack } from "../../stack/types";
import {
  type CommandContext,
  type CommandEffect,
  logNothingSelected,
  plural,
  reportBatch,
  selectStacks,
} from "./utils";

export interface UpOptions {
  readonly ctx: CommandContext;
  readonly selection: SelectionOptions;
  readonly priority: boolean;
  readonly withDeps: boolean;
}

/** The stacks `up` will start, in the order it will start them. */
export const planUp = (
  selected: readonly Stack[],
  registry: Registry,
  options: { readonly priority: boolean; readonly withDeps: boolean }
): Effect.Effect<readonly Stack[], CyclicDependencyError> => {
  const expanded: Effect.Effect<readonly Stack[], CyclicDependencyError> = options.withDeps
    ? withDependencies(selected, registry)
    : Effect.succeed(selected);
  return Effect.map(expanded, (stacks) => (options.priority ? startOrder(stacks) : stacks));
};

export const executeUp = (options: UpOptions): CommandEffect =>
  Effect.gen(function* () {
    const { ctx } = options;
    const { request, stacks: selected } = yield* selectStacks(ctx, options.selection);
    if (selected.length === 0) {
      return yield* logNothingSelected(request);
    }

    const stacks = yield* planUp(selected, ctx.registry, options);
    yield* Effect.logInfo(`Starting ${plural(stacks.length, "stack")}...`);
    const report = yield* startStacks(stacks);
    yield* reportBatch(report, STARTING);
  });
