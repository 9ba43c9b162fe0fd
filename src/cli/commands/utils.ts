// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Shared pieces of command handlers: the resolved context every command
 * receives, stack selection from flags, and the batch summary line.
 */

import type { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import type { ComposeExecutor } from "../../compose/executor";
import type { LogFormat } from "../../config/field-values";
import type { Settings } from "../../config/resolve";
import type { AppError } from "../../lib/errors";
import { logFail, logSuccess } from "../../lib/log";
import type { BatchReport, BatchVerb, StatusEntry } from "../../stack/orchestrator";
import type { Registry } from "../../stack/registry";
import {
  type SelectionOptions,
  type SelectionRequest,
  describeSelection,
  requireSelection,
  resolve,
} from "../../stack/selector";
import { type Stack, stackToJson } from "../../stack/types";

/** Resolved runtime context for commands. */
export interface CommandContext {
  readonly settings: Settings;
  /** Output format for command results. */
  readonly format: LogFormat;
  readonly registry: Registry;
}

/** Everything a command handler may need from the environment. */
export type CommandRequirements = ComposeExecutor | FileSystem.FileSystem | Path.Path;

export type CommandEffect = Effect.Effect<void, AppError, CommandRequirements>;

export const plural = (count: number, singular: string, pluralForm = `${singular}s`): string =>
  `${count} ${count === 1 ? singular : pluralForm}`;

export const statusIcon = (running: boolean): string => (running ? "●" : "○");

export const orNone = (values: readonly string[]): string =>
  values.length > 0 ? values.join(", ") : "none";

export const rule = (width = 60): string => "=".repeat(width);

export interface Selected {
  readonly request: SelectionRequest;
  readonly stacks: readonly Stack[];
}

/** Selection flags to stacks; a missing selector or unknown name fails. */
export const selectStacks = (
  ctx: CommandContext,
  options: SelectionOptions
): Effect.Effect<Selected, AppError> =>
  Effect.gen(function* () {
    const request = yield* requireSelection(options);
    const stacks = yield* resolve(request, ctx.registry);
    return { request, stacks };
  });

/** Logged when a category or tag selection matched nothing. */
export const logNothingSelected = (request: SelectionRequest): Effect.Effect<void> =>
  Effect.logWarning(`No stacks found for ${describeSelection(request)}`);

/** Serializable status entry shared by `ls` and `status`. */
export const statusEntryToJson = (entry: StatusEntry): Record<string, unknown> => ({
  ...stackToJson(entry.stack),
  status: {
    state: entry.status.state,
    health: entry.health,
    totalContainers: entry.status.totalContainers,
    runningContainers: entry.status.runningContainers,
  },
});

/** Final line of a batch: all succeeded, or which stacks failed. */
export const reportBatch = (report: BatchReport, verb: BatchVerb): Effect.Effect<void> => {
  const total = report.results.length;
  if (report.failed === 0) {
    return logSuccess(`${plural(total, "stack")} ${verb.past}`);
  }
  const failedNames = report.results.filter((r) => !r.ok).map((r) => r.stack.name);
  return logFail(
    `${report.failed} of ${plural(total, "stack")} failed: ${failedNames.join(", ")}`
  );
};
