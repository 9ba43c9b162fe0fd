// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Status table: one row per stack with its container counts, followed by
 * a running/stopped/degraded summary.
 */

import { Array as Arr, Effect, Match, type Option, pipe } from "effect";
import { writeJson, writeOutput } from "../../lib/log";
import {
  type StatusEntry,
  type StatusSummary,
  collectStatuses,
} from "../../stack/orchestrator";
import { filterStacks } from "../../stack/registry";
import { type CommandContext, type CommandEffect, statusEntryToJson, statusIcon } from "./utils";

export interface StatusOptions {
  readonly ctx: CommandContext;
  readonly category: Option.Option<string>;
  readonly tag: Option.Option<string>;
}

export const formatStatusRow = (entry: StatusEntry): string => {
  const { stack, status } = entry;
  const containers = `${status.runningContainers}/${status.totalContainers}`;
  return `${statusIcon(status.state === "running")} ${stack.name.padEnd(28)} ${stack.category.padEnd(15)} ${entry.health.padEnd(10)} ${containers}`;
};

export const formatSummary = (summary: StatusSummary): string =>
  `${summary.total} total: ${summary.running} running, ${summary.degraded} degraded, ${summary.stopped} stopped`;

export const formatStatusTable = (
  entries: readonly StatusEntry[],
  summary: StatusSummary
): readonly string[] => [
  "",
  `${"Stack".padEnd(30)} ${"Category".padEnd(15)} ${"Status".padEnd(10)} Containers`,
  "-".repeat(70),
  ...Arr.map(entries, formatStatusRow),
  "",
  formatSummary(summary),
];

export const executeStatus = (options: StatusOptions): CommandEffect =>
  Effect.gen(function* () {
    const { ctx } = options;
    const stacks = filterStacks(ctx.registry, { category: options.category, tag: options.tag });
    const report = yield* collectStatuses(stacks);

    yield* pipe(
      Match.value(ctx.format),
      Match.when("json", () =>
        writeJson({
          stacks: Arr.map(report.entries, statusEntryToJson),
          summary: report.summary,
        })
      ),
      Match.when("pretty", () =>
        writeOutput(formatStatusTable(report.entries, report.summary).join("\n"))
      ),
      Match.exhaustive
    );
  });
