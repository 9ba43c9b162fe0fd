// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack listing grouped by category, with live status per stack.
 */

import { Array as Arr, Effect, Match, type Option, Order, pipe } from "effect";
import { writeJson, writeOutput } from "../../lib/log";
import { type StatusEntry, collectStatuses } from "../../stack/orchestrator";
import { filterStacks } from "../../stack/registry";
import {
  type CommandContext,
  type CommandEffect,
  orNone,
  rule,
  statusEntryToJson,
  statusIcon,
} from "./utils";

export interface ListOptions {
  readonly ctx: CommandContext;
  readonly category: Option.Option<string>;
  readonly tag: Option.Option<string>;
}

const formatEntry = (entry: StatusEntry): readonly string[] => {
  const { stack, status } = entry;
  return [
    "",
    `  ${statusIcon(status.state === "running")} ${stack.name}`,
    ...(stack.description === "" ? [] : [`     ${stack.description}`]),
    `     Path: ${stack.path}`,
    `     Tags: ${orNone(stack.tags)}`,
    `     Status: ${entry.health} (${status.runningContainers}/${status.totalContainers} containers)`,
    ...(stack.autoStart ? [`     Auto-start: yes (priority ${stack.priority})`] : []),
  ];
};

/** Category headings in name order; stacks keep their display order inside each. */
export const formatList = (entries: readonly StatusEntry[]): readonly string[] => {
  const groups = Arr.groupBy(entries, (e) => e.stack.category);
  const categories = Arr.sort(Object.keys(groups), Order.string);
  return Arr.flatMap(categories, (category) => [
    "",
    rule(),
    category.toUpperCase(),
    rule(),
    ...Arr.flatMap(groups[category] ?? [], formatEntry),
  ]);
};

export const executeList = (options: ListOptions): CommandEffect =>
  Effect.gen(function* () {
    const { ctx } = options;
    const stacks = filterStacks(ctx.registry, { category: options.category, tag: options.tag });
    const report = yield* collectStatuses(stacks);

    yield* pipe(
      Match.value(ctx.format),
      Match.when("json", () => writeJson(Arr.map(report.entries, statusEntryToJson))),
      Match.when("pretty", () =>
        stacks.length === 0
          ? writeOutput("No stacks found")
          : writeOutput(formatList(report.entries).join("\n"))
      ),
      Match.exhaustive
    );
  });
